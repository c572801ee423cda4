import assert from "node:assert/strict";
import { test } from "node:test";
import { GenerationError } from "../middleware/gateway.errorHandler.middleware";
import { createHarness, customerMessage, delay, employeeMessage, sampleChannel } from "./helpers";

test("processes a customer message and delivers the reply to the channel", async () => {
  const harness = createHarness("Hello from the bot");
  const { secret_token, id } = await harness.channelService.create(sampleChannel);

  const result = await harness.webhookService.handleNewMessage(secret_token, customerMessage("m1", "hi"));

  assert.deepEqual(result, { status: "processed", response: "Hello from the bot", delivered: true });
  assert.deepEqual(harness.generator.calls, [[{ role: "user", text: "hi", message_id: "m1" }]]);
  assert.deepEqual(harness.notifier.deliveries, [
    {
      callbackUrl: "http://127.0.0.1:9/callback",
      callbackCredential: "test-channel-token",
      chatId: "chat-1",
      text: "Hello from the bot",
    },
  ]);

  const [dialogue] = harness.dialogueRepository.all();
  assert.ok(dialogue);
  assert.equal(dialogue.chat_bot_id, id);
  assert.deepEqual(dialogue.message_list, [
    { role: "user", text: "hi", message_id: "m1" },
    { role: "assistant", text: "Hello from the bot" },
  ]);
  assert.deepEqual(dialogue.processed_message_ids, ["m1"]);
});

test("passes the whole history, ending with the new message, to the generator", async () => {
  const harness = createHarness("ok");
  const { secret_token } = await harness.channelService.create(sampleChannel);

  await harness.webhookService.handleNewMessage(secret_token, customerMessage("m1", "first"));
  await harness.webhookService.handleNewMessage(secret_token, customerMessage("m2", "second"));

  assert.deepEqual(harness.generator.calls[1], [
    { role: "user", text: "first", message_id: "m1" },
    { role: "assistant", text: "ok" },
    { role: "user", text: "second", message_id: "m2" },
  ]);
});

test("answers a repeated message id with already_processed and changes nothing", async () => {
  const harness = createHarness("ok");
  const { secret_token } = await harness.channelService.create(sampleChannel);

  await harness.webhookService.handleNewMessage(secret_token, customerMessage("m1", "hi"));
  const before = harness.dialogueRepository.all();

  const result = await harness.webhookService.handleNewMessage(secret_token, customerMessage("m1", "hi"));

  assert.deepEqual(result, { status: "already_processed" });
  assert.deepEqual(harness.dialogueRepository.all(), before);
  assert.equal(harness.generator.calls.length, 1);
  assert.equal(harness.notifier.deliveries.length, 1);
});

test("records employee messages as processed without adding them to the history", async () => {
  const harness = createHarness("ok");
  const { secret_token } = await harness.channelService.create(sampleChannel);

  const result = await harness.webhookService.handleNewMessage(secret_token, employeeMessage("e1", "on it"));

  assert.deepEqual(result, { status: "employee_message_ignored" });
  assert.equal(harness.generator.calls.length, 0);
  assert.equal(harness.notifier.deliveries.length, 0);

  const [dialogue] = harness.dialogueRepository.all();
  assert.ok(dialogue);
  assert.deepEqual(dialogue.message_list, []);
  assert.deepEqual(dialogue.processed_message_ids, ["e1"]);
});

test("an employee message id resent as a customer message is still a duplicate", async () => {
  const harness = createHarness("ok");
  const { secret_token } = await harness.channelService.create(sampleChannel);

  await harness.webhookService.handleNewMessage(secret_token, employeeMessage("e1", "on it"));
  const result = await harness.webhookService.handleNewMessage(secret_token, customerMessage("e1", "on it"));

  assert.deepEqual(result, { status: "already_processed" });
  assert.equal(harness.generator.calls.length, 0);
});

test("rejects an unknown secret token without touching any dialogue", async () => {
  const harness = createHarness("ok");
  await harness.channelService.create(sampleChannel);

  const result = await harness.webhookService.handleNewMessage("wrong-secret", customerMessage("m1", "hi"));

  assert.deepEqual(result, { status: "unauthorized" });
  assert.deepEqual(harness.dialogueRepository.all(), []);
  assert.equal(harness.generator.calls.length, 0);
  assert.equal(harness.notifier.deliveries.length, 0);
});

test("leaves the dialogue untouched when generation fails, so a retry generates again", async () => {
  const harness = createHarness("recovered");
  const { secret_token } = await harness.channelService.create(sampleChannel);
  await harness.webhookService.handleNewMessage(secret_token, customerMessage("m1", "hi"));
  const before = harness.dialogueRepository.all();

  harness.generator.failWith = new Error("model offline");
  await assert.rejects(
    harness.webhookService.handleNewMessage(secret_token, customerMessage("m2", "still there?")),
    (error: unknown) => error instanceof GenerationError && error.statusCode === 502,
  );

  assert.deepEqual(harness.dialogueRepository.all(), before);
  assert.equal(harness.notifier.deliveries.length, 1);

  harness.generator.failWith = null;
  const retry = await harness.webhookService.handleNewMessage(secret_token, customerMessage("m2", "still there?"));

  assert.deepEqual(retry, { status: "processed", response: "recovered", delivered: true });
});

test("keeps the committed turn when delivery fails", async () => {
  const harness = createHarness("ok");
  const { secret_token } = await harness.channelService.create(sampleChannel);
  harness.notifier.result = false;

  const result = await harness.webhookService.handleNewMessage(secret_token, customerMessage("m1", "hi"));

  assert.deepEqual(result, { status: "processed", response: "ok", delivered: false });
  const [dialogue] = harness.dialogueRepository.all();
  assert.ok(dialogue);
  assert.equal(dialogue.message_list.length, 2);
  assert.deepEqual(dialogue.processed_message_ids, ["m1"]);

  const resend = await harness.webhookService.handleNewMessage(secret_token, customerMessage("m1", "hi"));
  assert.deepEqual(resend, { status: "already_processed" });
});

test("concurrent messages in one chat are all kept", async () => {
  const harness = createHarness("ok");
  const { secret_token } = await harness.channelService.create(sampleChannel);
  harness.generator.delayMs = 10;

  const results = await Promise.all([
    harness.webhookService.handleNewMessage(secret_token, customerMessage("m1", "one")),
    harness.webhookService.handleNewMessage(secret_token, customerMessage("m2", "two")),
    harness.webhookService.handleNewMessage(secret_token, customerMessage("m3", "three")),
  ]);

  assert.deepEqual(results.map((result) => result.status), ["processed", "processed", "processed"]);

  const [dialogue] = harness.dialogueRepository.all();
  assert.ok(dialogue);
  assert.deepEqual(dialogue.processed_message_ids, ["m1", "m2", "m3"]);
  assert.deepEqual(
    dialogue.message_list.map((message) => `${message.role}:${message.text}`),
    ["user:one", "assistant:ok", "user:two", "assistant:ok", "user:three", "assistant:ok"],
  );
});

test("the same message id sent twice at once is processed once", async () => {
  const harness = createHarness("ok");
  const { secret_token } = await harness.channelService.create(sampleChannel);
  harness.generator.delayMs = 10;

  const results = await Promise.all([
    harness.webhookService.handleNewMessage(secret_token, customerMessage("m1", "hi")),
    harness.webhookService.handleNewMessage(secret_token, customerMessage("m1", "hi")),
  ]);

  assert.deepEqual(results.map((result) => result.status), ["processed", "already_processed"]);
  assert.equal(harness.generator.calls.length, 1);
});

test("different chats do not wait for each other", async () => {
  const harness = createHarness("ok");
  const { secret_token } = await harness.channelService.create(sampleChannel);
  harness.generator.delayMs = 50;

  const pending = Promise.all([
    harness.webhookService.handleNewMessage(secret_token, customerMessage("m1", "hi", "chat-a")),
    harness.webhookService.handleNewMessage(secret_token, customerMessage("m1", "hi", "chat-b")),
  ]);

  // Both generations are in flight before either finishes
  await delay(20);
  assert.equal(harness.generator.calls.length, 2);

  await pending;
  assert.equal(harness.dialogueRepository.all().length, 2);
});

test("register a channel, then send the same message twice", async () => {
  const harness = createHarness("New message from llm");
  const registration = await harness.channelService.create({
    name: "Shop",
    channel_url: "http://127.0.0.1:9/shop",
    channel_token: "test-shop-token",
  });

  const first = await harness.webhookService.handleNewMessage(
    registration.secret_token,
    { message_id: "1", chat_id: "42", text: "Where is my order?", message_sender: "customer" },
  );
  const second = await harness.webhookService.handleNewMessage(
    registration.secret_token,
    { message_id: "1", chat_id: "42", text: "Where is my order?", message_sender: "customer" },
  );

  assert.deepEqual(first, { status: "processed", response: "New message from llm", delivered: true });
  assert.deepEqual(second, { status: "already_processed" });
  assert.deepEqual(harness.notifier.deliveries, [
    {
      callbackUrl: "http://127.0.0.1:9/shop",
      callbackCredential: "test-shop-token",
      chatId: "42",
      text: "New message from llm",
    },
  ]);
});
