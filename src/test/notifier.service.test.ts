import assert from "node:assert/strict";
import http from "node:http";
import { test } from "node:test";
import { NotifierService } from "../service/notifier.service";
import { portOf } from "./helpers";

interface ReceivedCall {
  method: string | undefined;
  url: string | undefined;
  authorization: string | undefined;
  body: unknown;
}

type Respond = (res: http.ServerResponse) => void;


async function withCallbackServer<T>(
  respond: Respond,
  fn: (baseUrl: string, calls: ReceivedCall[]) => Promise<T>,
): Promise<T> {
  const calls: ReceivedCall[] = [];
  const server = http.createServer((req, res) => {
    let raw = "";
    req.setEncoding("utf8");
    req.on("data", (chunk: string) => {
      raw += chunk;
    });
    req.on("end", () => {
      calls.push({
        method: req.method,
        url: req.url,
        authorization: req.headers.authorization,
        body: raw ? JSON.parse(raw) : undefined,
      });
      respond(res);
    });
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const port = portOf(server);

  try {
    return await fn(`http://127.0.0.1:${port}`, calls);
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

test("posts a new_message event with the channel token and reports success", async () => {
  await withCallbackServer(
    (res) => {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ ok: true }));
    },
    async (baseUrl, calls) => {
      const delivered = await new NotifierService(1000).deliver(`${baseUrl}/hook`, "test-channel-token", "chat-7", "hello");

      assert.equal(delivered, true);
      assert.deepEqual(calls, [
        {
          method: "POST",
          url: "/hook",
          authorization: "Bearer test-channel-token",
          body: { event_type: "new_message", chat_id: "chat-7", text: "hello" },
        },
      ]);
    },
  );
});

test("reports a non-2xx callback response as not delivered", async () => {
  await withCallbackServer(
    (res) => {
      res.writeHead(500);
      res.end("broken");
    },
    async (baseUrl) => {
      assert.equal(await new NotifierService(1000).deliver(baseUrl, "test-channel-token", "chat-7", "hello"), false);
    },
  );
});

test("reports a timed-out callback as not delivered", async () => {
  await withCallbackServer(
    (res) => {
      const timer = setTimeout(() => {
        res.writeHead(200);
        res.end();
      }, 500);
      res.on("close", () => clearTimeout(timer));
    },
    async (baseUrl) => {
      assert.equal(await new NotifierService(50).deliver(baseUrl, "test-channel-token", "chat-7", "hello"), false);
    },
  );
});

test("reports an unreachable callback as not delivered", async () => {
  const server = http.createServer();
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const port = portOf(server);
  await new Promise<void>((resolve) => server.close(() => resolve()));

  const delivered = await new NotifierService(1000).deliver(`http://127.0.0.1:${port}/hook`, "test-channel-token", "chat-7", "hello");

  assert.equal(delivered, false);
});
