import http from "node:http";
import { ResponseGenerator } from "../config/llm/llm.interface";
import { DialogueMessage } from "../model/dialogue.model";
import { InMemoryChannelRepository, InMemoryDialogueRepository } from "../repository/memory.repository";
import { ChannelService } from "../service/channel.service";
import { ConversationService } from "../service/conversation.service";
import { ChannelNotifier } from "../service/notifier.service";
import { IncomingMessage, WebhookService } from "../service/webhook.service";

export function portOf(server: http.Server): number {
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server is not listening on a TCP port");
  }
  return address.port;
}

export async function delay(ms: number): Promise<void> {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Generator double: answers with a fixed reply (or throws) and records every
 * history it was called with.
 */
export class StubGenerator implements ResponseGenerator {
  readonly name = "stub";
  readonly calls: DialogueMessage[][] = [];
  failWith: Error | null = null;
  delayMs = 0;

  constructor(private readonly reply: string = "stub reply") {}

  async generateReply(history: DialogueMessage[]): Promise<string> {
    this.calls.push(history.map((message) => ({ ...message })));
    if (this.delayMs > 0) {
      await delay(this.delayMs);
    }
    if (this.failWith) {
      throw this.failWith;
    }
    return this.reply;
  }
}

export interface Delivery {
  callbackUrl: string;
  callbackCredential: string;
  chatId: string;
  text: string;
}

export class RecordingNotifier implements ChannelNotifier {
  readonly deliveries: Delivery[] = [];
  result = true;

  async deliver(callbackUrl: string, callbackCredential: string, chatId: string, text: string): Promise<boolean> {
    this.deliveries.push({ callbackUrl, callbackCredential, chatId, text });
    return this.result;
  }
}

export interface Harness {
  channelRepository: InMemoryChannelRepository;
  dialogueRepository: InMemoryDialogueRepository;
  channelService: ChannelService;
  conversationService: ConversationService;
  generator: StubGenerator;
  notifier: RecordingNotifier;
  webhookService: WebhookService;
}

export function createHarness(reply?: string): Harness {
  const channelRepository = new InMemoryChannelRepository();
  const dialogueRepository = new InMemoryDialogueRepository();
  const channelService = new ChannelService(channelRepository);
  const conversationService = new ConversationService(dialogueRepository);
  const generator = new StubGenerator(reply);
  const notifier = new RecordingNotifier();
  const webhookService = new WebhookService(channelService, conversationService, generator, notifier);

  return {
    channelRepository,
    dialogueRepository,
    channelService,
    conversationService,
    generator,
    notifier,
    webhookService,
  };
}

export function customerMessage(messageId: string, text: string, chatId = "chat-1"): IncomingMessage {
  return { message_id: messageId, chat_id: chatId, text, message_sender: "customer" };
}

export function employeeMessage(messageId: string, text: string, chatId = "chat-1"): IncomingMessage {
  return { message_id: messageId, chat_id: chatId, text, message_sender: "employee" };
}

export const sampleChannel = {
  name: "Support desk",
  channel_url: "http://127.0.0.1:9/callback",
  channel_token: "test-channel-token",
};
