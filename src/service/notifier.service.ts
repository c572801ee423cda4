import axios, { AxiosInstance } from 'axios';
import { createLogger } from '../util/gateway.logger.utils';

const logger = createLogger('notifier-service');

export const DEFAULT_NOTIFY_TIMEOUT_MS = 10000;

export interface NewMessageEvent {
  event_type: 'new_message';
  chat_id: string;
  text: string;
}

export interface ChannelNotifier {
  deliver(callbackUrl: string, callbackCredential: string, chatId: string, text: string): Promise<boolean>;
}

/**
 * ========================================
 * NOTIFIER SERVICE
 * ========================================
 *
 * Delivers generated replies to a channel's callback URL.
 * Best-effort: every failure is reported as false, never thrown.
 */
export class NotifierService implements ChannelNotifier {
  private readonly http: AxiosInstance;

  constructor(
    private readonly timeoutMs: number = DEFAULT_NOTIFY_TIMEOUT_MS,
    http?: AxiosInstance
  ) {
    this.http = http ?? axios.create();
  }

  async deliver(
    callbackUrl: string,
    callbackCredential: string,
    chatId: string,
    text: string
  ): Promise<boolean> {
    const startTime = Date.now();
    const payload: NewMessageEvent = {
      event_type: 'new_message',
      chat_id: chatId,
      text
    };

    try {
      const response = await this.http.post(callbackUrl, payload, {
        headers: {
          'Authorization': `Bearer ${callbackCredential}`,
          'Content-Type': 'application/json'
        },
        timeout: this.timeoutMs,
        // Status is judged below instead of through a rejection
        validateStatus: () => true
      });

      const duration = Date.now() - startTime;

      if (response.status >= 200 && response.status < 300) {
        logger.deliveryCompleted({ chatId, statusCode: response.status, duration });
        return true;
      }

      logger.deliveryFailed({
        chatId,
        reason: `Callback responded with status ${response.status}`,
        statusCode: response.status,
        duration
      });
      return false;

    } catch (error: unknown) {
      logger.deliveryFailed({
        chatId,
        reason: axios.isAxiosError(error)
          ? `${error.code ?? 'REQUEST_FAILED'}: ${error.message}`
          : error instanceof Error ? error.message : String(error),
        duration: Date.now() - startTime
      });
      return false;
    }
  }
}
