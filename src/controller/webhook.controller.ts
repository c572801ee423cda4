import { Response } from 'express';
import { WebhookService } from '../service/webhook.service';
import { WebhookRequest } from '../middleware/webhook.auth.middleware';
import { WebhookMessageInput } from '../middleware/gateway.validation.middleware';
import { UnauthorizedError } from '../middleware/gateway.errorHandler.middleware';
import { getRequestId } from '../util/gateway.logger.utils';

export const createWebhookController = (webhookService: WebhookService) => {

  /**
   * POST /webhook/new_message
   * Idempotent per message_id: retries answer already_processed.
   */
  const handleNewMessage = async (req: WebhookRequest, res: Response): Promise<void> => {
    const message: WebhookMessageInput = req.body;

    const result = await webhookService.handleNewMessage(
      req.secretToken ?? '',
      message,
      getRequestId(req)
    );

    switch (result.status) {
      case 'unauthorized':
        throw new UnauthorizedError('Invalid token');

      case 'processed':
        // Delivery outcome stays internal; it never changes the answer
        res.status(200).json({ status: result.status, response: result.response });
        return;

      default:
        res.status(200).json({ status: result.status });
    }
  };

  return { handleNewMessage };
};
