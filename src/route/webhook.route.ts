import { Router } from 'express';
import { WebhookService } from '../service/webhook.service';
import { createWebhookController } from '../controller/webhook.controller';
import { asyncHandler } from '../middleware/gateway.errorHandler.middleware';
import { bearerTokenMiddleware } from '../middleware/webhook.auth.middleware';
import { validateRequest, webhookMessageSchema } from '../middleware/gateway.validation.middleware';

export const createWebhookRouter = (webhookService: WebhookService): Router => {
  const router: Router = Router();
  const controller = createWebhookController(webhookService);

  router.post(
    '/webhook/new_message',
    bearerTokenMiddleware,
    validateRequest(webhookMessageSchema),
    asyncHandler(controller.handleNewMessage)
  );

  return router;
};

export default createWebhookRouter;
