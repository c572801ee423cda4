import express, { Express } from 'express';
import cors from 'cors';
import { securityHeadersManager } from './config/gateway.helmet.config';
import { ChannelService } from './service/channel.service';
import { WebhookService } from './service/webhook.service';
import { createChannelRouter } from './route/channel.route';
import { createWebhookRouter } from './route/webhook.route';
import { createHealthRouter } from './route/health.route';
import { DatabaseHealthCheck } from './controller/health.controller';
import { accessLogMiddleware, requestIdMiddleware } from './middleware/gateway.logger.middleware';
import { errorHandlerMiddleware, notFoundHandler } from './middleware/gateway.errorHandler.middleware';

export interface AppDependencies {
  channelService: ChannelService;
  webhookService: WebhookService;
  checkDatabase: DatabaseHealthCheck;
  serviceName?: string;
  corsOrigins?: string;
  accessLog?: boolean;
}

export const createApp = (deps: AppDependencies): Express => {
  const app: Express = express();

  app.use(securityHeadersManager.getSecurityConfig());
  app.use(cors({
    origin: !deps.corsOrigins || deps.corsOrigins === '*'
      ? '*'
      : deps.corsOrigins.split(',').map((origin) => origin.trim()),
    methods: ['GET', 'POST', 'PUT', 'DELETE'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
  }));
  app.use(requestIdMiddleware);
  if (deps.accessLog) {
    app.use(accessLogMiddleware());
  }
  app.use(express.json({ limit: '1mb' }));

  // Routes

  app.use('/api', createHealthRouter(deps.serviceName ?? 'gateway-service', deps.checkDatabase));
  app.use('/api', createChannelRouter(deps.channelService));
  app.use('/api', createWebhookRouter(deps.webhookService));

  app.use(notFoundHandler);
  app.use(errorHandlerMiddleware);

  return app;
};

export default createApp;
