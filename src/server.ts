import { Server } from 'http';
import { env, llmOptions } from './config/gateway.env.config';
import { databaseManager } from './config/gateway.database.config';
import { createResponseGenerator } from './config/llm/llm.factory';
import { createApp } from './app';
import { ChannelRepository, MongoChannelRepository } from './repository/channel.repository';
import { DialogueRepository, MongoDialogueRepository } from './repository/dialogue.repository';
import { InMemoryChannelRepository, InMemoryDialogueRepository } from './repository/memory.repository';
import { ChannelService } from './service/channel.service';
import { ConversationService } from './service/conversation.service';
import { NotifierService } from './service/notifier.service';
import { WebhookService } from './service/webhook.service';
import { createLogger, errorMessage, logShutdown, logStartup } from './util/gateway.logger.utils';

const logger = createLogger('server');

let server: Server | undefined;

interface Repositories {
  channels: ChannelRepository;
  dialogues: DialogueRepository;
}

async function connectStorage(): Promise<Repositories> {
  if (env.STORAGE_DRIVER === 'memory') {
    logger.warn('Using in-memory storage; data is lost on restart');
    return {
      channels: new InMemoryChannelRepository(),
      dialogues: new InMemoryDialogueRepository(),
    };
  }

  await databaseManager.connect();
  return {
    channels: new MongoChannelRepository(),
    dialogues: new MongoDialogueRepository(),
  };
}

async function startServer() {
  try {
    logger.info('Starting Gateway Service...');

    const repositories = await connectStorage();

    const channelService = new ChannelService(repositories.channels);
    const webhookService = new WebhookService(
      channelService,
      new ConversationService(repositories.dialogues),
      createResponseGenerator(llmOptions),
      new NotifierService(env.NOTIFY_TIMEOUT_MS)
    );

    const app = createApp({
      channelService,
      webhookService,
      checkDatabase: env.STORAGE_DRIVER === 'memory'
        ? async () => ({ status: 'healthy' })
        : () => databaseManager.healthCheck(),
      serviceName: env.SERVICE_NAME,
      corsOrigins: env.CORS_ORIGINS,
      accessLog: env.NODE_ENV !== 'test',
    });

    server = app.listen(env.PORT, () => {
      logStartup(env.PORT, env.NODE_ENV);
    });
  } catch (error: unknown) {
    logger.error('Failed to start server', {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined
    });
    process.exit(1);
  }
}

async function gracefulShutdown(signal: string) {
  logShutdown(signal);

  try {
    const running = server;
    if (running) {
      await new Promise<void>((resolve, reject) => {
        running.close((error) => (error ? reject(error) : resolve()));
      });
    }
    await databaseManager.disconnect();

    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error: unknown) {
    logger.error('Error during graceful shutdown', { error: errorMessage(error) });
    process.exit(1);
  }
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

void startServer();
