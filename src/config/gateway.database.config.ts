import mongoose from 'mongoose';
import { createLogger, errorMessage } from '../util/gateway.logger.utils';
import { env, mongoOptions } from './gateway.env.config';

const logger = createLogger('database');

const MAX_CONNECT_ATTEMPTS = 5;
const BASE_RETRY_DELAY_MS = 1000;

export interface DatabaseHealth {
  status: 'healthy' | 'unhealthy' | 'disconnected';
  latency?: number;
}

/**
 * Owns the process-wide mongoose connection used by the Mongo repositories
 */
class DatabaseManager {
  private static instance: DatabaseManager;
  private connected = false;

  private constructor() {
    this.watchConnection();
  }

  public static getInstance(): DatabaseManager {
    if (!DatabaseManager.instance) {
      DatabaseManager.instance = new DatabaseManager();
    }
    return DatabaseManager.instance;
  }

  private watchConnection(): void {
    const { connection } = mongoose;

    connection.on('connected', () => {
      this.connected = true;
      logger.dbConnection('connected', { dbName: mongoOptions.dbName });
    });

    connection.on('reconnected', () => {
      this.connected = true;
      logger.dbConnection('connected', { dbName: mongoOptions.dbName, reconnected: true });
    });

    connection.on('disconnected', () => {
      this.connected = false;
      logger.dbConnection('disconnected');
    });

    connection.on('error', (error: Error) => {
      this.connected = false;
      logger.dbConnection('error', { error: error.message });
    });
  }

  /**
   * Connects and builds the unique indexes the channel and dialogue
   * collections rely on. Retries with exponential backoff before giving up.
   */
  public async connect(): Promise<void> {
    if (this.connected) {
      return;
    }

    for (let attempt = 1; ; attempt++) {
      try {
        await mongoose.connect(env.MONGODB_URI, {
          ...mongoOptions,
          retryWrites: true,
          retryReads: true,
        });
        await mongoose.connection.syncIndexes();
        this.connected = true;
        return;
      } catch (error: unknown) {
        logger.error('MongoDB connection attempt failed', {
          attempt,
          error: errorMessage(error)
        });

        if (attempt >= MAX_CONNECT_ATTEMPTS) {
          throw new Error(`Could not connect to MongoDB after ${attempt} attempts`);
        }

        const delay = BASE_RETRY_DELAY_MS * 2 ** (attempt - 1);
        logger.warn(`Retrying MongoDB connection in ${delay}ms`, { attempt });
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  public async disconnect(): Promise<void> {
    if (!this.connected) {
      return;
    }

    await mongoose.disconnect();
    this.connected = false;
  }

  public async healthCheck(): Promise<DatabaseHealth> {
    const db = mongoose.connection.db;
    if (!this.connected || !db) {
      return { status: 'disconnected' };
    }

    const start = Date.now();
    try {
      await db.admin().ping();
      return { status: 'healthy', latency: Date.now() - start };
    } catch (error: unknown) {
      logger.error('MongoDB ping failed', { error: errorMessage(error) });
      return { status: 'unhealthy' };
    }
  }
}

export const databaseManager = DatabaseManager.getInstance();
