import dotenv from 'dotenv';
import path from 'path';
import { cleanEnv, str, num, bool } from 'envalid';
import { createLogger } from '../util/gateway.logger.utils';
import { LLMOptions } from './llm/llm.interface';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

const logger = createLogger('env-config');

/**
 * ========================================
 * GATEWAY SERVICE ENVIRONMENT CONFIGURATION
 * ========================================
 *
 * Validates and exports all environment variables.
 * Fails fast if critical variables are missing or inconsistent.
 */
export const env = cleanEnv(process.env, {
  // Service
  NODE_ENV: str({ choices: ['development', 'production', 'test'], default: 'development' }),
  PORT: num({ default: 4000 }),
  SERVICE_NAME: str({ default: 'gateway-service' }),

  // Storage
  STORAGE_DRIVER: str({ choices: ['mongo', 'memory'], default: 'mongo' }),
  MONGODB_URI: str({ default: 'mongodb://localhost:27017' }),
  MONGODB_DB_NAME: str({ default: 'chatbot' }),
  MONGODB_POOL_SIZE: num({ default: 10 }),
  MONGODB_CONNECTION_TIMEOUT: num({ default: 30000 }),

  // Response generation
  LLM_PROVIDER: str({ choices: ['mock', 'groq'], default: 'mock' }),
  GROQ_API_KEY: str({ default: '' }),
  GROQ_MODEL: str({ default: 'llama-3.3-70b-versatile' }),
  GROQ_TEMPERATURE: num({ default: 0.7 }),
  GROQ_MAX_TOKENS: num({ default: 500 }),
  MOCK_LLM_MIN_DELAY_MS: num({ default: 1000 }),
  MOCK_LLM_MAX_DELAY_MS: num({ default: 5000 }),

  // Channel callbacks
  NOTIFY_TIMEOUT_MS: num({ default: 10000 }),

  // CORS
  CORS_ORIGINS: str({ default: '*' }),

  // Logging
  LOG_LEVEL: str({ choices: ['error', 'warn', 'info', 'debug'], default: 'info' }),
  LOG_FILE_PATH: str({ default: './logs/gateway-service.log' }),
  ENABLE_FILE_LOGGING: bool({ default: false }),
});

// --- Custom Validations ---
(() => {
  if (
    env.STORAGE_DRIVER === 'mongo' &&
    !env.MONGODB_URI.startsWith('mongodb://') &&
    !env.MONGODB_URI.startsWith('mongodb+srv://')
  ) {
    logger.error('❌ MONGODB_URI must start with "mongodb://" or "mongodb+srv://"');
    process.exit(1);
  }

  if (env.LLM_PROVIDER === 'groq' && !env.GROQ_API_KEY) {
    logger.error('❌ GROQ_API_KEY is required when LLM_PROVIDER=groq');
    process.exit(1);
  }

  if (env.GROQ_TEMPERATURE < 0 || env.GROQ_TEMPERATURE > 2) {
    logger.error('❌ GROQ_TEMPERATURE must be a number between 0 and 2');
    process.exit(1);
  }

  if (env.MOCK_LLM_MIN_DELAY_MS < 0 || env.MOCK_LLM_MIN_DELAY_MS > env.MOCK_LLM_MAX_DELAY_MS) {
    logger.error('❌ MOCK_LLM_MIN_DELAY_MS must be between 0 and MOCK_LLM_MAX_DELAY_MS');
    process.exit(1);
  }

  if (env.NOTIFY_TIMEOUT_MS < 1) {
    logger.error('❌ NOTIFY_TIMEOUT_MS must be a positive number');
    process.exit(1);
  }

  logger.info('✅ Gateway environment configuration validated successfully');
})();

// --- Derived Configurations ---

export const mongoOptions = {
  dbName: env.MONGODB_DB_NAME,
  maxPoolSize: env.MONGODB_POOL_SIZE,
  serverSelectionTimeoutMS: env.MONGODB_CONNECTION_TIMEOUT,
  socketTimeoutMS: 45000,
  family: 4,
};

export const llmOptions: LLMOptions = {
  provider: env.LLM_PROVIDER === 'groq' ? 'groq' : 'mock',
  groq: {
    apiKey: env.GROQ_API_KEY,
    model: env.GROQ_MODEL,
    temperature: env.GROQ_TEMPERATURE,
    maxTokens: env.GROQ_MAX_TOKENS,
  },
  mock: {
    minDelayMs: env.MOCK_LLM_MIN_DELAY_MS,
    maxDelayMs: env.MOCK_LLM_MAX_DELAY_MS,
  },
};

export default env;
