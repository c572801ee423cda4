import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { Request } from 'express';
import { v4 as uuidv4 } from 'uuid';

// Read straight from process.env: the env config imports this module
const NODE_ENV = process.env.NODE_ENV || 'development';
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const LOG_FILE_PATH = process.env.LOG_FILE_PATH || './logs/gateway-service.log';
const SERVICE_NAME = process.env.SERVICE_NAME || 'gateway-service';

const isDevelopment = NODE_ENV === 'development';
const isProduction = NODE_ENV === 'production';
const isTest = NODE_ENV === 'test';

// Custom log format for structured logging
const logFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss.SSS'
  }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
  winston.format.printf((info) => {
    const { timestamp, level, message, service, requestId, context, channelId, chatId, ...meta } = info;

    const logEntry = {
      timestamp,
      level: level.toUpperCase(),
      service: service || SERVICE_NAME,
      message,
      ...(context ? { context } : {}),
      ...(requestId ? { requestId } : {}),
      ...(channelId ? { channelId } : {}),
      ...(chatId ? { chatId } : {}),
      ...(Object.keys(meta).length > 0 && { meta })
    };

    return JSON.stringify(logEntry);
  })
);

// Console format for development
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'HH:mm:ss.SSS'
  }),
  winston.format.colorize(),
  winston.format.errors({ stack: true }),
  winston.format.printf((info) => {
    const { timestamp, level, message, context, requestId, channelId, chatId, service, environment, ...meta } = info;

    let logMessage = `[${timestamp}] ${level}:`;

    if (context) logMessage += ` [${context}]`;
    logMessage += ` ${message}`;
    if (requestId) logMessage += ` [ReqID: ${requestId}]`;
    if (channelId) logMessage += ` [ChannelID: ${channelId}]`;
    if (chatId) logMessage += ` [ChatID: ${chatId}]`;

    if (Object.keys(meta).length > 0) {
      logMessage += `\n${JSON.stringify(meta, null, 2)}`;
    }

    return logMessage;
  })
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: isDevelopment ? consoleFormat : logFormat,
    level: LOG_LEVEL
  })
];

// File transport for persistent logging
if (!isTest && process.env.ENABLE_FILE_LOGGING === 'true') {
  const logDir = path.dirname(LOG_FILE_PATH);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  transports.push(
    // Combined log file
    new winston.transports.File({
      filename: LOG_FILE_PATH,
      format: logFormat,
      level: LOG_LEVEL,
      maxsize: 10485760, // 10MB
      maxFiles: 5,
      tailable: true
    }),

    // Error-only log file
    new winston.transports.File({
      filename: LOG_FILE_PATH.replace('.log', '.error.log'),
      format: logFormat,
      level: 'error',
      maxsize: 10485760, // 10MB
      maxFiles: 3,
      tailable: true
    })
  );
}

export const logger = winston.createLogger({
  level: LOG_LEVEL,
  format: logFormat,
  defaultMeta: {
    service: SERVICE_NAME,
    environment: NODE_ENV
  },
  transports,
  exitOnError: false,
  silent: isTest
});

type LogLevel = 'error' | 'warn' | 'info' | 'debug';

// Custom logging methods with context
export class Logger {
  private readonly context?: string;
  private readonly requestId?: string;

  constructor(context?: string, requestId?: string) {
    this.context = context;
    this.requestId = requestId;
  }

  /**
   * Same context, bound to one request
   */
  child(requestId: string): Logger {
    return new Logger(this.context, requestId);
  }

  private log(level: LogLevel, message: string, meta?: object) {
    const logData = {
      ...meta,
      ...(this.context && { context: this.context }),
      ...(this.requestId && { requestId: this.requestId })
    };

    logger.log(level, message, logData);
  }

  error(message: string, meta?: object): void {
    this.log('error', message, meta);
  }

  warn(message: string, meta?: object): void {
    this.log('warn', message, meta);
  }

  info(message: string, meta?: object): void {
    this.log('info', message, meta);
  }

  debug(message: string, meta?: object): void {
    this.log('debug', message, meta);
  }

  // ========================================
  // WEBHOOK LOGGING
  // ========================================

  webhookReceived(details: {
    channelId: string;
    chatId: string;
    messageId: string;
    sender: string;
  }): void {
    this.log('info', 'Webhook message received', {
      webhook: true,
      action: 'received',
      ...details
    });
  }

  messageDuplicate(details: { channelId: string; chatId: string; messageId: string }): void {
    this.log('info', 'Message already processed, skipping', {
      webhook: true,
      action: 'duplicate',
      ...details
    });
  }

  employeeIgnored(details: { channelId: string; chatId: string; messageId: string }): void {
    this.log('info', 'Employee message recorded and ignored', {
      webhook: true,
      action: 'employee_ignored',
      ...details
    });
  }

  replyGenerated(details: {
    channelId: string;
    chatId: string;
    historyLength: number;
    responseLength: number;
    duration: number;
  }): void {
    this.log('info', 'Reply generated', {
      webhook: true,
      action: 'reply_generated',
      ...details
    });
  }

  // ========================================
  // DELIVERY LOGGING
  // ========================================

  deliveryCompleted(details: { chatId: string; statusCode: number; duration: number }): void {
    this.log('info', 'Reply delivered to channel', {
      delivery: true,
      action: 'delivered',
      ...details
    });
  }

  deliveryFailed(details: {
    chatId: string;
    reason: string;
    statusCode?: number;
    duration: number;
  }): void {
    this.log('warn', 'Reply delivery failed', {
      delivery: true,
      action: 'failed',
      ...details
    });
  }

  // ========================================
  // CHANNEL LOGGING
  // ========================================

  channelCreated(details: { channelId: string; name: string }): void {
    this.log('info', `Channel registered: ${details.name}`, {
      channel: true,
      action: 'created',
      ...details
    });
  }

  // ========================================
  // DATABASE LOGGING
  // ========================================

  dbConnection(status: 'connected' | 'disconnected' | 'error', details?: object): void {
    const level = status === 'connected' ? 'info' : status === 'disconnected' ? 'warn' : 'error';

    this.log(level, `MongoDB ${status}`, {
      database: true,
      status,
      ...details
    });
  }
}

export const createLogger = (context?: string, requestId?: string): Logger => {
  return new Logger(context, requestId);
};

export const getRequestId = (req: Request): string => {
  const header = req.headers['x-request-id'];
  if (typeof header === 'string' && header.length > 0) {
    return header;
  }
  return `req_${uuidv4()}`;
};

export const errorMessage = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};

export const logStartup = (port: number, environment: string) => {
  logger.info('Gateway service starting up', {
    startup: true,
    port,
    environment,
    nodeVersion: process.version,
    pid: process.pid
  });
};

export const logShutdown = (reason: string) => {
  logger.info('Gateway service shutting down', {
    shutdown: true,
    reason,
    uptime: process.uptime()
  });
};

if (isProduction) {
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined
    });
  });
}
