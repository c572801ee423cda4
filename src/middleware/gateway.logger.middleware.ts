import { Request, Response, NextFunction } from 'express';
import morgan, { StreamOptions } from 'morgan';
import { createLogger, getRequestId } from '../util/gateway.logger.utils';

const accessLogger = createLogger('http');

export const ACCESS_LOG_FORMAT =
  ':remote-addr ":method :url HTTP/:http-version" :status :res[content-length] - :response-time ms [:request-id]';

morgan.token('request-id', (req) => {
  const header = req.headers['x-request-id'];
  return typeof header === 'string' ? header : undefined;
});

const winstonStream: StreamOptions = {
  write: (line: string) => {
    accessLogger.info(line.trim());
  }
};

/**
 * Pins one id on the request and the response so every later log line,
 * the access log included, shares it
 */
export const requestIdMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const requestId = getRequestId(req);
  req.headers['x-request-id'] = requestId;
  res.setHeader('x-request-id', requestId);
  next();
};

/**
 * The one access log line per request, written through winston
 */
export const accessLogMiddleware = (stream: StreamOptions = winstonStream) => {
  return morgan(ACCESS_LOG_FORMAT, { stream });
};
