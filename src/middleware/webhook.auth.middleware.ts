import { Request, Response, NextFunction } from 'express';
import { UnauthorizedError } from './gateway.errorHandler.middleware';

export interface WebhookRequest extends Request {
  secretToken?: string;
}

/**
 * Extracts the channel secret from "Authorization: Bearer <token>".
 * Whether the token belongs to a channel is decided by the webhook service.
 */
export const bearerTokenMiddleware = (
  req: WebhookRequest,
  _res: Response,
  next: NextFunction
): void => {
  const authHeader = req.headers.authorization;

  if (!authHeader) {
    next(new UnauthorizedError('Authorization header is missing'));
    return;
  }

  // Everything after the scheme is the credential, spaces included
  const match = /^Bearer\s+(.+)$/i.exec(authHeader);
  const token = match?.[1]?.trim();

  if (!token) {
    next(new UnauthorizedError('Invalid authorization header format. Expected: Bearer <token>'));
    return;
  }

  req.secretToken = token;
  next();
};

export default bearerTokenMiddleware;
