import { Request, Response, NextFunction } from 'express';
import { z, ZodError } from 'zod';
import { ValidationError } from './gateway.errorHandler.middleware';
import { createLogger, getRequestId } from '../util/gateway.logger.utils';

const logger = createLogger('validation');

export const channelSchema = z.object({
  name: z.string({ required_error: 'Name is required' })
    .trim()
    .min(1, 'Name is required')
    .max(200, 'Name is too long'),

  channel_url: z.string({ required_error: 'Channel URL is required' })
    .trim()
    .url('Channel URL must be a valid URL')
    .refine((value) => /^https?:\/\//i.test(value), 'Channel URL must use http or https'),

  channel_token: z.string({ required_error: 'Channel token is required' })
    .min(1, 'Channel token is required')
});

export const webhookMessageSchema = z.object({
  // Ids are opaque channel values; an empty string is still an id
  message_id: z.string({ required_error: 'message_id is required' }),

  chat_id: z.string({ required_error: 'chat_id is required' }),

  text: z.string({ required_error: 'text is required' }),

  message_sender: z.enum(['customer', 'employee'], {
    errorMap: () => ({ message: 'message_sender must be one of: customer, employee' })
  })
});

export type ChannelInput = z.infer<typeof channelSchema>;
export type WebhookMessageInput = z.infer<typeof webhookMessageSchema>;

/**
 * Replaces req.body with the parsed value, or forwards a ValidationError
 */
export const validateRequest = (schema: z.ZodTypeAny) => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      req.body = schema.parse(req.body);
      next();
    } catch (error: unknown) {
      if (error instanceof ZodError) {
        const details = error.issues.map((issue) => ({
          field: issue.path.join('.'),
          message: issue.message
        }));

        logger.warn('Request validation failed', {
          requestId: getRequestId(req),
          path: req.path,
          method: req.method,
          errors: details
        });

        next(new ValidationError('Invalid input data', details));
        return;
      }

      next(error);
    }
  };
};
