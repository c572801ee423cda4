import { randomBytes } from 'crypto';
import { createLogger } from './gateway.logger.utils';

const logger = createLogger('crypto-utils');

export const SECRET_TOKEN_BYTES = 32;

/**
 * Centralized cryptographic utilities for the gateway
 * Only basic crypto operations -- no business logic
 */
export class CryptoUtils {

  /**
   * Secret token for a new channel: 32 random bytes, base64url (43 chars)
   */
  static generateSecretToken(byteLength: number = SECRET_TOKEN_BYTES): string {
    try {
      return randomBytes(byteLength).toString('base64url');
    } catch (error: unknown) {
      logger.error('Error generating secret token', {
        error: error instanceof Error ? error.message : String(error)
      });
      throw new Error('TOKEN_GENERATION_FAILED');
    }
  }
}
