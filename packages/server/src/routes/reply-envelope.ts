/**
 * API Response Envelope Helpers
 *
 * REST responses follow one of two shapes:
 * - Success: { success: true, data: T, metadata? }
 * - Error: { success: false, message, code, details? }
 *
 * @see packages/contracts/src/envelope.ts for the schemas
 */

import type { SuccessEnvelope, ErrorEnvelope } from '@pierre/contracts';
import { ErrorCodes } from '@pierre/contracts';

export { ErrorCodes };

/**
 * Wrap data in a success envelope
 *
 * @example
 * return reply.send(wrapSuccess({ user_id: 'u-1' }));
 */
export function wrapSuccess<T>(data: T, metadata?: Record<string, unknown>): SuccessEnvelope<T> {
  return { success: true, data, ...(metadata && { metadata }) };
}

/**
 * Wrap an error in an error envelope
 *
 * @example
 * return reply.status(404).send(wrapError(ErrorCodes.NOT_FOUND, 'User not found'));
 */
export function wrapError(code: string, message: string, details?: unknown[]): ErrorEnvelope {
  return {
    success: false,
    message,
    code,
    ...(details && { details }),
  };
}
