// API envelope types and schemas
export {
  successEnvelopeSchema,
  paginatedEnvelopeSchema,
  errorEnvelopeSchema,
  apiResponseSchema,
  type SuccessEnvelope,
  type PaginatedEnvelope,
  type ErrorEnvelope,
  type ApiResponse,
} from './envelope.js';

// Standard error codes
export { ErrorCodes, type ErrorCode } from './error-codes.js';
