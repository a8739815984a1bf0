/**
 * Type barrel — re-exports all public types from @petledger/node.
 */

// DTOs
export {
  SpeciesSchema,
  PetIdSchema,
  PetIdParamSchema,
  RecentEventsQuerySchema,
  CommandSchema,
  SignedEnvelopeSchema,
} from "./dto.js";
export type { SignedEnvelopeDto, RecentEventsQuery } from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
