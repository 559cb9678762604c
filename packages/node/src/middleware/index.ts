/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export {
  identityMiddleware,
  signingMessage,
  SeenSignatures,
  IDENTITY_HEADER,
  SIGNATURE_HEADER,
  TIMESTAMP_HEADER,
  DEFAULT_SIGNATURE_MAX_AGE_MS,
} from "./identity.js";
export type { IdentityOptions } from "./identity.js";
