/**
 * API Layer Exports
 *
 * API layer is thin - delegates to services for all business logic.
 */

export { createApp, REQUEST_ID_HEADER } from './app.js';
export type { ApiServices, ErrorStatus } from './types.js';
export { ERROR_STATUS_MAP, getErrorStatus } from './types.js';
