/**
 * Express integration for oidc-role-session.
 *
 * - `createLoopbackRedirectHandler` - redirect handler for CLI/desktop Node programs
 * - `createCallbackApp` - the Express app behind it, for mounting elsewhere
 * - `requireRole` - route guard on the session's current role
 *
 * @packageDocumentation
 */

export { createCallbackApp, createLoopbackRedirectHandler } from './callback-server.js';
export type { CallbackAppOptions, LoopbackRedirectHandlerOptions } from './callback-server.js';
export { requireRole } from './middleware.js';
export type { RequireRoleOptions, RoleSource } from './middleware.js';
