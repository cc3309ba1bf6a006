/**
 * oidc-role-session
 *
 * OAuth 2.0 / OpenID Connect client sessions with application-defined roles.
 * Runs the authorization code flow, resolves the user's identity from the
 * ID token or the userinfo endpoint, maps it to a role and persists the
 * result so the next start restores it without a network call.
 *
 * ## Package Exports
 *
 * - `oidc-role-session` - AuthSession, role codecs, credential stores, flow steps, utilities
 * - `oidc-role-session/express` - loopback redirect handler, callback app, role guard
 *
 * @example Command-line login
 * ```typescript
 * import {
 *   AuthSession,
 *   createJsonRoleMapper,
 *   createMemoryCredentialStore,
 *   defaultRoleCodec,
 *   providerConfigFromEnv,
 * } from 'oidc-role-session';
 * import { createLoopbackRedirectHandler } from 'oidc-role-session/express';
 *
 * const session = await AuthSession.create({
 *   roles: defaultRoleCodec,
 *   credentialStore: createMemoryCredentialStore(),
 *   redirectHandler: createLoopbackRedirectHandler(),
 * });
 *
 * if (!session.loggedIn) {
 *   await session.login(
 *     providerConfigFromEnv(),
 *     createJsonRoleMapper((claims) => (isStaff(claims) ? 'admin' : 'user'))
 *   );
 * }
 *
 * console.log(session.lastError ?? `Signed in as ${session.currentRole}`);
 * ```
 *
 * @packageDocumentation
 */

// Session
export { AuthSession } from './core/auth-session.js';
export type { AuthSessionOptions } from './core/auth-session.js';

// Roles
export {
  createEnumRoleCodec,
  createJsonRoleMapper,
  defaultRoleCodec,
  DEFAULT_ROLES,
} from './core/roles.js';
export type { DefaultRole } from './core/roles.js';

// Credential storage
export { createCredentialStore, createMemoryCredentialStore } from './core/credential-store.js';

// Provider configuration
export { createProviderConfig, providerConfigFromEnv } from './core/provider-config.js';
export type { ProviderConfigInput } from './core/provider-config.js';

// Flow steps (for custom session implementations)
export {
  beginAuthorization,
  buildAuthorizationUrl,
  extractAuthorizationCode,
  extractCallbackScheme,
} from './core/redirect.js';
export type { BeginAuthorizationOptions } from './core/redirect.js';
export { exchangeCode, buildTokenRequestBody, parseTokenResponse } from './core/token-exchange.js';
export { resolveIdentity, decodeIdTokenPayload, parseIdentityJson } from './core/identity.js';

// Errors
export { AuthError, formatAuthError } from './core/errors.js';

// HTTP transport
export { createFetchTransport } from './http/fetch-transport.js';

// All types - from foundation types.ts
export type {
  // Storage types
  KeyvLike,
  CredentialStore,
  // Provider types
  ProviderConfig,
  TokenResponse,
  // HTTP types
  HttpRequest,
  HttpResponse,
  HttpTransport,
  // Redirect types
  RedirectRequest,
  RedirectOutcome,
  RedirectHandler,
  // Role types
  RoleCodec,
  RoleMapper,
  // Session types
  AuthErrorKind,
  SessionStatus,
  SessionState,
  SessionListener,
} from './types.js';

// Logger utilities
export { createConsoleLogger, logLevelFromEnv, noopLogger, redactMeta } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';

// Configuration constants
export {
  DEFAULT_REDIRECT_TIMEOUT_MS,
  DEFAULT_SCOPE,
  DEFAULT_CALLBACK_PATH,
  DEFAULT_STORE_NAMESPACE,
  DEFAULT_ENV_PREFIX,
  STORAGE_KEYS,
  ROLE_MAPPING_FAILED_MESSAGE,
} from './core/config.js';
