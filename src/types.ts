/**
 * Foundation types for oidc-role-session.
 *
 * This file contains all shared interfaces with ZERO internal imports.
 * All modules (core, http, express) import from here.
 *
 * @packageDocumentation
 */

// ============================================================================
// Storage Types
// ============================================================================

/**
 * A Keyv-compatible store interface.
 *
 * This interface matches the essential shape of a Keyv instance without
 * requiring the exact Keyv type, so any Keyv version or storage adapter
 * can back the credential store.
 *
 * @example
 * ```typescript
 * import { Keyv } from 'keyv';
 * import KeyvRedis from '@keyv/redis';
 *
 * const store = new Keyv({ store: new KeyvRedis('redis://localhost:6379'), namespace: 'my-app' });
 * ```
 */
export interface KeyvLike {
  /** Resolves with undefined for a missing key */
  get(key: string): Promise<unknown>;
  set(key: string, value: string, ttl?: number): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  /** Clear all keys in this namespace. */
  clear(): Promise<void>;
}

/**
 * Durable store for the persisted session record (access token and serialized role).
 * Values are opaque strings.
 */
export interface CredentialStore {
  put(key: string, value: string): Promise<void>;
  get(key: string): Promise<string | undefined>;
  /** Remove every credential this store holds. */
  deleteAll(): Promise<void>;
}

// ============================================================================
// Provider Types
// ============================================================================

/**
 * OAuth 2.0 / OIDC provider endpoints and client registration.
 * Supplied once per login attempt and never mutated.
 */
export interface ProviderConfig {
  /** Authorization endpoint the user is sent to */
  readonly authUrl: URL | string;
  /** Token endpoint for the authorization code exchange */
  readonly tokenUrl: URL | string;
  /** Userinfo endpoint, used when the token response carries no ID token */
  readonly userInfoUrl: URL | string;
  /** OAuth client ID */
  readonly clientId: string;
  /** OAuth client secret, omitted for public clients */
  readonly clientSecret?: string;
  /** Redirect URI registered with the provider */
  readonly redirectUri: string;
  /** Space-delimited scopes (e.g. 'openid email profile') */
  readonly scope?: string;
}

/**
 * Tokens parsed from a token endpoint response.
 */
export interface TokenResponse {
  /** Access token for API calls */
  accessToken: string;
  /** ID token containing user claims */
  idToken?: string;
  /** Refresh token (not used by the session) */
  refreshToken?: string;
  /** Token lifetime in seconds */
  expiresIn?: number;
  /** Token type (usually "Bearer") */
  tokenType?: string;
}

// ============================================================================
// HTTP Transport Types
// ============================================================================

/**
 * Outgoing HTTP request issued by the token exchanger and identity decoder.
 */
export interface HttpRequest {
  method: 'GET' | 'POST';
  url: URL;
  headers: Record<string, string>;
  body?: string;
}

/**
 * Raw HTTP response. The body is kept as bytes so identity payloads
 * reach the role mapper verbatim.
 */
export interface HttpResponse {
  status: number;
  body: Uint8Array;
}

/**
 * Minimal HTTP client. No retries; redirects follow the transport's defaults.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

// ============================================================================
// Redirect Types
// ============================================================================

/**
 * Parameters for one interactive authorization step.
 */
export interface RedirectRequest {
  /** Fully built authorization URL to present to the user */
  authorizationUrl: URL;
  /** URL scheme the callback will arrive on (e.g. 'http', 'myapp') */
  callbackScheme: string;
  /** The configured redirect URI */
  redirectUri: string;
  /** Aborted when the session gives up waiting (timeout) */
  signal: AbortSignal;
}

/**
 * The single terminal result of an interactive authorization step.
 */
export type RedirectOutcome =
  | { type: 'callback'; callbackUrl: string }
  | { type: 'cancelled'; reason?: string }
  | { type: 'error'; error: Error };

/**
 * Host-specific capability that shows the authorization URL to the user
 * and captures the redirect back to the application.
 *
 * Implementations must settle exactly once per call.
 */
export interface RedirectHandler {
  authorize(request: RedirectRequest): Promise<RedirectOutcome>;
}

// ============================================================================
// Role Types
// ============================================================================

/**
 * Capabilities the session needs from an application-defined role type.
 */
export interface RoleCodec<Role> {
  /** Role of an unauthenticated user, and the fallback when a stored role cannot be read */
  readonly guest: Role;
  equals(a: Role, b: Role): boolean;
  serialize(role: Role): string;
  /** Returns undefined when the value is not a valid serialized role */
  deserialize(value: string): Role | undefined;
}

/**
 * Translates raw identity bytes (ID token payload or userinfo body) into a role.
 * Returning null or undefined marks the identity as unmappable.
 */
export type RoleMapper<Role> = (identity: Uint8Array) => Role | null | undefined;

// ============================================================================
// Session State Types
// ============================================================================

/**
 * Kinds of failure a login attempt can end with.
 */
export type AuthErrorKind =
  | 'InvalidConfig'
  | 'AuthorizationCancelled'
  | 'MissingCode'
  | 'TokenExchangeFailed'
  | 'IdentityResolutionFailed'
  | 'RoleMappingFailed';

/**
 * Where the session is in the login flow.
 */
export type SessionStatus =
  | 'idle'
  | 'awaiting-redirect'
  | 'exchanging-code'
  | 'resolving-identity'
  | 'authenticated'
  | 'failed';

/**
 * Observable snapshot of an auth session. The access token is never part of it.
 */
export interface SessionState<Role> {
  readonly status: SessionStatus;
  readonly loggedIn: boolean;
  readonly loading: boolean;
  readonly lastError: string | null;
  readonly lastErrorKind: AuthErrorKind | null;
  readonly currentRole: Role;
}

/**
 * Called with a fresh snapshot after every state change.
 */
export type SessionListener<Role> = (state: SessionState<Role>) => void;
