/**
 * Default settings and fixed storage keys.
 */

/** Redirect wait timeout: 5 minutes (in milliseconds) */
export const DEFAULT_REDIRECT_TIMEOUT_MS = 5 * 60 * 1000;

/** Default OAuth scope string (the provider's defaults apply) */
export const DEFAULT_SCOPE = '';

/** Callback path of `createCallbackApp` when no `callbackPath` is given */
export const DEFAULT_CALLBACK_PATH = '/oauth/callback';

/** Keyv namespace used by the in-memory credential store */
export const DEFAULT_STORE_NAMESPACE = 'oidc-role-session';

/** Prefix for provider configuration environment variables */
export const DEFAULT_ENV_PREFIX = 'OAUTH_';

/**
 * Keys of the persisted session record.
 */
export const STORAGE_KEYS = {
  /** Access token of the logged-in user */
  TOKEN: 'auth_token',
  /** Serialized role of the logged-in user */
  ROLE: 'user_role',
} as const;

/**
 * Message recorded when the role mapper cannot map the identity.
 */
export const ROLE_MAPPING_FAILED_MESSAGE = 'Could not map user data to a role';
