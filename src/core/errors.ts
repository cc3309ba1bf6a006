import type { AuthErrorKind } from '../types.js';
import { ROLE_MAPPING_FAILED_MESSAGE } from './config.js';

/**
 * Error raised by a stage of the login flow.
 */
export class AuthError extends Error {
  readonly kind: AuthErrorKind;

  constructor(kind: AuthErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthError';
    this.kind = kind;
  }
}

const STAGE_PREFIXES: Record<AuthErrorKind, string | undefined> = {
  InvalidConfig: 'Authorization failed',
  AuthorizationCancelled: 'Authorization failed',
  MissingCode: 'Authorization failed',
  TokenExchangeFailed: 'Token exchange failed',
  IdentityResolutionFailed: 'Identity resolution failed',
  RoleMappingFailed: undefined,
};

/**
 * Human-readable message for an auth error, prefixed with the failing stage.
 *
 * @example
 * ```typescript
 * formatAuthError(new AuthError('TokenExchangeFailed', 'HTTP 401'));
 * // => 'Token exchange failed: HTTP 401'
 * ```
 */
export function formatAuthError(error: AuthError): string {
  const prefix = STAGE_PREFIXES[error.kind];
  return prefix ? `${prefix}: ${error.message}` : error.message;
}

/**
 * Build the error used when the role mapper yields no role.
 */
export function roleMappingFailed(cause?: unknown): AuthError {
  return new AuthError('RoleMappingFailed', ROLE_MAPPING_FAILED_MESSAGE, { cause });
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
