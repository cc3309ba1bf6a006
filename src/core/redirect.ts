import type { ProviderConfig, RedirectHandler, RedirectOutcome } from '../types.js';
import { DEFAULT_SCOPE } from './config.js';
import { AuthError, errorMessage } from './errors.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger } from '../utils/logger.js';

/**
 * Options for {@link beginAuthorization}.
 */
export interface BeginAuthorizationOptions {
  /**
   * Give up waiting for the redirect after this many milliseconds.
   * Unset or 0 waits indefinitely.
   */
  timeoutMs?: number;
  /** Logger instance */
  logger?: Logger;
}

/**
 * Build the authorization URL for the code flow.
 *
 * @throws AuthError `InvalidConfig` when the authorization endpoint does not parse
 */
export function buildAuthorizationUrl(config: ProviderConfig): URL {
  let url: URL;
  try {
    url = new URL(config.authUrl);
  } catch (error) {
    throw new AuthError('InvalidConfig', 'Invalid Auth URL', { cause: error });
  }

  url.searchParams.set('client_id', config.clientId);
  url.searchParams.set('redirect_uri', config.redirectUri);
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('scope', config.scope ?? DEFAULT_SCOPE);
  return url;
}

/**
 * Derive the URL scheme the callback will arrive on.
 *
 * Falls back to the text before the first `:` for redirect URIs that do
 * not parse as URLs.
 *
 * @throws AuthError `InvalidConfig` when no scheme can be extracted
 */
export function extractCallbackScheme(redirectUri: string): string {
  let scheme: string | undefined;
  try {
    scheme = new URL(redirectUri).protocol.replace(/:$/, '');
  } catch {
    const separator = redirectUri.indexOf(':');
    scheme = separator > 0 ? redirectUri.slice(0, separator) : undefined;
  }

  if (!scheme) {
    throw new AuthError('InvalidConfig', 'Invalid Redirect URI Scheme');
  }
  return scheme;
}

/**
 * Read the authorization code from a callback URL.
 *
 * @throws AuthError `MissingCode` when the callback has no `code` parameter
 */
export function extractAuthorizationCode(callbackUrl: string): string {
  let code: string | null = null;
  try {
    code = new URL(callbackUrl).searchParams.get('code');
  } catch (error) {
    throw new AuthError('MissingCode', 'No code found', { cause: error });
  }

  if (!code) {
    throw new AuthError('MissingCode', 'No code found');
  }
  return code;
}

/**
 * Run the interactive authorization step and return the authorization code.
 *
 * The handler is invoked once; its single outcome decides the result.
 * Cancellation and handler errors are reported, never retried.
 *
 * @param config - Provider configuration
 * @param handler - Host-specific redirect handler
 * @param options - Timeout and logging options
 * @returns The authorization code from the callback
 */
export async function beginAuthorization(
  config: ProviderConfig,
  handler: RedirectHandler,
  options?: BeginAuthorizationOptions
): Promise<string> {
  const logger = options?.logger ?? noopLogger;
  const authorizationUrl = buildAuthorizationUrl(config);
  const callbackScheme = extractCallbackScheme(config.redirectUri);

  const controller = new AbortController();
  const timeoutMs = options?.timeoutMs ?? 0;
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<RedirectOutcome>((resolve) => {
    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ type: 'cancelled', reason: `Authorization timed out after ${timeoutMs}ms` });
      }, timeoutMs);
    }
  });

  logger.debug('Starting authorization', {
    authorizationEndpoint: `${authorizationUrl.origin}${authorizationUrl.pathname}`,
    callbackScheme,
  });

  const authorize = (async () =>
    handler.authorize({
      authorizationUrl,
      callbackScheme,
      redirectUri: config.redirectUri,
      signal: controller.signal,
    }))().catch((error: unknown): RedirectOutcome => ({
      type: 'error',
      error: error instanceof Error ? error : new Error(errorMessage(error)),
    }));

  let outcome: RedirectOutcome;
  try {
    outcome = await Promise.race([authorize, timeout]);
  } finally {
    clearTimeout(timer);
  }

  switch (outcome.type) {
    case 'callback':
      return extractAuthorizationCode(outcome.callbackUrl);
    case 'cancelled':
      throw new AuthError(
        'AuthorizationCancelled',
        `Login cancelled: ${outcome.reason ?? 'The user cancelled the login'}`
      );
    case 'error':
      throw new AuthError('AuthorizationCancelled', `Login cancelled: ${outcome.error.message}`, {
        cause: outcome.error,
      });
  }
}
