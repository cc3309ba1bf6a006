import { base64url } from 'jose';
import type { HttpResponse, HttpTransport, ProviderConfig, TokenResponse } from '../types.js';
import { AuthError, errorMessage } from './errors.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger } from '../utils/logger.js';

const BASE64URL_SEGMENT = /^[A-Za-z0-9_-]+$/;

/**
 * Decode the payload segment of an ID token into raw bytes.
 * Note: The signature is not verified; the token came straight from the token endpoint.
 *
 * @returns The payload bytes, or undefined when the token is not a three-part JWT
 */
export function decodeIdTokenPayload(idToken: string): Uint8Array | undefined {
  const segments = idToken.split('.');
  if (segments.length !== 3) {
    return undefined;
  }

  const payload = segments[1];
  if (!payload || !BASE64URL_SEGMENT.test(payload)) {
    return undefined;
  }

  let bytes: Uint8Array;
  try {
    bytes = base64url.decode(payload);
  } catch {
    return undefined;
  }
  return bytes.length > 0 ? bytes : undefined;
}

/**
 * Parse identity bytes as UTF-8 JSON.
 *
 * @returns The parsed value, or undefined when the bytes are not valid JSON
 */
export function parseIdentityJson(identity: Uint8Array): unknown {
  try {
    return JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(identity));
  } catch {
    return undefined;
  }
}

/**
 * Resolve the identity payload for a set of tokens.
 *
 * An embedded ID token takes precedence and needs no network call. Without
 * one (or when it cannot be decoded) the userinfo endpoint is queried once
 * with the access token.
 *
 * @param config - Provider configuration
 * @param tokens - Tokens from the code exchange
 * @param transport - HTTP transport
 * @param logger - Logger instance
 * @returns Raw identity bytes, passed verbatim to the role mapper
 */
export async function resolveIdentity(
  config: ProviderConfig,
  tokens: TokenResponse,
  transport: HttpTransport,
  logger: Logger = noopLogger
): Promise<Uint8Array> {
  if (tokens.idToken) {
    const claims = decodeIdTokenPayload(tokens.idToken);
    if (claims) {
      logger.debug('Using claims embedded in the ID token');
      return claims;
    }
    logger.warn('ID token could not be decoded, falling back to the userinfo endpoint');
  }

  let url: URL;
  try {
    url = new URL(config.userInfoUrl);
  } catch (error) {
    throw new AuthError('IdentityResolutionFailed', 'Invalid userinfo URL', { cause: error });
  }

  let response: HttpResponse;
  try {
    response = await transport.send({
      method: 'GET',
      url,
      headers: {
        Accept: 'application/json',
        Authorization: `Bearer ${tokens.accessToken}`,
      },
    });
  } catch (error) {
    throw new AuthError('IdentityResolutionFailed', errorMessage(error), { cause: error });
  }

  if (response.status !== 200) {
    throw new AuthError('IdentityResolutionFailed', `HTTP ${response.status}`);
  }

  return response.body;
}
