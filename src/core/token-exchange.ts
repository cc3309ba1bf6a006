import { z } from 'zod';
import type { HttpResponse, HttpTransport, ProviderConfig, TokenResponse } from '../types.js';
import { AuthError, errorMessage } from './errors.js';

/**
 * Token endpoint response body. Only `access_token` is required; the other
 * fields may be null, and an unreadable optional field is dropped.
 * Unknown fields are ignored.
 */
const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  id_token: z.string().nullish().catch(undefined),
  refresh_token: z.string().nullish().catch(undefined),
  // Some providers send the lifetime as a numeric string
  expires_in: z
    .union([z.number(), z.string().regex(/^\d+$/).transform(Number)])
    .nullish()
    .catch(undefined),
  token_type: z.string().nullish().catch(undefined),
});

/**
 * Build the form body of an authorization code grant.
 * The client secret is only sent when one is configured.
 */
export function buildTokenRequestBody(config: ProviderConfig, code: string): URLSearchParams {
  const body = new URLSearchParams({
    client_id: config.clientId,
    code,
    grant_type: 'authorization_code',
    redirect_uri: config.redirectUri,
  });

  if (config.clientSecret) {
    body.set('client_secret', config.clientSecret);
  }
  return body;
}

/**
 * Parse a token endpoint response body.
 *
 * @throws AuthError `TokenExchangeFailed` when the body is not JSON or has no usable access token
 */
export function parseTokenResponse(body: Uint8Array): TokenResponse {
  let json: unknown;
  try {
    json = JSON.parse(new TextDecoder().decode(body));
  } catch (error) {
    throw new AuthError('TokenExchangeFailed', 'Invalid token response: body is not JSON', {
      cause: error,
    });
  }

  const result = tokenResponseSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join(', ');
    throw new AuthError('TokenExchangeFailed', `Invalid token response: ${issues}`, {
      cause: result.error,
    });
  }

  return {
    accessToken: result.data.access_token,
    idToken: result.data.id_token ?? undefined,
    refreshToken: result.data.refresh_token ?? undefined,
    expiresIn: result.data.expires_in ?? undefined,
    tokenType: result.data.token_type ?? undefined,
  };
}

/**
 * Exchange an authorization code for tokens.
 *
 * Issues exactly one POST; any status other than 200 fails without retry.
 *
 * @param config - Provider configuration
 * @param code - Authorization code from the redirect
 * @param transport - HTTP transport
 * @returns Parsed token response
 */
export async function exchangeCode(
  config: ProviderConfig,
  code: string,
  transport: HttpTransport
): Promise<TokenResponse> {
  let url: URL;
  try {
    url = new URL(config.tokenUrl);
  } catch (error) {
    throw new AuthError('TokenExchangeFailed', 'Invalid token URL', { cause: error });
  }

  let response: HttpResponse;
  try {
    response = await transport.send({
      method: 'POST',
      url,
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: buildTokenRequestBody(config, code).toString(),
    });
  } catch (error) {
    throw new AuthError('TokenExchangeFailed', errorMessage(error), { cause: error });
  }

  if (response.status !== 200) {
    throw new AuthError('TokenExchangeFailed', `HTTP ${response.status}`);
  }

  return parseTokenResponse(response.body);
}
