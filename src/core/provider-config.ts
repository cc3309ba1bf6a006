import { z } from 'zod';
import type { ProviderConfig } from '../types.js';
import { DEFAULT_ENV_PREFIX, DEFAULT_SCOPE } from './config.js';
import { AuthError } from './errors.js';

const urlField = z.union([z.instanceof(URL), z.string().url()]);

const providerConfigSchema = z.object({
  authUrl: urlField,
  tokenUrl: urlField,
  userInfoUrl: urlField,
  clientId: z.string().min(1),
  clientSecret: z.string().optional(),
  redirectUri: z.string().min(1),
  scope: z.string().default(DEFAULT_SCOPE),
});

export type ProviderConfigInput = z.input<typeof providerConfigSchema>;

/**
 * Validate a raw provider configuration.
 *
 * An empty client secret is dropped so the token request never sends one.
 *
 * @throws AuthError of kind `InvalidConfig` naming the offending fields
 */
export function createProviderConfig(input: unknown): ProviderConfig {
  const result = providerConfigSchema.safeParse(input);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new AuthError('InvalidConfig', `Invalid provider configuration: ${fields}`, {
      cause: result.error,
    });
  }

  const { clientSecret, ...config } = result.data;
  return Object.freeze(clientSecret ? { ...config, clientSecret } : config);
}

/**
 * Read a provider configuration from environment variables.
 *
 * Variables (with the default `OAUTH_` prefix): `OAUTH_AUTH_URL`,
 * `OAUTH_TOKEN_URL`, `OAUTH_USERINFO_URL`, `OAUTH_CLIENT_ID`,
 * `OAUTH_CLIENT_SECRET`, `OAUTH_REDIRECT_URI`, `OAUTH_SCOPE`.
 *
 * @example
 * ```typescript
 * import 'dotenv/config';
 *
 * const google = providerConfigFromEnv(process.env, 'GOOGLE_');
 * ```
 */
export function providerConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  prefix: string = DEFAULT_ENV_PREFIX
): ProviderConfig {
  return createProviderConfig({
    authUrl: env[`${prefix}AUTH_URL`],
    tokenUrl: env[`${prefix}TOKEN_URL`],
    userInfoUrl: env[`${prefix}USERINFO_URL`],
    clientId: env[`${prefix}CLIENT_ID`],
    clientSecret: env[`${prefix}CLIENT_SECRET`],
    redirectUri: env[`${prefix}REDIRECT_URI`],
    scope: env[`${prefix}SCOPE`],
  });
}
