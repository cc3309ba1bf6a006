import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  beginAuthorization,
  buildAuthorizationUrl,
  extractAuthorizationCode,
  extractCallbackScheme,
} from './redirect.js';
import { AuthError } from './errors.js';
import type { ProviderConfig, RedirectHandler } from '../types.js';
import {
  createDeferredRedirectHandler,
  createScriptedRedirectHandler,
} from '../test/helpers/mock-redirect.js';
import {
  TEST_AUTH_CODE,
  TEST_AUTH_URL,
  TEST_CLIENT_ID,
  TEST_REDIRECT_URI,
  TEST_SCOPE,
  TEST_TOKEN_URL,
  TEST_USERINFO_URL,
} from '../test/constants.js';

const config: ProviderConfig = {
  authUrl: TEST_AUTH_URL,
  tokenUrl: TEST_TOKEN_URL,
  userInfoUrl: TEST_USERINFO_URL,
  clientId: TEST_CLIENT_ID,
  redirectUri: TEST_REDIRECT_URI,
  scope: TEST_SCOPE,
};

async function captureError(promise: Promise<unknown>): Promise<AuthError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AuthError) return error;
    throw error;
  }
  throw new Error('Expected the promise to reject');
}

function captureSyncError(fn: () => unknown): AuthError {
  try {
    fn();
  } catch (error) {
    if (error instanceof AuthError) return error;
    throw error;
  }
  throw new Error('Expected the call to throw');
}

describe('redirect', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('buildAuthorizationUrl', () => {
    it('should append the code flow parameters', () => {
      const url = buildAuthorizationUrl(config);

      expect(url.toString()).toBe(
        'https://idp.test/authorize?client_id=client-123&redirect_uri=myapp%3A%2F%2Foauth%2Fcallback&response_type=code&scope=openid+email+profile'
      );
    });

    it('should keep query parameters already on the endpoint', () => {
      const url = buildAuthorizationUrl({ ...config, authUrl: 'https://idp.test/authorize?prompt=consent' });

      expect(url.searchParams.get('prompt')).toBe('consent');
      expect(url.searchParams.get('response_type')).toBe('code');
    });

    it('should send an empty scope when none is configured', () => {
      const { scope: _scope, ...withoutScope } = config;
      const url = buildAuthorizationUrl(withoutScope);

      expect(url.searchParams.get('scope')).toBe('');
    });

    it('should fail with InvalidConfig for an unparseable endpoint', () => {
      const error = captureSyncError(() =>
        buildAuthorizationUrl({ ...config, authUrl: 'not a url' })
      );

      expect(error).toMatchObject({ kind: 'InvalidConfig', message: 'Invalid Auth URL' });
    });
  });

  describe('extractCallbackScheme', () => {
    it('should return the scheme of a custom redirect URI', () => {
      expect(extractCallbackScheme('myapp://oauth/callback')).toBe('myapp');
    });

    it('should return http for loopback redirect URIs', () => {
      expect(extractCallbackScheme('http://localhost:3456/oauth/callback')).toBe('http');
    });

    it('should fall back to the text before the first colon', () => {
      expect(extractCallbackScheme('my app:callback')).toBe('my app');
    });

    it('should fail with InvalidConfig when there is no scheme', () => {
      expect(captureSyncError(() => extractCallbackScheme('callback'))).toMatchObject({
        kind: 'InvalidConfig',
        message: 'Invalid Redirect URI Scheme',
      });
      expect(() => extractCallbackScheme(':callback')).toThrow(AuthError);
    });
  });

  describe('extractAuthorizationCode', () => {
    it('should read the code parameter', () => {
      expect(extractAuthorizationCode('myapp://oauth/callback?code=abc123&state=xyz')).toBe('abc123');
    });

    it('should fail with MissingCode when the code is absent', () => {
      expect(
        captureSyncError(() => extractAuthorizationCode('myapp://oauth/callback?state=xyz'))
      ).toMatchObject({ kind: 'MissingCode', message: 'No code found' });
    });

    it('should fail with MissingCode when the callback is not a URL', () => {
      expect(captureSyncError(() => extractAuthorizationCode('garbage')).kind).toBe('MissingCode');
    });
  });

  describe('beginAuthorization', () => {
    it('should resolve with the code from the callback', async () => {
      const { handler, requests } = createScriptedRedirectHandler({
        type: 'callback',
        callbackUrl: `${TEST_REDIRECT_URI}?code=${TEST_AUTH_CODE}`,
      });

      await expect(beginAuthorization(config, handler)).resolves.toBe(TEST_AUTH_CODE);

      expect(handler.authorize).toHaveBeenCalledTimes(1);
      expect(requests[0]?.callbackScheme).toBe('myapp');
      expect(requests[0]?.redirectUri).toBe(TEST_REDIRECT_URI);
      expect(requests[0]?.authorizationUrl.searchParams.get('client_id')).toBe(TEST_CLIENT_ID);
    });

    it('should fail with MissingCode when the callback has no code', async () => {
      const { handler } = createScriptedRedirectHandler({
        type: 'callback',
        callbackUrl: `${TEST_REDIRECT_URI}?state=xyz`,
      });

      const error = await captureError(beginAuthorization(config, handler));

      expect(error.kind).toBe('MissingCode');
    });

    it('should report a user cancellation', async () => {
      const { handler } = createScriptedRedirectHandler({
        type: 'cancelled',
        reason: 'User closed the window',
      });

      const error = await captureError(beginAuthorization(config, handler));

      expect(error.kind).toBe('AuthorizationCancelled');
      expect(error.message).toBe('Login cancelled: User closed the window');
    });

    it('should use a generic reason when the cancellation has none', async () => {
      const { handler } = createScriptedRedirectHandler({ type: 'cancelled' });

      const error = await captureError(beginAuthorization(config, handler));

      expect(error.message).toBe('Login cancelled: The user cancelled the login');
    });

    it('should report handler errors as cancellations', async () => {
      const { handler } = createScriptedRedirectHandler({
        type: 'error',
        error: new Error('Browser unavailable'),
      });

      const error = await captureError(beginAuthorization(config, handler));

      expect(error.kind).toBe('AuthorizationCancelled');
      expect(error.message).toBe('Login cancelled: Browser unavailable');
    });

    it('should treat a rejected handler as an error outcome', async () => {
      const handler: RedirectHandler = {
        authorize: vi.fn().mockRejectedValue(new Error('Port in use')),
      };

      const error = await captureError(beginAuthorization(config, handler));

      expect(error.message).toBe('Login cancelled: Port in use');
    });

    it('should not call the handler when the configuration is invalid', async () => {
      const { handler } = createScriptedRedirectHandler({ type: 'cancelled' });

      const error = await captureError(
        beginAuthorization({ ...config, redirectUri: 'callback' }, handler)
      );

      expect(error.kind).toBe('InvalidConfig');
      expect(handler.authorize).not.toHaveBeenCalled();
    });

    it('should abort and fail when the redirect times out', async () => {
      vi.useFakeTimers();
      const { handler, requests } = createDeferredRedirectHandler();

      const pending = captureError(beginAuthorization(config, handler, { timeoutMs: 1000 }));
      await vi.advanceTimersByTimeAsync(1000);
      const error = await pending;

      expect(error.kind).toBe('AuthorizationCancelled');
      expect(error.message).toBe('Login cancelled: Authorization timed out after 1000ms');
      expect(requests[0]?.signal.aborted).toBe(true);
    });

    it('should wait without a timeout by default', async () => {
      vi.useFakeTimers();
      const { handler, requests, settle } = createDeferredRedirectHandler();

      const pending = beginAuthorization(config, handler);
      await vi.advanceTimersByTimeAsync(60 * 60 * 1000);
      settle({ type: 'callback', callbackUrl: `${TEST_REDIRECT_URI}?code=late` });

      await expect(pending).resolves.toBe('late');
      expect(requests[0]?.signal.aborted).toBe(false);
    });
  });
});
