import express from 'express';
import type { Express } from 'express';
import type { Server } from 'node:http';
import open from 'open';
import type { RedirectHandler, RedirectOutcome, RedirectRequest } from '../types.js';
import { DEFAULT_CALLBACK_PATH } from '../core/config.js';
import { errorMessage } from '../core/errors.js';
import type { Logger } from '../utils/logger.js';
import { createConsoleLogger } from '../utils/logger.js';

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]']);

/**
 * Options for the callback app.
 */
export interface CallbackAppOptions {
  /** Path the provider redirects to (default: '/oauth/callback') */
  callbackPath?: string;
  /** Origin of the redirect URI, used to rebuild the full callback URL */
  baseUrl: string;
  /** Receives the outcome of every callback request */
  onOutcome: (outcome: RedirectOutcome) => void;
}

/**
 * Options for the loopback redirect handler.
 */
export interface LoopbackRedirectHandlerOptions {
  /**
   * Opens the authorization URL for the user.
   * Default: the system browser via `open`
   */
  openBrowser?: (url: string) => Promise<unknown>;
  /** Logger instance */
  logger?: Logger;
}

function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function renderPage(title: string, color: string, detail: string): string {
  return `<!DOCTYPE html>
<html>
  <body style="font-family: system-ui; padding: 40px; text-align: center;">
    <h1 style="color: ${color};">${title}</h1>
    <p>${detail}</p>
    <p>You can close this window and return to the application.</p>
  </body>
</html>`;
}

/**
 * Create an Express app that receives the provider's redirect.
 *
 * A callback carrying an `error` parameter is reported as a cancellation;
 * any other callback is reported with its full URL, so a missing `code`
 * is detected by the caller.
 *
 * @param options - Callback app options
 * @returns Express app (not listening)
 */
export function createCallbackApp(options: CallbackAppOptions): Express {
  const callbackPath = options.callbackPath ?? DEFAULT_CALLBACK_PATH;
  const app = express();

  app.get(callbackPath, (req, res) => {
    const callbackUrl = new URL(req.originalUrl, options.baseUrl);
    const error = callbackUrl.searchParams.get('error');

    if (error) {
      const reason = callbackUrl.searchParams.get('error_description') ?? error;
      res.status(200).type('html').send(renderPage('Authorization Failed', '#dc2626', `Error: ${escapeHtml(reason)}`));
      options.onOutcome({ type: 'cancelled', reason });
      return;
    }

    res.status(200).type('html').send(renderPage('Authorization Complete', '#16a34a', 'Signing you in.'));
    options.onOutcome({ type: 'callback', callbackUrl: callbackUrl.toString() });
  });

  app.use((_req, res) => {
    res.status(404).send('Not Found');
  });

  return app;
}

/**
 * Create a redirect handler for command-line and desktop Node programs.
 *
 * The handler:
 * 1. Listens on the loopback port of the redirect URI
 * 2. Opens the authorization URL in the user's browser
 * 3. Resolves with the first callback, then stops listening
 *
 * Only `http` redirect URIs on a loopback host are supported.
 *
 * @example
 * ```typescript
 * const session = await AuthSession.create({
 *   roles: defaultRoleCodec,
 *   credentialStore: createMemoryCredentialStore(),
 *   redirectHandler: createLoopbackRedirectHandler(),
 * });
 *
 * // redirectUri: 'http://localhost:3456/oauth/callback'
 * await session.login(config, mapper);
 * ```
 */
export function createLoopbackRedirectHandler(
  options?: LoopbackRedirectHandlerOptions
): RedirectHandler {
  const logger = options?.logger ?? createConsoleLogger();
  const openBrowser = options?.openBrowser ?? ((url: string) => open(url));

  return {
    authorize(request: RedirectRequest): Promise<RedirectOutcome> {
      let target: URL;
      try {
        target = new URL(request.redirectUri);
      } catch (error) {
        return Promise.resolve({
          type: 'error',
          error: new Error(`Redirect URI is not a URL: ${errorMessage(error)}`),
        });
      }

      if (request.callbackScheme !== 'http' || !LOOPBACK_HOSTS.has(target.hostname)) {
        return Promise.resolve({
          type: 'error',
          error: new Error('Loopback redirects need an http://localhost redirect URI'),
        });
      }

      return new Promise<RedirectOutcome>((resolve) => {
        let server: Server | undefined;
        let settled = false;

        const finish = (outcome: RedirectOutcome): void => {
          if (settled) return;
          settled = true;
          request.signal.removeEventListener('abort', onAbort);
          if (server) {
            server.close();
            server.closeIdleConnections();
          }
          resolve(outcome);
        };

        const onAbort = (): void => {
          finish({ type: 'cancelled', reason: 'Authorization was aborted' });
        };

        if (request.signal.aborted) {
          onAbort();
          return;
        }
        request.signal.addEventListener('abort', onAbort);

        const app = createCallbackApp({
          callbackPath: target.pathname,
          baseUrl: target.origin,
          onOutcome: finish,
        });

        const port = target.port ? Number(target.port) : 80;
        const hostname = target.hostname.replace(/^\[|\]$/g, '');
        server = app.listen(port, hostname, () => {
          logger.info('Waiting for authorization callback', { redirectUri: request.redirectUri });
          logger.info(`Open this URL to continue: ${request.authorizationUrl.toString()}`);
          openBrowser(request.authorizationUrl.toString()).catch((error: unknown) => {
            logger.warn('Could not open browser automatically', { error: errorMessage(error) });
          });
        });

        server.on('error', (error: Error) => {
          finish({ type: 'error', error });
        });
      });
    },
  };
}
