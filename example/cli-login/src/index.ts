import dotenv from 'dotenv';
import express from 'express';
import { Keyv } from 'keyv';

import {
  AuthSession,
  createCredentialStore,
  createJsonRoleMapper,
  createConsoleLogger,
  defaultRoleCodec,
  logLevelFromEnv,
  providerConfigFromEnv,
  type DefaultRole,
} from '../../../src/index.js';
import { createLoopbackRedirectHandler, requireRole } from '../../../src/express/index.js';

// Load environment variables
dotenv.config();

const PORT = process.env['PORT'] ? parseInt(process.env['PORT'], 10) : 3000;
const ADMIN_DOMAIN = process.env['ADMIN_EMAIL_DOMAIN'] ?? 'example.com';

const logger = createConsoleLogger(logLevelFromEnv());

// OAUTH_AUTH_URL, OAUTH_TOKEN_URL, OAUTH_USERINFO_URL, OAUTH_CLIENT_ID and
// OAUTH_REDIRECT_URI (e.g. http://localhost:3456/oauth/callback) are required
const config = providerConfigFromEnv();

// In-memory stand-in: the session is lost on exit, so every run logs in again.
// Pass a persistent adapter to keep it, e.g.
// new Keyv({ store: new KeyvRedis('redis://localhost:6379'), namespace: 'cli-login' })
const store = new Keyv({ namespace: 'cli-login' });

const session = await AuthSession.create<DefaultRole>({
  roles: defaultRoleCodec,
  credentialStore: createCredentialStore(store),
  redirectHandler: createLoopbackRedirectHandler({ logger }),
  logger,
});

session.subscribe((state) => {
  logger.debug('Session state changed', { status: state.status });
});

if (!session.loggedIn) {
  await session.login(
    config,
    createJsonRoleMapper<DefaultRole>((claims) => {
      if (typeof claims !== 'object' || claims === null || !('email' in claims)) return undefined;
      return String(claims.email).endsWith(`@${ADMIN_DOMAIN}`) ? 'admin' : 'user';
    })
  );
}

if (session.lastError) {
  console.error(`Error: ${session.lastError}`);
  process.exit(1);
}

const app = express();

app.get('/whoami', (_req, res) => {
  res.json({ loggedIn: session.loggedIn, role: session.currentRole });
});

app.get('/admin', requireRole(session, ['admin'], { logger }), (_req, res) => {
  res.json({ message: 'Welcome, administrator' });
});

app.post('/logout', (_req, res) => {
  void session.logout().then(
    () => res.json({ loggedIn: session.loggedIn }),
    (error: unknown) => {
      logger.error('Logout failed', error);
      res.status(500).json({ error: 'server_error' });
    }
  );
});

app.listen(PORT, () => {
  console.log(`Signed in as ${session.currentRole}`);
  console.log(`Try: curl http://localhost:${PORT}/admin`);
});
