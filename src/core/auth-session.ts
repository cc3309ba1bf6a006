import type {
  CredentialStore,
  HttpTransport,
  ProviderConfig,
  RedirectHandler,
  RoleCodec,
  RoleMapper,
  SessionListener,
  SessionState,
} from '../types.js';
import { createFetchTransport } from '../http/fetch-transport.js';
import type { Logger } from '../utils/logger.js';
import { createConsoleLogger } from '../utils/logger.js';
import { DEFAULT_REDIRECT_TIMEOUT_MS, STORAGE_KEYS } from './config.js';
import { AuthError, errorMessage, formatAuthError, roleMappingFailed } from './errors.js';
import { beginAuthorization } from './redirect.js';
import { exchangeCode } from './token-exchange.js';
import { resolveIdentity } from './identity.js';

/**
 * Options for creating an auth session.
 */
export interface AuthSessionOptions<Role> {
  /** Capabilities of the application's role type */
  roles: RoleCodec<Role>;
  /** Durable store for the session record */
  credentialStore: CredentialStore;
  /** Presents the authorization URL and captures the redirect */
  redirectHandler: RedirectHandler;
  /** HTTP transport (default: global fetch) */
  transport?: HttpTransport;
  /** Logger instance */
  logger?: Logger;
  /**
   * Time to wait for the user to finish the browser step, in milliseconds.
   * 0 waits indefinitely.
   * Default: 5 minutes
   */
  redirectTimeoutMs?: number;
}

/**
 * OAuth 2.0 / OIDC client session with an application-defined role.
 *
 * The session restores any persisted login as soon as it is constructed,
 * runs the authorization code flow on {@link AuthSession.login}, and
 * persists the resulting token and role through the credential store.
 * State changes are published to subscribers as immutable snapshots.
 *
 * Only one login runs at a time; a second call made while one is in
 * flight is ignored. Login failures never reject: they are reported via
 * `lastError`, and only {@link AuthSession.logout} clears `loggedIn`.
 *
 * @example
 * ```typescript
 * const session = await AuthSession.create({
 *   roles: defaultRoleCodec,
 *   credentialStore: createMemoryCredentialStore(),
 *   redirectHandler: createLoopbackRedirectHandler(),
 * });
 *
 * session.subscribe((state) => console.log(state.status));
 *
 * await session.login(
 *   providerConfigFromEnv(),
 *   createJsonRoleMapper((claims) => (isAdmin(claims) ? 'admin' : 'user'))
 * );
 *
 * if (session.hasRole('admin')) {
 *   // ...
 * }
 * ```
 */
export class AuthSession<Role> {
  private readonly roles: RoleCodec<Role>;
  private readonly credentialStore: CredentialStore;
  private readonly redirectHandler: RedirectHandler;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly redirectTimeoutMs: number;

  private readonly listeners = new Set<SessionListener<Role>>();
  private readonly restored: Promise<void>;
  private current: SessionState<Role>;
  private accessToken: string | null = null;
  private loginInFlight = false;
  // Bumped by logout so a restore that finishes afterwards does not log back in
  private generation = 0;

  /**
   * Create a session and wait until the persisted login has been restored.
   */
  static async create<Role>(options: AuthSessionOptions<Role>): Promise<AuthSession<Role>> {
    const session = new AuthSession(options);
    await session.whenRestored();
    return session;
  }

  constructor(options: AuthSessionOptions<Role>) {
    this.roles = options.roles;
    this.credentialStore = options.credentialStore;
    this.redirectHandler = options.redirectHandler;
    this.transport = options.transport ?? createFetchTransport();
    this.logger = options.logger ?? createConsoleLogger();
    this.redirectTimeoutMs = options.redirectTimeoutMs ?? DEFAULT_REDIRECT_TIMEOUT_MS;

    const initial: SessionState<Role> = {
      status: 'idle',
      loggedIn: false,
      loading: false,
      lastError: null,
      lastErrorKind: null,
      currentRole: this.roles.guest,
    };
    this.current = Object.freeze(initial);

    this.restored = this.restoreSession();
  }

  /** Current state snapshot */
  get state(): SessionState<Role> {
    return this.current;
  }

  get loggedIn(): boolean {
    return this.current.loggedIn;
  }

  get loading(): boolean {
    return this.current.loading;
  }

  get lastError(): string | null {
    return this.current.lastError;
  }

  get currentRole(): Role {
    return this.current.currentRole;
  }

  /**
   * Resolves once the restoration started by the constructor has finished.
   */
  whenRestored(): Promise<void> {
    return this.restored;
  }

  /**
   * Register a listener for state changes.
   *
   * @returns A function that removes the listener
   */
  subscribe(listener: SessionListener<Role>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Restore a persisted login from the credential store. No network call is made.
   *
   * A stored token with a missing or unreadable role restores the session
   * as logged in under the guest role.
   */
  async restoreSession(): Promise<void> {
    const generation = this.generation;

    let token: string | undefined;
    let storedRole: string | undefined;
    try {
      token = await this.credentialStore.get(STORAGE_KEYS.TOKEN);
      storedRole = token ? await this.credentialStore.get(STORAGE_KEYS.ROLE) : undefined;
    } catch (error) {
      this.logger.error('Failed to read stored credentials', { error: errorMessage(error) });
      return;
    }

    if (!token) {
      this.logger.debug('No stored session to restore');
      return;
    }
    if (generation !== this.generation) {
      this.logger.debug('Logged out while restoring, discarding stored session');
      return;
    }

    const role = storedRole === undefined ? undefined : this.deserializeRole(storedRole);
    if (role === undefined) {
      this.logger.warn('Stored role could not be restored, continuing as guest');
    }

    this.accessToken = token;
    this.update({
      status: 'authenticated',
      loggedIn: true,
      currentRole: role ?? this.roles.guest,
    });
    this.logger.info('Session restored');
  }

  /**
   * Run the authorization code flow and map the resulting identity to a role.
   *
   * Never rejects. On success the session is logged in with the mapped role
   * and persisted; on failure `lastError` describes the failing stage and
   * the previous login state is kept.
   *
   * @param config - Provider configuration for this attempt
   * @param roleMapper - Maps the identity payload to a role
   */
  async login(config: ProviderConfig, roleMapper: RoleMapper<Role>): Promise<void> {
    if (this.loginInFlight) {
      this.logger.warn('Login already in progress, ignoring new request');
      return;
    }
    this.loginInFlight = true;

    try {
      await this.restored;
      this.update({
        status: 'awaiting-redirect',
        loading: true,
        lastError: null,
        lastErrorKind: null,
      });

      const code = await beginAuthorization(config, this.redirectHandler, {
        timeoutMs: this.redirectTimeoutMs,
        logger: this.logger,
      });

      this.update({ status: 'exchanging-code' });
      const tokens = await exchangeCode(config, code, this.transport);

      this.update({ status: 'resolving-identity' });
      const identity = await resolveIdentity(config, tokens, this.transport, this.logger);
      const role = this.mapRole(roleMapper, identity);

      this.accessToken = tokens.accessToken;
      await this.persist(tokens.accessToken, role);

      this.update({
        status: 'authenticated',
        loggedIn: true,
        loading: false,
        currentRole: role,
      });
      this.logger.info('Login succeeded');
    } catch (error) {
      this.fail(error);
    } finally {
      this.loginInFlight = false;
    }
  }

  /**
   * Log out and delete the persisted session record. No network call is made.
   *
   * The in-memory state is reset before the store is touched, so the
   * session reads as logged out as soon as this is called.
   */
  async logout(): Promise<void> {
    this.generation += 1;
    this.accessToken = null;
    this.update({
      status: 'idle',
      loggedIn: false,
      currentRole: this.roles.guest,
    });

    try {
      await this.credentialStore.deleteAll();
    } catch (error) {
      this.logger.error('Failed to delete stored credentials', { error: errorMessage(error) });
      throw error;
    }
    this.logger.info('Logged out');
  }

  /**
   * Check if the current user holds a specific role.
   */
  hasRole(target: Role): boolean {
    return this.roles.equals(this.current.currentRole, target);
  }

  /**
   * Check if the current user holds any of the given roles.
   */
  hasAnyRole(roles: Iterable<Role>): boolean {
    for (const role of roles) {
      if (this.hasRole(role)) {
        return true;
      }
    }
    return false;
  }

  private mapRole(roleMapper: RoleMapper<Role>, identity: Uint8Array): Role {
    let role: Role | null | undefined;
    try {
      role = roleMapper(identity);
    } catch (error) {
      throw roleMappingFailed(error);
    }

    if (role === null || role === undefined) {
      throw roleMappingFailed();
    }
    return role;
  }

  private deserializeRole(value: string): Role | undefined {
    try {
      return this.roles.deserialize(value);
    } catch (error) {
      this.logger.warn('Role codec failed to deserialize stored role', {
        error: errorMessage(error),
      });
      return undefined;
    }
  }

  private async persist(token: string, role: Role): Promise<void> {
    try {
      await this.credentialStore.put(STORAGE_KEYS.TOKEN, token);
      await this.credentialStore.put(STORAGE_KEYS.ROLE, this.roles.serialize(role));
    } catch (error) {
      // The login itself succeeded; only restoration after a restart is lost
      this.logger.error('Failed to persist session', { error: errorMessage(error) });
      await this.discardPartialRecord();
    }
  }

  // A token must never be restored next to a role it was not issued with
  private async discardPartialRecord(): Promise<void> {
    try {
      await this.credentialStore.deleteAll();
    } catch (error) {
      this.logger.error('Failed to discard partially persisted session', {
        error: errorMessage(error),
      });
    }
  }

  private fail(error: unknown): void {
    if (error instanceof AuthError) {
      const message = formatAuthError(error);
      this.logger.warn('Login failed', { kind: error.kind, error: message });
      this.update({ status: 'failed', loading: false, lastError: message, lastErrorKind: error.kind });
      return;
    }

    const message = `Login failed: ${errorMessage(error)}`;
    this.logger.error('Login failed unexpectedly', { error: errorMessage(error) });
    this.update({ status: 'failed', loading: false, lastError: message, lastErrorKind: null });
  }

  private update(changes: Partial<SessionState<Role>>): void {
    this.current = Object.freeze({ ...this.current, ...changes });
    for (const listener of this.listeners) {
      try {
        listener(this.current);
      } catch (error) {
        this.logger.error('Session listener threw', { error: errorMessage(error) });
      }
    }
  }
}
