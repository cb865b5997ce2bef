import type { Observable } from 'rxjs';
import type {
  ULinkConfig,
  ResolvedConfig,
  ULinkDependencies,
  DeviceInfo,
  DeviceInfoProvider,
  InstallationInfo,
  LinkParameters,
  LinkResponse,
  LogEntry,
  ResolvedLinkData,
  Session,
  SessionResult,
  SessionState,
  DeferredMatchResult,
  Unsubscribe,
  LifecycleSource,
} from './types';
import { resolveConfig } from './config';
import { Logger } from './logger';
import { LinkEventBus } from './events';
import { InstallationIdentity } from './installation';
import { LastLinkStore } from './lastLink';
import { SessionManager } from './session';
import { BootstrapCoordinator } from './bootstrap';
import { LinkResolver } from './resolver';
import { DeferredLinkMatcher } from './deferred';
import { Mutex } from './mutex';
import { createMemoryStore, createMemorySecureStore } from './storage';
import { buildHeaders, createFetchTransport, createLinkApi, type ApiContext } from './api';
import { clientMetadata, collectDeviceInfo, createDefaultDeviceInfoProvider, deviceFields } from './device';
import { linkParametersToJson, validateLinkParameters } from './parameters';
import { errorMessageFromBody, failureMessage, isULinkError, toULinkError } from './errors';
import { readBoolean, readString } from './json';

const TAG = 'ULink';

/**
 * One configured engine instance. Obtain it from `ULink.initialize()`.
 */
export class ULinkClient {
  readonly config: ResolvedConfig;

  private readonly logger: Logger;
  private readonly events = new LinkEventBus();
  private readonly identity: InstallationIdentity;
  private readonly lastLink: LastLinkStore;
  private readonly sessions: SessionManager;
  private readonly bootstrap: BootstrapCoordinator;
  private readonly resolver: LinkResolver;
  private readonly deferred: DeferredLinkMatcher;
  private readonly api: ApiContext;
  private readonly deviceInfoProvider: DeviceInfoProvider;
  private deviceInfoPromise: Promise<DeviceInfo> | null = null;
  private readonly unsubscribers: Unsubscribe[] = [];
  // Lifecycle reactions run one at a time, in signal order
  private readonly lifecycleQueue = new Mutex();

  private initialUrl: string | null;
  private pendingInitialUrl: string | null;
  private firstBootstrapHandled = false;
  private disposed = false;

  constructor(config: ResolvedConfig, deps: ULinkDependencies = {}) {
    this.config = config;
    const now = deps.now ?? Date.now;
    const store = deps.store ?? createMemoryStore();

    this.logger = new Logger(config.debug, now);
    this.deviceInfoProvider = deps.deviceInfo ?? createDefaultDeviceInfoProvider();
    this.identity = new InstallationIdentity(store, deps.secureStore ?? createMemorySecureStore(), this.logger);
    this.lastLink = new LastLinkStore(store, config, this.logger, now);

    this.api = {
      transport: deps.transport ?? createFetchTransport({ timeout: config.requestTimeout, logger: this.logger }),
      baseUrl: config.baseUrl,
      headers: async () => {
        const info = await this.getDeviceInfo();
        return buildHeaders(config.apiKey, {
          installationToken: await this.identity.getInstallationToken(),
          installationId: this.identity.peekInstallationId(),
          deviceId: info.deviceId,
          platform: info.platform,
        });
      },
    };

    this.sessions = new SessionManager({
      api: this.api,
      identity: this.identity,
      buildStartBody: (metadata) => this.buildSessionStartBody(metadata),
      logger: this.logger,
      now,
    });

    this.bootstrap = new BootstrapCoordinator({
      api: this.api,
      identity: this.identity,
      sessions: this.sessions,
      events: this.events,
      buildBody: (installationId, persistentDeviceId) => this.buildBootstrapBody(installationId, persistentDeviceId),
      logger: this.logger,
    });

    const ensureBootstrapped = () => this.bootstrap.ensureCompleted();

    this.resolver = new LinkResolver({
      api: this.api,
      ensureBootstrapped,
      events: this.events,
      lastLink: this.lastLink,
      config,
      logger: this.logger,
      now,
    });

    this.deferred = new DeferredLinkMatcher({
      api: this.api,
      store,
      identity: this.identity,
      ensureBootstrapped,
      getDeviceInfo: () => this.getDeviceInfo(),
      handleDeepLink: (url, isDeferred, matchType) => this.resolver.handleDeepLink(url, isDeferred, matchType),
      logger: this.logger,
    });

    this.initialUrl = deps.initialUrl ?? null;
    this.pendingInitialUrl = this.initialUrl;

    // Registered before the first bootstrap so no lifecycle signal is missed
    if (deps.lifecycle) {
      this.registerLifecycle(deps.lifecycle);
    }
  }

  // ============================================
  // Streams
  // ============================================

  /** Resolved dynamic links; replays the latest one to new subscribers */
  get dynamicLinks$(): Observable<ResolvedLinkData> {
    return this.events.dynamicLinks$;
  }

  /** Resolved unified links; replays the latest one to new subscribers */
  get unifiedLinks$(): Observable<ResolvedLinkData> {
    return this.events.unifiedLinks$;
  }

  /** Emits once per instance when the server reports a reinstall */
  get reinstall$(): Observable<InstallationInfo> {
    return this.events.reinstall$;
  }

  /** Log entries, emitted only in debug mode */
  get logs$(): Observable<LogEntry> {
    return this.logger.entries$;
  }

  get sessionState$(): Observable<SessionState> {
    return this.sessions.state$;
  }

  /**
   * True once a bootstrap has succeeded, the last attempt did not fail and
   * the instance has not been disposed
   */
  get isBootstrapped(): boolean {
    return !this.disposed && this.bootstrap.succeeded;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  // ============================================
  // Bootstrap
  // ============================================

  /**
   * Run the bootstrap (or join the one in flight). Rejects with BootstrapFailed.
   * The first success resolves the launch URL and starts the deferred link check.
   */
  async start(): Promise<InstallationInfo> {
    const info = await this.bootstrap.run();
    await this.afterBootstrap();
    return info;
  }

  getInstallationInfo(): InstallationInfo | null {
    return this.bootstrap.getInstallationInfo();
  }

  async getInstallationId(): Promise<string> {
    return this.identity.getOrCreateInstallationId();
  }

  async getPersistentDeviceId(): Promise<string> {
    return this.identity.getPersistentDeviceId();
  }

  /**
   * Forget the installation id and token. The next bootstrap registers a new installation.
   */
  clearInstallation(): Promise<void> {
    return this.identity.clear();
  }

  // ============================================
  // Links
  // ============================================

  /**
   * Create a dynamic or unified link
   *
   * Rejects with NotInitialized / BootstrapFailed when no bootstrap has succeeded.
   * Every other failure comes back as `{ success: false }`.
   *
   * @example
   * ```typescript
   * const response = await client.createLink(
   *   dynamicLink({ domain: 'links.example.com', parameters: { screen: 'promo' } })
   * );
   * if (response.success) share(response.url);
   * ```
   */
  async createLink(params: LinkParameters): Promise<LinkResponse> {
    await this.bootstrap.ensureCompleted();

    try {
      validateLinkParameters(params);
      const body = await createLinkApi(this.api, linkParametersToJson(params));

      if (readBoolean(body, 'success') !== true) {
        return { success: false, error: errorMessageFromBody(body, 'Link creation was not successful'), data: body };
      }

      const url = readString(body, 'url') ?? readString(body, 'shortUrl');
      this.logger.info(TAG, `Created ${params.type} link ${url ?? ''}`);
      return { success: true, ...(url !== undefined && { url }), data: body };
    } catch (error) {
      const failure = toULinkError(error);
      this.logger.error(TAG, 'Failed to create link', failure);
      return { success: false, error: failureMessage(failure), errorKind: failure.kind };
    }
  }

  /**
   * Resolve a URL without publishing or persisting it
   */
  resolveLink(url: string): Promise<LinkResponse> {
    return this.resolver.resolveLink(url);
  }

  /**
   * Resolve a URL into link data. Throws on transport or HTTP failure;
   * returns null when the server does not know the link.
   */
  processUrl(url: string): Promise<ResolvedLinkData | null> {
    return this.resolver.processUrl(url);
  }

  /**
   * Resolve a URL, publish it on dynamicLinks$ / unifiedLinks$ and persist it
   */
  handleDeepLink(url: string): Promise<ResolvedLinkData | null> {
    return this.resolver.handleDeepLink(url);
  }

  /**
   * Entry point for URLs the host app receives while running.
   * Returns false when deep link integration is disabled.
   */
  async handleIncomingUrl(url: string): Promise<boolean> {
    if (!this.config.enableDeepLinkIntegration) {
      this.logger.debug(TAG, `Deep link integration disabled, ignoring ${url}`);
      return false;
    }
    await this.resolver.handleDeepLink(url);
    return true;
  }

  /**
   * Record the URL the app was launched with. It is resolved after the next
   * successful bootstrap or on the next foreground.
   */
  setInitialUrl(url: string | null): void {
    this.initialUrl = url;
    this.pendingInitialUrl = url;
  }

  getInitialUrl(): string | null {
    return this.initialUrl;
  }

  /**
   * Resolve the launch URL without publishing it. Failures are logged and yield null.
   */
  async getInitialDeepLink(): Promise<ResolvedLinkData | null> {
    if (!this.initialUrl) {
      return null;
    }
    try {
      return await this.resolver.processUrl(this.initialUrl);
    } catch (error) {
      this.logger.error(TAG, 'Failed to resolve initial URL', error);
      return null;
    }
  }

  /**
   * Last resolved link, subject to TTL and clear-on-read settings
   */
  getLastLinkData(): Promise<ResolvedLinkData | null> {
    return this.lastLink.load();
  }

  clearLastResolvedLink(): Promise<void> {
    return this.lastLink.clear();
  }

  /**
   * Check once per installation for a link clicked before install. Never throws.
   */
  checkDeferredLink(): Promise<DeferredMatchResult> {
    return this.deferred.check();
  }

  // ============================================
  // Sessions
  // ============================================

  startSession(metadata?: Record<string, unknown>): Promise<SessionResult> {
    return this.sessions.startSession(metadata);
  }

  endSession(): Promise<boolean> {
    return this.sessions.endSession();
  }

  waitForSession(timeoutMs?: number): Promise<boolean> {
    return this.sessions.waitForSession(timeoutMs);
  }

  getSessionState(): SessionState {
    return this.sessions.getState();
  }

  getCurrentSessionId(): string | null {
    return this.sessions.getCurrentSessionId();
  }

  getCurrentSession(): Session | null {
    return this.sessions.getCurrentSession();
  }

  getLastEndedSession(): Session | null {
    return this.sessions.getLastEndedSession();
  }

  hasActiveSession(): boolean {
    return this.sessions.hasActiveSession();
  }

  isSessionInitializing(): boolean {
    return this.sessions.isInitializing();
  }

  // ============================================
  // Lifecycle
  // ============================================

  /**
   * Stop reacting to lifecycle signals and complete every stream
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
    this.events.close();
    this.sessions.dispose();
    this.logger.debug(TAG, 'Disposed');
    this.logger.close();
  }

  private registerLifecycle(lifecycle: LifecycleSource): void {
    // State is read when the reaction runs, after every earlier one has settled
    const enqueue = (event: string, reaction: () => Promise<void>) => () => {
      this.lifecycleQueue
        .runExclusive(async () => {
          if (!this.disposed) {
            await reaction();
          }
        })
        .catch((error: unknown) => this.logger.error(TAG, `${event} handling failed`, error));
    };

    this.unsubscribers.push(
      lifecycle.onForeground(enqueue('Foreground', () => this.handleForeground())),
      lifecycle.onBackground(enqueue('Background', () => this.handleBackground())),
      lifecycle.onTerminate(enqueue('Terminate', () => this.handleTerminate()))
    );
  }

  private async handleForeground(): Promise<void> {
    const state = this.sessions.getState();
    if (this.bootstrap.failed || state === 'idle' || state === 'failed') {
      this.logger.debug(TAG, `Foreground in state ${state}, bootstrapping`);
      if (await this.bootstrap.runSilently()) {
        await this.afterBootstrap();
      }
    }
    await this.processPendingInitialUrl();
  }

  private async handleBackground(): Promise<void> {
    if (this.sessions.hasActiveSession()) {
      await this.sessions.endSession();
    }
  }

  private async handleTerminate(): Promise<void> {
    try {
      if (this.sessions.hasActiveSession()) {
        await this.sessions.endSession();
      }
    } finally {
      this.dispose();
    }
  }

  private async afterBootstrap(): Promise<void> {
    if (this.firstBootstrapHandled) {
      return;
    }
    this.firstBootstrapHandled = true;

    await this.processPendingInitialUrl();

    if (this.config.autoCheckDeferredLink) {
      this.deferred
        .check()
        .then((result) => this.logger.debug(TAG, `Deferred link check: ${result.status}`))
        .catch((error: unknown) => this.logger.error(TAG, 'Deferred link check failed', error));
    }
  }

  private async processPendingInitialUrl(): Promise<void> {
    const url = this.pendingInitialUrl;
    if (!url || !this.config.enableDeepLinkIntegration || !this.bootstrap.succeeded) {
      return;
    }
    this.pendingInitialUrl = null;
    await this.resolver.handleDeepLink(url);
  }

  // ============================================
  // Request bodies
  // ============================================

  private getDeviceInfo(): Promise<DeviceInfo> {
    if (!this.deviceInfoPromise) {
      this.deviceInfoPromise = collectDeviceInfo(this.deviceInfoProvider, this.logger);
    }
    return this.deviceInfoPromise;
  }

  private async buildBootstrapBody(installationId: string, persistentDeviceId: string): Promise<Record<string, unknown>> {
    const info = await this.getDeviceInfo();
    return {
      installationId,
      persistentDeviceId,
      ...deviceFields(info),
      metadata: { client: clientMetadata(info.platform) },
    };
  }

  private async buildSessionStartBody(metadata?: Record<string, unknown>): Promise<Record<string, unknown>> {
    const info = await this.getDeviceInfo();
    const installationId = await this.identity.getOrCreateInstallationId();
    return {
      installationId,
      ...deviceFields(info),
      metadata: {
        client: clientMetadata(info.platform),
        deviceInfo: { ...info },
        ...metadata,
      },
    };
  }
}

/**
 * ULink entry point
 *
 * @example
 * ```typescript
 * import { ULink } from 'ulink-engine';
 *
 * const client = await ULink.initialize({ apiKey: 'your-api-key' });
 *
 * client.dynamicLinks$.subscribe((link) => {
 *   router.navigate(link.parameters);
 * });
 *
 * await client.handleIncomingUrl('https://links.example.com/summer');
 * ```
 */
class ULinkSDK {
  private client: ULinkClient | null = null;
  private initPromise: Promise<ULinkClient> | null = null;

  /**
   * Create the engine and bootstrap it.
   *
   * Returns the existing instance without a network call once a bootstrap
   * has succeeded. Concurrent calls share one bootstrap and get the same
   * instance or the same BootstrapFailed error. After a failure the next call
   * retries with the same instance.
   */
  initialize(config: ULinkConfig, deps?: ULinkDependencies): Promise<ULinkClient> {
    if (this.client?.isDisposed && !this.initPromise) {
      // Disposed on terminate; start over
      this.client = null;
    }
    if (this.client?.isBootstrapped) {
      return Promise.resolve(this.client);
    }
    if (!this.initPromise) {
      this.initPromise = this.bootstrapClient(config, deps).finally(() => {
        this.initPromise = null;
      });
    }
    return this.initPromise;
  }

  /**
   * The initialized instance, or null before initialize()
   */
  getClient(): ULinkClient | null {
    return this.client;
  }

  get isInitialized(): boolean {
    return this.client?.isBootstrapped ?? false;
  }

  /**
   * Dispose the current instance. The next initialize() starts from scratch.
   */
  async reset(): Promise<void> {
    const pending = this.initPromise;
    if (pending) {
      // Let a running bootstrap settle before its instance is torn down
      await pending.then(
        () => undefined,
        (error: unknown) => {
          if (!isULinkError(error)) throw error;
        }
      );
    }
    this.client?.dispose();
    this.client = null;
    this.initPromise = null;
  }

  private async bootstrapClient(config: ULinkConfig, deps?: ULinkDependencies): Promise<ULinkClient> {
    if (!this.client) {
      this.client = new ULinkClient(resolveConfig(config), deps);
    }
    const client = this.client;
    await client.start();
    return client;
  }
}

export { ULinkSDK };

// Export singleton instance
export const ULink = new ULinkSDK();
