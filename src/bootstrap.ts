import type { InstallationInfo } from './types';
import type { Logger } from './logger';
import type { LinkEventBus } from './events';
import type { SessionManager } from './session';
import { bootstrapInstallation, type ApiContext } from './api';
import type { InstallationIdentity } from './installation';
import { parseInstallationInfo } from './installation';
import { ULinkError, errorMessageFromBody, isULinkError } from './errors';
import { readBoolean, readString } from './json';

const TAG = 'Bootstrap';

type BootstrapStatus = 'not_started' | 'running' | 'succeeded' | 'failed';

export interface BootstrapOptions {
  api: ApiContext;
  identity: InstallationIdentity;
  sessions: SessionManager;
  events: LinkEventBus;
  /** Request body for /sdk/bootstrap */
  buildBody: (installationId: string, persistentDeviceId: string) => Promise<Record<string, unknown>>;
  logger: Logger;
}

/**
 * Registers the installation with the server.
 *
 * Concurrent runs share one request. The last outcome gates link creation,
 * resolution and the deferred match through ensureCompleted().
 */
export class BootstrapCoordinator {
  private status: BootstrapStatus = 'not_started';
  private inFlight: Promise<InstallationInfo> | null = null;
  private lastError: ULinkError | null = null;
  private installationInfo: InstallationInfo | null = null;
  private reinstallPublished = false;

  constructor(private readonly options: BootstrapOptions) {}

  get succeeded(): boolean {
    return this.status === 'succeeded';
  }

  get failed(): boolean {
    return this.status === 'failed';
  }

  get isRunning(): boolean {
    return this.inFlight !== null;
  }

  getInstallationInfo(): InstallationInfo | null {
    return this.installationInfo ? { ...this.installationInfo } : null;
  }

  /**
   * Run a bootstrap, or join the one in flight.
   * Rejects with BootstrapFailed.
   */
  run(): Promise<InstallationInfo> {
    if (!this.inFlight) {
      this.inFlight = this.execute().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /**
   * Bootstrap retry driven by lifecycle events. Failures are logged.
   */
  async runSilently(): Promise<boolean> {
    try {
      await this.run();
      return true;
    } catch (error) {
      this.options.logger.warn(TAG, 'Silent bootstrap retry failed', error);
      return false;
    }
  }

  /**
   * Resolve once a bootstrap has succeeded, waiting for one in flight.
   * Rejects with NotInitialized before the first run, BootstrapFailed after a failed one.
   */
  async ensureCompleted(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight;
      return;
    }
    switch (this.status) {
      case 'succeeded':
        return;
      case 'failed':
        throw this.lastError ?? new ULinkError({ kind: 'BootstrapFailed', message: 'Bootstrap failed' });
      default:
        this.options.logger.warnAlways('Called before ULink.initialize() completed');
        throw new ULinkError({ kind: 'NotInitialized' });
    }
  }

  private async execute(): Promise<InstallationInfo> {
    const { api, identity, sessions, events, logger } = this.options;
    this.status = 'running';

    try {
      const installationId = await identity.getOrCreateInstallationId();
      const persistentDeviceId = await identity.getPersistentDeviceId();
      const body = await this.options.buildBody(installationId, persistentDeviceId);

      logger.debug(TAG, `Bootstrapping installation ${installationId}`);
      const response = await bootstrapInstallation(api, body);

      if (readBoolean(response, 'success') !== true) {
        throw new ULinkError({
          kind: 'BootstrapFailed',
          message: errorMessageFromBody(response, 'Bootstrap was not successful'),
        });
      }

      const token = readString(response, 'installationToken');
      if (token) {
        await identity.saveInstallationToken(token);
      }

      const info = parseInstallationInfo(response, installationId, persistentDeviceId);
      this.installationInfo = info;

      const sessionId = readString(response, 'sessionId');
      if (sessionId) {
        await sessions.adoptSession(sessionId);
      }

      if (info.isReinstall && !this.reinstallPublished) {
        this.reinstallPublished = true;
        logger.info(TAG, `Reinstall detected, previous installation ${info.previousInstallationId ?? 'unknown'}`);
        events.publishReinstall(info);
      }

      this.status = 'succeeded';
      this.lastError = null;
      logger.info(TAG, 'Bootstrap succeeded');
      return info;
    } catch (error) {
      const failure = asBootstrapFailure(error);
      this.status = 'failed';
      this.lastError = failure;
      logger.error(TAG, failure.message);
      throw failure;
    }
  }
}

function asBootstrapFailure(error: unknown): ULinkError {
  if (isULinkError(error, 'BootstrapFailed')) {
    return error;
  }
  if (error instanceof ULinkError && error.detail.kind === 'HTTPError') {
    return new ULinkError({
      kind: 'BootstrapFailed',
      status: error.detail.status,
      message: errorMessageFromBody(error.detail.body, error.message),
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ULinkError({ kind: 'BootstrapFailed', message });
}
