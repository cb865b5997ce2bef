import type { InstallationInfo, SecureStore, Store } from './types';
import type { Logger } from './logger';
import { KEYS, SECURE_KEYS, generateUUID } from './storage';
import { isRecord, readBoolean, readString } from './json';

const TAG = 'Installation';

/**
 * Owns the installation id, the server-issued installation token and the
 * device-scoped id kept in the secure store.
 */
export class InstallationIdentity {
  private installationId: string | null = null;
  private installationIdPromise: Promise<string> | null = null;
  private installationToken: string | null = null;
  private tokenLoaded = false;
  private persistentDeviceId: string | null = null;
  // Set once the secure store has accepted persistentDeviceId
  private deviceIdPersisted = false;

  constructor(
    private readonly store: Store,
    private readonly secureStore: SecureStore,
    private readonly logger: Logger
  ) {}

  /**
   * Get or create the stable installation id (UUID).
   * Concurrent first-run callers share one read-and-create, so only one id is ever written.
   */
  async getOrCreateInstallationId(): Promise<string> {
    if (this.installationId) {
      return this.installationId;
    }
    if (!this.installationIdPromise) {
      this.installationIdPromise = this.loadOrCreateInstallationId().finally(() => {
        this.installationIdPromise = null;
      });
    }
    return this.installationIdPromise;
  }

  /**
   * Installation id if it has been loaded already
   */
  peekInstallationId(): string | null {
    return this.installationId;
  }

  /**
   * Get or create the device id kept in the secure store.
   *
   * A failed write is not fatal: the generated id is returned and kept in
   * memory, and persisting it is retried on the next call.
   */
  async getPersistentDeviceId(): Promise<string> {
    if (this.persistentDeviceId && this.deviceIdPersisted) {
      return this.persistentDeviceId;
    }

    if (!this.persistentDeviceId) {
      try {
        const stored = await this.secureStore.getItemAsync(SECURE_KEYS.PERSISTENT_DEVICE_ID);
        if (stored) {
          this.persistentDeviceId = stored;
          this.deviceIdPersisted = true;
          return stored;
        }
      } catch (error) {
        this.logger.warn(TAG, 'Could not read persistent device id', error);
      }
      this.persistentDeviceId = generateUUID();
    }

    const deviceId = this.persistentDeviceId;
    try {
      await this.secureStore.setItemAsync(SECURE_KEYS.PERSISTENT_DEVICE_ID, deviceId);
      this.deviceIdPersisted = true;
    } catch (error) {
      this.logger.warn(TAG, 'Could not persist device id, will retry on next call', error);
    }
    return deviceId;
  }

  isPersistentDeviceIdStored(): boolean {
    return this.deviceIdPersisted;
  }

  async getInstallationToken(): Promise<string | null> {
    if (this.tokenLoaded) {
      return this.installationToken;
    }
    try {
      this.installationToken = await this.store.getItem(KEYS.INSTALLATION_TOKEN);
    } catch (error) {
      this.logger.warn(TAG, 'Could not read installation token', error);
    }
    this.tokenLoaded = true;
    return this.installationToken;
  }

  async saveInstallationToken(token: string): Promise<void> {
    this.installationToken = token;
    this.tokenLoaded = true;
    try {
      await this.store.setItem(KEYS.INSTALLATION_TOKEN, token);
    } catch (error) {
      // The in-memory token still authenticates this run
      this.logger.warn(TAG, 'Could not persist installation token', error);
    }
  }

  /**
   * Forget installation id and token. The next call generates a new installation.
   */
  async clear(): Promise<void> {
    this.installationId = null;
    this.installationIdPromise = null;
    this.installationToken = null;
    this.tokenLoaded = true;
    await this.store.multiRemove([KEYS.INSTALLATION_ID, KEYS.INSTALLATION_TOKEN]);
  }

  private async loadOrCreateInstallationId(): Promise<string> {
    let installationId: string | null = null;
    try {
      installationId = await this.store.getItem(KEYS.INSTALLATION_ID);
      if (!installationId) {
        installationId = generateUUID();
        await this.store.setItem(KEYS.INSTALLATION_ID, installationId);
        this.logger.debug(TAG, `Generated installation id ${installationId}`);
      }
    } catch (error) {
      // Keep the id for this run so every request agrees on it
      installationId = installationId ?? generateUUID();
      this.logger.warn(TAG, 'Installation id storage failed, using an in-memory id', error);
    }
    this.installationId = installationId;
    return installationId;
  }
}

/**
 * Build the installation snapshot from a bootstrap response body.
 * Reinstall fields are only kept when the server flags a reinstall.
 */
export function parseInstallationInfo(
  body: unknown,
  installationId: string,
  persistentDeviceId?: string
): InstallationInfo {
  const source = isRecord(body) ? body : {};
  const isReinstall = readBoolean(source, 'isReinstall') ?? false;
  const serverDeviceId = readString(source, 'persistentDeviceId') ?? persistentDeviceId;
  const previousInstallationId = readString(source, 'previousInstallationId');
  const reinstallDetectedAt = readString(source, 'reinstallDetectedAt');

  return {
    installationId,
    isReinstall,
    ...(isReinstall && previousInstallationId !== undefined && { previousInstallationId }),
    ...(isReinstall && reinstallDetectedAt !== undefined && { reinstallDetectedAt }),
    ...(serverDeviceId !== undefined && { persistentDeviceId: serverDeviceId }),
  };
}
