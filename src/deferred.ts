import type { DeferredMatchResult, DeviceInfo, Store } from './types';
import type { Logger } from './logger';
import type { InstallationIdentity } from './installation';
import { matchDeferredLinkApi, type ApiContext } from './api';
import { buildFingerprint } from './device';
import { KEYS } from './storage';
import { readBoolean, readString } from './json';

const TAG = 'Deferred';

export interface DeferredLinkMatcherOptions {
  api: ApiContext;
  store: Store;
  identity: InstallationIdentity;
  ensureBootstrapped: () => Promise<void>;
  getDeviceInfo: () => Promise<DeviceInfo>;
  /** Receives a matched link, marked as deferred */
  handleDeepLink: (url: string, isDeferred: boolean, matchType?: string) => Promise<unknown>;
  logger: Logger;
}

/**
 * One-shot deferred deep link check.
 *
 * The check runs at most once per installation: the flag is written whatever
 * the outcome, and concurrent callers share the in-flight request.
 */
export class DeferredLinkMatcher {
  private inFlight: Promise<DeferredMatchResult> | null = null;

  constructor(private readonly options: DeferredLinkMatcherOptions) {}

  /**
   * Ask the server whether this device clicked a link before installing.
   * Never throws.
   */
  check(): Promise<DeferredMatchResult> {
    if (!this.inFlight) {
      this.inFlight = this.execute().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async execute(): Promise<DeferredMatchResult> {
    const { api, store, identity, logger } = this.options;

    try {
      if ((await store.getItem(KEYS.DEFERRED_LINK_CHECKED)) === 'true') {
        logger.debug(TAG, 'Deferred link already checked');
        return { status: 'skipped' };
      }
    } catch (error) {
      logger.warn(TAG, 'Could not read deferred link flag', error);
    }

    try {
      await this.options.ensureBootstrapped();
    } catch (error) {
      // Not marked as checked: the check can run once bootstrap succeeds
      logger.warn(TAG, 'Deferred link check needs a successful bootstrap', error);
      return { status: 'error' };
    }

    let result: DeferredMatchResult;
    let match: { deepLink: string; matchType?: string } | null = null;
    try {
      const installationId = await identity.getOrCreateInstallationId();
      const fingerprint = buildFingerprint(await this.options.getDeviceInfo());
      const response = await matchDeferredLinkApi(api, { installationId, fingerprint });

      const deepLink = readString(response, 'deepLink');
      const matched =
        readBoolean(response, 'success') === true && readBoolean(response, 'matched') !== false && deepLink !== undefined;

      if (matched && deepLink !== undefined) {
        const matchType = readString(response, 'matchType');
        match = { deepLink, ...(matchType !== undefined && { matchType }) };
        result = { status: 'matched', ...match };
      } else {
        logger.debug(TAG, 'No deferred link found');
        result = { status: 'no_match' };
      }
    } catch (error) {
      logger.error(TAG, 'Deferred link check failed', error);
      result = { status: 'error' };
    }

    await this.markChecked();

    if (match) {
      logger.info(TAG, `Deferred link matched: ${match.deepLink}`);
      try {
        await this.options.handleDeepLink(match.deepLink, true, match.matchType);
      } catch (error) {
        logger.error(TAG, 'Could not handle deferred link', error);
      }
    }
    return result;
  }

  private async markChecked(): Promise<void> {
    try {
      await this.options.store.setItem(KEYS.DEFERRED_LINK_CHECKED, 'true');
    } catch (error) {
      this.options.logger.warn(TAG, 'Could not persist deferred link flag', error);
    }
  }
}
