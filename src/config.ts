import type { ULinkConfig, ResolvedConfig } from './types';
import { ULinkError } from './errors';

export const DEFAULT_BASE_URL = 'https://api.ulink.ly';
export const DEFAULT_LAST_LINK_TTL = 24 * 60 * 60; // 24 hours, in seconds
export const DEFAULT_REQUEST_TIMEOUT = 10000; // 10 seconds

/**
 * Apply defaults to a user config and validate it.
 * The returned object is frozen.
 */
export function resolveConfig(config: ULinkConfig): ResolvedConfig {
  if (!config.apiKey || config.apiKey.trim().length === 0) {
    throw invalid('apiKey is required');
  }

  const baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  if (!isHttpUrl(baseUrl)) {
    throw invalid(`baseUrl must be an http(s) URL, got "${config.baseUrl}"`);
  }

  const lastLinkTTL = config.lastLinkTTL === undefined ? DEFAULT_LAST_LINK_TTL : config.lastLinkTTL;
  if (lastLinkTTL !== null && !(lastLinkTTL >= 0)) {
    throw invalid('lastLinkTTL must be a non-negative number of seconds or null');
  }

  const requestTimeout = config.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT;
  if (!(requestTimeout > 0)) {
    throw invalid('requestTimeout must be a positive number of milliseconds');
  }

  return Object.freeze({
    apiKey: config.apiKey,
    baseUrl,
    debug: config.debug ?? false,
    enableDeepLinkIntegration: config.enableDeepLinkIntegration ?? true,
    persistLastLinkData: config.persistLastLinkData ?? true,
    lastLinkTTL,
    clearLastLinkOnRead: config.clearLastLinkOnRead ?? false,
    redactAllParametersInLastLink: config.redactAllParametersInLastLink ?? false,
    redactedParameterKeysInLastLink: Object.freeze([...(config.redactedParameterKeysInLastLink ?? [])]),
    autoCheckDeferredLink: config.autoCheckDeferredLink ?? true,
    requestTimeout,
  });
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'https:' || url.protocol === 'http:';
  } catch {
    return false;
  }
}

function invalid(message: string): ULinkError {
  return new ULinkError({ kind: 'InvalidConfiguration', message });
}
