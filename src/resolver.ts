import type { LinkResponse, ResolvedConfig, ResolvedLinkData, SocialMediaTags } from './types';
import type { Logger } from './logger';
import type { LinkEventBus } from './events';
import type { LastLinkStore } from './lastLink';
import { resolveLinkApi, type ApiContext } from './api';
import { errorMessageFromBody, failureMessage, toULinkError } from './errors';
import { readBoolean, readRecord, readString, type JsonObject } from './json';

const TAG = 'Resolver';

/**
 * String fields copied as-is from a resolve response or a stored link
 */
export const LINK_STRING_FIELDS = [
  'slug',
  'iosUrl',
  'androidUrl',
  'iosFallbackUrl',
  'androidFallbackUrl',
  'fallbackUrl',
  'matchType',
  'resolvedAt',
] as const;

export const SOCIAL_TAG_KEYS = ['ogTitle', 'ogDescription', 'ogImage'] as const;

/**
 * Open Graph tags present in an object. Missing keys are left out.
 */
export function readSocialMediaTags(source: JsonObject): SocialMediaTags {
  const tags: SocialMediaTags = {};
  for (const key of SOCIAL_TAG_KEYS) {
    const value = readString(source, key);
    if (value !== undefined) {
      tags[key] = value;
    }
  }
  return tags;
}

function hasTags(tags: SocialMediaTags): boolean {
  return Object.keys(tags).length > 0;
}

/**
 * Build ResolvedLinkData from a resolve response body.
 *
 * Returns null unless the body says `success: true`. Link fields live under
 * `data` when the server wraps them, at the top level otherwise.
 */
export function parseResolvedLinkData(body: JsonObject, now: () => number = Date.now): ResolvedLinkData | null {
  if (readBoolean(body, 'success') !== true) {
    return null;
  }

  const source = readRecord(body, 'data') ?? body;
  const data: ResolvedLinkData = {
    type: readString(source, 'type') === 'unified' ? 'unified' : 'dynamic',
    isDeferred: false,
    rawResponse: body,
  };

  for (const key of LINK_STRING_FIELDS) {
    const value = readString(source, key);
    if (value !== undefined) {
      data[key] = value;
    }
  }
  data.resolvedAt = data.resolvedAt ?? new Date(now()).toISOString();

  const parameters = readRecord(source, 'parameters');
  const metadata = readRecord(source, 'metadata');
  if (parameters) data.parameters = parameters;
  if (metadata) data.metadata = metadata;

  // metadata og* wins over parameters og*, which wins over socialMediaTags
  const candidates = [metadata, parameters, readRecord(source, 'socialMediaTags')];
  for (const candidate of candidates) {
    if (!candidate) continue;
    const tags = readSocialMediaTags(candidate);
    if (hasTags(tags)) {
      data.socialMediaTags = tags;
      break;
    }
  }

  return data;
}

export interface LinkResolverOptions {
  api: ApiContext;
  /** Rejects unless a bootstrap has completed successfully */
  ensureBootstrapped: () => Promise<void>;
  events: LinkEventBus;
  lastLink: LastLinkStore;
  config: Pick<ResolvedConfig, 'persistLastLinkData'>;
  logger: Logger;
  now?: () => number;
}

/**
 * Turns incoming URLs into ResolvedLinkData, publishes them and keeps the
 * last one.
 */
export class LinkResolver {
  private readonly now: () => number;

  constructor(private readonly options: LinkResolverOptions) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Resolve a URL against the server.
   * Transport and HTTP failures throw; an unsuccessful response returns null.
   */
  async processUrl(url: string): Promise<ResolvedLinkData | null> {
    await this.options.ensureBootstrapped();

    const body = await resolveLinkApi(this.options.api, url);
    const data = parseResolvedLinkData(body, this.now);
    if (!data) {
      this.options.logger.debug(TAG, `No link data for ${url}: ${errorMessageFromBody(body, 'unsuccessful response')}`);
    }
    return data;
  }

  /**
   * Resolve a URL and return the raw result without publishing anything.
   * Only the bootstrap guard throws.
   */
  async resolveLink(url: string): Promise<LinkResponse> {
    await this.options.ensureBootstrapped();

    try {
      const body = await resolveLinkApi(this.options.api, url);
      if (readBoolean(body, 'success') !== true) {
        return { success: false, error: errorMessageFromBody(body, 'Link could not be resolved') };
      }
      return { success: true, data: readRecord(body, 'data') ?? body };
    } catch (error) {
      const failure = toULinkError(error);
      return { success: false, error: failureMessage(failure), errorKind: failure.kind };
    }
  }

  /**
   * Resolve a URL, publish the result on its channel and persist it.
   * Failures are logged; nothing is published or persisted for them.
   */
  async handleDeepLink(url: string, isDeferred = false, matchType?: string): Promise<ResolvedLinkData | null> {
    const { events, lastLink, config, logger } = this.options;

    let data: ResolvedLinkData | null;
    try {
      data = await this.processUrl(url);
    } catch (error) {
      logger.error(TAG, `Failed to resolve ${url}`, error);
      return null;
    }
    if (!data) {
      return null;
    }

    data.isDeferred = isDeferred;
    if (matchType !== undefined) {
      data.matchType = matchType;
    }

    logger.info(TAG, `Resolved ${data.type} link ${data.slug ?? url}`);
    events.publishLink(data);

    if (config.persistLastLinkData) {
      await lastLink.save(data);
    }
    return data;
  }
}
