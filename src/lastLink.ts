import type { ResolvedConfig, ResolvedLinkData, SocialMediaTags, Store } from './types';
import type { Logger } from './logger';
import { KEYS } from './storage';
import { isRecord, readBoolean, readRecord, readString } from './json';
import { LINK_STRING_FIELDS, SOCIAL_TAG_KEYS, readSocialMediaTags } from './resolver';

const TAG = 'LastLink';

type LastLinkPolicy = Pick<
  ResolvedConfig,
  'lastLinkTTL' | 'clearLastLinkOnRead' | 'redactAllParametersInLastLink' | 'redactedParameterKeysInLastLink'
>;

/**
 * Persists the most recently resolved link, applying redaction on write and
 * TTL / read-once rules on read.
 */
export class LastLinkStore {
  constructor(
    private readonly store: Store,
    private readonly policy: LastLinkPolicy,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {}

  async save(data: ResolvedLinkData): Promise<void> {
    const sanitized = sanitizeLastLink(data, this.policy);
    try {
      await this.store.setItem(KEYS.LAST_LINK_DATA, JSON.stringify(sanitized));
      await this.store.setItem(KEYS.LAST_LINK_SAVED_AT, String(this.now()));
      this.logger.debug(TAG, 'Saved last link');
    } catch (error) {
      this.logger.error(TAG, 'Could not save last link', error);
    }
  }

  /**
   * Read the persisted link. Returns null when nothing is stored, the entry
   * is corrupted or expired (both clear storage). With clearLastLinkOnRead
   * the entry is removed right after it is returned.
   */
  async load(): Promise<ResolvedLinkData | null> {
    let raw: string | null;
    let savedAtRaw: string | null;
    try {
      raw = await this.store.getItem(KEYS.LAST_LINK_DATA);
      savedAtRaw = await this.store.getItem(KEYS.LAST_LINK_SAVED_AT);
    } catch (error) {
      this.logger.error(TAG, 'Could not read last link', error);
      return null;
    }

    if (!raw) {
      return null;
    }

    const data = parseStoredLink(raw);
    if (!data) {
      this.logger.warn(TAG, 'Stored last link is corrupted, clearing it');
      await this.clear();
      return null;
    }

    if (this.policy.lastLinkTTL !== null) {
      const savedAt = savedAtRaw === null ? NaN : Number(savedAtRaw);
      const ageMs = this.now() - savedAt;
      if (!Number.isFinite(savedAt) || ageMs > this.policy.lastLinkTTL * 1000) {
        this.logger.debug(TAG, 'Last link expired');
        await this.clear();
        return null;
      }
    }

    if (this.policy.clearLastLinkOnRead) {
      await this.clear();
    }

    return data;
  }

  async clear(): Promise<void> {
    try {
      await this.store.multiRemove([KEYS.LAST_LINK_DATA, KEYS.LAST_LINK_SAVED_AT]);
    } catch (error) {
      this.logger.error(TAG, 'Could not clear last link', error);
    }
  }
}

/**
 * Copy of a link with the configured redaction applied and rawResponse dropped
 */
export function sanitizeLastLink(data: ResolvedLinkData, policy: LastLinkPolicy): ResolvedLinkData {
  const { rawResponse: _rawResponse, parameters, metadata, socialMediaTags, ...rest } = data;

  // Social tags are read out of parameters and metadata, so they follow the same redaction
  if (policy.redactAllParametersInLastLink) {
    return rest;
  }

  const redacted = policy.redactedParameterKeysInLastLink;
  const tags = socialMediaTags && omitTags(socialMediaTags, redacted);
  return {
    ...rest,
    ...(parameters && { parameters: omitKeys(parameters, redacted) }),
    ...(metadata && { metadata: omitKeys(metadata, redacted) }),
    ...(tags && Object.keys(tags).length > 0 && { socialMediaTags: tags }),
  };
}

function omitKeys(source: Record<string, unknown>, keys: readonly string[]): Record<string, unknown> {
  const copy = { ...source };
  for (const key of keys) {
    delete copy[key];
  }
  return copy;
}

function omitTags(tags: SocialMediaTags, keys: readonly string[]): SocialMediaTags {
  const kept: SocialMediaTags = {};
  for (const key of SOCIAL_TAG_KEYS) {
    const value = tags[key];
    if (value !== undefined && !keys.includes(key)) {
      kept[key] = value;
    }
  }
  return kept;
}

function parseStoredLink(raw: string): ResolvedLinkData | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) {
    return null;
  }

  const type = readString(parsed, 'type');
  if (type !== 'dynamic' && type !== 'unified') {
    return null;
  }

  const data: ResolvedLinkData = {
    type,
    isDeferred: readBoolean(parsed, 'isDeferred') ?? false,
  };
  for (const key of LINK_STRING_FIELDS) {
    const value = readString(parsed, key);
    if (value !== undefined) {
      data[key] = value;
    }
  }

  const parameters = readRecord(parsed, 'parameters');
  const metadata = readRecord(parsed, 'metadata');
  const tags = readRecord(parsed, 'socialMediaTags');
  if (parameters) data.parameters = parameters;
  if (metadata) data.metadata = metadata;
  if (tags) data.socialMediaTags = readSocialMediaTags(tags);

  return data;
}
