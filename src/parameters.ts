import type { LinkParameters, SocialMediaTags } from './types';
import { ULinkError } from './errors';

const SOCIAL_PARAMETER_KEYS = new Set([
  'ogTitle',
  'ogDescription',
  'ogImage',
  'ogSiteName',
  'ogType',
  'ogUrl',
  'twitterCard',
  'twitterSite',
  'twitterCreator',
  'twitterTitle',
  'twitterDescription',
  'twitterImage',
]);

interface CommonLinkOptions {
  domain: string;
  slug?: string;
  parameters?: Record<string, unknown>;
  socialMediaTags?: SocialMediaTags;
  metadata?: Record<string, unknown>;
}

export interface DynamicLinkOptions extends CommonLinkOptions {
  iosFallbackUrl?: string;
  androidFallbackUrl?: string;
  fallbackUrl?: string;
}

export interface UnifiedLinkOptions extends CommonLinkOptions {
  iosUrl: string;
  androidUrl: string;
  fallbackUrl: string;
}

/**
 * Parameters for a dynamic link (in-app routing with store fallbacks)
 */
export function dynamicLink(options: DynamicLinkOptions): LinkParameters {
  return { type: 'dynamic', ...options };
}

/**
 * Parameters for a unified link (platform-specific redirects)
 */
export function unifiedLink(options: UnifiedLinkOptions): LinkParameters {
  return { type: 'unified', ...options };
}

function isSocialParameter(key: string): boolean {
  return key.startsWith('og') || SOCIAL_PARAMETER_KEYS.has(key);
}

/**
 * Throw InvalidParameters when a link cannot be created from these parameters
 */
export function validateLinkParameters(params: LinkParameters): void {
  if (!params.domain || params.domain.trim().length === 0) {
    throw invalid('domain is required');
  }
  if (params.type === 'unified') {
    const missing = (['iosUrl', 'androidUrl', 'fallbackUrl'] as const).filter((key) => !params[key]);
    if (missing.length > 0) {
      throw invalid(`unified links require ${missing.join(', ')}`);
    }
  }
}

/**
 * Request body for /sdk/links.
 *
 * Social keys (og*, twitter*) move from parameters to metadata. Metadata is
 * built from socialMediaTags, then those keys, then explicit metadata, later
 * entries overriding earlier ones.
 */
export function linkParametersToJson(params: LinkParameters): Record<string, unknown> {
  const body: Record<string, unknown> = {
    type: params.type,
    domain: params.domain,
  };

  const optionalFields = ['slug', 'iosUrl', 'androidUrl', 'iosFallbackUrl', 'androidFallbackUrl', 'fallbackUrl'] as const;
  for (const key of optionalFields) {
    if (params[key] !== undefined) {
      body[key] = params[key];
    }
  }

  const regular: Record<string, unknown> = {};
  const social: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params.parameters ?? {})) {
    if (isSocialParameter(key)) {
      social[key] = value;
    } else {
      regular[key] = value;
    }
  }
  if (Object.keys(regular).length > 0) {
    body.parameters = regular;
  }

  const metadata: Record<string, unknown> = {
    ...definedEntries(params.socialMediaTags ?? {}),
    ...social,
    ...params.metadata,
  };
  if (Object.keys(metadata).length > 0) {
    body.metadata = metadata;
  }

  return body;
}

function definedEntries(tags: SocialMediaTags): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(tags)) {
    if (typeof value === 'string') {
      result[key] = value;
    }
  }
  return result;
}

function invalid(message: string): ULinkError {
  return new ULinkError({ kind: 'InvalidParameters', message });
}
