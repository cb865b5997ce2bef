/**
 * ulink-engine
 *
 * Deep link creation, resolution, deferred attribution and session tracking
 * for ULink.
 *
 * @example
 * ```typescript
 * import { ULink, dynamicLink } from 'ulink-engine';
 *
 * // 1. Initialize once on app start
 * const client = await ULink.initialize({ apiKey: 'your-api-key' });
 *
 * // 2. React to resolved links (the latest one is replayed to late subscribers)
 * client.dynamicLinks$.subscribe((link) => openScreen(link.parameters));
 * client.unifiedLinks$.subscribe((link) => redirect(link.fallbackUrl));
 *
 * // 3. Forward URLs the app receives
 * await client.handleIncomingUrl(url);
 *
 * // 4. Create links
 * const response = await client.createLink(
 *   dynamicLink({ domain: 'links.example.com', parameters: { promo: 'SUMMER' } })
 * );
 * ```
 *
 * @packageDocumentation
 */

// Main SDK
export { ULink, ULinkSDK, ULinkClient } from './ULink';

// Link builders
export { dynamicLink, unifiedLink, linkParametersToJson, validateLinkParameters } from './parameters';
export type { DynamicLinkOptions, UnifiedLinkOptions } from './parameters';

// Collaborator defaults
export { createFetchTransport, SDK_VERSION } from './api';
export type { FetchLike, FetchInit, FetchResponseLike, FetchTransportOptions } from './api';
export { createDefaultDeviceInfoProvider } from './device';
export { createMemoryStore, createMemorySecureStore } from './storage';
export { resolveConfig } from './config';

// Errors
export { ULinkError, isULinkError } from './errors';
export type { ULinkErrorDetail } from './errors';

// Types - Configuration
export type { ULinkConfig, ResolvedConfig, ULinkDependencies } from './types';

// Types - Links
export type { LinkType, LinkParameters, LinkResponse, ResolvedLinkData, SocialMediaTags, DeferredMatchResult } from './types';

// Types - Installation & sessions
export type { InstallationInfo, Session, SessionResult, SessionState } from './types';

// Types - Collaborators
export type {
  DeviceInfo,
  DeviceInfoProvider,
  Store,
  SecureStore,
  Transport,
  TransportResponse,
  LifecycleSource,
  Unsubscribe,
  LogEntry,
  LogLevel,
  ULinkErrorKind,
} from './types';
