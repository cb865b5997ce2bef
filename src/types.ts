/**
 * Configuration options for the ULink engine
 */
export interface ULinkConfig {
  /**
   * Your ULink API key from the dashboard. Sent as X-App-Key header.
   * Required.
   */
  apiKey: string;

  /**
   * Base URL of the ULink API (default: https://api.ulink.ly)
   * Only needed for local development or when proxying through your own domain.
   */
  baseUrl?: string;

  /**
   * Enable debug logging (default: false)
   * When true, logs engine operations to console and emits entries on `logs$`
   */
  debug?: boolean;

  /**
   * Handle incoming URLs automatically (default: true)
   *
   * When true, a pending initial URL is resolved right after bootstrap and
   * `handleIncomingUrl()` forwards URLs to the resolver.
   */
  enableDeepLinkIntegration?: boolean;

  /**
   * Persist the last resolved link for later retrieval (default: true)
   */
  persistLastLinkData?: boolean;

  /**
   * Time-to-live of the persisted last link, in seconds (default: 24 hours)
   * Set to null to keep it until it is cleared or overwritten.
   */
  lastLinkTTL?: number | null;

  /**
   * Clear the persisted last link after it has been read once (default: false)
   */
  clearLastLinkOnRead?: boolean;

  /**
   * Never persist parameters or metadata of the last link (default: false)
   */
  redactAllParametersInLastLink?: boolean;

  /**
   * Keys removed from parameters and metadata before the last link is persisted
   */
  redactedParameterKeysInLastLink?: string[];

  /**
   * Check for a deferred deep link after the first successful bootstrap (default: true)
   *
   * Set to false to call checkDeferredLink() yourself (e.g. after consent).
   */
  autoCheckDeferredLink?: boolean;

  /**
   * Timeout in milliseconds for requests made by the default transport (default: 10000)
   */
  requestTimeout?: number;
}

/**
 * Config with every default applied. Frozen for the lifetime of an engine instance.
 */
export interface ResolvedConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly debug: boolean;
  readonly enableDeepLinkIntegration: boolean;
  readonly persistLastLinkData: boolean;
  readonly lastLinkTTL: number | null;
  readonly clearLastLinkOnRead: boolean;
  readonly redactAllParametersInLastLink: boolean;
  readonly redactedParameterKeysInLastLink: readonly string[];
  readonly autoCheckDeferredLink: boolean;
  readonly requestTimeout: number;
}

// ============================================
// Links
// ============================================

export type LinkType = 'dynamic' | 'unified';

/**
 * Open Graph tags attached to a link
 */
export interface SocialMediaTags {
  ogTitle?: string;
  ogDescription?: string;
  ogImage?: string;
}

/**
 * Data resolved from an incoming link
 */
export interface ResolvedLinkData {
  slug?: string;
  iosUrl?: string;
  androidUrl?: string;
  iosFallbackUrl?: string;
  androidFallbackUrl?: string;
  fallbackUrl?: string;
  /**
   * Custom parameters attached to the link
   */
  parameters?: Record<string, unknown>;
  socialMediaTags?: SocialMediaTags;
  metadata?: Record<string, unknown>;
  /**
   * Decides which channel receives the link: `unifiedLinks$` or `dynamicLinks$`
   */
  type: LinkType;
  /**
   * True when the link was attributed after install via the deferred matcher
   */
  isDeferred: boolean;
  /**
   * How the deferred match was made (e.g. 'fingerprint'), as reported by the server
   */
  matchType?: string;
  /** ISO 8601 timestamp */
  resolvedAt?: string;
  /**
   * Response body the link was parsed from. Never persisted.
   */
  rawResponse?: Record<string, unknown>;
}

/**
 * Parameters for creating a link. Build with dynamicLink() or unifiedLink().
 */
export interface LinkParameters {
  type: LinkType;
  domain: string;
  slug?: string;
  iosUrl?: string;
  androidUrl?: string;
  iosFallbackUrl?: string;
  androidFallbackUrl?: string;
  fallbackUrl?: string;
  parameters?: Record<string, unknown>;
  socialMediaTags?: SocialMediaTags;
  metadata?: Record<string, unknown>;
}

/**
 * Result of createLink() and resolveLink()
 */
export interface LinkResponse {
  success: boolean;
  /** Short URL of a created link */
  url?: string;
  error?: string;
  /** Kind of ULinkError behind a failure, when there was one */
  errorKind?: ULinkErrorKind;
  data?: Record<string, unknown>;
}

// ============================================
// Installation & sessions
// ============================================

/**
 * Installation snapshot produced by a bootstrap
 */
export interface InstallationInfo {
  installationId: string;
  isReinstall: boolean;
  /** Only set when isReinstall is true */
  previousInstallationId?: string;
  /** Only set when isReinstall is true */
  reinstallDetectedAt?: string;
  persistentDeviceId?: string;
}

export type SessionState = 'idle' | 'initializing' | 'active' | 'ending' | 'failed';

export interface Session {
  sessionId: string;
  installationId: string;
  /** Epoch milliseconds */
  startedAt: number;
  /** Set together with duration when the session ends */
  endedAt?: number;
  /** Milliseconds */
  duration?: number;
  state: SessionState;
}

/**
 * Result returned by startSession()
 */
export interface SessionResult {
  success: boolean;
  sessionId?: string;
  error?: string;
}

/**
 * Result returned by checkDeferredLink()
 *
 * - 'matched': a deferred link was found and handed to the resolver
 * - 'no_match': the server found no click for this device
 * - 'skipped': the check already ran for this installation
 * - 'error': the request failed (marked as done), or no bootstrap has succeeded yet (left pending)
 */
export interface DeferredMatchResult {
  status: 'matched' | 'no_match' | 'skipped' | 'error';
  deepLink?: string;
  matchType?: string;
}

// ============================================
// Logging
// ============================================

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

export interface LogEntry {
  level: LogLevel;
  tag: string;
  message: string;
  /** Epoch milliseconds */
  timestamp: number;
}

// ============================================
// Collaborators
// ============================================

/**
 * Device and app snapshot supplied by the host
 */
export interface DeviceInfo {
  platform: string;
  deviceId?: string;
  deviceModel?: string;
  deviceManufacturer?: string;
  osName?: string;
  osVersion?: string;
  appVersion?: string;
  appBuild?: string;
  language?: string;
  timezone?: string;
  locale?: string;
  networkType?: string;
  deviceOrientation?: string;
  batteryLevel?: number;
  isCharging?: boolean;
  screenWidth?: number;
  screenHeight?: number;
  /** Stable per-vendor identifier used for deferred matching */
  vendorId?: string;
}

export interface DeviceInfoProvider {
  getDeviceInfo(): DeviceInfo | Promise<DeviceInfo>;
}

/**
 * General-purpose key-value store (same shape as AsyncStorage)
 */
export interface Store {
  getItem(key: string): Promise<string | null>;
  setItem(key: string, value: string): Promise<void>;
  removeItem(key: string): Promise<void>;
  multiRemove(keys: string[]): Promise<void>;
}

/**
 * Secure key-value store (same shape as expo-secure-store)
 */
export interface SecureStore {
  getItemAsync(key: string): Promise<string | null>;
  setItemAsync(key: string, value: string): Promise<void>;
  deleteItemAsync(key: string): Promise<void>;
}

/**
 * Response from a transport call. Resolved for every HTTP status;
 * body is parsed JSON when possible, raw text otherwise, null when empty.
 */
export interface TransportResponse {
  status: number;
  body: unknown;
}

/**
 * HTTP transport. Rejects with a NetworkError ULinkError when no response was received.
 */
export interface Transport {
  postJSON(url: string, body: Record<string, unknown>, headers: Record<string, string>): Promise<TransportResponse>;
  getJSON(url: string, headers: Record<string, string>): Promise<TransportResponse>;
}

export type Unsubscribe = () => void;

/**
 * Host application lifecycle signals
 */
export interface LifecycleSource {
  onForeground(listener: () => void): Unsubscribe;
  onBackground(listener: () => void): Unsubscribe;
  onTerminate(listener: () => void): Unsubscribe;
}

/**
 * Collaborators handed to ULink.initialize(). Every field is optional.
 */
export interface ULinkDependencies {
  transport?: Transport;
  deviceInfo?: DeviceInfoProvider;
  store?: Store;
  secureStore?: SecureStore;
  lifecycle?: LifecycleSource;
  /**
   * URL the app was launched with; resolved after the first successful bootstrap
   */
  initialUrl?: string;
  /** Clock used for sessions and last-link TTL (default: Date.now) */
  now?: () => number;
}

export type ULinkErrorKind =
  | 'NotInitialized'
  | 'InvalidConfiguration'
  | 'NetworkError'
  | 'HTTPError'
  | 'InvalidResponse'
  | 'InvalidParameters'
  | 'SessionError'
  | 'InstallationError'
  | 'PersistenceError'
  | 'DeferredLinkError'
  | 'BootstrapFailed';
