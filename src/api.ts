import type { Transport, TransportResponse } from './types';
import type { Logger } from './logger';
import { ULinkError } from './errors';
import { isRecord, type JsonObject } from './json';

const DEFAULT_TIMEOUT = 10000; // 10 seconds
const TAG = 'HTTP';

export const SDK_VERSION = '1.0.0';
export const CLIENT_TYPE = 'sdk-js';

export const ENDPOINTS = {
  BOOTSTRAP: '/sdk/bootstrap',
  SESSION_START: '/sdk/sessions/start',
  LINKS: '/sdk/links',
  RESOLVE: '/sdk/resolve',
  DEFERRED_MATCH: '/sdk/deferred/match',
} as const;

export function sessionEndPath(sessionId: string): string {
  return `/sdk/sessions/${encodeURIComponent(sessionId)}/end`;
}

// ============================================
// Transport
// ============================================

export interface FetchInit {
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export interface FetchResponseLike {
  status: number;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

export interface FetchTransportOptions {
  /** Milliseconds before a request is aborted (default: 10000) */
  timeout?: number;
  /** Defaults to the global fetch */
  fetchFn?: FetchLike;
  logger?: Logger;
}

/**
 * Transport on top of fetch.
 *
 * Every HTTP response resolves, whatever its status, so callers can read error
 * bodies. Network failures and timeouts reject with a NetworkError.
 */
export function createFetchTransport(options: FetchTransportOptions = {}): Transport {
  const { timeout = DEFAULT_TIMEOUT, logger } = options;
  const fetchFn: FetchLike = options.fetchFn ?? ((url, init) => fetch(url, init));

  async function send(url: string, init: Omit<FetchInit, 'signal'>): Promise<TransportResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      logger?.debug(TAG, `${init.method} ${url}`);

      const response = await fetchFn(url, { ...init, signal: controller.signal });
      const text = await response.text();
      const body = parseBody(text);

      logger?.debug(TAG, `Response ${response.status}`, body);

      return { status: response.status, body };
    } catch (error) {
      const isTimeout = error instanceof Error && error.name === 'AbortError';
      const message = isTimeout
        ? `Request timed out after ${timeout}ms`
        : `Request failed: ${error instanceof Error ? error.message : String(error)}`;

      logger?.debug(TAG, message);

      throw new ULinkError({ kind: 'NetworkError', message });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  return {
    postJSON: (url, body, headers) => send(url, { method: 'POST', headers, body: JSON.stringify(body) }),
    getJSON: (url, headers) => send(url, { method: 'GET', headers }),
  };
}

function parseBody(text: string): unknown {
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

// ============================================
// Headers
// ============================================

export interface HeaderIdentity {
  installationToken?: string | null;
  installationId?: string | null;
  deviceId?: string | null;
  platform: string;
}

export function buildHeaders(apiKey: string, identity: HeaderIdentity): Record<string, string> {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'X-App-Key': apiKey,
    'X-ULink-Client': CLIENT_TYPE,
    'X-ULink-Client-Version': SDK_VERSION,
    'X-ULink-Client-Platform': identity.platform,
  };
  if (identity.installationToken) {
    headers['X-Installation-Token'] = identity.installationToken;
  }
  if (identity.installationId) {
    headers['X-Installation-Id'] = identity.installationId;
  }
  if (identity.deviceId) {
    headers['X-Device-Id'] = identity.deviceId;
  }
  return headers;
}

// ============================================
// Endpoints
// ============================================

/**
 * Everything an endpoint call needs. Headers are rebuilt per request so a
 * token stored by bootstrap is sent on the very next call.
 */
export interface ApiContext {
  transport: Transport;
  baseUrl: string;
  headers(): Promise<Record<string, string>>;
}

/**
 * Return the JSON object of a 2xx response.
 * Non-2xx responses throw HTTPError with the body; 2xx without an object body throws InvalidResponse.
 */
export function expectJsonObject(response: TransportResponse): JsonObject {
  if (response.status < 200 || response.status > 299) {
    throw new ULinkError({ kind: 'HTTPError', status: response.status, body: response.body });
  }
  if (!isRecord(response.body)) {
    throw new ULinkError({ kind: 'InvalidResponse', message: 'Response body is not a JSON object' });
  }
  return response.body;
}

async function post(ctx: ApiContext, path: string, body: Record<string, unknown>): Promise<JsonObject> {
  const response = await ctx.transport.postJSON(`${ctx.baseUrl}${path}`, body, await ctx.headers());
  return expectJsonObject(response);
}

/**
 * Call /sdk/bootstrap to register the installation
 */
export function bootstrapInstallation(ctx: ApiContext, body: Record<string, unknown>): Promise<JsonObject> {
  return post(ctx, ENDPOINTS.BOOTSTRAP, body);
}

/**
 * Call /sdk/sessions/start
 */
export function startSessionApi(ctx: ApiContext, body: Record<string, unknown>): Promise<JsonObject> {
  return post(ctx, ENDPOINTS.SESSION_START, body);
}

/**
 * Call /sdk/sessions/{id}/end
 */
export function endSessionApi(ctx: ApiContext, sessionId: string): Promise<JsonObject> {
  return post(ctx, sessionEndPath(sessionId), {});
}

/**
 * Call /sdk/links to create a dynamic or unified link
 */
export function createLinkApi(ctx: ApiContext, body: Record<string, unknown>): Promise<JsonObject> {
  return post(ctx, ENDPOINTS.LINKS, body);
}

/**
 * Call /sdk/resolve with the raw incoming URL
 */
export async function resolveLinkApi(ctx: ApiContext, url: string): Promise<JsonObject> {
  const params = new URLSearchParams({ url });
  const response = await ctx.transport.getJSON(
    `${ctx.baseUrl}${ENDPOINTS.RESOLVE}?${params.toString()}`,
    await ctx.headers()
  );
  return expectJsonObject(response);
}

/**
 * Call /sdk/deferred/match with a device fingerprint
 */
export function matchDeferredLinkApi(ctx: ApiContext, body: Record<string, unknown>): Promise<JsonObject> {
  return post(ctx, ENDPOINTS.DEFERRED_MATCH, body);
}
