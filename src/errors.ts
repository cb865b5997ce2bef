import type { ULinkErrorKind } from './types';
import { isRecord, readString } from './json';

/**
 * Payload of a ULinkError, one variant per error kind
 */
export type ULinkErrorDetail =
  | { kind: 'NotInitialized' }
  | { kind: 'InvalidConfiguration'; message: string }
  | { kind: 'NetworkError'; message: string }
  | { kind: 'HTTPError'; status: number; body: unknown }
  | { kind: 'InvalidResponse'; message: string }
  | { kind: 'InvalidParameters'; message: string }
  | { kind: 'SessionError'; message: string }
  | { kind: 'InstallationError'; message: string }
  | { kind: 'PersistenceError'; message: string }
  | { kind: 'DeferredLinkError'; message: string }
  | { kind: 'BootstrapFailed'; status?: number; message: string };

export class ULinkError extends Error {
  readonly detail: ULinkErrorDetail;

  constructor(detail: ULinkErrorDetail) {
    super(describeError(detail));
    this.name = 'ULinkError';
    this.detail = detail;
  }

  get kind(): ULinkErrorKind {
    return this.detail.kind;
  }
}

function describeError(detail: ULinkErrorDetail): string {
  switch (detail.kind) {
    case 'NotInitialized':
      return 'ULink has not been initialized. Call ULink.initialize() first.';
    case 'HTTPError':
      return `HTTP error ${detail.status}`;
    case 'BootstrapFailed':
      return detail.status !== undefined
        ? `Bootstrap failed (${detail.status}): ${detail.message}`
        : `Bootstrap failed: ${detail.message}`;
    default:
      return detail.message;
  }
}

/**
 * Narrow an unknown value to a ULinkError, optionally of a given kind
 */
export function isULinkError(value: unknown, kind?: ULinkErrorKind): value is ULinkError {
  return value instanceof ULinkError && (kind === undefined || value.kind === kind);
}

/**
 * Wrap anything thrown below the engine as a ULinkError.
 * Values that already are ULinkErrors pass through unchanged.
 */
export function toULinkError(error: unknown): ULinkError {
  if (error instanceof ULinkError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ULinkError({ kind: 'NetworkError', message });
}

/**
 * Message for a failed call, preferring what the server said on HTTP errors
 */
export function failureMessage(error: ULinkError): string {
  if (error.detail.kind === 'HTTPError') {
    return errorMessageFromBody(error.detail.body, error.message);
  }
  return error.message;
}

/**
 * Best human-readable message out of an error response body
 */
export function errorMessageFromBody(body: unknown, fallback: string): string {
  if (typeof body === 'string' && body.length > 0) {
    return body;
  }
  if (isRecord(body)) {
    return readString(body, 'error') ?? readString(body, 'message') ?? fallback;
  }
  return fallback;
}
