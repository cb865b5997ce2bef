import type { Transport, TransportResponse } from '../types';

export interface RecordedCall {
  method: 'GET' | 'POST';
  url: string;
  path: string;
  body?: Record<string, unknown>;
  headers: Record<string, string>;
}

type Handler = (call: RecordedCall) => TransportResponse | Promise<TransportResponse>;

/**
 * Transport answering by request path. Unrouted paths get a 404.
 */
export function createFakeTransport() {
  const routes = new Map<string, Handler>();
  const calls: RecordedCall[] = [];

  async function dispatch(call: RecordedCall): Promise<TransportResponse> {
    calls.push(call);
    const handler = routes.get(call.path);
    if (!handler) {
      return { status: 404, body: { success: false, error: `No route for ${call.path}` } };
    }
    return handler(call);
  }

  const transport: Transport = {
    postJSON: jest.fn((url: string, body: Record<string, unknown>, headers: Record<string, string>) =>
      dispatch({ method: 'POST', url, path: new URL(url).pathname, body, headers })
    ),
    getJSON: jest.fn((url: string, headers: Record<string, string>) =>
      dispatch({ method: 'GET', url, path: new URL(url).pathname, headers })
    ),
  };

  return {
    transport,
    calls,
    /** Answer requests to `path` with a fixed response or a handler */
    on(path: string, response: TransportResponse | Handler): void {
      routes.set(path, typeof response === 'function' ? response : () => response);
    },
    callsTo(path: string): RecordedCall[] {
      return calls.filter((call) => call.path === path);
    },
  };
}

export type FakeTransport = ReturnType<typeof createFakeTransport>;

export function ok(body: unknown): TransportResponse {
  return { status: 200, body };
}

/**
 * Promise resolved from the outside, for holding a response in flight
 */
export function createDeferred<T>() {
  let settle: (value: T) => void = () => undefined;
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: (value: T) => settle(value) };
}

/**
 * Let every pending promise callback run
 */
export async function flushPromises(): Promise<void> {
  for (let i = 0; i < 5; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}
