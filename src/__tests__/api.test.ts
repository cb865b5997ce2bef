import {
  createFetchTransport,
  buildHeaders,
  expectJsonObject,
  bootstrapInstallation,
  endSessionApi,
  resolveLinkApi,
  createLinkApi,
  SDK_VERSION,
  type FetchInit,
  type FetchResponseLike,
} from '../api';
import { ULinkError, isULinkError } from '../errors';
import { createFakeTransport, ok } from '../__mocks__/transport';

function response(status: number, text: string): FetchResponseLike {
  return { status, text: () => Promise.resolve(text) };
}

function mockFetch() {
  return jest.fn<Promise<FetchResponseLike>, [string, FetchInit]>();
}

async function captureError(promise: Promise<unknown>): Promise<ULinkError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ULinkError) return error;
    throw error;
  }
  throw new Error('expected a rejection');
}

// ─── createFetchTransport ──────────────────────────────────────────

describe('createFetchTransport', () => {
  it('POSTs a JSON body and parses the JSON response', async () => {
    const fetchFn = mockFetch();
    fetchFn.mockResolvedValueOnce(response(200, '{"success":true,"sessionId":"s1"}'));
    const transport = createFetchTransport({ fetchFn });

    const result = await transport.postJSON('https://api.test/sdk/sessions/start', { a: 1 }, { 'X-App-Key': 'test-key' });

    expect(result).toEqual({ status: 200, body: { success: true, sessionId: 's1' } });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('https://api.test/sdk/sessions/start');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({ 'X-App-Key': 'test-key' });
    expect(init.body).toBe('{"a":1}');
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it('GETs without a body', async () => {
    const fetchFn = mockFetch();
    fetchFn.mockResolvedValueOnce(response(200, '{"success":true}'));
    const transport = createFetchTransport({ fetchFn });

    await transport.getJSON('https://api.test/sdk/resolve?url=x', {});

    const [, init] = fetchFn.mock.calls[0];
    expect(init.method).toBe('GET');
    expect(init.body).toBeUndefined();
  });

  it('resolves error statuses with their body', async () => {
    const fetchFn = mockFetch();
    fetchFn.mockResolvedValueOnce(response(404, '{"error":"not found"}'));
    const transport = createFetchTransport({ fetchFn });

    expect(await transport.getJSON('https://api.test/x', {})).toEqual({ status: 404, body: { error: 'not found' } });
  });

  it('keeps non-JSON bodies as text and empty bodies as null', async () => {
    const fetchFn = mockFetch();
    fetchFn.mockResolvedValueOnce(response(502, 'Bad Gateway')).mockResolvedValueOnce(response(204, ''));
    const transport = createFetchTransport({ fetchFn });

    expect(await transport.getJSON('https://api.test/x', {})).toEqual({ status: 502, body: 'Bad Gateway' });
    expect(await transport.getJSON('https://api.test/x', {})).toEqual({ status: 204, body: null });
  });

  it('rejects with NetworkError when fetch fails', async () => {
    const fetchFn = mockFetch();
    fetchFn.mockRejectedValueOnce(new Error('ECONNRESET'));
    const transport = createFetchTransport({ fetchFn });

    const error = await captureError(transport.getJSON('https://api.test/x', {}));

    expect(error.detail).toEqual({ kind: 'NetworkError', message: 'Request failed: ECONNRESET' });
  });

  it('aborts after the timeout', async () => {
    const fetchFn = mockFetch();
    fetchFn.mockImplementationOnce(
      (_url, init) =>
        new Promise<FetchResponseLike>((_resolve, reject) => {
          init.signal.addEventListener('abort', () => {
            const abort = new Error('The operation was aborted');
            abort.name = 'AbortError';
            reject(abort);
          });
        })
    );
    const transport = createFetchTransport({ timeout: 5, fetchFn });

    const error = await captureError(transport.getJSON('https://api.test/x', {}));

    expect(error.detail).toEqual({ kind: 'NetworkError', message: 'Request timed out after 5ms' });
  });
});

// ─── buildHeaders ──────────────────────────────────────────────────

describe('buildHeaders', () => {
  it('includes identity headers when known', () => {
    expect(
      buildHeaders('test-key', {
        installationToken: 'tok-1',
        installationId: 'inst-1',
        deviceId: 'dev-1',
        platform: 'android',
      })
    ).toEqual({
      'Content-Type': 'application/json',
      'X-App-Key': 'test-key',
      'X-ULink-Client': 'sdk-js',
      'X-ULink-Client-Version': SDK_VERSION,
      'X-ULink-Client-Platform': 'android',
      'X-Installation-Token': 'tok-1',
      'X-Installation-Id': 'inst-1',
      'X-Device-Id': 'dev-1',
    });
  });

  it('omits identity headers that are not known yet', () => {
    const headers = buildHeaders('test-key', { installationToken: null, platform: 'linux' });

    expect(headers).not.toHaveProperty('X-Installation-Token');
    expect(headers).not.toHaveProperty('X-Installation-Id');
    expect(headers).not.toHaveProperty('X-Device-Id');
  });
});

// ─── endpoints ─────────────────────────────────────────────────────

describe('endpoints', () => {
  function context() {
    const fake = createFakeTransport();
    const ctx = { transport: fake.transport, baseUrl: 'https://api.test', headers: async () => ({ 'X-App-Key': 'test-key' }) };
    return { fake, ctx };
  }

  it('posts to /sdk/bootstrap with the context headers', async () => {
    const { fake, ctx } = context();
    fake.on('/sdk/bootstrap', ok({ success: true }));

    expect(await bootstrapInstallation(ctx, { installationId: 'inst-1' })).toEqual({ success: true });
    expect(fake.calls[0]).toEqual({
      method: 'POST',
      url: 'https://api.test/sdk/bootstrap',
      path: '/sdk/bootstrap',
      body: { installationId: 'inst-1' },
      headers: { 'X-App-Key': 'test-key' },
    });
  });

  it('encodes the session id in the end path', async () => {
    const { fake, ctx } = context();
    fake.on('/sdk/sessions/a%2Fb/end', ok({ success: true }));

    await endSessionApi(ctx, 'a/b');

    expect(fake.calls[0].url).toBe('https://api.test/sdk/sessions/a%2Fb/end');
  });

  it('puts the URL to resolve in the query string', async () => {
    const { fake, ctx } = context();
    fake.on('/sdk/resolve', ok({ success: true }));

    await resolveLinkApi(ctx, 'https://links.example.com/a b');

    expect(fake.calls[0].url).toBe('https://api.test/sdk/resolve?url=https%3A%2F%2Flinks.example.com%2Fa+b');
  });

  it('throws HTTPError with the body on error statuses', async () => {
    const { fake, ctx } = context();
    fake.on('/sdk/links', { status: 422, body: { error: 'slug taken' } });

    const error = await captureError(createLinkApi(ctx, {}));

    expect(error.detail).toEqual({ kind: 'HTTPError', status: 422, body: { error: 'slug taken' } });
  });
});

describe('expectJsonObject', () => {
  it('rejects 2xx responses without an object body', () => {
    let caught: unknown = null;
    try {
      expectJsonObject({ status: 200, body: ['not', 'an', 'object'] });
    } catch (error) {
      caught = error;
    }
    expect(isULinkError(caught, 'InvalidResponse')).toBe(true);
  });
});
