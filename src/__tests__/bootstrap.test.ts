import { BootstrapCoordinator } from '../bootstrap';
import { SessionManager } from '../session';
import { InstallationIdentity } from '../installation';
import { LinkEventBus } from '../events';
import { Logger } from '../logger';
import { KEYS, SECURE_KEYS } from '../storage';
import { ULinkError, isULinkError } from '../errors';
import { createMockStore, createMockSecureStore } from '../__mocks__/stores';
import { createFakeTransport, createDeferred, ok } from '../__mocks__/transport';
import type { InstallationInfo, TransportResponse } from '../types';

const BOOTSTRAP = '/sdk/bootstrap';

function setup(initialStore: Record<string, string> = {}) {
  const fake = createFakeTransport();
  const logger = new Logger(false);
  const store = createMockStore({ [KEYS.INSTALLATION_ID]: 'inst-1', ...initialStore });
  const identity = new InstallationIdentity(
    store,
    createMockSecureStore({ [SECURE_KEYS.PERSISTENT_DEVICE_ID]: 'dev-1' }),
    logger
  );
  const api = { transport: fake.transport, baseUrl: 'https://api.test', headers: async () => ({}) };
  const sessions = new SessionManager({
    api,
    identity,
    buildStartBody: async () => ({}),
    logger,
  });
  const events = new LinkEventBus();
  const buildBody = jest.fn(async (installationId: string, persistentDeviceId: string) => ({
    installationId,
    persistentDeviceId,
  }));
  const bootstrap = new BootstrapCoordinator({ api, identity, sessions, events, buildBody, logger });

  return { fake, store, identity, sessions, events, buildBody, bootstrap };
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

// ─── run ───────────────────────────────────────────────────────────

describe('BootstrapCoordinator.run', () => {
  it('stores the token, adopts the session and returns installation info', async () => {
    const { fake, store, sessions, bootstrap, buildBody } = setup();
    fake.on(BOOTSTRAP, ok({ success: true, installationToken: 'tok-1', sessionId: 's1' }));

    const info = await bootstrap.run();

    expect(info).toEqual({ installationId: 'inst-1', isReinstall: false, persistentDeviceId: 'dev-1' });
    expect(buildBody).toHaveBeenCalledWith('inst-1', 'dev-1');
    expect(fake.callsTo(BOOTSTRAP)[0].body).toEqual({ installationId: 'inst-1', persistentDeviceId: 'dev-1' });
    expect(store.__getStore()[KEYS.INSTALLATION_TOKEN]).toBe('tok-1');
    expect(sessions.getCurrentSessionId()).toBe('s1');
    expect(sessions.getState()).toBe('active');
    expect(bootstrap.succeeded).toBe(true);
    expect(bootstrap.getInstallationInfo()).toEqual(info);
  });

  it('shares one request between concurrent runs', async () => {
    const { fake, bootstrap } = setup();
    const response = createDeferred<TransportResponse>();
    fake.on(BOOTSTRAP, () => response.promise);

    const runs = [bootstrap.run(), bootstrap.run(), bootstrap.run()];
    expect(bootstrap.isRunning).toBe(true);
    response.resolve(ok({ success: true }));
    await Promise.all(runs);

    expect(fake.callsTo(BOOTSTRAP)).toHaveLength(1);
    expect(bootstrap.isRunning).toBe(false);
  });

  it('fails without an explicit success flag', async () => {
    const { fake, bootstrap } = setup();
    fake.on(BOOTSTRAP, ok({ installationToken: 'tok-1' }));

    const error = await captureError(bootstrap.run());

    expect(error.detail).toEqual({ kind: 'BootstrapFailed', message: 'Bootstrap was not successful' });
    expect(bootstrap.failed).toBe(true);
  });

  it('carries the HTTP status and server message', async () => {
    const { fake, bootstrap } = setup();
    fake.on(BOOTSTRAP, { status: 401, body: { error: 'invalid api key' } });

    const error = await captureError(bootstrap.run());

    expect(error.detail).toEqual({ kind: 'BootstrapFailed', status: 401, message: 'invalid api key' });
    expect(error.message).toBe('Bootstrap failed (401): invalid api key');
  });

  it('wraps network failures', async () => {
    const { fake, bootstrap } = setup();
    fake.on(BOOTSTRAP, () => Promise.reject(new ULinkError({ kind: 'NetworkError', message: 'offline' })));

    const error = await captureError(bootstrap.run());

    expect(error.detail).toEqual({ kind: 'BootstrapFailed', message: 'offline' });
  });

  it('keeps the previous token when bootstrap fails', async () => {
    const { fake, store, bootstrap } = setup({ [KEYS.INSTALLATION_TOKEN]: 'tok-old' });
    fake.on(BOOTSTRAP, { status: 500, body: null });

    await captureError(bootstrap.run());

    expect(store.__getStore()[KEYS.INSTALLATION_TOKEN]).toBe('tok-old');
  });

  it('publishes the reinstall event once per instance', async () => {
    const { fake, events, bootstrap } = setup();
    fake.on(
      BOOTSTRAP,
      ok({ success: true, isReinstall: true, previousInstallationId: 'old-1', reinstallDetectedAt: '2024-05-01T10:00:00Z' })
    );
    const received: InstallationInfo[] = [];
    events.reinstall$.subscribe((info) => received.push(info));

    await bootstrap.run();
    await bootstrap.run();

    expect(received).toEqual([
      {
        installationId: 'inst-1',
        isReinstall: true,
        previousInstallationId: 'old-1',
        reinstallDetectedAt: '2024-05-01T10:00:00Z',
        persistentDeviceId: 'dev-1',
      },
    ]);
  });
});

// ─── runSilently ───────────────────────────────────────────────────

describe('BootstrapCoordinator.runSilently', () => {
  it('reports failure without throwing', async () => {
    const { bootstrap } = setup();

    await expect(bootstrap.runSilently()).resolves.toBe(false);
    expect(bootstrap.failed).toBe(true);
  });

  it('recovers after a failure', async () => {
    const { fake, bootstrap } = setup();
    fake.on(BOOTSTRAP, { status: 503, body: 'Service Unavailable' });
    await bootstrap.runSilently();

    fake.on(BOOTSTRAP, ok({ success: true }));

    await expect(bootstrap.runSilently()).resolves.toBe(true);
    expect(bootstrap.succeeded).toBe(true);
    await expect(bootstrap.ensureCompleted()).resolves.toBeUndefined();
  });
});

// ─── ensureCompleted ───────────────────────────────────────────────

describe('BootstrapCoordinator.ensureCompleted', () => {
  it('rejects with NotInitialized before the first run', async () => {
    const { bootstrap } = setup();

    const error = await captureError(bootstrap.ensureCompleted());

    expect(isULinkError(error, 'NotInitialized')).toBe(true);
  });

  it('rejects with the last failure', async () => {
    const { fake, bootstrap } = setup();
    fake.on(BOOTSTRAP, { status: 403, body: { message: 'app disabled' } });
    await bootstrap.runSilently();

    const error = await captureError(bootstrap.ensureCompleted());

    expect(error.detail).toEqual({ kind: 'BootstrapFailed', status: 403, message: 'app disabled' });
  });

  it('waits for a bootstrap in flight', async () => {
    const { fake, bootstrap } = setup();
    const response = createDeferred<TransportResponse>();
    fake.on(BOOTSTRAP, () => response.promise);

    const running = bootstrap.run();
    const guarded = bootstrap.ensureCompleted();
    response.resolve(ok({ success: true }));

    await expect(guarded).resolves.toBeUndefined();
    await running;
  });
});
