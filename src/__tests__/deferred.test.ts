import { DeferredLinkMatcher } from '../deferred';
import { InstallationIdentity } from '../installation';
import { Logger } from '../logger';
import { KEYS } from '../storage';
import { ULinkError } from '../errors';
import { createMockStore, createMockSecureStore } from '../__mocks__/stores';
import { createFakeTransport, createDeferred, ok } from '../__mocks__/transport';
import type { DeviceInfo, TransportResponse } from '../types';

const MATCH = '/sdk/deferred/match';

const deviceInfo: DeviceInfo = {
  platform: 'ios',
  deviceModel: 'iPhone15,2',
  osName: 'iOS',
  osVersion: '17.4',
  screenWidth: 390,
  screenHeight: 844,
  timezone: 'Europe/Berlin',
  language: 'de-DE',
  vendorId: 'vendor-1',
};

function setup(initialStore: Record<string, string> = {}) {
  const fake = createFakeTransport();
  const logger = new Logger(false);
  const store = createMockStore({ [KEYS.INSTALLATION_ID]: 'inst-1', ...initialStore });
  const identity = new InstallationIdentity(store, createMockSecureStore(), logger);
  const ensureBootstrapped = jest.fn(() => Promise.resolve());
  const handleDeepLink = jest.fn((_url: string, _isDeferred: boolean, _matchType?: string) => Promise.resolve(null));
  const matcher = new DeferredLinkMatcher({
    api: { transport: fake.transport, baseUrl: 'https://api.test', headers: async () => ({}) },
    store,
    identity,
    ensureBootstrapped,
    getDeviceInfo: async () => deviceInfo,
    handleDeepLink,
    logger,
  });
  return { fake, store, matcher, ensureBootstrapped, handleDeepLink };
}

describe('DeferredLinkMatcher', () => {
  it('sends the fingerprint and hands a matched link to the resolver', async () => {
    const { fake, store, matcher, handleDeepLink } = setup();
    fake.on(MATCH, ok({ success: true, matched: true, deepLink: 'https://links.example.com/d1', matchType: 'fingerprint' }));

    const result = await matcher.check();

    expect(result).toEqual({ status: 'matched', deepLink: 'https://links.example.com/d1', matchType: 'fingerprint' });
    expect(fake.callsTo(MATCH)[0].body).toEqual({
      installationId: 'inst-1',
      fingerprint: {
        model: 'iPhone15,2',
        osName: 'iOS',
        osVersion: '17.4',
        screenResolution: '390x844',
        timezone: 'Europe/Berlin',
        language: 'de-DE',
        vendorId: 'vendor-1',
      },
    });
    expect(handleDeepLink).toHaveBeenCalledWith('https://links.example.com/d1', true, 'fingerprint');
    expect(store.__getStore()[KEYS.DEFERRED_LINK_CHECKED]).toBe('true');
  });

  it('runs once per installation', async () => {
    const { fake, matcher } = setup();
    fake.on(MATCH, ok({ success: true, matched: false }));

    expect(await matcher.check()).toEqual({ status: 'no_match' });
    expect(await matcher.check()).toEqual({ status: 'skipped' });
    expect(fake.callsTo(MATCH)).toHaveLength(1);
  });

  it('shares the in-flight check between concurrent callers', async () => {
    const { fake, matcher } = setup();
    const response = createDeferred<TransportResponse>();
    fake.on(MATCH, () => response.promise);

    const first = matcher.check();
    const second = matcher.check();
    response.resolve(ok({ success: true, matched: false }));

    expect(await first).toEqual({ status: 'no_match' });
    expect(await second).toEqual({ status: 'no_match' });
    expect(fake.callsTo(MATCH)).toHaveLength(1);
  });

  it('skips without any request when the flag is already stored', async () => {
    const { fake, matcher, ensureBootstrapped } = setup({ [KEYS.DEFERRED_LINK_CHECKED]: 'true' });

    expect(await matcher.check()).toEqual({ status: 'skipped' });
    expect(ensureBootstrapped).not.toHaveBeenCalled();
    expect(fake.calls).toHaveLength(0);
  });

  it('treats a response without a deep link as no match', async () => {
    const { fake, matcher, handleDeepLink } = setup();
    fake.on(MATCH, ok({ success: true, matched: true }));

    expect(await matcher.check()).toEqual({ status: 'no_match' });
    expect(handleDeepLink).not.toHaveBeenCalled();
  });

  it('treats a response without an explicit success flag as no match', async () => {
    const { fake, matcher, handleDeepLink } = setup();
    fake.on(MATCH, ok({ matched: true, deepLink: 'https://links.example.com/d1' }));

    expect(await matcher.check()).toEqual({ status: 'no_match' });
    expect(handleDeepLink).not.toHaveBeenCalled();
  });

  it('marks the check as done even when the request fails', async () => {
    const { fake, store, matcher } = setup();
    fake.on(MATCH, { status: 500, body: null });

    expect(await matcher.check()).toEqual({ status: 'error' });
    expect(store.__getStore()[KEYS.DEFERRED_LINK_CHECKED]).toBe('true');
    expect(await matcher.check()).toEqual({ status: 'skipped' });
  });

  it('waits for a successful bootstrap before marking anything', async () => {
    const { fake, store, matcher, ensureBootstrapped } = setup();
    ensureBootstrapped.mockRejectedValueOnce(new ULinkError({ kind: 'NotInitialized' }));

    expect(await matcher.check()).toEqual({ status: 'error' });
    expect(fake.calls).toHaveLength(0);
    expect(store.__getStore()[KEYS.DEFERRED_LINK_CHECKED]).toBeUndefined();
  });
});
