import os from 'os';
import type { DeviceInfo, DeviceInfoProvider } from './types';
import type { Logger } from './logger';
import { CLIENT_TYPE, SDK_VERSION } from './api';

const TAG = 'Device';

/**
 * Fields sent with bootstrap and session start
 */
const DEVICE_FIELDS = [
  'deviceId',
  'deviceModel',
  'deviceManufacturer',
  'osName',
  'osVersion',
  'appVersion',
  'appBuild',
  'language',
  'timezone',
  'networkType',
  'deviceOrientation',
  'batteryLevel',
  'isCharging',
] as const;

/**
 * Device provider for plain Node.js hosts
 */
export function createDefaultDeviceInfoProvider(): DeviceInfoProvider {
  return {
    getDeviceInfo(): DeviceInfo {
      return {
        platform: process.platform,
        osName: os.type(),
        osVersion: os.release(),
        deviceModel: os.machine(),
        timezone: getTimezone(),
        language: getLanguage(),
      };
    },
  };
}

/**
 * Ask the host for device info. A throwing provider yields a minimal snapshot.
 */
export async function collectDeviceInfo(provider: DeviceInfoProvider, logger: Logger): Promise<DeviceInfo> {
  try {
    return await provider.getDeviceInfo();
  } catch (error) {
    logger.warn(TAG, 'Device info provider failed', error);
    return { platform: 'unknown', timezone: getTimezone(), language: getLanguage() };
  }
}

/**
 * Core device fields present in the snapshot
 */
export function deviceFields(info: DeviceInfo): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const key of DEVICE_FIELDS) {
    if (info[key] !== undefined) {
      fields[key] = info[key];
    }
  }
  return fields;
}

/**
 * `metadata.client` block identifying this library
 */
export function clientMetadata(platform: string): Record<string, string> {
  return { type: CLIENT_TYPE, version: SDK_VERSION, platform };
}

/**
 * Fingerprint for deferred deep link matching
 */
export function buildFingerprint(info: DeviceInfo): Record<string, unknown> {
  const fingerprint: Record<string, unknown> = {
    model: info.deviceModel,
    osName: info.osName,
    osVersion: info.osVersion,
    timezone: info.timezone,
    language: info.language,
    vendorId: info.vendorId,
  };
  if (info.screenWidth !== undefined && info.screenHeight !== undefined) {
    fingerprint.screenResolution = `${Math.round(info.screenWidth)}x${Math.round(info.screenHeight)}`;
  }
  for (const key of Object.keys(fingerprint)) {
    if (fingerprint[key] === undefined) {
      delete fingerprint[key];
    }
  }
  return fingerprint;
}

/**
 * Get device timezone
 */
function getTimezone(): string | undefined {
  try {
    return Intl.DateTimeFormat().resolvedOptions().timeZone;
  } catch {
    return undefined;
  }
}

/**
 * Get device language in BCP 47 format
 */
function getLanguage(): string | undefined {
  try {
    return Intl.DateTimeFormat().resolvedOptions().locale;
  } catch {
    return undefined;
  }
}
