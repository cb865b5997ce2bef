import { randomBytes } from 'crypto';
import type { Store, SecureStore } from './types';

export const KEYS = {
  INSTALLATION_ID: '@ulink:installation_id',
  INSTALLATION_TOKEN: '@ulink:installation_token',
  LAST_LINK_DATA: '@ulink:last_link_data',
  LAST_LINK_SAVED_AT: '@ulink:last_link_saved_at',
  DEFERRED_LINK_CHECKED: '@ulink:deferred_link_checked',
} as const;

export const SECURE_KEYS = {
  PERSISTENT_DEVICE_ID: 'ulink.persistent_device_id',
} as const;

/**
 * In-memory Store. Default when the host supplies none; nothing survives a restart.
 */
export function createMemoryStore(initial: Record<string, string> = {}): Store {
  const data = new Map<string, string>(Object.entries(initial));

  return {
    async getItem(key) {
      return data.get(key) ?? null;
    },
    async setItem(key, value) {
      data.set(key, value);
    },
    async removeItem(key) {
      data.delete(key);
    },
    async multiRemove(keys) {
      for (const key of keys) {
        data.delete(key);
      }
    },
  };
}

/**
 * In-memory SecureStore. Default when the host supplies none.
 */
export function createMemorySecureStore(initial: Record<string, string> = {}): SecureStore {
  const data = new Map<string, string>(Object.entries(initial));

  return {
    async getItemAsync(key) {
      return data.get(key) ?? null;
    },
    async setItemAsync(key, value) {
      data.set(key, value);
    },
    async deleteItemAsync(key) {
      data.delete(key);
    },
  };
}

/**
 * Generate a UUID v4
 */
export function generateUUID(): string {
  const bytes = randomBytes(16);
  bytes[6] = (bytes[6] & 0x0f) | 0x40; // version 4
  bytes[8] = (bytes[8] & 0x3f) | 0x80; // variant 1
  const hex = bytes.toString('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}
