
/**
 * Store backed by a plain object, every method a jest.fn
 */
export function createMockStore(initial: Record<string, string> = {}) {
  let store: Record<string, string> = { ...initial };

  return {
    getItem: jest.fn((key: string) => Promise.resolve(store[key] ?? null)),
    setItem: jest.fn((key: string, value: string) => {
      store[key] = value;
      return Promise.resolve();
    }),
    removeItem: jest.fn((key: string) => {
      delete store[key];
      return Promise.resolve();
    }),
    multiRemove: jest.fn((keys: string[]) => {
      for (const key of keys) {
        delete store[key];
      }
      return Promise.resolve();
    }),

    /** Test helper: reset the in-memory store */
    __resetStore: () => {
      store = {};
    },
    /** Test helper: peek at current store */
    __getStore: () => ({ ...store }),
  };
}

export type MockStore = ReturnType<typeof createMockStore>;

export function createMockSecureStore(initial: Record<string, string> = {}) {
  const store: Record<string, string> = { ...initial };

  return {
    getItemAsync: jest.fn((key: string) => Promise.resolve(store[key] ?? null)),
    setItemAsync: jest.fn((key: string, value: string) => {
      store[key] = value;
      return Promise.resolve();
    }),
    deleteItemAsync: jest.fn((key: string) => {
      delete store[key];
      return Promise.resolve();
    }),

    /** Test helper: peek at current store */
    __getStore: () => ({ ...store }),
  };
}

export type MockSecureStore = ReturnType<typeof createMockSecureStore>;
