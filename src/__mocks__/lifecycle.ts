import type { LifecycleSource } from '../types';

type Listener = () => void;

/**
 * Lifecycle source driven by the test
 */
export function createManualLifecycle() {
  const listeners = {
    foreground: new Set<Listener>(),
    background: new Set<Listener>(),
    terminate: new Set<Listener>(),
  };

  function subscribe(set: Set<Listener>, listener: Listener) {
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  const source: LifecycleSource = {
    onForeground: (listener) => subscribe(listeners.foreground, listener),
    onBackground: (listener) => subscribe(listeners.background, listener),
    onTerminate: (listener) => subscribe(listeners.terminate, listener),
  };

  return {
    source,
    foreground: () => listeners.foreground.forEach((listener) => listener()),
    background: () => listeners.background.forEach((listener) => listener()),
    terminate: () => listeners.terminate.forEach((listener) => listener()),
    listenerCount: () => listeners.foreground.size + listeners.background.size + listeners.terminate.size,
  };
}
