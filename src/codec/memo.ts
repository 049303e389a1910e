import type { Event } from '../core/event.js';
import { encodeEvent } from './event-codec.js';

/**
 * Wrap a pure function of an immutable object with an identity-keyed cache.
 * Entries live as long as the key object does.
 */
export function memoizeByIdentity<TKey extends object, TValue>(compute: (key: TKey) => TValue): (key: TKey) => TValue {
  const cache = new WeakMap<TKey, TValue>();

  return (key) => {
    const cached = cache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const value = compute(key);
    cache.set(key, value);
    return value;
  };
}

/** Fresh memoized `encodeEvent`; table builds create one per build. */
export function createMemoizedEventEncoder(): (event: Event) => string {
  return memoizeByIdentity(encodeEvent);
}
