import type { FetchLike } from '../../src/config.js';

/** Transport that fails every request the way an unreachable host does */
export function createFetch(): FetchLike {
  return () => Promise.reject(new TypeError('fetch failed'));
}
