/**
 * Shared helpers for tests.
 */

/**
 * Deterministic random source (Park-Miller) for generated test documents.
 * Seed must be a positive integer.
 */
export function seededRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 48271) % 2147483647;
    return state / 2147483647;
  };
}
