/**
 * Opaque identifiers for stores and attachment tokens.
 * Uses crypto.randomUUID when available, otherwise a timestamp plus Math.random.
 */

let counter = 0;

function bestUUID(): string {
  const gcrypto: Crypto | undefined = globalThis.crypto;
  if (gcrypto && typeof gcrypto.randomUUID === 'function') {
    return gcrypto.randomUUID();
  }
  counter += 1;
  return `${Date.now().toString(36)}-${counter.toString(36)}-${Math.random().toString(36).slice(2)}`;
}

/**
 * Generate a reasonably unique ID with an optional prefix.
 */
export function randomId(prefix = 'id'): string {
  const core = bestUUID();
  return prefix ? `${prefix}_${core}` : core;
}
