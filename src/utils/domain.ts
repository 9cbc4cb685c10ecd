/**
 * Domain helpers shared by the store, cascade and scheduler
 */

/**
 * Normalize a URL or bare host to the domain key used for sensitivity
 * tracking: lower-cased hostname without a leading "www.".
 */
export function getDomain(urlOrHost: string): string {
  const input = urlOrHost.trim();
  if (!input) return 'unknown';

  let host: string;
  try {
    host = new URL(input.includes('://') ? input : `http://${input}`).hostname;
  } catch {
    return 'unknown';
  }

  return host.toLowerCase().replace(/^www\./, '') || 'unknown';
}

/**
 * Stable 32-bit FNV-1a hash, used for assigning domains to worker partitions
 */
export function stableHash(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function partitionForDomain(domain: string, count: number): number {
  if (count <= 1) return 0;
  return stableHash(getDomain(domain)) % count;
}
