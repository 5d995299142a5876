/**
 * Destination key for archiving `key` below `destPrefix`.
 *
 * The part of the key below `rootPrefix` is kept, so date folders survive the
 * move. Keys outside the root keep only their file name.
 */
export function archiveKeyFor(key: string, rootPrefix: string, destPrefix: string): string {
  const relative = rootPrefix && key.startsWith(rootPrefix)
    ? key.slice(rootPrefix.length)
    : key.slice(key.lastIndexOf('/') + 1);
  const base = destPrefix.replace(/\/+$/, '');
  return base ? `${base}/${relative}` : relative;
}

export interface PendingKeyFilter {
  suffix: string;
  /** Prefixes holding already archived objects; keys below them are never pending */
  archivePrefixes: readonly string[];
}

/**
 * Whether a listed key is a file waiting to be ingested
 */
export function isPendingKey(key: string, filter: PendingKeyFilter): boolean {
  if (key.endsWith('/')) return false;
  if (!key.toLowerCase().endsWith(filter.suffix.toLowerCase())) return false;
  return !filter.archivePrefixes.some(prefix => prefix && key.startsWith(prefix));
}

/**
 * Lazily filter a key listing down to pending keys
 */
export async function* pendingKeys(keys: AsyncIterable<string>, filter: PendingKeyFilter): AsyncGenerator<string> {
  for await (const key of keys) {
    if (isPendingKey(key, filter)) {
      yield key;
    }
  }
}
