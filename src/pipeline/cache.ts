import * as crypto from 'crypto';
import type { SourceName } from '../core/types';

const SOURCE_ORDER: readonly SourceName[] = ['buildings', 'temperatures', 'electricity'];

/** SHA-256 over the three file contents, in a fixed source order. */
export function fingerprintSources(contents: Readonly<Record<SourceName, string>>): string {
  const hash = crypto.createHash('sha256');
  for (const source of SOURCE_ORDER) {
    hash.update(source);
    hash.update('\0');
    hash.update(contents[source]);
    hash.update('\0');
  }
  return hash.digest('hex');
}

/**
 * In-memory memoization of built datasets keyed by input fingerprint. The
 * oldest entry is evicted once the cache holds more than maxEntries.
 */
export class DatasetCache<T> {
  private entries = new Map<string, T>();

  constructor(private readonly maxEntries: number = 4) {}

  public get(fingerprint: string): T | undefined {
    return this.entries.get(fingerprint);
  }

  public set(fingerprint: string, value: T): void {
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, value);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  public get size(): number {
    return this.entries.size;
  }

  public clear(): void {
    this.entries.clear();
  }
}
