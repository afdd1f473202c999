import type { BpmRecord, BpmSource, IBpmCache, NormalizedKey } from '../../types/index.js';

function keyOf(key: NormalizedKey): string {
  return `${key.artistNorm}\u0000${key.titleNorm}`;
}

// Process-local cache; contents are lost on exit.
export class MemoryBpmCache implements IBpmCache {
  private records: Map<string, BpmRecord> = new Map();

  async get(key: NormalizedKey): Promise<BpmRecord | null> {
    const record = this.records.get(keyOf(key));
    return record ? { ...record, metadata: { ...record.metadata } } : null;
  }

  async put(key: NormalizedKey, bpm: number, source: BpmSource, metadata: Record<string, unknown>): Promise<void> {
    this.records.set(keyOf(key), {
      artistNorm: key.artistNorm,
      titleNorm: key.titleNorm,
      bpm,
      source,
      lastUpdated: new Date(),
      metadata: { ...metadata },
    });
  }

  async clear(): Promise<number> {
    const count = this.records.size;
    this.records.clear();
    return count;
  }

  async delete(key: NormalizedKey): Promise<boolean> {
    return this.records.delete(keyOf(key));
  }

  get size(): number {
    return this.records.size;
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
