import { MongoClient, type Collection } from 'mongodb';
import { Logger } from '../../utils/logger.js';
import type { BpmRecord, BpmSource, IBpmCache, NormalizedKey } from '../../types/index.js';

export interface BpmDocument {
  artist_norm: string;
  title_norm: string;
  bpm: number;
  source: BpmSource;
  last_updated: Date;
  metadata: Record<string, unknown>;
}

export interface MongoCacheOptions {
  uri: string;
  database: string;
  collection: string;
}

function toRecord(doc: BpmDocument): BpmRecord {
  return {
    artistNorm: doc.artist_norm,
    titleNorm: doc.title_norm,
    bpm: doc.bpm,
    source: doc.source,
    lastUpdated: doc.last_updated,
    metadata: doc.metadata ?? {},
  };
}

function filterFor(key: NormalizedKey): Pick<BpmDocument, 'artist_norm' | 'title_norm'> {
  return { artist_norm: key.artistNorm, title_norm: key.titleNorm };
}

export class MongoBpmCache implements IBpmCache {
  private client: MongoClient;
  private collection: Collection<BpmDocument>;

  private constructor(client: MongoClient, collection: Collection<BpmDocument>) {
    this.client = client;
    this.collection = collection;
  }

  // Connects eagerly so an unreachable server is detected before the first lookup.
  static async connect(options: MongoCacheOptions): Promise<MongoBpmCache> {
    const client = new MongoClient(options.uri, {
      serverSelectionTimeoutMS: 2000,
      connectTimeoutMS: 2000,
    });
    let cache: MongoBpmCache;
    try {
      await client.connect();
      const collection = client.db(options.database).collection<BpmDocument>(options.collection);
      cache = new MongoBpmCache(client, collection);
      await cache.ensureIndexes();
    } catch (err) {
      await client.close().catch((closeErr: unknown) => {
        Logger.warn(`Failed to close MongoDB client: ${closeErr instanceof Error ? closeErr.message : String(closeErr)}`);
      });
      throw err;
    }
    Logger.info(`Connected to MongoDB cache ${options.database}.${options.collection}`);
    return cache;
  }

  private async ensureIndexes(): Promise<void> {
    try {
      await this.collection.createIndex({ artist_norm: 1, title_norm: 1 }, { unique: true });
      // For administrative sweeps; nothing expires automatically
      await this.collection.createIndex({ last_updated: 1 });
    } catch (err) {
      Logger.error('Failed to create MongoDB cache indexes (non-fatal).', err);
    }
  }

  async get(key: NormalizedKey): Promise<BpmRecord | null> {
    const doc = await this.collection.findOne(filterFor(key), { projection: { _id: 0 } });
    if (!doc) {
      Logger.debug(`Cache miss for ${key.artistNorm} - ${key.titleNorm}`);
      return null;
    }
    Logger.debug(`Cache hit for ${key.artistNorm} - ${key.titleNorm}`);
    return toRecord(doc);
  }

  async put(key: NormalizedKey, bpm: number, source: BpmSource, metadata: Record<string, unknown>): Promise<void> {
    const doc: BpmDocument = {
      ...filterFor(key),
      bpm,
      source,
      last_updated: new Date(),
      metadata,
    };
    await this.collection.updateOne(filterFor(key), { $set: doc }, { upsert: true });
    Logger.info(`Cached BPM for ${key.artistNorm} - ${key.titleNorm}: ${bpm} (${source})`);
  }

  async clear(): Promise<number> {
    const result = await this.collection.deleteMany({});
    Logger.info(`Cleared ${result.deletedCount} cached entries`);
    return result.deletedCount;
  }

  async delete(key: NormalizedKey): Promise<boolean> {
    const result = await this.collection.deleteOne(filterFor(key));
    return result.deletedCount > 0;
  }

  async close(): Promise<void> {
    await this.client.close();
    Logger.info('MongoDB connection closed');
  }
}
