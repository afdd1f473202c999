import { EventEmitter } from 'events';
import { Logger } from '../utils/logger.js';
import { normalize } from '../utils/normalize.js';
import type { BpmResolver } from './BpmResolver.js';
import type { BpmConsumer, NowPlayingTrack, TrackQueryProducer } from '../types/index.js';

function trackId(track: NowPlayingTrack): string {
  const key = normalize(track.artist, track.title);
  return `${key.artistNorm}\u0000${key.titleNorm}`;
}

/**
 * Follows a now-playing source and hands each new track's BPM to a consumer
 * (typically a metronome). Resolution runs on the caller's event loop, one track at a time.
 */
export class TrackSyncService {
  private resolver: BpmResolver;
  private producer: TrackQueryProducer;
  private consumer: BpmConsumer;
  private lastSynced: string | null = null;
  private currentBpm: number | null = null;
  private stopped = false;
  private immediateRunRequested = false;
  private immediateEmitter = new EventEmitter();

  constructor(resolver: BpmResolver, producer: TrackQueryProducer, consumer: BpmConsumer) {
    this.resolver = resolver;
    this.producer = producer;
    this.consumer = consumer;
  }

  get bpm(): number | null {
    return this.currentBpm;
  }

  /**
   * Returns true when the consumer received a new BPM. An unchanged track, an empty
   * player, or a track without a resolvable tempo returns false.
   */
  async syncOnce(): Promise<boolean> {
    const track = await this.producer.getCurrentTrack();
    if (!track || !track.artist.trim() || !track.title.trim()) {
      Logger.debug('No track currently playing');
      return false;
    }
    const id = trackId(track);
    if (id === this.lastSynced) return false;

    Logger.info(`Now playing: ${track.artist} - ${track.title}${track.player ? ` (${track.player})` : ''}`);
    const bpm = await this.resolver.resolveBpm(track.artist, track.title);
    if (bpm === null) return false;

    this.lastSynced = id;
    this.currentBpm = bpm;
    this.consumer.setBpm(bpm);
    Logger.info(`Synced to ${bpm} BPM`);
    return true;
  }

  async runContinuous(intervalMs: number): Promise<void> {
    this.stopped = false;
    const interval = Math.max(100, intervalMs);
    Logger.info(`Starting track sync loop (checking every ${interval}ms)`);
    while (!this.stopped) {
      try {
        await this.syncOnce();
      } catch (err) {
        Logger.error('Track sync failed; continuing after delay.', err);
      }
      if (this.stopped) break;
      await this.wait(interval);
    }
    Logger.info('Track sync loop stopped');
  }

  stop(): void {
    this.stopped = true;
    this.immediateEmitter.emit('trigger');
  }

  // Wake a pending wait so the next check starts now.
  requestImmediateSync(): void {
    this.immediateRunRequested = true;
    this.immediateEmitter.emit('trigger');
  }

  private async wait(ms: number): Promise<void> {
    if (this.immediateRunRequested) {
      this.immediateRunRequested = false;
      return;
    }
    await new Promise<void>((resolve) => {
      let timer: NodeJS.Timeout | null = null;
      const onTrigger = () => {
        if (timer) clearTimeout(timer);
        this.immediateEmitter.off('trigger', onTrigger);
        resolve();
      };
      timer = setTimeout(() => {
        this.immediateEmitter.off('trigger', onTrigger);
        resolve();
      }, ms);
      this.immediateEmitter.on('trigger', onTrigger);
    });
    this.immediateRunRequested = false;
  }
}
