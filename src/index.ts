#!/usr/bin/env node
import { Command } from 'commander';
import { Logger } from './utils/logger.js';
import { loadConfig } from './utils/config.js';
import { normalize } from './utils/normalize.js';
import { createBpmCache, createBpmResolver } from './services/createResolver.js';
import { isPlausibleBpm } from './modules/extractors/BpmExtractor.js';
import type { IBpmCache } from './types/index.js';

const program = new Command();

program
  .name('tempo-resolver')
  .description('Looks up song tempo from the cache, the GetSongBPM API and songbpm.com.')
  .option('-c, --config <path>', 'Path to config.yaml (defaults to CONFIG_PATH or ./config/config.yaml)');

function configPath(): string | undefined {
  const opts = program.opts<{ config?: string }>();
  return opts.config;
}

program
  .command('resolve')
  .description('Resolve the BPM for a track')
  .argument('<artist>', 'Artist name')
  .argument('<title>', 'Song title')
  .option('--json', 'Print the full resolution result as JSON')
  .action(async (artist: string, title: string, options: { json?: boolean }) => {
    const resolver = await createBpmResolver(loadConfig(configPath()));
    try {
      const result = await resolver.resolve(artist, title);
      if (!result) {
        Logger.warn(`No BPM found for ${artist} - ${title}`);
        process.exitCode = 1;
        return;
      }
      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        console.log(`${result.bpm} BPM (${result.source})`);
      }
    } finally {
      await resolver.close();
    }
  });

program
  .command('status')
  .description('Show which tiers are enabled')
  .action(async () => {
    const resolver = await createBpmResolver(loadConfig(configPath()));
    try {
      const status = resolver.describe();
      console.log(`cache:   ${status.hasCache ? 'enabled' : 'disabled'}`);
      console.log(`api:     ${status.hasApi ? 'enabled' : 'disabled'}`);
      console.log(`scraper: ${status.hasScraper ? 'enabled' : 'disabled'}`);
    } finally {
      await resolver.close();
    }
  });

const cacheCmd = program.command('cache').description('Administer the BPM cache');

async function withCache(fn: (cache: IBpmCache) => Promise<void>): Promise<void> {
  const cache = await createBpmCache(loadConfig(configPath()));
  if (!cache) {
    Logger.error('Cache is disabled or unreachable.');
    process.exitCode = 1;
    return;
  }
  try {
    await fn(cache);
  } finally {
    await cache.close();
  }
}

cacheCmd
  .command('get')
  .argument('<artist>')
  .argument('<title>')
  .action(async (artist: string, title: string) => {
    await withCache(async (cache) => {
      const record = await cache.get(normalize(artist, title));
      if (!record) {
        console.log('Not cached.');
        process.exitCode = 1;
        return;
      }
      console.log(JSON.stringify(record, null, 2));
    });
  });

cacheCmd
  .command('set')
  .argument('<artist>')
  .argument('<title>')
  .argument('<bpm>', 'Tempo in beats per minute', (v) => parseFloat(v))
  .action(async (artist: string, title: string, bpm: number) => {
    if (!isPlausibleBpm(bpm)) {
      Logger.error(`Refusing to cache implausible BPM: ${bpm}`);
      process.exitCode = 1;
      return;
    }
    await withCache(async (cache) => {
      await cache.put(normalize(artist, title), bpm, 'cache', { source: 'manual' });
      console.log(`Cached ${artist} - ${title}: ${bpm} BPM`);
    });
  });

cacheCmd
  .command('delete')
  .argument('<artist>')
  .argument('<title>')
  .action(async (artist: string, title: string) => {
    await withCache(async (cache) => {
      const removed = await cache.delete(normalize(artist, title));
      console.log(removed ? 'Deleted.' : 'Not cached.');
    });
  });

cacheCmd
  .command('clear')
  .description('Remove every cached BPM')
  .action(async () => {
    await withCache(async (cache) => {
      const count = await cache.clear();
      console.log(`Cleared ${count} cached entries.`);
    });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  Logger.error('Command failed.', err);
  process.exitCode = 1;
});
