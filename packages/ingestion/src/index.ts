#!/usr/bin/env node
import 'dotenv/config';
import type { Pool } from 'pg';
import { FoursquareVenueService } from './api/foursquare';
import { RssFeedSource } from './api/feed';
import type { RetryPolicy } from './api/http';
import { UntappdVenueService } from './api/untappd';
import { loadConfig, requireFoursquare, type AppConfig } from './config';
import { closeDb, getDb, getPool } from './db/client';
import { JobLockedError, withJobLock } from './db/lock';
import { runMigrations } from './db/migrate';
import { PostgresObjectStore } from './db/objectStore';
import { runIngestion } from './ingestion/ingestor';
import { createCliLogger } from './logger';
import { runParser } from './parsing/parser';
import { runResolver } from './resolution/resolver';
import type { ObjectStore } from './storage/objectStore';
import { listSnapshots, parseSnapshotDate, restoreSnapshot, SnapshotNotFoundError } from './sweeper/backup';
import { runSweeper } from './sweeper/sweeper';

const logger = createCliLogger();

const COMMANDS = ['ingest', 'parse', 'resolve', 'sweep', 'restore', 'all'] as const;
type Command = typeof COMMANDS[number];
type Stage = Exclude<Command, 'restore' | 'all'>;

// resolve and sweep both write venue locations and must never overlap
const STAGE_LOCKS: Record<Stage, string> = {
  ingest: 'ingest',
  parse: 'parse',
  resolve: 'venue-locations',
  sweep: 'venue-locations',
};

const USAGE = `Usage: checkin-harvester <command>

Commands:
  ingest            store new posts from every tracked brewery feed
  parse             parse stored posts into the aggregate dataset
  resolve           look up location data for new and missing venues
  sweep [date]      backfill missing venues, back up datasets, prune old backups
  restore <date>    copy the backup snapshot of <date> over the live datasets
  all               ingest, parse, resolve and sweep in order`;

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some(command => command === value);
}

function retryPolicy(config: AppConfig): RetryPolicy {
  return { maxAttempts: config.lookup.maxAttempts, backoffMs: config.lookup.backoffMs };
}

function createFoursquare(config: AppConfig): FoursquareVenueService {
  return new FoursquareVenueService({
    apiUrl: config.foursquareApiUrl,
    credentials: requireFoursquare(config),
    timeoutMs: config.lookup.timeoutMs,
    minIntervalMs: config.lookup.foursquareMinIntervalMs,
    policy: retryPolicy(config),
  });
}

function parseDateArg(value: string | undefined): Date | null {
  if (value === undefined) return null;
  const date = parseSnapshotDate(value);
  if (!date) throw new Error(`Expected a yyyy-MM-dd date, got "${value}"`);
  return date;
}

async function runStage(stage: Stage, config: AppConfig, store: ObjectStore, dateArg: string | undefined): Promise<void> {
  switch (stage) {
    case 'ingest': {
      const feed = new RssFeedSource({
        baseUrl: config.feedBaseUrl,
        timeoutMs: config.lookup.timeoutMs,
        policy: retryPolicy(config),
      });
      await runIngestion({ store, feed }, config.breweries);
      return;
    }
    case 'parse':
      await runParser({ store }, config.breweries);
      return;
    case 'resolve': {
      const primary = new UntappdVenueService({
        baseUrl: config.untappdBaseUrl,
        timeoutMs: config.lookup.timeoutMs,
        minIntervalMs: config.lookup.untappdMinIntervalMs,
        policy: retryPolicy(config),
      });
      await runResolver({
        store,
        primary,
        secondary: createFoursquare(config),
        flushEvery: config.resolverFlushEvery,
      });
      return;
    }
    case 'sweep': {
      const runDate = parseDateArg(dateArg) ?? new Date();
      await runSweeper({ store, backfill: createFoursquare(config), retentionDays: config.retentionDays }, runDate);
      return;
    }
  }
}

async function withLocks<T>(pool: Pool, names: string[], fn: () => Promise<T>): Promise<T> {
  const [first, ...rest] = names;
  if (first === undefined) return fn();
  return withJobLock(pool, first, () => withLocks(pool, rest, fn));
}

async function main() {
  const [command, arg] = process.argv.slice(2);
  if (!isCommand(command)) {
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  try {
    const config = loadConfig();
    const pool = getPool(config.db);
    const db = getDb(config.db);
    await runMigrations(db);
    const store = new PostgresObjectStore(db);

    logger.info({ command, breweries: config.breweries.length }, 'checkin-harvester starting');

    if (command === 'restore') {
      const date = arg;
      if (date === undefined || parseSnapshotDate(date) === null) {
        throw new Error('restore needs a snapshot date (yyyy-MM-dd)');
      }
      const locks = [...new Set(Object.values(STAGE_LOCKS))];
      try {
        await withLocks(pool, locks, () => restoreSnapshot(store, date));
      } catch (err) {
        if (err instanceof SnapshotNotFoundError) {
          logger.error({ available: await listSnapshots(store) }, err.message);
          process.exitCode = 1;
          return;
        }
        throw err;
      }
    } else {
      const stages: Stage[] = command === 'all' ? ['ingest', 'parse', 'resolve', 'sweep'] : [command];
      for (const stage of stages) {
        await withJobLock(pool, STAGE_LOCKS[stage], () => runStage(stage, config, store, arg));
      }
    }
  } catch (err) {
    if (err instanceof JobLockedError) {
      logger.warn({ lock: err.lockName }, 'Previous invocation still running, skipping');
      return;
    }
    logger.error(err, 'Fatal error');
    process.exitCode = 1;
  } finally {
    await closeDb();
  }
}

main().catch(err => {
  logger.error(err, 'Unhandled error');
  process.exitCode = 1;
});
