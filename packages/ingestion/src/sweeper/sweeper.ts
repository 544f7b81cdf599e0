import { createLogger } from '../logger';
import { RunSummary } from '../ingestion/progress';
import { queryFor, resolvedLocation, ServiceGate } from '../resolution/resolver';
import { DATASET_KEYS, type ObjectStore } from '../storage/objectStore';
import { VenueLocationTable, type VenueLocation } from '../storage/venueLocations';
import type { LocationService } from '../api/types';
import { createBackup, pruneBackups, snapshotDate } from './backup';

const logger = createLogger('sweeper');

export interface SweeperDeps {
  store: ObjectStore;
  /** Service queried in premium mode for venues still missing. */
  backfill: LocationService;
  retentionDays: number;
}

export interface BackfillResult {
  resolved: string[];
  unavailable: string[];
  stillMissing: string[];
}

export interface SweepResult extends BackfillResult {
  snapshot: string;
  backedUp: string[];
  deleted: string[];
  summary: RunSummary;
}

/** Fields the earlier lookups resolved are kept; the rest are written as Unavailable. */
function unavailableLocation(existing: VenueLocation): VenueLocation {
  return { ...existing, status: 'UNAVAILABLE' };
}

/**
 * Premium re-attempt for every MISSING venue. A venue the premium lookup
 * cannot find becomes UNAVAILABLE and is never queried again.
 */
export async function backfillMissing(
  store: ObjectStore,
  service: LocationService,
  summary: RunSummary,
): Promise<BackfillResult> {
  const locations = VenueLocationTable.fromCsv(await store.get(DATASET_KEYS.venueLocations));
  const gate = new ServiceGate();
  const result: BackfillResult = { resolved: [], unavailable: [], stillMissing: [] };
  const missing = locations.withStatus('MISSING');
  logger.info({ missing: missing.length }, 'Backfilling missing venues');

  for (const existing of missing) {
    if (gate.isSuspended(service)) {
      result.stillMissing.push(existing.venue);
      continue;
    }
    const query = queryFor(existing.venue, null, existing);
    try {
      const outcome = await gate.lookup(service, query, 'premium');
      if (outcome.kind === 'found') {
        locations.set(resolvedLocation(existing.venue, outcome.match));
        result.resolved.push(existing.venue);
      } else if (outcome.kind === 'not_found') {
        locations.set(unavailableLocation(existing));
        result.unavailable.push(existing.venue);
      } else {
        result.stillMissing.push(existing.venue);
      }
    } catch (err) {
      logger.error({ venue: existing.venue, err }, 'Backfill lookup failed');
      summary.fail(existing.venue, err);
      result.stillMissing.push(existing.venue);
    }
  }

  if (result.resolved.length > 0 || result.unavailable.length > 0) {
    await store.put(DATASET_KEYS.venueLocations, locations.toCsv());
  }
  summary.succeed(result.resolved.length);
  summary.skip(result.unavailable.length + result.stillMissing.length);
  return result;
}

export async function runSweeper(deps: SweeperDeps, runDate: Date): Promise<SweepResult> {
  const { store } = deps;
  const summary = new RunSummary('sweep');
  let backfill: BackfillResult = { resolved: [], unavailable: [], stillMissing: [] };

  try {
    backfill = await backfillMissing(store, deps.backfill, summary);
  } catch (err) {
    // Backups go ahead regardless of lookup or dataset problems
    logger.error({ err }, 'Backfill phase failed');
    summary.fail('backfill', err);
  }

  const snapshot = snapshotDate(runDate);
  const backedUp = await createBackup(store, snapshot);
  const deleted = await pruneBackups(store, runDate, deps.retentionDays);

  logger.info({
    resolved: backfill.resolved.length,
    unavailable: backfill.unavailable.length,
    stillMissing: backfill.stillMissing.length,
    snapshot,
    backedUp: backedUp.length,
    deleted: deleted.length,
  }, 'Sweep complete');
  summary.log(logger);

  return { ...backfill, snapshot, backedUp, deleted, summary };
}
