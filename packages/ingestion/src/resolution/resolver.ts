import { createLogger } from '../logger';
import { RunSummary } from '../ingestion/progress';
import { DATASET_KEYS, type ObjectStore } from '../storage/objectStore';
import { VenueRegistry } from '../storage/venueRegistry';
import {
  EMPTY_DETAILS,
  VenueLocationTable,
  type VenueLocation,
} from '../storage/venueLocations';
import type { LocationService, LookupMode, LookupOutcome, VenueHint, VenueMatch, VenueQuery } from '../api/types';

const logger = createLogger('resolver');

export interface ResolverDeps {
  store: ObjectStore;
  primary: LocationService;
  secondary: LocationService;
  /** Persist the location dataset after this many venues. */
  flushEvery: number;
}

/**
 * Skips services that exhausted their retries on a rate limit earlier in the
 * same run, so one throttled service does not stall every later venue.
 */
export class ServiceGate {
  private readonly suspended = new Set<string>();

  async lookup(service: LocationService, query: VenueQuery, mode: LookupMode): Promise<LookupOutcome> {
    if (this.suspended.has(service.name)) {
      return { kind: 'failed', reason: `${service.name} suspended for this run`, rateLimited: true };
    }
    const outcome = await service.lookup(query, mode);
    if (outcome.kind === 'failed') {
      logger.warn({ service: service.name, venue: query.venue, reason: outcome.reason }, 'Lookup failed');
      if (outcome.rateLimited) {
        logger.warn({ service: service.name }, 'Suspending service for the rest of the run');
        this.suspended.add(service.name);
      }
    }
    return outcome;
  }

  isSuspended(service: LocationService): boolean {
    return this.suspended.has(service.name);
  }
}

export function queryFor(venue: string, checkinUrl: string | null, existing: VenueLocation | undefined): VenueQuery {
  return {
    venue,
    checkinUrl,
    untappdUrl: existing?.untappdUrl ?? null,
    foursquareUrl: existing?.foursquareUrl ?? null,
    near: existing?.coordinates ?? null,
  };
}

export function resolvedLocation(venue: string, match: VenueMatch): VenueLocation {
  return {
    venue,
    status: 'RESOLVED',
    untappdUrl: match.untappdUrl,
    foursquareUrl: match.foursquareUrl,
    ...match.details,
  };
}

/** Keeps whatever an earlier run already resolved for the venue. */
export function missingLocation(venue: string, query: VenueQuery, existing?: VenueLocation): VenueLocation {
  return {
    venue,
    status: 'MISSING',
    untappdUrl: query.untappdUrl,
    foursquareUrl: query.foursquareUrl,
    address: existing?.address ?? EMPTY_DETAILS.address,
    coordinates: existing?.coordinates ?? EMPTY_DETAILS.coordinates,
    categories: existing?.categories ?? EMPTY_DETAILS.categories,
    inUnitedStates: existing?.inUnitedStates ?? EMPTY_DETAILS.inUnitedStates,
  };
}

function applyHint(query: VenueQuery, hint: VenueHint | null): VenueQuery {
  if (!hint) return query;
  return {
    ...query,
    untappdUrl: hint.untappdUrl ?? query.untappdUrl,
    foursquareUrl: hint.foursquareUrl ?? query.foursquareUrl,
    near: hint.near ?? query.near,
  };
}

/**
 * One venue through the primary then secondary service. The first service
 * that finds the venue supplies all of its location fields.
 */
export async function resolveVenue(
  gate: ServiceGate,
  primary: LocationService,
  secondary: LocationService,
  query: VenueQuery,
  existing?: VenueLocation,
): Promise<VenueLocation> {
  const first = await gate.lookup(primary, query, 'standard');
  if (first.kind === 'found') return resolvedLocation(query.venue, first.match);

  const hinted = first.kind === 'not_found' ? applyHint(query, first.hint) : query;
  const second = await gate.lookup(secondary, hinted, 'standard');
  if (second.kind === 'found') return resolvedLocation(query.venue, second.match);

  return missingLocation(query.venue, hinted, existing);
}

export async function runResolver(deps: ResolverDeps): Promise<RunSummary> {
  const { store } = deps;
  const summary = new RunSummary('resolve');
  const registry = VenueRegistry.fromCsv(await store.get(DATASET_KEYS.venueRegistry));
  const locations = VenueLocationTable.fromCsv(await store.get(DATASET_KEYS.venueLocations));
  const gate = new ServiceGate();

  const candidates = registry.list().filter(entry => {
    const status = locations.get(entry.venue)?.status;
    return status === undefined || status === 'MISSING';
  });
  const settled = registry.size - candidates.length;
  summary.skip(settled);
  logger.info({ candidates: candidates.length, settled }, 'Starting venue resolution');

  let pending = 0;
  const flush = async () => {
    await store.put(DATASET_KEYS.venueLocations, locations.toCsv());
    pending = 0;
  };

  for (const entry of candidates) {
    const existing = locations.get(entry.venue);
    const query = queryFor(entry.venue, entry.firstSeenUrl || null, existing);
    try {
      const location = await resolveVenue(gate, deps.primary, deps.secondary, query, existing);
      locations.set(location);
      pending++;
      if (location.status === 'RESOLVED') {
        logger.info({ venue: entry.venue }, 'Venue resolved');
        summary.succeed();
      } else {
        logger.info({ venue: entry.venue }, 'Venue still missing');
        summary.skip();
      }
    } catch (err) {
      logger.error({ venue: entry.venue, err }, 'Venue resolution failed');
      summary.fail(entry.venue, err);
    }

    if (pending >= deps.flushEvery) await flush();
  }

  if (pending > 0) await flush();
  summary.log(logger);
  return summary;
}
