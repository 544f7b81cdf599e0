import { createLogger } from '../logger';
import { RunSummary } from '../ingestion/progress';
import { AggregateTable } from '../storage/aggregate';
import { CheckpointStore } from '../storage/checkpoint';
import { DATASET_KEYS, postIdFromKey, postKey, postKeyPrefix, type ObjectStore } from '../storage/objectStore';
import { VenueRegistry } from '../storage/venueRegistry';
import { decodeStoredPost, parsePost, PostFormatError } from './postParser';

const logger = createLogger('parser');

export interface ParserDeps {
  store: ObjectStore;
}

interface ParseState {
  aggregate: AggregateTable;
  registry: VenueRegistry;
  checkpoint: CheckpointStore;
  summary: RunSummary;
}

/** Stored post ids of a brewery in (after, upTo], ascending. */
async function pendingPostIds(store: ObjectStore, breweryId: string, after: number | null, upTo: number): Promise<number[]> {
  const keys = await store.list(postKeyPrefix(breweryId));
  return keys
    .map(key => postIdFromKey(breweryId, key))
    .filter((id): id is number => id !== null && (after === null || id > after) && id <= upTo)
    .sort((a, b) => a - b);
}

/**
 * Parses one post and commits its row and venue before the checkpoint moves.
 * A row already in the aggregate is not appended again.
 */
async function parseOne(store: ObjectStore, state: ParseState, breweryId: string, postId: number): Promise<void> {
  const raw = await store.get(postKey(breweryId, postId));

  if (raw === null) {
    logger.warn({ breweryId, postId }, 'Listed post vanished before parsing');
    state.summary.skip();
  } else {
    try {
      const row = parsePost(postId, decodeStoredPost(postId, raw));
      const appended = state.aggregate.append(row);
      const registered = row.location.length > 0
        && state.registry.add({ venue: row.location, firstSeenUrl: row.url });

      if (appended) await store.put(DATASET_KEYS.aggregate, state.aggregate.toCsv());
      if (registered) await store.put(DATASET_KEYS.venueRegistry, state.registry.toCsv());

      if (appended) {
        state.summary.succeed();
      } else {
        logger.debug({ breweryId, postId }, 'Row already in aggregate');
        state.summary.skip();
      }
    } catch (err) {
      if (!(err instanceof PostFormatError)) throw err;
      logger.warn({ breweryId, postId, err: err.message }, 'Skipping malformed post');
      state.summary.skip();
    }
  }

  await state.checkpoint.set(breweryId, String(postId));
}

export async function runParser(deps: ParserDeps, breweryIds: readonly string[]): Promise<RunSummary> {
  const { store } = deps;
  const summary = new RunSummary('parse');
  const ingested = await new CheckpointStore(store, DATASET_KEYS.ingestionCheckpoint).load();
  const state: ParseState = {
    aggregate: AggregateTable.fromCsv(await store.get(DATASET_KEYS.aggregate)),
    registry: VenueRegistry.fromCsv(await store.get(DATASET_KEYS.venueRegistry)),
    checkpoint: await new CheckpointStore(store, DATASET_KEYS.parsingCheckpoint).load(),
    summary,
  };

  logger.info({ rows: state.aggregate.size, venues: state.registry.size }, 'Starting parser');

  for (const breweryId of breweryIds) {
    const upTo = ingested.postId(breweryId);
    const after = state.checkpoint.postId(breweryId);
    if (upTo === null || (after !== null && after >= upTo)) continue;

    try {
      const postIds = await pendingPostIds(store, breweryId, after, upTo);
      logger.info({ breweryId, pending: postIds.length, after, upTo }, 'Parsing posts');
      for (const postId of postIds) {
        await parseOne(store, state, breweryId, postId);
      }
    } catch (err) {
      logger.error({ breweryId, err }, 'Parsing stopped for brewery');
      summary.fail(breweryId, err);
    }
  }

  summary.log(logger);
  return summary;
}
