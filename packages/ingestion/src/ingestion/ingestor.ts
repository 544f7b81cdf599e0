import { createLogger } from '../logger';
import { extractPostId } from './normalizer';
import { RunSummary } from './progress';
import { CheckpointStore } from '../storage/checkpoint';
import { DATASET_KEYS, postKey, type ObjectStore } from '../storage/objectStore';
import type { FeedPost, FeedSource, StoredPost } from '../api/types';

const logger = createLogger('ingestor');

export class FeedOrderError extends Error {
  constructor(readonly breweryId: string, previousId: number, nextId: number) {
    super(`Feed for brewery ${breweryId} is not newest-first: ${nextId} follows ${previousId}`);
    this.name = 'FeedOrderError';
  }
}

export interface IngestionDeps {
  store: ObjectStore;
  feed: FeedSource;
}

interface IdentifiedPost {
  postId: number;
  post: FeedPost;
}

function identify(breweryId: string, posts: FeedPost[], summary: RunSummary): IdentifiedPost[] {
  const identified: IdentifiedPost[] = [];
  for (const post of posts) {
    try {
      identified.push({ postId: extractPostId(post.id), post });
    } catch (err) {
      logger.warn({ breweryId, id: post.id, err }, 'Skipping feed entry without a post id');
      summary.skip();
    }
  }
  return identified;
}

function assertNewestFirst(breweryId: string, posts: IdentifiedPost[]): void {
  for (let i = 1; i < posts.length; i++) {
    const previous = posts[i - 1].postId;
    const next = posts[i].postId;
    if (next >= previous) throw new FeedOrderError(breweryId, previous, next);
  }
}

/**
 * Stores the brewery's posts newer than `lastSeen`, oldest first.
 * Returns the newest post id now durable, or null when nothing was new.
 */
async function storeNewPosts(
  deps: IngestionDeps,
  breweryId: string,
  lastSeen: number | null,
  summary: RunSummary,
): Promise<number | null> {
  const posts = identify(breweryId, await deps.feed.listPosts(breweryId), summary);
  assertNewestFirst(breweryId, posts);

  const fresh = posts.filter(({ postId }) => lastSeen === null || postId > lastSeen);
  if (fresh.length === 0) {
    logger.debug({ breweryId, lastSeen }, 'No new posts');
    return null;
  }

  for (const { postId, post } of [...fresh].reverse()) {
    const key = postKey(breweryId, postId);
    if (await deps.store.get(key) !== null) {
      logger.debug({ breweryId, postId }, 'Post already stored');
      summary.skip();
      continue;
    }
    const stored: StoredPost = { ...post, breweryId };
    await deps.store.put(key, JSON.stringify(stored));
    summary.succeed();
  }

  const newest = fresh[0].postId;
  logger.info({ breweryId, count: fresh.length, newest }, 'Stored new posts');
  return newest;
}

export async function runIngestion(deps: IngestionDeps, breweryIds: readonly string[]): Promise<RunSummary> {
  const summary = new RunSummary('ingest');
  const checkpoint = await new CheckpointStore(deps.store, DATASET_KEYS.ingestionCheckpoint).load();

  logger.info({ breweries: breweryIds.length }, 'Starting ingestion');

  for (const breweryId of breweryIds) {
    let newest: number | null;
    try {
      newest = await storeNewPosts(deps, breweryId, checkpoint.postId(breweryId), summary);
    } catch (err) {
      logger.error({ breweryId, err }, 'Brewery ingestion failed');
      summary.fail(breweryId, err);
      continue;
    }
    // Checkpoint write failures abort the run
    if (newest !== null) await checkpoint.set(breweryId, newest);
  }

  summary.log(logger);
  return summary;
}
