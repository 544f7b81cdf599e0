import { describeError } from '../logger';
import type { ObjectStore } from './objectStore';

export type Cursor = number | string;

export class CheckpointFormatError extends Error {
  constructor(key: string, detail: string) {
    super(`Checkpoint ${key} is malformed: ${detail}`);
    this.name = 'CheckpointFormatError';
  }
}

/**
 * Serializes a flat mapping with the `", "` / `": "` separators the stored
 * checkpoint files have always used.
 */
export function formatCheckpoint(mapping: Record<string, Cursor>): string {
  const body = Object.entries(mapping)
    .map(([key, value]) => `${JSON.stringify(key)}: ${JSON.stringify(value)}`)
    .join(', ');
  return `{${body}}`;
}

export function parseCheckpoint(key: string, raw: string): Record<string, Cursor> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CheckpointFormatError(key, describeError(err));
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new CheckpointFormatError(key, 'expected a JSON object');
  }
  const mapping: Record<string, Cursor> = {};
  for (const [brewery, value] of Object.entries(parsed)) {
    if (typeof value === 'number' || typeof value === 'string') {
      mapping[brewery] = value;
    } else {
      throw new CheckpointFormatError(key, `value for ${brewery} is not a post id`);
    }
  }
  return mapping;
}

/** Numeric post id of a cursor; empty strings mean "nothing processed yet". */
export function cursorToPostId(cursor: Cursor | undefined): number | null {
  if (cursor === undefined || cursor === '') return null;
  const id = typeof cursor === 'number' ? cursor : Number(cursor);
  return Number.isSafeInteger(id) ? id : null;
}

/**
 * A brewery id -> cursor mapping persisted as one object. The mapping is read
 * once per run and every `set` rewrites the whole object.
 */
export class CheckpointStore {
  private mapping: Record<string, Cursor> = {};
  private loaded = false;

  constructor(
    private readonly store: ObjectStore,
    readonly key: string,
  ) {}

  async load(): Promise<this> {
    const raw = await this.store.get(this.key);
    this.mapping = raw === null ? {} : parseCheckpoint(this.key, raw);
    this.loaded = true;
    return this;
  }

  get(breweryId: string): Cursor | undefined {
    this.assertLoaded();
    return this.mapping[breweryId];
  }

  postId(breweryId: string): number | null {
    this.assertLoaded();
    return cursorToPostId(this.mapping[breweryId]);
  }

  async set(breweryId: string, cursor: Cursor): Promise<void> {
    this.assertLoaded();
    const next = { ...this.mapping, [breweryId]: cursor };
    await this.store.put(this.key, formatCheckpoint(next));
    this.mapping = next;
  }

  snapshot(): Record<string, Cursor> {
    return { ...this.mapping };
  }

  private assertLoaded(): void {
    if (!this.loaded) throw new Error(`Checkpoint ${this.key} used before load()`);
  }
}
