/**
 * Durable named-object storage. Bodies are UTF-8 text; every dataset the
 * pipeline keeps is JSON or CSV.
 */
export interface ObjectStore {
  get(key: string): Promise<string | null>;
  put(key: string, body: string): Promise<void>;
  /** Keys beginning with `prefix`, in ascending key order. */
  list(prefix: string): Promise<string[]>;
  delete(key: string): Promise<void>;
  /** Overwrites `targetKey`. Returns false when `sourceKey` does not exist. */
  copy(sourceKey: string, targetKey: string): Promise<boolean>;
}

export const DATASET_KEYS = {
  ingestionCheckpoint: 'last_update.json',
  parsingCheckpoint: 'last_parsed.json',
  aggregate: 'untappd_aggregate_data.csv',
  venueRegistry: 'venue_list.csv',
  venueLocations: 'venue_locations.csv',
} as const;

export const BACKUP_FILES: readonly string[] = [
  DATASET_KEYS.parsingCheckpoint,
  DATASET_KEYS.ingestionCheckpoint,
  DATASET_KEYS.aggregate,
  DATASET_KEYS.venueRegistry,
  DATASET_KEYS.venueLocations,
];

export const BACKUP_PREFIX = 'Backups/';

export function postKeyPrefix(breweryId: string): string {
  return `${breweryId}/${breweryId}-`;
}

export function postKey(breweryId: string, postId: number): string {
  return `${postKeyPrefix(breweryId)}${postId}`;
}

/** Post id from a key produced by `postKey`, or null for foreign keys. */
export function postIdFromKey(breweryId: string, key: string): number | null {
  const prefix = postKeyPrefix(breweryId);
  if (!key.startsWith(prefix)) return null;
  const suffix = key.slice(prefix.length);
  return /^\d+$/.test(suffix) ? Number(suffix) : null;
}

export function backupKey(date: string, file: string): string {
  return `${BACKUP_PREFIX}${date}/${file}`;
}
