import { differenceInCalendarDays, format, isValid, parse } from 'date-fns';
import { createLogger } from '../logger';
import { BACKUP_FILES, BACKUP_PREFIX, backupKey, type ObjectStore } from '../storage/objectStore';

const logger = createLogger('backup');

const DATE_FORMAT = 'yyyy-MM-dd';

export class SnapshotNotFoundError extends Error {
  constructor(readonly date: string) {
    super(`No backup snapshot for ${date}`);
    this.name = 'SnapshotNotFoundError';
  }
}

export function snapshotDate(date: Date): string {
  return format(date, DATE_FORMAT);
}

/** Calendar date of a `yyyy-MM-dd` string, or null when it is not one. */
export function parseSnapshotDate(value: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return null;
  const date = parse(value, DATE_FORMAT, new Date(0));
  return isValid(date) ? date : null;
}

function dateOfKey(key: string): string | null {
  if (!key.startsWith(BACKUP_PREFIX)) return null;
  const [date] = key.slice(BACKUP_PREFIX.length).split('/');
  return date ? date : null;
}

/** Snapshot dates present in the store, oldest first. */
export async function listSnapshots(store: ObjectStore): Promise<string[]> {
  const dates = new Set<string>();
  for (const key of await store.list(BACKUP_PREFIX)) {
    const date = dateOfKey(key);
    if (date && parseSnapshotDate(date)) dates.add(date);
  }
  return [...dates].sort();
}

/** Copies every live dataset into the snapshot for `date`. Returns the files copied. */
export async function createBackup(store: ObjectStore, date: string): Promise<string[]> {
  const copied: string[] = [];
  for (const file of BACKUP_FILES) {
    if (await store.copy(file, backupKey(date, file))) {
      copied.push(file);
    } else {
      logger.warn({ file, date }, 'Dataset absent, not backed up');
    }
  }
  logger.info({ date, files: copied.length }, 'Backup snapshot written');
  return copied;
}

/**
 * Deletes objects of snapshots dated strictly more than `retentionDays`
 * calendar days before `runDate`. Returns the deleted keys.
 */
export async function pruneBackups(store: ObjectStore, runDate: Date, retentionDays: number): Promise<string[]> {
  const deleted: string[] = [];
  for (const key of await store.list(BACKUP_PREFIX)) {
    const rawDate = dateOfKey(key);
    const date = rawDate === null ? null : parseSnapshotDate(rawDate);
    if (date === null) {
      logger.warn({ key }, 'Backup key without a snapshot date, leaving it');
      continue;
    }
    if (differenceInCalendarDays(runDate, date) > retentionDays) {
      await store.delete(key);
      deleted.push(key);
    }
  }
  if (deleted.length > 0) logger.info({ deleted: deleted.length, retentionDays }, 'Expired backups deleted');
  return deleted;
}

/** Copies the datasets of snapshot `date` back over the live keys. */
export async function restoreSnapshot(store: ObjectStore, date: string): Promise<string[]> {
  const restored: string[] = [];
  for (const file of BACKUP_FILES) {
    if (await store.copy(backupKey(date, file), file)) restored.push(file);
  }
  if (restored.length === 0) throw new SnapshotNotFoundError(date);
  logger.info({ date, files: restored }, 'Snapshot restored');
  return restored;
}
