import type { Pool } from 'pg';
import { createLogger } from '../logger';

const logger = createLogger('lock');

export class JobLockedError extends Error {
  constructor(readonly lockName: string) {
    super(`Another invocation holds the "${lockName}" lock`);
    this.name = 'JobLockedError';
  }
}

/**
 * Runs `fn` while holding a session-level advisory lock named `lockName`.
 * Jobs that share a name never overlap, across processes and hosts.
 */
export async function withJobLock<T>(pool: Pool, lockName: string, fn: () => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    const result = await client.query<{ locked: boolean }>(
      'SELECT pg_try_advisory_lock(hashtext($1)) AS locked',
      [lockName],
    );
    if (!result.rows[0]?.locked) {
      throw new JobLockedError(lockName);
    }
    logger.debug({ lockName }, 'Acquired job lock');
    try {
      return await fn();
    } finally {
      await client.query('SELECT pg_advisory_unlock(hashtext($1))', [lockName]);
      logger.debug({ lockName }, 'Released job lock');
    }
  } finally {
    client.release();
  }
}
