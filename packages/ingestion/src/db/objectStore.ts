import { asc, eq, like } from 'drizzle-orm';
import type { Database } from './client';
import { objects } from './schema';
import type { ObjectStore } from '../storage/objectStore';

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, match => `\\${match}`);
}

export class PostgresObjectStore implements ObjectStore {
  constructor(private readonly db: Database) {}

  async get(key: string): Promise<string | null> {
    const rows = await this.db.select({ body: objects.body }).from(objects).where(eq(objects.key, key));
    return rows[0]?.body ?? null;
  }

  async put(key: string, body: string): Promise<void> {
    const updatedAt = new Date();
    await this.db.insert(objects)
      .values({ key, body, updatedAt })
      .onConflictDoUpdate({ target: objects.key, set: { body, updatedAt } });
  }

  async list(prefix: string): Promise<string[]> {
    const rows = await this.db.select({ key: objects.key })
      .from(objects)
      .where(like(objects.key, `${escapeLike(prefix)}%`))
      .orderBy(asc(objects.key));
    return rows.map(row => row.key);
  }

  async delete(key: string): Promise<void> {
    await this.db.delete(objects).where(eq(objects.key, key));
  }

  async copy(sourceKey: string, targetKey: string): Promise<boolean> {
    const body = await this.get(sourceKey);
    if (body === null) return false;
    await this.put(targetKey, body);
    return true;
  }
}
