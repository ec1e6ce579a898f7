import { asc, eq } from 'drizzle-orm';
import type { StrategyDocument } from '../../config/strategy-schema.js';
import { getDb } from '../index.js';
import { strategies } from '../schema.js';

export interface StrategyRow {
  name: string;
  config: string;
  createdAt: string;
  updatedAt: string | null;
}

export function getStrategy(name: string): StrategyRow | undefined {
  const db = getDb();
  return db.select().from(strategies).where(eq(strategies.name, name)).get();
}

export function getStrategyNames(): string[] {
  const db = getDb();
  return db
    .select({ name: strategies.name })
    .from(strategies)
    .orderBy(asc(strategies.name))
    .all()
    .map((row) => row.name);
}

export function upsertStrategy(name: string, document: StrategyDocument): void {
  const db = getDb();
  const now = new Date().toISOString();
  const config = JSON.stringify(document);

  db.insert(strategies)
    .values({ name, config, createdAt: now, updatedAt: now })
    .onConflictDoUpdate({
      target: strategies.name,
      set: { config, updatedAt: now },
    })
    .run();
}

export function deleteStrategy(name: string): boolean {
  const db = getDb();
  const result = db.delete(strategies).where(eq(strategies.name, name)).run();
  return result.changes > 0;
}
