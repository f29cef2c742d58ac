import { LowSync, MemorySync } from 'lowdb';
import { JSONFileSync } from 'lowdb/node';
import { join } from 'path';
import { existsSync, mkdirSync } from 'fs';
import type { DBSchema } from './models';

export type Database = LowSync<DBSchema>;

export function emptyData(): DBSchema {
  return {
    posts: { draft: {}, scheduled: {}, published: {}, error: {} },
    schedule: {},
    accounts: [],
  };
}

// store JSON in <dataDir>/db.json
export function openDatabase(dataDir: string): Database {
  if (!existsSync(dataDir)) mkdirSync(dataDir, { recursive: true });
  const adapter = new JSONFileSync<DBSchema>(join(dataDir, 'db.json'));
  const db = new LowSync(adapter, emptyData());
  db.read();
  fillMissing(db);
  return db;
}

export function openMemoryDatabase(seed?: DBSchema): Database {
  const db = new LowSync(new MemorySync<DBSchema>(), seed ?? emptyData());
  db.read();
  fillMissing(db);
  return db;
}

// files written by older builds may lack a collection or a partition
function fillMissing(db: Database) {
  const defaults = emptyData();
  db.data = {
    posts: { ...defaults.posts, ...db.data.posts },
    schedule: db.data.schedule ?? defaults.schedule,
    accounts: db.data.accounts ?? defaults.accounts,
  };
  db.write();
}
