/**
 * Local SQLite store. Holds the Google OAuth tokens for the mailbox the bot
 * reads, plus a small key/value table. Research verdicts are never stored here.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { safeParse } from './safeJson';

export interface StoredTokens {
  access_token?: string | null;
  refresh_token?: string | null;
  expiry_date?: number | null;
}

const ACTIVE_ACCOUNT_KEY = 'active_account';
const SCHEMA_VERSION_KEY = 'schema_version';

let db: Database.Database | null = null;

function isStoredTokens(value: unknown): value is StoredTokens {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function isAccountId(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

/** Open (or create) the database. Pass ':memory:' for a throwaway store. */
export function initDb(dbPath: string): Database.Database {
  if (db) db.close();
  if (dbPath !== ':memory:') fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  db = new Database(dbPath);
  db.exec(`
    CREATE TABLE IF NOT EXISTS kv (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);
  runMigrations(db);
  return db;
}

export function closeDb(): void {
  db?.close();
  db = null;
}

function getSchemaVersion(database: Database.Database): number {
  const row = database.prepare<[string], { value: string }>('SELECT value FROM kv WHERE key = ?').get(SCHEMA_VERSION_KEY);
  if (!row) return 0;
  const n = parseInt(row.value, 10);
  return Number.isFinite(n) ? n : 0;
}

function setSchemaVersion(database: Database.Database, version: number): void {
  database.prepare('INSERT OR REPLACE INTO kv (key, value) VALUES (?, ?)').run(SCHEMA_VERSION_KEY, String(version));
}

/** Versioned migrations. Add new migrations when schema changes. */
function runMigrations(database: Database.Database): void {
  const v = getSchemaVersion(database);
  if (v < 1) {
    database.exec(`
      CREATE TABLE IF NOT EXISTS accounts (
        id TEXT PRIMARY KEY,
        email TEXT NOT NULL,
        tokens TEXT NOT NULL,
        scopes TEXT,
        updated_at INTEGER NOT NULL
      );
    `);
    setSchemaVersion(database, 1);
  }
}

export function getKv(key: string): string | null {
  if (!db) return null;
  const row = db.prepare<[string], { value: string }>('SELECT value FROM kv WHERE key = ?').get(key);
  return row?.value ?? null;
}

export function setKv(key: string, value: string): void {
  db?.prepare('INSERT OR REPLACE INTO kv (key, value) VALUES (?, ?)').run(key, value);
}

/** Store tokens for an account and make it the active one. */
export function saveAccountTokens(email: string, tokens: StoredTokens, scopes: string[]): void {
  if (!db) throw new Error('Database not initialized');
  db.prepare('INSERT OR REPLACE INTO accounts (id, email, tokens, scopes, updated_at) VALUES (?, ?, ?, ?, ?)').run(
    email,
    email,
    JSON.stringify(tokens),
    scopes.join(' '),
    Date.now()
  );
  setKv(ACTIVE_ACCOUNT_KEY, JSON.stringify(email));
}

/** Merge refreshed tokens into the stored ones; Google omits the refresh token on refresh. */
export function updateAccountTokens(email: string, tokens: StoredTokens): void {
  if (!db) return;
  const current = getAccountTokens(email) ?? {};
  const merged: StoredTokens = {
    access_token: tokens.access_token ?? current.access_token,
    refresh_token: tokens.refresh_token ?? current.refresh_token,
    expiry_date: tokens.expiry_date ?? current.expiry_date,
  };
  db.prepare('UPDATE accounts SET tokens = ?, updated_at = ? WHERE id = ?').run(JSON.stringify(merged), Date.now(), email);
}

export function getAccountTokens(email: string): StoredTokens | null {
  if (!db) return null;
  const row = db.prepare<[string], { tokens: string }>('SELECT tokens FROM accounts WHERE id = ?').get(email);
  return row ? safeParse<StoredTokens | null>(row.tokens, null, isStoredTokens) : null;
}

export function getActiveAccountId(): string | null {
  const active = safeParse<string | null>(getKv(ACTIVE_ACCOUNT_KEY), null, isAccountId);
  return active || null;
}
