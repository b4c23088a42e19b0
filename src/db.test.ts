import type Database from 'better-sqlite3';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  closeDb,
  getAccountTokens,
  getActiveAccountId,
  getKv,
  initDb,
  saveAccountTokens,
  setKv,
  updateAccountTokens,
} from './db';

describe('db', () => {
  let database: Database.Database;

  beforeEach(() => {
    database = initDb(':memory:');
  });

  afterEach(() => {
    closeDb();
  });

  it('stores key/value pairs', () => {
    expect(getKv('greeting')).toBeNull();
    setKv('greeting', 'hello');
    expect(getKv('greeting')).toBe('hello');
    setKv('greeting', 'hi');
    expect(getKv('greeting')).toBe('hi');
  });

  it('records the schema version', () => {
    expect(getKv('schema_version')).toBe('1');
  });

  it('saves tokens and marks the account active', () => {
    expect(getActiveAccountId()).toBeNull();
    saveAccountTokens('user@example.com', { access_token: 'a1', refresh_token: 'r1', expiry_date: 1 }, ['scope-a']);

    expect(getActiveAccountId()).toBe('user@example.com');
    expect(getAccountTokens('user@example.com')).toEqual({ access_token: 'a1', refresh_token: 'r1', expiry_date: 1 });
  });

  it('keeps the refresh token when a refresh omits it', () => {
    saveAccountTokens('user@example.com', { access_token: 'a1', refresh_token: 'r1', expiry_date: 1 }, ['scope-a']);
    updateAccountTokens('user@example.com', { access_token: 'a2', expiry_date: 2 });

    expect(getAccountTokens('user@example.com')).toEqual({ access_token: 'a2', refresh_token: 'r1', expiry_date: 2 });
  });

  it('returns null for unknown or corrupted accounts', () => {
    expect(getAccountTokens('nobody@example.com')).toBeNull();
    saveAccountTokens('user@example.com', { refresh_token: 'r1' }, []);
    database.prepare('UPDATE accounts SET tokens = ?').run('not json');
    expect(getAccountTokens('user@example.com')).toBeNull();
  });

  it('reads nothing once closed', () => {
    closeDb();
    expect(getKv('schema_version')).toBeNull();
    expect(getActiveAccountId()).toBeNull();
  });
});
