import Database, { Database as DatabaseType } from 'better-sqlite3';
import path from 'path';
import fs from 'fs-extra';
import { AccountType, TransactionType } from '../types';

export const IN_MEMORY = ':memory:';

const accountTypes = Object.values(AccountType).map(t => `'${t}'`).join(', ');
const transactionTypes = Object.values(TransactionType).map(t => `'${t}'`).join(', ');

export function initDB(dbPath: string): DatabaseType {
  if (dbPath !== IN_MEMORY) {
    fs.ensureDirSync(path.dirname(dbPath));
  }
  const db = new Database(dbPath);
  db.pragma('foreign_keys = ON');

  db.exec(`
    CREATE TABLE IF NOT EXISTS accounts (
      uid TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      type TEXT CHECK(type IN (${accountTypes})) NOT NULL,
      currency TEXT NOT NULL,
      created_at DATETIME DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS transactions (
      uid TEXT PRIMARY KEY,
      account_uid TEXT NOT NULL REFERENCES accounts(uid) ON DELETE CASCADE,
      name TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      amount TEXT NOT NULL,
      type TEXT CHECK(type IN (${transactionTypes})) NOT NULL,
      timestamp INTEGER NOT NULL,
      transfer_account_uid TEXT,
      exported INTEGER NOT NULL DEFAULT 0,
      created_at DATETIME DEFAULT CURRENT_TIMESTAMP
    );

    CREATE INDEX IF NOT EXISTS idx_transactions_account ON transactions(account_uid);
    CREATE INDEX IF NOT EXISTS idx_transactions_exported ON transactions(exported);
  `);

  return db;
}

export * from './accounts';
export * from './transactions';
