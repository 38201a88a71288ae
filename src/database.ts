/**
 * Database module for the invite reconciler.
 * Opens SQLite handles, provides typed query helpers over an explicit handle,
 * and creates the schema. Uses better-sqlite3 for synchronous, single-statement
 * atomic operations.
 *
 * @module database
 */

import * as fs from "node:fs";
import * as path from "node:path";
import Database from "better-sqlite3";
import { StoreError } from "./errors";
import { logger } from "./utils/logger";

export type DatabaseHandle = Database.Database;

const describe = (sql: string): string => sql.replace(/\s+/g, " ").trim().slice(0, 80);

/**
 * Opens (creating if needed) a database file. `:memory:` gives a private
 * in-process database.
 *
 * @example
 * ```typescript
 * const db = openDatabase("./data/invites.db");
 * initSchema(db);
 * ```
 */
export function openDatabase(databasePath: string): DatabaseHandle {
	if (databasePath !== ":memory:") {
		const dir = path.dirname(databasePath);
		if (!fs.existsSync(dir)) {
			fs.mkdirSync(dir, { recursive: true });
		}
	}

	try {
		const db = new Database(databasePath);
		db.pragma("journal_mode = WAL");
		return db;
	} catch (error) {
		logger.error(`Failed to open database: ${databasePath}`, error);
		throw new StoreError("open", error);
	}
}

/**
 * Executes a SELECT query and returns all matching rows as typed objects.
 *
 * @template T - The type of objects expected in the result set
 * @throws {StoreError} If the query fails to execute
 *
 * @example
 * ```typescript
 * const rows = query<InviteRecordRow>(db, "SELECT * FROM invite_records WHERE status = ?", ["trial"]);
 * ```
 */
export const query = <T>(db: DatabaseHandle, sql: string, params: unknown[] = []): T[] => {
	try {
		const stmt = db.prepare(sql);
		return stmt.all(params) as T[];
	} catch (error) {
		logger.error(`Database query failed: ${describe(sql)}`, error);
		throw new StoreError(describe(sql), error);
	}
};

/**
 * Executes a SELECT query and returns a single row, or undefined if no rows
 * match.
 *
 * @throws {StoreError} If the query fails to execute
 */
export const get = <T>(db: DatabaseHandle, sql: string, params: unknown[] = []): T | undefined => {
	try {
		const stmt = db.prepare(sql);
		return stmt.get(params) as T | undefined;
	} catch (error) {
		logger.error(`Database get failed: ${describe(sql)}`, error);
		throw new StoreError(describe(sql), error);
	}
};

/**
 * Executes an INSERT, UPDATE, or DELETE statement.
 *
 * @returns RunResult containing the changes count
 * @throws {StoreError} If the statement fails to execute
 */
export const execute = (db: DatabaseHandle, sql: string, params: unknown[] = []): Database.RunResult => {
	try {
		const stmt = db.prepare(sql);
		return stmt.run(params);
	} catch (error) {
		logger.error(`Database execution failed: ${describe(sql)}`, error);
		throw new StoreError(describe(sql), error);
	}
};

/**
 * Runs `work` inside one transaction. Any failure rolls the whole batch back.
 *
 * @throws {StoreError} If the work throws or the commit fails
 */
export const transaction = <T>(db: DatabaseHandle, operation: string, work: () => T): T => {
	try {
		return db.transaction(work)();
	} catch (error) {
		if (error instanceof StoreError) {
			throw error;
		}
		logger.error(`Database transaction failed: ${operation}`, error);
		throw new StoreError(operation, error);
	}
};

/**
 * Creates the tables and indexes. Safe to call multiple times.
 *
 * Tables:
 * - invite_records: one lifecycle row per chat account, never deleted
 * - directory_cache: mirror of the provisioning service's user directory
 * - admin_actions: append-only audit log
 */
export const initSchema = (db: DatabaseHandle): void => {
	db.exec(`
    CREATE TABLE IF NOT EXISTS invite_records (
      chat_id TEXT PRIMARY KEY,
      chat_username TEXT NOT NULL,
      invite_code TEXT,
      remote_user_id TEXT,
      plan TEXT NOT NULL,
      account_expires_at INTEGER,
      last_notified_at INTEGER,
      status TEXT NOT NULL CHECK (status IN ('trial', 'paid', 'disabled')),
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );
  `);

	db.exec(`
    CREATE TABLE IF NOT EXISTS directory_cache (
      remote_user_id TEXT PRIMARY KEY,
      remote_username TEXT,
      linked_chat_id TEXT,
      email TEXT,
      expires_at INTEGER,
      disabled_flag INTEGER,
      is_admin_flag INTEGER,
      last_synced_at INTEGER NOT NULL
    );
  `);

	db.exec(`
    CREATE TABLE IF NOT EXISTS admin_actions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      actor_id TEXT NOT NULL,
      actor_name TEXT NOT NULL,
      action TEXT NOT NULL,
      target_chat_id TEXT,
      target_remote_username TEXT,
      details TEXT,
      performed_at INTEGER NOT NULL
    );
  `);

	db.exec(`
    CREATE INDEX IF NOT EXISTS idx_invite_records_expiry ON invite_records(account_expires_at);
    CREATE INDEX IF NOT EXISTS idx_invite_records_username ON invite_records(chat_username COLLATE NOCASE);
    CREATE UNIQUE INDEX IF NOT EXISTS idx_directory_cache_username ON directory_cache(remote_username);
    CREATE INDEX IF NOT EXISTS idx_directory_cache_chat ON directory_cache(linked_chat_id);
    CREATE INDEX IF NOT EXISTS idx_admin_actions_target ON admin_actions(target_chat_id);
  `);

	logger.debug("Database schema initialized");
};
