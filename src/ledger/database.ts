import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import { LedgerError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import * as schema from "./schema.js";

export type LedgerDb = BetterSQLite3Database<typeof schema>;

export interface LedgerConnection {
	readonly db: LedgerDb;
	/** Raw handle for statements drizzle does not model (VACUUM, PRAGMA). */
	readonly sqlite: Database.Database;
}

export const IN_MEMORY = ":memory:";

/**
 * Open (and create if needed) the ledger database at `path`.
 * The parent directory is created for file paths.
 */
export function openLedgerDb(path: string): Result<LedgerConnection, LedgerError> {
	let sqlite: Database.Database | undefined;
	try {
		if (path !== IN_MEMORY) {
			mkdirSync(dirname(path), { recursive: true });
		}
		sqlite = new Database(path);
		sqlite.pragma("foreign_keys = ON");
		sqlite.exec(schema.SCHEMA_DDL);
		return ok({ db: drizzle(sqlite, { schema }), sqlite });
	} catch (error) {
		sqlite?.close();
		return err(new LedgerError(`Failed to open ledger at ${path}`, { cause: error, path }));
	}
}
