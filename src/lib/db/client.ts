// ---------------------------------------------------------------------------
// Database Client — better-sqlite3 + drizzle
// ---------------------------------------------------------------------------

import { loadConfig } from "@/lib/config";
import Database from "better-sqlite3";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

interface OpenDatabase {
	sqlite: Database.Database;
	db: AppDatabase;
}

let current: OpenDatabase | null = null;

function open(path: string): OpenDatabase {
	const sqlite = new Database(path);
	if (path !== ":memory:") {
		sqlite.pragma("journal_mode = WAL");
	}
	sqlite.exec(schema.CREATE_LECTURES_TABLE);
	return { sqlite, db: drizzle(sqlite, { schema }) };
}

/**
 * Open a database file (or `:memory:`) and make sure the schema exists.
 */
export function createDatabase(path: string): AppDatabase {
	return open(path).db;
}

/**
 * Shared handle for the configured `DATABASE_PATH`, opened on first use.
 */
export function getDb(): AppDatabase {
	if (!current) {
		current = open(loadConfig().DATABASE_PATH);
	}
	return current.db;
}

/** Close the shared handle; the next getDb() reopens it. */
export function closeDb(): void {
	current?.sqlite.close();
	current = null;
}
