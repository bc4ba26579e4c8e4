import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * Net position per instrument. `size` and `cost` hold decimal strings so no
 * precision is lost through SQLite's REAL affinity.
 */
export const positions = sqliteTable("positions", {
	symbol: text("symbol").primaryKey(),
	size: text("size").notNull(),
	cost: text("cost").notNull(),
	updatedAt: integer("updated_at").notNull(),
});

export type PositionRow = typeof positions.$inferSelect;
export type NewPositionRow = typeof positions.$inferInsert;

/** Append-only fill log, pruned by age. */
export const trades = sqliteTable("trades", {
	id: integer("id").primaryKey({ autoIncrement: true }),
	symbol: text("symbol")
		.notNull()
		.references(() => positions.symbol),
	side: text("side", { enum: ["Bid", "Ask"] }).notNull(),
	price: text("price").notNull(),
	quantity: text("quantity").notNull(),
	executedAt: integer("executed_at").notNull(),
});

export type TradeRow = typeof trades.$inferSelect;
export type NewTradeRow = typeof trades.$inferInsert;

/** Executed on open. The drizzle tables above mirror these statements. */
export const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS positions (
	symbol TEXT PRIMARY KEY,
	size TEXT NOT NULL DEFAULT '0',
	cost TEXT NOT NULL DEFAULT '0',
	updated_at INTEGER NOT NULL
);
CREATE TABLE IF NOT EXISTS trades (
	id INTEGER PRIMARY KEY AUTOINCREMENT,
	symbol TEXT NOT NULL REFERENCES positions(symbol),
	side TEXT NOT NULL CHECK (side IN ('Bid', 'Ask')),
	price TEXT NOT NULL,
	quantity TEXT NOT NULL,
	executed_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS trades_symbol_executed_at ON trades (symbol, executed_at);
`;
