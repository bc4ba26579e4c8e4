import { desc, eq, lt } from "drizzle-orm";
import type { Logger } from "../lib/logger/index.js";
import { Decimal } from "../shared/decimal.js";
import { LedgerError } from "../shared/errors.js";
import type { OrderSide } from "../shared/market-side.js";
import { type Result, err, mapErr, ok, tryCatch } from "../shared/result.js";
import { type Clock, Duration, SystemClock } from "../shared/time.js";
import { type LedgerConnection, type LedgerDb, openLedgerDb } from "./database.js";
import { type PositionState, applyFillToPosition, clampPosition } from "./position-math.js";
import { type PositionRow, type TradeRow, positions, trades } from "./schema.js";

export interface Position extends PositionState {
	readonly symbol: string;
	readonly updatedAt: number;
}

export interface Trade {
	readonly id: number;
	readonly symbol: string;
	readonly side: OrderSide;
	readonly price: Decimal;
	readonly quantity: Decimal;
	readonly executedAt: number;
}

/** An executed fill on its way into the ledger. */
export interface LedgerFill {
	readonly symbol: string;
	readonly side: OrderSide;
	readonly price: Decimal;
	readonly quantity: Decimal;
	/** Defaults to the ledger clock. */
	readonly executedAt?: number;
}

export interface PositionLedgerOptions {
	readonly path: string;
	readonly retentionDays: number;
	readonly logger: Logger;
	readonly clock?: Clock;
}

type LedgerWriter = Pick<LedgerDb, "insert">;

function toPosition(row: PositionRow): Position {
	return {
		symbol: row.symbol,
		size: Decimal.from(row.size),
		cost: Decimal.from(row.cost),
		updatedAt: row.updatedAt,
	};
}

function toTrade(row: TradeRow): Trade {
	return {
		id: row.id,
		symbol: row.symbol,
		side: row.side,
		price: Decimal.from(row.price),
		quantity: Decimal.from(row.quantity),
		executedAt: row.executedAt,
	};
}

/**
 * Durable position and trade store over SQLite.
 *
 * Calls are synchronous and never throw: every failure, including use after
 * `close()`, comes back as a LedgerError. The ledger has a single writer; in
 * the running bot that is the PositionCache job loop.
 */
export class PositionLedger {
	private readonly db: LedgerDb;
	private readonly conn: LedgerConnection;
	private readonly retentionMs: number;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private closed = false;

	private constructor(conn: LedgerConnection, options: PositionLedgerOptions) {
		this.conn = conn;
		this.db = conn.db;
		this.retentionMs = Duration.days(options.retentionDays);
		this.clock = options.clock ?? SystemClock;
		this.logger = options.logger;
	}

	/** Open the store and prune trades past retention. */
	static open(options: PositionLedgerOptions): Result<PositionLedger, LedgerError> {
		const conn = openLedgerDb(options.path);
		if (!conn.ok) return conn;
		const ledger = new PositionLedger(conn.value, options);
		const pruned = ledger.pruneTrades();
		if (!pruned.ok) {
			ledger.close();
			return pruned;
		}
		return ok(ledger);
	}

	/** The stored position, or null before the first trade on `symbol`. */
	getPosition(symbol: string): Result<Position | null, LedgerError> {
		return this.run("getPosition", () => {
			const row = this.db.select().from(positions).where(eq(positions.symbol, symbol)).get();
			return row === undefined ? null : toPosition(row);
		});
	}

	/** Overwrite a position. Negative values are clamped to zero. */
	updatePosition(symbol: string, state: PositionState): Result<Position, LedgerError> {
		return this.run("updatePosition", () => this.upsert(this.db, symbol, state));
	}

	/**
	 * Read, recompute and write the position and append the trade in one
	 * transaction, then prune old trades. A failed prune is logged; the
	 * committed write still counts.
	 */
	applyFill(fill: LedgerFill): Result<Position, LedgerError> {
		const executedAt = fill.executedAt ?? this.clock.now();
		const written = this.run("applyFill", () =>
			this.db.transaction((tx) => {
				const row = tx.select().from(positions).where(eq(positions.symbol, fill.symbol)).get();
				const current = row === undefined ? null : toPosition(row);
				const next = applyFillToPosition(
					current ?? { size: Decimal.zero(), cost: Decimal.zero() },
					fill,
				);
				const position = this.upsert(tx, fill.symbol, next);
				tx.insert(trades)
					.values({
						symbol: fill.symbol,
						side: fill.side,
						price: fill.price.toString(),
						quantity: fill.quantity.toString(),
						executedAt,
					})
					.run();
				return position;
			}),
		);
		if (!written.ok) return written;
		this.logger.debug(
			{
				symbol: fill.symbol,
				side: fill.side,
				price: fill.price.toString(),
				quantity: fill.quantity.toString(),
				size: written.value.size.toString(),
				cost: written.value.cost.toString(),
			},
			"Position updated",
		);
		this.pruneAfterWrite("applyFill");
		return written;
	}

	/** Append a trade without touching the position's size or cost. */
	addTrade(fill: LedgerFill): Result<Trade, LedgerError> {
		const executedAt = fill.executedAt ?? this.clock.now();
		const inserted = this.run("addTrade", () =>
			this.db.transaction((tx) => {
				tx.insert(positions)
					.values({ symbol: fill.symbol, size: "0", cost: "0", updatedAt: executedAt })
					.onConflictDoNothing()
					.run();
				const trade = {
					symbol: fill.symbol,
					side: fill.side,
					price: fill.price,
					quantity: fill.quantity,
					executedAt,
				};
				const { lastInsertRowid } = tx
					.insert(trades)
					.values({
						...trade,
						price: trade.price.toString(),
						quantity: trade.quantity.toString(),
					})
					.run();
				return { id: Number(lastInsertRowid), ...trade };
			}),
		);
		if (!inserted.ok) return inserted;
		this.pruneAfterWrite("addTrade");
		return inserted;
	}

	/** Newest first. */
	recentTrades(symbol: string, limit = 50): Result<readonly Trade[], LedgerError> {
		return this.run("recentTrades", () =>
			this.db
				.select()
				.from(trades)
				.where(eq(trades.symbol, symbol))
				.orderBy(desc(trades.executedAt), desc(trades.id))
				.limit(limit)
				.all()
				.map(toTrade),
		);
	}

	/** Delete trades older than the retention window; vacuum when any were removed. */
	pruneTrades(): Result<number, LedgerError> {
		const cutoff = this.clock.now() - this.retentionMs;
		return this.run("pruneTrades", () => {
			const { changes } = this.db.delete(trades).where(lt(trades.executedAt, cutoff)).run();
			if (changes > 0) {
				this.conn.sqlite.exec("VACUUM");
				this.logger.info({ deleted: changes, cutoff }, "Pruned old trades");
			}
			return changes;
		});
	}

	private pruneAfterWrite(operation: string): void {
		const pruned = this.pruneTrades();
		if (!pruned.ok) {
			this.logger.warn({ operation, err: pruned.error.message }, "Trade pruning failed");
		}
	}

	close(): void {
		if (this.closed) return;
		this.closed = true;
		this.conn.sqlite.close();
	}

	private upsert(db: LedgerWriter, symbol: string, state: PositionState): Position {
		const clamped = clampPosition(state);
		const values = {
			size: clamped.size.toString(),
			cost: clamped.cost.toString(),
			updatedAt: this.clock.now(),
		};
		db.insert(positions)
			.values({ symbol, ...values })
			.onConflictDoUpdate({ target: positions.symbol, set: values })
			.run();
		return { symbol, size: clamped.size, cost: clamped.cost, updatedAt: values.updatedAt };
	}

	private run<T>(operation: string, fn: () => T): Result<T, LedgerError> {
		if (this.closed) {
			return err(new LedgerError(`Ledger is closed (${operation})`, { operation }));
		}
		return mapErr(
			tryCatch(fn),
			(error) => new LedgerError(`Ledger ${operation} failed`, { cause: error, operation }),
		);
	}
}
