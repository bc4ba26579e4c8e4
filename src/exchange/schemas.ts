/**
 * Response schemas for the REST endpoints. Each one parses the wire shape and
 * transforms it straight into the gateway's domain types.
 */

import { parseStartTime } from "../indicators/kline.js";
import { decimalSchema, z } from "../lib/validation/index.js";
import { EMPTY_BOOK, applyDelta } from "../market/orderbook.js";
import { Decimal } from "../shared/decimal.js";
import { exchangeOrderId } from "../shared/identifiers.js";
import { parseSide } from "../shared/market-side.js";
import type {
	AssetBalance,
	BorrowLendPosition,
	DepthSnapshot,
	FillRecord,
	OrderAck,
	Ticker,
} from "./types.js";

const idSchema = z.union([z.string().trim().min(1), z.number()]).transform(String);

const sideSchema = z.string().transform((raw, ctx) => {
	const side = parseSide(raw);
	if (side === null) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown side: ${raw}` });
		return z.NEVER;
	}
	return side;
});

const optionalDecimal = decimalSchema.nullish().transform((value) => value ?? null);

export const tickerSchema = z
	.object({
		symbol: z.string(),
		lastPrice: decimalSchema,
		high: optionalDecimal,
		low: optionalDecimal,
		volume: optionalDecimal,
	})
	.transform((raw): Ticker => raw);

export const orderSchema = z
	.object({
		id: idSchema,
		clientId: z.number().nullish(),
		symbol: z.string(),
		side: sideSchema,
		orderType: z.string(),
		status: z.string(),
		price: optionalDecimal,
		quantity: optionalDecimal,
		executedQuantity: optionalDecimal,
	})
	.transform(
		(raw): OrderAck => ({
			...raw,
			id: exchangeOrderId(raw.id),
			clientId: raw.clientId ?? null,
			executedQuantity: raw.executedQuantity ?? Decimal.zero(),
		}),
	);

export const orderListSchema = z.array(orderSchema);

/** Cancel-all answers with the cancelled orders, or nothing when there were none. */
export const cancelAllSchema = z
	.array(z.unknown())
	.nullable()
	.transform((rows) => rows?.length ?? 0);

export const balancesSchema = z.record(
	z.string(),
	z
		.object({
			available: decimalSchema,
			locked: decimalSchema,
			staked: optionalDecimal,
		})
		.transform(
			(raw): AssetBalance => ({
				available: raw.available,
				locked: raw.locked,
				staked: raw.staked ?? Decimal.zero(),
			}),
		),
);

const levelSchema = z.tuple([decimalSchema, decimalSchema]).transform(([price, size]) => ({
	price,
	size,
}));

export function depthSchema(receivedAtMs: number) {
	return z
		.object({
			bids: z.array(levelSchema).default([]),
			asks: z.array(levelSchema).default([]),
			lastUpdateId: z.union([z.string(), z.number()]).nullish(),
		})
		.transform((raw): DepthSnapshot => {
			const book = applyDelta(EMPTY_BOOK, { bids: raw.bids, asks: raw.asks }, receivedAtMs);
			const updateId = raw.lastUpdateId == null ? Number.NaN : Number(raw.lastUpdateId);
			return { ...book, lastUpdateId: Number.isFinite(updateId) ? updateId : null };
		});
}

export const fillListSchema = z.array(
	z
		.object({
			tradeId: idSchema.nullish(),
			orderId: idSchema,
			symbol: z.string(),
			side: sideSchema,
			price: decimalSchema,
			quantity: decimalSchema,
			fee: optionalDecimal,
			feeSymbol: z.string().nullish(),
			isMaker: z.boolean().nullish(),
			timestamp: z.union([z.string(), z.number()]).nullish(),
		})
		.transform(
			(raw): FillRecord => ({
				tradeId: raw.tradeId ?? null,
				orderId: raw.orderId,
				symbol: raw.symbol,
				side: raw.side,
				price: raw.price,
				quantity: raw.quantity,
				fee: raw.fee,
				feeSymbol: raw.feeSymbol ?? null,
				isMaker: raw.isMaker ?? null,
				timestampMs: raw.timestamp == null ? null : parseStartTime(raw.timestamp),
			}),
		),
);

export const borrowLendSchema = z.array(
	z
		.object({
			symbol: z.string(),
			netQuantity: decimalSchema,
			netExposureQuantity: optionalDecimal,
		})
		.transform((raw): BorrowLendPosition => raw),
);
