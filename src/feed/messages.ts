/**
 * Inbound stream frames. Data arrives as `{ stream, data }` envelopes;
 * anything without a stream name is a control reply (subscription ack or
 * error). Frames that match neither are rejected.
 */

import { ValidationError, decimalSchema, validate, validateJson, z } from "../lib/validation/index.js";
import type { BookTicker, OrderbookDelta } from "../market/types.js";
import { Decimal } from "../shared/decimal.js";
import { parseSide } from "../shared/market-side.js";
import { type Result, err, ok } from "../shared/result.js";
import type { OrderFill } from "./types.js";

const TWO = Decimal.from(2);

const envelopeSchema = z.object({ stream: z.string().min(1), data: z.unknown() });

const controlSchema = z
	.object({
		id: z.union([z.string(), z.number()]).optional(),
		error: z.object({ code: z.number().optional(), message: z.string() }).optional(),
	})
	.passthrough();

const bookTickerSchema = z.object({
	s: z.string(),
	b: decimalSchema,
	a: decimalSchema,
	B: decimalSchema.optional(),
	A: decimalSchema.optional(),
});

const levelSchema = z.tuple([decimalSchema, decimalSchema]);

const depthSchema = z.object({
	s: z.string().optional(),
	b: z.array(levelSchema).default([]),
	a: z.array(levelSchema).default([]),
	U: z.number().int().optional(),
	u: z.number().int().optional(),
});

const orderUpdateSchema = z
	.object({
		e: z.string(),
		s: z.string(),
		i: z.union([z.string(), z.number()]).transform(String).optional(),
		S: z.string().optional(),
		l: decimalSchema.optional(),
		L: decimalSchema.optional(),
		p: decimalSchema.optional(),
	})
	.passthrough();

export type StreamFrame =
	| { readonly kind: "bookTicker"; readonly stream: string; readonly ticker: BookTicker }
	| { readonly kind: "depth"; readonly stream: string; readonly delta: OrderbookDelta }
	| { readonly kind: "orderFill"; readonly stream: string; readonly fill: OrderFill }
	/** Account events other than fills (accepted, cancelled, expired...). */
	| { readonly kind: "orderUpdate"; readonly stream: string; readonly event: string }
	/** Data on a stream this feed does not interpret. */
	| { readonly kind: "unhandled"; readonly stream: string }
	| { readonly kind: "control"; readonly error: string | null };

/** Data frames carry a stream name; control replies do not. */
export function isDataFrame(
	frame: StreamFrame,
): frame is Exclude<StreamFrame, { readonly kind: "control" }> {
	return frame.kind !== "control";
}

export function parseFrame(text: string, receivedAtMs: number): Result<StreamFrame, ValidationError> {
	const parsed = validateJson(z.unknown(), text, "stream frame");
	if (!parsed.ok) return parsed;

	const envelope = envelopeSchema.safeParse(parsed.value);
	if (envelope.success) {
		return parseData(envelope.data.stream, envelope.data.data, receivedAtMs);
	}

	const control = validate(controlSchema, parsed.value, "stream frame");
	if (!control.ok) return control;
	return ok({ kind: "control", error: control.value.error?.message ?? null });
}

function parseData(
	stream: string,
	data: unknown,
	receivedAtMs: number,
): Result<StreamFrame, ValidationError> {
	if (stream.startsWith("bookTicker.")) {
		const r = validate(bookTickerSchema, data, "bookTicker");
		if (!r.ok) return r;
		const t = r.value;
		const ticker: BookTicker = {
			symbol: t.s,
			bid: t.b,
			ask: t.a,
			bidSize: t.B ?? Decimal.zero(),
			askSize: t.A ?? Decimal.zero(),
			mid: t.b.add(t.a).div(TWO),
			receivedAtMs,
		};
		return ok({ kind: "bookTicker", stream, ticker });
	}

	if (stream.startsWith("depth.")) {
		const r = validate(depthSchema, data, "depth");
		if (!r.ok) return r;
		const d = r.value;
		const delta: OrderbookDelta = {
			bids: d.b.map(([price, size]) => ({ price, size })),
			asks: d.a.map(([price, size]) => ({ price, size })),
			...(d.U === undefined ? {} : { firstUpdateId: d.U }),
			...(d.u === undefined ? {} : { lastUpdateId: d.u }),
		};
		return ok({ kind: "depth", stream, delta });
	}

	if (stream.startsWith("account.orderUpdate")) {
		const r = validate(orderUpdateSchema, data, "order update");
		if (!r.ok) return r;
		const u = r.value;
		if (u.e !== "orderFill") return ok({ kind: "orderUpdate", stream, event: u.e });

		const side = u.S === undefined ? null : parseSide(u.S);
		const price = u.L ?? u.p;
		if (u.i === undefined || side === null || u.l === undefined || price === undefined) {
			return err(
				new ValidationError("Invalid orderFill", [
					{ path: [], message: "orderFill needs i, S, l and L or p" },
				]),
			);
		}
		const fill: OrderFill = {
			symbol: u.s,
			orderId: u.i,
			side,
			price,
			quantity: u.l,
			receivedAtMs,
		};
		return ok({ kind: "orderFill", stream, fill });
	}

	return ok({ kind: "unhandled", stream });
}
