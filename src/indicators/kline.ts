/**
 * Kline rows arrive either as objects (`{ start, close, ... }`) or as
 * positional arrays (`[start, open, high, low, close, ...]`). Both are
 * reduced to closes ordered by start time.
 */

import { ValidationError, validate, z } from "../lib/validation/index.js";
import { Decimal, parseDecimal } from "../shared/decimal.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";

const scalar = z.union([z.string(), z.number()]);

const objectRow = z.object({ start: scalar, close: scalar }).passthrough();
const arrayRow = z.array(z.union([scalar, z.null()])).min(5);
const rowSchema = z.union([objectRow, arrayRow]);

export interface Kline {
	readonly startMs: number;
	readonly close: Decimal;
}

export interface ParsedKlines {
	/** Closes in ascending start order. */
	readonly closes: readonly Decimal[];
	/** Rows that could not be read. */
	readonly dropped: number;
}

/** Epoch seconds, epoch milliseconds, or "YYYY-MM-DD HH:mm:ss" (UTC). */
export function parseStartTime(value: string | number): number | null {
	if (typeof value === "number") {
		return Number.isFinite(value) ? normalizeEpoch(value) : null;
	}
	const trimmed = value.trim();
	if (/^\d+$/.test(trimmed)) return normalizeEpoch(Number(trimmed));
	const iso = trimmed.includes("T") ? trimmed : trimmed.replace(" ", "T");
	const withZone = /([zZ]|[+-]\d\d:?\d\d)$/.test(iso) ? iso : `${iso}Z`;
	const parsed = Date.parse(withZone);
	return Number.isNaN(parsed) ? null : parsed;
}

function normalizeEpoch(value: number): number {
	return value < 1e11 ? value * 1_000 : value;
}

function toKline(row: unknown): Kline | null {
	const parsed = rowSchema.safeParse(row);
	if (!parsed.success) return null;

	const data = parsed.data;
	let start: string | number | null | undefined;
	let close: string | number | null | undefined;
	if (Array.isArray(data)) {
		start = data[0];
		close = data[4];
	} else {
		start = data.start;
		close = data.close;
	}
	if (start === null || start === undefined || close === null || close === undefined) return null;

	const startMs = parseStartTime(start);
	const closeValue = parseDecimal(close);
	if (startMs === null || closeValue === null || !closeValue.isPositive()) return null;
	return { startMs, close: closeValue };
}

export function parseKlines(raw: unknown): Result<ParsedKlines, ValidationError> {
	const rows = validate(z.array(z.unknown()), raw, "kline response");
	if (!rows.ok) return err(rows.error);

	const klines: Kline[] = [];
	for (const row of rows.value) {
		const kline = toKline(row);
		if (kline !== null) klines.push(kline);
	}
	klines.sort((a, b) => a.startMs - b.startMs);
	return ok({ closes: klines.map((k) => k.close), dropped: rows.value.length - klines.length });
}
