/**
 * Request signing — HMAC-SHA256 over the canonical instruction string
 * `instruction=<name>&<sorted params>&timestamp=<ms>&window=<ms>`.
 */

import { createHmac } from "node:crypto";
import { AuthError } from "../shared/errors.js";
import { unwrapCredentials } from "./credentials.js";
import type { Credentials } from "./credentials.js";
import type { SignedHeaders, StreamSignature } from "./types.js";

export type SignParams = Readonly<Record<string, string | number | boolean>>;

/** Instruction used when signing private stream subscriptions. */
export const SUBSCRIBE_INSTRUCTION = "subscribe";

/**
 * @example
 * buildSignMessage("orderCancelAll", { symbol: "SOL_USDC" }, 1700000000000, 5000)
 * // "instruction=orderCancelAll&symbol=SOL_USDC&timestamp=1700000000000&window=5000"
 */
export function buildSignMessage(
	instruction: string,
	params: SignParams,
	timestamp: number,
	windowMs: number,
): string {
	const query = Object.keys(params)
		.sort()
		.map((key) => `${key}=${String(params[key])}`)
		.join("&");
	const head = `instruction=${instruction}`;
	const tail = `timestamp=${timestamp}&window=${windowMs}`;
	return query.length > 0 ? `${head}&${query}&${tail}` : `${head}&${tail}`;
}

export function hmacSha256Hex(secret: string, message: string): string {
	return createHmac("sha256", secret).update(message).digest("hex");
}

function checkClock(timestamp: number, windowMs: number): void {
	if (!Number.isInteger(timestamp) || timestamp <= 0) {
		throw new AuthError("Timestamp must be a positive integer of milliseconds");
	}
	if (!Number.isInteger(windowMs) || windowMs <= 0) {
		throw new AuthError("Signature window must be a positive integer of milliseconds");
	}
}

/**
 * Headers for a signed REST call.
 * @throws AuthError for invalid credentials or clock values
 */
export function signRequest(
	credentials: Credentials,
	instruction: string,
	params: SignParams,
	timestamp: number,
	windowMs: number,
): SignedHeaders {
	checkClock(timestamp, windowMs);
	const { apiKey, secret } = unwrapCredentials(credentials);
	const message = buildSignMessage(instruction, params, timestamp, windowMs);
	return {
		"X-API-KEY": apiKey,
		"X-SIGNATURE": hmacSha256Hex(secret, message),
		"X-TIMESTAMP": String(timestamp),
		"X-WINDOW": String(windowMs),
	};
}

/** Signature array attached to SUBSCRIBE requests for account channels. */
export function signStreamSubscription(
	credentials: Credentials,
	timestamp: number,
	windowMs: number,
): StreamSignature {
	checkClock(timestamp, windowMs);
	const { apiKey, secret } = unwrapCredentials(credentials);
	const message = buildSignMessage(SUBSCRIBE_INSTRUCTION, {}, timestamp, windowMs);
	return [apiKey, hmacSha256Hex(secret, message), String(timestamp), String(windowMs)];
}
