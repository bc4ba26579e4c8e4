/**
 * Auth types.
 *
 * Key material is sealed into `Credentials` right after it is read from the
 * environment. Only the signer unwraps it.
 */

/** Raw Backpack key pair before sealing. */
export interface ApiKeySet {
	/** Sent as X-API-KEY and as the first element of stream signatures. */
	readonly apiKey: string;
	/** HMAC-SHA256 signing secret. */
	readonly secret: string;
}

/** Headers attached to every signed REST request. */
export interface SignedHeaders {
	readonly "X-API-KEY": string;
	readonly "X-SIGNATURE": string;
	readonly "X-TIMESTAMP": string;
	readonly "X-WINDOW": string;
}

/** `[apiKey, signature, timestamp, window]` as carried by private stream subscriptions. */
export type StreamSignature = readonly [string, string, string, string];
