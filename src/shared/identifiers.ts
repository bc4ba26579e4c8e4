/**
 * Branded identifiers. A brand keeps an exchange order id from being passed
 * where a client id is expected.
 */

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Order id assigned by the exchange. */
export type ExchangeOrderId = Brand<string, "ExchangeOrderId">;
/** Numeric client id attached to an order at placement. */
export type ClientOrderId = Brand<number, "ClientOrderId">;

/** @throws Error when the id is blank */
export function exchangeOrderId(value: string): ExchangeOrderId {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error("ExchangeOrderId cannot be empty");
	}
	return trimmed as ExchangeOrderId;
}

/** The exchange takes client ids as unsigned 32-bit integers. */
export function clientOrderId(value: number): ClientOrderId {
	if (!Number.isInteger(value) || value < 0 || value > 0xffff_ffff) {
		throw new Error(`ClientOrderId must be a u32, got ${value}`);
	}
	return value as ClientOrderId;
}
