/**
 * Decimal — the money type used by domain code.
 *
 * Every price, quantity, cost and band value is a Decimal. Raw `number`
 * only appears at the wire boundary and in log fields.
 */

import { LibDecimal } from "../lib/decimal/index.js";

export { LibDecimal as Decimal };
export type { RoundingMode } from "../lib/decimal/index.js";

/** Parse an exchange decimal string, returning null for anything malformed. */
export function parseDecimal(value: string | number): LibDecimal | null {
	try {
		return LibDecimal.from(value);
	} catch {
		return null;
	}
}
