/**
 * Order side as the exchange spells it. Bids buy the base asset, asks sell it.
 */

export const OrderSide = {
	Bid: "Bid",
	Ask: "Ask",
} as const;

export type OrderSide = (typeof OrderSide)[keyof typeof OrderSide];

export function oppositeSide(side: OrderSide): OrderSide {
	return side === OrderSide.Bid ? OrderSide.Ask : OrderSide.Bid;
}

/** Accepts `Bid`/`Ask` and the `buy`/`sell` aliases in any case. */
export function parseSide(raw: string): OrderSide | null {
	switch (raw.trim().toLowerCase()) {
		case "bid":
		case "buy":
			return OrderSide.Bid;
		case "ask":
		case "sell":
			return OrderSide.Ask;
		default:
			return null;
	}
}
