import type { Balances, ExchangeGateway } from "../exchange/types.js";
import type { Logger } from "../lib/logger/index.js";
import { ValidationError } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

export interface AccountValue {
	readonly baseAsset: string;
	readonly quoteAsset: string;
	/** Free plus locked, adjusted by the borrow/lend net quantity. */
	readonly base: Decimal;
	readonly quote: Decimal;
	/** `base × price + quote`, in the quote asset. */
	readonly total: Decimal;
}

/** `SOL_USDC` -> `["SOL", "USDC"]` */
export function splitSymbol(symbol: string): Result<readonly [string, string], ValidationError> {
	const parts = symbol.split("_");
	const [base, quote] = parts;
	if (parts.length !== 2 || !base || !quote) {
		return err(
			new ValidationError(`Invalid symbol "${symbol}"`, [
				{ path: ["symbol"], message: "expected BASE_QUOTE" },
			]),
		);
	}
	return ok([base, quote]);
}

function held(balances: Balances, asset: string): Decimal {
	const balance = balances[asset];
	return balance === undefined ? Decimal.zero() : balance.available.add(balance.locked);
}

/**
 * Value the account's holdings of one instrument at `price`.
 *
 * A failing balance query fails the valuation. Borrow/lend positions only
 * adjust it, so a failing borrow/lend query is logged and skipped.
 */
export async function valueAccount(
	gateway: ExchangeGateway,
	symbol: string,
	price: Decimal,
	logger: Logger,
): Promise<Result<AccountValue, TradingError>> {
	const assets = splitSymbol(symbol);
	if (!assets.ok) return assets;
	const [baseAsset, quoteAsset] = assets.value;

	const balances = await gateway.getBalances();
	if (!balances.ok) return balances;
	let base = held(balances.value, baseAsset);
	let quote = held(balances.value, quoteAsset);

	const lending = await gateway.getBorrowLendPositions();
	if (lending.ok) {
		for (const position of lending.value) {
			if (position.symbol === baseAsset) base = base.add(position.netQuantity);
			else if (position.symbol === quoteAsset) quote = quote.add(position.netQuantity);
		}
	} else {
		logger.warn({ err: lending.error.message }, "Borrow/lend positions unavailable");
	}

	return ok({ baseAsset, quoteAsset, base, quote, total: base.mul(price).add(quote) });
}
