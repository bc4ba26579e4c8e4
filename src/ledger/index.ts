export { IN_MEMORY, type LedgerConnection, type LedgerDb, openLedgerDb } from "./database.js";
export {
	type CachedPosition,
	type PositionCacheOptions,
	type PositionJob,
	type PositionStore,
	PositionCache,
} from "./position-cache.js";
export {
	type LedgerFill,
	type Position,
	type PositionLedgerOptions,
	type Trade,
	PositionLedger,
} from "./position-ledger.js";
export {
	EMPTY_POSITION,
	type FillDelta,
	type PositionState,
	applyFillToPosition,
	averagePrice,
	clampPosition,
} from "./position-math.js";
export { positions, trades } from "./schema.js";
