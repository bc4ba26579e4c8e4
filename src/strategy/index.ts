export { type AccountValue, splitSymbol, valueAccount } from "./account-value.js";
export {
	type SpreadConfig,
	type SpreadQuote,
	bandVolatility,
	baseSpreadFor,
	calcDynamicSpread,
} from "./dynamic-spread.js";
export {
	type Ladder,
	type LadderConfig,
	type LadderOrder,
	buildLadder,
	levelPrices,
} from "./grid-ladder.js";
export {
	type BandSource,
	type CycleOutcome,
	type CycleReport,
	type OrderingEngineOptions,
	type PositionPort,
	OrderingEngine,
} from "./ordering-engine.js";
export { type ScaleBounds, bandPosition, calcPositionScale } from "./position-scale.js";
export { type RiskDecision, type RiskLimits, evaluateRisk } from "./risk-control.js";
export { type StrategySettings, strategySettings } from "./settings.js";
