export { BollingerBand, isInBand } from "./bollinger.js";
export type { BandSnapshot } from "./bollinger.js";
export { IndicatorEngine } from "./indicator-engine.js";
export type { IndicatorConfig, IndicatorRefresh, IndicatorSnapshot } from "./indicator-engine.js";
export { parseKlines, parseStartTime } from "./kline.js";
export type { Kline, ParsedKlines } from "./kline.js";
