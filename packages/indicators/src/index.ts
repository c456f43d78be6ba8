export { sma } from "./sma";
export { rsi, rsiSeries } from "./rsi";
export type { RsiSmoothing } from "./rsi";
export { percentChange } from "./priceChange";
export { classifyTrend, classifyTrendFromAverages } from "./trend";
export type { TrendDirection, TrendReading } from "./trend";
export { roundTo } from "./round";
export { PreconditionError } from "./errors";
export { DEFAULT_INDICATOR_CONFIG, resolveIndicatorConfig } from "./config";
export type { IndicatorConfig } from "./config";
export {
	IndicatorEngine,
	assertSeriesOrdered,
	computeIndicators,
	insufficient,
	ok,
	valueOrNull,
} from "./engine";
export type { IndicatorResult, IndicatorValue, PriceChange } from "./engine";
