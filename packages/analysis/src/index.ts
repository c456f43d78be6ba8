export * from "./reportSchema";
export { getSectorCategory } from "./sectors";
export {
	CONSERVATIVE_GEARING_PCT,
	DEEP_DISCOUNT_PNAV,
	fundamentalInsights,
	HIGH_GEARING_PCT,
	HIGH_YIELD_PCT,
	INSUFFICIENT_HISTORY_INSIGHT,
	NORMAL_RANGE_INSIGHT,
	PREMIUM_PNAV,
	PRICE_UNAVAILABLE_INSIGHT,
	RSI_OVERBOUGHT,
	RSI_OVERSOLD,
	rowStatus,
	technicalInsights,
} from "./insights";
export { buildReportRow } from "./rows";
export type { BuildRowOptions } from "./rows";
export { computePortfolioMetrics, summariseSectors } from "./portfolio";
export {
	bottomMovers,
	horizonLabel,
	largestAbsoluteMovers,
	primaryChange,
	primaryHorizon,
	rankByChange,
	topMovers,
} from "./rankings";
export type { RankedRow } from "./rankings";
