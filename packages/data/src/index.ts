export * from "./types";
export { ProviderError } from "./errors";
export type { ProviderErrorDetails } from "./errors";
export { mapChartResponse } from "./yahoo/chartMapper";
export { YahooChartProvider, YAHOO_CHART_URL } from "./yahoo/YahooChartProvider";
export type { YahooChartProviderOptions } from "./yahoo/YahooChartProvider";
export {
	cellText,
	classifyHeader,
	parseFundamentalsTable,
	parseMetricCell,
} from "./fundamentals/parseTable";
export { matchFundamentals, normalizeReitName } from "./fundamentals/matchFundamentals";
export { ScrapedFundamentalsProvider } from "./fundamentals/ScrapedFundamentalsProvider";
export type { ScrapedFundamentalsProviderOptions } from "./fundamentals/ScrapedFundamentalsProvider";
export {
	JsonFundamentalsProvider,
	parseFundamentalsDocument,
	UnavailableFundamentalsProvider,
} from "./fundamentals/JsonFundamentalsProvider";
