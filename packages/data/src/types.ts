import type {
	FundamentalsSnapshot,
	ModuleLogger,
	PriceSeries,
	ReitDefinition,
} from "@sreit/core";

export interface FetchSeriesOptions {
	/**
	 * Chart range such as "3mo", "6mo" or "1y".
	 */
	lookback?: string;
}

export interface PriceSeriesProvider {
	fetchPriceSeries(ticker: string, options?: FetchSeriesOptions): Promise<PriceSeries>;
}

/**
 * Supplies point-in-time fundamentals. Individual metrics may be unavailable;
 * implementations do not reject for a missing metric or an unmatched REIT.
 */
export interface FundamentalsProvider {
	fetchFundamentals(reit: ReitDefinition): Promise<FundamentalsSnapshot>;
}

export interface FundamentalsRow {
	name: string;
	snapshot: FundamentalsSnapshot;
}

export interface ProviderOptions {
	logger?: ModuleLogger;
	maxRetries?: number;
	initialBackoffMs?: number;
	sleep?: (ms: number) => Promise<void>;
}
