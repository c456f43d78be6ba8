export * from "./time/time";

/**
 * One trading day's closing price. `date` is an exchange-local calendar date
 * in YYYY-MM-DD form.
 */
export interface PriceObservation {
	readonly date: string;
	readonly close: number;
}

/**
 * Daily closes for one ticker, ascending by date with unique dates.
 */
export interface PriceSeries {
	readonly ticker: string;
	readonly observations: readonly PriceObservation[];
}

export type MetricValue =
	| { readonly status: "present"; readonly value: number }
	| { readonly status: "unavailable" };

export interface FundamentalsSnapshot {
	readonly yieldPct: MetricValue;
	readonly priceToNav: MetricValue;
	readonly gearingPct: MetricValue;
	readonly nav: MetricValue;
	readonly dpu: MetricValue;
}

export type FundamentalField = keyof FundamentalsSnapshot;

export interface ReitDefinition {
	ticker: string;
	name: string;
	segment: string;
}
