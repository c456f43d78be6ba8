import {
	isIsoDate,
	type FundamentalsSnapshot,
	type PriceSeries,
} from "@sreit/core";

import { DEFAULT_INDICATOR_CONFIG, type IndicatorConfig } from "./config";
import { PreconditionError } from "./errors";
import { percentChange } from "./priceChange";
import { rsi } from "./rsi";
import { classifyTrend, type TrendDirection } from "./trend";

export type IndicatorValue<T> =
	| { readonly status: "ok"; readonly value: T }
	| {
			readonly status: "insufficient_data";
			readonly required: number;
			readonly available: number;
	  };

export interface PriceChange {
	readonly horizon: number;
	readonly changePct: IndicatorValue<number>;
}

export interface IndicatorResult {
	readonly ticker: string;
	readonly observationCount: number;
	readonly asOf: string | null;
	readonly latestClose: IndicatorValue<number>;
	readonly priceChanges: readonly PriceChange[];
	readonly rsi: IndicatorValue<number>;
	readonly trend: IndicatorValue<TrendDirection>;
	readonly shortSma: IndicatorValue<number>;
	readonly longSma: IndicatorValue<number>;
	readonly fundamentals: FundamentalsSnapshot;
}

export const ok = <T>(value: T): IndicatorValue<T> => ({ status: "ok", value });

export const insufficient = <T>(
	required: number,
	available: number
): IndicatorValue<T> => ({ status: "insufficient_data", required, available });

export const valueOrNull = <T>(indicator: IndicatorValue<T>): T | null =>
	indicator.status === "ok" ? indicator.value : null;

const fromNullable = <T>(
	value: T | null,
	required: number,
	available: number
): IndicatorValue<T> =>
	value === null ? insufficient(required, available) : ok(value);

/**
 * Rejects series that break the ordering contract. Length is not checked:
 * short series are legal and produce insufficient-data markers.
 */
export const assertSeriesOrdered = (series: PriceSeries): void => {
	let previous: string | null = null;
	series.observations.forEach((observation, index) => {
		if (!isIsoDate(observation.date)) {
			throw new PreconditionError(
				series.ticker,
				index,
				`invalid date "${observation.date}"`
			);
		}
		if (!Number.isFinite(observation.close) || observation.close <= 0) {
			throw new PreconditionError(
				series.ticker,
				index,
				`close must be a positive finite number, got ${observation.close}`
			);
		}
		if (previous !== null && observation.date <= previous) {
			throw new PreconditionError(
				series.ticker,
				index,
				observation.date === previous
					? `duplicate date ${observation.date}`
					: `date ${observation.date} precedes ${previous}`
			);
		}
		previous = observation.date;
	});
};

/**
 * Pure indicator computation for one ticker. Identical inputs always yield an
 * identical result; fundamentals are passed through untouched.
 */
export const computeIndicators = (
	series: PriceSeries,
	fundamentals: FundamentalsSnapshot,
	config: IndicatorConfig = DEFAULT_INDICATOR_CONFIG
): IndicatorResult => {
	assertSeriesOrdered(series);

	const closes = series.observations.map((observation) => observation.close);
	const count = closes.length;
	const latest = series.observations[count - 1];

	const priceChanges = config.changeHorizons.map(
		(horizon): PriceChange => ({
			horizon,
			changePct: fromNullable(percentChange(closes, horizon), horizon + 1, count),
		})
	);

	const trendReading = classifyTrend(
		closes,
		config.trendShortWindow,
		config.trendLongWindow,
		config.trendTolerancePct
	);

	return {
		ticker: series.ticker,
		observationCount: count,
		asOf: latest ? latest.date : null,
		latestClose: latest ? ok(latest.close) : insufficient(1, 0),
		priceChanges,
		rsi: fromNullable(
			rsi(closes, config.rsiPeriod, config.rsiSmoothing),
			config.rsiPeriod + 1,
			count
		),
		trend: trendReading
			? ok(trendReading.direction)
			: insufficient(config.trendLongWindow, count),
		shortSma: trendReading
			? ok(trendReading.shortAverage)
			: insufficient(config.trendLongWindow, count),
		longSma: trendReading
			? ok(trendReading.longAverage)
			: insufficient(config.trendLongWindow, count),
		fundamentals,
	};
};

/**
 * Holds one resolved configuration so every ticker in a run is computed with
 * the same windows and smoothing.
 */
export class IndicatorEngine {
	readonly config: IndicatorConfig;

	constructor(config: IndicatorConfig = DEFAULT_INDICATOR_CONFIG) {
		this.config = config;
	}

	compute(series: PriceSeries, fundamentals: FundamentalsSnapshot): IndicatorResult {
		return computeIndicators(series, fundamentals, this.config);
	}
}
