import type { FundamentalsSnapshot, MetricValue } from "./types";

const UNAVAILABLE: MetricValue = Object.freeze({ status: "unavailable" });

export const present = (value: number): MetricValue => ({
	status: "present",
	value,
});

export const unavailable = (): MetricValue => UNAVAILABLE;

/**
 * Wrap a possibly-missing number. NaN and infinities count as missing.
 */
export const metricFrom = (value: number | null | undefined): MetricValue =>
	typeof value === "number" && Number.isFinite(value)
		? present(value)
		: UNAVAILABLE;

export type PresentMetric = Extract<MetricValue, { status: "present" }>;

export const isPresent = (metric: MetricValue): metric is PresentMetric =>
	metric.status === "present";

/**
 * Numeric view for comparisons and averages. Callers must handle `null`
 * explicitly so "unavailable" never turns into zero.
 */
export const metricValue = (metric: MetricValue): number | null =>
	metric.status === "present" ? metric.value : null;

export const emptyFundamentals = (): FundamentalsSnapshot => ({
	yieldPct: UNAVAILABLE,
	priceToNav: UNAVAILABLE,
	gearingPct: UNAVAILABLE,
	nav: UNAVAILABLE,
	dpu: UNAVAILABLE,
});
