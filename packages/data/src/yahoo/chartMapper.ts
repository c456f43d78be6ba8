import { epochSecondsToIsoDate, type PriceObservation, type PriceSeries } from "@sreit/core";

import { ProviderError } from "../errors";

const PROVIDER = "yahoo-chart";

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const fail = (ticker: string, message: string): never => {
	throw new ProviderError(`${ticker}: ${message}`, { provider: PROVIDER, ticker });
};

/**
 * Converts a v8 chart payload into a daily close series.
 *
 * Bars without a usable close are dropped, timestamps become exchange-local
 * calendar dates, and when two bars land on the same date (an intraday
 * "live" bar next to the daily bar) the later one wins.
 */
export const mapChartResponse = (ticker: string, payload: unknown): PriceSeries => {
	if (!isRecord(payload) || !isRecord(payload.chart)) {
		return fail(ticker, "chart payload is missing");
	}
	const { chart } = payload;
	if (isRecord(chart.error)) {
		const code = typeof chart.error.code === "string" ? chart.error.code : "error";
		const description =
			typeof chart.error.description === "string" ? chart.error.description : "unknown";
		return fail(ticker, `chart error ${code}: ${description}`);
	}
	if (!Array.isArray(chart.result) || chart.result.length === 0) {
		return { ticker, observations: [] };
	}
	const result: unknown = chart.result[0];
	if (!isRecord(result)) {
		return fail(ticker, "chart result is malformed");
	}

	const meta = isRecord(result.meta) ? result.meta : {};
	const gmtOffset = typeof meta.gmtoffset === "number" ? meta.gmtoffset : 0;
	const timestamps = Array.isArray(result.timestamp) ? result.timestamp : [];
	const indicators = isRecord(result.indicators) ? result.indicators : {};
	const quotes = Array.isArray(indicators.quote) ? indicators.quote : [];
	const firstQuote: unknown = quotes[0];
	const closes =
		isRecord(firstQuote) && Array.isArray(firstQuote.close) ? firstQuote.close : [];

	if (timestamps.length !== closes.length) {
		return fail(
			ticker,
			`timestamp/close length mismatch (${timestamps.length} vs ${closes.length})`
		);
	}

	const byDate = new Map<string, number>();
	timestamps.forEach((ts: unknown, index: number) => {
		const close: unknown = closes[index];
		if (
			typeof ts !== "number" ||
			typeof close !== "number" ||
			!Number.isFinite(close) ||
			close <= 0
		) {
			return;
		}
		byDate.set(epochSecondsToIsoDate(ts, gmtOffset), close);
	});

	const observations: PriceObservation[] = Array.from(byDate.entries())
		.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
		.map(([date, close]) => ({ date, close }));

	return { ticker, observations };
};
