import {
	createHttpClient,
	createLogger,
	errorMessage,
	httpStatusOf,
	withRetry,
	type HttpClient,
	type PriceSeries,
} from "@sreit/core";

import { ProviderError } from "../errors";
import type { FetchSeriesOptions, PriceSeriesProvider, ProviderOptions } from "../types";
import { mapChartResponse } from "./chartMapper";

export const YAHOO_CHART_URL = "https://query1.finance.yahoo.com/v8/finance/chart";

const DEFAULT_LOOKBACK = "6mo";

export interface YahooChartProviderOptions extends ProviderOptions {
	http?: HttpClient;
	baseUrl?: string;
}

export class YahooChartProvider implements PriceSeriesProvider {
	private readonly http: HttpClient;
	private readonly baseUrl: string;

	constructor(private readonly options: YahooChartProviderOptions = {}) {
		this.http = options.http ?? createHttpClient();
		this.baseUrl = options.baseUrl ?? YAHOO_CHART_URL;
	}

	async fetchPriceSeries(
		ticker: string,
		options: FetchSeriesOptions = {}
	): Promise<PriceSeries> {
		const logger = this.options.logger ?? createLogger("data:yahoo");
		const range = options.lookback ?? DEFAULT_LOOKBACK;
		const url = `${this.baseUrl}/${encodeURIComponent(ticker)}`;

		let payload: unknown;
		try {
			const response = await withRetry(
				() => this.http.get(url, { params: { range, interval: "1d" } }),
				{
					label: `chart:${ticker}`,
					logger,
					maxRetries: this.options.maxRetries,
					initialBackoffMs: this.options.initialBackoffMs,
					sleep: this.options.sleep,
				}
			);
			payload = response.data;
		} catch (error) {
			throw new ProviderError(`${ticker}: chart request failed: ${errorMessage(error)}`, {
				provider: "yahoo-chart",
				ticker,
				status: httpStatusOf(error),
				cause: error,
			});
		}

		const series = mapChartResponse(ticker, payload);
		logger.debug("price_series_loaded", {
			ticker,
			range,
			observations: series.observations.length,
			first: series.observations[0]?.date ?? null,
			last: series.observations[series.observations.length - 1]?.date ?? null,
		});
		return series;
	}
}
