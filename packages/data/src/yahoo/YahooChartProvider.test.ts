import fs from "node:fs";
import path from "node:path";
import { silentLogger, type HttpClient, type HttpRequestConfig, type HttpResponse } from "@sreit/core";
import { describe, expect, it } from "vitest";
import { ProviderError } from "../errors";
import { mapChartResponse } from "./chartMapper";
import { YahooChartProvider } from "./YahooChartProvider";

const sample: unknown = JSON.parse(
	fs.readFileSync(path.join(__dirname, "..", "__tests__", "fixtures", "chart-sample.json"), "utf8")
);

interface RecordedGet {
	url: string;
	config?: HttpRequestConfig;
}

class ScriptedHttpClient implements HttpClient {
	readonly gets: RecordedGet[] = [];

	constructor(private readonly script: Array<HttpResponse | Error>) {}

	async get(url: string, config?: HttpRequestConfig): Promise<HttpResponse> {
		this.gets.push({ url, config });
		const next = this.script.shift();
		if (next === undefined) {
			throw new Error("no scripted response left");
		}
		if (next instanceof Error) {
			throw next;
		}
		return next;
	}

	async post(): Promise<HttpResponse> {
		throw new Error("unexpected POST");
	}
}

class StatusError extends Error {
	readonly response: { status: number };

	constructor(status: number) {
		super(`Request failed with status code ${status}`);
		this.response = { status };
	}
}

describe("mapChartResponse", () => {
	it("maps closes to exchange-local dates, dropping gaps and keeping the last bar per day", () => {
		expect(mapChartResponse("AAA.SI", sample)).toEqual({
			ticker: "AAA.SI",
			observations: [
				{ date: "2024-01-02", close: 2.35 },
				{ date: "2024-01-04", close: 2.38 },
				{ date: "2024-01-05", close: 2.41 },
			],
		});
	});

	it("returns an empty series when the chart has no result", () => {
		expect(mapChartResponse("AAA.SI", { chart: { result: [], error: null } })).toEqual({
			ticker: "AAA.SI",
			observations: [],
		});
	});

	it("surfaces chart-level errors", () => {
		expect(() =>
			mapChartResponse("BAD.SI", {
				chart: {
					result: null,
					error: { code: "Not Found", description: "No data found, symbol may be delisted" },
				},
			})
		).toThrowError("BAD.SI: chart error Not Found: No data found, symbol may be delisted");
	});

	it("rejects payloads without a chart object", () => {
		expect(() => mapChartResponse("AAA.SI", "<html></html>")).toThrowError(ProviderError);
	});

	it("rejects mismatched timestamp and close arrays", () => {
		expect(() =>
			mapChartResponse("AAA.SI", {
				chart: {
					result: [
						{
							timestamp: [1704153600, 1704240000],
							indicators: { quote: [{ close: [2.3] }] },
						},
					],
				},
			})
		).toThrowError(/length mismatch \(2 vs 1\)/);
	});
});

describe("YahooChartProvider", () => {
	it("requests the daily chart for the lookback range", async () => {
		const http = new ScriptedHttpClient([{ status: 200, data: sample }]);
		const provider = new YahooChartProvider({ http, logger: silentLogger });
		const series = await provider.fetchPriceSeries("AAA.SI", { lookback: "3mo" });
		expect(series.observations).toHaveLength(3);
		expect(http.gets).toEqual([
			{
				url: "https://query1.finance.yahoo.com/v8/finance/chart/AAA.SI",
				config: { params: { range: "3mo", interval: "1d" } },
			},
		]);
	});

	it("retries transient failures before succeeding", async () => {
		const http = new ScriptedHttpClient([new StatusError(503), { status: 200, data: sample }]);
		const provider = new YahooChartProvider({
			http,
			logger: silentLogger,
			sleep: async () => undefined,
		});
		const series = await provider.fetchPriceSeries("AAA.SI");
		expect(series.observations[2]).toEqual({ date: "2024-01-05", close: 2.41 });
		expect(http.gets).toHaveLength(2);
	});

	it("wraps non-retryable failures in a ProviderError", async () => {
		const http = new ScriptedHttpClient([new StatusError(404)]);
		const provider = new YahooChartProvider({ http, logger: silentLogger });
		const failure = await provider.fetchPriceSeries("NOPE.SI").catch((error: unknown) => error);
		expect(failure).toBeInstanceOf(ProviderError);
		expect(failure).toMatchObject({ provider: "yahoo-chart", ticker: "NOPE.SI", status: 404 });
	});
});
