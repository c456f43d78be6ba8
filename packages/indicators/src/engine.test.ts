import {
	DAY_MS,
	emptyFundamentals,
	present,
	toIsoDate,
	unavailable,
	type FundamentalsSnapshot,
	type PriceSeries,
} from "@sreit/core";
import { describe, expect, it } from "vitest";
import { resolveIndicatorConfig } from "./config";
import { IndicatorEngine, computeIndicators, valueOrNull } from "./engine";
import { PreconditionError } from "./errors";

const START = Date.UTC(2024, 0, 1);

const buildSeries = (closes: number[], ticker = "TEST.SI"): PriceSeries => ({
	ticker,
	observations: closes.map((close, idx) => ({
		date: toIsoDate(START + idx * DAY_MS),
		close,
	})),
});

const fullFundamentals: FundamentalsSnapshot = {
	yieldPct: present(6.4),
	priceToNav: present(0.91),
	gearingPct: present(38.5),
	nav: present(1.12),
	dpu: present(6.55),
};

const changeFor = (
	result: ReturnType<typeof computeIndicators>,
	horizon: number
): number | null => {
	const entry = result.priceChanges.find((change) => change.horizon === horizon);
	return entry ? valueOrNull(entry.changePct) : null;
};

describe("computeIndicators", () => {
	it("marks every field insufficient for an empty series without throwing", () => {
		const result = computeIndicators(buildSeries([]), emptyFundamentals());
		expect(result.observationCount).toBe(0);
		expect(result.asOf).toBeNull();
		expect(result.latestClose).toEqual({
			status: "insufficient_data",
			required: 1,
			available: 0,
		});
		expect(result.priceChanges).toEqual([
			{ horizon: 5, changePct: { status: "insufficient_data", required: 6, available: 0 } },
			{ horizon: 20, changePct: { status: "insufficient_data", required: 21, available: 0 } },
		]);
		expect(result.rsi).toEqual({ status: "insufficient_data", required: 15, available: 0 });
		expect(result.trend).toEqual({ status: "insufficient_data", required: 20, available: 0 });
	});

	it("keeps only the latest close for a two-day history", () => {
		const result = computeIndicators(buildSeries([1.2, 1.25]), fullFundamentals);
		expect(result.latestClose).toEqual({ status: "ok", value: 1.25 });
		expect(result.asOf).toBe("2024-01-02");
		expect(result.priceChanges.every((c) => c.changePct.status === "insufficient_data")).toBe(true);
		expect(result.rsi.status).toBe("insufficient_data");
		expect(result.trend.status).toBe("insufficient_data");
		expect(result.shortSma.status).toBe("insufficient_data");
		expect(result.longSma.status).toBe("insufficient_data");
	});

	it("computes the weekly change once six closes exist", () => {
		const result = computeIndicators(
			buildSeries([100, 100, 100, 100, 100, 110]),
			emptyFundamentals()
		);
		expect(changeFor(result, 5)).toBe(10);
		expect(changeFor(result, 20)).toBeNull();
	});

	it("reports RSI as insufficient with 14 closes and computes it with 15", () => {
		const closes = Array.from({ length: 15 }, (_, idx) => 2 + idx * 0.01);
		const short = computeIndicators(buildSeries(closes.slice(0, 14)), emptyFundamentals());
		const enough = computeIndicators(buildSeries(closes), emptyFundamentals());
		expect(short.rsi).toEqual({ status: "insufficient_data", required: 15, available: 14 });
		expect(enough.rsi).toEqual({ status: "ok", value: 100 });
	});

	it("reports RSI 0 for a strictly falling series", () => {
		const closes = Array.from({ length: 25 }, (_, idx) => 5 - idx * 0.05);
		const result = computeIndicators(buildSeries(closes), emptyFundamentals());
		expect(result.rsi).toEqual({ status: "ok", value: 0 });
		expect(result.trend).toEqual({ status: "ok", value: "DOWN" });
	});

	it("classifies an uptrend from short and long averages", () => {
		const closes = [...Array.from({ length: 15 }, () => 1), 2, 2, 2, 2, 2];
		const result = computeIndicators(buildSeries(closes), emptyFundamentals());
		expect(result.shortSma).toEqual({ status: "ok", value: 2 });
		expect(result.longSma).toEqual({ status: "ok", value: 1.25 });
		expect(result.trend).toEqual({ status: "ok", value: "UP" });
		expect(changeFor(result, 5)).toBe(100);
		expect(changeFor(result, 20)).toBeNull();
	});

	it("passes fundamentals through untouched", () => {
		const fundamentals: FundamentalsSnapshot = {
			...emptyFundamentals(),
			yieldPct: present(7.2),
		};
		const result = computeIndicators(buildSeries([1, 1.1]), fundamentals);
		expect(result.fundamentals).toBe(fundamentals);
	});

	it("does not couple unavailable fundamentals to computed fields", () => {
		const closes = Array.from({ length: 30 }, (_, idx) => 3 + Math.sin(idx) * 0.1);
		const withAll = computeIndicators(buildSeries(closes), fullFundamentals);
		const withNone = computeIndicators(buildSeries(closes), {
			...fullFundamentals,
			yieldPct: unavailable(),
			gearingPct: unavailable(),
		});
		expect(withNone.rsi).toEqual(withAll.rsi);
		expect(withNone.trend).toEqual(withAll.trend);
		expect(withNone.priceChanges).toEqual(withAll.priceChanges);
		expect(withNone.latestClose).toEqual(withAll.latestClose);
	});

	it("is deterministic for identical inputs", () => {
		const closes = Array.from({ length: 40 }, (_, idx) => 1.5 + Math.cos(idx / 3) * 0.2);
		const first = computeIndicators(buildSeries(closes), fullFundamentals);
		const second = computeIndicators(buildSeries(closes), fullFundamentals);
		expect(second).toEqual(first);
		expect(JSON.stringify(second)).toBe(JSON.stringify(first));
	});

	it("rejects duplicate dates", () => {
		const series: PriceSeries = {
			ticker: "DUP.SI",
			observations: [
				{ date: "2024-01-02", close: 1 },
				{ date: "2024-01-02", close: 1.1 },
			],
		};
		expect(() => computeIndicators(series, emptyFundamentals())).toThrowError(
			PreconditionError
		);
		expect(() => computeIndicators(series, emptyFundamentals())).toThrowError(
			/duplicate date 2024-01-02/
		);
	});

	it("rejects descending dates and non-positive closes", () => {
		expect(() =>
			computeIndicators(
				{
					ticker: "ORD.SI",
					observations: [
						{ date: "2024-01-03", close: 1 },
						{ date: "2024-01-02", close: 1 },
					],
				},
				emptyFundamentals()
			)
		).toThrowError(/precedes/);
		expect(() =>
			computeIndicators(buildSeries([1, 0]), emptyFundamentals())
		).toThrowError(/positive finite/);
	});
});

describe("IndicatorEngine", () => {
	it("applies its configuration to every computation", () => {
		const engine = new IndicatorEngine(
			resolveIndicatorConfig({
				rsiPeriod: 3,
				trendShortWindow: 2,
				trendLongWindow: 4,
				changeHorizons: [1],
			})
		);
		const result = engine.compute(buildSeries([1, 1.1, 1.2, 1.3]), emptyFundamentals());
		expect(result.rsi).toEqual({ status: "ok", value: 100 });
		expect(result.priceChanges).toEqual([
			{ horizon: 1, changePct: { status: "ok", value: 8.33 } },
		]);
		expect(result.trend).toEqual({ status: "ok", value: "UP" });
	});
});
