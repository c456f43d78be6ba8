import { describe, expect, it } from "vitest";
import { DEFAULT_INDICATOR_CONFIG, resolveIndicatorConfig } from "./config";

describe("resolveIndicatorConfig", () => {
	it("returns the documented defaults", () => {
		expect(resolveIndicatorConfig()).toEqual({
			rsiPeriod: 14,
			rsiSmoothing: "simple",
			trendShortWindow: 5,
			trendLongWindow: 20,
			trendTolerancePct: 0.1,
			changeHorizons: [5, 20],
		});
	});

	it("merges overrides without touching the defaults", () => {
		const config = resolveIndicatorConfig({ trendTolerancePct: 0.25, changeHorizons: [1, 5] });
		expect(config.trendTolerancePct).toBe(0.25);
		expect(config.changeHorizons).toEqual([1, 5]);
		expect(DEFAULT_INDICATOR_CONFIG.changeHorizons).toEqual([5, 20]);
		expect(Object.isFrozen(config)).toBe(true);
	});

	it("rejects unknown options", () => {
		expect(() => resolveIndicatorConfig({ rsiPeriods: 10 })).toThrowError(
			/Unknown indicator config option\(s\): rsiPeriods/
		);
	});

	it("rejects a short window that is not shorter than the long window", () => {
		expect(() =>
			resolveIndicatorConfig({ trendShortWindow: 20, trendLongWindow: 20 })
		).toThrowError(/must be smaller/);
	});

	it("rejects invalid numbers", () => {
		expect(() => resolveIndicatorConfig({ rsiPeriod: 0 })).toThrowError(/rsiPeriod/);
		expect(() => resolveIndicatorConfig({ trendTolerancePct: -1 })).toThrowError(
			/trendTolerancePct/
		);
		expect(() => resolveIndicatorConfig({ changeHorizons: [] })).toThrowError(
			/changeHorizons/
		);
		expect(() => resolveIndicatorConfig({ changeHorizons: [5, 5] })).toThrowError(
			/must not repeat/
		);
		expect(() => resolveIndicatorConfig({ rsiSmoothing: "ema" })).toThrowError(
			/rsiSmoothing/
		);
	});
});
