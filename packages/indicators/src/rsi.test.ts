import { describe, expect, it } from "vitest";
import { rsi, rsiSeries } from "./rsi";

const rising = Array.from({ length: 20 }, (_, idx) => 10 + idx * 0.1);
const falling = Array.from({ length: 20 }, (_, idx) => 10 - idx * 0.1);

// deterministic pseudo-random walk
const randomWalk = (seed: number, length: number): number[] => {
	let state = seed;
	const next = (): number => {
		state = (state * 16_807) % 2_147_483_647;
		return state / 2_147_483_647;
	};
	const values = [5];
	for (let i = 1; i < length; i += 1) {
		const prev = values[i - 1];
		values.push(Math.max(0.01, prev * (1 + (next() - 0.5) * 0.06)));
	}
	return values;
};

describe("rsi", () => {
	it("is null below period + 1 observations", () => {
		expect(rsi(rising.slice(0, 14), 14)).toBeNull();
		expect(rsi([], 14)).toBeNull();
		expect(rsi(rising.slice(0, 14), 14, "wilder")).toBeNull();
	});

	it("is 100 for a strictly rising series", () => {
		expect(rsi(rising.slice(0, 15), 14)).toBe(100);
		expect(rsi(rising, 14)).toBe(100);
		expect(rsi(rising, 14, "wilder")).toBe(100);
	});

	it("is 0 for a strictly falling series", () => {
		expect(rsi(falling.slice(0, 15), 14)).toBe(0);
		expect(rsi(falling, 14, "wilder")).toBe(0);
	});

	it("averages the trailing window with simple smoothing", () => {
		// 14 changes: seven +2 and seven -1 => avgGain 1, avgLoss 0.5, RS 2
		const closes = [100];
		for (let i = 0; i < 14; i += 1) {
			closes.push(closes[closes.length - 1] + (i % 2 === 0 ? 2 : -1));
		}
		expect(rsi(closes, 14)).toBe(66.67);
	});

	it("ignores changes older than the window with simple smoothing", () => {
		const closes = [50, 100];
		for (let i = 0; i < 14; i += 1) {
			closes.push(closes[closes.length - 1] + (i % 2 === 0 ? 2 : -1));
		}
		expect(rsi(closes, 14)).toBe(66.67);
	});

	it("stays within [0, 100] for varied series", () => {
		for (let seed = 1; seed <= 40; seed += 1) {
			const value = rsi(randomWalk(seed, 60), 14);
			expect(value).not.toBeNull();
			expect(value ?? -1).toBeGreaterThanOrEqual(0);
			expect(value ?? 101).toBeLessThanOrEqual(100);
		}
	});

	it("rejects non-positive periods", () => {
		expect(() => rsi(rising, 0)).toThrowError(/positive/);
	});
});

describe("rsiSeries", () => {
	it("emits one value per bar from the period onwards", () => {
		expect(rsiSeries(rising, 14)).toHaveLength(6);
		expect(rsiSeries(rising.slice(0, 10), 14)).toEqual([]);
	});
});
