import { describe, expect, it } from "vitest";
import { makeRow } from "./__tests__/rowFactory";
import {
	bottomMovers,
	horizonLabel,
	largestAbsoluteMovers,
	primaryHorizon,
	rankByChange,
	topMovers,
} from "./rankings";

const rows = [
	makeRow({ ticker: "A.SI", change: 1.5 }),
	makeRow({ ticker: "B.SI", change: -3.2 }),
	makeRow({ ticker: "C.SI", change: null }),
	makeRow({ ticker: "D.SI", change: 2.75 }),
	makeRow({ ticker: "E.SI", change: 1.5 }),
	makeRow({ ticker: "F.SI", change: -0.5 }),
];

const tickers = (ranked: ReturnType<typeof rankByChange>): string[] =>
	ranked.map((entry) => entry.row.ticker);

describe("rankings", () => {
	it("ranks rows with a primary change, best first, ties by ticker", () => {
		expect(tickers(rankByChange(rows))).toEqual(["D.SI", "A.SI", "E.SI", "F.SI", "B.SI"]);
	});

	it("slices top and bottom movers", () => {
		expect(tickers(topMovers(rows, 2))).toEqual(["D.SI", "A.SI"]);
		expect(tickers(bottomMovers(rows, 2))).toEqual(["B.SI", "F.SI"]);
	});

	it("orders by absolute move for the largest movers", () => {
		expect(largestAbsoluteMovers(rows, 3).map((entry) => entry.changePct)).toEqual([-3.2, 2.75, 1.5]);
	});

	it("reads the primary horizon from the first row", () => {
		expect(primaryHorizon(rows)).toBe(5);
		expect(primaryHorizon([])).toBeNull();
	});
});

describe("horizonLabel", () => {
	it("names the common horizons", () => {
		expect(horizonLabel(1)).toBe("1D");
		expect(horizonLabel(5)).toBe("1W");
		expect(horizonLabel(20)).toBe("1M");
		expect(horizonLabel(60)).toBe("60D");
	});
});
