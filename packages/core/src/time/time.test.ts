import { describe, it, expect } from "vitest";
import {
	epochSecondsToIsoDate,
	formatSgtTimestamp,
	isIsoDate,
	toIsoDate,
} from "./time";

describe("time utilities", () => {
	describe("isIsoDate", () => {
		it("accepts real calendar dates", () => {
			expect(isIsoDate("2024-01-02")).toBe(true);
			expect(isIsoDate("2024-02-29")).toBe(true);
		});

		it("rejects impossible dates and other formats", () => {
			expect(isIsoDate("2023-02-29")).toBe(false);
			expect(isIsoDate("2024-13-01")).toBe(false);
			expect(isIsoDate("2024-1-2")).toBe(false);
			expect(isIsoDate("02/01/2024")).toBe(false);
		});
	});

	describe("toIsoDate", () => {
		it("formats UTC dates by default", () => {
			expect(toIsoDate(Date.UTC(2024, 0, 2, 23, 59))).toBe("2024-01-02");
		});

		it("rolls over to the next day when the offset crosses midnight", () => {
			expect(toIsoDate(Date.UTC(2024, 0, 2, 17, 0), 8 * 3_600_000)).toBe(
				"2024-01-03"
			);
		});

		it("throws on non-finite timestamps", () => {
			expect(() => toIsoDate(Number.NaN)).toThrowError(/Invalid timestamp/);
		});
	});

	it("converts exchange epoch seconds with the exchange offset", () => {
		// 2024-01-01T16:00:00Z is 00:00 on 2 January in Singapore
		expect(epochSecondsToIsoDate(1704124800, 28800)).toBe("2024-01-02");
		expect(epochSecondsToIsoDate(1704124800)).toBe("2024-01-01");
	});

	it("formats report timestamps in Singapore time", () => {
		expect(formatSgtTimestamp(Date.UTC(2024, 0, 2, 1, 30))).toBe(
			"2024-01-02 09:30 SGT"
		);
	});
});
