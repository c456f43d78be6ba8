import { describe, expect, it } from "vitest";
import {
	emptyFundamentals,
	isPresent,
	metricFrom,
	metricValue,
	present,
	unavailable,
} from "./metric";

describe("metric values", () => {
	it("wraps finite numbers as present, including zero", () => {
		expect(metricFrom(6.25)).toEqual({ status: "present", value: 6.25 });
		expect(metricFrom(0)).toEqual({ status: "present", value: 0 });
	});

	it("treats null, undefined and NaN as unavailable", () => {
		expect(metricFrom(null)).toEqual({ status: "unavailable" });
		expect(metricFrom(undefined)).toEqual({ status: "unavailable" });
		expect(metricFrom(Number.NaN)).toEqual({ status: "unavailable" });
		expect(metricFrom(Number.POSITIVE_INFINITY)).toEqual({
			status: "unavailable",
		});
	});

	it("exposes a nullable numeric view", () => {
		expect(metricValue(present(0.92))).toBe(0.92);
		expect(metricValue(unavailable())).toBeNull();
		expect(isPresent(present(1))).toBe(true);
		expect(isPresent(unavailable())).toBe(false);
	});

	it("builds an all-unavailable snapshot", () => {
		const snapshot = emptyFundamentals();
		expect(Object.values(snapshot).every((m) => m.status === "unavailable")).toBe(
			true
		);
	});
});
