import { sma } from "./sma";

export type TrendDirection = "UP" | "DOWN" | "FLAT";

export interface TrendReading {
	direction: TrendDirection;
	shortAverage: number;
	longAverage: number;
	relativeDiffPct: number;
}

/**
 * Relative gap is normalised to 10 decimals before comparison, so a gap equal
 * to the tolerance is always FLAT.
 */
export const classifyTrendFromAverages = (
	shortAverage: number,
	longAverage: number,
	tolerancePct: number
): TrendReading => {
	const relativeDiffPct = Number(
		(((shortAverage - longAverage) / longAverage) * 100).toFixed(10)
	);
	let direction: TrendDirection = "FLAT";
	if (relativeDiffPct > tolerancePct) {
		direction = "UP";
	} else if (relativeDiffPct < -tolerancePct) {
		direction = "DOWN";
	}
	return { direction, shortAverage, longAverage, relativeDiffPct };
};

export function classifyTrend(
	values: readonly number[],
	shortWindow: number,
	longWindow: number,
	tolerancePct: number
): TrendReading | null {
	const longAverage = sma(values, longWindow);
	const shortAverage = sma(values, shortWindow);
	if (longAverage === null || shortAverage === null) {
		return null;
	}
	return classifyTrendFromAverages(shortAverage, longAverage, tolerancePct);
}
