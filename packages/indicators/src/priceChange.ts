import { roundTo } from "./round";

/**
 * Percentage change of the latest close against the close `horizon` sessions
 * earlier, rounded to 2 decimals. `null` when the series is too short: a
 * shorter window would mislabel a weekly or monthly move.
 */
export function percentChange(
	values: readonly number[],
	horizon: number
): number | null {
	if (horizon <= 0 || values.length < horizon + 1) {
		return null;
	}
	const latest = values[values.length - 1];
	const prior = values[values.length - 1 - horizon];
	return roundTo(((latest - prior) / prior) * 100, 2);
}
