import { roundTo } from "./round";

export type RsiSmoothing = "simple" | "wilder";

/**
 * Latest relative strength index of a close series.
 *
 * `simple` averages the trailing `period` close-to-close changes. `wilder`
 * seeds with the first `period` changes and then applies Wilder's recursive
 * smoothing across the rest of the series. Both need `period + 1` closes and
 * return `null` otherwise. A window without losses is 100.
 */
export function rsi(
	values: readonly number[],
	period = 14,
	smoothing: RsiSmoothing = "simple"
): number | null {
	if (period <= 0) {
		throw new Error("RSI period must be positive");
	}
	if (values.length < period + 1) {
		return null;
	}
	if (smoothing === "wilder") {
		const series = rsiSeries(values, period);
		const latest = series[series.length - 1];
		return latest === undefined ? null : roundTo(latest, 2);
	}

	let gains = 0;
	let losses = 0;
	for (let i = values.length - period; i < values.length; i += 1) {
		const change = values[i] - values[i - 1];
		if (change > 0) {
			gains += change;
		} else {
			losses -= change;
		}
	}
	return roundTo(rsiFromAverages(gains / period, losses / period), 2);
}

/**
 * Wilder-smoothed RSI for every bar from index `period` onwards.
 */
export function rsiSeries(values: readonly number[], period = 14): number[] {
	if (period <= 0) {
		throw new Error("RSI period must be positive");
	}

	if (values.length < period + 1) {
		return [];
	}

	let gains = 0;
	let losses = 0;

	for (let i = 1; i <= period; i += 1) {
		const change = values[i] - values[i - 1];
		if (change >= 0) {
			gains += change;
		} else {
			losses -= change;
		}
	}

	const rsis: number[] = [];
	let avgGain = gains / period;
	let avgLoss = losses / period;

	for (let i = period; i < values.length; i += 1) {
		if (i > period) {
			const change = values[i] - values[i - 1];
			const gain = Math.max(change, 0);
			const loss = Math.max(-change, 0);
			avgGain = (avgGain * (period - 1) + gain) / period;
			avgLoss = (avgLoss * (period - 1) + loss) / period;
		}
		rsis.push(rsiFromAverages(avgGain, avgLoss));
	}

	return rsis;
}

const rsiFromAverages = (avgGain: number, avgLoss: number): number => {
	if (avgLoss === 0) {
		return 100;
	}
	const rs = avgGain / avgLoss;
	const value = 100 - 100 / (1 + rs);
	return Math.min(100, Math.max(0, value));
};
