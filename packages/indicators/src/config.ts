import type { RsiSmoothing } from "./rsi";

export interface IndicatorConfig {
	readonly rsiPeriod: number;
	readonly rsiSmoothing: RsiSmoothing;
	readonly trendShortWindow: number;
	readonly trendLongWindow: number;
	readonly trendTolerancePct: number;
	readonly changeHorizons: readonly number[];
}

export const DEFAULT_INDICATOR_CONFIG: IndicatorConfig = Object.freeze({
	rsiPeriod: 14,
	rsiSmoothing: "simple",
	trendShortWindow: 5,
	trendLongWindow: 20,
	trendTolerancePct: 0.1,
	changeHorizons: Object.freeze([5, 20]),
});

const ensurePositiveInteger = (value: unknown, field: string): number => {
	if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
		throw new Error(`Indicator config "${field}" must be a positive integer`);
	}
	return value;
};

const ensureSmoothing = (value: unknown): RsiSmoothing => {
	if (value === "simple" || value === "wilder") {
		return value;
	}
	throw new Error(`Indicator config "rsiSmoothing" must be "simple" or "wilder"`);
};

/**
 * Merge overrides over the defaults and validate the result. Unknown keys are
 * rejected so a misspelt option cannot silently fall back to a default.
 */
export const resolveIndicatorConfig = (
	overrides: Partial<IndicatorConfig> | Record<string, unknown> = {}
): IndicatorConfig => {
	const known = new Set<string>(Object.keys(DEFAULT_INDICATOR_CONFIG));
	const unknown = Object.keys(overrides).filter((key) => !known.has(key));
	if (unknown.length) {
		throw new Error(`Unknown indicator config option(s): ${unknown.join(", ")}`);
	}

	const merged: Record<string, unknown> = {
		...DEFAULT_INDICATOR_CONFIG,
		...overrides,
	};

	const trendShortWindow = ensurePositiveInteger(
		merged.trendShortWindow,
		"trendShortWindow"
	);
	const trendLongWindow = ensurePositiveInteger(
		merged.trendLongWindow,
		"trendLongWindow"
	);
	if (trendShortWindow >= trendLongWindow) {
		throw new Error(
			`Indicator config "trendShortWindow" (${trendShortWindow}) must be smaller than "trendLongWindow" (${trendLongWindow})`
		);
	}

	const tolerance = merged.trendTolerancePct;
	if (typeof tolerance !== "number" || !Number.isFinite(tolerance) || tolerance < 0) {
		throw new Error(`Indicator config "trendTolerancePct" must be a non-negative number`);
	}

	const horizons = merged.changeHorizons;
	if (!Array.isArray(horizons) || horizons.length === 0) {
		throw new Error(`Indicator config "changeHorizons" must be a non-empty array`);
	}
	const changeHorizons = horizons.map((value, index) =>
		ensurePositiveInteger(value, `changeHorizons[${index}]`)
	);
	if (new Set(changeHorizons).size !== changeHorizons.length) {
		throw new Error(`Indicator config "changeHorizons" must not repeat a horizon`);
	}

	return Object.freeze({
		rsiPeriod: ensurePositiveInteger(merged.rsiPeriod, "rsiPeriod"),
		rsiSmoothing: ensureSmoothing(merged.rsiSmoothing),
		trendShortWindow,
		trendLongWindow,
		trendTolerancePct: tolerance,
		changeHorizons: Object.freeze(changeHorizons),
	});
};
