import type { PortfolioMetrics } from "@sreit/analysis";

export type Stance = "Overweight" | "Neutral" | "Underweight";

export const assessYield = (avgYieldPct: number): string =>
	avgYieldPct >= 5.5 ? "attractive" : avgYieldPct >= 4.5 ? "moderate" : "compressed";

export const assessValuation = (avgPriceToNav: number): string =>
	avgPriceToNav < 1 ? "a discount to NAV" : avgPriceToNav < 1.1 ? "fair value" : "a premium";

export const assessGearing = (avgGearingPct: number): string =>
	avgGearingPct >= 42 ? "elevated" : avgGearingPct >= 35 ? "comfortable" : "conservative";

/**
 * Overweight below 0.95x, Neutral from 0.95x to 1.1x inclusive, Underweight
 * above. Without P/NAV data the stance is Neutral.
 */
export const stanceFor = (avgPriceToNav: number | null): Stance => {
	if (avgPriceToNav === null) {
		return "Neutral";
	}
	if (avgPriceToNav < 0.95) {
		return "Overweight";
	}
	return avgPriceToNav <= 1.1 ? "Neutral" : "Underweight";
};

export const fallbackCommentary = (metrics: PortfolioMetrics): string => {
	const { avgYieldPct, avgPriceToNav, avgGearingPct } = metrics;
	const yieldLine =
		avgYieldPct === null
			? "Yield data is not available for this run."
			: `Portfolio average yield at ${avgYieldPct}% remains ${assessYield(avgYieldPct)} against historical norms of 5-6%.`;
	const valuationLine =
		avgPriceToNav === null
			? "P/NAV data is not available for this run."
			: `Average P/NAV of ${avgPriceToNav}x puts the sector at ${assessValuation(avgPriceToNav)}.`;
	const gearingLine =
		avgGearingPct === null
			? "Gearing data is not available for this run. Monitor interest rate sensitivity."
			: `Average gearing at ${avgGearingPct}% is ${assessGearing(avgGearingPct)}. Monitor interest rate sensitivity.`;

	return [
		`**Overview**: S-REITs are mixed, with ${metrics.advancers} advancing and ${metrics.decliners} declining across ${metrics.reitCount} names.`,
		`**Yield Analysis**: ${yieldLine}`,
		`**Valuation Check**: ${valuationLine}`,
		`**Risk Watch**: ${gearingLine}`,
		"**Actionable Insight**: Focus on REITs with yields above 6% and P/NAV below 0.9x for value opportunities.",
	].join("\n\n");
};

export const fallbackRecommendation = (metrics: PortfolioMetrics): string => {
	const stance = stanceFor(metrics.avgPriceToNav);
	const valuation =
		metrics.avgPriceToNav === null
			? "cannot be assessed without P/NAV data"
			: metrics.avgPriceToNav < 1
				? "attractive"
				: "stretched";
	return [
		`**Overall Stance**: ${stance} - Valuations are ${valuation} at current levels.`,
		"**Top Pick**: Focus on industrial and logistics REITs with structural demand tailwinds.",
		"**Avoid**: REITs with gearing above 45% face refinancing risks in the current rate environment.",
		"**Strategy**: Accumulate quality names on weakness; avoid chasing momentum in overbought territory.",
	].join("\n\n");
};
