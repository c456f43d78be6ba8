import { metricValue, type FundamentalsSnapshot } from "@sreit/core";
import { valueOrNull, type IndicatorResult } from "@sreit/indicators";

import type { RowStatus } from "./reportSchema";

export const RSI_OVERSOLD = 30;
export const RSI_OVERBOUGHT = 70;
export const HIGH_YIELD_PCT = 7;
export const DEEP_DISCOUNT_PNAV = 0.8;
export const PREMIUM_PNAV = 1.3;
export const HIGH_GEARING_PCT = 45;
export const CONSERVATIVE_GEARING_PCT = 35;

export const NORMAL_RANGE_INSIGHT = "Trading within normal range";
export const INSUFFICIENT_HISTORY_INSIGHT = "Insufficient price history";
export const PRICE_UNAVAILABLE_INSIGHT = "Price data unavailable";

export const rowStatus = (result: IndicatorResult): RowStatus => {
	const rsi = valueOrNull(result.rsi);
	if (rsi === null) {
		return "insufficient";
	}
	if (rsi < RSI_OVERSOLD) {
		return "oversold";
	}
	if (rsi > RSI_OVERBOUGHT) {
		return "overbought";
	}
	return "neutral";
};

export const technicalInsights = (result: IndicatorResult): string[] => {
	const rsi = valueOrNull(result.rsi);
	const trend = valueOrNull(result.trend);
	if (rsi === null && trend === null) {
		return [INSUFFICIENT_HISTORY_INSIGHT];
	}

	const insights: string[] = [];
	if (rsi !== null && rsi < RSI_OVERSOLD) {
		insights.push(`Oversold (RSI ${rsi}) - potential buy opportunity`);
	} else if (rsi !== null && rsi > RSI_OVERBOUGHT) {
		insights.push(`Overbought (RSI ${rsi}) - overvaluation risk`);
	}
	if (trend === "UP") {
		insights.push("Uptrend (short SMA above long SMA)");
	} else if (trend === "DOWN") {
		insights.push("Downtrend (short SMA below long SMA)");
	}
	return insights.length ? insights : [NORMAL_RANGE_INSIGHT];
};

export const fundamentalInsights = (fundamentals: FundamentalsSnapshot): string[] => {
	const insights: string[] = [];
	const yieldPct = metricValue(fundamentals.yieldPct);
	const priceToNav = metricValue(fundamentals.priceToNav);
	const gearingPct = metricValue(fundamentals.gearingPct);

	if (yieldPct !== null && yieldPct > HIGH_YIELD_PCT) {
		insights.push(`High yield (${yieldPct}%)`);
	}
	if (priceToNav !== null && priceToNav < DEEP_DISCOUNT_PNAV) {
		insights.push(`Deep discount to NAV (${priceToNav}x)`);
	} else if (priceToNav !== null && priceToNav > PREMIUM_PNAV) {
		insights.push(`Premium to NAV (${priceToNav}x)`);
	}
	if (gearingPct !== null && gearingPct > HIGH_GEARING_PCT) {
		insights.push(`High gearing (${gearingPct}%)`);
	} else if (gearingPct !== null && gearingPct < CONSERVATIVE_GEARING_PCT) {
		insights.push(`Conservative gearing (${gearingPct}%)`);
	}
	return insights;
};
