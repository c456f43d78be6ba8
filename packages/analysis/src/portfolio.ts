import { metricValue } from "@sreit/core";
import { roundTo, valueOrNull } from "@sreit/indicators";

import type { PortfolioMetrics, ReportRow, SectorSummary } from "./reportSchema";
import { SECTOR_CATEGORIES } from "./reportSchema";
import { primaryChange } from "./rankings";

const average = (values: Array<number | null>, decimals: number): number | null => {
	const present = values.filter((value): value is number => value !== null);
	if (!present.length) {
		return null;
	}
	const total = present.reduce((sum, value) => sum + value, 0);
	return roundTo(total / present.length, decimals);
};

/**
 * Portfolio averages consider only REITs that report the metric; a metric no
 * REIT reports is `null`, never zero.
 */
export const computePortfolioMetrics = (rows: readonly ReportRow[]): PortfolioMetrics => {
	const changes = rows.map(primaryChange);
	const trends = rows.map((row) => valueOrNull(row.result.trend));
	return {
		reitCount: rows.length,
		avgYieldPct: average(
			rows.map((row) => metricValue(row.result.fundamentals.yieldPct)),
			2
		),
		avgPriceToNav: average(
			rows.map((row) => metricValue(row.result.fundamentals.priceToNav)),
			2
		),
		avgGearingPct: average(
			rows.map((row) => metricValue(row.result.fundamentals.gearingPct)),
			1
		),
		uptrendCount: trends.filter((trend) => trend === "UP").length,
		downtrendCount: trends.filter((trend) => trend === "DOWN").length,
		advancers: changes.filter((change) => change !== null && change > 0).length,
		decliners: changes.filter((change) => change !== null && change < 0).length,
	};
};

/**
 * One summary per sector that has at least one row, in the fixed sector order.
 */
export const summariseSectors = (rows: readonly ReportRow[]): SectorSummary[] =>
	SECTOR_CATEGORIES.map((sector) => rows.filter((row) => row.sector === sector))
		.filter((members) => members.length > 0)
		.map((members) => ({
			sector: members[0].sector,
			count: members.length,
			tickers: members.map((row) => row.ticker),
			avgYieldPct: average(
				members.map((row) => metricValue(row.result.fundamentals.yieldPct)),
				2
			),
			avgPriceToNav: average(
				members.map((row) => metricValue(row.result.fundamentals.priceToNav)),
				2
			),
			avgChangePct: average(members.map(primaryChange), 2),
		}));
