import type { ReitDefinition } from "@sreit/core";
import type { IndicatorResult } from "@sreit/indicators";

export const SECTOR_CATEGORIES = [
	"Industrial",
	"Retail",
	"Office",
	"Healthcare",
	"Hospitality",
	"Data Centre",
	"Diversified",
] as const;

export type SectorCategory = (typeof SECTOR_CATEGORIES)[number];

export type RowStatus = "oversold" | "overbought" | "neutral" | "insufficient";

export interface ReportRow extends ReitDefinition {
	sector: SectorCategory;
	result: IndicatorResult;
	insights: string[];
	status: RowStatus;
	/**
	 * Set when the price series could not be fetched; the row is still
	 * rendered, with every price-derived field insufficient.
	 */
	error?: string;
}

export interface PortfolioMetrics {
	reitCount: number;
	avgYieldPct: number | null;
	avgPriceToNav: number | null;
	avgGearingPct: number | null;
	uptrendCount: number;
	downtrendCount: number;
	advancers: number;
	decliners: number;
}

export interface SectorSummary {
	sector: SectorCategory;
	count: number;
	tickers: string[];
	avgYieldPct: number | null;
	avgPriceToNav: number | null;
	avgChangePct: number | null;
}
