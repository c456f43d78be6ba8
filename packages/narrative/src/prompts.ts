import {
	bottomMovers,
	horizonLabel,
	primaryChange,
	primaryHorizon,
	topMovers,
	type PortfolioMetrics,
	type ReportRow,
	type SectorSummary,
} from "@sreit/analysis";
import { metricValue } from "@sreit/core";
import { valueOrNull } from "@sreit/indicators";

export const MAX_TOKENS = {
	marketCommentary: 500,
	reitAnalysis: 150,
	sectorOutlook: 400,
	portfolioRecommendation: 300,
} as const;

export interface RowDigest {
	ticker: string;
	name: string;
	sector: string;
	price: number | null;
	changePct: number | null;
	rsi: number | null;
	trend: string | null;
	yieldPct: number | null;
	priceToNav: number | null;
	gearingPct: number | null;
}

export const digestRow = (row: ReportRow): RowDigest => ({
	ticker: row.ticker,
	name: row.name,
	sector: row.sector,
	price: valueOrNull(row.result.latestClose),
	changePct: primaryChange(row),
	rsi: valueOrNull(row.result.rsi),
	trend: valueOrNull(row.result.trend),
	yieldPct: metricValue(row.result.fundamentals.yieldPct),
	priceToNav: metricValue(row.result.fundamentals.priceToNav),
	gearingPct: metricValue(row.result.fundamentals.gearingPct),
});

const json = (value: unknown): string => JSON.stringify(value, null, 2);

const orNa = (value: number | string | null, suffix = ""): string =>
	value === null ? "N/A" : `${value}${suffix}`;

const periodLabel = (rows: readonly ReportRow[]): string => {
	const horizon = primaryHorizon(rows);
	return horizon === null ? "recent" : horizonLabel(horizon);
};

export const buildMarketCommentaryPrompt = (
	rows: readonly ReportRow[],
	metrics: PortfolioMetrics,
	sectors: readonly SectorSummary[]
): string => {
	const digests = rows.map(digestRow);
	const summary = {
		period: periodLabel(rows),
		portfolioMetrics: metrics,
		sectorSummary: sectors,
		topPerformers: topMovers(rows, 3).map(({ row }) => digestRow(row)),
		worstPerformers: bottomMovers(rows, 3).map(({ row }) => digestRow(row)),
		highYield: digests.filter((row) => row.yieldPct !== null && row.yieldPct >= 6),
		deepDiscount: digests.filter((row) => row.priceToNav !== null && row.priceToNav < 0.85),
		highGearing: digests.filter((row) => row.gearingPct !== null && row.gearingPct >= 42),
		oversold: digests.filter((row) => row.rsi !== null && row.rsi < 35),
		overbought: digests.filter((row) => row.rsi !== null && row.rsi > 65),
	};

	return `You are a Singapore REIT market analyst. Write a concise market commentary from the data below.

DATA:
${json(summary)}

CONTEXT:
- Singapore REITs must distribute 90% of taxable income
- The MAS gearing limit is 50%
- The interest rate environment drives REIT valuations
- P/NAV below 1 means trading below book value

Use these sections, two or three sentences each:

1. **Overview**: overall sentiment and key moves
2. **Yield Analysis**: current yields against historical norms
3. **Valuation Check**: are REITs cheap or expensive on P/NAV?
4. **Risk Watch**: gearing or interest rate sensitivity
5. **Actionable Insight**: one opportunity or risk to watch

Professional but accessible tone. 150-200 words in total.`;
};

export const buildReitAnalysisPrompt = (row: ReportRow, period: string): string => {
	const digest = digestRow(row);
	return `Analyse this Singapore REIT and give a brief investment view (2-3 sentences):

REIT: ${digest.name} (${digest.ticker})
Sector: ${digest.sector}
Price: ${digest.price === null ? "N/A" : `$${digest.price}`}
${period} Change: ${orNa(digest.changePct, "%")}
Dividend Yield: ${orNa(digest.yieldPct, "%")}
P/NAV: ${orNa(digest.priceToNav, "x")}
Gearing: ${orNa(digest.gearingPct, "%")}
RSI: ${orNa(digest.rsi)}
Trend: ${orNa(digest.trend)}

Cover the valuation stance (undervalued/fair/overvalued), the key risk and the outlook.
Keep it under 50 words.`;
};

export const buildSectorOutlookPrompt = (
	rows: readonly ReportRow[],
	sectors: readonly SectorSummary[]
): string => {
	const sectorReits: Record<string, Array<Pick<RowDigest, "name" | "yieldPct" | "priceToNav" | "changePct">>> = {};
	for (const row of rows) {
		const { name, yieldPct, priceToNav, changePct } = digestRow(row);
		const members = sectorReits[row.sector] ?? [];
		members.push({ name, yieldPct, priceToNav, changePct });
		sectorReits[row.sector] = members;
	}

	return `Analyse Singapore REIT sectors and give a brief outlook for each.

SECTOR DATA:
${json(sectors)}

SECTOR REITS:
${json(sectorReits)}

For each sector give a one-line outlook (bullish/neutral/bearish plus the reason).
Answer as JSON: {"<sector name>": "<outlook>"}`;
};

export const buildPortfolioRecommendationPrompt = (
	rows: readonly ReportRow[],
	metrics: PortfolioMetrics
): string => {
	const digests = rows.map(digestRow);
	const withYield = digests.filter((row) => row.yieldPct !== null);
	const withPnav = digests.filter((row) => row.priceToNav !== null);
	const data = {
		totalReits: metrics.reitCount,
		uptrendCount: metrics.uptrendCount,
		downtrendCount: metrics.downtrendCount,
		flatOrUnknownCount: metrics.reitCount - metrics.uptrendCount - metrics.downtrendCount,
		avgYieldPct: metrics.avgYieldPct,
		avgPriceToNav: metrics.avgPriceToNav,
		avgGearingPct: metrics.avgGearingPct,
		topYieldReit: withYield.reduce<RowDigest | null>(
			(best, row) => (best === null || (row.yieldPct ?? 0) > (best.yieldPct ?? 0) ? row : best),
			null
		),
		bestValueReit: withPnav.reduce<RowDigest | null>(
			(best, row) =>
				best === null || (row.priceToNav ?? Infinity) < (best.priceToNav ?? Infinity) ? row : best,
			null
		),
	};

	return `As a Singapore REIT analyst, give a portfolio recommendation from this data:

${json(data)}

Provide:
1. **Overall Stance**: Overweight / Neutral / Underweight S-REITs (one word plus one sentence)
2. **Top Pick**: the most attractive REIT and why (one sentence)
3. **Avoid**: any REIT showing warning signs (one sentence)
4. **Strategy**: one tactical suggestion for the week ahead

Under 100 words. Be specific and actionable.`;
};
