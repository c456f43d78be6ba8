import { buildReportRow, type PortfolioMetrics, type ReportRow } from "@sreit/analysis";
import { emptyFundamentals, metricFrom } from "@sreit/core";
import { insufficient, ok, type IndicatorResult } from "@sreit/indicators";
import { describe, expect, it } from "vitest";
import { buildTelegramMessage, escapeTelegramHtml, shortName } from "./message";

interface RowInput {
	ticker: string;
	name: string;
	change: number | null;
	rsi: number | null;
	yieldPct: number | null;
	priceToNav: number | null;
}

const row = (input: RowInput): ReportRow => {
	const result: IndicatorResult = {
		ticker: input.ticker,
		observationCount: 30,
		asOf: "2024-03-28",
		latestClose: ok(1.5),
		priceChanges: [
			{ horizon: 5, changePct: input.change === null ? insufficient(6, 0) : ok(input.change) },
		],
		rsi: input.rsi === null ? insufficient(15, 0) : ok(input.rsi),
		trend: insufficient(20, 0),
		shortSma: insufficient(20, 0),
		longSma: insufficient(20, 0),
		fundamentals: {
			...emptyFundamentals(),
			yieldPct: metricFrom(input.yieldPct),
			priceToNav: metricFrom(input.priceToNav),
		},
	};
	return buildReportRow({ ticker: input.ticker, name: input.name, segment: "Industrial" }, result);
};

const rows = [
	row({ ticker: "A.SI", name: "Alpha Industrial Trust", change: 3.5, rsi: 72.5, yieldPct: 7.8, priceToNav: 1.1 }),
	row({ ticker: "B.SI", name: "Beta Retail Trust", change: -1.25, rsi: 28, yieldPct: 6, priceToNav: 0.75 }),
	row({
		ticker: "C.SI",
		name: "Gamma Very Long Named Hospitality Trust",
		change: 0.5,
		rsi: 50,
		yieldPct: 7.1,
		priceToNav: 0.7,
	}),
	row({ ticker: "D.SI", name: "D&E <Office> REIT", change: null, rsi: null, yieldPct: 9, priceToNav: null }),
];

const metrics: PortfolioMetrics = {
	reitCount: 4,
	avgYieldPct: 6.97,
	avgPriceToNav: 0.85,
	avgGearingPct: null,
	uptrendCount: 0,
	downtrendCount: 0,
	advancers: 2,
	decliners: 1,
};

describe("shortName", () => {
	it("truncates to 25 characters before escaping", () => {
		expect(shortName("Gamma Very Long Named Hospitality Trust")).toBe("Gamma Very Long Named Hos");
		expect(shortName("A&B")).toBe("A&amp;B");
		expect(shortName("🏢".repeat(30))).toBe("🏢".repeat(25));
		expect(escapeTelegramHtml('<a href="x">')).toBe("&lt;a href=&quot;x&quot;&gt;");
	});
});

describe("buildTelegramMessage", () => {
	it("summarises averages, movers and alerts", () => {
		const message = buildTelegramMessage(rows, metrics, {
			dashboardUrl: "https://dash.test/reits?a=1&b=2",
		});
		expect(message.split("\n")).toEqual([
			"🇸🇬 <b>S-REITs Update</b> (1W)",
			"",
			"<b>Portfolio Averages:</b>",
			"📊 Yield: 6.97%",
			"📈 P/NAV: 0.85x",
			"⚖️ Gearing: N/A",
			"",
			"<b>🟢 Top Performers:</b>",
			"• Alpha Industrial Trust: +3.50% | Yield: 7.8%",
			"• Gamma Very Long Named Hos: +0.50% | Yield: 7.1%",
			"• Beta Retail Trust: -1.25% | Yield: 6%",
			"",
			"<b>🔴 Decliners:</b>",
			"• Beta Retail Trust: -1.25% | Yield: 6%",
			"• Gamma Very Long Named Hos: +0.50% | Yield: 7.1%",
			"• Alpha Industrial Trust: +3.50% | Yield: 7.8%",
			"",
			"<b>💰 High Yield Alerts (≥7%):</b>",
			"• D&amp;E &lt;Office&gt; REIT: 9%",
			"• Alpha Industrial Trust: 7.8%",
			"• Gamma Very Long Named Hos: 7.1%",
			"",
			"<b>🏷️ Deep NAV Discounts (&lt;0.8x):</b>",
			"• Gamma Very Long Named Hos: 0.7x P/NAV",
			"• Beta Retail Trust: 0.75x P/NAV",
			"",
			"<b>📉 Oversold (RSI&lt;30):</b>",
			"• Beta Retail Trust: RSI 28",
			"",
			"<b>📈 Overbought (RSI&gt;70):</b>",
			"• Alpha Industrial Trust: RSI 72.5",
			"",
			'🔗 <a href="https://dash.test/reits?a=1&amp;b=2">View Dashboard</a>',
		]);
	});

	it("notes missing price changes and leaves out empty sections", () => {
		const message = buildTelegramMessage(
			[row({ ticker: "D.SI", name: "Delta REIT", change: null, rsi: null, yieldPct: null, priceToNav: null })],
			{ ...metrics, reitCount: 1, avgYieldPct: null, avgPriceToNav: null }
		);
		expect(message.split("\n")).toEqual([
			"🇸🇬 <b>S-REITs Update</b> (1W)",
			"",
			"<b>Portfolio Averages:</b>",
			"📊 Yield: N/A",
			"📈 P/NAV: N/A",
			"⚖️ Gearing: N/A",
			"",
			"No price changes available.",
		]);
	});
});
