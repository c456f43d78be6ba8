import {
	bottomMovers,
	horizonLabel,
	topMovers,
	type PortfolioMetrics,
	type RankedRow,
	type ReportRow,
	type SectorSummary,
} from "@sreit/analysis";
import { formatSgtTimestamp } from "@sreit/core";
import type { NarrativeReport } from "@sreit/narrative";

import {
	changeClass,
	escapeHtml,
	fixed,
	indicatorCell,
	metricCell,
	missingCell,
	nullableCell,
	renderRichText,
	signedPct,
} from "./html";
import { DASHBOARD_STYLES } from "./styles";

export interface DashboardModel {
	/**
	 * Epoch milliseconds; shown in Singapore time.
	 */
	generatedAt: number;
	/**
	 * Horizons in the order the engine computed them; one column each.
	 */
	horizons: readonly number[];
	rows: readonly ReportRow[];
	metrics: PortfolioMetrics;
	sectors: readonly SectorSummary[];
	narrative: NarrativeReport | null;
	title?: string;
}

export const DEFAULT_DASHBOARD_TITLE = "S-REIT Pulse";

const price = fixed(3);
const pct2 = fixed(2, "%");
const pct1 = fixed(1, "%");
const times = fixed(2, "x");

const card = (label: string, value: string, sub = ""): string =>
	`<div class="card"><div class="label">${escapeHtml(label)}</div><div class="value">${value}</div>${
		sub ? `<div class="sub">${sub}</div>` : ""
	}</div>`;

const moverCard = (label: string, mover: RankedRow | undefined): string =>
	mover
		? card(
				label,
				`<span class="${changeClass(mover.changePct)}">${escapeHtml(signedPct(mover.changePct))}</span>`,
				escapeHtml(`${mover.row.name} (${mover.row.ticker})`)
			)
		: card(label, missingCell("insufficient data"));

const renderCards = (model: DashboardModel): string => {
	const { metrics, rows } = model;
	return `<div class="cards">
${[
	card("REITs tracked", String(metrics.reitCount)),
	card("Avg yield", nullableCell(metrics.avgYieldPct, pct2)),
	card("Avg P/NAV", nullableCell(metrics.avgPriceToNav, times)),
	card("Avg gearing", nullableCell(metrics.avgGearingPct, pct1)),
	moverCard("Top gainer", topMovers(rows, 1)[0]),
	moverCard("Top loser", bottomMovers(rows, 1)[0]),
].join("\n")}
</div>`;
};

const renderNarrative = (narrative: NarrativeReport | null): string => {
	if (!narrative) {
		return "";
	}
	const badge = `<span class="badge">${narrative.aiEnabled ? "AI generated" : "Template"}</span>`;
	return `<section class="commentary">
<h2>Market Commentary${badge}</h2>
${renderRichText(narrative.marketCommentary)}
</section>
<section class="recommendation">
<h2>Portfolio Recommendation${badge}</h2>
${renderRichText(narrative.portfolioRecommendation)}
</section>`;
};

const renderSectorTable = (model: DashboardModel, changeLabel: string): string => {
	const outlook = model.narrative?.sectorOutlook ?? {};
	const body = model.sectors
		.map((sector: SectorSummary) => {
			const note = outlook[sector.sector];
			return `<tr>
<td>${escapeHtml(sector.sector)}</td>
<td class="num">${sector.count}</td>
<td class="num">${nullableCell(sector.avgYieldPct, pct2)}</td>
<td class="num">${nullableCell(sector.avgPriceToNav, times)}</td>
<td class="num ${changeClass(sector.avgChangePct)}">${nullableCell(sector.avgChangePct, signedPct)}</td>
<td>${note ? escapeHtml(note) : missingCell("unavailable")}</td>
</tr>`;
		})
		.join("\n");
	return `<section class="sectors">
<h2>Sectors</h2>
<table>
<thead><tr><th>Sector</th><th>REITs</th><th>Avg Yield</th><th>Avg P/NAV</th><th>Avg ${escapeHtml(changeLabel)}</th><th>Outlook</th></tr></thead>
<tbody>
${body}
</tbody>
</table>
</section>`;
};

const renderRow = (
	row: ReportRow,
	horizons: readonly number[],
	analyses: Record<string, string>
): string => {
	const { result } = row;
	const changeCells = horizons.map((horizon) => {
		const change = result.priceChanges.find((entry) => entry.horizon === horizon);
		if (!change) {
			return `<td class="num">${missingCell("insufficient data")}</td>`;
		}
		const value = change.changePct.status === "ok" ? change.changePct.value : null;
		return `<td class="num ${changeClass(value)}">${indicatorCell(change.changePct, signedPct)}</td>`;
	});
	const note = analyses[row.ticker];
	const classes = [row.status, row.error ? "failed" : ""].filter(Boolean).join(" ");
	const titleAttr = row.error ? ` title="${escapeHtml(row.error)}"` : "";
	return `<tr class="${classes}"${titleAttr}>
<td>${escapeHtml(row.ticker)}</td>
<td>${escapeHtml(row.name)}</td>
<td>${escapeHtml(row.sector)}</td>
<td class="num">${indicatorCell(result.latestClose, price)}</td>
${changeCells.join("\n")}
<td class="num rsi">${indicatorCell(result.rsi, fixed(1))}</td>
<td>${indicatorCell(result.trend, (trend) => trend)}</td>
<td class="num">${metricCell(result.fundamentals.yieldPct, pct2)}</td>
<td class="num">${metricCell(result.fundamentals.priceToNav, times)}</td>
<td class="num">${metricCell(result.fundamentals.gearingPct, pct1)}</td>
<td><ul class="insights">${row.insights.map((insight) => `<li>${escapeHtml(insight)}</li>`).join("")}</ul></td>
<td class="ai-note">${note ? escapeHtml(note) : ""}</td>
</tr>`;
};

const renderReitTable = (model: DashboardModel): string => {
	const analyses = model.narrative?.reitAnalyses ?? {};
	const horizonHeaders = model.horizons
		.map((horizon) => `<th>${escapeHtml(horizonLabel(horizon))}</th>`)
		.join("");
	return `<section class="reits">
<h2>REITs</h2>
<table>
<thead><tr><th>Ticker</th><th>Name</th><th>Sector</th><th>Price</th>${horizonHeaders}<th>RSI</th><th>Trend</th><th>Yield</th><th>P/NAV</th><th>Gearing</th><th>Insights</th><th>AI Note</th></tr></thead>
<tbody>
${model.rows.map((row) => renderRow(row, model.horizons, analyses)).join("\n")}
</tbody>
</table>
</section>`;
};

/**
 * Renders the whole report as one self-contained HTML page.
 */
export const renderDashboard = (model: DashboardModel): string => {
	const title = escapeHtml(model.title ?? DEFAULT_DASHBOARD_TITLE);
	const changeLabel = model.horizons.length ? horizonLabel(model.horizons[0]) : "Change";
	return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${title}</title>
<style>${DASHBOARD_STYLES}</style>
</head>
<body>
<header>
<h1>${title}</h1>
<p class="updated">Last updated: ${escapeHtml(formatSgtTimestamp(model.generatedAt))}</p>
</header>
<main>
${renderCards(model)}
${renderNarrative(model.narrative)}
${renderSectorTable(model, changeLabel)}
${renderReitTable(model)}
</main>
</body>
</html>
`;
};
