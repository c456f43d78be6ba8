import {
	bottomMovers,
	DEEP_DISCOUNT_PNAV,
	horizonLabel,
	primaryHorizon,
	RSI_OVERBOUGHT,
	RSI_OVERSOLD,
	topMovers,
	type PortfolioMetrics,
	type RankedRow,
	type ReportRow,
} from "@sreit/analysis";
import { metricValue } from "@sreit/core";
import { valueOrNull } from "@sreit/indicators";

export const TELEGRAM_HIGH_YIELD_PCT = 7;
export const NAME_LIMIT = 25;
const MOVER_COUNT = 3;
const ALERT_COUNT = 3;

export interface TelegramMessageOptions {
	dashboardUrl?: string;
}

/**
 * Telegram's HTML mode only needs `&`, `<` and `>` escaped in text, plus `"`
 * inside attributes.
 */
export const escapeTelegramHtml = (text: string): string =>
	text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");

export const shortName = (name: string): string =>
	escapeTelegramHtml(Array.from(name).slice(0, NAME_LIMIT).join(""));

const orNa = (value: number | null, suffix: string): string =>
	value === null ? "N/A" : `${value}${suffix}`;

const moverLine = ({ row, changePct }: RankedRow): string => {
	const yieldPct = metricValue(row.result.fundamentals.yieldPct);
	const yieldText = yieldPct === null ? "" : ` | Yield: ${yieldPct}%`;
	const sign = changePct > 0 ? "+" : "";
	return `• ${shortName(row.name)}: ${sign}${changePct.toFixed(2)}%${yieldText}`;
};

const block = (heading: string, lines: string[]): string[] =>
	lines.length ? ["", `<b>${heading}</b>`, ...lines] : [];

export const buildTelegramMessage = (
	rows: readonly ReportRow[],
	metrics: PortfolioMetrics,
	options: TelegramMessageOptions = {}
): string => {
	const horizon = primaryHorizon(rows);
	const period = horizon === null ? "" : ` (${horizonLabel(horizon)})`;

	const highYield = rows
		.flatMap((row) => {
			const value = metricValue(row.result.fundamentals.yieldPct);
			return value !== null && value >= TELEGRAM_HIGH_YIELD_PCT ? [{ row, value }] : [];
		})
		.sort((a, b) => b.value - a.value)
		.slice(0, ALERT_COUNT);
	const deepDiscount = rows
		.flatMap((row) => {
			const value = metricValue(row.result.fundamentals.priceToNav);
			return value !== null && value < DEEP_DISCOUNT_PNAV ? [{ row, value }] : [];
		})
		.sort((a, b) => a.value - b.value)
		.slice(0, ALERT_COUNT);
	const rsiReadings = rows.flatMap((row) => {
		const value = valueOrNull(row.result.rsi);
		return value === null ? [] : [{ row, value }];
	});

	const top = topMovers(rows, MOVER_COUNT);
	const bottom = bottomMovers(rows, MOVER_COUNT);

	const lines = [
		`🇸🇬 <b>S-REITs Update</b>${period}`,
		"",
		"<b>Portfolio Averages:</b>",
		`📊 Yield: ${orNa(metrics.avgYieldPct, "%")}`,
		`📈 P/NAV: ${orNa(metrics.avgPriceToNav, "x")}`,
		`⚖️ Gearing: ${orNa(metrics.avgGearingPct, "%")}`,
		...(top.length
			? [
					...block("🟢 Top Performers:", top.map(moverLine)),
					...block("🔴 Decliners:", bottom.map(moverLine)),
				]
			: ["", "No price changes available."]),
		...block(
			`💰 High Yield Alerts (≥${TELEGRAM_HIGH_YIELD_PCT}%):`,
			highYield.map(({ row, value }) => `• ${shortName(row.name)}: ${value}%`)
		),
		...block(
			`🏷️ Deep NAV Discounts (&lt;${DEEP_DISCOUNT_PNAV}x):`,
			deepDiscount.map(({ row, value }) => `• ${shortName(row.name)}: ${value}x P/NAV`)
		),
		...block(
			`📉 Oversold (RSI&lt;${RSI_OVERSOLD}):`,
			rsiReadings
				.filter(({ value }) => value < RSI_OVERSOLD)
				.map(({ row, value }) => `• ${shortName(row.name)}: RSI ${value}`)
		),
		...block(
			`📈 Overbought (RSI&gt;${RSI_OVERBOUGHT}):`,
			rsiReadings
				.filter(({ value }) => value > RSI_OVERBOUGHT)
				.map(({ row, value }) => `• ${shortName(row.name)}: RSI ${value}`)
		),
	];
	if (options.dashboardUrl) {
		lines.push("", `🔗 <a href="${escapeTelegramHtml(options.dashboardUrl)}">View Dashboard</a>`);
	}
	return lines.join("\n");
};
