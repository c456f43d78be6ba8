import type { MetricValue } from "@sreit/core";
import type { IndicatorValue } from "@sreit/indicators";

const HTML_ESCAPES: Record<string, string> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
	'"': "&quot;",
	"'": "&#39;",
};

export const escapeHtml = (text: string): string =>
	text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

export const MISSING_MARK = "—";

export const missingCell = (reason: "insufficient data" | "unavailable"): string =>
	`<span class="na" title="${reason}">${MISSING_MARK}</span>`;

/**
 * Formats an engine value, or the missing mark titled "insufficient data".
 */
export const indicatorCell = <T>(
	value: IndicatorValue<T>,
	format: (value: T) => string
): string =>
	value.status === "ok" ? escapeHtml(format(value.value)) : missingCell("insufficient data");

export const metricCell = (metric: MetricValue, format: (value: number) => string): string =>
	metric.status === "present" ? escapeHtml(format(metric.value)) : missingCell("unavailable");

export const nullableCell = (value: number | null, format: (value: number) => string): string =>
	value === null ? missingCell("unavailable") : escapeHtml(format(value));

export const fixed = (decimals: number, suffix = "") => (value: number): string =>
	`${value.toFixed(decimals)}${suffix}`;

export const signedPct = (value: number): string =>
	`${value > 0 ? "+" : ""}${value.toFixed(2)}%`;

export const changeClass = (value: number | null): string =>
	value === null ? "flat" : value > 0 ? "up" : value < 0 ? "down" : "flat";

/**
 * Renders generated prose: HTML-escaped first, then `**bold**` spans and
 * blank-line separated paragraphs.
 */
export const renderRichText = (text: string): string =>
	text
		.trim()
		.split(/\n\s*\n/)
		.filter((paragraph) => paragraph.trim().length > 0)
		.map((paragraph) => {
			const body = escapeHtml(paragraph.trim())
				.replace(/\*\*(.+?)\*\*/g, "<strong>$1</strong>")
				.replace(/\n/g, "<br>");
			return `<p>${body}</p>`;
		})
		.join("\n");
