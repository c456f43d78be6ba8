import { metricFrom, type FundamentalField, type FundamentalsSnapshot } from "@sreit/core";

import type { FundamentalsRow } from "../types";

type ColumnKey = FundamentalField | "name";

const TABLE_PATTERN = /<table\b[\s\S]*?<\/table>/gi;
const ROW_PATTERN = /<tr\b[\s\S]*?<\/tr>/gi;
const CELL_PATTERN = /<t([hd])\b[^>]*>([\s\S]*?)<\/t\1>/gi;
const MISSING_CELL = /^(?:-+|—|–|n\/?a|nil|)$/i;

const NAMED_ENTITIES: Record<string, string> = {
	amp: "&",
	nbsp: " ",
	quot: '"',
	apos: "'",
	lt: "<",
	gt: ">",
};

const REPLACEMENT_CHARACTER = "\uFFFD";

// Out-of-range and surrogate code points decode to U+FFFD.
const fromCodePoint = (codePoint: number): string =>
	codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)
		? REPLACEMENT_CHARACTER
		: String.fromCodePoint(codePoint);

const decodeEntities = (text: string): string =>
	text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
		if (entity.startsWith("#x") || entity.startsWith("#X")) {
			return fromCodePoint(parseInt(entity.slice(2), 16));
		}
		if (entity.startsWith("#")) {
			return fromCodePoint(parseInt(entity.slice(1), 10));
		}
		return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
	});

export const cellText = (html: string): string =>
	decodeEntities(html.replace(/<br\s*\/?>/gi, " ").replace(/<[^>]+>/g, ""))
		.replace(/\s+/g, " ")
		.trim();

/**
 * Parses "6.1%", "0.85x", "S$1.02", "1,234.5". Placeholders such as "-" or
 * "N/A" and anything else non-numeric yield `null`.
 */
export const parseMetricCell = (text: string): number | null => {
	const trimmed = text.trim();
	if (MISSING_CELL.test(trimmed)) {
		return null;
	}
	const cleaned = trimmed
		.replace(/^S\$/i, "")
		.replace(/[$%,\s]/g, "")
		.replace(/x$/i, "");
	if (!/^-?\d+(?:\.\d+)?$/.test(cleaned)) {
		return null;
	}
	return Number(cleaned);
};

export const classifyHeader = (header: string): ColumnKey | null => {
	const text = header.toLowerCase().replace(/\s+/g, " ").trim();
	if (/p\s*\/\s*nav|price\s*(?:\/|to)\s*(?:nav|book)|p\s*\/\s*b\b|pnav/.test(text)) {
		return "priceToNav";
	}
	if (text.includes("yield")) {
		return "yieldPct";
	}
	if (text.includes("gearing") || text.includes("leverage")) {
		return "gearingPct";
	}
	if (/\bdpu\b|distribution per unit/.test(text)) {
		return "dpu";
	}
	if (/\bnav\b|net asset value/.test(text)) {
		return "nav";
	}
	if (/reit|trust|name/.test(text)) {
		return "name";
	}
	return null;
};

const extractRows = (tableHtml: string): string[][] =>
	Array.from(tableHtml.matchAll(ROW_PATTERN), ([row]) =>
		Array.from(row.matchAll(CELL_PATTERN), (cell) => cellText(cell[2]))
	).filter((cells) => cells.length > 0);

const mapColumns = (headers: string[]): Map<ColumnKey, number> => {
	const columns = new Map<ColumnKey, number>();
	headers.forEach((header, index) => {
		const key = classifyHeader(header);
		if (key && !columns.has(key)) {
			columns.set(key, index);
		}
	});
	return columns;
};

const hasMetricColumn = (columns: Map<ColumnKey, number>): boolean =>
	columns.has("yieldPct") || columns.has("priceToNav") || columns.has("gearingPct");

/**
 * Extracts fundamentals from the first HTML table whose header row names a
 * REIT column and at least one of yield, P/NAV or gearing.
 */
export const parseFundamentalsTable = (html: string): FundamentalsRow[] => {
	for (const [tableHtml] of html.matchAll(TABLE_PATTERN)) {
		const rows = extractRows(tableHtml);
		const headerIndex = rows.findIndex((cells) => {
			const columns = mapColumns(cells);
			return columns.has("name") && hasMetricColumn(columns);
		});
		if (headerIndex === -1) {
			continue;
		}
		const columns = mapColumns(rows[headerIndex]);
		const nameColumn = columns.get("name") ?? 0;
		const metric = (cells: string[], key: FundamentalField) => {
			const index = columns.get(key);
			return metricFrom(index === undefined ? null : parseMetricCell(cells[index] ?? ""));
		};

		return rows
			.slice(headerIndex + 1)
			.filter((cells) => (cells[nameColumn] ?? "").length > 0)
			.map((cells): FundamentalsRow => {
				const snapshot: FundamentalsSnapshot = {
					yieldPct: metric(cells, "yieldPct"),
					priceToNav: metric(cells, "priceToNav"),
					gearingPct: metric(cells, "gearingPct"),
					nav: metric(cells, "nav"),
					dpu: metric(cells, "dpu"),
				};
				return { name: cells[nameColumn], snapshot };
			});
	}
	return [];
};
