import { valueOrNull } from "@sreit/indicators";

import type { ReportRow } from "./reportSchema";

export interface RankedRow {
	row: ReportRow;
	changePct: number;
}

/**
 * Change over the first configured horizon, the one rankings and alerts use.
 */
export const primaryChange = (row: ReportRow): number | null => {
	const first = row.result.priceChanges[0];
	return first ? valueOrNull(first.changePct) : null;
};

export const primaryHorizon = (rows: readonly ReportRow[]): number | null => {
	for (const row of rows) {
		const first = row.result.priceChanges[0];
		if (first) {
			return first.horizon;
		}
	}
	return null;
};

const ranked = (rows: readonly ReportRow[]): RankedRow[] =>
	rows.flatMap((row) => {
		const changePct = primaryChange(row);
		return changePct === null ? [] : [{ row, changePct }];
	});

const byTicker = (a: RankedRow, b: RankedRow): number =>
	a.row.ticker < b.row.ticker ? -1 : a.row.ticker > b.row.ticker ? 1 : 0;

/**
 * Rows with a primary change, best first. Ties keep ticker order so the
 * ranking is stable across runs.
 */
export const rankByChange = (rows: readonly ReportRow[]): RankedRow[] =>
	ranked(rows).sort((a, b) => b.changePct - a.changePct || byTicker(a, b));

export const topMovers = (rows: readonly ReportRow[], count: number): RankedRow[] =>
	rankByChange(rows).slice(0, count);

export const bottomMovers = (rows: readonly ReportRow[], count: number): RankedRow[] =>
	ranked(rows)
		.sort((a, b) => a.changePct - b.changePct || byTicker(a, b))
		.slice(0, count);

export const largestAbsoluteMovers = (
	rows: readonly ReportRow[],
	count: number
): RankedRow[] =>
	ranked(rows)
		.sort((a, b) => Math.abs(b.changePct) - Math.abs(a.changePct) || byTicker(a, b))
		.slice(0, count);

const HORIZON_LABELS: Record<number, string> = { 1: "1D", 5: "1W", 20: "1M" };

export const horizonLabel = (horizon: number): string =>
	HORIZON_LABELS[horizon] ?? `${horizon}D`;
