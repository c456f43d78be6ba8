import type { ReitDefinition } from "@sreit/core";
import type { IndicatorResult } from "@sreit/indicators";

import {
	fundamentalInsights,
	PRICE_UNAVAILABLE_INSIGHT,
	rowStatus,
	technicalInsights,
} from "./insights";
import type { ReportRow } from "./reportSchema";
import { getSectorCategory } from "./sectors";

export interface BuildRowOptions {
	/**
	 * Price fetch failure message; the row keeps its fundamentals but carries
	 * no technical insight.
	 */
	error?: string;
}

export const buildReportRow = (
	reit: ReitDefinition,
	result: IndicatorResult,
	options: BuildRowOptions = {}
): ReportRow => {
	const technical = options.error ? [PRICE_UNAVAILABLE_INSIGHT] : technicalInsights(result);
	return {
		ticker: reit.ticker,
		name: reit.name,
		segment: reit.segment,
		sector: getSectorCategory(reit.segment),
		result,
		insights: [...technical, ...fundamentalInsights(result.fundamentals)],
		status: rowStatus(result),
		...(options.error ? { error: options.error } : {}),
	};
};
