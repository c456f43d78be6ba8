import {
	buildReportRow,
	computePortfolioMetrics,
	horizonLabel,
	summariseSectors,
	type PortfolioMetrics,
	type ReportRow,
	type SectorSummary,
} from "@sreit/analysis";
import {
	emptyFundamentals,
	errorMessage,
	metricValue,
	type FundamentalsSnapshot,
	type ModuleLogger,
	type PriceSeries,
	type ReitDefinition,
} from "@sreit/core";
import type { DashboardModel } from "@sreit/dashboard";
import type { FundamentalsProvider, PriceSeriesProvider } from "@sreit/data";
import { computeIndicators, valueOrNull, type IndicatorEngine } from "@sreit/indicators";
import type { NarrativeReport, NarrativeService } from "@sreit/narrative";
import { buildTelegramMessage, type SendResult } from "@sreit/notifier";

export interface ReportNotifier {
	send(text: string): Promise<SendResult>;
}

export interface ReportDependencies {
	universe: readonly ReitDefinition[];
	engine: IndicatorEngine;
	prices: PriceSeriesProvider;
	fundamentals: FundamentalsProvider;
	narrative: NarrativeService;
	/**
	 * `null` when chat delivery is disabled or not configured.
	 */
	notifier: ReportNotifier | null;
	writeDashboard: (model: DashboardModel, outputPath: string) => string;
	outputPath: string;
	lookback?: string;
	dashboardUrl?: string;
	logger: ModuleLogger;
	now?: () => number;
}

export interface ReportRunSummary {
	generatedAt: number;
	tickers: number;
	computed: number;
	failed: number;
	insufficient: number;
	aiEnabled: boolean;
	notified: boolean;
	notifyError?: string;
	output: string;
	rows: ReportRow[];
	metrics: PortfolioMetrics;
	sectors: SectorSummary[];
	narrative: NarrativeReport;
}

const loadFundamentals = async (
	deps: ReportDependencies,
	reit: ReitDefinition
): Promise<FundamentalsSnapshot> => {
	try {
		return await deps.fundamentals.fetchFundamentals(reit);
	} catch (error) {
		deps.logger.warn("fundamentals_failed", { ticker: reit.ticker, error: errorMessage(error) });
		return emptyFundamentals();
	}
};

/**
 * One ticker end to end. A failed price fetch or a malformed series yields a
 * row with every price-derived field insufficient; it never rejects.
 */
const buildRow = async (deps: ReportDependencies, reit: ReitDefinition): Promise<ReportRow> => {
	const fundamentalsRequest = loadFundamentals(deps, reit);
	const failedRow = (fundamentals: FundamentalsSnapshot, error: string): ReportRow =>
		buildReportRow(
			reit,
			computeIndicators({ ticker: reit.ticker, observations: [] }, fundamentals, deps.engine.config),
			{ error }
		);

	let series: PriceSeries;
	try {
		series = await deps.prices.fetchPriceSeries(reit.ticker, { lookback: deps.lookback });
	} catch (error) {
		deps.logger.warn("price_fetch_failed", { ticker: reit.ticker, error: errorMessage(error) });
		return failedRow(await fundamentalsRequest, errorMessage(error));
	}

	const fundamentals = await fundamentalsRequest;
	try {
		return buildReportRow(reit, deps.engine.compute(series, fundamentals));
	} catch (error) {
		deps.logger.error("indicator_precondition_failed", {
			ticker: reit.ticker,
			error: errorMessage(error),
		});
		return failedRow(fundamentals, errorMessage(error));
	}
};

const logRow = (logger: ModuleLogger, row: ReportRow): void => {
	const { result } = row;
	logger.info("ticker_indicators", {
		ticker: row.ticker,
		latestClose: valueOrNull(result.latestClose),
		changes: Object.fromEntries(
			result.priceChanges.map((change) => [horizonLabel(change.horizon), valueOrNull(change.changePct)])
		),
		rsi: valueOrNull(result.rsi),
		trend: valueOrNull(result.trend),
		yieldPct: metricValue(result.fundamentals.yieldPct),
		priceToNav: metricValue(result.fundamentals.priceToNav),
		status: row.status,
	});
};

/**
 * Fetches and computes every ticker concurrently, then aggregates, narrates,
 * renders and notifies. Rows keep the universe order.
 */
export const runReport = async (deps: ReportDependencies): Promise<ReportRunSummary> => {
	const now = deps.now ?? Date.now;
	const rows = await Promise.all(deps.universe.map((reit) => buildRow(deps, reit)));
	rows.forEach((row) => logRow(deps.logger, row));

	const metrics = computePortfolioMetrics(rows);
	const sectors = summariseSectors(rows);
	const narrative = await deps.narrative.generate(rows, metrics, sectors);

	const generatedAt = now();
	const output = deps.writeDashboard(
		{
			generatedAt,
			horizons: deps.engine.config.changeHorizons,
			rows,
			metrics,
			sectors,
			narrative,
		},
		deps.outputPath
	);
	deps.logger.info("dashboard_written", { output });

	let notified = false;
	let notifyError: string | undefined;
	if (deps.notifier) {
		const result = await deps.notifier.send(
			buildTelegramMessage(rows, metrics, { dashboardUrl: deps.dashboardUrl })
		);
		notified = result.ok;
		notifyError = result.error;
	}

	const failed = rows.filter((row) => row.error !== undefined).length;
	const summary: ReportRunSummary = {
		generatedAt,
		tickers: rows.length,
		computed: rows.length - failed,
		failed,
		insufficient: rows.filter((row) => !row.error && row.status === "insufficient").length,
		aiEnabled: narrative.aiEnabled,
		notified,
		...(notifyError ? { notifyError } : {}),
		output,
		rows,
		metrics,
		sectors,
		narrative,
	};
	deps.logger.info("report_summary", {
		tickers: summary.tickers,
		computed: summary.computed,
		failed: summary.failed,
		insufficient: summary.insufficient,
		aiEnabled: summary.aiEnabled,
		notified: summary.notified,
		output: summary.output,
	});
	return summary;
};
