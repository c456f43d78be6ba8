import {
	horizonLabel,
	largestAbsoluteMovers,
	primaryHorizon,
	type PortfolioMetrics,
	type ReportRow,
	type SectorSummary,
} from "@sreit/analysis";
import { createLogger, errorMessage, type ModuleLogger } from "@sreit/core";

import { fallbackCommentary, fallbackRecommendation } from "./fallbacks";
import {
	buildMarketCommentaryPrompt,
	buildPortfolioRecommendationPrompt,
	buildReitAnalysisPrompt,
	buildSectorOutlookPrompt,
	MAX_TOKENS,
} from "./prompts";
import { parseSectorOutlook } from "./sectorOutlook";
import type { CompletionClient, NarrativeReport, SectorOutlook } from "./types";

export const REIT_ANALYSIS_COUNT = 5;

export interface NarrativeServiceOptions {
	/**
	 * `null` when no API key is configured; every section then uses its
	 * deterministic fallback.
	 */
	client: CompletionClient | null;
	logger?: ModuleLogger;
	reitAnalysisCount?: number;
}

export class NarrativeService {
	private readonly client: CompletionClient | null;
	private readonly logger: ModuleLogger;
	private readonly reitAnalysisCount: number;

	constructor(options: NarrativeServiceOptions) {
		this.client = options.client;
		this.logger = options.logger ?? createLogger("narrative");
		this.reitAnalysisCount = options.reitAnalysisCount ?? REIT_ANALYSIS_COUNT;
	}

	async generate(
		rows: readonly ReportRow[],
		metrics: PortfolioMetrics,
		sectors: readonly SectorSummary[]
	): Promise<NarrativeReport> {
		const client = this.client;
		if (!client) {
			this.logger.info("narrative_fallback", { reason: "no_api_key" });
			return {
				marketCommentary: fallbackCommentary(metrics),
				sectorOutlook: {},
				portfolioRecommendation: fallbackRecommendation(metrics),
				reitAnalyses: {},
				aiEnabled: false,
			};
		}

		const [marketCommentary, sectorOutlook, portfolioRecommendation, reitAnalyses] =
			await Promise.all([
				this.section(
					client,
					"market_commentary",
					buildMarketCommentaryPrompt(rows, metrics, sectors),
					MAX_TOKENS.marketCommentary,
					() => fallbackCommentary(metrics)
				),
				this.sectorOutlook(client, rows, sectors),
				this.section(
					client,
					"portfolio_recommendation",
					buildPortfolioRecommendationPrompt(rows, metrics),
					MAX_TOKENS.portfolioRecommendation,
					() => fallbackRecommendation(metrics)
				),
				this.reitAnalyses(client, rows),
			]);

		this.logger.info("narrative_generated", {
			model: client.model,
			sectors: Object.keys(sectorOutlook).length,
			reitAnalyses: Object.keys(reitAnalyses).length,
		});

		return {
			marketCommentary,
			sectorOutlook,
			portfolioRecommendation,
			reitAnalyses,
			aiEnabled: true,
		};
	}

	private async section(
		client: CompletionClient,
		name: string,
		prompt: string,
		maxTokens: number,
		fallback: () => string
	): Promise<string> {
		try {
			return (await client.complete({ prompt, maxTokens })).trim();
		} catch (error) {
			this.logger.error("narrative_section_failed", {
				section: name,
				error: errorMessage(error),
			});
			return fallback();
		}
	}

	private async sectorOutlook(
		client: CompletionClient,
		rows: readonly ReportRow[],
		sectors: readonly SectorSummary[]
	): Promise<SectorOutlook> {
		try {
			const text = await client.complete({
				prompt: buildSectorOutlookPrompt(rows, sectors),
				maxTokens: MAX_TOKENS.sectorOutlook,
			});
			const outlook = parseSectorOutlook(text);
			if (!Object.keys(outlook).length) {
				this.logger.warn("sector_outlook_unparsed", { chars: text.length });
			}
			return outlook;
		} catch (error) {
			this.logger.error("narrative_section_failed", {
				section: "sector_outlook",
				error: errorMessage(error),
			});
			return {};
		}
	}

	private async reitAnalyses(
		client: CompletionClient,
		rows: readonly ReportRow[]
	): Promise<Record<string, string>> {
		const horizon = primaryHorizon(rows);
		const period = horizon === null ? "Recent" : horizonLabel(horizon);
		const movers = largestAbsoluteMovers(rows, this.reitAnalysisCount);
		const analyses = await Promise.all(
			movers.map(async ({ row }): Promise<[string, string] | null> => {
				try {
					const text = await client.complete({
						prompt: buildReitAnalysisPrompt(row, period),
						maxTokens: MAX_TOKENS.reitAnalysis,
					});
					return [row.ticker, text.trim()];
				} catch (error) {
					this.logger.warn("reit_analysis_failed", {
						ticker: row.ticker,
						error: errorMessage(error),
					});
					return null;
				}
			})
		);
		return Object.fromEntries(
			analyses.filter((entry): entry is [string, string] => entry !== null)
		);
	}
}
