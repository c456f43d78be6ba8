export * from "./types";
export {
	ANTHROPIC_MESSAGES_URL,
	ANTHROPIC_VERSION,
	AnthropicCompletionClient,
	CompletionError,
	extractMessageText,
} from "./anthropicClient";
export type { AnthropicCompletionClientOptions } from "./anthropicClient";
export {
	assessGearing,
	assessValuation,
	assessYield,
	fallbackCommentary,
	fallbackRecommendation,
	stanceFor,
} from "./fallbacks";
export type { Stance } from "./fallbacks";
export {
	buildMarketCommentaryPrompt,
	buildPortfolioRecommendationPrompt,
	buildReitAnalysisPrompt,
	buildSectorOutlookPrompt,
	digestRow,
	MAX_TOKENS,
} from "./prompts";
export type { RowDigest } from "./prompts";
export { parseSectorOutlook } from "./sectorOutlook";
export { NarrativeService, REIT_ANALYSIS_COUNT } from "./narrativeService";
export type { NarrativeServiceOptions } from "./narrativeService";
