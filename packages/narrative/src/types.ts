export interface CompletionRequest {
	prompt: string;
	maxTokens: number;
}

/**
 * Text completion seam. The service only needs a prompt in and text out, so
 * tests drive it with an in-process fake.
 */
export interface CompletionClient {
	readonly model: string;
	complete(request: CompletionRequest): Promise<string>;
}

export type SectorOutlook = Record<string, string>;

export interface NarrativeReport {
	marketCommentary: string;
	sectorOutlook: SectorOutlook;
	portfolioRecommendation: string;
	/**
	 * Keyed by ticker; only the largest movers get one.
	 */
	reitAnalyses: Record<string, string>;
	aiEnabled: boolean;
}
