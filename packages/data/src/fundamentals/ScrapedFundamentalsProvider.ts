import {
	createHttpClient,
	createLogger,
	emptyFundamentals,
	errorMessage,
	httpStatusOf,
	withRetry,
	type FundamentalsSnapshot,
	type HttpClient,
	type ModuleLogger,
	type ReitDefinition,
} from "@sreit/core";

import type { FundamentalsProvider, FundamentalsRow, ProviderOptions } from "../types";
import { matchFundamentals } from "./matchFundamentals";
import { parseFundamentalsTable } from "./parseTable";

export interface ScrapedFundamentalsProviderOptions extends ProviderOptions {
	url: string;
	http?: HttpClient;
	/** Every configured REIT name; a row two of them could claim is left unmatched. */
	knownNames?: readonly string[];
}

/**
 * Reads fundamentals from a public HTML comparison table. The page is fetched
 * at most once per provider instance; every REIT is matched against the same
 * parsed rows.
 */
export class ScrapedFundamentalsProvider implements FundamentalsProvider {
	private readonly http: HttpClient;
	private readonly logger: ModuleLogger;
	private rows: Promise<FundamentalsRow[]> | null = null;

	constructor(private readonly options: ScrapedFundamentalsProviderOptions) {
		this.http = options.http ?? createHttpClient();
		this.logger = options.logger ?? createLogger("data:fundamentals");
	}

	async fetchFundamentals(reit: ReitDefinition): Promise<FundamentalsSnapshot> {
		const rows = await this.loadRows();
		const match = matchFundamentals(reit.name, rows, this.options.knownNames);
		if (!match) {
			if (rows.length) {
				this.logger.debug("fundamentals_unmatched", { ticker: reit.ticker, name: reit.name });
			}
			return emptyFundamentals();
		}
		return match.snapshot;
	}

	private loadRows(): Promise<FundamentalsRow[]> {
		if (!this.rows) {
			this.rows = this.downloadRows();
		}
		return this.rows;
	}

	private async downloadRows(): Promise<FundamentalsRow[]> {
		const { url } = this.options;
		try {
			const response = await withRetry(
				() => this.http.get(url, { responseType: "text" }),
				{
					label: "fundamentals",
					logger: this.logger,
					maxRetries: this.options.maxRetries,
					initialBackoffMs: this.options.initialBackoffMs,
					sleep: this.options.sleep,
				}
			);
			if (typeof response.data !== "string") {
				throw new Error(`expected an HTML document, got ${typeof response.data}`);
			}
			const rows = parseFundamentalsTable(response.data);
			if (!rows.length) {
				this.logger.warn("fundamentals_table_missing", { url });
			} else {
				this.logger.info("fundamentals_loaded", { url, rows: rows.length });
			}
			return rows;
		} catch (error) {
			this.logger.warn("fundamentals_fetch_failed", {
				url,
				status: httpStatusOf(error),
				error: errorMessage(error),
			});
			return [];
		}
	}
}
