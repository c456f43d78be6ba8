import {
	createHttpClient,
	createLogger,
	errorMessage,
	httpStatusOf,
	withRetry,
	type HttpClient,
	type ModuleLogger,
} from "@sreit/core";

import type { CompletionClient, CompletionRequest } from "./types";

export const ANTHROPIC_MESSAGES_URL = "https://api.anthropic.com/v1/messages";
export const ANTHROPIC_VERSION = "2023-06-01";

export interface AnthropicCompletionClientOptions {
	apiKey: string;
	model: string;
	http?: HttpClient;
	url?: string;
	logger?: ModuleLogger;
	maxRetries?: number;
	initialBackoffMs?: number;
	sleep?: (ms: number) => Promise<void>;
}

export class CompletionError extends Error {
	readonly status?: number;

	constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause });
		this.name = "CompletionError";
		this.status = options.status;
	}
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Joins the text blocks of a Messages API reply. Non-text blocks are ignored;
 * a reply without any text is an error.
 */
export const extractMessageText = (payload: unknown): string => {
	if (!isRecord(payload) || !Array.isArray(payload.content)) {
		throw new CompletionError("completion response has no content array");
	}
	const text = payload.content
		.filter(isRecord)
		.filter((block) => block.type === "text" && typeof block.text === "string")
		.map((block) => String(block.text))
		.join("");
	if (!text.trim()) {
		throw new CompletionError("completion response contained no text");
	}
	return text;
};

export class AnthropicCompletionClient implements CompletionClient {
	readonly model: string;
	private readonly http: HttpClient;
	private readonly logger: ModuleLogger;

	constructor(private readonly options: AnthropicCompletionClientOptions) {
		this.model = options.model;
		this.http = options.http ?? createHttpClient({ timeoutMs: 60_000 });
		this.logger = options.logger ?? createLogger("narrative:anthropic");
	}

	async complete(request: CompletionRequest): Promise<string> {
		const body = {
			model: this.model,
			max_tokens: request.maxTokens,
			messages: [{ role: "user", content: request.prompt }],
		};
		let payload: unknown;
		try {
			const response = await withRetry(
				() =>
					this.http.post(this.options.url ?? ANTHROPIC_MESSAGES_URL, body, {
						headers: {
							"x-api-key": this.options.apiKey,
							"anthropic-version": ANTHROPIC_VERSION,
							"content-type": "application/json",
						},
					}),
				{
					label: "anthropic:messages",
					logger: this.logger,
					maxRetries: this.options.maxRetries,
					initialBackoffMs: this.options.initialBackoffMs,
					sleep: this.options.sleep,
				}
			);
			payload = response.data;
		} catch (error) {
			throw new CompletionError(`completion request failed: ${errorMessage(error)}`, {
				status: httpStatusOf(error),
				cause: error,
			});
		}
		const text = extractMessageText(payload);
		this.logger.debug("completion_received", {
			model: this.model,
			maxTokens: request.maxTokens,
			chars: text.length,
		});
		return text;
	}
}
