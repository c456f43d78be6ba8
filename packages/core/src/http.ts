import axios, { type AxiosRequestConfig } from "axios";

import type { ModuleLogger } from "./utils/logger";

export type HttpRequestConfig = Pick<
	AxiosRequestConfig,
	"params" | "headers" | "timeout" | "responseType"
>;

/**
 * Response bodies stay `unknown` until a parser has validated them.
 */
export interface HttpResponse {
	data: unknown;
	status: number;
}

/**
 * The slice of an axios instance the integrations use; tests substitute an
 * in-process fake.
 */
export interface HttpClient {
	get(url: string, config?: HttpRequestConfig): Promise<HttpResponse>;
	post(url: string, body: unknown, config?: HttpRequestConfig): Promise<HttpResponse>;
}

export const DEFAULT_HTTP_TIMEOUT_MS = 15_000;

export const createHttpClient = (
	options: { timeoutMs?: number; userAgent?: string } = {}
): HttpClient =>
	axios.create({
		timeout: options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS,
		headers: {
			"User-Agent": options.userAgent ?? "Mozilla/5.0 (compatible; sreit-pulse/0.1)",
		},
	});

/**
 * HTTP status carried by an axios-style error, if any.
 */
export const httpStatusOf = (error: unknown): number | undefined => {
	if (typeof error !== "object" || error === null || !("response" in error)) {
		return undefined;
	}
	const { response } = error;
	if (typeof response !== "object" || response === null || !("status" in response)) {
		return undefined;
	}
	return typeof response.status === "number" ? response.status : undefined;
};

export const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Network failures, 429 and 5xx are worth another attempt; other 4xx are not.
 */
export const isRetryableHttpError = (error: unknown): boolean => {
	const status = httpStatusOf(error);
	return status === undefined || status === 429 || status >= 500;
};

export interface RetryOptions {
	maxRetries?: number;
	initialBackoffMs?: number;
	label?: string;
	logger?: ModuleLogger;
	sleep?: (ms: number) => Promise<void>;
	shouldRetry?: (error: unknown) => boolean;
}

const defaultSleep = (ms: number): Promise<void> =>
	new Promise((resolve) => setTimeout(resolve, ms));

export const withRetry = async <T>(
	operation: () => Promise<T>,
	options: RetryOptions = {}
): Promise<T> => {
	const {
		maxRetries = 3,
		initialBackoffMs = 1_000,
		label = "request",
		logger,
		sleep = defaultSleep,
		shouldRetry = isRetryableHttpError,
	} = options;

	for (let attempt = 0; ; attempt += 1) {
		try {
			return await operation();
		} catch (error) {
			if (attempt >= maxRetries || !shouldRetry(error)) {
				throw error;
			}
			const backoffMs = initialBackoffMs * Math.pow(2, attempt);
			logger?.warn("request_retry", {
				label,
				attempt: attempt + 1,
				backoffMs,
				status: httpStatusOf(error),
				error: errorMessage(error),
			});
			await sleep(backoffMs);
		}
	}
};
