import { describe, expect, it } from "vitest";
import { httpStatusOf, isRetryableHttpError, withRetry } from "./http";

class StatusError extends Error {
	readonly response: { status: number };

	constructor(status: number) {
		super(`Request failed with status code ${status}`);
		this.response = { status };
	}
}

const noSleep = async (): Promise<void> => undefined;

describe("httpStatusOf", () => {
	it("reads the response status of axios-style errors", () => {
		expect(httpStatusOf(new StatusError(404))).toBe(404);
		expect(httpStatusOf(new Error("socket hang up"))).toBeUndefined();
		expect(httpStatusOf("boom")).toBeUndefined();
	});

	it("retries network errors, 429 and 5xx only", () => {
		expect(isRetryableHttpError(new Error("ECONNRESET"))).toBe(true);
		expect(isRetryableHttpError(new StatusError(429))).toBe(true);
		expect(isRetryableHttpError(new StatusError(503))).toBe(true);
		expect(isRetryableHttpError(new StatusError(404))).toBe(false);
	});
});

describe("withRetry", () => {
	it("retries with exponential backoff until the operation succeeds", async () => {
		const delays: number[] = [];
		let calls = 0;
		const result = await withRetry(
			async () => {
				calls += 1;
				if (calls < 3) {
					throw new StatusError(502);
				}
				return "ok";
			},
			{
				initialBackoffMs: 100,
				sleep: async (ms) => {
					delays.push(ms);
				},
			}
		);
		expect(result).toBe("ok");
		expect(calls).toBe(3);
		expect(delays).toEqual([100, 200]);
	});

	it("gives up after maxRetries", async () => {
		let calls = 0;
		await expect(
			withRetry(
				async () => {
					calls += 1;
					throw new StatusError(500);
				},
				{ maxRetries: 2, sleep: noSleep }
			)
		).rejects.toThrowError(/status code 500/);
		expect(calls).toBe(3);
	});

	it("does not retry client errors", async () => {
		let calls = 0;
		await expect(
			withRetry(
				async () => {
					calls += 1;
					throw new StatusError(401);
				},
				{ sleep: noSleep }
			)
		).rejects.toThrowError(/status code 401/);
		expect(calls).toBe(1);
	});
});
