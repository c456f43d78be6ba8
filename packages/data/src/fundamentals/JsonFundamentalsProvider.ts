import fs from "node:fs";

import {
	emptyFundamentals,
	metricFrom,
	unavailable,
	type FundamentalField,
	type FundamentalsSnapshot,
	type MetricValue,
	type ReitDefinition,
} from "@sreit/core";

import type { FundamentalsProvider } from "../types";

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const parseSnapshot = (ticker: string, entry: unknown, source: string): FundamentalsSnapshot => {
	if (!isRecord(entry)) {
		throw new Error(`Fundamentals for ${ticker} in ${source} must be an object`);
	}
	const read = (field: FundamentalField): MetricValue => {
		const value = entry[field];
		if (value === undefined || value === null) {
			return unavailable();
		}
		if (typeof value !== "number") {
			throw new Error(
				`Fundamentals field ${ticker}.${field} in ${source} must be a number or null`
			);
		}
		return metricFrom(value);
	};
	return {
		yieldPct: read("yieldPct"),
		priceToNav: read("priceToNav"),
		gearingPct: read("gearingPct"),
		nav: read("nav"),
		dpu: read("dpu"),
	};
};

/**
 * Parses a snapshot document keyed by ticker:
 * `{ "C38U.SI": { "yieldPct": 5.4, "priceToNav": 0.97, "gearingPct": null } }`.
 * Missing fields and `null` become unavailable metrics.
 */
export const parseFundamentalsDocument = (
	raw: unknown,
	source = "fundamentals document"
): Map<string, FundamentalsSnapshot> => {
	if (!isRecord(raw)) {
		throw new Error(`${source} must contain an object keyed by ticker`);
	}
	return new Map(
		Object.entries(raw).map(([ticker, entry]) => [ticker, parseSnapshot(ticker, entry, source)])
	);
};

export class JsonFundamentalsProvider implements FundamentalsProvider {
	constructor(private readonly snapshots: ReadonlyMap<string, FundamentalsSnapshot>) {}

	static fromFile(filePath: string): JsonFundamentalsProvider {
		if (!fs.existsSync(filePath)) {
			throw new Error(`Fundamentals file not found: ${filePath}`);
		}
		let raw: unknown;
		try {
			raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
		} catch (error) {
			throw new Error(
				`Fundamentals file ${filePath} is not valid JSON: ${
					error instanceof Error ? error.message : String(error)
				}`
			);
		}
		return new JsonFundamentalsProvider(parseFundamentalsDocument(raw, filePath));
	}

	async fetchFundamentals(reit: ReitDefinition): Promise<FundamentalsSnapshot> {
		return this.snapshots.get(reit.ticker) ?? emptyFundamentals();
	}
}

/**
 * Used when no fundamentals source is configured: every metric is unavailable.
 */
export class UnavailableFundamentalsProvider implements FundamentalsProvider {
	async fetchFundamentals(): Promise<FundamentalsSnapshot> {
		return emptyFundamentals();
	}
}
