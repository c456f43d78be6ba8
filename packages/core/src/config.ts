import fs from "node:fs";
import path from "node:path";

import type { ReitDefinition } from "./types";

export type ConfigSourceType = "file" | "env";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

const configMetadata = new WeakMap<object, ConfigMetadata>();

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = configMetadata.get(config) ?? {};
	configMetadata.set(config, { ...existing, ...metadata });
	return config;
};

export const getConfigMetadata = (config: object): ConfigMetadata | null =>
	configMetadata.get(config) ?? null;

/**
 * One-line description of where each loaded config object came from, for the
 * run's startup log. Objects without metadata are reported as "defaults".
 */
export const describeConfigSources = (
	configs: Record<string, object>
): Record<string, string> => {
	const described: Record<string, string> = {};
	for (const [key, config] of Object.entries(configs)) {
		const metadata = getConfigMetadata(config);
		if (!metadata) {
			described[key] = "defaults";
			continue;
		}
		const location = metadata.path ? `${metadata.source}:${metadata.path}` : metadata.source;
		described[key] = metadata.profile ? `${location} (profile ${metadata.profile})` : location;
	}
	return described;
};

let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = [path.join("config", "reits.json"), ".git"];

export const DEFAULT_ANTHROPIC_MODEL = "claude-3-5-sonnet-20240620";
export const DEFAULT_PRICE_LOOKBACK = "6mo";

const LOOKBACK_PATTERN = /^(\d+)(d|mo|y)$/;

export interface EnvConfig {
	anthropicApiKey?: string;
	anthropicModel: string;
	telegramBotToken?: string;
	telegramChatId?: string;
	fundamentalsUrl?: string;
	dashboardUrl?: string;
	priceLookback: string;
}

export type EnvSource = Record<string, string | undefined>;

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

const readOptionalEnvVar = (env: EnvSource, key: string): string | undefined => {
	const value = env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const readJsonFile = (filePath: string): unknown => {
	if (!fs.existsSync(filePath)) {
		throw new Error(`Config file not found: ${filePath}`);
	}
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new Error(
			`Config file ${filePath} is not valid JSON: ${
				error instanceof Error ? error.message : String(error)
			}`
		);
	}
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Reads report settings from the environment. Every integration is optional:
 * a missing API key or chat id disables that stage instead of failing the run.
 */
export const loadEnvConfig = (env: EnvSource = process.env): EnvConfig => {
	const priceLookback =
		readOptionalEnvVar(env, "PRICE_LOOKBACK") ?? DEFAULT_PRICE_LOOKBACK;
	if (!LOOKBACK_PATTERN.test(priceLookback)) {
		throw new Error(
			`Invalid PRICE_LOOKBACK "${priceLookback}". Expected a range like "3mo", "6mo", "1y"`
		);
	}
	return withConfigMetadata(
		{
			anthropicApiKey: readOptionalEnvVar(env, "ANTHROPIC_API_KEY"),
			anthropicModel:
				readOptionalEnvVar(env, "ANTHROPIC_MODEL") ?? DEFAULT_ANTHROPIC_MODEL,
			telegramBotToken: readOptionalEnvVar(env, "TELEGRAM_BOT_TOKEN"),
			telegramChatId: readOptionalEnvVar(env, "TELEGRAM_CHAT_ID"),
			fundamentalsUrl: readOptionalEnvVar(env, "FUNDAMENTALS_URL"),
			dashboardUrl: readOptionalEnvVar(env, "DASHBOARD_URL"),
			priceLookback,
		},
		{ source: "env" }
	);
};

const parseReitEntry = (
	entry: unknown,
	index: number,
	filePath: string
): ReitDefinition => {
	if (!isRecord(entry)) {
		throw new Error(`Entry ${index} in ${filePath} must be an object`);
	}
	const readField = (field: keyof ReitDefinition): string => {
		const value = entry[field];
		if (typeof value !== "string" || !value.trim()) {
			throw new Error(
				`Entry ${index} in ${filePath} is missing required string "${field}"`
			);
		}
		return value.trim();
	};
	return {
		ticker: readField("ticker"),
		name: readField("name"),
		segment: readField("segment"),
	};
};

/**
 * Loads the ticker universe from `<configDir>/reits.json`.
 */
export const loadUniverse = (
	configDir = getDefaultConfigDir()
): ReitDefinition[] => {
	const filePath = path.join(configDir, "reits.json");
	const raw = readJsonFile(filePath);
	if (!Array.isArray(raw)) {
		throw new Error(`${filePath} must contain an array of REIT definitions`);
	}
	const reits = raw.map((entry, index) => parseReitEntry(entry, index, filePath));
	const seen = new Set<string>();
	for (const reit of reits) {
		if (seen.has(reit.ticker)) {
			throw new Error(`Duplicate ticker ${reit.ticker} in ${filePath}`);
		}
		seen.add(reit.ticker);
	}
	return withConfigMetadata(reits, { source: "file", path: filePath });
};

/**
 * Reads a raw indicator profile (`<configDir>/indicators/<profile>.json`).
 * Field validation belongs to the indicator package, which owns the defaults.
 */
export const loadIndicatorProfile = (
	configDir = getDefaultConfigDir(),
	profile = "default"
): Record<string, unknown> => {
	const profileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	const filePath = path.join(configDir, "indicators", profileName);
	const raw = readJsonFile(filePath);
	if (!isRecord(raw)) {
		throw new Error(`${filePath} must contain a JSON object`);
	}
	return withConfigMetadata({ ...raw }, { source: "file", path: filePath, profile });
};
