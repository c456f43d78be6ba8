#!/usr/bin/env node

import path from "node:path";
import process from "node:process";
import {
	createLogger,
	describeConfigSources,
	getDefaultConfigDir,
	getWorkspaceRoot,
	loadEnvConfig,
	loadEnvFiles,
	loadIndicatorProfile,
	loadUniverse,
	type EnvConfig,
	type ReitDefinition,
} from "@sreit/core";
import { writeDashboard } from "@sreit/dashboard";
import {
	JsonFundamentalsProvider,
	ScrapedFundamentalsProvider,
	UnavailableFundamentalsProvider,
	YahooChartProvider,
	type FundamentalsProvider,
} from "@sreit/data";
import { IndicatorEngine, resolveIndicatorConfig } from "@sreit/indicators";
import { AnthropicCompletionClient, NarrativeService } from "@sreit/narrative";
import { TelegramNotifier } from "@sreit/notifier";

import { parseCliArgs, resolveCliOptions, type ReportCliOptions } from "./cliArgs";
import { runReport, type ReportDependencies } from "./pipeline";

const USAGE = `Usage:
  npm run report -- [options]

Options:
  --config-dir <path>      Directory holding reits.json and indicators/ (default: <root>/config)
  --profile <name>         Indicator profile under config/indicators (default: default)
  --out <path>             Dashboard output file (default: output/index.html)
  --fundamentals <file>    Read fundamentals from a JSON snapshot keyed by ticker
  --tickers <A,B>          Restrict the run to these tickers
  --skip-ai                Use template commentary even when ANTHROPIC_API_KEY is set
  --skip-notify            Do not send the Telegram summary
  --help                   Show this message
`;

const logger = createLogger("report-cli");

/**
 * Configuration problems surface as this error; `main` maps it to exit code 1
 * with the message only.
 */
class ConfigurationError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ConfigurationError";
	}
}

const selectUniverse = (universe: ReitDefinition[], tickers?: string[]): ReitDefinition[] => {
	if (!tickers) {
		return universe;
	}
	const known = new Set(universe.map((reit) => reit.ticker.toUpperCase()));
	const missing = tickers.filter((ticker) => !known.has(ticker));
	if (missing.length) {
		throw new ConfigurationError(`Unknown ticker(s) for --tickers: ${missing.join(", ")}`);
	}
	return universe.filter((reit) => tickers.includes(reit.ticker.toUpperCase()));
};

const createFundamentalsProvider = (
	options: ReportCliOptions,
	env: EnvConfig,
	configured: readonly ReitDefinition[]
): FundamentalsProvider => {
	if (options.fundamentalsFile) {
		return JsonFundamentalsProvider.fromFile(path.resolve(options.fundamentalsFile));
	}
	if (env.fundamentalsUrl) {
		return new ScrapedFundamentalsProvider({
			url: env.fundamentalsUrl,
			knownNames: configured.map((reit) => reit.name),
		});
	}
	logger.warn("fundamentals_disabled", { reason: "no FUNDAMENTALS_URL or --fundamentals file" });
	return new UnavailableFundamentalsProvider();
};

const createNarrativeService = (options: ReportCliOptions, env: EnvConfig): NarrativeService => {
	if (options.skipAi || !env.anthropicApiKey) {
		logger.info("ai_disabled", { reason: options.skipAi ? "--skip-ai" : "no ANTHROPIC_API_KEY" });
		return new NarrativeService({ client: null });
	}
	return new NarrativeService({
		client: new AnthropicCompletionClient({
			apiKey: env.anthropicApiKey,
			model: env.anthropicModel,
		}),
	});
};

const createNotifier = (options: ReportCliOptions, env: EnvConfig): TelegramNotifier | null => {
	if (options.skipNotify) {
		return null;
	}
	if (!env.telegramBotToken || !env.telegramChatId) {
		logger.info("telegram_disabled", { reason: "TELEGRAM_BOT_TOKEN or TELEGRAM_CHAT_ID not set" });
		return null;
	}
	return new TelegramNotifier({ botToken: env.telegramBotToken, chatId: env.telegramChatId });
};

const buildDependencies = (options: ReportCliOptions): ReportDependencies => {
	const root = getWorkspaceRoot();
	const applied = loadEnvFiles(root);
	if (applied.length) {
		logger.debug("env_files_loaded", { files: applied });
	}

	const configDir = options.configDir ? path.resolve(options.configDir) : getDefaultConfigDir();
	let env: EnvConfig;
	let universe: ReitDefinition[];
	let engine: IndicatorEngine;
	let fundamentals: FundamentalsProvider;
	let sources: Record<string, string>;
	try {
		env = loadEnvConfig();
		const configured = loadUniverse(configDir);
		const profile = loadIndicatorProfile(configDir, options.profile);
		universe = selectUniverse(configured, options.tickers);
		engine = new IndicatorEngine(resolveIndicatorConfig(profile));
		fundamentals = createFundamentalsProvider(options, env, configured);
		sources = describeConfigSources({ env, universe: configured, indicators: profile });
	} catch (error) {
		if (error instanceof ConfigurationError) {
			throw error;
		}
		throw new ConfigurationError(error instanceof Error ? error.message : String(error), {
			cause: error,
		});
	}
	if (!universe.length) {
		throw new ConfigurationError(`No REITs configured in ${path.join(configDir, "reits.json")}`);
	}

	logger.info("report_config", {
		configDir,
		profile: options.profile,
		sources,
		tickers: universe.length,
		lookback: env.priceLookback,
		indicators: engine.config,
	});

	return {
		universe,
		engine,
		prices: new YahooChartProvider(),
		fundamentals,
		narrative: createNarrativeService(options, env),
		notifier: createNotifier(options, env),
		writeDashboard,
		outputPath: path.resolve(options.outputPath),
		lookback: env.priceLookback,
		dashboardUrl: env.dashboardUrl,
		logger,
	};
};

const main = async (): Promise<void> => {
	let options: ReportCliOptions;
	try {
		options = resolveCliOptions(parseCliArgs(process.argv.slice(2)));
	} catch (error) {
		throw new ConfigurationError(error instanceof Error ? error.message : String(error));
	}
	if (options.help) {
		console.log(USAGE);
		return;
	}

	const summary = await runReport(buildDependencies(options));
	const relative = path.relative(process.cwd(), summary.output) || summary.output;
	console.log(
		`Report complete: ${summary.computed}/${summary.tickers} tickers computed, ${summary.failed} failed. Dashboard: ${relative}`
	);
};

main().catch((error: unknown) => {
	if (error instanceof ConfigurationError) {
		console.error(`Configuration error: ${error.message}`);
		console.error(USAGE);
	} else {
		logger.error("report_failed", { error });
		console.error("Report failed:", error instanceof Error ? error.message : error);
	}
	process.exitCode = 1;
});
