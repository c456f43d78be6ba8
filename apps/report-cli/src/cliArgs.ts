import path from "node:path";

export type ArgValue = string | boolean;

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			throw new Error(`Unexpected argument "${token}"`);
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	return args;
};

export const DEFAULT_OUTPUT_PATH = path.join("output", "index.html");

export interface ReportCliOptions {
	help: boolean;
	configDir?: string;
	profile: string;
	outputPath: string;
	fundamentalsFile?: string;
	skipAi: boolean;
	skipNotify: boolean;
	tickers?: string[];
}

const KNOWN_FLAGS = new Set([
	"help",
	"config-dir",
	"profile",
	"out",
	"fundamentals",
	"skip-ai",
	"skip-notify",
	"tickers",
]);

const readString = (args: Record<string, ArgValue>, key: string): string | undefined => {
	const value = args[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string" || !value.trim()) {
		throw new Error(`--${key} requires a value`);
	}
	return value.trim();
};

const readFlag = (args: Record<string, ArgValue>, key: string): boolean => {
	const value = args[key];
	if (value === undefined || value === false) {
		return false;
	}
	if (value === true || value === "true") {
		return true;
	}
	if (value === "false") {
		return false;
	}
	throw new Error(`--${key} does not take a value (got "${value}")`);
};

export const resolveCliOptions = (args: Record<string, ArgValue>): ReportCliOptions => {
	const unknown = Object.keys(args).filter((key) => !KNOWN_FLAGS.has(key));
	if (unknown.length) {
		throw new Error(`Unknown option${unknown.length > 1 ? "s" : ""}: ${unknown.map((key) => `--${key}`).join(", ")}`);
	}
	const tickers = readString(args, "tickers")
		?.split(",")
		.map((ticker) => ticker.trim().toUpperCase())
		.filter((ticker) => ticker.length > 0);
	return {
		help: readFlag(args, "help"),
		configDir: readString(args, "config-dir"),
		profile: readString(args, "profile") ?? "default",
		outputPath: readString(args, "out") ?? DEFAULT_OUTPUT_PATH,
		fundamentalsFile: readString(args, "fundamentals"),
		skipAi: readFlag(args, "skip-ai"),
		skipNotify: readFlag(args, "skip-notify"),
		tickers: tickers && tickers.length ? tickers : undefined,
	};
};
