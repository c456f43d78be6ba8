export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

type Nullable<T> = T | null | undefined;

const NODE_ENV = process.env.NODE_ENV;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_JSON = process.env.LOG_JSON === "true";

const prettyEnabled = LOG_PRETTY || NODE_ENV === "development";
const jsonEnabled = LOG_JSON || !prettyEnabled;

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const REDACTED_KEYS = new Set([
	"apikey",
	"api_key",
	"x-api-key",
	"token",
	"bottoken",
	"secret",
	"authorization",
	"password",
]);

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const moduleFilter = (() => {
	const raw = process.env.LOG_MODULE;
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
})();

const minLevel = normalizeLevel(process.env.LOG_LEVEL);

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[minLevel]) {
		return false;
	}
	if (moduleFilter && !moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (prettyEnabled) {
		try {
			printPretty(sanitizePayload(base));
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (jsonEnabled) {
		try {
			console.log(JSON.stringify(sanitizePayload(base)));
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

/**
 * Logger that drops everything; handy default for library code under test.
 */
export const silentLogger: ModuleLogger = {
	log: () => undefined,
	debug: () => undefined,
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};

const sanitizePayload = (payload: BaseLogPayload): BaseLogPayload => {
	const seen = new WeakSet<object>();
	const clone: BaseLogPayload = {
		level: payload.level,
		event: payload.event,
		module: payload.module,
	};
	for (const [key, nested] of Object.entries(payload)) {
		clone[key] = REDACTED_KEYS.has(key.toLowerCase())
			? "[REDACTED]"
			: sanitizeValue(nested, seen);
	}
	return clone;
};

export const sanitizeValue = (
	value: unknown,
	seen: WeakSet<object> = new WeakSet<object>()
): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = REDACTED_KEYS.has(key.toLowerCase())
				? "[REDACTED]"
				: sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	try {
		switch (event) {
			case "ticker_indicators": {
				printTickerIndicators(rest);
				break;
			}
			case "report_summary": {
				printReportSummary(rest);
				break;
			}
			default: {
				const keys = Object.keys(rest);
				if (keys.length) {
					console.log(`  ${keys.map((key) => `${key}=${fmtValue(rest[key])}`).join(" ")}`);
				}
				break;
			}
		}
	} catch (error) {
		console.warn(
			`[logger] pretty render error: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
}

const fmtValue = (value: unknown): string => {
	if (value === undefined || value === null) {
		return "-";
	}
	if (typeof value === "object") {
		return JSON.stringify(value);
	}
	return String(value);
};

const printTickerIndicators = (rest: Record<string, unknown>): void => {
	const { ticker, latestClose, changes, rsi, trend, yieldPct, priceToNav } =
		rest as TickerIndicatorsPrettyPayload;
	console.table([
		{
			ticker,
			close: latestClose,
			...(changes ?? {}),
			rsi,
			trend,
			yield: yieldPct,
			pnav: priceToNav,
		},
	]);
};

const printReportSummary = (rest: Record<string, unknown>): void => {
	const { tickers, computed, failed, insufficient, aiEnabled, notified, output } =
		rest as ReportSummaryPrettyPayload;
	console.table([
		{ tickers, computed, failed, insufficient, aiEnabled, notified, output },
	]);
};

interface TickerIndicatorsPrettyPayload {
	ticker?: string;
	latestClose?: Nullable<number>;
	changes?: Record<string, Nullable<number>>;
	rsi?: Nullable<number>;
	trend?: Nullable<string>;
	yieldPct?: Nullable<number>;
	priceToNav?: Nullable<number>;
}

interface ReportSummaryPrettyPayload {
	tickers?: number;
	computed?: number;
	failed?: number;
	insufficient?: number;
	aiEnabled?: boolean;
	notified?: boolean;
	output?: string;
}
