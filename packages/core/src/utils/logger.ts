export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

interface LoggerSettings {
	pretty: boolean;
	json: boolean;
	minLevel: LogLevel;
	modules: Set<string> | null;
}

const parseModuleFilter = (raw: string | undefined): Set<string> | null => {
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
};

// Read lazily so a .env loaded after import still applies.
const readSettings = (): LoggerSettings => {
	const pretty =
		process.env.LOG_PRETTY === "true" || process.env.NODE_ENV === "development";
	return {
		pretty,
		json: process.env.LOG_JSON === "true" || !pretty,
		minLevel: normalizeLevel(process.env.LOG_LEVEL),
		modules: parseModuleFilter(process.env.LOG_MODULE),
	};
};

const shouldLog = (
	settings: LoggerSettings,
	level: LogLevel,
	moduleName: string
): boolean => {
	if (LEVELS[level] < LEVELS[settings.minLevel]) {
		return false;
	}
	if (settings.modules && !settings.modules.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	const settings = readSettings();
	if (!shouldLog(settings, payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (settings.pretty) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (settings.json) {
		try {
			console.log(JSON.stringify(sanitizeValue(base, new WeakSet())));
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

const hasToJSON = (value: object): value is { toJSON: () => unknown } =>
	"toJSON" in value && typeof value.toJSON === "function";

export const sanitizeValue = (
	value: unknown,
	seen: WeakSet<object>
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
		// Decimal amounts serialize through their own toJSON
		if (hasToJSON(value)) {
			return value.toJSON();
		}
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

const fmt = (value: unknown): string => {
	if (value === undefined || value === null) {
		return "-";
	}
	const sanitized = sanitizeValue(value, new WeakSet());
	return typeof sanitized === "string" ? sanitized : JSON.stringify(sanitized);
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	try {
		switch (event) {
			case "order_placed":
			case "order_filled":
			case "order_canceled": {
				printOrderEvent(rest);
				break;
			}
			case "backtest_summary": {
				printBacktestSummary(rest);
				break;
			}
			default:
				break;
		}
	} catch (error) {
		console.warn(
			`[logger] pretty render error: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
}

const printOrderEvent = (rest: Record<string, unknown>): void => {
	const { timestamp } = rest;
	console.table([
		{
			symbol: fmt(rest.symbol),
			orderId: fmt(rest.orderId),
			side: fmt(rest.side),
			quantity: fmt(rest.quantity),
			stopPrice: fmt(rest.stopPrice),
			at: typeof timestamp === "number" ? new Date(timestamp).toISOString() : "-",
			locked: fmt(rest.locked),
		},
	]);
};

const SUMMARY_FIELDS = [
	"symbol",
	"timeframe",
	"candles",
	"initialCash",
	"finalValue",
	"filledOrders",
	"openOrders",
] as const;

const printBacktestSummary = (rest: Record<string, unknown>): void => {
	for (const label of SUMMARY_FIELDS) {
		console.log(`${label.padEnd(14)} ${fmt(rest[label])}`);
	}
};
