import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import type { SymbolAssets } from "./types";
import { StaticSymbolResolver } from "./exchange/SymbolResolver";

export type ConfigSourceType = "file" | "embedded" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

const CONFIG_META_SYMBOL = Symbol.for("btsim.config.meta");

const isConfigMetadata = (value: unknown): value is ConfigMetadata =>
	typeof value === "object" &&
	value !== null &&
	"source" in value &&
	typeof value.source === "string";

const readConfigMetadata = (config: unknown): ConfigMetadata | null => {
	if (!config || typeof config !== "object") {
		return null;
	}
	const meta: unknown = Reflect.get(config, CONFIG_META_SYMBOL);
	return isConfigMetadata(meta) ? meta : null;
};

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = readConfigMetadata(config) ?? {};
	Object.defineProperty(config, CONFIG_META_SYMBOL, {
		value: { ...existing, ...metadata },
		enumerable: false,
		configurable: true,
		writable: true,
	});
	return config;
};

export const getConfigMetadata = (config: unknown): ConfigMetadata | null =>
	readConfigMetadata(config);

let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = ["package-lock.json", ".git"];

export interface ExchangeInfoFixture {
	baseAssetPrecision: number;
	quoteAssetPrecision: number;
	stepSize: string;
	tickSize: string;
	minNotional: string;
}

export interface HistoryRetentionConfig {
	/** Maximum executed orders kept per history sequence. */
	limit: number;
	/** Sliding window anchored at the newest inserted order. */
	windowMs: number;
}

export interface SimulatorConfig {
	initialCash: number;
	commissionRate: number;
	history: HistoryRetentionConfig;
	klines: {
		defaultLimit: number;
	};
	exchangeInfo: ExchangeInfoFixture;
}

export const DEFAULT_SIMULATOR_CONFIG: SimulatorConfig = {
	initialCash: 10_000,
	commissionRate: 0,
	history: {
		limit: 100,
		windowMs: 24 * 60 * 60 * 1000,
	},
	klines: {
		defaultLimit: 500,
	},
	exchangeInfo: {
		baseAssetPrecision: 8,
		quoteAssetPrecision: 8,
		stepSize: "0.1",
		tickSize: "0.0001",
		minNotional: "10.0",
	},
};

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	profile?: string;
}

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

const readJsonFile = (filePath: string): unknown => {
	const contents = fs.readFileSync(filePath, "utf-8");
	return JSON.parse(contents);
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readSection = (
	source: Record<string, unknown>,
	key: string
): Record<string, unknown> => {
	const value = source[key];
	if (value === undefined) {
		return {};
	}
	if (!isRecord(value)) {
		throw new Error(`Config section "${key}" must be an object`);
	}
	return value;
};

const pickNumber = (
	value: unknown,
	fallback: number,
	field: string
): number => {
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new Error(`Config field ${field} must be a finite number`);
	}
	return value;
};

const pickString = (
	value: unknown,
	fallback: string,
	field: string
): string => {
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "string" || !value.trim()) {
		throw new Error(`Config field ${field} must be a non-empty string`);
	}
	return value;
};

const readNumberEnv = (name: string): number | undefined => {
	const raw = process.env[name]?.trim();
	if (!raw) {
		return undefined;
	}
	const parsed = Number(raw);
	if (!Number.isFinite(parsed)) {
		throw new Error(`Environment variable ${name} must be a number`);
	}
	return parsed;
};

const ensurePositiveInteger = (value: number, field: string): number => {
	if (!Number.isSafeInteger(value) || value <= 0) {
		throw new Error(`${field} must be a positive integer, got ${value}`);
	}
	return value;
};

export const validateSimulatorConfig = (
	config: SimulatorConfig
): SimulatorConfig => {
	if (config.initialCash < 0) {
		throw new Error(
			`initialCash must be non-negative, got ${config.initialCash}`
		);
	}
	if (config.commissionRate < 0 || config.commissionRate >= 1) {
		throw new Error(
			`commissionRate must be within [0, 1), got ${config.commissionRate}`
		);
	}
	ensurePositiveInteger(config.history.limit, "history.limit");
	ensurePositiveInteger(config.history.windowMs, "history.windowMs");
	ensurePositiveInteger(config.klines.defaultLimit, "klines.defaultLimit");
	return config;
};

export const loadEnvFile = (envPath: string): void => {
	if (loadedEnvPath === envPath) {
		return;
	}
	if (fs.existsSync(envPath)) {
		dotenv.config({ path: envPath });
	}
	loadedEnvPath = envPath;
};

const parseSimulatorFile = (raw: unknown, filePath: string): SimulatorConfig => {
	if (!isRecord(raw)) {
		throw new Error(`Simulator config at ${filePath} must be a JSON object`);
	}
	const defaults = DEFAULT_SIMULATOR_CONFIG;
	const history = readSection(raw, "history");
	const klines = readSection(raw, "klines");
	const info = readSection(raw, "exchangeInfo");
	return {
		initialCash: pickNumber(raw.initialCash, defaults.initialCash, "initialCash"),
		commissionRate: pickNumber(
			raw.commissionRate,
			defaults.commissionRate,
			"commissionRate"
		),
		history: {
			limit: pickNumber(history.limit, defaults.history.limit, "history.limit"),
			windowMs: pickNumber(
				history.windowMs,
				defaults.history.windowMs,
				"history.windowMs"
			),
		},
		klines: {
			defaultLimit: pickNumber(
				klines.defaultLimit,
				defaults.klines.defaultLimit,
				"klines.defaultLimit"
			),
		},
		exchangeInfo: {
			baseAssetPrecision: pickNumber(
				info.baseAssetPrecision,
				defaults.exchangeInfo.baseAssetPrecision,
				"exchangeInfo.baseAssetPrecision"
			),
			quoteAssetPrecision: pickNumber(
				info.quoteAssetPrecision,
				defaults.exchangeInfo.quoteAssetPrecision,
				"exchangeInfo.quoteAssetPrecision"
			),
			stepSize: pickString(
				info.stepSize,
				defaults.exchangeInfo.stepSize,
				"exchangeInfo.stepSize"
			),
			tickSize: pickString(
				info.tickSize,
				defaults.exchangeInfo.tickSize,
				"exchangeInfo.tickSize"
			),
			minNotional: pickString(
				info.minNotional,
				defaults.exchangeInfo.minNotional,
				"exchangeInfo.minNotional"
			),
		},
	};
};

/**
 * Loads `config/simulator/<profile>.json` and applies `SIM_*` environment
 * overrides on top of it.
 */
export const loadSimulatorConfig = (
	options: ConfigLoadOptions = {}
): SimulatorConfig => {
	const workspaceRoot = findWorkspaceRoot();
	loadEnvFile(options.envPath ?? path.join(workspaceRoot, ".env"));

	const configDir = options.configDir ?? getDefaultConfigDir();
	const profile = options.profile ?? "default";
	const filePath = path.join(configDir, "simulator", `${profile}.json`);
	const fromFile = parseSimulatorFile(readJsonFile(filePath), filePath);

	const config: SimulatorConfig = {
		...fromFile,
		initialCash: readNumberEnv("SIM_INITIAL_CASH") ?? fromFile.initialCash,
		commissionRate:
			readNumberEnv("SIM_COMMISSION_RATE") ?? fromFile.commissionRate,
		history: {
			limit: readNumberEnv("SIM_HISTORY_LIMIT") ?? fromFile.history.limit,
			windowMs:
				readNumberEnv("SIM_HISTORY_WINDOW_MS") ?? fromFile.history.windowMs,
		},
	};

	return withConfigMetadata(validateSimulatorConfig(config), {
		source: "file",
		path: filePath,
		profile,
	});
};

const parseSymbolEntry = (symbol: string, entry: unknown): SymbolAssets => {
	if (
		!isRecord(entry) ||
		typeof entry.baseAsset !== "string" ||
		typeof entry.quoteAsset !== "string"
	) {
		throw new Error(
			`Symbol ${symbol} must declare string baseAsset and quoteAsset`
		);
	}
	return { baseAsset: entry.baseAsset, quoteAsset: entry.quoteAsset };
};

/**
 * Reads `config/symbols.json` (symbol → { baseAsset, quoteAsset }).
 */
export const loadSymbolResolver = (
	configDir = getDefaultConfigDir()
): StaticSymbolResolver => {
	const filePath = path.join(configDir, "symbols.json");
	const raw = readJsonFile(filePath);
	if (!isRecord(raw)) {
		throw new Error(`Symbol registry at ${filePath} must be a JSON object`);
	}
	const entries: Record<string, SymbolAssets> = {};
	for (const [symbol, entry] of Object.entries(raw)) {
		entries[symbol] = parseSymbolEntry(symbol, entry);
	}
	return withConfigMetadata(new StaticSymbolResolver(entries), {
		source: "file",
		path: filePath,
	});
};
