import fs from "node:fs";
import path from "node:path";

import { loadEnvFiles } from "./env";
import { TIMEFRAME_LABELS } from "./types";
import type { ChartType, TimeframeLabel } from "./types";

export interface IndicatorSettings {
	smaPeriod: number;
	rsiPeriod: number;
	/** Bars required before any indicator is attempted. */
	minBars: number;
}

export interface InterpretationThresholds {
	overbought: number;
	oversold: number;
}

export interface ChartSettings {
	chartType: ChartType;
	showMovingAverage: boolean;
	showVolume: boolean;
}

export interface AnalyzerConfig {
	exchange: string;
	defaultSymbol: string;
	defaultTimeframe: TimeframeLabel;
	indicators: IndicatorSettings;
	thresholds: InterpretationThresholds;
	chart: ChartSettings;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
}

export const DEFAULT_INDICATOR_SETTINGS: IndicatorSettings = {
	smaPeriod: 20,
	rsiPeriod: 14,
	minBars: 15,
};

export const DEFAULT_THRESHOLDS: InterpretationThresholds = {
	overbought: 70,
	oversold: 30,
};

export const DEFAULT_CHART_SETTINGS: ChartSettings = {
	chartType: "candlestick",
	showMovingAverage: true,
	showVolume: true,
};

const CONFIG_FILE = "analyzer.json";
const PRESETS_FILE = "symbols.json";
const WORKSPACE_SENTINELS = [".git", path.join("config", CONFIG_FILE)];

let cachedWorkspaceRoot: string | undefined;

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

const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readJsonFile = (filePath: string): unknown => {
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new Error(
			`Invalid JSON in ${filePath}: ${
				error instanceof Error ? error.message : String(error)
			}`
		);
	}
};

const readSection = (
	source: Record<string, unknown>,
	key: string,
	file: string
): Record<string, unknown> => {
	const value = source[key];
	if (value === undefined) {
		return {};
	}
	if (!isRecord(value)) {
		throw new Error(`Config section "${key}" in ${file} must be an object`);
	}
	return value;
};

const ensureNumber = (
	value: unknown,
	field: string,
	fallback: number
): number => {
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new Error(`Numeric field ${field} must be a finite number`);
	}
	return value;
};

const ensurePositiveInteger = (
	value: unknown,
	field: string,
	fallback: number
): number => {
	const num = ensureNumber(value, field, fallback);
	if (!Number.isInteger(num) || num <= 0) {
		throw new Error(`Field ${field} must be a positive integer, got ${num}`);
	}
	return num;
};

const ensureBoolean = (
	value: unknown,
	field: string,
	fallback: boolean
): boolean => {
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "boolean") {
		throw new Error(`Field ${field} must be a boolean`);
	}
	return value;
};

const ensureString = (
	value: unknown,
	field: string,
	fallback: string
): string => {
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "string" || !value.trim().length) {
		throw new Error(`Field ${field} must be a non-empty string`);
	}
	return value.trim();
};

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

export const isTimeframeLabel = (value: string): value is TimeframeLabel =>
	TIMEFRAME_LABELS.some((label) => label === value);

const parseTimeframeLabel = (value: string, field: string): TimeframeLabel => {
	if (!isTimeframeLabel(value)) {
		throw new Error(
			`Field ${field} must be one of ${TIMEFRAME_LABELS.join(", ")}; got "${value}"`
		);
	}
	return value;
};

const parseChartType = (value: unknown, field: string): ChartType => {
	if (value === undefined) {
		return DEFAULT_CHART_SETTINGS.chartType;
	}
	if (value === "candlestick" || value === "line") {
		return value;
	}
	throw new Error(`Field ${field} must be "candlestick" or "line"`);
};

/**
 * Validate a parsed analyzer.json document. Missing fields take defaults;
 * present fields of the wrong type are rejected.
 */
export const parseAnalyzerConfig = (
	raw: unknown,
	file = CONFIG_FILE
): AnalyzerConfig => {
	if (!isRecord(raw)) {
		throw new Error(`Config file ${file} must contain a JSON object`);
	}
	const indicators = readSection(raw, "indicators", file);
	const thresholds = readSection(raw, "thresholds", file);
	const chart = readSection(raw, "chart", file);

	const overbought = ensureNumber(
		thresholds.overbought,
		"thresholds.overbought",
		DEFAULT_THRESHOLDS.overbought
	);
	const oversold = ensureNumber(
		thresholds.oversold,
		"thresholds.oversold",
		DEFAULT_THRESHOLDS.oversold
	);
	if (oversold >= overbought) {
		throw new Error(
			`thresholds.oversold (${oversold}) must be below thresholds.overbought (${overbought})`
		);
	}

	return {
		exchange: ensureString(raw.exchange, "exchange", "binance"),
		defaultSymbol: ensureString(raw.defaultSymbol, "defaultSymbol", "BTC/USDT"),
		defaultTimeframe: parseTimeframeLabel(
			ensureString(raw.defaultTimeframe, "defaultTimeframe", "1 Month"),
			"defaultTimeframe"
		),
		indicators: {
			smaPeriod: ensurePositiveInteger(
				indicators.smaPeriod,
				"indicators.smaPeriod",
				DEFAULT_INDICATOR_SETTINGS.smaPeriod
			),
			rsiPeriod: ensurePositiveInteger(
				indicators.rsiPeriod,
				"indicators.rsiPeriod",
				DEFAULT_INDICATOR_SETTINGS.rsiPeriod
			),
			minBars: ensurePositiveInteger(
				indicators.minBars,
				"indicators.minBars",
				DEFAULT_INDICATOR_SETTINGS.minBars
			),
		},
		thresholds: { overbought, oversold },
		chart: {
			chartType: parseChartType(chart.chartType, "chart.chartType"),
			showMovingAverage: ensureBoolean(
				chart.showMovingAverage,
				"chart.showMovingAverage",
				DEFAULT_CHART_SETTINGS.showMovingAverage
			),
			showVolume: ensureBoolean(
				chart.showVolume,
				"chart.showVolume",
				DEFAULT_CHART_SETTINGS.showVolume
			),
		},
	};
};

const applyEnvOverrides = (config: AnalyzerConfig): AnalyzerConfig => {
	const exchange = readOptionalEnvVar("TRENDLENS_EXCHANGE");
	const symbol = readOptionalEnvVar("TRENDLENS_SYMBOL");
	const timeframe = readOptionalEnvVar("TRENDLENS_TIMEFRAME");
	return {
		...config,
		exchange: exchange ?? config.exchange,
		defaultSymbol: symbol ?? config.defaultSymbol,
		defaultTimeframe: timeframe
			? parseTimeframeLabel(timeframe, "TRENDLENS_TIMEFRAME")
			: config.defaultTimeframe,
	};
};

/**
 * Load env files, then `<configDir>/analyzer.json` (optional), then apply
 * `TRENDLENS_*` environment overrides.
 */
export const loadAnalyzerConfig = (
	options: ConfigLoadOptions = {}
): AnalyzerConfig => {
	loadEnvFiles(findWorkspaceRoot(), options.envPath);
	const configDir = options.configDir ?? getDefaultConfigDir();
	const filePath = path.join(configDir, CONFIG_FILE);
	const raw = fs.existsSync(filePath) ? readJsonFile(filePath) : {};
	return applyEnvOverrides(parseAnalyzerConfig(raw, filePath));
};

/**
 * Display name to symbol map from `<configDir>/symbols.json`.
 */
export const loadSymbolPresets = (
	configDir: string = getDefaultConfigDir()
): Record<string, string> => {
	const filePath = path.join(configDir, PRESETS_FILE);
	if (!fs.existsSync(filePath)) {
		return {};
	}
	const raw = readJsonFile(filePath);
	if (!isRecord(raw)) {
		throw new Error(`Preset file ${filePath} must contain a JSON object`);
	}
	const presets: Record<string, string> = {};
	for (const [name, symbol] of Object.entries(raw)) {
		if (typeof symbol !== "string" || !symbol.trim().length) {
			throw new Error(`Preset "${name}" in ${filePath} must map to a symbol`);
		}
		presets[name] = symbol.trim();
	}
	return presets;
};
