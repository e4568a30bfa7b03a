import {
	InvalidTimeframeError,
	isTimeframeLabel,
	TIMEFRAME_LABELS,
} from "@trendlens/core";
import type {
	AnalyzerConfig,
	ChartSettings,
	ChartType,
	TimeframeLabel,
} from "@trendlens/core";

export type ArgValue = string | boolean;

export type OutputMode = "text" | "json" | "csv" | "chart";

export interface CliOptions {
	symbol: string;
	labels: TimeframeLabel[];
	output: OutputMode;
	chart: ChartSettings;
	exchange: string;
}

/**
 * `--key value`, `--key=value` and bare `--flag` tokens. `--no-flag` sets
 * `flag` to false. The first positional is taken as the symbol.
 */
export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
			continue;
		}
		const key = token.slice(2);
		if (key.startsWith("no-")) {
			args[key.slice(3)] = false;
			continue;
		}
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	if (positionals[0] && args.symbol === undefined) {
		args.symbol = positionals[0];
	}
	return args;
};

export const readString = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const readFlag = (
	args: Record<string, ArgValue>,
	key: string,
	fallback: boolean
): boolean => {
	const value = args[key];
	if (value === undefined) {
		return fallback;
	}
	if (typeof value === "boolean") {
		return value;
	}
	return value !== "false";
};

const parseChartType = (
	value: ArgValue | undefined,
	fallback: ChartType
): ChartType => {
	if (value === undefined || value === true || value === false) {
		return fallback;
	}
	const normalized = value.trim().toLowerCase();
	if (normalized === "line" || normalized === "candlestick") {
		return normalized;
	}
	throw new Error(`--chart must be "line" or "candlestick", got "${value}"`);
};

const resolveLabels = (
	args: Record<string, ArgValue>,
	fallback: TimeframeLabel
): TimeframeLabel[] => {
	if (readFlag(args, "all", false)) {
		return [...TIMEFRAME_LABELS];
	}
	const requested = readString(args, "timeframe");
	if (requested === undefined) {
		return [fallback];
	}
	if (!isTimeframeLabel(requested)) {
		throw new InvalidTimeframeError(requested);
	}
	return [requested];
};

const resolveOutput = (args: Record<string, ArgValue>): OutputMode => {
	const modes: OutputMode[] = [];
	if (readFlag(args, "json", false)) modes.push("json");
	if (readFlag(args, "csv", false)) modes.push("csv");
	if (args.chart !== undefined && args.chart !== false) modes.push("chart");
	if (modes.length > 1) {
		throw new Error("Choose only one of --json, --csv and --chart");
	}
	return modes[0] ?? "text";
};

/**
 * Merge parsed arguments over the loaded config. Presets map display names
 * (e.g. "Bitcoin") to symbols; an unknown preset is an error.
 */
export const resolveCliOptions = (
	args: Record<string, ArgValue>,
	config: AnalyzerConfig,
	presets: Record<string, string>
): CliOptions => {
	const presetName = readString(args, "preset");
	let symbol = readString(args, "symbol") ?? config.defaultSymbol;
	if (presetName !== undefined) {
		const preset = presets[presetName];
		if (preset === undefined) {
			throw new Error(
				`Unknown preset "${presetName}"; available: ${Object.keys(presets).join(", ") || "none"}`
			);
		}
		symbol = preset;
	}

	const labels = resolveLabels(args, config.defaultTimeframe);
	const output = resolveOutput(args);
	if (labels.length > 1 && (output === "csv" || output === "chart")) {
		throw new Error(`--${output} needs a single timeframe; drop --all`);
	}

	return {
		symbol: symbol.toUpperCase(),
		labels,
		output,
		chart: {
			chartType: parseChartType(args.chart, config.chart.chartType),
			showMovingAverage: readFlag(args, "sma", config.chart.showMovingAverage),
			showVolume: readFlag(args, "volume", config.chart.showVolume),
		},
		exchange: readString(args, "exchange") ?? config.exchange,
	};
};
