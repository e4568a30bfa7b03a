import {
	createLogger,
	isAnalysisError,
	loadAnalyzerConfig,
	loadSymbolPresets,
	stableStringify,
	TIMEFRAME_LABELS,
} from "@trendlens/core";
import type {
	AnalyzerConfig,
	MarketDataClient,
	TimeframeLabel,
} from "@trendlens/core";
import { DefaultDataProvider } from "@trendlens/data";
import type { DataProvider } from "@trendlens/data";
import { formatBarsCsv } from "@trendlens/metrics";
import {
	analyzeAllTimeframes,
	analyzeTimeframe,
	buildChartModel,
	serializeBundle,
} from "@trendlens/runtime";
import type {
	AnalysisBundle,
	AnalysisOptions,
	AnalysisOutcome,
} from "@trendlens/runtime";
import { parseCliArgs, readString, resolveCliOptions } from "./cliArgs";
import type { CliOptions } from "./cliArgs";
import {
	DATA_UNAVAILABLE_TEXT,
	EXIT_FAILED,
	EXIT_OK,
	exitCodeFor,
	renderOutcomeText,
} from "./render";

const cliLogger = createLogger("cli");

export const USAGE = `Usage:
  trendlens --symbol <symbol> [options]

Options (all optional):
  --symbol <symbol>        Unified market symbol, e.g. BTC/USDT (defaults to config)
  --preset <name>          Symbol preset from config/symbols.json
  --timeframe <label>      One of: ${TIMEFRAME_LABELS.join(", ")}
  --all                    Analyze every timeframe in parallel
  --json                   Print the analysis bundle as JSON
  --csv                    Print bars and indicators as CSV
  --chart [line|candlestick]
                           Print the chart model as JSON
  --no-sma                 Leave the moving average out of the chart
  --no-volume              Leave the volume pane out of the chart
  --exchange <id>          ccxt exchange id (defaults to config)
  --envPath <path>         Custom .env path
  --configDir <path>       Custom config directory
  --help                   Show this message
`;

export interface CliIo {
	stdout: (text: string) => void;
	stderr: (text: string) => void;
	createClient: (exchangeId: string) => MarketDataClient;
}

type LabeledOutcome = readonly [TimeframeLabel, AnalysisOutcome];

const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

const runAnalyses = async (
	provider: DataProvider,
	options: CliOptions,
	analysisOptions: AnalysisOptions
): Promise<LabeledOutcome[]> => {
	if (options.labels.length > 1) {
		const outcomes = await analyzeAllTimeframes(
			provider,
			options.symbol,
			analysisOptions
		);
		return [...outcomes.entries()];
	}
	return Promise.all(
		options.labels.map(
			async (label) =>
				[
					label,
					await analyzeTimeframe(
						provider,
						{ symbol: options.symbol, label },
						analysisOptions
					),
				] as const
		)
	);
};

const renderSingleBundle = (
	bundle: AnalysisBundle,
	options: CliOptions
): string => {
	switch (options.output) {
		case "json":
			return serializeBundle(bundle);
		case "csv":
			return formatBarsCsv(
				{ resolution: bundle.resolution, bars: bundle.bars },
				bundle.indicators
			);
		case "chart":
			return stableStringify(buildChartModel(bundle, options.chart));
		case "text":
			return renderOutcomeText(bundle.label, { status: "ok", bundle });
	}
};

const writeOutcomes = (
	outcomes: LabeledOutcome[],
	options: CliOptions,
	io: CliIo
): void => {
	if (options.output === "json" && outcomes.length > 1) {
		io.stdout(
			stableStringify(
				outcomes.map(([label, outcome]) => ({ label, ...outcome }))
			)
		);
		return;
	}
	if (options.output === "text" && outcomes.length > 1) {
		io.stdout(
			outcomes
				.map(([label, outcome]) => renderOutcomeText(label, outcome))
				.join("\n\n---\n\n")
		);
		return;
	}
	for (const [, outcome] of outcomes) {
		switch (outcome.status) {
			case "ok":
				io.stdout(renderSingleBundle(outcome.bundle, options));
				break;
			case "unavailable":
				io.stderr(DATA_UNAVAILABLE_TEXT);
				break;
			case "failed":
				io.stderr(outcome.message);
				break;
		}
	}
};

/**
 * Parse arguments, load config, analyze and print. Resolves to the process
 * exit code.
 */
export const runCli = async (argv: string[], io: CliIo): Promise<number> => {
	const args = parseCliArgs(argv);
	if (args.help) {
		io.stdout(USAGE);
		return EXIT_OK;
	}

	let config: AnalyzerConfig;
	let options: CliOptions;
	let client: MarketDataClient;
	try {
		const configDir = readString(args, "configDir");
		config = loadAnalyzerConfig({
			envPath: readString(args, "envPath"),
			configDir,
		});
		options = resolveCliOptions(args, config, loadSymbolPresets(configDir));
		client = io.createClient(options.exchange);
	} catch (error) {
		io.stderr(describeError(error));
		if (isAnalysisError(error) && error.code === "INVALID_TIMEFRAME") {
			io.stderr(`Available timeframes: ${TIMEFRAME_LABELS.join(", ")}`);
		}
		return EXIT_FAILED;
	}

	cliLogger.debug("cli_options_resolved", {
		symbol: options.symbol,
		labels: options.labels,
		output: options.output,
		exchange: options.exchange,
	});

	const provider = new DefaultDataProvider({ client });
	const outcomes = await runAnalyses(provider, options, {
		indicators: config.indicators,
		thresholds: config.thresholds,
	});
	writeOutcomes(outcomes, options, io);
	return exitCodeFor(outcomes.map(([, outcome]) => outcome));
};
