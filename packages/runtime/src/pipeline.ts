import {
	createLogger,
	isAnalysisError,
	NoDataError,
	TIMEFRAME_LABELS,
} from "@trendlens/core";
import type { RawBar, TimeframeLabel } from "@trendlens/core";
import { normalizeBars, resolveTimeframe } from "@trendlens/data";
import type {
	DataProvider,
	DataProviderLogger,
	ResolvedTimeframe,
} from "@trendlens/data";
import { computeIndicators } from "@trendlens/indicators";
import { interpret } from "@trendlens/interpretation";
import { summarizeSeries } from "@trendlens/metrics";
import type {
	AnalysisBundle,
	AnalysisOptions,
	AnalysisOutcome,
	AnalysisRequest,
} from "./analysisTypes";

const runtimeLogger = createLogger("runtime");

/**
 * Map a request-scoped error to its outcome. Anything outside the analysis
 * error taxonomy is rethrown.
 */
export const outcomeFromError = (error: unknown): AnalysisOutcome => {
	if (!isAnalysisError(error)) {
		throw error;
	}
	const { code, message } = error;
	if (code === "NO_DATA") {
		return { status: "unavailable", reason: "no_data", message };
	}
	return { status: "failed", code, message };
};

const runStages = (
	rawBars: readonly RawBar[],
	timeframe: ResolvedTimeframe,
	request: AnalysisRequest,
	options: AnalysisOptions,
	logger: DataProviderLogger
): AnalysisBundle => {
	const { symbol } = request;
	const normalized = normalizeBars(rawBars, timeframe.resolution);
	logger.info?.("series_normalized", {
		symbol,
		label: timeframe.label,
		resolution: timeframe.resolution,
		accepted: normalized.status === "ok" ? normalized.series.bars.length : 0,
		rejected: normalized.rejected.length,
	});

	if (normalized.status === "empty") {
		throw new NoDataError(
			normalized.reason === "no_bars"
				? `No bars returned for ${symbol} (${timeframe.label})`
				: `All ${normalized.rejected.length} bars for ${symbol} (${timeframe.label}) were rejected`,
			{ symbol, label: timeframe.label, reason: normalized.reason }
		);
	}

	const { series } = normalized;
	const indicators = computeIndicators(series, options.indicators);
	const metrics = summarizeSeries(series);
	const interpretation = interpret({
		label: timeframe.label,
		series,
		indicators,
		thresholds: options.thresholds,
	});

	const bundle: AnalysisBundle = Object.freeze({
		symbol,
		label: timeframe.label,
		resolution: series.resolution,
		currency: request.currency ?? null,
		bars: series.bars,
		indicators,
		metrics,
		interpretation,
	});

	logger.info?.("analysis_completed", {
		symbol,
		label: timeframe.label,
		bars: series.bars.length,
		latestPrice: metrics.latestPrice,
		sessionChangePercent: metrics.sessionChangePercent,
		statements: interpretation.statements.map(
			(statement) => `${statement.kind}:${statement.polarity}`
		),
	});

	return bundle;
};

/**
 * Run every stage over bars that are already in hand. Synchronous and free
 * of I/O.
 */
export const analyzeBars = (
	rawBars: readonly RawBar[],
	request: AnalysisRequest,
	options: AnalysisOptions = {}
): AnalysisOutcome => {
	const logger = options.logger ?? runtimeLogger;
	try {
		const timeframe = resolveTimeframe(request.label);
		return {
			status: "ok",
			bundle: runStages(rawBars, timeframe, request, options, logger),
		};
	} catch (error) {
		return outcomeFromError(error);
	}
};

/**
 * Fetch bars for one label through the provider, then analyze them. A
 * provider failure of any kind counts as "no data".
 */
export const analyzeTimeframe = async (
	provider: DataProvider,
	request: AnalysisRequest,
	options: AnalysisOptions = {}
): Promise<AnalysisOutcome> => {
	let timeframe: ResolvedTimeframe;
	try {
		timeframe = resolveTimeframe(request.label);
	} catch (error) {
		return outcomeFromError(error);
	}

	const fetched = await provider.fetchRawBars(request.symbol, timeframe);
	if (fetched.status === "failed") {
		return { status: "unavailable", reason: "no_data", message: fetched.message };
	}

	return analyzeBars(
		fetched.rows,
		{ ...request, currency: request.currency ?? fetched.currency },
		options
	);
};

/**
 * One independent pipeline per timeframe label, run concurrently. The map
 * iterates in table order.
 */
export const analyzeAllTimeframes = async (
	provider: DataProvider,
	symbol: string,
	options: AnalysisOptions = {}
): Promise<Map<TimeframeLabel, AnalysisOutcome>> => {
	const outcomes = await Promise.all(
		TIMEFRAME_LABELS.map(
			async (label) =>
				[label, await analyzeTimeframe(provider, { symbol, label }, options)] as const
		)
	);
	return new Map(outcomes);
};
