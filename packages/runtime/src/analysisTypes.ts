import type {
	AnalysisErrorCode,
	Bar,
	IndicatorSettings,
	InterpretationThresholds,
	Resolution,
	TimeframeLabel,
} from "@trendlens/core";
import type { DataProviderLogger } from "@trendlens/data";
import type { IndicatorSet } from "@trendlens/indicators";
import type { InterpretationResult } from "@trendlens/interpretation";
import type { SummaryMetrics } from "@trendlens/metrics";

export interface AnalysisRequest {
	symbol: string;
	/** One of the timeframe labels; anything else fails with INVALID_TIMEFRAME. */
	label: string;
	currency?: string | null;
}

export interface AnalysisOptions {
	indicators?: Partial<IndicatorSettings>;
	thresholds?: Partial<InterpretationThresholds>;
	logger?: DataProviderLogger;
}

/**
 * Everything produced for one (symbol, timeframe) request. Holds nothing
 * that depends on the wall clock, so equal inputs serialize identically.
 */
export interface AnalysisBundle {
	readonly symbol: string;
	readonly label: TimeframeLabel;
	readonly resolution: Resolution;
	readonly currency: string | null;
	readonly bars: readonly Bar[];
	readonly indicators: IndicatorSet;
	readonly metrics: SummaryMetrics;
	readonly interpretation: InterpretationResult;
}

export type FailureCode = Exclude<AnalysisErrorCode, "NO_DATA">;

export type AnalysisOutcome =
	| { status: "ok"; bundle: AnalysisBundle }
	| { status: "unavailable"; reason: "no_data"; message: string }
	| { status: "failed"; code: FailureCode; message: string };
