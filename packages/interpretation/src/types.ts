import type {
	InterpretationThresholds,
	Polarity,
	Series,
} from "@trendlens/core";
import type { IndicatorSet } from "@trendlens/indicators";

export type TrendSignal = "bullish" | "bearish";
export type OscillatorSignal = "overbought" | "oversold" | "neutral";
export type MovingAverageSignal = "above" | "below";

interface StatementBase {
	readonly polarity: Polarity;
	readonly text: string;
}

export interface TrendStatement extends StatementBase {
	readonly kind: "trend";
	readonly signal: TrendSignal;
	readonly startPrice: number;
	readonly endPrice: number;
	/** First close to last close, in percent. */
	readonly changePercent: number;
}

export interface OscillatorStatement extends StatementBase {
	readonly kind: "oscillator";
	readonly signal: OscillatorSignal;
	readonly value: number;
}

export interface MovingAverageStatement extends StatementBase {
	readonly kind: "movingAverage";
	readonly signal: MovingAverageSignal;
	readonly price: number;
	readonly average: number;
	readonly period: number;
}

export type InterpretationStatement =
	| TrendStatement
	| OscillatorStatement
	| MovingAverageStatement;

export interface InterpretationResult {
	readonly statements: readonly InterpretationStatement[];
	/** Fewer than two bars: no trend can be stated. */
	readonly insufficientData: boolean;
}

export interface InterpretationInput {
	label: string;
	series: Series;
	indicators: IndicatorSet;
	thresholds?: Partial<InterpretationThresholds>;
	/** Window named in the moving-average text; defaults to `indicators.periods.sma`. */
	smaPeriod?: number;
}
