import { DEFAULT_THRESHOLDS } from "@trendlens/core";
import type { InterpretationThresholds, Polarity } from "@trendlens/core";
import { latestValue } from "@trendlens/indicators";
import type {
	InterpretationInput,
	InterpretationResult,
	InterpretationStatement,
	MovingAverageSignal,
	MovingAverageStatement,
	OscillatorSignal,
	OscillatorStatement,
	TrendStatement,
} from "./types";

const OSCILLATOR_POLARITY: Record<OscillatorSignal, Polarity> = {
	overbought: "bearish",
	oversold: "bullish",
	neutral: "neutral",
};

const MOVING_AVERAGE_POLARITY: Record<MovingAverageSignal, Polarity> = {
	above: "bullish",
	below: "bearish",
};

const MOVING_AVERAGE_RATIONALE: Record<MovingAverageSignal, string> = {
	above: "Trading above the average typically confirms a short-term uptrend.",
	below: "Trading below the average often indicates weakness.",
};

export const formatPrice = (value: number): string => value.toFixed(2);

/** Two decimals with an explicit sign; rounds that land on zero print `0.00`. */
export const formatSignedPercent = (value: number): string => {
	const fixed = value.toFixed(2);
	if (Number(fixed) === 0) {
		return "0.00%";
	}
	return value > 0 ? `+${fixed}%` : `${fixed}%`;
};

export const classifyOscillator = (
	value: number,
	thresholds: InterpretationThresholds = DEFAULT_THRESHOLDS
): OscillatorSignal => {
	if (value > thresholds.overbought) {
		return "overbought";
	}
	if (value < thresholds.oversold) {
		return "oversold";
	}
	return "neutral";
};

const trendStatement = (
	label: string,
	startPrice: number,
	endPrice: number
): TrendStatement => {
	const changePercent = ((endPrice - startPrice) / startPrice) * 100;
	const signal = changePercent > 0 ? "bullish" : "bearish";
	const direction =
		signal === "bullish" ? "Bullish (Upward)" : "Bearish (Downward)";
	return {
		kind: "trend",
		signal,
		polarity: signal,
		startPrice,
		endPrice,
		changePercent,
		text: `Over the last ${label}, the price is ${direction}, moving from ${formatPrice(
			startPrice
		)} to ${formatPrice(endPrice)} (${formatSignedPercent(changePercent)}).`,
	};
};

const oscillatorText = (
	value: number,
	signal: OscillatorSignal,
	thresholds: InterpretationThresholds
): string => {
	const prefix = `RSI (${Math.round(value)}):`;
	switch (signal) {
		case "overbought":
			return `${prefix} The price is currently Overbought (>${thresholds.overbought}). This suggests the price might be too high and could correct downwards soon.`;
		case "oversold":
			return `${prefix} The price is currently Oversold (<${thresholds.oversold}). This suggests the price might be undervalued and could bounce back.`;
		case "neutral":
			return `${prefix} The RSI is in the Neutral zone (${thresholds.oversold}-${thresholds.overbought}), indicating a stable trend.`;
	}
};

const oscillatorStatement = (
	value: number,
	thresholds: InterpretationThresholds
): OscillatorStatement => {
	const signal = classifyOscillator(value, thresholds);
	return {
		kind: "oscillator",
		signal,
		polarity: OSCILLATOR_POLARITY[signal],
		value,
		text: oscillatorText(value, signal, thresholds),
	};
};

const movingAverageStatement = (
	price: number,
	average: number,
	period: number
): MovingAverageStatement => {
	const signal: MovingAverageSignal = price > average ? "above" : "below";
	return {
		kind: "movingAverage",
		signal,
		polarity: MOVING_AVERAGE_POLARITY[signal],
		price,
		average,
		period,
		text: `Trend Signal (${period}-SMA): The price is trading ${signal} its ${period}-period average (${formatPrice(
			average
		)}). ${MOVING_AVERAGE_RATIONALE[signal]}`,
	};
};

/**
 * Turn the latest indicator readings into ordered statements: trend, then
 * oscillator, then moving average. A statement whose inputs are undefined is
 * left out.
 */
export const interpret = (input: InterpretationInput): InterpretationResult => {
	const { bars } = input.series;
	if (bars.length < 2) {
		return Object.freeze({ statements: [], insufficientData: true });
	}

	const thresholds = { ...DEFAULT_THRESHOLDS, ...input.thresholds };
	const smaPeriod = input.smaPeriod ?? input.indicators.periods.sma;
	const first = bars[0];
	const last = bars[bars.length - 1];

	const statements: InterpretationStatement[] = [
		trendStatement(input.label, first.close, last.close),
	];

	const rsi = latestValue(input.indicators.rsi14);
	if (rsi !== null) {
		statements.push(oscillatorStatement(rsi, thresholds));
	}

	const sma = latestValue(input.indicators.sma20);
	if (sma !== null) {
		statements.push(movingAverageStatement(last.close, sma, smaPeriod));
	}

	return Object.freeze({
		statements: Object.freeze(statements.map((s) => Object.freeze(s))),
		insufficientData: false,
	});
};
