import { DEFAULT_INDICATOR_SETTINGS } from "@trendlens/core";
import type { IndicatorSettings, Series } from "@trendlens/core";
import { rsiSeries } from "./rsi";
import { assertPeriod, smaSeries } from "./sma";

export interface IndicatorPoint {
	readonly timestamp: number;
	/** `null` while the indicator window is not yet filled. */
	readonly value: number | null;
}

export type IndicatorSeries = readonly IndicatorPoint[];

export interface IndicatorPeriods {
	readonly sma: number;
	readonly rsi: number;
}

/**
 * `sma20` and `rsi14` are fixed slot names for the moving average and the
 * oscillator; `periods` records the windows that actually filled them.
 */
export interface IndicatorSet {
	readonly sma20: IndicatorSeries;
	readonly rsi14: IndicatorSeries;
	readonly periods: IndicatorPeriods;
}

const EMPTY_SERIES: IndicatorSeries = Object.freeze([]);

const alignToSeries = (
	series: Series,
	values: readonly (number | null)[]
): IndicatorSeries =>
	Object.freeze(
		series.bars.map((bar, index) =>
			Object.freeze({ timestamp: bar.timestamp, value: values[index] ?? null })
		)
	);

/**
 * Moving average and RSI over the series closes. Below `minBars` neither is
 * attempted and both come back empty.
 */
export const computeIndicators = (
	series: Series,
	settings: Partial<IndicatorSettings> = {}
): IndicatorSet => {
	const { smaPeriod, rsiPeriod, minBars } = {
		...DEFAULT_INDICATOR_SETTINGS,
		...settings,
	};
	assertPeriod(smaPeriod, "SMA");
	assertPeriod(rsiPeriod, "RSI");
	const periods = Object.freeze({ sma: smaPeriod, rsi: rsiPeriod });

	if (series.bars.length < minBars) {
		return { sma20: EMPTY_SERIES, rsi14: EMPTY_SERIES, periods };
	}

	const closes = series.bars.map((bar) => bar.close);
	return {
		sma20: alignToSeries(series, smaSeries(closes, smaPeriod)),
		rsi14: alignToSeries(series, rsiSeries(closes, rsiPeriod)),
		periods,
	};
};

export const latestValue = (indicator: IndicatorSeries): number | null =>
	indicator.length ? indicator[indicator.length - 1].value : null;

export const valueAt = (
	indicator: IndicatorSeries,
	timestamp: number
): number | null =>
	indicator.find((point) => point.timestamp === timestamp)?.value ?? null;
