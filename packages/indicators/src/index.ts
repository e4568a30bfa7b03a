export { smaSeries } from "./sma";
export { rsiSeries, rsiFromAverages, RSI_MAX, RSI_NEUTRAL } from "./rsi";
export { computeIndicators, latestValue, valueAt } from "./engine";
export type {
	IndicatorPeriods,
	IndicatorPoint,
	IndicatorSeries,
	IndicatorSet,
} from "./engine";
