import { DivisionUndefinedError, NoDataError } from "@trendlens/core";
import type { Series } from "@trendlens/core";

export interface SummaryMetrics {
	readonly latestPrice: number;
	readonly previousClose: number;
	readonly periodHigh: number;
	readonly periodLow: number;
	readonly sessionChangeAbsolute: number;
	readonly sessionChangePercent: number;
}

/**
 * Headline figures for a series. The session change compares the latest
 * close with the close before it, or with the open when there is only one
 * bar.
 *
 * @throws NoDataError for an empty series
 * @throws DivisionUndefinedError when the previous close is 0
 */
export const summarizeSeries = (series: Series): SummaryMetrics => {
	const { bars } = series;
	if (!bars.length) {
		throw new NoDataError("Cannot summarize an empty series");
	}

	const latest = bars[bars.length - 1];
	const previousClose =
		bars.length > 1 ? bars[bars.length - 2].close : latest.open;
	if (previousClose === 0) {
		throw new DivisionUndefinedError({ timestamp: latest.timestamp });
	}

	let periodHigh = -Infinity;
	let periodLow = Infinity;
	for (const bar of bars) {
		periodHigh = Math.max(periodHigh, bar.high);
		periodLow = Math.min(periodLow, bar.low);
	}

	const sessionChangeAbsolute = latest.close - previousClose;
	return Object.freeze({
		latestPrice: latest.close,
		previousClose,
		periodHigh,
		periodLow,
		sessionChangeAbsolute,
		sessionChangePercent: (sessionChangeAbsolute / previousClose) * 100,
	});
};
