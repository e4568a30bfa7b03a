import type { InstrumentInfo, LookbackSpan, RawBar, Resolution } from "../types";

/**
 * Market data client interface for fetching raw bars for one instrument.
 *
 * Implementations own retries, rate limits and timeouts. The analysis
 * pipeline treats any rejection as "no usable data".
 */
export interface MarketDataClient {
	/**
	 * Fetch raw bars covering `lookback` at the given sampling resolution.
	 * @param symbol - Instrument symbol (e.g., "BTC/USDT")
	 * @returns Raw provider rows, in any order, possibly empty
	 */
	fetchBars(
		symbol: string,
		lookback: LookbackSpan,
		resolution: Resolution
	): Promise<RawBar[]>;

	/**
	 * Optional static instrument metadata (quote currency).
	 */
	describeInstrument?(symbol: string): Promise<InstrumentInfo | null>;
}
