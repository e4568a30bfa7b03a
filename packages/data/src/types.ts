import type { MarketDataClient, RawBar } from "@trendlens/core";
import type { ResolvedTimeframe } from "./timeframes";

export interface DataProviderLogger {
	debug?: (event: string, payload?: Record<string, unknown>) => void;
	info?: (event: string, payload?: Record<string, unknown>) => void;
	warn?: (event: string, payload?: Record<string, unknown>) => void;
	error?: (event: string, payload?: Record<string, unknown>) => void;
}

export type RawFetchResult =
	| {
			status: "ok";
			timeframe: ResolvedTimeframe;
			rows: RawBar[];
			currency: string | null;
	  }
	| {
			status: "failed";
			timeframe: ResolvedTimeframe;
			message: string;
	  };

export interface DataProvider {
	fetchRawBars(
		symbol: string,
		timeframe: ResolvedTimeframe
	): Promise<RawFetchResult>;
}

export interface DataProviderConfig {
	client: MarketDataClient;
	logger?: DataProviderLogger;
}
