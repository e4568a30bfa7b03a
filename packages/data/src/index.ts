export * from "./types";
export { DefaultDataProvider } from "./provider";
export {
	resolveTimeframe,
	listTimeframes,
	TIMEFRAME_LABELS,
	isTimeframeLabel,
} from "./timeframes";
export type { ResolvedTimeframe } from "./timeframes";
export { lookbackStart } from "./lookback";
export { normalizeBars } from "./normalize";
export type {
	NormalizationResult,
	RejectedBar,
	RejectionReason,
} from "./normalize";
