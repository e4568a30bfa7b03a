export {
	analyzeBars,
	analyzeTimeframe,
	analyzeAllTimeframes,
	outcomeFromError,
} from "./pipeline";
export { serializeBundle } from "./serialize";
export { buildChartModel } from "./chart";
export type {
	CandlestickPoint,
	ChartModel,
	LinePoint,
	OverlayLine,
	PricePlot,
	VolumeBar,
	VolumeDirection,
} from "./chart";
export type {
	AnalysisBundle,
	AnalysisOptions,
	AnalysisOutcome,
	AnalysisRequest,
	FailureCode,
} from "./analysisTypes";
