export {
	interpret,
	classifyOscillator,
	formatPrice,
	formatSignedPercent,
} from "./interpret";
export { renderNarrative, INSUFFICIENT_DATA_TEXT } from "./narrative";
export type {
	InterpretationInput,
	InterpretationResult,
	InterpretationStatement,
	MovingAverageSignal,
	MovingAverageStatement,
	OscillatorSignal,
	OscillatorStatement,
	TrendSignal,
	TrendStatement,
} from "./types";
