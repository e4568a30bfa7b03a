/**
 * Request-scoped failures raised by the analysis stages.
 *
 * Every error carries a stable `code` so the pipeline can turn it into an
 * outcome without matching on messages.
 */

export type AnalysisErrorCode =
	| "INVALID_TIMEFRAME"
	| "NO_DATA"
	| "DIVISION_UNDEFINED";

export class AnalysisError extends Error {
	constructor(
		message: string,
		public readonly code: AnalysisErrorCode,
		public readonly context?: Record<string, unknown>
	) {
		super(message);
		this.name = "AnalysisError";
		Object.setPrototypeOf(this, AnalysisError.prototype);
	}
}

/**
 * Thrown when a lookback label is not part of the supported table.
 */
export class InvalidTimeframeError extends AnalysisError {
	constructor(public readonly label: string) {
		super(`Unknown timeframe label: "${label}"`, "INVALID_TIMEFRAME", {
			label,
		});
		this.name = "InvalidTimeframeError";
		Object.setPrototypeOf(this, InvalidTimeframeError.prototype);
	}
}

export class NoDataError extends AnalysisError {
	constructor(
		message = "No bars available for analysis",
		context?: Record<string, unknown>
	) {
		super(message, "NO_DATA", context);
		this.name = "NoDataError";
		Object.setPrototypeOf(this, NoDataError.prototype);
	}
}

/**
 * Thrown when the previous close is zero, so the session change percentage
 * has no value.
 */
export class DivisionUndefinedError extends AnalysisError {
	constructor(context?: Record<string, unknown>) {
		super(
			"Session change is undefined: previous close is 0",
			"DIVISION_UNDEFINED",
			context
		);
		this.name = "DivisionUndefinedError";
		Object.setPrototypeOf(this, DivisionUndefinedError.prototype);
	}
}

export const isAnalysisError = (value: unknown): value is AnalysisError =>
	value instanceof AnalysisError;
