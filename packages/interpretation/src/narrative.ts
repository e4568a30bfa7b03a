import type { InterpretationResult } from "./types";

export const INSUFFICIENT_DATA_TEXT =
	"Not enough data to generate an interpretation.";

export const renderNarrative = (result: InterpretationResult): string =>
	result.insufficientData || !result.statements.length
		? INSUFFICIENT_DATA_TEXT
		: result.statements.map((statement) => statement.text).join("\n\n");
