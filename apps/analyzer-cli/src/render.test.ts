import { describe, expect, it } from "vitest";
import type { AnalysisOutcome } from "@trendlens/runtime";
import {
	DATA_UNAVAILABLE_TEXT,
	exitCodeFor,
	renderOutcomeText,
} from "./render";

const unavailable: AnalysisOutcome = {
	status: "unavailable",
	reason: "no_data",
	message: "No bars returned for X/Y (1 Day)",
};

const failed: AnalysisOutcome = {
	status: "failed",
	code: "DIVISION_UNDEFINED",
	message: "Session change is undefined: previous close is 0",
};

describe("renderOutcomeText", () => {
	it("prefixes non-bundle outcomes with their label", () => {
		expect(renderOutcomeText("1 Day", unavailable)).toBe(
			`1 Day: ${DATA_UNAVAILABLE_TEXT}`
		);
		expect(renderOutcomeText("1 Year", failed)).toBe(
			"1 Year: Session change is undefined: previous close is 0"
		);
	});
});

describe("exitCodeFor", () => {
	it("is 2 when nothing was available", () => {
		expect(exitCodeFor([unavailable, unavailable])).toBe(2);
	});

	it("is 1 when any request failed", () => {
		expect(exitCodeFor([unavailable, failed])).toBe(1);
	});
});
