import { describe, expect, it } from "vitest";
import { INSUFFICIENT_DATA_TEXT, renderNarrative } from "./narrative";
import type { InterpretationResult } from "./types";

describe("renderNarrative", () => {
	it("joins statements with blank lines", () => {
		const result: InterpretationResult = {
			insufficientData: false,
			statements: [
				{
					kind: "trend",
					signal: "bullish",
					polarity: "bullish",
					startPrice: 1,
					endPrice: 2,
					changePercent: 100,
					text: "first",
				},
				{
					kind: "oscillator",
					signal: "neutral",
					polarity: "neutral",
					value: 50,
					text: "second",
				},
			],
		};
		expect(renderNarrative(result)).toBe("first\n\nsecond");
	});

	it("falls back when data is insufficient", () => {
		expect(renderNarrative({ statements: [], insufficientData: true })).toBe(
			INSUFFICIENT_DATA_TEXT
		);
		expect(INSUFFICIENT_DATA_TEXT).toBe(
			"Not enough data to generate an interpretation."
		);
	});
});
