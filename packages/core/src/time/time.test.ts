import { describe, it, expect } from "vitest";
import { startOfUtcDay, timeframeToMs } from "./time";

describe("time utilities", () => {
	describe("timeframeToMs", () => {
		it("should parse minute timeframes", () => {
			expect(timeframeToMs("1m")).toBe(60_000);
			expect(timeframeToMs("5m")).toBe(300_000);
			expect(timeframeToMs("15m")).toBe(900_000);
		});

		it("should parse hour and day timeframes", () => {
			expect(timeframeToMs("1h")).toBe(3_600_000);
			expect(timeframeToMs("4h")).toBe(14_400_000);
			expect(timeframeToMs("1d")).toBe(86_400_000);
		});

		it("should be case-insensitive and trim whitespace", () => {
			expect(timeframeToMs("1D")).toBe(86_400_000);
			expect(timeframeToMs(" 5m ")).toBe(300_000);
		});

		it("should throw on invalid format", () => {
			expect(() => timeframeToMs("")).toThrow();
			expect(() => timeframeToMs("5")).toThrow("Invalid timeframe format");
			expect(() => timeframeToMs("1w")).toThrow("Invalid timeframe format");
		});

		it("should throw on zero periods", () => {
			expect(() => timeframeToMs("0m")).toThrow(
				"period must be positive"
			);
		});
	});

	describe("startOfUtcDay", () => {
		it("should floor to midnight UTC", () => {
			expect(startOfUtcDay(Date.UTC(2025, 0, 2, 15, 30, 12))).toBe(
				Date.UTC(2025, 0, 2)
			);
		});

		it("should leave midnight unchanged", () => {
			expect(startOfUtcDay(Date.UTC(2025, 5, 1))).toBe(Date.UTC(2025, 5, 1));
		});

		it("should reject non-finite input", () => {
			expect(() => startOfUtcDay(Number.NaN)).toThrow("Invalid timestamp");
		});
	});
});
