import { assertPeriod } from "./sma";

export const RSI_MAX = 100;
export const RSI_NEUTRAL = 50;

/**
 * Relative strength index from simple rolling means of gains and losses.
 *
 * Position `i` is defined once `period` deltas are available (`i >= period`).
 * Zero average loss is handled explicitly: 100 when there were gains, 50 when
 * the window is flat.
 */
export function rsiSeries(
	values: readonly number[],
	period = 14
): (number | null)[] {
	assertPeriod(period, "RSI");

	const gains: number[] = [0];
	const losses: number[] = [0];
	for (let i = 1; i < values.length; i += 1) {
		const change = values[i] - values[i - 1];
		gains.push(Math.max(change, 0));
		losses.push(Math.max(-change, 0));
	}

	return values.map((_, index) => {
		if (index < period) {
			return null;
		}
		let gainSum = 0;
		let lossSum = 0;
		for (let i = index - period + 1; i <= index; i += 1) {
			gainSum += gains[i];
			lossSum += losses[i];
		}
		return rsiFromAverages(gainSum / period, lossSum / period);
	});
}

export function rsiFromAverages(avgGain: number, avgLoss: number): number {
	if (avgLoss === 0) {
		return avgGain > 0 ? RSI_MAX : RSI_NEUTRAL;
	}
	const relativeStrength = avgGain / avgLoss;
	return 100 - 100 / (1 + relativeStrength);
}
