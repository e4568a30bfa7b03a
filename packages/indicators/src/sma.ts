/**
 * Simple moving average aligned with `values`: `null` until `period` values
 * are available, then the mean of the trailing window.
 *
 * The mean is taken relative to the window's first value, so a window of
 * identical values yields exactly that value.
 */
export function smaSeries(
	values: readonly number[],
	period: number
): (number | null)[] {
	assertPeriod(period, "SMA");
	return values.map((_, index) => {
		if (index < period - 1) {
			return null;
		}
		const start = index - period + 1;
		const anchor = values[start];
		let offset = 0;
		for (let i = start; i <= index; i += 1) {
			offset += values[i] - anchor;
		}
		return anchor + offset / period;
	});
}

export function assertPeriod(period: number, name: string): void {
	if (!Number.isInteger(period) || period <= 0) {
		throw new Error(
			`${name} period must be a positive integer, got ${period}`
		);
	}
}
