/**
 * EMA seeded with the SMA of the first `length` values. The result is aligned
 * with `values`; entries before the seed are null.
 */
export function emaSeries(values: number[], length: number): Array<number | null> {
	const series: Array<number | null> = new Array(values.length).fill(null);
	if (length <= 0 || values.length < length) {
		return series;
	}

	const multiplier = 2 / (length + 1);
	let emaValue = average(values.slice(0, length));
	series[length - 1] = emaValue;

	for (let i = length; i < values.length; i += 1) {
		emaValue = (values[i] - emaValue) * multiplier + emaValue;
		series[i] = emaValue;
	}

	return series;
}

export function ema(values: number[], length: number): number | null {
	return lastValue(emaSeries(values, length));
}

export const average = (nums: number[]): number => {
	const sum = nums.reduce((acc, value) => acc + value, 0);
	return sum / nums.length;
};

export const lastValue = (series: Array<number | null>, offset = 0): number | null =>
	series[series.length - 1 - offset] ?? null;

/** Drops the leading nulls of an aligned series. */
export const defined = (series: Array<number | null>): number[] =>
	series.filter((value): value is number => value !== null);
