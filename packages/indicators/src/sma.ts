import { average } from "./ema";

export function smaSeries(values: number[], period: number): Array<number | null> {
	const series: Array<number | null> = new Array(values.length).fill(null);
	if (period <= 0 || values.length < period) {
		return series;
	}
	let sum = values.slice(0, period).reduce((acc, value) => acc + value, 0);
	series[period - 1] = sum / period;
	for (let i = period; i < values.length; i += 1) {
		sum += values[i] - values[i - period];
		series[i] = sum / period;
	}
	return series;
}

export function sma(values: number[], period: number): number | null {
	if (period <= 0 || values.length < period) {
		return null;
	}
	return average(values.slice(values.length - period));
}

export function standardDeviation(values: number[]): number {
	if (!values.length) {
		return 0;
	}
	const mean = average(values);
	const variance = average(values.map((value) => (value - mean) ** 2));
	return Math.sqrt(variance);
}
