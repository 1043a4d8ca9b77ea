import { emaSeries } from "./ema";

export interface MacdSeries {
	macd: Array<number | null>;
	signal: Array<number | null>;
	histogram: Array<number | null>;
}

export interface MacdResult {
	macd: number | null;
	signal: number | null;
	histogram: number | null;
}

export function macdSeries(
	closes: number[],
	fast: number,
	slow: number,
	signalLength: number
): MacdSeries {
	const empty = (): Array<number | null> => new Array(closes.length).fill(null);
	if (closes.length === 0 || slow <= 0 || fast <= 0 || signalLength <= 0) {
		return { macd: empty(), signal: empty(), histogram: empty() };
	}

	const fastSeries = emaSeries(closes, fast);
	const slowSeries = emaSeries(closes, slow);
	const macdLine = fastSeries.map((fastValue, index) => {
		const slowValue = slowSeries[index];
		return fastValue === null || slowValue === null ? null : fastValue - slowValue;
	});

	// The signal EMA runs over the defined part of the MACD line only.
	const firstDefined = macdLine.findIndex((value) => value !== null);
	const signal = empty();
	if (firstDefined >= 0) {
		const definedLine = macdLine.slice(firstDefined).map((value) => value ?? 0);
		emaSeries(definedLine, signalLength).forEach((value, offset) => {
			signal[firstDefined + offset] = value;
		});
	}

	const histogram = macdLine.map((value, index) => {
		const signalValue = signal[index];
		return value === null || signalValue === null ? null : value - signalValue;
	});

	return { macd: macdLine, signal, histogram };
}

export function macd(
	closes: number[],
	fast: number,
	slow: number,
	signalLength: number
): MacdResult {
	const series = macdSeries(closes, fast, slow, signalLength);
	const last = closes.length - 1;
	return {
		macd: series.macd[last] ?? null,
		signal: series.signal[last] ?? null,
		histogram: series.histogram[last] ?? null,
	};
}
