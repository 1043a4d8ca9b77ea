export interface PriceBar {
	high: number;
	low: number;
	close: number;
}

export const trueRanges = (bars: PriceBar[]): number[] => {
	const ranges: number[] = [];
	for (let i = 1; i < bars.length; i += 1) {
		const current = bars[i];
		const previousClose = bars[i - 1].close;
		ranges.push(
			Math.max(
				current.high - current.low,
				Math.abs(current.high - previousClose),
				Math.abs(current.low - previousClose)
			)
		);
	}
	return ranges;
};

/**
 * Wilder-smoothed ATR aligned with `bars`; the first value lands on index `period`.
 */
export function atrSeries(bars: PriceBar[], period = 14): Array<number | null> {
	const series: Array<number | null> = new Array(bars.length).fill(null);
	if (period <= 0 || bars.length < period + 1) {
		return series;
	}

	const ranges = trueRanges(bars);
	let atr = ranges.slice(0, period).reduce((acc, value) => acc + value, 0) / period;
	series[period] = atr;

	for (let i = period; i < ranges.length; i += 1) {
		atr = (atr * (period - 1) + ranges[i]) / period;
		series[i + 1] = atr;
	}

	return series;
}

export function calculateATR(bars: PriceBar[], period = 14): number | null {
	return atrSeries(bars, period)[bars.length - 1] ?? null;
}
