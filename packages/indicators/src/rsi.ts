/**
 * Wilder RSI aligned with `values`. Entries before index `period` are null.
 * A window with no losses reads 100, with no gains 0; a flat window reads 50.
 */
export function rsiSeries(values: number[], period = 14): Array<number | null> {
	if (period <= 0) {
		throw new Error("RSI period must be positive");
	}
	const series: Array<number | null> = new Array(values.length).fill(null);
	if (values.length <= period) {
		return series;
	}

	let gains = 0;
	let losses = 0;
	for (let i = 1; i <= period; i += 1) {
		const change = values[i] - values[i - 1];
		if (change >= 0) {
			gains += change;
		} else {
			losses -= change;
		}
	}

	let avgGain = gains / period;
	let avgLoss = losses / period;
	series[period] = toRsi(avgGain, avgLoss);

	for (let i = period + 1; i < values.length; i += 1) {
		const change = values[i] - values[i - 1];
		avgGain = (avgGain * (period - 1) + Math.max(change, 0)) / period;
		avgLoss = (avgLoss * (period - 1) + Math.max(-change, 0)) / period;
		series[i] = toRsi(avgGain, avgLoss);
	}

	return series;
}

const toRsi = (avgGain: number, avgLoss: number): number => {
	if (avgGain === 0 && avgLoss === 0) {
		return 50;
	}
	if (avgLoss === 0) {
		return 100;
	}
	return 100 - 100 / (1 + avgGain / avgLoss);
};

export function calculateRSI(values: number[], period = 14): number | null {
	return rsiSeries(values, period)[values.length - 1] ?? null;
}
