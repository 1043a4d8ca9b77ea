import { sma, standardDeviation } from "./sma";

export interface BollingerBands {
	upper: number;
	middle: number;
	lower: number;
	/** (upper - lower) / middle */
	bandwidth: number;
}

export function bollinger(
	values: number[],
	period = 20,
	stdDevMultiplier = 2
): BollingerBands | null {
	const middle = sma(values, period);
	if (middle === null) {
		return null;
	}
	const deviation = standardDeviation(values.slice(values.length - period));
	const upper = middle + stdDevMultiplier * deviation;
	const lower = middle - stdDevMultiplier * deviation;
	return {
		upper,
		middle,
		lower,
		bandwidth: middle === 0 ? 0 : (upper - lower) / Math.abs(middle),
	};
}
