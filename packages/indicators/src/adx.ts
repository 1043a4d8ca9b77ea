import type { PriceBar } from "./atr";

export interface AdxSeries {
	adx: Array<number | null>;
	plusDi: Array<number | null>;
	minusDi: Array<number | null>;
}

/**
 * Wilder ADX with its directional indicators, aligned with `bars`.
 * DI values start at index `period`, ADX at index `2 * period - 1`.
 */
export function adxSeries(bars: PriceBar[], period = 14): AdxSeries {
	const empty = (): Array<number | null> => new Array(bars.length).fill(null);
	const result: AdxSeries = { adx: empty(), plusDi: empty(), minusDi: empty() };
	if (period <= 0 || bars.length < 2 * period) {
		return result;
	}

	const plusDm: number[] = [0];
	const minusDm: number[] = [0];
	const tr: number[] = [0];
	for (let i = 1; i < bars.length; i += 1) {
		const upMove = bars[i].high - bars[i - 1].high;
		const downMove = bars[i - 1].low - bars[i].low;
		plusDm.push(upMove > downMove && upMove > 0 ? upMove : 0);
		minusDm.push(downMove > upMove && downMove > 0 ? downMove : 0);
		const previousClose = bars[i - 1].close;
		tr.push(
			Math.max(
				bars[i].high - bars[i].low,
				Math.abs(bars[i].high - previousClose),
				Math.abs(bars[i].low - previousClose)
			)
		);
	}

	let smoothedTr = 0;
	let smoothedPlus = 0;
	let smoothedMinus = 0;
	for (let i = 1; i <= period; i += 1) {
		smoothedTr += tr[i];
		smoothedPlus += plusDm[i];
		smoothedMinus += minusDm[i];
	}

	const dx: number[] = [];
	let adxValue: number | null = null;
	for (let i = period; i < bars.length; i += 1) {
		if (i > period) {
			smoothedTr = smoothedTr - smoothedTr / period + tr[i];
			smoothedPlus = smoothedPlus - smoothedPlus / period + plusDm[i];
			smoothedMinus = smoothedMinus - smoothedMinus / period + minusDm[i];
		}
		const plus = smoothedTr === 0 ? 0 : (100 * smoothedPlus) / smoothedTr;
		const minus = smoothedTr === 0 ? 0 : (100 * smoothedMinus) / smoothedTr;
		result.plusDi[i] = plus;
		result.minusDi[i] = minus;
		const diSum = plus + minus;
		const dxValue = diSum === 0 ? 0 : (100 * Math.abs(plus - minus)) / diSum;
		dx.push(dxValue);

		if (dx.length === period) {
			adxValue = dx.reduce((acc, value) => acc + value, 0) / period;
		} else if (adxValue !== null) {
			adxValue = (adxValue * (period - 1) + dxValue) / period;
		}
		if (adxValue !== null) {
			result.adx[i] = adxValue;
		}
	}

	return result;
}
