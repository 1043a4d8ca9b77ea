export interface SwingBar {
	high: number;
	low: number;
}

export interface SwingLevels {
	highs: number[];
	lows: number[];
}

/**
 * Swing pivots: a bar whose high (low) is the extreme of the `radius` bars on
 * either side. Bars closer than `radius` to either end cannot qualify.
 */
export function swingLevels(bars: SwingBar[], radius = 2): SwingLevels {
	const highs: number[] = [];
	const lows: number[] = [];
	for (let i = radius; i < bars.length - radius; i += 1) {
		let isHigh = true;
		let isLow = true;
		for (let j = i - radius; j <= i + radius; j += 1) {
			if (j === i) {
				continue;
			}
			if (bars[j].high > bars[i].high) {
				isHigh = false;
			}
			if (bars[j].low < bars[i].low) {
				isLow = false;
			}
		}
		if (isHigh) {
			highs.push(bars[i].high);
		}
		if (isLow) {
			lows.push(bars[i].low);
		}
	}
	return { highs, lows };
}

/**
 * Nearest swing high at or above `reference` and nearest swing low at or
 * below it. Either side is null when no pivot qualifies.
 */
export function nearestLevels(
	levels: SwingLevels,
	reference: number
): { resistance: number | null; support: number | null } {
	const above = levels.highs.filter((level) => level >= reference);
	const below = levels.lows.filter((level) => level <= reference);
	return {
		resistance: above.length ? Math.min(...above) : null,
		support: below.length ? Math.max(...below) : null,
	};
}

/**
 * +1 when price makes a lower low over the lookback while the oscillator makes a
 * higher low (bullish), -1 for the bearish mirror, otherwise 0.
 */
export function divergence(
	closes: number[],
	oscillator: Array<number | null>,
	lookback: number
): number {
	const n = closes.length;
	if (lookback < 3 || n < lookback || oscillator.length !== n) {
		return 0;
	}
	const latestClose = closes[n - 1];
	const latestOsc = oscillator[n - 1];
	if (latestOsc === null) {
		return 0;
	}

	let minIndex = -1;
	let maxIndex = -1;
	for (let i = n - lookback; i < n - 1; i += 1) {
		if (minIndex < 0 || closes[i] < closes[minIndex]) {
			minIndex = i;
		}
		if (maxIndex < 0 || closes[i] > closes[maxIndex]) {
			maxIndex = i;
		}
	}

	const oscAtMin = oscillator[minIndex];
	const oscAtMax = oscillator[maxIndex];
	if (oscAtMin !== null && latestClose < closes[minIndex] && latestOsc > oscAtMin) {
		return 1;
	}
	if (oscAtMax !== null && latestClose > closes[maxIndex] && latestOsc < oscAtMax) {
		return -1;
	}
	return 0;
}
