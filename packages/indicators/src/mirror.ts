import type { FeatureVector } from "@tradeloop/core";
import { FEATURES, type FeatureName } from "./features";

const PRICE_FEATURES: FeatureName[] = [
	FEATURES.open,
	FEATURES.close,
	FEATURES.closePrev,
	FEATURES.emaFast,
	FEATURES.emaSlow,
	FEATURES.emaTrend,
	FEATURES.emaFastPrev,
	FEATURES.emaSlowPrev,
	FEATURES.bbMiddle,
];

const SIGNED_FEATURES: FeatureName[] = [
	FEATURES.macd,
	FEATURES.macdSignal,
	FEATURES.macdHist,
	FEATURES.macdHistPrev,
	FEATURES.obv,
	FEATURES.obvEma,
	FEATURES.divergence,
];

const OSCILLATOR_FEATURES: FeatureName[] = [FEATURES.rsi, FEATURES.rsiPrev];

/** Pairs whose roles swap when price is reflected. */
const SWAPPED_PRICE_FEATURES: Array<[FeatureName, FeatureName]> = [
	[FEATURES.high, FEATURES.low],
	[FEATURES.bbUpper, FEATURES.bbLower],
	[FEATURES.resistance, FEATURES.support],
];

/**
 * The vector the same indicators would produce on the price series reflected
 * around `pivot`: prices become `2 * pivot - x`, RSI becomes `100 - rsi`,
 * signed momentum flips sign and the directional indicators trade places.
 * Volatility, ADX and volume are unchanged.
 */
export function mirrorFeatureVector(vector: FeatureVector, pivot: number): FeatureVector {
	const source = vector.values;
	const values: Record<string, number> = { ...source };
	const reflect = (value: number): number => 2 * pivot - value;

	for (const name of PRICE_FEATURES) {
		if (name in source) {
			values[name] = reflect(source[name]);
		}
	}
	for (const name of SIGNED_FEATURES) {
		if (name in source) {
			values[name] = source[name] === 0 ? 0 : -source[name];
		}
	}
	for (const name of OSCILLATOR_FEATURES) {
		if (name in source) {
			values[name] = 100 - source[name];
		}
	}
	for (const [a, b] of SWAPPED_PRICE_FEATURES) {
		delete values[a];
		delete values[b];
		if (b in source) {
			values[a] = reflect(source[b]);
		}
		if (a in source) {
			values[b] = reflect(source[a]);
		}
	}
	if (FEATURES.plusDi in source && FEATURES.minusDi in source) {
		values[FEATURES.plusDi] = source[FEATURES.minusDi];
		values[FEATURES.minusDi] = source[FEATURES.plusDi];
	}
	if (FEATURES.bbBandwidth in source && values[FEATURES.bbMiddle] !== 0) {
		values[FEATURES.bbBandwidth] =
			(values[FEATURES.bbUpper] - values[FEATURES.bbLower]) /
			Math.abs(values[FEATURES.bbMiddle]);
	}

	return { ...vector, values };
}
