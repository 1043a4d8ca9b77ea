import type { FeatureVector, MarketFeatures, Regime, RegimeConfig } from "@tradeloop/core";
import { isTrendingRegime } from "@tradeloop/core";

export interface RegimeReading {
	regime: Regime;
	previous: Regime;
	changed: boolean;
	reason: string;
	/** Consecutive disqualifying bars seen while a trend regime is held. */
	disqualifyingBars: number;
}

interface SymbolRegimeState {
	regime: Regime;
	disqualifying: number;
}

const INITIAL_REGIME: Regime = "RANGING";

/** ADX of the first ready higher timeframe, in configured order. */
export const higherTimeframeAdx = (higher: Readonly<Record<string, FeatureVector>>): number | null => {
	for (const vector of Object.values(higher)) {
		const adx = vector.values.adx;
		if (vector.ready && Number.isFinite(adx)) {
			return adx;
		}
	}
	return null;
};

/**
 * Maps the primary feature vector plus higher-timeframe trend strength to a
 * regime. Leaving a trend regime needs `hysteresisBars` consecutive
 * disqualifying bars; any trending bar resets the count.
 */
export class RegimeClassifier {
	private readonly states = new Map<string, SymbolRegimeState>();

	constructor(private readonly config: RegimeConfig) {}

	current(symbol: string): Regime {
		return this.states.get(symbol)?.regime ?? INITIAL_REGIME;
	}

	reset(symbol?: string): void {
		if (symbol === undefined) {
			this.states.clear();
		} else {
			this.states.delete(symbol);
		}
	}

	classify(features: MarketFeatures): RegimeReading {
		const { primary } = features;
		const state = this.states.get(primary.symbol) ?? {
			regime: INITIAL_REGIME,
			disqualifying: 0,
		};
		const previous = state.regime;
		const reading = (regime: Regime, reason: string, disqualifying: number): RegimeReading => {
			this.states.set(primary.symbol, { regime, disqualifying });
			return {
				regime,
				previous,
				changed: regime !== previous,
				reason,
				disqualifyingBars: disqualifying,
			};
		};

		if (!primary.ready) {
			return {
				regime: previous,
				previous,
				changed: false,
				reason: "insufficient_data",
				disqualifyingBars: state.disqualifying,
			};
		}

		const { adx, atr, atr_sma: atrSma, bb_bandwidth: bandwidth } = primary.values;
		if (atrSma > 0 && atr > this.config.volatileAtrMultiple * atrSma) {
			return reading("VOLATILE", "atr_expansion", 0);
		}

		if (adx >= this.config.trendingAdx) {
			const higherAdx = higherTimeframeAdx(features.higher);
			if (higherAdx === null) {
				return reading("TRENDING_WEAK", "no_higher_timeframe", 0);
			}
			if (higherAdx >= this.config.trendingAdx) {
				return reading("TRENDING_STRONG", "adx_confirmed", 0);
			}
			if (higherAdx >= this.config.weakTrendAdx) {
				return reading("TRENDING_WEAK", "adx_weak_confirmation", 0);
			}
		}

		const squeeze =
			this.config.squeezeEnabled &&
			bandwidth < this.config.squeezeMaxBandwidth &&
			adx < this.config.rangingAdx;
		const candidate: Regime = squeeze ? "SQUEEZE" : "RANGING";

		if (!isTrendingRegime(previous)) {
			return reading(candidate, squeeze ? "bandwidth_squeeze" : "no_trend", 0);
		}

		const disqualifying = state.disqualifying + 1;
		if (disqualifying >= this.config.hysteresisBars) {
			return reading(candidate, "trend_lost", 0);
		}
		return reading(previous, "hysteresis_hold", disqualifying);
	}
}
