import type { ExternalSignals, MarketFeatures, Regime, TradeSignal } from "@tradeloop/core";

export interface FilterContext {
	regime: Regime;
	features: MarketFeatures;
	external: ExternalSignals;
}

/** A pure step of the chain: returns the signal unchanged, adjusted or vetoed. */
export interface SignalFilter {
	readonly name: string;
	apply(signal: TradeSignal, context: FilterContext): TradeSignal;
}
