import type { FilterConfig, TradeSignal } from "@tradeloop/core";
import {
	choppinessFilter,
	derivativesFilter,
	fundingFilter,
	multiTimeframeFilter,
	orderBookFilter,
	sentimentFilter,
	weakTrendFilter,
} from "./filters";
import type { FilterContext, SignalFilter } from "./types";

export interface FilterStep {
	filter: string;
	confidence: number;
	vetoed: boolean;
}

export interface FilterChainResult {
	signal: TradeSignal;
	steps: FilterStep[];
	/** Name of the filter that forced NONE, if any. */
	vetoedBy: string | null;
}

/** Regime confirmation first, then positioning and sentiment. */
export const createFilterChain = (config: FilterConfig): SignalFilter[] => [
	weakTrendFilter(config),
	multiTimeframeFilter(config),
	choppinessFilter(config),
	fundingFilter(config),
	orderBookFilter(config),
	sentimentFilter(config),
	derivativesFilter(config),
];

export function runFilterChain(
	filters: readonly SignalFilter[],
	signal: TradeSignal,
	context: FilterContext
): FilterChainResult {
	const steps: FilterStep[] = [];
	let current = signal;
	for (const filter of filters) {
		if (current.direction === "NONE") {
			break;
		}
		const next = filter.apply(current, context);
		const vetoed = next.direction === "NONE";
		steps.push({ filter: filter.name, confidence: next.confidence, vetoed });
		current = next;
		if (vetoed) {
			return { signal: current, steps, vetoedBy: filter.name };
		}
	}
	return { signal: current, steps, vetoedBy: null };
}
