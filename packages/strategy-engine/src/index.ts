export { DirectionalStrategy, ScoreCard, SidedView } from "./strategies/Strategy";
export type { SideScore, Strategy } from "./strategies/Strategy";
export { TrendFollowingStrategy } from "./strategies/TrendFollowingStrategy";
export { MeanReversionStrategy } from "./strategies/MeanReversionStrategy";
export { BreakoutStrategy } from "./strategies/BreakoutStrategy";
export { REGIME_STRATEGY, StrategySet } from "./strategySet";
export { RegimeClassifier, higherTimeframeAdx } from "./regimeClassifier";
export type { RegimeReading } from "./regimeClassifier";
export { adjustConfidence, sideSign, veto } from "./filters/adjust";
export {
	choppinessFilter,
	derivativesFilter,
	fundingFilter,
	multiTimeframeFilter,
	orderBookFilter,
	sentimentFilter,
	weakTrendFilter,
} from "./filters/filters";
export { createFilterChain, runFilterChain } from "./filters/filterChain";
export type { FilterChainResult, FilterStep } from "./filters/filterChain";
export type { FilterContext, SignalFilter } from "./filters/types";
