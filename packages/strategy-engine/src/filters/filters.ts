import type { FilterConfig, TradeSignal } from "@tradeloop/core";
import { adjustConfidence, sideSign, veto } from "./adjust";
import type { FilterContext, SignalFilter } from "./types";

type Sided = (signal: TradeSignal, context: FilterContext, sign: 1 | -1) => TradeSignal;

/** Wraps a rule that only runs on directional signals. */
const directional = (name: string, rule: Sided): SignalFilter => ({
	name,
	apply: (signal, context) =>
		signal.direction === "NONE" ? signal : rule(signal, context, sideSign(signal.direction)),
});

export const weakTrendFilter = (config: FilterConfig): SignalFilter =>
	directional("weak_trend", (signal, { regime }) =>
		regime === "TRENDING_WEAK"
			? adjustConfidence(signal, -config.weakTrendPenalty, "weak_trend")
			: signal
	);

/**
 * Higher-timeframe confirmation: vetoes when every timeframe with a trend
 * opposes the signal, otherwise adds a bonus per agreeing timeframe.
 */
export const multiTimeframeFilter = (config: FilterConfig): SignalFilter =>
	directional("multi_timeframe", (signal, { features }, sign) => {
		if (!config.mtfEnabled) {
			return signal;
		}
		let aligned = 0;
		let opposed = 0;
		for (const vector of Object.values(features.higher)) {
			if (!vector.ready) {
				continue;
			}
			const trend = Math.sign(vector.values.ema_fast - vector.values.ema_slow);
			if (trend === sign) {
				aligned += 1;
			} else if (trend === -sign) {
				opposed += 1;
			}
		}
		if (opposed > 0 && aligned === 0) {
			return veto(signal, "higher_timeframe_opposed");
		}
		return adjustConfidence(signal, aligned * config.mtfAlignedBonus, "mtf_aligned");
	});

export const choppinessFilter = (config: FilterConfig): SignalFilter =>
	directional("choppiness", (signal, { features }) => {
		if (!config.choppinessEnabled || !config.choppinessStrategies.includes(signal.strategyId)) {
			return signal;
		}
		const { atr_ratio: atrRatio, adx } = features.primary.values;
		return atrRatio > config.choppinessAtrRatio && adx < config.choppinessAdxCeiling
			? adjustConfidence(signal, -config.choppinessPenalty, "choppiness")
			: signal;
	});

export const fundingFilter = (config: FilterConfig): SignalFilter =>
	directional("funding", (signal, { external }, sign) => {
		if (external.fundingRate === undefined) {
			return signal;
		}
		const crowding = sign * external.fundingRate;
		if (crowding >= config.fundingExtreme) {
			return adjustConfidence(signal, -config.fundingPenalty, "funding_crowded");
		}
		if (crowding <= -config.fundingMild) {
			return adjustConfidence(signal, config.fundingBonus, "funding_contrarian");
		}
		return signal;
	});

export const orderBookFilter = (config: FilterConfig): SignalFilter =>
	directional("order_book", (signal, { external }, sign) => {
		if (external.orderBookImbalance === undefined) {
			return signal;
		}
		const pressure = sign * external.orderBookImbalance;
		if (pressure >= config.orderBookThreshold) {
			return adjustConfidence(signal, config.orderBookBonus, "order_book_support");
		}
		if (pressure <= -config.orderBookThreshold) {
			return adjustConfidence(signal, -config.orderBookPenalty, "order_book_against");
		}
		return signal;
	});

export const sentimentFilter = (config: FilterConfig): SignalFilter =>
	directional("sentiment", (signal, { external }, sign) => {
		if (external.newsSentiment === undefined) {
			return signal;
		}
		const tone = sign * external.newsSentiment;
		if (tone >= config.sentimentThreshold) {
			return adjustConfidence(signal, config.sentimentWeight, "sentiment_support");
		}
		if (tone <= -config.sentimentThreshold) {
			return adjustConfidence(signal, -config.sentimentWeight, "sentiment_against");
		}
		return signal;
	});

export const derivativesFilter = (config: FilterConfig): SignalFilter =>
	directional("derivatives", (signal, { external }, sign) => {
		if (external.liquidationCascade && external.liquidationCascade === signal.direction) {
			return veto(signal, "liquidation_cascade");
		}
		let next = signal;
		const oiChange = external.openInterestChangePct;
		if (oiChange !== undefined) {
			if (oiChange >= config.openInterestChangePct) {
				next = adjustConfidence(next, config.openInterestBonus, "open_interest_rising");
			} else if (oiChange <= -config.openInterestChangePct) {
				next = adjustConfidence(next, -config.openInterestBonus, "open_interest_falling");
			}
		}
		const zScore = external.fundingZScore;
		if (zScore !== undefined && sign * zScore >= config.fundingZScoreLimit) {
			next = adjustConfidence(next, -config.fundingZScorePenalty, "funding_zscore");
		}
		return next;
	});
