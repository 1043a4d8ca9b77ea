import type { FeatureVector, MarketFeatures, TradeSignal } from "@tradeloop/core";

export const BASE_VALUES: Readonly<Record<string, number>> = {
	open: 104,
	high: 105.5,
	low: 103.5,
	close: 105,
	close_prev: 104,
	volume: 1000,
	ema_fast: 104,
	ema_slow: 103,
	ema_trend: 100,
	ema_fast_prev: 102.5,
	ema_slow_prev: 103,
	rsi: 60,
	rsi_prev: 55,
	macd: 0.8,
	macd_signal: 0.3,
	macd_hist: 0.5,
	macd_hist_prev: 0.3,
	bb_upper: 108,
	bb_middle: 102,
	bb_lower: 96,
	bb_bandwidth: 12 / 102,
	atr: 2,
	atr_sma: 2,
	atr_ratio: 1,
	adx: 30,
	plus_di: 25,
	minus_di: 15,
	volume_sma: 1000,
	volume_ratio: 1,
	obv: 1000,
	obv_ema: 900,
	rsi_divergence: 0,
};

export const buildFeatures = (
	values: Record<string, number> = {},
	overrides: Partial<FeatureVector> = {}
): FeatureVector => ({
	symbol: "BTC/USDT:USDT",
	timeframe: "15m",
	timestamp: 1_700_000_000_000,
	ready: true,
	values: { ...BASE_VALUES, ...values },
	...overrides,
});

export const buildMarket = (
	primary: FeatureVector,
	higher: Record<string, FeatureVector> = {}
): MarketFeatures => ({ primary, higher });

/** Higher-timeframe vector whose EMA stack points up (+1), down (-1) or flat (0). */
export const higherTrend = (trend: 1 | -1 | 0, adx = 30): FeatureVector =>
	buildFeatures(
		{ ema_fast: 100 + trend, ema_slow: 100, adx },
		{ timeframe: "1h" }
	);

export const buildSignal = (overrides: Partial<TradeSignal> = {}): TradeSignal => ({
	symbol: "BTC/USDT:USDT",
	timestamp: 1_700_000_000_000,
	direction: "LONG",
	confidence: 0.8,
	entryPrice: 100,
	stopDistance: 3,
	rewardRiskRatio: 2,
	volatility: 2,
	strategyId: "trend_following",
	rationale: [],
	...overrides,
});
