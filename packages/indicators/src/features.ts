import type { Candle, FeatureVector, IndicatorConfig } from "@tradeloop/core";
import { adxSeries } from "./adx";
import { atrSeries } from "./atr";
import { bollinger } from "./bollinger";
import { defined, emaSeries, lastValue } from "./ema";
import { divergence, nearestLevels, swingLevels } from "./levels";
import { macdSeries } from "./macd";
import { obvSeries } from "./obv";
import { rsiSeries } from "./rsi";
import { sma, smaSeries } from "./sma";

export const FEATURES = {
	open: "open",
	high: "high",
	low: "low",
	close: "close",
	closePrev: "close_prev",
	volume: "volume",
	emaFast: "ema_fast",
	emaSlow: "ema_slow",
	emaTrend: "ema_trend",
	emaFastPrev: "ema_fast_prev",
	emaSlowPrev: "ema_slow_prev",
	rsi: "rsi",
	rsiPrev: "rsi_prev",
	macd: "macd",
	macdSignal: "macd_signal",
	macdHist: "macd_hist",
	macdHistPrev: "macd_hist_prev",
	bbUpper: "bb_upper",
	bbMiddle: "bb_middle",
	bbLower: "bb_lower",
	bbBandwidth: "bb_bandwidth",
	atr: "atr",
	atrSma: "atr_sma",
	atrRatio: "atr_ratio",
	adx: "adx",
	plusDi: "plus_di",
	minusDi: "minus_di",
	volumeSma: "volume_sma",
	volumeRatio: "volume_ratio",
	obv: "obv",
	obvEma: "obv_ema",
	divergence: "rsi_divergence",
	support: "support",
	resistance: "resistance",
} as const;

export type FeatureName = (typeof FEATURES)[keyof typeof FEATURES];

const SWING_RADIUS = 2;

/**
 * Smallest trailing window every indicator can be computed on.
 */
export const requiredCandles = (config: IndicatorConfig): number =>
	Math.max(
		config.emaTrend + 1,
		config.macdSlow + config.macdSignal,
		config.bollingerPeriod + 1,
		config.atrPeriod + config.atrSmaPeriod,
		2 * config.adxPeriod + 1,
		config.volumeSmaPeriod + 1,
		config.obvEmaPeriod + 1,
		config.rsiPeriod + config.divergenceLookback,
		config.supportResistanceLookback + 1
	);

const notReady = (
	symbol: string,
	timeframe: string,
	timestamp: number,
	reason: string
): FeatureVector => ({ symbol, timeframe, timestamp, ready: false, reason, values: {} });

const isWellFormed = (candles: Candle[]): boolean =>
	candles.every(
		(candle, index) =>
			Number.isFinite(candle.open) &&
			Number.isFinite(candle.high) &&
			Number.isFinite(candle.low) &&
			Number.isFinite(candle.close) &&
			Number.isFinite(candle.volume) &&
			candle.high >= candle.low &&
			candle.volume >= 0 &&
			(index === 0 || candle.timestamp > candles[index - 1].timestamp)
	);

/**
 * Feature vector for the last candle of `candles`. Short or malformed history
 * yields `ready: false` with no values; nothing is extrapolated.
 */
export function computeFeatureVector(
	candles: Candle[],
	config: IndicatorConfig,
	window = requiredCandles(config)
): FeatureVector {
	const latest = candles[candles.length - 1];
	const symbol = latest?.symbol ?? "";
	const timeframe = latest?.timeframe ?? "";
	const timestamp = latest?.timestamp ?? 0;
	const minimum = requiredCandles(config);

	if (candles.length < minimum) {
		return notReady(
			symbol,
			timeframe,
			timestamp,
			`insufficient_history:${candles.length}/${minimum}`
		);
	}

	const slice = candles.slice(candles.length - Math.max(window, minimum));
	if (!isWellFormed(slice)) {
		return notReady(symbol, timeframe, timestamp, "malformed_candles");
	}

	const closes = slice.map((candle) => candle.close);
	const volumes = slice.map((candle) => candle.volume);
	const previous = slice[slice.length - 2];

	const emaFast = emaSeries(closes, config.emaFast);
	const emaSlow = emaSeries(closes, config.emaSlow);
	const emaTrend = emaSeries(closes, config.emaTrend);
	const rsi = rsiSeries(closes, config.rsiPeriod);
	const macd = macdSeries(closes, config.macdFast, config.macdSlow, config.macdSignal);
	const bands = bollinger(closes, config.bollingerPeriod, config.bollingerStdDev);
	const atr = atrSeries(slice, config.atrPeriod);
	const atrValues = defined(atr);
	const atrSma = sma(atrValues, config.atrSmaPeriod);
	const adx = adxSeries(slice, config.adxPeriod);
	const volumeSma = smaSeries(volumes, config.volumeSmaPeriod);
	const obv = obvSeries(slice);
	const obvEma = emaSeries(obv, config.obvEmaPeriod);
	const levelWindow = slice.slice(-config.supportResistanceLookback - 1, -1);
	const levels = nearestLevels(swingLevels(levelWindow, SWING_RADIUS), previous.close);

	const required: Array<[FeatureName, number | null]> = [
		[FEATURES.emaFast, lastValue(emaFast)],
		[FEATURES.emaSlow, lastValue(emaSlow)],
		[FEATURES.emaTrend, lastValue(emaTrend)],
		[FEATURES.emaFastPrev, lastValue(emaFast, 1)],
		[FEATURES.emaSlowPrev, lastValue(emaSlow, 1)],
		[FEATURES.rsi, lastValue(rsi)],
		[FEATURES.rsiPrev, lastValue(rsi, 1)],
		[FEATURES.macd, lastValue(macd.macd)],
		[FEATURES.macdSignal, lastValue(macd.signal)],
		[FEATURES.macdHist, lastValue(macd.histogram)],
		[FEATURES.macdHistPrev, lastValue(macd.histogram, 1)],
		[FEATURES.bbUpper, bands?.upper ?? null],
		[FEATURES.bbMiddle, bands?.middle ?? null],
		[FEATURES.bbLower, bands?.lower ?? null],
		[FEATURES.bbBandwidth, bands?.bandwidth ?? null],
		[FEATURES.atr, lastValue(atr)],
		[FEATURES.atrSma, atrSma],
		[FEATURES.adx, lastValue(adx.adx)],
		[FEATURES.plusDi, lastValue(adx.plusDi)],
		[FEATURES.minusDi, lastValue(adx.minusDi)],
		[FEATURES.volumeSma, lastValue(volumeSma)],
		[FEATURES.obv, obv[obv.length - 1] ?? null],
		[FEATURES.obvEma, lastValue(obvEma)],
	];

	const values: Record<string, number> = {
		[FEATURES.open]: latest.open,
		[FEATURES.high]: latest.high,
		[FEATURES.low]: latest.low,
		[FEATURES.close]: latest.close,
		[FEATURES.closePrev]: previous.close,
		[FEATURES.volume]: latest.volume,
	};
	for (const [name, value] of required) {
		if (value === null || !Number.isFinite(value)) {
			return notReady(symbol, timeframe, timestamp, `missing_feature:${name}`);
		}
		values[name] = value;
	}

	values[FEATURES.atrRatio] = values.atr_sma > 0 ? values.atr / values.atr_sma : 1;
	values[FEATURES.volumeRatio] =
		values.volume_sma > 0 ? latest.volume / values.volume_sma : 0;
	values[FEATURES.divergence] = divergence(closes, rsi, config.divergenceLookback);
	if (levels.resistance !== null) {
		values[FEATURES.resistance] = levels.resistance;
	}
	if (levels.support !== null) {
		values[FEATURES.support] = levels.support;
	}

	return { symbol, timeframe, timestamp, ready: true, values };
}
