import type { Candle } from "@tradeloop/core";
import { bucketTimestamp, timeframeToMs } from "@tradeloop/core";

/**
 * OHLCV of the base candles that fall inside one target bucket, or null
 * when none do.
 */
export function aggregateCandle(
	baseCandles: readonly Candle[],
	targetTimeframe: string,
	bucketStart: number,
	symbol: string
): Candle | null {
	const bucketEnd = bucketStart + timeframeToMs(targetTimeframe);
	const inBucket = baseCandles.filter(
		(candle) => candle.timestamp >= bucketStart && candle.timestamp < bucketEnd
	);
	if (!inBucket.length) {
		return null;
	}
	return {
		symbol,
		timeframe: targetTimeframe,
		timestamp: bucketStart,
		open: inBucket[0].open,
		high: Math.max(...inBucket.map((candle) => candle.high)),
		low: Math.min(...inBucket.map((candle) => candle.low)),
		close: inBucket[inBucket.length - 1].close,
		volume: inBucket.reduce((sum, candle) => sum + candle.volume, 0),
	};
}

/**
 * Rolls sorted base candles up into `targetTimeframe`. Only buckets whose
 * end is covered by the last base candle are emitted, so the trailing
 * in-progress bucket never leaks into a decision.
 */
export function aggregateClosedCandles(
	baseCandles: readonly Candle[],
	targetTimeframe: string
): Candle[] {
	if (!baseCandles.length) {
		return [];
	}
	const first = baseCandles[0];
	const last = baseCandles[baseCandles.length - 1];
	const baseMs = timeframeToMs(first.timeframe);
	const targetMs = timeframeToMs(targetTimeframe);
	if (targetMs < baseMs) {
		throw new Error(`cannot aggregate ${first.timeframe} candles into ${targetTimeframe}`);
	}
	const coveredUntil = last.timestamp + baseMs;

	const buckets = new Map<number, Candle[]>();
	for (const candle of baseCandles) {
		const start = bucketTimestamp(candle.timestamp, targetMs);
		if (start + targetMs > coveredUntil) {
			break;
		}
		const members = buckets.get(start);
		if (members) {
			members.push(candle);
		} else {
			buckets.set(start, [candle]);
		}
	}

	const result: Candle[] = [];
	for (const [start, members] of buckets) {
		const candle = aggregateCandle(members, targetTimeframe, start, first.symbol);
		if (candle) {
			result.push(candle);
		}
	}
	return result;
}

/** Candles whose bucket has closed by `closeTime`. Input must be sorted. */
export const closedBy = (
	candles: readonly Candle[],
	timeframe: string,
	closeTime: number
): Candle[] => {
	const durationMs = timeframeToMs(timeframe);
	let end = 0;
	while (end < candles.length && candles[end].timestamp + durationMs <= closeTime) {
		end += 1;
	}
	return candles.slice(0, end);
};
