import type { Candle } from "@tradeloop/core";
import { createLogger, timeframeToMs } from "@tradeloop/core";
import type {
	HistoricalFetchLimits,
	HistoricalSeriesRequest,
	MarketDataClient,
	TimeframeRequest,
	TimeframeSeries,
} from "./types";

const logger = createLogger("data");

const DEFAULT_BATCH_SIZE = 500;
const DEFAULT_MAX_ITERATIONS = 10_000;

interface HistoricalFetchOptions extends HistoricalFetchLimits {
	client: MarketDataClient;
	request: TimeframeRequest;
	symbol: string;
	startTimestamp: number;
	endTimestamp: number;
}

/**
 * Pages forward from `startTimestamp` (minus warmup) until the range end,
 * an empty batch or the iteration cap. Duplicate timestamps across pages
 * are dropped.
 */
export const fetchHistoricalCandles = async (
	options: HistoricalFetchOptions
): Promise<Candle[]> => {
	const batchSize = Math.max(options.batchSize ?? DEFAULT_BATCH_SIZE, 1);
	const maxIterations = Math.max(options.maxIterations ?? DEFAULT_MAX_ITERATIONS, 1);
	const timeframeMs = timeframeToMs(options.request.timeframe);
	const warmupMs = timeframeMs * Math.max(options.request.warmup ?? 0, 0);
	const limit =
		typeof options.request.limit === "number" && options.request.limit > 0
			? options.request.limit
			: undefined;

	const result: Candle[] = [];
	const seenTimestamps = new Set<number>();
	let since = Math.max(0, options.startTimestamp - warmupMs);
	let iterations = 0;
	let inRangeCount = 0;

	while (since <= options.endTimestamp && iterations < maxIterations) {
		const remaining = limit === undefined ? batchSize : Math.max(limit - inRangeCount, 0);
		if (remaining <= 0) {
			break;
		}

		const batch = await options.client.fetchOHLCV(
			options.symbol,
			options.request.timeframe,
			Math.min(batchSize, remaining),
			since
		);
		if (!batch.length) {
			break;
		}

		for (const candle of batch) {
			if (candle.timestamp > options.endTimestamp) {
				return result;
			}
			if (seenTimestamps.has(candle.timestamp)) {
				continue;
			}
			result.push(candle);
			seenTimestamps.add(candle.timestamp);
			if (candle.timestamp >= options.startTimestamp) {
				inRangeCount += 1;
				if (limit !== undefined && inRangeCount >= limit) {
					return result;
				}
			}
		}

		const last = batch[batch.length - 1];
		since = Math.max(last.timestamp + timeframeMs, since + timeframeMs);
		iterations += 1;
	}

	if (iterations >= maxIterations) {
		logger.warn("historical_fetch_iterations_exceeded", {
			symbol: options.symbol,
			timeframe: options.request.timeframe,
			startTimestamp: options.startTimestamp,
			endTimestamp: options.endTimestamp,
			iterations,
		});
	}

	return result;
};

export const loadHistoricalSeries = async (
	client: MarketDataClient,
	request: HistoricalSeriesRequest,
	limits: HistoricalFetchLimits = {}
): Promise<TimeframeSeries[]> => {
	if (!request.requests.length) {
		throw new Error("Historical request requires at least one timeframe");
	}

	const series: TimeframeSeries[] = [];
	for (const frame of request.requests) {
		const candles = await fetchHistoricalCandles({
			...limits,
			client,
			request: frame,
			symbol: request.symbol,
			startTimestamp: request.startTimestamp,
			endTimestamp: request.endTimestamp,
		});
		logger.info("historical_timeframe_loaded", {
			symbol: request.symbol,
			timeframe: frame.timeframe,
			candles: candles.length,
			warmup: frame.warmup ?? 0,
		});
		series.push({ timeframe: frame.timeframe, candles });
	}
	return series;
};
