import type { Candle, MarketDataClient } from "@tradeloop/core";

export type { MarketDataClient };

export interface TimeframeRequest {
	timeframe: string;
	/** Maximum candles inside the requested range. */
	limit?: number;
	/** Extra candles fetched before the range start for indicator history. */
	warmup?: number;
}

export interface HistoricalSeriesRequest {
	symbol: string;
	startTimestamp: number;
	endTimestamp: number;
	requests: TimeframeRequest[];
}

export interface TimeframeSeries {
	timeframe: string;
	candles: Candle[];
}

export interface HistoricalFetchLimits {
	batchSize?: number;
	maxIterations?: number;
}
