import type { Candle } from "../types";

/**
 * Read-only candle source. Kept apart from ExecutionClient so signals can be
 * read from a venue without trading permissions.
 */
export interface MarketDataClient {
	/**
	 * Closed and in-progress candles in chronological order.
	 * @param limit - maximum number of candles to return
	 * @param since - earliest candle open time to include
	 */
	fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit?: number,
		since?: number
	): Promise<Candle[]>;
}
