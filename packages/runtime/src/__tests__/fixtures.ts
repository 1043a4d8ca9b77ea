import type { Candle, MarketDataClient, TradingConfig } from "@tradeloop/core";
import { buildTradingConfig, timeframeToMs } from "@tradeloop/core";
import type { Sleep } from "@tradeloop/execution-engine";

export const BTC = "BTC/USDT:USDT";
export const ETH = "ETH/USDT:USDT";

/** 2024-01-02T00:00:00Z */
export const DAY_START = Date.UTC(2024, 0, 2);

export const noSleep: Sleep = async () => undefined;

export const testConfig = (override: Record<string, unknown> = {}): TradingConfig =>
	buildTradingConfig(override);

/**
 * Drifting sine wave with bar ranges wide enough for every indicator.
 * Deterministic for a given count and start.
 */
export const waveCandles = (
	count: number,
	options: { symbol?: string; timeframe?: string; start?: number; base?: number } = {}
): Candle[] => {
	const symbol = options.symbol ?? BTC;
	const timeframe = options.timeframe ?? "15m";
	const start = options.start ?? DAY_START;
	const base = options.base ?? 100;
	const stepMs = timeframeToMs(timeframe);
	const candles: Candle[] = [];
	let previous = base;
	for (let i = 0; i < count; i += 1) {
		const close = base + 0.04 * i + 4 * Math.sin(i / 7) + 1.5 * Math.sin(i / 2.3);
		const open = previous;
		const spread = 0.6 + 0.3 * Math.abs(Math.sin(i));
		candles.push({
			symbol,
			timeframe,
			timestamp: start + i * stepMs,
			open,
			high: Math.max(open, close) + spread,
			low: Math.min(open, close) - spread,
			close,
			volume: 100 + 15 * (i % 9),
		});
		previous = close;
	}
	return candles;
};

/** Serves fixed candle sets per (symbol, timeframe); unknown symbols fail. */
export class StubMarketData implements MarketDataClient {
	readonly requests: Array<{ symbol: string; timeframe: string; limit?: number }> = [];

	constructor(private readonly candles: Record<string, Record<string, Candle[]>>) {}

	async fetchOHLCV(symbol: string, timeframe: string, limit?: number): Promise<Candle[]> {
		this.requests.push({ symbol, timeframe, limit });
		const series = this.candles[symbol]?.[timeframe];
		if (!series) {
			throw new Error(`no candles for ${symbol} ${timeframe}`);
		}
		return limit === undefined ? [...series] : series.slice(-limit);
	}
}
