import type { Candle } from "@tradeloop/core";
import { DEFAULT_TRADING_CONFIG } from "@tradeloop/core";

export const makeSeries = (count: number, symbol = "BTC/USDT:USDT"): Candle[] => {
	const candles: Candle[] = [];
	let previousClose = 100;
	for (let i = 0; i < count; i += 1) {
		const close = 100 + 5 * Math.sin(i / 5) + 0.1 * i;
		const open = previousClose;
		candles.push({
			symbol,
			timeframe: "15m",
			timestamp: 1_700_000_000_000 + i * 900_000,
			open,
			high: Math.max(open, close) + 0.5 + 0.2 * ((i * 7) % 3),
			low: Math.min(open, close) - 0.4 - 0.1 * ((i * 5) % 4),
			close,
			volume: 100 + ((i * 37) % 50),
		});
		previousClose = close;
	}
	return candles;
};

export const defaultIndicators = DEFAULT_TRADING_CONFIG.indicators;
