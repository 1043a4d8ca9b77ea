import type { Candle, TradingConfig } from "@tradeloop/core";
import { timeframeToMs } from "@tradeloop/core";
import { aggregateClosedCandles } from "@tradeloop/data";
import type { SymbolTick } from "../loop/TradingEngine";
import type { ReplayExternalSignals, SymbolSeries } from "./backtestTypes";

interface HigherSeries {
	timeframe: string;
	durationMs: number;
	candles: Candle[];
	/** Number of candles closed by the last requested time. */
	closed: number;
}

/**
 * Serves one symbol's history bar by bar. Higher timeframes are rolled up
 * from the primary candles and only buckets that have closed by the bar's
 * close are visible, so no decision sees the future.
 */
export class ReplayFeed {
	readonly symbol: string;
	private readonly candles: readonly Candle[];
	private readonly byTimestamp = new Map<number, number>();
	private readonly higher: HigherSeries[];
	private readonly history: number;

	constructor(
		series: SymbolSeries,
		config: TradingConfig,
		private readonly externalSignals?: ReplayExternalSignals
	) {
		this.symbol = series.symbol;
		this.candles = series.candles;
		this.history = config.runtime.historyCandles;
		series.candles.forEach((candle, index) => this.byTimestamp.set(candle.timestamp, index));
		this.higher = config.runtime.higherTimeframes.map((timeframe) => ({
			timeframe,
			durationMs: timeframeToMs(timeframe),
			candles: aggregateClosedCandles(series.candles, timeframe),
			closed: 0,
		}));
	}

	timestamps(): number[] {
		return this.candles.map((candle) => candle.timestamp);
	}

	/** Tick for the bar opening at `timestamp`, or null when the symbol has no such bar. */
	tickAt(timestamp: number, closeTime: number): SymbolTick | null {
		const index = this.byTimestamp.get(timestamp);
		if (index === undefined) {
			return null;
		}
		const candle = this.candles[index];
		const higher: Record<string, Candle[]> = {};
		for (const series of this.higher) {
			while (
				series.closed < series.candles.length &&
				series.candles[series.closed].timestamp + series.durationMs <= closeTime
			) {
				series.closed += 1;
			}
			higher[series.timeframe] = series.candles.slice(
				Math.max(0, series.closed - this.history),
				series.closed
			);
		}
		return {
			symbol: this.symbol,
			data: {
				symbol: this.symbol,
				primary: this.candles.slice(Math.max(0, index + 1 - this.history), index + 1),
				higher,
				external: this.externalSignals?.(this.symbol, closeTime),
			},
			price: {
				timestamp: closeTime,
				open: candle.open,
				high: candle.high,
				low: candle.low,
				price: candle.close,
			},
		};
	}
}
