import type { Candle, ClosedTrade, ExternalSignals, TradingConfig } from "@tradeloop/core";
import type { EquityPoint, PerformanceReport } from "@tradeloop/metrics";
import type { DecisionRecord, PersistenceSink } from "@tradeloop/persistence";

/** Primary-timeframe candles for one symbol, sorted by open time. */
export interface SymbolSeries {
	symbol: string;
	candles: readonly Candle[];
}

export type ReplayExternalSignals = (symbol: string, timestamp: number) => ExternalSignals | undefined;

export interface BacktestOptions {
	config: TradingConfig;
	series: readonly SymbolSeries[];
	/**
	 * First bar open time to evaluate; earlier bars only feed indicator
	 * history. Without it the first `warmupBars` bars are skipped.
	 */
	startTimestamp?: number;
	/** Bars opening at or after this time are ignored. */
	endTimestamp?: number;
	initialBalance?: number;
	persistence?: PersistenceSink;
	externalSignals?: ReplayExternalSignals;
}

export type DecisionOutcome = DecisionRecord["outcome"];

export interface BacktestResult {
	symbols: string[];
	primaryTimeframe: string;
	startTimestamp: number;
	endTimestamp: number;
	bars: number;
	initialBalance: number;
	finalBalance: number;
	trades: ClosedTrade[];
	equityCurve: EquityPoint[];
	decisions: Record<DecisionOutcome, number>;
	report: PerformanceReport;
	configFingerprint: string;
	/** Hash of every closed trade; equal across runs with the same inputs and seed. */
	fingerprint: string;
}

export interface WalkForwardSegment {
	startTimestamp: number;
	endTimestamp: number;
	bars: number;
	trades: number;
	returnPct: number;
	winRate: number;
	profitFactor: number;
	maxDrawdownPct: number;
	sharpe: number;
	fingerprint: string;
}

export interface WalkForwardWindow {
	index: number;
	train: WalkForwardSegment;
	test: WalkForwardSegment;
}

export interface WalkForwardResult {
	windows: WalkForwardWindow[];
	inSampleReturnPct: number;
	outOfSampleReturnPct: number;
	/** Out-of-sample over in-sample return; null when in-sample return is not positive. */
	efficiency: number | null;
	generalizes: boolean;
}
