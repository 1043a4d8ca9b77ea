import type {
	ClosedTrade,
	Direction,
	PositionState,
	Regime,
	SignalDirection,
	StrategyId,
} from "@tradeloop/core";

/** One per (symbol, tick), whether or not anything was traded. */
export interface DecisionRecord {
	timestamp: number;
	symbol: string;
	regime: Regime | null;
	strategyId: StrategyId | null;
	direction: SignalDirection;
	confidence: number;
	/** Outcome label: `accepted`, `skipped`, `no_signal`, `vetoed` or `rejected`. */
	outcome: "accepted" | "skipped" | "no_signal" | "vetoed" | "rejected";
	/** Filter or risk check that stopped the signal, or the skip reason. */
	stoppedBy: string | null;
	reason: string | null;
	rationale: string[];
	features: Readonly<Record<string, number>>;
}

export interface TradeOpenRecord {
	kind: "open";
	positionId: string;
	timestamp: number;
	symbol: string;
	direction: Direction;
	strategyId: StrategyId;
	regime: Regime;
	confidence: number;
	entryPrice: number;
	quantity: number;
	stopPrice: number;
	takeProfitPrice: number;
	fees: number;
}

export interface TradeCloseRecord extends ClosedTrade {
	kind: "close";
}

export type TradeRecord = TradeOpenRecord | TradeCloseRecord;

export interface PositionView {
	symbol: string;
	direction: Direction;
	strategyId: StrategyId;
	state: PositionState;
	entryPrice: number;
	quantity: number;
	stopPrice: number;
	takeProfitPrice: number;
	markPrice: number;
	unrealizedPnl: number;
}

export interface SnapshotRecord {
	timestamp: number;
	totalValue: number;
	freeBalance: number;
	peakValue: number;
	dailyPnlPct: number;
	drawdownPct: number;
	openPositions: number;
	positions: PositionView[];
}

/**
 * Receiver for everything the core reports outward. Writes are awaited by
 * the tick loop and failures propagate to it.
 */
export interface PersistenceSink {
	recordDecision(record: DecisionRecord): Promise<void>;
	recordTrade(record: TradeRecord): Promise<void>;
	recordSnapshot(record: SnapshotRecord): Promise<void>;
}
