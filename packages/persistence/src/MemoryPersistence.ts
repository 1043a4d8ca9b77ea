import type {
	DecisionRecord,
	PersistenceSink,
	SnapshotRecord,
	TradeRecord,
} from "./records";

/** Keeps every record in arrays. Backtests read trades and snapshots back from it. */
export class MemoryPersistence implements PersistenceSink {
	readonly decisions: DecisionRecord[] = [];
	readonly trades: TradeRecord[] = [];
	readonly snapshots: SnapshotRecord[] = [];

	async recordDecision(record: DecisionRecord): Promise<void> {
		this.decisions.push(record);
	}

	async recordTrade(record: TradeRecord): Promise<void> {
		this.trades.push(record);
	}

	async recordSnapshot(record: SnapshotRecord): Promise<void> {
		this.snapshots.push(record);
	}
}
