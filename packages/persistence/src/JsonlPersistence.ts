import { promises as fs } from "node:fs";
import path from "node:path";
import type {
	DecisionRecord,
	PersistenceSink,
	SnapshotRecord,
	TradeRecord,
} from "./records";

export const JSONL_FILES = {
	decisions: "decisions.jsonl",
	trades: "trades.jsonl",
	snapshots: "snapshots.jsonl",
} as const;

/** Appends one JSON line per record to a file per record kind. */
export class JsonlPersistence implements PersistenceSink {
	private ready: Promise<void> | null = null;

	constructor(private readonly directory: string) {}

	recordDecision(record: DecisionRecord): Promise<void> {
		return this.append(JSONL_FILES.decisions, record);
	}

	recordTrade(record: TradeRecord): Promise<void> {
		return this.append(JSONL_FILES.trades, record);
	}

	recordSnapshot(record: SnapshotRecord): Promise<void> {
		return this.append(JSONL_FILES.snapshots, record);
	}

	private async append(file: string, record: object): Promise<void> {
		if (!this.ready) {
			this.ready = fs.mkdir(this.directory, { recursive: true }).then(() => undefined);
		}
		await this.ready;
		await fs.appendFile(path.join(this.directory, file), `${JSON.stringify(record)}\n`, "utf8");
	}
}
