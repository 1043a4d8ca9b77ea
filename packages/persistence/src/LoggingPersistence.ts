import { createLogger } from "@tradeloop/core";
import type { ModuleLogger } from "@tradeloop/core";
import type {
	DecisionRecord,
	PersistenceSink,
	SnapshotRecord,
	TradeRecord,
} from "./records";

/**
 * Emits records as structured log events. `trade_opened`, `trade_closed`
 * and `portfolio_snapshot` render as tables under pretty logging.
 */
export class LoggingPersistence implements PersistenceSink {
	constructor(private readonly logger: ModuleLogger = createLogger("persistence")) {}

	async recordDecision(record: DecisionRecord): Promise<void> {
		const level = record.outcome === "accepted" ? "info" : "debug";
		this.logger.log(level, "decision", { ...record });
	}

	async recordTrade(record: TradeRecord): Promise<void> {
		if (record.kind === "open") {
			this.logger.info("trade_opened", { ...record });
		} else {
			this.logger.info("trade_closed", { ...record });
		}
	}

	async recordSnapshot(record: SnapshotRecord): Promise<void> {
		this.logger.info("portfolio_snapshot", { ...record });
	}
}
