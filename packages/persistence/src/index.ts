import { JsonlPersistence } from "./JsonlPersistence";
import { LoggingPersistence } from "./LoggingPersistence";
import { MemoryPersistence } from "./MemoryPersistence";
import type { PersistenceSink } from "./records";

export type PersistenceOptions =
	| { driver: "memory" }
	| { driver: "log" }
	| { driver: "file"; directory: string };

export const createPersistenceLayer = (options: PersistenceOptions): PersistenceSink => {
	switch (options.driver) {
		case "memory":
			return new MemoryPersistence();
		case "log":
			return new LoggingPersistence();
		case "file":
			return new JsonlPersistence(options.directory);
	}
};

export { JsonlPersistence, JSONL_FILES } from "./JsonlPersistence";
export { LoggingPersistence } from "./LoggingPersistence";
export { MemoryPersistence } from "./MemoryPersistence";
export type {
	DecisionRecord,
	PersistenceSink,
	PositionView,
	SnapshotRecord,
	TradeCloseRecord,
	TradeOpenRecord,
	TradeRecord,
} from "./records";
