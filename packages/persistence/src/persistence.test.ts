import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import type { LogLevel, ModuleLogger } from "@tradeloop/core";
import {
	JSONL_FILES,
	LoggingPersistence,
	MemoryPersistence,
	createPersistenceLayer,
} from "./index";
import type { DecisionRecord, SnapshotRecord, TradeOpenRecord } from "./index";

const decision: DecisionRecord = {
	timestamp: 1,
	symbol: "BTC/USDT:USDT",
	regime: "RANGING",
	strategyId: "mean_reversion",
	direction: "LONG",
	confidence: 0.8,
	outcome: "accepted",
	stoppedBy: null,
	reason: null,
	rationale: ["band_touch:+0.35"],
	features: { close: 100 },
};

const opened: TradeOpenRecord = {
	kind: "open",
	positionId: "BTC/USDT:USDT-1-1",
	timestamp: 1,
	symbol: "BTC/USDT:USDT",
	direction: "LONG",
	strategyId: "mean_reversion",
	regime: "RANGING",
	confidence: 0.8,
	entryPrice: 100,
	quantity: 1,
	stopPrice: 97,
	takeProfitPrice: 106,
	fees: 0.04,
};

const snapshot: SnapshotRecord = {
	timestamp: 1,
	totalValue: 1000,
	freeBalance: 900,
	peakValue: 1000,
	dailyPnlPct: 0,
	drawdownPct: 0,
	openPositions: 0,
	positions: [],
};

interface Captured {
	level: LogLevel;
	event: string;
	data?: Record<string, unknown>;
}

const capturingLogger = (captured: Captured[]): ModuleLogger => {
	const logger: ModuleLogger = {
		log: (level, event, data) => captured.push({ level, event, data }),
		debug: (event, data) => logger.log("debug", event, data),
		info: (event, data) => logger.log("info", event, data),
		warn: (event, data) => logger.log("warn", event, data),
		error: (event, data) => logger.log("error", event, data),
		child: () => logger,
	};
	return logger;
};

describe("MemoryPersistence", () => {
	it("keeps records in order", async () => {
		const sink = new MemoryPersistence();
		await sink.recordDecision(decision);
		await sink.recordTrade(opened);
		await sink.recordSnapshot(snapshot);
		expect(sink.decisions).toEqual([decision]);
		expect(sink.trades).toEqual([opened]);
		expect(sink.snapshots).toEqual([snapshot]);
	});
});

describe("LoggingPersistence", () => {
	it("emits structured events", async () => {
		const captured: Captured[] = [];
		const sink = new LoggingPersistence(capturingLogger(captured));
		await sink.recordDecision({ ...decision, outcome: "no_signal" });
		await sink.recordTrade(opened);
		await sink.recordSnapshot(snapshot);
		expect(captured.map(({ level, event }) => `${level}:${event}`)).toEqual([
			"debug:decision",
			"info:trade_opened",
			"info:portfolio_snapshot",
		]);
		expect(captured[1].data?.stopPrice).toBe(97);
	});
});

describe("createPersistenceLayer", () => {
	let directory: string | null = null;

	afterEach(async () => {
		if (directory) {
			await rm(directory, { recursive: true, force: true });
			directory = null;
		}
	});

	it("builds the requested driver", () => {
		expect(createPersistenceLayer({ driver: "memory" })).toBeInstanceOf(MemoryPersistence);
		expect(createPersistenceLayer({ driver: "log" })).toBeInstanceOf(LoggingPersistence);
	});

	it("appends json lines per record kind", async () => {
		directory = await mkdtemp(path.join(os.tmpdir(), "persistence-"));
		const target = path.join(directory, "run");
		const sink = createPersistenceLayer({ driver: "file", directory: target });
		await sink.recordTrade(opened);
		await sink.recordTrade({ ...opened, positionId: "second" });
		const lines = (await readFile(path.join(target, JSONL_FILES.trades), "utf8")).trim().split("\n");
		expect(lines).toHaveLength(2);
		expect(JSON.parse(lines[1]).positionId).toBe("second");
	});
});
