import { describe, expect, it } from "vitest";
import { ExecutionError, MINUTE_MS } from "@tradeloop/core";
import type { OrderFill, OrderRequest, Position } from "@tradeloop/core";
import { SimulatedExchange, SimulatedFillModel, liveTick } from "@tradeloop/execution-engine";
import { MemoryPersistence } from "@tradeloop/persistence";
import type { DecisionRecord, TradeRecord } from "@tradeloop/persistence";
import { BTC, DAY_START, ETH, noSleep, testConfig } from "../__tests__/fixtures";
import { TradingEngine } from "./TradingEngine";

const BAR = 15 * MINUTE_MS;

const fillModel = () =>
	new SimulatedFillModel({ feePct: 0, slippagePct: 0, slippageMode: "fixed", seed: 1 });

class RejectingCloses extends SimulatedExchange {
	async placeOrder(request: OrderRequest): Promise<OrderFill> {
		if (request.reduceOnly) {
			throw new ExecutionError("reduce rejected", "terminal");
		}
		return super.placeOrder(request);
	}
}

/** Counts reduce-only orders and times every one of them out. */
class TimingOutCloses extends SimulatedExchange {
	closeAttempts = 0;

	async placeOrder(request: OrderRequest): Promise<OrderFill> {
		if (request.reduceOnly) {
			this.closeAttempts += 1;
			throw new ExecutionError("close BTC timed out", "transient");
		}
		return super.placeOrder(request);
	}
}

class FailingDecisions extends MemoryPersistence {
	constructor(private readonly failingSymbol: string) {
		super();
	}

	async recordDecision(record: DecisionRecord): Promise<void> {
		if (record.symbol === this.failingSymbol) {
			throw new Error("decision store unavailable");
		}
		return super.recordDecision(record);
	}
}

/** Fails the first close record it is handed. */
class FlakyCloseRecords extends MemoryPersistence {
	private failed = false;

	async recordTrade(record: TradeRecord): Promise<void> {
		if (record.kind === "close" && !this.failed) {
			this.failed = true;
			throw new Error("trade store unavailable");
		}
		return super.recordTrade(record);
	}
}

const setup = (
	exchange: SimulatedExchange = new SimulatedExchange(1000, fillModel()),
	persistence: MemoryPersistence = new MemoryPersistence()
) => {
	const engine = new TradingEngine({
		config: testConfig(),
		execution: exchange,
		persistence,
		startingBalance: 1000,
		mode: "paper",
		sleep: noSleep,
	});
	return { exchange, persistence, engine };
};

const LONG_REQUEST = {
	symbol: BTC,
	direction: "LONG",
	strategyId: "trend_following",
	regime: "TRENDING_STRONG",
	confidence: 0.9,
	leverage: 10,
	stopDistance: 2,
	rewardRiskRatio: 2,
	volatility: 2,
} as const;

const openLong = async (
	engine: TradingEngine,
	exchange: SimulatedExchange,
	quantity: number
): Promise<Position> => {
	const fill = await exchange.placeOrder({
		symbol: BTC,
		side: "buy",
		quantity,
		reduceOnly: false,
		referencePrice: 100,
		leverage: 10,
		timestamp: DAY_START,
	});
	return engine.lifecycle.open(LONG_REQUEST, fill);
};

describe("TradingEngine", () => {
	it("closes a stopped position and feeds every close listener", async () => {
		const { exchange, persistence, engine } = setup();
		await openLong(engine, exchange, 1);

		const at = DAY_START + BAR;
		const result = await engine.runTick({
			timestamp: at,
			symbols: [{ symbol: BTC, data: null, price: liveTick(at, 97) }],
		});

		expect(result.closed).toHaveLength(1);
		expect(result.closed[0]).toMatchObject({ reason: "stop_loss", exitPrice: 97, pnl: -3 });
		expect(result.portfolio.totalValue).toBe(997);
		expect(result.portfolio.openPositions).toHaveLength(0);
		expect(result.decisions).toEqual([
			expect.objectContaining({ symbol: BTC, outcome: "skipped", reason: "no_market_data" }),
		]);

		expect(persistence.trades).toHaveLength(1);
		expect(persistence.trades[0]).toMatchObject({ kind: "close", reason: "stop_loss" });
		expect(persistence.snapshots).toHaveLength(1);
		expect(persistence.snapshots[0]).toMatchObject({ totalValue: 997, openPositions: 0 });

		expect(engine.validator.symbolRisk(BTC).consecutiveLosses).toBe(1);
		expect(engine.adaptive.metrics("trend_following").trades).toBe(1);
		expect(engine.status().stats.trades.losses).toBe(1);
	});

	it("latches the daily loss breaker after a losing close", async () => {
		const { exchange, engine } = setup();
		await openLong(engine, exchange, 10);

		const first = DAY_START + BAR;
		const steady = await engine.runTick({
			timestamp: first,
			symbols: [{ symbol: BTC, data: null, price: liveTick(first, 100) }],
		});
		expect(steady.closed).toHaveLength(0);
		expect(steady.portfolio.totalValue).toBe(1000);

		const second = first + BAR;
		const crash = await engine.runTick({
			timestamp: second,
			symbols: [{ symbol: BTC, data: null, price: liveTick(second, 85) }],
		});
		expect(crash.closed[0]).toMatchObject({ exitPrice: 85, pnl: -150 });
		expect(crash.portfolio.totalValue).toBe(850);
		expect(crash.portfolio.dailyPnlPct).toBeCloseTo(-0.15);
		expect(engine.validator.breakerState().latched).toBe("daily_loss");
	});

	it("keeps a position tracked and flagged when its close order fails", async () => {
		const { exchange, engine } = setup(new RejectingCloses(1000, fillModel()));
		await openLong(engine, exchange, 1);

		const at = DAY_START + BAR;
		const result = await engine.runTick({
			timestamp: at,
			symbols: [{ symbol: BTC, data: null, price: liveTick(at, 97) }],
		});

		expect(result.closed).toEqual([]);
		expect(result.failures).toEqual([{ symbol: BTC, phase: "lifecycle", error: "reduce rejected" }]);
		expect(engine.lifecycle.has(BTC)).toBe(true);
		expect(engine.lifecycle.get(BTC)?.flag).toBe("close_failed");
	});

	it("sends a timed-out close once and leaves the outcome to reconciliation", async () => {
		const exchange = new TimingOutCloses(1000, fillModel());
		const { engine } = setup(exchange);
		await openLong(engine, exchange, 1);

		const at = DAY_START + BAR;
		const result = await engine.runTick({
			timestamp: at,
			symbols: [{ symbol: BTC, data: null, price: liveTick(at, 97) }],
		});

		expect(exchange.closeAttempts).toBe(1);
		expect(result.failures).toEqual([
			{ symbol: BTC, phase: "lifecycle", error: "close BTC timed out" },
		]);
		expect(engine.lifecycle.get(BTC)?.flag).toBe("close_failed");
	});

	it("keeps evaluating other symbols when a decision cannot be stored", async () => {
		const { persistence, engine } = setup(undefined, new FailingDecisions(BTC));
		const result = await engine.runTick({
			timestamp: DAY_START,
			symbols: [
				{ symbol: BTC, data: null, price: null },
				{ symbol: ETH, data: null, price: null },
			],
		});

		expect(result.failures).toEqual([
			{ symbol: BTC, phase: "persistence", error: "decision store unavailable" },
		]);
		expect(result.decisions.map((decision) => decision.symbol)).toEqual([BTC, ETH]);
		expect(persistence.decisions).toEqual([
			expect.objectContaining({ symbol: ETH, outcome: "skipped", reason: "no_market_data" }),
		]);
		expect(persistence.snapshots).toHaveLength(1);
	});

	it("writes a close record on the next tick after a failed write", async () => {
		const { exchange, persistence, engine } = setup(undefined, new FlakyCloseRecords());
		await openLong(engine, exchange, 1);

		const first = DAY_START + BAR;
		const stopped = await engine.runTick({
			timestamp: first,
			symbols: [{ symbol: BTC, data: null, price: liveTick(first, 97) }],
		});
		expect(stopped.closed).toHaveLength(1);
		expect(stopped.failures).toEqual([
			{ symbol: BTC, phase: "persistence", error: "trade store unavailable" },
		]);
		expect(persistence.trades).toEqual([]);

		const second = first + BAR;
		const next = await engine.runTick({
			timestamp: second,
			symbols: [{ symbol: BTC, data: null, price: liveTick(second, 98) }],
		});
		expect(next.closed).toEqual([]);
		expect(next.failures).toEqual([]);
		expect(persistence.trades).toEqual([
			expect.objectContaining({ kind: "close", reason: "stop_loss", exitPrice: 97 }),
		]);
	});

	it("stops deciding when a stop is requested but still snapshots", async () => {
		const { persistence, engine } = setup();
		const result = await engine.runTick({
			timestamp: DAY_START,
			symbols: [
				{ symbol: BTC, data: null, price: null },
				{ symbol: ETH, data: null, price: null },
			],
			shouldStop: () => true,
		});

		expect(result.interrupted).toBe(true);
		expect(result.decisions).toEqual([]);
		expect(persistence.decisions).toEqual([]);
		expect(persistence.snapshots).toHaveLength(1);
	});

	it("settles a ghost position at its stop when the venue no longer holds it", async () => {
		const { persistence, engine } = setup();
		engine.lifecycle.open(LONG_REQUEST, {
			orderId: "lost",
			symbol: BTC,
			side: "buy",
			price: 100,
			quantity: 1,
			fee: 0,
			timestamp: DAY_START,
		});

		const report = await engine.reconcile(DAY_START + BAR);

		expect(report.discrepancies.map((discrepancy) => discrepancy.kind)).toEqual(["ghost"]);
		expect(report.closed[0]).toMatchObject({ reason: "reconciled", exitPrice: 98, pnl: -2 });
		expect(engine.lifecycle.has(BTC)).toBe(false);
		expect(persistence.trades).toEqual([
			expect.objectContaining({ kind: "close", reason: "reconciled" }),
		]);
	});

	it("adopts a venue position it does not track", async () => {
		const { exchange, engine } = setup();
		await exchange.placeOrder({
			symbol: BTC,
			side: "sell",
			quantity: 2,
			reduceOnly: false,
			referencePrice: 100,
			leverage: 5,
			timestamp: DAY_START,
		});

		const report = await engine.reconcile(DAY_START + BAR);

		expect(report.discrepancies.map((discrepancy) => discrepancy.kind)).toEqual(["orphan"]);
		const adopted = engine.lifecycle.get(BTC);
		expect(adopted?.direction).toBe("SHORT");
		expect(adopted?.flag).toBe("adopted");
		expect(adopted?.leverage).toBe(5);
		expect(adopted?.stopPrice).toBeCloseTo(103);
	});

	it("market-closes every open position on request", async () => {
		const { exchange, engine } = setup();
		await openLong(engine, exchange, 1);
		const at = DAY_START + BAR;
		await engine.runTick({
			timestamp: at,
			symbols: [{ symbol: BTC, data: null, price: liveTick(at, 101) }],
		});

		const closed = await engine.closeAll(at, "end_of_replay");

		expect(closed).toHaveLength(1);
		expect(closed[0]).toMatchObject({ reason: "end_of_replay", exitPrice: 101, pnl: 1 });
		expect(await exchange.getOpenPositions()).toEqual([]);
		expect(await exchange.getFreeBalance()).toBe(1001);
	});
});
