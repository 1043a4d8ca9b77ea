import { describe, expect, it } from "vitest";
import { StateConsistencyError } from "@tradeloop/core";
import type { LifecycleConfig } from "@tradeloop/core";
import { PositionLifecycleManager } from "./PositionLifecycleManager";
import { liveTick } from "./types";
import type { PositionOpenRequest } from "./types";
import { closeFill, entryFill, lifecycleConfig, openRequest } from "../__tests__/builders";

const SYMBOL = "BTC/USDT:USDT";

const openAt100 = (
	config: Partial<LifecycleConfig> = {},
	request: Partial<PositionOpenRequest> = {},
	fee = 0
): PositionLifecycleManager => {
	const manager = new PositionLifecycleManager(lifecycleConfig(config));
	const order = openRequest(request);
	manager.open(order, entryFill(order, 100, 1, fee));
	return manager;
};

const stopOf = (manager: PositionLifecycleManager): number | undefined =>
	manager.get(SYMBOL)?.stopPrice;

describe("PositionLifecycleManager", () => {
	it("derives stop, target and margin from the entry fill", () => {
		const manager = openAt100({}, {}, 0.1);
		const position = manager.get(SYMBOL);
		expect(position?.stopPrice).toBe(98);
		expect(position?.takeProfitPrice).toBe(104);
		expect(position?.margin).toBe(20);
		expect(position?.entryFees).toBe(0.1);
		expect(position?.trailing.distance).toBe(3);
		expect(position?.state).toBe("OPEN");
	});

	it("refuses a second position on the same symbol", () => {
		const manager = openAt100();
		const order = openRequest();
		expect(() => manager.open(order, entryFill(order, 101, 1))).toThrow(StateConsistencyError);
	});

	it("moves the stop to entry at one R and never back", () => {
		const manager = openAt100();
		expect(manager.evaluate(SYMBOL, liveTick(1, 101))).toBeNull();
		expect(stopOf(manager)).toBe(98);
		expect(manager.evaluate(SYMBOL, liveTick(2, 102))).toBeNull();
		expect(stopOf(manager)).toBe(100);
		expect(manager.evaluate(SYMBOL, liveTick(3, 100.5))).toBeNull();
		expect(stopOf(manager)).toBe(100);
		expect(manager.get(SYMBOL)?.breakevenMoved).toBe(true);
	});

	it("closes at the stop when a bar trades through it", () => {
		const manager = openAt100();
		const instruction = manager.evaluate(SYMBOL, {
			timestamp: 1,
			open: 100.5,
			high: 101,
			low: 97,
			price: 99,
		});
		expect(instruction).toMatchObject({
			reason: "stop_loss",
			price: 98,
			quantity: 1,
			side: "sell",
			partial: false,
		});
	});

	it("fills a gapped stop at the bar open", () => {
		const manager = openAt100({}, { direction: "SHORT" });
		expect(stopOf(manager)).toBe(102);
		const instruction = manager.evaluate(SYMBOL, {
			timestamp: 1,
			open: 103,
			high: 104,
			low: 101,
			price: 103.5,
		});
		expect(instruction?.reason).toBe("stop_loss");
		expect(instruction?.price).toBe(103);
		expect(instruction?.side).toBe("buy");
	});

	it("checks the stop before the target on the same bar", () => {
		const manager = openAt100();
		const instruction = manager.evaluate(SYMBOL, {
			timestamp: 1,
			open: 100,
			high: 105,
			low: 97,
			price: 101,
		});
		expect(instruction?.reason).toBe("stop_loss");
	});

	it("moves the stop to breakeven and takes profit on the same tick", () => {
		const manager = openAt100({ exitPolicy: "full" });
		const instruction = manager.evaluate(SYMBOL, liveTick(1, 104));
		expect(instruction).toMatchObject({ reason: "take_profit", price: 104, quantity: 1 });
		expect(stopOf(manager)).toBe(100);
		expect(manager.get(SYMBOL)?.state).toBe("TARGET_HIT");
	});

	it("takes the first partial on a bar that trades through the target", () => {
		const manager = openAt100();
		const instruction = manager.evaluate(SYMBOL, {
			timestamp: 1,
			open: 100,
			high: 104.5,
			low: 99.5,
			price: 101,
		});
		expect(instruction).toMatchObject({
			reason: "partial_take_profit",
			price: 104,
			quantity: 0.5,
			partial: true,
		});
		expect(stopOf(manager)).toBe(100);
	});

	it("closes half at the target and trails the rest", () => {
		const manager = openAt100({}, {}, 0.1);
		manager.evaluate(SYMBOL, liveTick(1, 102));
		const partial = manager.evaluate(SYMBOL, liveTick(2, 104));
		expect(partial).toMatchObject({
			reason: "partial_take_profit",
			quantity: 0.5,
			price: 104,
			partial: true,
		});
		if (!partial) {
			throw new Error("expected a partial close");
		}

		const trade = manager.applyClose(partial, closeFill(partial, { fee: 0.05 }));
		expect(trade.partial).toBe(true);
		expect(trade.margin).toBe(10);
		expect(trade.fees).toBeCloseTo(0.1);
		expect(trade.pnl).toBeCloseTo(1.9);
		expect(trade.pnlPct).toBeCloseTo(0.19);

		const remainder = manager.get(SYMBOL);
		expect(remainder?.quantity).toBe(0.5);
		expect(remainder?.margin).toBe(10);
		expect(remainder?.state).toBe("TRAILING");
		expect(remainder?.trailing).toEqual({ armed: true, bestPrice: 104, distance: 3 });

		expect(manager.evaluate(SYMBOL, liveTick(3, 106))).toBeNull();
		expect(stopOf(manager)).toBe(103);
		expect(manager.evaluate(SYMBOL, liveTick(4, 105))).toBeNull();
		expect(stopOf(manager)).toBe(103);
		const exit = manager.evaluate(SYMBOL, liveTick(5, 102.9));
		expect(exit).toMatchObject({ reason: "trailing_stop", price: 102.9, quantity: 0.5 });
	});

	it("only tightens a short trailing stop", () => {
		const manager = openAt100({}, { direction: "SHORT" });
		manager.evaluate(SYMBOL, liveTick(1, 98));
		expect(stopOf(manager)).toBe(100);
		const partial = manager.evaluate(SYMBOL, liveTick(2, 96));
		if (!partial) {
			throw new Error("expected a partial close");
		}
		manager.applyClose(partial, closeFill(partial));

		const stops: Array<number | undefined> = [];
		for (const [index, price] of [95, 94, 95.5, 96.5, 93].entries()) {
			expect(manager.evaluate(SYMBOL, liveTick(3 + index, price))).toBeNull();
			stops.push(stopOf(manager));
		}
		expect(stops).toEqual([98, 97, 97, 97, 96]);

		const exit = manager.evaluate(SYMBOL, liveTick(10, 96));
		expect(exit).toMatchObject({ reason: "trailing_stop", price: 96, side: "buy" });
	});

	it("arms trailing at the target under the trail policy", () => {
		const manager = openAt100({ exitPolicy: "trail" });
		manager.evaluate(SYMBOL, liveTick(1, 102));
		expect(manager.evaluate(SYMBOL, liveTick(2, 105))).toBeNull();
		expect(stopOf(manager)).toBe(104);
		expect(manager.get(SYMBOL)?.state).toBe("TRAILING");
		const exit = manager.evaluate(SYMBOL, liveTick(3, 103.9));
		expect(exit).toMatchObject({ reason: "trailing_stop", price: 103.9, quantity: 1 });
	});

	it("books fees and removes the position on a full close", () => {
		const manager = openAt100({}, {}, 0.1);
		const closed: string[] = [];
		manager.onClose((trade) => closed.push(trade.positionId));
		const instruction = manager.evaluate(SYMBOL, liveTick(1, 97.5));
		if (!instruction) {
			throw new Error("expected a stop");
		}
		const trade = manager.applyClose(instruction, closeFill(instruction, { fee: 0.0975 }));
		expect(trade.reason).toBe("stop_loss");
		expect(trade.exitPrice).toBe(97.5);
		expect(trade.pnl).toBeCloseTo(-2.6975);
		expect(trade.pnlPct).toBeCloseTo(-0.134875);
		expect(manager.has(SYMBOL)).toBe(false);
		expect(closed).toEqual([instruction.positionId]);
	});

	it("rejects a close for an unknown position", () => {
		const manager = openAt100();
		const instruction = manager.evaluate(SYMBOL, liveTick(1, 97));
		if (!instruction) {
			throw new Error("expected a stop");
		}
		const stale = { ...instruction, positionId: "other" };
		expect(() => manager.applyClose(stale, closeFill(stale))).toThrow(StateConsistencyError);
		expect(manager.has(SYMBOL)).toBe(true);
	});

	it("flags an oversized close fill and keeps the position", () => {
		const manager = openAt100();
		const instruction = manager.evaluate(SYMBOL, liveTick(1, 97));
		if (!instruction) {
			throw new Error("expected a stop");
		}
		expect(() => manager.applyClose(instruction, closeFill(instruction, { quantity: 2 }))).toThrow(
			"does not fit open quantity 1"
		);
		expect(manager.get(SYMBOL)?.flag).toBe("fill_quantity_mismatch");
	});

	it("surfaces a failing close listener", () => {
		const manager = openAt100();
		const unsubscribe = manager.onClose(() => {
			throw new Error("boom");
		});
		const instruction = manager.evaluate(SYMBOL, liveTick(1, 97));
		if (!instruction) {
			throw new Error("expected a stop");
		}
		expect(() => manager.applyClose(instruction, closeFill(instruction))).toThrow(
			`${SYMBOL}: close listener failed after stop_loss: boom`
		);
		unsubscribe();
	});
});
