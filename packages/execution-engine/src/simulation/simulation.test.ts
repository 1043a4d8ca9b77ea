import { describe, expect, it } from "vitest";
import { ExecutionError } from "@tradeloop/core";
import type { OrderRequest } from "@tradeloop/core";
import { SimulatedFillModel, mulberry32 } from "./fillModel";
import { SimulatedExchange } from "./SimulatedExchange";

const order = (overrides: Partial<OrderRequest> = {}): OrderRequest => ({
	symbol: "BTC/USDT:USDT",
	side: "buy",
	quantity: 1,
	reduceOnly: false,
	referencePrice: 100,
	leverage: 5,
	timestamp: 1,
	...overrides,
});

const frictionless = (): SimulatedFillModel =>
	new SimulatedFillModel({ feePct: 0, slippagePct: 0, slippageMode: "fixed", seed: 1 });

describe("SimulatedFillModel", () => {
	it("slips against the order and charges fees on notional", () => {
		const model = new SimulatedFillModel({
			feePct: 0.001,
			slippagePct: 0.01,
			slippageMode: "fixed",
			seed: 1,
		});
		const buy = model.fill({ side: "buy", quantity: 2, referencePrice: 100 });
		expect(buy.price).toBeCloseTo(101);
		expect(buy.fee).toBeCloseTo(0.202);
		const sell = model.fill({ side: "sell", quantity: 2, referencePrice: 100 });
		expect(sell.price).toBeCloseTo(99);
		expect(sell.fee).toBeCloseTo(0.198);
	});

	it("draws seeded slippage reproducibly", () => {
		const options = { feePct: 0, slippagePct: 0.01, slippageMode: "random" as const, seed: 42 };
		const first = new SimulatedFillModel(options);
		const second = new SimulatedFillModel(options);
		for (let i = 0; i < 5; i += 1) {
			const a = first.fill({ side: "buy", quantity: 1, referencePrice: 100 });
			const b = second.fill({ side: "buy", quantity: 1, referencePrice: 100 });
			expect(a.price).toBe(b.price);
			expect(a.price).toBeGreaterThanOrEqual(100);
			expect(a.price).toBeLessThan(101);
		}
	});

	it("generates values in the unit interval", () => {
		const next = mulberry32(7);
		const replay = mulberry32(7);
		for (let i = 0; i < 20; i += 1) {
			const value = next();
			expect(value).toBe(replay());
			expect(value).toBeGreaterThanOrEqual(0);
			expect(value).toBeLessThan(1);
		}
	});
});

describe("SimulatedExchange", () => {
	it("locks margin on entry and releases it with pnl on exit", async () => {
		const exchange = new SimulatedExchange(1000, frictionless());
		const entry = await exchange.placeOrder(order());
		expect(entry.orderId).toBe("sim-1");
		expect(await exchange.getFreeBalance()).toBe(980);
		expect(await exchange.getOpenPositions()).toEqual([
			{ symbol: "BTC/USDT:USDT", direction: "LONG", quantity: 1, entryPrice: 100, leverage: 5 },
		]);

		const exit = await exchange.placeOrder(
			order({ side: "sell", reduceOnly: true, referencePrice: 110, timestamp: 2 })
		);
		expect(exit).toMatchObject({ orderId: "sim-2", price: 110, quantity: 1, timestamp: 2 });
		expect(await exchange.getFreeBalance()).toBe(1010);
		expect(await exchange.getOpenPositions()).toEqual([]);
	});

	it("books a short that profits when price falls", async () => {
		const exchange = new SimulatedExchange(1000, frictionless());
		await exchange.placeOrder(order({ side: "sell", quantity: 2 }));
		expect(await exchange.getFreeBalance()).toBe(960);
		await exchange.placeOrder(order({ side: "buy", quantity: 1, reduceOnly: true, referencePrice: 90 }));
		expect(await exchange.getFreeBalance()).toBe(990);
		const [position] = await exchange.getOpenPositions();
		expect(position).toMatchObject({ direction: "SHORT", quantity: 1 });
	});

	it("rejects entries the balance cannot margin", async () => {
		const exchange = new SimulatedExchange(1000, frictionless());
		const attempt = exchange.placeOrder(order({ quantity: 100, leverage: 1 }));
		await expect(attempt).rejects.toBeInstanceOf(ExecutionError);
		await expect(exchange.placeOrder(order({ quantity: 100, leverage: 1 }))).rejects.toMatchObject({
			kind: "terminal",
		});
		expect(await exchange.getFreeBalance()).toBe(1000);
	});

	it("rejects reducing a position that does not exist", async () => {
		const exchange = new SimulatedExchange(1000, frictionless());
		await expect(
			exchange.placeOrder(order({ side: "sell", reduceOnly: true }))
		).rejects.toThrow("no sell position to reduce on BTC/USDT:USDT");
	});
});
