import type { OrderRequest, SlippageMode } from "@tradeloop/core";

/** Deterministic uniform generator in [0, 1). */
export const mulberry32 = (seed: number): (() => number) => {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
};

export interface FillModelOptions {
	feePct: number;
	slippagePct: number;
	slippageMode: SlippageMode;
	seed: number;
}

export interface SimulatedFill {
	price: number;
	fee: number;
}

/**
 * Fee per side on notional and slippage per fill, always against the order:
 * buys fill higher, sells lower. Random mode draws the slippage uniformly
 * from [0, slippagePct) with a seeded generator.
 */
export class SimulatedFillModel {
	private readonly random: () => number;

	constructor(private readonly options: FillModelOptions) {
		this.random = mulberry32(options.seed);
	}

	fill(request: Pick<OrderRequest, "side" | "quantity" | "referencePrice">): SimulatedFill {
		const slippage =
			this.options.slippageMode === "random"
				? this.options.slippagePct * this.random()
				: this.options.slippagePct;
		const direction = request.side === "buy" ? 1 : -1;
		const price = request.referencePrice * (1 + direction * slippage);
		return { price, fee: price * request.quantity * this.options.feePct };
	}
}
