import type {
	Direction,
	ExchangePositionSnapshot,
	ExecutionClient,
	OrderFill,
	OrderRequest,
} from "@tradeloop/core";
import { ExecutionError } from "@tradeloop/core";
import type { SimulatedFillModel } from "./fillModel";

interface SimulatedPosition {
	direction: Direction;
	quantity: number;
	entryPrice: number;
	leverage: number;
	margin: number;
}

/**
 * In-process venue with margin accounting. Used by replay and paper trading;
 * nothing here touches the network.
 */
export class SimulatedExchange implements ExecutionClient {
	readonly venue = "simulated";
	private balance: number;
	private readonly positions = new Map<string, SimulatedPosition>();
	private orders = 0;

	constructor(
		startingBalance: number,
		private readonly fillModel: SimulatedFillModel
	) {
		this.balance = startingBalance;
	}

	async placeOrder(request: OrderRequest): Promise<OrderFill> {
		return request.reduceOnly ? this.reduce(request) : this.increase(request);
	}

	async getOpenPositions(): Promise<ExchangePositionSnapshot[]> {
		return [...this.positions.entries()].map(([symbol, position]) => ({
			symbol,
			direction: position.direction,
			quantity: position.quantity,
			entryPrice: position.entryPrice,
			leverage: position.leverage,
		}));
	}

	async getFreeBalance(): Promise<number> {
		return this.balance;
	}

	private increase(request: OrderRequest): OrderFill {
		if (!(request.quantity > 0) || !(request.referencePrice > 0)) {
			throw new ExecutionError(
				`invalid order for ${request.symbol}: quantity ${request.quantity} at ${request.referencePrice}`,
				"terminal"
			);
		}
		const direction: Direction = request.side === "buy" ? "LONG" : "SHORT";
		const existing = this.positions.get(request.symbol);
		if (existing && existing.direction !== direction) {
			throw new ExecutionError(
				`${request.symbol} already holds a ${existing.direction} position`,
				"terminal"
			);
		}
		const { price, fee } = this.fillModel.fill(request);
		const margin = (price * request.quantity) / request.leverage;
		if (margin + fee > this.balance) {
			throw new ExecutionError(
				`insufficient balance: need ${(margin + fee).toFixed(2)}, have ${this.balance.toFixed(2)}`,
				"terminal"
			);
		}
		this.balance -= margin + fee;
		if (existing) {
			const quantity = existing.quantity + request.quantity;
			existing.entryPrice =
				(existing.entryPrice * existing.quantity + price * request.quantity) / quantity;
			existing.quantity = quantity;
			existing.margin += margin;
		} else {
			this.positions.set(request.symbol, {
				direction,
				quantity: request.quantity,
				entryPrice: price,
				leverage: request.leverage,
				margin,
			});
		}
		return this.fill(request, price, request.quantity, fee);
	}

	private reduce(request: OrderRequest): OrderFill {
		const position = this.positions.get(request.symbol);
		const closingSide = position?.direction === "LONG" ? "sell" : "buy";
		if (!position || request.side !== closingSide) {
			throw new ExecutionError(`no ${request.side} position to reduce on ${request.symbol}`, "terminal");
		}
		const quantity = Math.min(request.quantity, position.quantity);
		const { price, fee } = this.fillModel.fill({ ...request, quantity });
		const sign = position.direction === "LONG" ? 1 : -1;
		const released = position.margin * (quantity / position.quantity);
		this.balance += released + sign * (price - position.entryPrice) * quantity - fee;
		position.quantity -= quantity;
		position.margin -= released;
		if (position.quantity <= 1e-12) {
			this.positions.delete(request.symbol);
		}
		return this.fill(request, price, quantity, fee);
	}

	private fill(request: OrderRequest, price: number, quantity: number, fee: number): OrderFill {
		this.orders += 1;
		return {
			orderId: `sim-${this.orders}`,
			symbol: request.symbol,
			side: request.side,
			price,
			quantity,
			fee,
			timestamp: request.timestamp,
		};
	}
}
