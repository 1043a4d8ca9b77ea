import type { Direction, OrderSide } from "../types";

/**
 * Open position as reported by the venue. Used as ground truth during
 * reconciliation.
 */
export interface ExchangePositionSnapshot {
	symbol: string;
	direction: Direction;
	quantity: number;
	entryPrice: number;
	leverage?: number;
	unrealizedPnl?: number;
}

export interface OrderRequest {
	symbol: string;
	side: OrderSide;
	quantity: number;
	/** Closing or reducing an existing position. */
	reduceOnly: boolean;
	/** Last known price; simulated venues fill around it. */
	referencePrice: number;
	leverage: number;
	timestamp: number;
}

export interface OrderFill {
	orderId: string;
	symbol: string;
	side: OrderSide;
	price: number;
	quantity: number;
	fee: number;
	timestamp: number;
}

/**
 * Order placement and account queries. Implementations throw
 * `ExecutionError` with `kind` set so callers can decide whether to retry.
 */
export interface ExecutionClient {
	readonly venue: string;

	/**
	 * Place a market order and resolve with the fill.
	 */
	placeOrder(request: OrderRequest): Promise<OrderFill>;

	/**
	 * Every non-flat position currently held on the venue.
	 */
	getOpenPositions(): Promise<ExchangePositionSnapshot[]>;

	/**
	 * Free quote balance (USDT) available for new margin.
	 */
	getFreeBalance(): Promise<number>;
}
