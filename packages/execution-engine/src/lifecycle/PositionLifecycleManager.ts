import type {
	ClosedTrade,
	Direction,
	LifecycleConfig,
	OrderFill,
	Position,
} from "@tradeloop/core";
import { StateConsistencyError, createLogger, describeError, exitSide } from "@tradeloop/core";
import type {
	CloseListener,
	LifecycleInstruction,
	PositionOpenRequest,
	PriceTick,
} from "./types";

const logger = createLogger("lifecycle");

const QUANTITY_EPSILON = 1e-12;

const sideSign = (direction: Direction): 1 | -1 => (direction === "LONG" ? 1 : -1);

/** True when `candidate` is strictly closer to price than `stop` for this side. */
const tightens = (direction: Direction, candidate: number, stop: number): boolean =>
	sideSign(direction) * (candidate - stop) > 0;

const clonePosition = (position: Position): Position => ({
	...position,
	trailing: { ...position.trailing },
});

/**
 * Owns the open-position set. `evaluate` is the only place stops move;
 * closes are applied synchronously through `applyClose` once the fill is
 * known, and close listeners run inside that call.
 */
export class PositionLifecycleManager {
	private readonly positions = new Map<string, Position>();
	private readonly listeners: CloseListener[] = [];
	private sequence = 0;

	constructor(private readonly config: LifecycleConfig) {}

	onClose(listener: CloseListener): () => void {
		this.listeners.push(listener);
		return () => {
			const index = this.listeners.indexOf(listener);
			if (index >= 0) {
				this.listeners.splice(index, 1);
			}
		};
	}

	has(symbol: string): boolean {
		return this.positions.has(symbol);
	}

	get(symbol: string): Position | null {
		const position = this.positions.get(symbol);
		return position ? clonePosition(position) : null;
	}

	list(): Position[] {
		return [...this.positions.values()].map(clonePosition);
	}

	/**
	 * Tracks a filled entry. Stop and target keep the planned distances from
	 * the actual fill price.
	 */
	open(request: PositionOpenRequest, fill: OrderFill): Position {
		if (this.positions.has(request.symbol)) {
			throw new StateConsistencyError(request.symbol, "position already tracked");
		}
		const sign = sideSign(request.direction);
		const stopPrice = fill.price - sign * request.stopDistance;
		this.sequence += 1;
		const position: Position = {
			id: `${request.symbol}-${fill.timestamp}-${this.sequence}`,
			symbol: request.symbol,
			direction: request.direction,
			entryPrice: fill.price,
			quantity: fill.quantity,
			initialQuantity: fill.quantity,
			leverage: request.leverage,
			margin: (fill.price * fill.quantity) / request.leverage,
			entryFees: fill.fee,
			stopPrice,
			initialStopPrice: stopPrice,
			takeProfitPrice: fill.price + sign * request.stopDistance * request.rewardRiskRatio,
			openedAt: fill.timestamp,
			strategyId: request.strategyId,
			confidenceAtEntry: request.confidence,
			regimeAtEntry: request.regime,
			entryVolatility: request.volatility,
			state: "OPEN",
			trailing: {
				armed: false,
				bestPrice: null,
				distance: request.volatility * this.config.trailingAtrMultiple,
			},
			breakevenMoved: false,
			partialClosed: false,
			realizedPnl: 0,
		};
		this.positions.set(position.symbol, position);
		return clonePosition(position);
	}

	/** Takes over a position found on the venue but not tracked here. */
	adopt(position: Position): void {
		this.positions.set(position.symbol, clonePosition(position));
	}

	remove(symbol: string): Position | null {
		const position = this.positions.get(symbol);
		this.positions.delete(symbol);
		return position ? clonePosition(position) : null;
	}

	/** Aligns the tracked quantity with the venue; margin and fees scale with it. */
	resize(symbol: string, quantity: number): void {
		const position = this.require(symbol);
		const ratio = position.quantity > 0 ? quantity / position.quantity : 0;
		position.margin *= ratio;
		position.entryFees *= ratio;
		position.quantity = quantity;
	}

	flag(symbol: string, reason: string): void {
		const position = this.positions.get(symbol);
		if (position) {
			position.flag = reason;
		}
	}

	/**
	 * Walks the exit rules for one position against one tick and returns the
	 * close to execute, if any. Stop moves are applied immediately.
	 */
	evaluate(symbol: string, tick: PriceTick): LifecycleInstruction | null {
		const position = this.positions.get(symbol);
		if (!position) {
			return null;
		}
		const { direction } = position;
		const sign = sideSign(direction);
		const adverse = direction === "LONG" ? tick.low : tick.high;
		const favorable = direction === "LONG" ? tick.high : tick.low;
		if (position.state === "OPEN") {
			position.state = "MONITORING";
		}

		if (sign * (adverse - position.stopPrice) <= 0) {
			const gapped = sign * (tick.open - position.stopPrice) <= 0;
			position.state = "STOPPED";
			return this.instruction(
				position,
				tick,
				position.quantity,
				gapped ? tick.open : position.stopPrice,
				position.trailing.armed ? "trailing_stop" : "stop_loss"
			);
		}

		const initialRisk = Math.abs(position.entryPrice - position.initialStopPrice);
		const reachedTarget = sign * (favorable - position.takeProfitPrice) >= 0;
		if (
			!position.breakevenMoved &&
			sign * (favorable - position.entryPrice) >= this.config.breakevenTriggerR * initialRisk
		) {
			position.breakevenMoved = true;
			if (tightens(direction, position.entryPrice, position.stopPrice)) {
				logger.info("stop_moved_to_breakeven", {
					symbol,
					from: position.stopPrice,
					to: position.entryPrice,
				});
				position.stopPrice = position.entryPrice;
			}
		}
		if (!position.trailing.armed && reachedTarget) {
			switch (this.config.exitPolicy) {
				case "full":
					position.state = "TARGET_HIT";
					return this.instruction(
						position,
						tick,
						position.quantity,
						position.takeProfitPrice,
						"take_profit"
					);
				case "staircase":
					if (!position.partialClosed) {
						return this.instruction(
							position,
							tick,
							position.quantity * this.config.partialCloseFraction,
							position.takeProfitPrice,
							"partial_take_profit"
						);
					}
					this.armTrailing(position, favorable);
					break;
				case "trail":
					this.armTrailing(position, favorable);
					if (tightens(direction, position.takeProfitPrice, position.stopPrice)) {
						position.stopPrice = position.takeProfitPrice;
					}
					break;
			}
		}

		if (!position.trailing.armed) {
			return null;
		}

		const best = position.trailing.bestPrice;
		if (best === null || sign * (favorable - best) > 0) {
			position.trailing.bestPrice = favorable;
		}
		const anchor = position.trailing.bestPrice ?? favorable;
		const candidate = anchor - sign * position.trailing.distance;
		if (tightens(direction, candidate, position.stopPrice)) {
			position.stopPrice = candidate;
		}

		if (sign * (tick.price - position.stopPrice) <= 0) {
			position.state = "STOPPED";
			return this.instruction(position, tick, position.quantity, tick.price, "trailing_stop");
		}
		return null;
	}

	/**
	 * Books a fill against the position and notifies close listeners. Throws
	 * `StateConsistencyError` when the fill cannot be matched or a listener
	 * fails; the caller must not drop the position silently.
	 */
	applyClose(instruction: LifecycleInstruction, fill: OrderFill): ClosedTrade {
		const position = this.positions.get(instruction.symbol);
		if (!position || position.id !== instruction.positionId) {
			throw new StateConsistencyError(
				instruction.symbol,
				`no tracked position ${instruction.positionId} for close`
			);
		}
		if (fill.quantity <= 0 || fill.quantity > position.quantity + QUANTITY_EPSILON) {
			position.flag = "fill_quantity_mismatch";
			throw new StateConsistencyError(
				instruction.symbol,
				`close fill ${fill.quantity} does not fit open quantity ${position.quantity}`
			);
		}

		const sign = sideSign(position.direction);
		const quantity = Math.min(fill.quantity, position.quantity);
		const share = quantity / position.quantity;
		const margin = position.margin * share;
		const entryFee = position.entryFees * share;
		const fees = fill.fee + entryFee;
		const pnl = sign * (fill.price - position.entryPrice) * quantity - fees;
		const remaining = position.quantity - quantity;
		const partial = remaining > QUANTITY_EPSILON;

		position.quantity = partial ? remaining : 0;
		position.margin -= margin;
		position.entryFees -= entryFee;
		position.realizedPnl += pnl;
		position.flag = undefined;

		if (partial) {
			position.partialClosed = true;
			position.state = "PARTIALLY_CLOSED";
			if (instruction.reason === "partial_take_profit") {
				position.breakevenMoved = true;
				if (tightens(position.direction, position.entryPrice, position.stopPrice)) {
					position.stopPrice = position.entryPrice;
				}
				this.armTrailing(position, instruction.price);
			}
		} else {
			position.state = "CLOSED";
			this.positions.delete(position.symbol);
		}

		const trade: ClosedTrade = {
			positionId: position.id,
			symbol: position.symbol,
			direction: position.direction,
			strategyId: position.strategyId,
			regimeAtEntry: position.regimeAtEntry,
			entryPrice: position.entryPrice,
			exitPrice: fill.price,
			quantity,
			margin,
			fees,
			pnl,
			pnlPct: margin > 0 ? pnl / margin : 0,
			reason: instruction.reason,
			partial,
			openedAt: position.openedAt,
			closedAt: fill.timestamp,
		};

		for (const listener of this.listeners) {
			try {
				listener(trade);
			} catch (error) {
				if (partial) {
					position.flag = "close_listener_failed";
				}
				throw new StateConsistencyError(
					trade.symbol,
					`close listener failed after ${trade.reason}: ${describeError(error)}`
				);
			}
		}
		return trade;
	}

	private armTrailing(position: Position, price: number): void {
		position.trailing.armed = true;
		position.trailing.bestPrice = price;
		position.state = "TRAILING";
	}

	private instruction(
		position: Position,
		tick: PriceTick,
		quantity: number,
		price: number,
		reason: LifecycleInstruction["reason"]
	): LifecycleInstruction {
		return {
			positionId: position.id,
			symbol: position.symbol,
			direction: position.direction,
			side: exitSide(position.direction),
			quantity,
			price,
			reason,
			partial: reason === "partial_take_profit",
			timestamp: tick.timestamp,
		};
	}

	private require(symbol: string): Position {
		const position = this.positions.get(symbol);
		if (!position) {
			throw new StateConsistencyError(symbol, "position is not tracked");
		}
		return position;
	}
}
