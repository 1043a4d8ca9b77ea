import type {
	ClosedTrade,
	Direction,
	ExchangePositionSnapshot,
	Position,
	Regime,
	StrategyId,
} from "@tradeloop/core";
import { createLogger, exitSide } from "@tradeloop/core";
import type { PositionLifecycleManager } from "./lifecycle/PositionLifecycleManager";

const logger = createLogger("reconcile");

export type DiscrepancyKind = "ghost" | "orphan" | "size_mismatch" | "side_mismatch";

export interface Discrepancy {
	kind: DiscrepancyKind;
	symbol: string;
	tracked: { direction: Direction; quantity: number } | null;
	exchange: { direction: Direction; quantity: number } | null;
}

export interface ReconcileOptions {
	timestamp: number;
	/** Last price per symbol, used to book positions that vanished from the venue. */
	prices: Readonly<Record<string, number>>;
	noiseFloorPct: number;
	rewardRiskRatio: number;
	defaultLeverage: number;
	/** Relative quantity difference tolerated before resizing. */
	quantityTolerance?: number;
	orphanStrategy?: StrategyId;
	orphanRegime?: Regime;
}

export interface ReconcileReport {
	discrepancies: Discrepancy[];
	closed: ClosedTrade[];
}

/**
 * Emergency stop for an adopted position: twice the noise floor away from
 * entry, with the target at the default reward:risk.
 */
export const orphanPosition = (
	snapshot: ExchangePositionSnapshot,
	options: ReconcileOptions
): Position => {
	const sign = snapshot.direction === "LONG" ? 1 : -1;
	const distance = snapshot.entryPrice * options.noiseFloorPct * 2;
	const leverage = snapshot.leverage ?? options.defaultLeverage;
	const stopPrice = snapshot.entryPrice - sign * distance;
	return {
		id: `${snapshot.symbol}-adopted-${options.timestamp}`,
		symbol: snapshot.symbol,
		direction: snapshot.direction,
		entryPrice: snapshot.entryPrice,
		quantity: snapshot.quantity,
		initialQuantity: snapshot.quantity,
		leverage,
		margin: (snapshot.entryPrice * snapshot.quantity) / leverage,
		entryFees: 0,
		stopPrice,
		initialStopPrice: stopPrice,
		takeProfitPrice: snapshot.entryPrice + sign * distance * options.rewardRiskRatio,
		openedAt: options.timestamp,
		strategyId: options.orphanStrategy ?? "trend_following",
		confidenceAtEntry: 0,
		regimeAtEntry: options.orphanRegime ?? "RANGING",
		entryVolatility: distance,
		state: "MONITORING",
		trailing: { armed: false, bestPrice: null, distance },
		breakevenMoved: false,
		partialClosed: false,
		realizedPnl: 0,
		flag: "adopted",
	};
};

/**
 * Brings tracked positions in line with the venue, which is treated as
 * ground truth. Every divergence is logged at error level.
 */
export function reconcilePositions(
	lifecycle: PositionLifecycleManager,
	exchangePositions: readonly ExchangePositionSnapshot[],
	options: ReconcileOptions
): ReconcileReport {
	const tolerance = options.quantityTolerance ?? 1e-6;
	const venue = new Map(exchangePositions.map((snapshot) => [snapshot.symbol, snapshot]));
	const discrepancies: Discrepancy[] = [];
	const closed: ClosedTrade[] = [];

	const record = (discrepancy: Discrepancy): void => {
		discrepancies.push(discrepancy);
		logger.error("position_discrepancy", { ...discrepancy });
	};

	const settle = (position: Position): void => {
		const price = options.prices[position.symbol] ?? position.stopPrice;
		closed.push(
			lifecycle.applyClose(
				{
					positionId: position.id,
					symbol: position.symbol,
					direction: position.direction,
					side: exitSide(position.direction),
					quantity: position.quantity,
					price,
					reason: "reconciled",
					partial: false,
					timestamp: options.timestamp,
				},
				{
					orderId: `reconcile-${position.id}`,
					symbol: position.symbol,
					side: exitSide(position.direction),
					price,
					quantity: position.quantity,
					fee: 0,
					timestamp: options.timestamp,
				}
			)
		);
	};

	for (const position of lifecycle.list()) {
		const snapshot = venue.get(position.symbol);
		const tracked = { direction: position.direction, quantity: position.quantity };
		if (!snapshot) {
			record({ kind: "ghost", symbol: position.symbol, tracked, exchange: null });
			settle(position);
			continue;
		}
		const exchange = { direction: snapshot.direction, quantity: snapshot.quantity };
		if (snapshot.direction !== position.direction) {
			record({ kind: "side_mismatch", symbol: position.symbol, tracked, exchange });
			settle(position);
			lifecycle.adopt(orphanPosition(snapshot, options));
			continue;
		}
		if (Math.abs(snapshot.quantity - position.quantity) > tolerance * snapshot.quantity) {
			record({ kind: "size_mismatch", symbol: position.symbol, tracked, exchange });
			lifecycle.resize(position.symbol, snapshot.quantity);
		}
	}

	for (const snapshot of exchangePositions) {
		if (snapshot.quantity <= 0 || lifecycle.has(snapshot.symbol)) {
			continue;
		}
		record({
			kind: "orphan",
			symbol: snapshot.symbol,
			tracked: null,
			exchange: { direction: snapshot.direction, quantity: snapshot.quantity },
		});
		lifecycle.adopt(orphanPosition(snapshot, options));
	}

	return { discrepancies, closed };
}
