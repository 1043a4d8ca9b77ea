export { PositionLifecycleManager } from "./lifecycle/PositionLifecycleManager";
export { liveTick } from "./lifecycle/types";
export type {
	CloseListener,
	LifecycleInstruction,
	PositionOpenRequest,
	PriceTick,
} from "./lifecycle/types";
export { PortfolioLedger, unrealizedPnl } from "./portfolioLedger";
export type { LedgerStats, LedgerUpdate } from "./portfolioLedger";
export { SimulatedFillModel, mulberry32 } from "./simulation/fillModel";
export type { FillModelOptions, SimulatedFill } from "./simulation/fillModel";
export { SimulatedExchange } from "./simulation/SimulatedExchange";
export { backoffDelay, sleep, withRetry, withTimeout } from "./retry";
export type { RetryOptions, Sleep } from "./retry";
export { orphanPosition, reconcilePositions } from "./reconcile";
export type {
	Discrepancy,
	DiscrepancyKind,
	ReconcileOptions,
	ReconcileReport,
} from "./reconcile";
