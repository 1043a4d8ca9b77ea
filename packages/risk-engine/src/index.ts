export { RiskValidator } from "./RiskValidator";
export type { RiskValidatorOptions } from "./RiskValidator";
export { confidenceScale, drawdownPct, drawdownScale, sizePosition } from "./sizing";
export type { SizingInput, SizingResult } from "./sizing";
export { RISK_CHECKS } from "./types";
export type {
	BreakerReason,
	BreakerState,
	EntryPlan,
	MarketContext,
	RiskCheck,
	RiskDecision,
	SizingScales,
	SymbolRiskState,
} from "./types";
