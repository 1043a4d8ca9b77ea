export { AdaptiveController, computeOverrides } from "./AdaptiveController";
export {
	EMPTY_METRICS,
	PerformanceTracker,
	computeMetrics,
	pnlTrend,
} from "./PerformanceTracker";
export type { PerformanceMetrics, PerformanceRecord } from "./PerformanceTracker";
