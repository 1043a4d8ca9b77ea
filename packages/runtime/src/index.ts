export { DecisionPipeline, skippedDecision } from "./pipeline/DecisionPipeline";
export type {
	Decision,
	DecisionInput,
	DecisionPipelineDeps,
	SymbolMarketData,
} from "./pipeline/DecisionPipeline";
export { TradingEngine } from "./loop/TradingEngine";
export type {
	EngineStatus,
	SymbolFailure,
	SymbolTick,
	TickInput,
	TickPhase,
	TickResult,
	TradingEngineOptions,
} from "./loop/TradingEngine";
export { TraderControl, startTrader } from "./startTrader";
export type { ExternalSignalSource, StartTraderOptions, TraderStatus } from "./startTrader";
export { runBacktest } from "./backtest/backtestRunner";
export { ReplayFeed } from "./backtest/ReplayFeed";
export { generalizes, runWalkForward, walkForwardWindows } from "./backtest/walkForward";
export type { WalkForwardOptions, WindowBounds } from "./backtest/walkForward";
export type {
	BacktestOptions,
	BacktestResult,
	DecisionOutcome,
	ReplayExternalSignals,
	SymbolSeries,
	WalkForwardResult,
	WalkForwardSegment,
	WalkForwardWindow,
} from "./backtest/backtestTypes";
export { buildSnapshotRecord, positionView, positionViews, runtimeLogger } from "./runtimeShared";
export type { RuntimeMode } from "./runtimeShared";
