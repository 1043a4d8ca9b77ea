export type {
	ExecutionClient,
	ExchangePositionSnapshot,
	OrderFill,
	OrderRequest,
} from "./ExecutionClient";
export type { MarketDataClient } from "./MarketDataClient";
