import ccxt from "ccxt";
import type { Exchange, OHLCV } from "ccxt";
import type {
	Candle,
	ExchangeConfig,
	ExchangePositionSnapshot,
	ExecutionClient,
	MarketDataClient,
	OrderFill,
	OrderRequest,
	OrderSide,
} from "@tradeloop/core";
import {
	ConfigValidationError,
	ExecutionError,
	createLogger,
	isFiniteNumber,
} from "@tradeloop/core";
import { parseCandleRows } from "@tradeloop/data";
import { classifyCcxtError } from "./errors";

const logger = createLogger("exchange:ccxt");

export interface CcxtOrder {
	id: string;
	price?: number;
	average?: number;
	filled?: number;
	fee?: { cost?: number };
	timestamp?: number;
}

export interface CcxtPosition {
	symbol: string;
	side?: string;
	contracts?: number;
	contractSize?: number;
	entryPrice?: number;
	leverage?: number;
	unrealizedPnl?: number;
}

/** The part of a ccxt exchange instance this client drives. */
export interface CcxtVenue {
	loadMarkets(): Promise<unknown>;
	market(symbol: string): { contractSize?: number };
	fetchOHLCV(symbol: string, timeframe?: string, since?: number, limit?: number): Promise<OHLCV[]>;
	createOrder(
		symbol: string,
		type: string,
		side: OrderSide,
		amount: number,
		price?: number,
		params?: Record<string, unknown>
	): Promise<CcxtOrder>;
	fetchPositions(symbols?: string[]): Promise<CcxtPosition[]>;
	fetchBalance(): Promise<Record<string, unknown>>;
	setLeverage(leverage: number, symbol?: string): Promise<unknown>;
}

type VenueFactory = (options: Record<string, unknown>) => Exchange;

/** USDT-margined perpetual venues, keyed by ccxt exchange id. */
const VENUES: Record<string, VenueFactory> = {
	binanceusdm: (options) => new ccxt.binanceusdm(options),
	bybit: (options) => new ccxt.bybit(options),
	okx: (options) => new ccxt.okx(options),
	mexc: (options) => new ccxt.mexc(options),
};

export const SUPPORTED_VENUES = Object.keys(VENUES);

export const createCcxtVenue = (config: ExchangeConfig, timeoutMs: number): Exchange => {
	const factory = VENUES[config.id];
	if (!factory) {
		throw new ConfigValidationError([
			`exchange "${config.id}" is not supported (use one of ${SUPPORTED_VENUES.join(", ")})`,
		]);
	}
	const exchange = factory({
		apiKey: config.credentials.apiKey || undefined,
		secret: config.credentials.apiSecret || undefined,
		enableRateLimit: true,
		timeout: timeoutMs,
		options: {
			defaultType: config.defaultType,
			defaultSubType: "linear",
		},
	});
	if (config.testnet) {
		exchange.setSandboxMode(true);
	}
	return exchange;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null;

const firstPositive = (...values: Array<number | undefined>): number | undefined =>
	values.find((value) => isFiniteNumber(value) && value > 0);

/**
 * Market data and order execution on a ccxt venue. Quantities are in base
 * units on this side and converted to contracts for the venue. Every
 * failure surfaces as an `ExecutionError` classified for retry.
 */
export class CcxtExchangeClient implements ExecutionClient, MarketDataClient {
	private marketsLoaded = false;
	private readonly leverageBySymbol = new Map<string, number>();

	constructor(
		private readonly exchange: CcxtVenue,
		readonly venue: string,
		private readonly quoteCurrency = "USDT"
	) {}

	static fromConfig(config: ExchangeConfig, timeoutMs: number): CcxtExchangeClient {
		return new CcxtExchangeClient(createCcxtVenue(config, timeoutMs), config.id, config.quoteCurrency);
	}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit = 500,
		since?: number
	): Promise<Candle[]> {
		try {
			await this.ensureMarketsLoaded();
			const rows = await this.exchange.fetchOHLCV(symbol, timeframe, since, limit);
			return parseCandleRows(rows, symbol, timeframe);
		} catch (error) {
			throw classifyCcxtError(error, `fetch_ohlcv ${symbol} ${timeframe}`);
		}
	}

	async placeOrder(request: OrderRequest): Promise<OrderFill> {
		try {
			await this.ensureMarketsLoaded();
			if (!request.reduceOnly) {
				await this.ensureLeverage(request.symbol, request.leverage);
			}
			const contractSize = this.contractSize(request.symbol);
			const amount = request.quantity / contractSize;
			const order = await this.exchange.createOrder(
				request.symbol,
				"market",
				request.side,
				amount,
				undefined,
				request.reduceOnly ? { reduceOnly: true } : {}
			);
			const fill: OrderFill = {
				orderId: order.id,
				symbol: request.symbol,
				side: request.side,
				price: firstPositive(order.average, order.price) ?? request.referencePrice,
				quantity: (firstPositive(order.filled) ?? amount) * contractSize,
				fee: order.fee?.cost ?? 0,
				timestamp: order.timestamp ?? request.timestamp,
			};
			logger.info("order_filled", {
				venue: this.venue,
				orderId: fill.orderId,
				symbol: fill.symbol,
				side: fill.side,
				price: fill.price,
				quantity: fill.quantity,
				reduceOnly: request.reduceOnly,
			});
			return fill;
		} catch (error) {
			throw classifyCcxtError(error, `place_order ${request.symbol}`);
		}
	}

	async getOpenPositions(): Promise<ExchangePositionSnapshot[]> {
		let positions: CcxtPosition[];
		try {
			await this.ensureMarketsLoaded();
			positions = await this.exchange.fetchPositions();
		} catch (error) {
			throw classifyCcxtError(error, "fetch_positions");
		}

		const snapshots: ExchangePositionSnapshot[] = [];
		for (const position of positions) {
			const contracts = Math.abs(position.contracts ?? 0);
			if (!contracts) {
				continue;
			}
			if (!isFiniteNumber(position.entryPrice)) {
				throw new ExecutionError(
					`fetch_positions: ${position.symbol} reported without an entry price`,
					"transient"
				);
			}
			snapshots.push({
				symbol: position.symbol,
				direction: position.side === "short" ? "SHORT" : "LONG",
				quantity: contracts * (firstPositive(position.contractSize) ?? 1),
				entryPrice: position.entryPrice,
				leverage: position.leverage,
				unrealizedPnl: position.unrealizedPnl,
			});
		}
		return snapshots;
	}

	async getFreeBalance(): Promise<number> {
		try {
			const balance = await this.exchange.fetchBalance();
			const quote = balance[this.quoteCurrency];
			return isRecord(quote) && isFiniteNumber(quote.free) ? quote.free : 0;
		} catch (error) {
			throw classifyCcxtError(error, "fetch_balance");
		}
	}

	private contractSize(symbol: string): number {
		return firstPositive(this.exchange.market(symbol).contractSize) ?? 1;
	}

	private async ensureLeverage(symbol: string, leverage: number): Promise<void> {
		if (this.leverageBySymbol.get(symbol) === leverage) {
			return;
		}
		await this.exchange.setLeverage(leverage, symbol);
		this.leverageBySymbol.set(symbol, leverage);
		logger.debug("leverage_set", { venue: this.venue, symbol, leverage });
	}

	private async ensureMarketsLoaded(): Promise<void> {
		if (this.marketsLoaded) {
			return;
		}
		await this.exchange.loadMarkets();
		this.marketsLoaded = true;
	}
}
