import type { ClosedTrade, PortfolioState, Position } from "@tradeloop/core";
import { utcDayStart } from "@tradeloop/core";

export interface LedgerStats {
	startingBalance: number;
	realizedPnl: number;
	peakValue: number;
	maxDrawdownPct: number;
	trades: {
		total: number;
		wins: number;
		losses: number;
		breakeven: number;
	};
	lastTrade?: ClosedTrade;
}

export const unrealizedPnl = (position: Position, price: number): number =>
	(position.direction === "LONG" ? 1 : -1) * (price - position.entryPrice) * position.quantity;

export interface LedgerUpdate {
	freeBalance: number;
	positions: readonly Position[];
	/** Last price per symbol; positions without one are valued at entry. */
	prices: Readonly<Record<string, number>>;
	timestamp: number;
}

/**
 * Portfolio aggregates owned by the tick loop: value, monotonic peak and the
 * UTC day-start value the daily loss limit is measured from.
 */
export class PortfolioLedger {
	private peakValue: number;
	private day: number | null = null;
	private dayStartValue: number;
	private realizedPnl = 0;
	private maxDrawdownPct = 0;
	private trades = { total: 0, wins: 0, losses: 0, breakeven: 0 };
	private lastTrade?: ClosedTrade;
	private latest: PortfolioState;

	constructor(private readonly startingBalance: number) {
		this.peakValue = startingBalance;
		this.dayStartValue = startingBalance;
		this.latest = {
			totalValue: startingBalance,
			freeBalance: startingBalance,
			peakValue: startingBalance,
			dayStartValue: startingBalance,
			dailyPnlPct: 0,
			openPositions: [],
		};
	}

	update(input: LedgerUpdate): PortfolioState {
		const committed = input.positions.reduce((sum, position) => {
			const price = input.prices[position.symbol] ?? position.entryPrice;
			return sum + position.margin + unrealizedPnl(position, price);
		}, 0);
		const totalValue = input.freeBalance + committed;

		const day = utcDayStart(input.timestamp);
		if (this.day !== day) {
			this.day = day;
			this.dayStartValue = totalValue;
		}
		if (totalValue > this.peakValue) {
			this.peakValue = totalValue;
		}
		if (this.peakValue > 0) {
			this.maxDrawdownPct = Math.max(
				this.maxDrawdownPct,
				(this.peakValue - totalValue) / this.peakValue
			);
		}

		this.latest = {
			totalValue,
			freeBalance: input.freeBalance,
			peakValue: this.peakValue,
			dayStartValue: this.dayStartValue,
			dailyPnlPct:
				this.dayStartValue > 0 ? (totalValue - this.dayStartValue) / this.dayStartValue : 0,
			openPositions: input.positions,
		};
		return this.latest;
	}

	state(): PortfolioState {
		return this.latest;
	}

	registerClosedTrade(trade: ClosedTrade): LedgerStats {
		this.realizedPnl += trade.pnl;
		this.trades.total += 1;

		if (trade.pnl > 0) {
			this.trades.wins += 1;
		} else if (trade.pnl < 0) {
			this.trades.losses += 1;
		} else {
			this.trades.breakeven += 1;
		}

		this.lastTrade = trade;
		return this.stats();
	}

	stats(): LedgerStats {
		return {
			startingBalance: this.startingBalance,
			realizedPnl: this.realizedPnl,
			peakValue: this.peakValue,
			maxDrawdownPct: this.maxDrawdownPct,
			trades: { ...this.trades },
			lastTrade: this.lastTrade,
		};
	}
}
