import type { PortfolioState, RiskConfig, StrategyOverrides, TradeSignal } from "@tradeloop/core";
import { clamp01, floorToStep } from "@tradeloop/core";
import type { SizingScales } from "./types";

/** Linear from the floor multiplier at the minimum confidence to 1 at the ceiling. */
export const confidenceScale = (
	confidence: number,
	minConfidence: number,
	risk: RiskConfig
): number => {
	const span = risk.confidenceCeiling - minConfidence;
	if (span <= 0) {
		return 1;
	}
	const position = clamp01((confidence - minConfidence) / span);
	return risk.confidenceFloorScale + (1 - risk.confidenceFloorScale) * position;
};

export const drawdownPct = (portfolio: Pick<PortfolioState, "peakValue" | "totalValue">): number =>
	portfolio.peakValue > 0
		? Math.max(0, (portfolio.peakValue - portfolio.totalValue) / portfolio.peakValue)
		: 0;

/** 1 until the start threshold, then down to the floor scale at the floor drawdown. */
export const drawdownScale = (drawdown: number, risk: RiskConfig): number => {
	if (drawdown <= risk.drawdownSizingStartPct) {
		return 1;
	}
	const span = risk.drawdownSizingFloorPct - risk.drawdownSizingStartPct;
	const progress = span > 0 ? (drawdown - risk.drawdownSizingStartPct) / span : 1;
	return Math.max(
		risk.drawdownSizingFloorScale,
		1 - progress * (1 - risk.drawdownSizingFloorScale)
	);
};

export interface SizingInput {
	signal: TradeSignal;
	portfolio: PortfolioState;
	risk: RiskConfig;
	minConfidence: number;
	volatile: boolean;
	overrides: StrategyOverrides;
}

export type SizingResult =
	| {
			ok: true;
			quantity: number;
			notional: number;
			margin: number;
			leverage: number;
			scales: SizingScales;
	  }
	| { ok: false; reason: string };

/**
 * Margin from the scaled base fraction, notional capped by the envelope
 * `value * baseFraction * leverage * regimeScale * confidenceScale`, quantity
 * capped so a stop-out loses at most `value * riskBudgetFraction`.
 */
export function sizePosition(input: SizingInput): SizingResult {
	const { signal, portfolio, risk, overrides } = input;
	const value = portfolio.totalValue;
	const scales: SizingScales = {
		confidence: confidenceScale(signal.confidence, input.minConfidence, risk),
		regime: input.volatile ? risk.volatileRegimeScale : 1,
		drawdown: drawdownScale(drawdownPct(portfolio), risk),
		adaptive: overrides.size,
	};
	const leverage = risk.leverage * overrides.leverage;
	const scaledMargin =
		value * risk.baseFraction * scales.confidence * scales.regime * scales.drawdown * scales.adaptive;
	const envelope =
		value * risk.baseFraction * risk.leverage * scales.regime * scales.confidence;
	const notionalCap = Math.min(scaledMargin * leverage, envelope);
	const riskCap = (value * risk.riskBudgetFraction) / signal.stopDistance;
	const quantity = floorToStep(
		Math.min(notionalCap / signal.entryPrice, riskCap),
		risk.quantityStep
	);

	if (!Number.isFinite(quantity) || quantity <= 0) {
		return { ok: false, reason: "quantity_zero" };
	}
	if (quantity < risk.minQuantity) {
		return { ok: false, reason: `quantity ${quantity} below minimum ${risk.minQuantity}` };
	}
	const notional = quantity * signal.entryPrice;
	if (notional < risk.minNotional) {
		return {
			ok: false,
			reason: `notional ${notional.toFixed(2)} below exchange minimum ${risk.minNotional}`,
		};
	}
	const margin = notional / leverage;
	if (margin > portfolio.freeBalance) {
		return {
			ok: false,
			reason: `margin ${margin.toFixed(2)} exceeds free balance ${portfolio.freeBalance.toFixed(2)}`,
		};
	}
	return { ok: true, quantity, notional, margin, leverage, scales };
}
