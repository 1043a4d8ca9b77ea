import type { Direction, TradeSignal } from "@tradeloop/core";
import { clamp01 } from "@tradeloop/core";

export const sideSign = (direction: Direction): 1 | -1 => (direction === "LONG" ? 1 : -1);

export const adjustConfidence = (
	signal: TradeSignal,
	delta: number,
	reason: string
): TradeSignal => {
	if (delta === 0) {
		return signal;
	}
	return {
		...signal,
		confidence: clamp01(signal.confidence + delta),
		rationale: [...signal.rationale, `${reason}:${delta > 0 ? "+" : ""}${delta.toFixed(2)}`],
	};
};

export const veto = (signal: TradeSignal, reason: string): TradeSignal => ({
	...signal,
	direction: "NONE",
	confidence: 0,
	rationale: [...signal.rationale, `veto:${reason}`],
});
