export const clamp = (value: number, min: number, max: number): number =>
	Math.min(max, Math.max(min, value));

export const clamp01 = (value: number): number => clamp(value, 0, 1);

export const round = (value: number, decimals = 8): number => {
	const factor = 10 ** decimals;
	return Math.round(value * factor) / factor;
};

/** Rounds down to a multiple of `step`; non-positive steps leave the value alone. */
export const floorToStep = (value: number, step: number): number => {
	if (step <= 0) {
		return value;
	}
	return round(Math.floor(value / step + 1e-9) * step, 12);
};

export const isFiniteNumber = (value: unknown): value is number =>
	typeof value === "number" && Number.isFinite(value);
