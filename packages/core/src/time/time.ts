/**
 * Epoch-millisecond helpers. Everything is UTC; trading days start at 00:00 UTC.
 */

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

const TIMEFRAME_PATTERN = /^(\d+)([mhd])$/;

const UNIT_MS: Record<string, number> = {
	m: MINUTE_MS,
	h: HOUR_MS,
	d: DAY_MS,
};

/**
 * @example timeframeToMs("15m") => 900000
 * @throws Error when the label is not "<n>m", "<n>h" or "<n>d"
 */
export const timeframeToMs = (timeframe: string): number => {
	const match = timeframe.trim().toLowerCase().match(TIMEFRAME_PATTERN);
	if (!match) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "15m", "1h", "1d"`
		);
	}
	const n = Number.parseInt(match[1], 10);
	if (n <= 0) {
		throw new Error(`Invalid timeframe: period must be positive in "${timeframe}"`);
	}
	return n * UNIT_MS[match[2]];
};

export const isValidTimeframe = (timeframe: string): boolean => {
	try {
		timeframeToMs(timeframe);
		return true;
	} catch {
		return false;
	}
};

/**
 * Start of the bucket containing `ts`.
 * @example bucketTimestamp(1735690261234, 60000) => 1735690260000
 */
export const bucketTimestamp = (ts: number, tfMs: number): number => {
	if (!Number.isFinite(ts) || ts < 0) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	if (!Number.isFinite(tfMs) || tfMs <= 0) {
		throw new Error(`Invalid timeframe ms: ${tfMs}`);
	}
	return Math.floor(ts / tfMs) * tfMs;
};

export const isBucketAligned = (ts: number, tfMs: number): boolean =>
	ts === bucketTimestamp(ts, tfMs);

export const utcDayStart = (ts: number): number => bucketTimestamp(ts, DAY_MS);

export const isSameUtcDay = (a: number, b: number): boolean =>
	utcDayStart(a) === utcDayStart(b);

/** Number of primary bars per hour, at least 1 for timeframes longer than an hour. */
export const barsPerHour = (timeframe: string): number =>
	Math.max(1, Math.round(HOUR_MS / timeframeToMs(timeframe)));
