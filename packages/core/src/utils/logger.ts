export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

const NODE_ENV = process.env.NODE_ENV;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_JSON = process.env.LOG_JSON === "true";

const prettyEnabled = LOG_PRETTY || NODE_ENV === "development";
const jsonEnabled = LOG_JSON || !prettyEnabled;

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const moduleFilter = (() => {
	const raw = process.env.LOG_MODULE;
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
})();

const minLevel = normalizeLevel(process.env.LOG_LEVEL);

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[minLevel]) {
		return false;
	}
	if (moduleFilter && !moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export type LogSink = (record: BaseLogPayload) => void;

const sinks = new Set<LogSink>();

/**
 * Registers an extra receiver for every record that passes the level filter.
 * Returns the function that removes it again.
 */
export const addLogSink = (sink: LogSink): (() => void) => {
	sinks.add(sink);
	return () => {
		sinks.delete(sink);
	};
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	for (const sink of sinks) {
		try {
			sink(base);
		} catch (err) {
			console.warn(
				`[logger] sink failed: ${err instanceof Error ? err.message : "unknown"}`
			);
		}
	}

	if (prettyEnabled) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (jsonEnabled) {
		try {
			const json = JSON.stringify(sanitize(base));
			console.log(json);
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
	/** Logger that stamps every record with the given fields (symbol, run id). */
	child: (bindings: Record<string, unknown>) => ModuleLogger;
}

export const createLogger = (
	moduleName: string,
	bindings: Record<string, unknown> = {}
): ModuleLogger => {
	const emit = (
		level: LogLevel,
		event: string,
		data?: Record<string, unknown>
	): void => log({ ...bindings, ...(data ?? {}), level, event, module: moduleName });
	return {
		log: emit,
		debug: (event, data) => emit("debug", event, data),
		info: (event, data) => emit("info", event, data),
		warn: (event, data) => emit("warn", event, data),
		error: (event, data) => emit("error", event, data),
		child: (extra) => createLogger(moduleName, { ...bindings, ...extra }),
	};
};

const sanitize = (payload: BaseLogPayload): unknown =>
	sanitizeValue(payload, new WeakSet<object>());

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (typeof value === "number" && !Number.isFinite(value)) {
		return String(value);
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);
	switch (event) {
		case "trade_opened":
			printTradeOpened(rest);
			break;
		case "trade_closed":
			printTradeClosed(rest);
			break;
		case "portfolio_snapshot":
			printPortfolioSnapshot(rest);
			break;
		default:
			break;
	}
}

const pick = (
	source: Record<string, unknown>,
	keys: readonly string[]
): Record<string, unknown> => {
	const row: Record<string, unknown> = {};
	for (const key of keys) {
		row[key] = source[key];
	}
	return row;
};

const printTradeOpened = (rest: Record<string, unknown>): void => {
	console.table([
		pick(rest, [
			"symbol",
			"direction",
			"strategyId",
			"regime",
			"entryPrice",
			"quantity",
			"stopPrice",
			"takeProfitPrice",
			"confidence",
		]),
	]);
};

const printTradeClosed = (rest: Record<string, unknown>): void => {
	console.table([
		pick(rest, [
			"symbol",
			"direction",
			"reason",
			"entryPrice",
			"exitPrice",
			"pnl",
			"partial",
		]),
	]);
};

const printPortfolioSnapshot = (rest: Record<string, unknown>): void => {
	console.table([
		pick(rest, [
			"totalValue",
			"freeBalance",
			"peakValue",
			"dailyPnlPct",
			"openPositions",
		]),
	]);
};
