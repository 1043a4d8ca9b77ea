export class DataError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "DataError";
	}
}

export class ConfigValidationError extends Error {
	readonly issues: string[];

	constructor(issues: string[], source?: string) {
		const where = source ? ` (${source})` : "";
		super(`Invalid trading configuration${where}:\n - ${issues.join("\n - ")}`);
		this.name = "ConfigValidationError";
		this.issues = issues;
	}
}

export type ExecutionErrorKind = "transient" | "terminal";

export class ExecutionError extends Error {
	readonly kind: ExecutionErrorKind;

	constructor(message: string, kind: ExecutionErrorKind, cause?: unknown) {
		super(message, { cause });
		this.name = "ExecutionError";
		this.kind = kind;
	}
}

export class TimeoutError extends ExecutionError {
	constructor(label: string, timeoutMs: number) {
		super(`${label} timed out after ${timeoutMs}ms`, "transient");
		this.name = "TimeoutError";
	}
}

export class StateConsistencyError extends Error {
	readonly symbol: string;

	constructor(symbol: string, message: string) {
		super(`${symbol}: ${message}`);
		this.name = "StateConsistencyError";
		this.symbol = symbol;
	}
}

export const isTransientError = (error: unknown): boolean =>
	error instanceof ExecutionError && error.kind === "transient";

export const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
