import { TimeoutError, createLogger, describeError, isTransientError } from "@tradeloop/core";

const logger = createLogger("retry");

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
	label: string;
	maxAttempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
	/** Defaults to retrying transient `ExecutionError`s only. */
	shouldRetry?: (error: unknown) => boolean;
	sleep?: Sleep;
}

/** Delay before retry `attempt` (1-based): base * 2^(attempt-1), capped. */
export const backoffDelay = (attempt: number, baseDelayMs: number, maxDelayMs: number): number =>
	Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));

/**
 * Runs `operation` up to `maxAttempts` times with bounded exponential backoff.
 * Errors that should not be retried, and the last error, are rethrown.
 */
export async function withRetry<T>(
	operation: (attempt: number) => Promise<T>,
	options: RetryOptions
): Promise<T> {
	const shouldRetry = options.shouldRetry ?? isTransientError;
	const wait = options.sleep ?? sleep;
	for (let attempt = 1; ; attempt += 1) {
		try {
			return await operation(attempt);
		} catch (error) {
			if (attempt >= options.maxAttempts || !shouldRetry(error)) {
				throw error;
			}
			const delayMs = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
			logger.warn("retrying", {
				label: options.label,
				attempt,
				maxAttempts: options.maxAttempts,
				delayMs,
				error: describeError(error),
			});
			await wait(delayMs);
		}
	}
}

/** Rejects with a transient `TimeoutError` when `operation` outlives `timeoutMs`. */
export function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const timeoutHandle: ReturnType<typeof setTimeout> = setTimeout(() => {
			reject(new TimeoutError(label, timeoutMs));
		}, timeoutMs);

		operation
			.then((value) => {
				clearTimeout(timeoutHandle);
				resolve(value);
			})
			.catch((error: unknown) => {
				clearTimeout(timeoutHandle);
				reject(error);
			});
	});
}
