import { NetworkError } from "ccxt";
import { ExecutionError } from "@tradeloop/core";

/**
 * Network-level ccxt failures (timeouts, rate limits, venue unavailable) are
 * transient. Anything else the venue rejects is terminal: insufficient
 * funds, an unknown symbol and invalid orders will not succeed on retry.
 */
export const classifyCcxtError = (error: unknown, label: string): ExecutionError => {
	if (error instanceof ExecutionError) {
		return error;
	}
	const message = error instanceof Error ? error.message : String(error);
	const kind = error instanceof NetworkError ? "transient" : "terminal";
	return new ExecutionError(`${label}: ${message}`, kind, error);
};
