import crypto from "node:crypto";

/**
 * JSON with object keys sorted at every depth, so equal values hash equally
 * regardless of insertion order. Non-finite numbers are written as strings.
 */
export const stableStringify = (value: unknown): string => {
	if (typeof value === "number" && !Number.isFinite(value)) {
		return JSON.stringify(String(value));
	}
	if (value === null || typeof value !== "object") {
		return JSON.stringify(value) ?? "null";
	}
	if (Array.isArray(value)) {
		return `[${value.map(stableStringify).join(",")}]`;
	}
	const entries = Object.entries(value)
		.filter(([, val]) => typeof val !== "undefined")
		.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
		.map(([key, val]) => `${JSON.stringify(key)}:${stableStringify(val)}`);
	return `{${entries.join(",")}}`;
};

export const hashJson = (value: unknown, length = 12): string => {
	const digest = crypto
		.createHash("sha1")
		.update(stableStringify(value))
		.digest("hex");
	return length > 0 ? digest.slice(0, length) : digest;
};
