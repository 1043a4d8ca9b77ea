import type { CsvMode } from "@tradeloop/metrics";

export type ArgValue = string | boolean;

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	if (positionals[0] && args.start === undefined) {
		args.start = positionals[0];
	}
	if (positionals[1] && args.end === undefined) {
		args.end = positionals[1];
	}
	return args;
};

export type CandleSource =
	| { kind: "file"; path: string; symbol?: string }
	| { kind: "fetch"; startTimestamp: number; endTimestamp: number };

export interface BacktestCliOptions {
	help: boolean;
	source: CandleSource | null;
	symbols?: string[];
	profile?: string;
	configDir?: string;
	initialBalance?: number;
	walkForward: boolean;
	json: boolean;
	out?: string;
	csv?: { path: string; mode: CsvMode };
}

const CSV_MODES: readonly CsvMode[] = ["summary", "trades", "grouped"];

export const getStringArg = (args: Record<string, ArgValue>, key: string): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.length ? value : undefined;
};

const isFlagSet = (args: Record<string, ArgValue>, key: string): boolean =>
	args[key] === true || args[key] === "true";

export const getListArg = (args: Record<string, ArgValue>, key: string): string[] | undefined => {
	const raw = getStringArg(args, key);
	if (!raw) {
		return undefined;
	}
	const items = raw
		.split(",")
		.map((token) => token.trim())
		.filter((token) => token.length > 0);
	return items.length ? items : undefined;
};

export const parseTimestamp = (value: string | undefined, label: string): number => {
	if (!value) {
		throw new Error(`Missing required --${label} <iso>`);
	}
	const ts = Date.parse(value);
	if (Number.isNaN(ts)) {
		throw new Error(`Invalid ${label} timestamp: ${value}`);
	}
	return ts;
};

export const parseNumber = (value: string | undefined, label: string): number | undefined => {
	if (value === undefined) {
		return undefined;
	}
	const num = Number(value);
	if (!Number.isFinite(num)) {
		throw new Error(`Invalid numeric value for --${label}: ${value}`);
	}
	return num;
};

const isCsvMode = (value: string): value is CsvMode =>
	CSV_MODES.some((mode) => mode === value);

const parseSource = (args: Record<string, ArgValue>): CandleSource | null => {
	const file = getStringArg(args, "file");
	if (file) {
		return { kind: "file", path: file, symbol: getStringArg(args, "symbol") };
	}
	if (args.start === undefined && args.end === undefined) {
		return null;
	}
	const startTimestamp = parseTimestamp(getStringArg(args, "start"), "start");
	const endTimestamp = parseTimestamp(getStringArg(args, "end"), "end");
	if (startTimestamp >= endTimestamp) {
		throw new Error("--start must be before --end");
	}
	return { kind: "fetch", startTimestamp, endTimestamp };
};

export const parseBacktestOptions = (argv: string[]): BacktestCliOptions => {
	const args = parseCliArgs(argv);
	const csvPath = getStringArg(args, "csv");
	const csvMode = getStringArg(args, "csvMode") ?? "trades";
	if (!isCsvMode(csvMode)) {
		throw new Error(`Invalid --csvMode ${csvMode} (use ${CSV_MODES.join(", ")})`);
	}
	const help = isFlagSet(args, "help");
	return {
		help,
		source: help ? null : parseSource(args),
		symbols: getListArg(args, "symbols"),
		profile: getStringArg(args, "profile"),
		configDir: getStringArg(args, "configDir"),
		initialBalance: parseNumber(getStringArg(args, "initialBalance"), "initialBalance"),
		walkForward: isFlagSet(args, "walkForward"),
		json: isFlagSet(args, "json"),
		out: getStringArg(args, "out"),
		csv: csvPath ? { path: csvPath, mode: csvMode } : undefined,
	};
};
