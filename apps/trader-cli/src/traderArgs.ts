import type { PersistenceOptions } from "@tradeloop/persistence";

type ArgValue = string | boolean;

const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	for (let i = 0; i < argv.length; i += 1) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
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
	return args;
};

const getStringArg = (args: Record<string, ArgValue>, key: string): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.length ? value : undefined;
};

export type PersistenceDriver = PersistenceOptions["driver"];

export interface TraderCliOptions {
	help: boolean;
	profile?: string;
	accountProfile?: string;
	configDir?: string;
	maxTicks?: number;
	persistence: PersistenceOptions;
}

const DRIVERS: readonly PersistenceDriver[] = ["memory", "log", "file"];

const isDriver = (value: string): value is PersistenceDriver =>
	DRIVERS.some((driver) => driver === value);

const DEFAULT_DATA_DIR = "output/trader";

export const parseTraderArgs = (argv: string[]): TraderCliOptions => {
	const args = parseCliArgs(argv);
	const driver = getStringArg(args, "persistence") ?? "file";
	if (!isDriver(driver)) {
		throw new Error(`Invalid --persistence ${driver} (use ${DRIVERS.join(", ")})`);
	}
	const rawTicks = getStringArg(args, "maxTicks");
	const maxTicks = rawTicks === undefined ? undefined : Number(rawTicks);
	if (maxTicks !== undefined && !(Number.isInteger(maxTicks) && maxTicks > 0)) {
		throw new Error(`Invalid --maxTicks ${rawTicks}`);
	}
	return {
		help: args.help === true,
		profile: getStringArg(args, "profile"),
		accountProfile: getStringArg(args, "account"),
		configDir: getStringArg(args, "configDir"),
		maxTicks,
		persistence:
			driver === "file"
				? { driver, directory: getStringArg(args, "dataDir") ?? DEFAULT_DATA_DIR }
				: { driver },
	};
};
