import { config as dotenvConfig } from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";

const loaded = new Set<string>();

/**
 * Loads `.env` then `.env.local` from the project root (later files win), plus
 * an explicit file named by TRADING_ENV_FILE. Each file is read once per process.
 */
export function loadEnvFiles(projectRoot: string): string[] {
	const explicit = process.env.TRADING_ENV_FILE;
	const candidates = [".env", ".env.local", ...(explicit ? [explicit] : [])];
	const applied: string[] = [];

	for (const candidate of new Set(candidates)) {
		const fullPath = path.isAbsolute(candidate)
			? candidate
			: path.join(projectRoot, candidate);
		if (!existsSync(fullPath) || loaded.has(fullPath)) {
			continue;
		}
		dotenvConfig({ path: fullPath, override: true });
		loaded.add(fullPath);
		applied.push(fullPath);
	}
	return applied;
}
