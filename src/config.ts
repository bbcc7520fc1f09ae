/**
 * Runtime configuration, resolved from command-line flags first and the
 * environment second. `.env` files are loaded by the CLI entry point.
 */

import { defaultCachePath } from "./cache.js";
import { ConfigError } from "./errors.js";

export interface CliFlags {
	token?: string;
	/** A path from `--cache <path>`, or `false` from `--no-cache`. */
	cache?: string | boolean;
	databaseUrl?: string;
	/** Whole-analysis deadline in seconds. */
	timeout?: string;
	retries?: string;
	json?: boolean;
	verbose?: boolean;
}

export type StorageConfig =
	| { kind: "none" }
	| { kind: "file"; path: string }
	| { kind: "postgres"; connectionString: string };

export interface AppConfig {
	token?: string;
	storage: StorageConfig;
	/** Deadline for one command, in ms. Unbounded when absent. */
	timeoutMs?: number;
	maxAttempts: number;
	verbose: boolean;
	json: boolean;
}

export const DEFAULT_MAX_ATTEMPTS = 4;

export function resolveConfig(
	flags: CliFlags,
	env: NodeJS.ProcessEnv = process.env
): AppConfig {
	if (flags.json && flags.verbose) {
		throw new ConfigError("--json and --verbose cannot be used together.");
	}

	const token = flags.token ?? nonEmpty(env.GITHUB_TOKEN);
	const databaseUrl = flags.databaseUrl ?? nonEmpty(env.DATABASE_URL);

	let storage: StorageConfig;
	if (flags.cache === false) {
		storage = { kind: "none" };
	} else if (typeof flags.cache === "string") {
		storage = { kind: "file", path: flags.cache };
	} else if (databaseUrl) {
		storage = { kind: "postgres", connectionString: databaseUrl };
	} else {
		storage = { kind: "file", path: defaultCachePath() };
	}

	const timeout = flags.timeout ?? nonEmpty(env.GHCS_TIMEOUT);
	const retries = flags.retries ?? nonEmpty(env.GHCS_RETRIES);

	return {
		token,
		storage,
		timeoutMs: timeout !== undefined ? positiveInt(timeout, "--timeout") * 1000 : undefined,
		maxAttempts: retries !== undefined ? positiveInt(retries, "--retries") : DEFAULT_MAX_ATTEMPTS,
		verbose: flags.verbose ?? false,
		json: flags.json ?? false
	};
}

export function requireToken(config: AppConfig): string {
	if (!config.token) {
		throw new ConfigError(
			"Missing GitHub token: pass --token or set GITHUB_TOKEN (needs read:user scope)."
		);
	}
	return config.token;
}

function nonEmpty(value: string | undefined): string | undefined {
	return value !== undefined && value.trim() !== "" ? value.trim() : undefined;
}

function positiveInt(value: string, flag: string): number {
	const n = Number(value);
	if (!Number.isInteger(n) || n < 1) {
		throw new ConfigError(`${flag} must be a positive integer, got "${value}"`);
	}
	return n;
}
