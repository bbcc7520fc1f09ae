import { randomUUID } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { CacheError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type {
	CachedReport,
	ContributionStats,
	RememberedSubject,
	ReportCache,
	UserDirectory
} from "./types.js";

const CACHE_VERSION = 1;

interface CacheDocument {
	version: number;
	/** "<subject>:<rangeKey>" → report */
	reports: Record<string, CachedReport>;
	/** callerId → remembered subject */
	users: Record<string, RememberedSubject>;
}

function emptyCache(): CacheDocument {
	return { version: CACHE_VERSION, reports: {}, users: {} };
}

/** GitHub logins are case-insensitive. */
export function reportKey(subject: string, rangeKey: string): string {
	return `${subject.toLowerCase()}:${rangeKey}`;
}

/** Detached, frozen copy so storage never shares mutable state with callers. */
export function freezeStats(stats: ContributionStats): ContributionStats {
	return Object.freeze({
		...stats,
		range: Object.freeze({ ...stats.range }),
		languages: Object.freeze({ ...stats.languages })
	});
}

function copyReport(report: CachedReport): CachedReport {
	return { ...report, stats: freezeStats(report.stats) };
}

function keysFor(reports: Record<string, CachedReport>, subject: string): string[] {
	const prefix = `${subject.toLowerCase()}:`;
	return Object.keys(reports)
		.filter((k) => k.startsWith(prefix))
		.map((k) => k.slice(prefix.length))
		.sort();
}

export interface CacheOptions {
	now?: () => Date;
	logger?: Logger;
}

// ---------------------------------------------------------------------------
// In-memory
// ---------------------------------------------------------------------------

export class MemoryReportCache implements ReportCache, UserDirectory {
	private reports = new Map<string, CachedReport>();
	private users = new Map<string, RememberedSubject>();
	private now: () => Date;

	constructor(options: CacheOptions = {}) {
		this.now = options.now ?? (() => new Date());
	}

	async get(subject: string, rangeKey: string): Promise<CachedReport | undefined> {
		const report = this.reports.get(reportKey(subject, rangeKey));
		return report ? copyReport(report) : undefined;
	}

	async put(subject: string, rangeKey: string, stats: ContributionStats): Promise<CachedReport> {
		const report: CachedReport = {
			id: randomUUID(),
			createdAt: this.now().toISOString(),
			subject: subject.toLowerCase(),
			rangeKey,
			stats: freezeStats(stats)
		};
		this.reports.set(reportKey(subject, rangeKey), report);
		return copyReport(report);
	}

	async keys(subject: string): Promise<string[]> {
		return keysFor(Object.fromEntries(this.reports), subject);
	}

	async remember(callerId: string, subject?: string): Promise<void> {
		const previous = this.users.get(callerId);
		const next = subject ?? previous?.subject;
		if (next === undefined) return;
		this.users.set(callerId, {
			callerId,
			subject: next,
			lastQueryAt: this.now().toISOString()
		});
	}

	async recall(callerId: string): Promise<RememberedSubject | undefined> {
		const entry = this.users.get(callerId);
		return entry ? { ...entry } : undefined;
	}

	async close(): Promise<void> {}
}

// ---------------------------------------------------------------------------
// JSON file
// ---------------------------------------------------------------------------

/**
 * Reports and remembered subjects in one versioned JSON file. Each write
 * goes to a temporary file that is renamed over the original, so readers see
 * either the old or the new document.
 */
export class FileReportCache implements ReportCache, UserDirectory {
	private path: string;
	private now: () => Date;
	private log: Logger;

	constructor(cachePath: string, options: CacheOptions = {}) {
		this.path = cachePath;
		this.now = options.now ?? (() => new Date());
		this.log = options.logger ?? createLogger({ verbose: false, json: false });
	}

	/** Read on every operation: another process may have written since. */
	private load(): CacheDocument {
		if (!existsSync(this.path)) return emptyCache();
		try {
			const raw = readFileSync(this.path, "utf-8");
			const parsed: unknown = JSON.parse(raw);
			if (!isCacheDocument(parsed)) {
				this.log.warn(`Cache at ${this.path} has an unexpected shape. Starting fresh.`);
				return emptyCache();
			}
			if (parsed.version !== CACHE_VERSION) {
				this.log.warn(
					`Cache version mismatch (got ${parsed.version}, expected ${CACHE_VERSION}). Starting fresh.`
				);
				return emptyCache();
			}
			return parsed;
		} catch (err) {
			this.log.warn(`Failed to read cache (${String(err)}), starting fresh.`);
			return emptyCache();
		}
	}

	private save(next: CacheDocument): void {
		const dir = dirname(this.path);
		const tmp = `${this.path}.${process.pid}.tmp`;
		try {
			if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
			writeFileSync(tmp, JSON.stringify(next, null, 2), "utf-8");
			renameSync(tmp, this.path);
		} catch (err) {
			throw new CacheError("write", `Failed to write cache file ${this.path}`, {
				cause: err
			});
		}
	}

	async get(subject: string, rangeKey: string): Promise<CachedReport | undefined> {
		const report = this.load().reports[reportKey(subject, rangeKey)];
		return report ? copyReport(report) : undefined;
	}

	async put(subject: string, rangeKey: string, stats: ContributionStats): Promise<CachedReport> {
		const report: CachedReport = {
			id: randomUUID(),
			createdAt: this.now().toISOString(),
			subject: subject.toLowerCase(),
			rangeKey,
			stats: freezeStats(stats)
		};
		const data = this.load();
		this.save({
			...data,
			reports: { ...data.reports, [reportKey(subject, rangeKey)]: report }
		});
		return copyReport(report);
	}

	async keys(subject: string): Promise<string[]> {
		return keysFor(this.load().reports, subject);
	}

	async remember(callerId: string, subject?: string): Promise<void> {
		const data = this.load();
		const next = subject ?? data.users[callerId]?.subject;
		if (next === undefined) return;
		this.save({
			...data,
			users: {
				...data.users,
				[callerId]: { callerId, subject: next, lastQueryAt: this.now().toISOString() }
			}
		});
	}

	async recall(callerId: string): Promise<RememberedSubject | undefined> {
		const entry = this.load().users[callerId];
		return entry ? { ...entry } : undefined;
	}

	async close(): Promise<void> {}
}

export function defaultCachePath(): string {
	return join(process.cwd(), ".github-contribution-stats-cache", "reports.json");
}

function isCacheDocument(value: unknown): value is CacheDocument {
	if (typeof value !== "object" || value === null) return false;
	return (
		"version" in value &&
		typeof value.version === "number" &&
		"reports" in value &&
		typeof value.reports === "object" &&
		value.reports !== null &&
		"users" in value &&
		typeof value.users === "object" &&
		value.users !== null
	);
}
