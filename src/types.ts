export interface RateLimit {
	/** Per-hour point budget. */
	limit: number;
	/** Points still available in the current window. */
	remaining: number;
	/** Unix timestamp (ms since epoch) when the window resets. */
	resetAt: number;
	/** Cost of the query that reported this snapshot, when known. */
	cost?: number;
}

export type LineMethod = "exact" | "estimated";

export interface RangeRef {
	start: string;
	end: string;
	key: string;
}

/** Aggregate for one subject over one date range. Frozen once built. */
export interface ContributionStats {
	readonly subject: string;
	readonly range: Readonly<RangeRef>;
	readonly commits: number;
	readonly pullRequests: number;
	readonly issues: number;
	readonly discussions: number;
	readonly reviews: number;
	readonly repositoriesContributed: number;
	readonly starredRepos: number;
	readonly followers: number;
	readonly following: number;
	readonly publicRepos: number;
	readonly privateContributions: number;
	/** Language name → bytes, summed across contributed repositories */
	readonly languages: Readonly<Record<string, number>>;
	readonly linesAdded: number;
	readonly linesDeleted: number;
	readonly lineMethod: LineMethod;
	readonly generatedAt: string;
}

export interface Commit {
	id: string;
	committedAt: string;
	additions: number;
	deletions: number;
	/** "owner/name" */
	repository: string;
}

export interface PullRequest {
	id: string;
	createdAt: string;
	additions: number;
	deletions: number;
	/** "owner/name" */
	repository: string;
}

export interface LineStats {
	added: number;
	deleted: number;
	method: LineMethod;
	/** Number of commits or pull requests the totals were derived from */
	sourceCount: number;
	commitCount: number;
	pullRequestCount: number;
}

export interface CachedReport {
	id: string;
	/** ISO timestamp of the write */
	createdAt: string;
	subject: string;
	rangeKey: string;
	stats: ContributionStats;
}

export interface AllTimeStats {
	subject: string;
	years: number;
	firstYear: number;
	lastYear: number;
	commits: number;
	pullRequests: number;
	issues: number;
	discussions: number;
	reviews: number;
	privateContributions: number;
	linesAdded: number;
	linesDeleted: number;
	lineMethods: LineMethod[];
	repositoriesContributed: number;
	starredRepos: number;
	followers: number;
	following: number;
	publicRepos: number;
	languages: Record<string, number>;
	lastUpdated: string;
}

export interface RememberedSubject {
	callerId: string;
	subject: string;
	lastQueryAt: string;
}

// ---------------------------------------------------------------------------
// Boundaries
// ---------------------------------------------------------------------------

/** Receives human-readable progress while an aggregation runs. */
export interface ProgressSink {
	report(message: string): void | Promise<void>;
}

/**
 * Stores previously computed stats keyed by (subject, range key).
 * `put` is an upsert; a later write for the same key supersedes the earlier one.
 */
export interface ReportCache {
	get(subject: string, rangeKey: string): Promise<CachedReport | undefined>;
	put(
		subject: string,
		rangeKey: string,
		stats: ContributionStats
	): Promise<CachedReport>;
	/** Range keys stored for a subject, sorted ascending. */
	keys(subject: string): Promise<string[]>;
	close(): Promise<void>;
}

/** Convenience index from an external caller identity to a subject. */
export interface UserDirectory {
	remember(callerId: string, subject?: string): Promise<void>;
	recall(callerId: string): Promise<RememberedSubject | undefined>;
	close(): Promise<void>;
}

/** Minimal executor the aggregator and paginator depend on. */
export interface GraphQLExecutor {
	execute<T>(
		query: string,
		variables?: Record<string, unknown>,
		options?: { signal?: AbortSignal }
	): Promise<T>;
}
