/**
 * Programmatic API for github-contribution-stats.
 *
 * @example
 * ```ts
 * import { getContributionStats } from "github-contribution-stats";
 *
 * const stats = await getContributionStats({
 *   user: "octocat",
 *   token: process.env.GITHUB_TOKEN ?? "",
 *   range: ["2024"],
 * });
 * console.log(stats.linesAdded, stats.lineMethod);
 * ```
 */
import { ContributionAggregator } from "./aggregator.js";
import { collectAllTime, summarizeAllTime } from "./alltime.js";
import { FileReportCache, MemoryReportCache } from "./cache.js";
import type { StorageConfig } from "./config.js";
import { DateRange } from "./date-range.js";
import { MalformedResponseError } from "./errors.js";
import { GitHubTransport } from "./github-client.js";
import { createLogger, type Logger } from "./logger.js";
import { PgReportCache } from "./pg-cache.js";
import { RATE_LIMIT_QUERY, type RateLimitResponse } from "./queries.js";
import { RateLimitTracker } from "./rate-limit.js";
import { RetryingClient } from "./retrying-client.js";
import type {
	AllTimeStats,
	ContributionStats,
	ProgressSink,
	RateLimit,
	ReportCache,
	UserDirectory
} from "./types.js";

export type {
	AllTimeStats,
	CachedReport,
	ContributionStats,
	GraphQLExecutor,
	LineMethod,
	ProgressSink,
	RateLimit,
	RememberedSubject,
	ReportCache,
	UserDirectory
} from "./types.js";
export type { AppConfig, CliFlags, StorageConfig } from "./config.js";

export { ContributionAggregator } from "./aggregator.js";
export { collectAllTime, summarizeAllTime, yearsSince } from "./alltime.js";
export { FileReportCache, MemoryReportCache } from "./cache.js";
export { resolveConfig } from "./config.js";
export { DateRange } from "./date-range.js";
export * from "./errors.js";
export { formatAllTime, formatReport } from "./format.js";
export { GitHubTransport } from "./github-client.js";
export { PaginatingQueryRunner } from "./paginator.js";
export { PgReportCache } from "./pg-cache.js";
export { RateLimitTracker } from "./rate-limit.js";
export { RetryingClient } from "./retrying-client.js";

/** A cache that can also remember which subject a caller asked about. */
export type ReportStore = ReportCache & UserDirectory;

export interface ClientOptions {
	/** GitHub Personal Access Token (needs read:user scope) */
	token: string;
	/** Per-request timeout in ms. Defaults to 30s. */
	requestTimeoutMs?: number;
	/** Total attempts per query, first one included. Defaults to 4. */
	maxAttempts?: number;
	/** Share an existing tracker between clients built for the same token. */
	tracker?: RateLimitTracker;
	logger?: Logger;
}

export interface Client {
	/** Throttled, retrying executor. */
	client: RetryingClient;
	/** Bare transport: one attempt, no throttling. */
	transport: GitHubTransport;
	tracker: RateLimitTracker;
}

/** Wire transport, rate-limit tracker and retry policy for one token. */
export function createClient(options: ClientOptions): Client {
	const logger = options.logger ?? createLogger({ verbose: false, json: false });
	const tracker = options.tracker ?? new RateLimitTracker();
	const transport = new GitHubTransport({
		token: options.token,
		tracker,
		timeoutMs: options.requestTimeoutMs,
		logger
	});
	const client = new RetryingClient(transport, {
		tracker,
		logger,
		policy: options.maxAttempts !== undefined ? { maxAttempts: options.maxAttempts } : undefined
	});
	return { client, transport, tracker };
}

/**
 * Open the configured report store. PostgreSQL stores create their tables on
 * first use. Returns undefined when caching is disabled.
 */
export async function openReportStore(
	storage: StorageConfig,
	logger?: Logger
): Promise<ReportStore | undefined> {
	switch (storage.kind) {
		case "none":
			return undefined;
		case "file":
			return new FileReportCache(storage.path, { logger });
		case "postgres": {
			const store = PgReportCache.fromConnectionString(storage.connectionString);
			try {
				await store.initializeSchema();
			} catch (err) {
				await store.close();
				throw err;
			}
			return store;
		}
	}
}

export interface GetContributionStatsOptions extends ClientOptions {
	user: string;
	/**
	 * Range arguments as the CLI takes them: `[]` for the trailing 12 months,
	 * `["2024"]` for a calendar year, or `["2024-01-01", "2024-06-30"]`.
	 * A `DateRange` is used as is.
	 */
	range?: readonly string[] | DateRange;
	/** Write-through cache. Defaults to an in-memory one for this call. */
	cache?: ReportCache;
	refresh?: boolean;
	/** Optional progress callback invoked as each phase advances. */
	onProgress?: (message: string) => void;
	signal?: AbortSignal;
}

/**
 * Contribution stats for one user and date range, without any console
 * output, for embedding in other tools.
 */
export async function getContributionStats(
	options: GetContributionStatsOptions
): Promise<ContributionStats> {
	const { client } = createClient(options);
	const aggregator = new ContributionAggregator({
		client,
		cache: options.cache ?? new MemoryReportCache(),
		logger: options.logger
	});
	const range =
		options.range instanceof DateRange ? options.range : DateRange.parse(options.range ?? []);
	return aggregator.contributions(options.user, range, {
		progress: toSink(options.onProgress),
		refresh: options.refresh,
		signal: options.signal
	});
}

export interface GetAllTimeStatsOptions extends ClientOptions {
	user: string;
	/** Earliest year to include. Defaults to 2008. */
	fromYear?: number;
	cache?: ReportCache;
	onProgress?: (message: string) => void;
	signal?: AbortSignal;
}

/** Calendar-year stats summed from `fromYear` to now. */
export async function getAllTimeStats(
	options: GetAllTimeStatsOptions
): Promise<AllTimeStats | undefined> {
	const { client } = createClient(options);
	const aggregator = new ContributionAggregator({
		client,
		cache: options.cache ?? new MemoryReportCache(),
		logger: options.logger
	});
	const yearly = await collectAllTime(aggregator, options.user, {
		fromYear: options.fromYear,
		progress: toSink(options.onProgress),
		signal: options.signal
	});
	return summarizeAllTime(yearly[yearly.length - 1]?.subject ?? options.user, yearly);
}

/**
 * Current GraphQL quota for a token. Goes straight to the transport so an
 * exhausted budget is reported rather than waited on.
 */
export async function getRateLimit(
	options: ClientOptions & { signal?: AbortSignal }
): Promise<RateLimit> {
	const { transport, tracker } = createClient(options);
	await transport.execute<RateLimitResponse>(RATE_LIMIT_QUERY, {}, { signal: options.signal });
	const snapshot = tracker.snapshot();
	if (!snapshot) {
		throw new MalformedResponseError("GitHub did not report a rate limit");
	}
	return { ...snapshot };
}

function toSink(callback?: (message: string) => void): ProgressSink | undefined {
	return callback ? { report: callback } : undefined;
}
