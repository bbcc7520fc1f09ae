import type { DateRange } from "./date-range.js";
import {
	AuthenticationError,
	CacheError,
	extractErrorDetail,
	GraphQLSemanticError,
	RateLimitedError,
	SubjectNotFoundError,
	TransientNetworkError,
	UpstreamError
} from "./errors.js";
import { calculateLineStats, needsPullRequestFallback, type RepoCoverage } from "./line-stats.js";
import { createLogger, type Logger } from "./logger.js";
import { DEFAULT_MAX_PAGES, PaginatingQueryRunner } from "./paginator.js";
import {
	COMMIT_HISTORY_QUERY,
	type CommitHistoryResponse,
	type CommitNode,
	languageConnection,
	type LanguageEdge,
	PROFILE_QUERY,
	type ProfileResponse,
	PULL_REQUESTS_QUERY,
	type PullRequestsResponse,
	REPO_LANGUAGES_QUERY,
	type RepoLanguagesResponse,
	type RepositoryContribution,
	SUMMARY_QUERY,
	type SummaryResponse
} from "./queries.js";
import type {
	CachedReport,
	Commit,
	ContributionStats,
	GraphQLExecutor,
	ProgressSink,
	PullRequest,
	ReportCache
} from "./types.js";

export interface ContributionAggregatorOptions {
	client: GraphQLExecutor;
	/** Optional write-through cache. Without one every call aggregates. */
	cache?: ReportCache;
	logger?: Logger;
	/** Page ceiling for every paginated phase. Defaults to 100. */
	maxPages?: number;
	now?: () => Date;
}

export interface ContributionOptions {
	progress?: ProgressSink;
	signal?: AbortSignal;
	/** Skip the cache lookup and aggregate again; the result is still written. */
	refresh?: boolean;
}

interface Profile {
	id: string;
	login: string;
	followers: number;
	following: number;
	starredRepos: number;
	publicRepos: number;
	discussions: number;
}

interface Summary {
	commits: number;
	issues: number;
	pullRequests: number;
	reviews: number;
	repositoriesContributed: number;
	privateContributions: number;
	repositories: RepositoryContribution[];
	/** Repositories with commits that `repositories` leaves out. */
	unlistedRepositories: number;
}

/**
 * Builds one `ContributionStats` for a subject and date range from four
 * sequential phases: profile, contribution summary, commit history and, when
 * commit data is incomplete, pull requests.
 */
export class ContributionAggregator {
	private client: GraphQLExecutor;
	private runner: PaginatingQueryRunner;
	private cache?: ReportCache;
	private log: Logger;
	private maxPages: number;
	private now: () => Date;

	constructor(options: ContributionAggregatorOptions) {
		this.client = options.client;
		this.runner = new PaginatingQueryRunner(options.client);
		this.cache = options.cache;
		this.log = options.logger ?? createLogger({ verbose: false, json: false });
		this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
		this.now = options.now ?? (() => new Date());
	}

	/**
	 * Stats for `subject` over `range`, served from the cache when present.
	 * A failed write-through raises `CacheError` carrying the computed stats.
	 */
	async contributions(
		subject: string,
		range: DateRange,
		options: ContributionOptions = {}
	): Promise<ContributionStats> {
		if (this.cache && !options.refresh) {
			let hit: CachedReport | undefined;
			try {
				hit = await this.cache.get(subject, range.key);
			} catch (err) {
				if (err instanceof CacheError) throw err;
				throw new CacheError("read", `Failed to read cached report for ${subject}`, {
					cause: err
				});
			}
			if (hit) {
				this.log.debug(`Cache hit for ${subject} (${range.key}) from ${hit.createdAt}`);
				return hit.stats;
			}
		}

		const stats = await this.compute(subject, range, options);

		if (this.cache) {
			try {
				await this.cache.put(subject, range.key, stats);
			} catch (err) {
				const detail = err instanceof Error ? extractErrorDetail(err) : String(err);
				throw new CacheError(
					"write",
					`Failed to store report for ${subject} (${range.key}): ${detail}`,
					{ cause: err, stats }
				);
			}
		}
		return stats;
	}

	/** Aggregate from upstream, bypassing the cache. */
	async compute(
		subject: string,
		range: DateRange,
		options: Omit<ContributionOptions, "refresh"> = {}
	): Promise<ContributionStats> {
		const { progress, signal } = options;

		await this.report(progress, `Fetching profile for ${subject}...`);
		const profile = await this.fetchProfile(subject, signal);

		await this.report(progress, `Fetching contributions for ${range.describe()}...`);
		const summary = await this.fetchSummary(subject, range, signal);
		const languages = await this.collectLanguages(summary.repositories, signal);

		await this.report(
			progress,
			`Fetching commits across ${summary.repositories.length} repositories...`
		);
		const coverage = await this.collectCommits(profile.id, summary.repositories, range, signal);
		const scope = { partialList: summary.unlistedRepositories > 0 };

		let pullRequests: PullRequest[] = [];
		if (needsPullRequestFallback(coverage, scope)) {
			const missing =
				coverage.filter((r) => !r.covered).length + summary.unlistedRepositories;
			await this.report(
				progress,
				missing > 0
					? `Estimating lines from pull requests for ${missing} repositories without commit data...`
					: "No commit data, estimating lines from pull requests..."
			);
			pullRequests = await this.collectPullRequests(profile.login, range, signal);
		} else {
			await this.report(progress, "Commit data complete, skipping pull requests.");
		}

		const lines = calculateLineStats(coverage, pullRequests, scope);
		await this.report(
			progress,
			`Lines: +${lines.added} / -${lines.deleted} (${lines.method}, from ${lines.sourceCount} items)`
		);

		return Object.freeze({
			subject: profile.login,
			range: Object.freeze(range.toRef()),
			commits: summary.commits,
			pullRequests: summary.pullRequests,
			issues: summary.issues,
			discussions: profile.discussions,
			reviews: summary.reviews,
			repositoriesContributed: summary.repositoriesContributed,
			starredRepos: profile.starredRepos,
			followers: profile.followers,
			following: profile.following,
			publicRepos: profile.publicRepos,
			privateContributions: summary.privateContributions,
			languages: Object.freeze(languages),
			linesAdded: lines.added,
			linesDeleted: lines.deleted,
			lineMethod: lines.method,
			generatedAt: this.now().toISOString()
		});
	}

	// ---------------------------------------------------------------------------
	// Phase 1: profile
	// ---------------------------------------------------------------------------

	private async fetchProfile(subject: string, signal?: AbortSignal): Promise<Profile> {
		let data: ProfileResponse;
		try {
			data = await this.client.execute<ProfileResponse>(
				PROFILE_QUERY,
				{ login: subject },
				{ signal }
			);
		} catch (err) {
			if (err instanceof GraphQLSemanticError && err.isNotFound) {
				throw new SubjectNotFoundError(subject, { cause: err });
			}
			throw err;
		}
		const user = data.user;
		if (!user) throw new SubjectNotFoundError(subject);
		return {
			id: user.id,
			login: user.login,
			followers: user.followers.totalCount,
			following: user.following.totalCount,
			starredRepos: user.starredRepositories.totalCount,
			publicRepos: user.repositories.totalCount,
			discussions: user.repositoryDiscussions.totalCount
		};
	}

	// ---------------------------------------------------------------------------
	// Phase 2: summary and languages
	// ---------------------------------------------------------------------------

	private async fetchSummary(
		subject: string,
		range: DateRange,
		signal?: AbortSignal
	): Promise<Summary> {
		const data = await this.client.execute<SummaryResponse>(
			SUMMARY_QUERY,
			{ login: subject, from: range.from, to: range.to },
			{ signal }
		);
		if (!data.user) throw new SubjectNotFoundError(subject);
		const c = data.user.contributionsCollection;
		return {
			commits: c.totalCommitContributions,
			issues: c.totalIssueContributions,
			pullRequests: c.totalPullRequestContributions,
			reviews: c.totalPullRequestReviewContributions,
			repositoriesContributed:
				c.totalRepositoriesWithContributedCommits +
				c.totalRepositoriesWithContributedPullRequests +
				c.totalRepositoriesWithContributedIssues,
			privateContributions: c.restrictedContributionsCount,
			repositories: c.commitContributionsByRepository,
			unlistedRepositories: Math.max(
				0,
				c.totalRepositoriesWithContributedCommits - c.commitContributionsByRepository.length
			)
		};
	}

	/** Language bytes summed across repositories and across language pages. */
	private async collectLanguages(
		repositories: readonly RepositoryContribution[],
		signal?: AbortSignal
	): Promise<Record<string, number>> {
		const totals: Record<string, number> = {};
		const add = (edges: readonly LanguageEdge[]) => {
			for (const edge of edges) {
				totals[edge.node.name] = (totals[edge.node.name] ?? 0) + edge.size;
			}
		};

		for (const { repository } of repositories) {
			const langs = repository.languages;
			if (!langs) continue;
			add(langs.edges ?? []);
			if (!langs.pageInfo.hasNextPage || langs.pageInfo.endCursor === null) continue;

			const key = `${repository.owner.login}/${repository.name}`;
			try {
				for await (const page of this.runner.pages(
					REPO_LANGUAGES_QUERY,
					{
						owner: repository.owner.login,
						name: repository.name,
						cursor: langs.pageInfo.endCursor
					},
					(d: RepoLanguagesResponse) => languageConnection(d),
					{ maxPages: this.maxPages, signal }
				)) {
					add(page.nodes);
				}
			} catch (err) {
				if (!isDegradable(err)) throw err;
				this.log.warn(`  Warning: could not fetch all languages for ${key}: ${String(err)}`);
			}
		}
		return totals;
	}

	// ---------------------------------------------------------------------------
	// Phase 3: commits
	// ---------------------------------------------------------------------------

	private async collectCommits(
		authorId: string,
		repositories: readonly RepositoryContribution[],
		range: DateRange,
		signal?: AbortSignal
	): Promise<RepoCoverage[]> {
		const coverage: RepoCoverage[] = [];
		for (const { repository, contributions } of repositories) {
			const key = `${repository.owner.login}/${repository.name}`;
			const commits: Commit[] = [];
			let resolved = false;
			let complete = true;

			try {
				for await (const page of this.runner.pages(
					COMMIT_HISTORY_QUERY,
					{
						owner: repository.owner.login,
						name: repository.name,
						authorId,
						since: range.from,
						until: range.to
					},
					(d: CommitHistoryResponse) =>
						d.repository?.defaultBranchRef?.target?.history ?? null,
					{ maxPages: this.maxPages, signal }
				)) {
					resolved = true;
					if (page.truncated) complete = false;
					for (const node of page.nodes) {
						if (!range.contains(node.committedDate)) continue;
						const commit = toCommit(node, key);
						if (commit) commits.push(commit);
						else complete = false;
					}
				}
			} catch (err) {
				if (!isDegradable(err)) throw err;
				this.log.warn(`  Warning: error fetching commits for ${key}: ${String(err)}`);
				complete = false;
			}

			const missingCommits = contributions.totalCount > 0 && commits.length === 0;
			const covered = resolved && complete && !missingCommits;
			if (!covered) this.log.debug(`No complete commit line data for ${key}`);
			coverage.push({ repository: key, covered, commits });
		}
		return coverage;
	}

	// ---------------------------------------------------------------------------
	// Phase 4: pull-request fallback
	// ---------------------------------------------------------------------------

	/**
	 * In-range pull requests. Repository-scoped upstream errors end the walk
	 * and keep what it has; rate limits and network failures propagate.
	 */
	private async collectPullRequests(
		login: string,
		range: DateRange,
		signal?: AbortSignal
	): Promise<PullRequest[]> {
		const rangeStart = Date.parse(range.from);
		const prs: PullRequest[] = [];
		try {
			pages: for await (const page of this.runner.pages(
				PULL_REQUESTS_QUERY,
				{ login },
				(d: PullRequestsResponse) => d.user?.pullRequests ?? null,
				{ maxPages: this.maxPages, signal }
			)) {
				for (const node of page.nodes) {
					// Newest first: everything after this is older than the range
					if (Date.parse(node.createdAt) < rangeStart) break pages;
					if (!range.contains(node.createdAt)) continue;
					prs.push({
						id: node.id,
						createdAt: node.createdAt,
						additions: Math.max(0, node.additions ?? 0),
						deletions: Math.max(0, node.deletions ?? 0),
						repository: node.repository.nameWithOwner
					});
				}
			}
		} catch (err) {
			if (!isDegradable(err)) throw err;
			this.log.warn(
				`  Warning: pull-request fallback stopped after ${prs.length} PRs: ${String(err)}`
			);
		}
		return prs;
	}

	private async report(progress: ProgressSink | undefined, message: string): Promise<void> {
		if (!progress) return;
		try {
			await progress.report(message);
		} catch (err) {
			this.log.debug(`Progress report failed: ${String(err)}`);
		}
	}
}

function toCommit(node: CommitNode, repository: string): Commit | null {
	if (node.additions === null || node.deletions === null) return null;
	return {
		id: node.oid,
		committedAt: node.committedDate,
		additions: Math.max(0, node.additions),
		deletions: Math.max(0, node.deletions),
		repository
	};
}

/**
 * Failures scoped to one query that should not abort the whole analysis.
 * Rate limits and network failures reach here only after the retry budget is
 * spent, so they end the analysis and nothing partial is cached.
 */
function isDegradable(err: unknown): boolean {
	return (
		err instanceof UpstreamError &&
		!(err instanceof AuthenticationError) &&
		!(err instanceof RateLimitedError) &&
		!(err instanceof TransientNetworkError)
	);
}
