import type { Commit, LineStats, PullRequest } from "./types.js";

/** Commit-level line data gathered for one contributed repository. */
export interface RepoCoverage {
	/** "owner/name" */
	repository: string;
	/** True when every in-range commit of the repository carried line counts. */
	covered: boolean;
	commits: Commit[];
}

export interface CoverageScope {
	/**
	 * True when upstream reported more repositories with commits than it
	 * listed, so some repositories were never inspected.
	 */
	partialList?: boolean;
}

/**
 * Whether pull-request data is needed: some repository lacks commit-level
 * line data, the repository list was cut off, or no repository had any.
 */
export function needsPullRequestFallback(
	coverage: readonly RepoCoverage[],
	scope: CoverageScope = {}
): boolean {
	return coverage.length === 0 || scope.partialList === true || coverage.some((r) => !r.covered);
}

/**
 * Combine commit lines from covered repositories with pull-request lines for
 * the rest. Without any covered repository every pull request counts. With a
 * partial list, pull requests in unlisted repositories count too.
 * `pullRequests` must already be restricted to the analysed range.
 */
export function calculateLineStats(
	coverage: readonly RepoCoverage[],
	pullRequests: readonly PullRequest[] = [],
	scope: CoverageScope = {}
): LineStats {
	const covered = coverage.filter((r) => r.covered);
	const commits = covered.flatMap((r) => r.commits);
	const commitAdded = sum(commits.map((c) => c.additions));
	const commitDeleted = sum(commits.map((c) => c.deletions));

	if (!needsPullRequestFallback(coverage, scope)) {
		return {
			added: commitAdded,
			deleted: commitDeleted,
			method: "exact",
			sourceCount: commits.length,
			commitCount: commits.length,
			pullRequestCount: 0
		};
	}

	const uncovered = new Set(
		coverage.filter((r) => !r.covered).map((r) => r.repository.toLowerCase())
	);
	const listed = new Set(coverage.map((r) => r.repository.toLowerCase()));
	const counts = (repository: string) =>
		uncovered.has(repository) || (scope.partialList === true && !listed.has(repository));
	const prs =
		covered.length === 0
			? pullRequests
			: pullRequests.filter((pr) => counts(pr.repository.toLowerCase()));

	return {
		added: commitAdded + sum(prs.map((pr) => pr.additions)),
		deleted: commitDeleted + sum(prs.map((pr) => pr.deletions)),
		method: "estimated",
		sourceCount: commits.length + prs.length,
		commitCount: commits.length,
		pullRequestCount: prs.length
	};
}

function sum(values: readonly number[]): number {
	let total = 0;
	for (const v of values) total += Math.max(0, v);
	return total;
}
