import { describe, expect, it } from "vitest";
import { calculateLineStats, needsPullRequestFallback, type RepoCoverage } from "./line-stats.js";
import type { Commit, PullRequest } from "./types.js";

function commit(repository: string, additions: number, deletions: number): Commit {
	return { id: `${repository}-${additions}`, committedAt: "2024-05-01T00:00:00Z", additions, deletions, repository };
}

function pr(repository: string, additions: number, deletions: number): PullRequest {
	return { id: `pr-${repository}-${additions}`, createdAt: "2024-05-01T00:00:00Z", additions, deletions, repository };
}

describe("calculateLineStats", () => {
	it("is exact when every repository has commit data", () => {
		const coverage: RepoCoverage[] = [
			{ repository: "a/one", covered: true, commits: [commit("a/one", 10, 2), commit("a/one", 5, 1)] },
			{ repository: "a/two", covered: true, commits: [commit("a/two", 7, 0)] }
		];
		expect(needsPullRequestFallback(coverage)).toBe(false);
		expect(calculateLineStats(coverage, [pr("a/one", 1000, 1000)])).toEqual({
			added: 22,
			deleted: 3,
			method: "exact",
			sourceCount: 3,
			commitCount: 3,
			pullRequestCount: 0
		});
	});

	it("adds pull requests only for repositories without commit data", () => {
		const coverage: RepoCoverage[] = [
			{ repository: "a/one", covered: true, commits: [commit("a/one", 10, 2)] },
			{ repository: "b/two", covered: false, commits: [] }
		];
		const prs = [pr("a/one", 500, 500), pr("B/Two", 30, 4), pr("b/two", 20, 6)];
		expect(needsPullRequestFallback(coverage)).toBe(true);
		expect(calculateLineStats(coverage, prs)).toEqual({
			added: 60,
			deleted: 12,
			method: "estimated",
			sourceCount: 3,
			commitCount: 1,
			pullRequestCount: 2
		});
	});

	it("uses every pull request when no repository is covered", () => {
		const coverage: RepoCoverage[] = [{ repository: "a/one", covered: false, commits: [] }];
		const prs = [pr("a/one", 3, 1), pr("elsewhere/repo", 4, 2)];
		expect(calculateLineStats(coverage, prs)).toMatchObject({
			added: 7,
			deleted: 3,
			method: "estimated",
			pullRequestCount: 2
		});
	});

	it("is estimated from pull requests when there are no repositories at all", () => {
		expect(needsPullRequestFallback([])).toBe(true);
		expect(calculateLineStats([], [pr("x/y", 9, 9)])).toMatchObject({
			added: 9,
			deleted: 9,
			method: "estimated"
		});
		expect(calculateLineStats([])).toEqual({
			added: 0,
			deleted: 0,
			method: "estimated",
			sourceCount: 0,
			commitCount: 0,
			pullRequestCount: 0
		});
	});

	it("estimates unlisted repositories from their pull requests when the list is partial", () => {
		const coverage: RepoCoverage[] = [
			{ repository: "a/one", covered: true, commits: [commit("a/one", 10, 2)] }
		];
		const prs = [pr("a/one", 500, 500), pr("other/repo", 3, 1)];
		const scope = { partialList: true };
		expect(needsPullRequestFallback(coverage, scope)).toBe(true);
		expect(calculateLineStats(coverage, prs, scope)).toEqual({
			added: 13,
			deleted: 3,
			method: "estimated",
			sourceCount: 2,
			commitCount: 1,
			pullRequestCount: 1
		});
	});

	it("never goes negative", () => {
		const coverage: RepoCoverage[] = [
			{ repository: "a/one", covered: true, commits: [commit("a/one", -5, -1), commit("a/one", 3, 2)] }
		];
		expect(calculateLineStats(coverage)).toMatchObject({ added: 3, deleted: 2 });
	});
});
