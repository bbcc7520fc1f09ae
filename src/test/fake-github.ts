import type { Connection } from "../paginator.js";
import {
	COMMIT_HISTORY_QUERY,
	type CommitHistoryResponse,
	type CommitNode,
	PROFILE_QUERY,
	type ProfileResponse,
	PULL_REQUESTS_QUERY,
	type PullRequestNode,
	type PullRequestsResponse,
	REPO_LANGUAGES_QUERY,
	type RepoLanguagesResponse,
	type RepositoryContribution,
	SUMMARY_QUERY,
	type SummaryResponse
} from "../queries.js";
import type { GraphQLExecutor } from "../types.js";

export type Handler = (variables: Record<string, unknown>) => unknown;

/** In-process GraphQL executor answering known queries from handlers. */
export class FakeGitHub implements GraphQLExecutor {
	readonly calls: Array<{ query: string; variables: Record<string, unknown> }> = [];
	private handlers = new Map<string, Handler>();

	on(query: string, handler: Handler): this {
		this.handlers.set(query, handler);
		return this;
	}

	async execute<T>(query: string, variables: Record<string, unknown> = {}): Promise<T> {
		this.calls.push({ query, variables });
		const handler = this.handlers.get(query);
		if (!handler) throw new Error(`No handler for query: ${query.trim().slice(0, 60)}`);
		return handler(variables) as T;
	}

	count(query: string): number {
		return this.calls.filter((c) => c.query === query).length;
	}
}

export interface ProfileFixture {
	id?: string;
	login: string;
	followers?: number;
	following?: number;
	starred?: number;
	publicRepos?: number;
	discussions?: number;
}

export function profile(p: ProfileFixture): ProfileResponse {
	return {
		user: {
			id: p.id ?? `U_${p.login}`,
			login: p.login,
			followers: { totalCount: p.followers ?? 0 },
			following: { totalCount: p.following ?? 0 },
			starredRepositories: { totalCount: p.starred ?? 0 },
			repositories: { totalCount: p.publicRepos ?? 0 },
			repositoryDiscussions: { totalCount: p.discussions ?? 0 }
		}
	};
}

export interface RepoFixture {
	owner: string;
	name: string;
	contributions: number;
	languages?: Record<string, number>;
	/** Cursor for a further page of languages. */
	moreLanguages?: string;
}

export function repo(r: RepoFixture): RepositoryContribution {
	return {
		contributions: { totalCount: r.contributions },
		repository: {
			name: r.name,
			owner: { login: r.owner },
			languages: {
				edges: Object.entries(r.languages ?? {}).map(([name, size]) => ({ size, node: { name } })),
				pageInfo: { hasNextPage: r.moreLanguages !== undefined, endCursor: r.moreLanguages ?? null }
			}
		}
	};
}

export interface SummaryFixture {
	commits?: number;
	issues?: number;
	pullRequests?: number;
	reviews?: number;
	reposWithCommits?: number;
	reposWithPullRequests?: number;
	reposWithIssues?: number;
	restricted?: number;
	repositories?: RepositoryContribution[];
}

export function summary(s: SummaryFixture): SummaryResponse {
	return {
		user: {
			contributionsCollection: {
				totalCommitContributions: s.commits ?? 0,
				totalIssueContributions: s.issues ?? 0,
				totalPullRequestContributions: s.pullRequests ?? 0,
				totalPullRequestReviewContributions: s.reviews ?? 0,
				totalRepositoriesWithContributedCommits: s.reposWithCommits ?? 0,
				totalRepositoriesWithContributedPullRequests: s.reposWithPullRequests ?? 0,
				totalRepositoriesWithContributedIssues: s.reposWithIssues ?? 0,
				restrictedContributionsCount: s.restricted ?? 0,
				commitContributionsByRepository: s.repositories ?? []
			}
		}
	};
}

export function languagePage(languages: Record<string, number>): RepoLanguagesResponse {
	return {
		repository: {
			languages: {
				edges: Object.entries(languages).map(([name, size]) => ({ size, node: { name } })),
				pageInfo: { hasNextPage: false, endCursor: null }
			}
		}
	};
}

export function commitNode(
	oid: string,
	committedDate: string,
	additions: number | null,
	deletions: number | null
): CommitNode {
	return { oid, committedDate, additions, deletions };
}

export function commitPage(nodes: CommitNode[], nextCursor?: string): CommitHistoryResponse {
	return {
		repository: {
			defaultBranchRef: { target: { history: connection(nodes, nextCursor) } }
		}
	};
}

/** A repository without a default branch: no commit history to read. */
export const EMPTY_REPOSITORY: CommitHistoryResponse = { repository: { defaultBranchRef: null } };

export function pullRequest(
	id: string,
	createdAt: string,
	repository: string,
	additions: number | null,
	deletions: number | null
): PullRequestNode {
	return { id, createdAt, additions, deletions, repository: { nameWithOwner: repository } };
}

export function pullRequestPage(nodes: PullRequestNode[], nextCursor?: string): PullRequestsResponse {
	return { user: { pullRequests: connection(nodes, nextCursor) } };
}

function connection<T>(nodes: T[], nextCursor?: string): Connection<T> {
	return {
		nodes,
		pageInfo: { hasNextPage: nextCursor !== undefined, endCursor: nextCursor ?? null }
	};
}

export {
	COMMIT_HISTORY_QUERY,
	PROFILE_QUERY,
	PULL_REQUESTS_QUERY,
	REPO_LANGUAGES_QUERY,
	SUMMARY_QUERY
};
