/**
 * GraphQL documents used by the aggregator. Every query also asks for
 * `rateLimit` so the tracker sees the budget after each call.
 *
 * DateTime and GitTimestamp are different GraphQL types but accept the same
 * ISO 8601 strings, so they are declared as separate variables.
 */

import type { Connection } from "./paginator.js";

const RATE_LIMIT_FIELDS = `
  rateLimit {
    limit
    cost
    remaining
    resetAt
  }
`;

export interface RateLimitField {
	rateLimit?: {
		limit: number;
		cost: number;
		remaining: number;
		resetAt: string;
	};
}

// ---------------------------------------------------------------------------
// Phase 1: profile
// ---------------------------------------------------------------------------

export const PROFILE_QUERY = `
query($login: String!) {
  user(login: $login) {
    id
    login
    followers { totalCount }
    following { totalCount }
    starredRepositories { totalCount }
    repositories(ownerAffiliations: OWNER, privacy: PUBLIC) { totalCount }
    repositoryDiscussions { totalCount }
  }
  ${RATE_LIMIT_FIELDS}
}
`;

export interface ProfileResponse extends RateLimitField {
	user: {
		id: string;
		login: string;
		followers: { totalCount: number };
		following: { totalCount: number };
		starredRepositories: { totalCount: number };
		repositories: { totalCount: number };
		repositoryDiscussions: { totalCount: number };
	} | null;
}

// ---------------------------------------------------------------------------
// Phase 2: contribution summary and languages
// ---------------------------------------------------------------------------

export const LANGUAGE_PAGE_SIZE = 25;

export interface LanguageEdge {
	size: number;
	node: { name: string };
}

export interface LanguageConnection {
	edges: LanguageEdge[] | null;
	pageInfo: { hasNextPage: boolean; endCursor: string | null };
}

export const SUMMARY_QUERY = `
query($login: String!, $from: DateTime!, $to: DateTime!) {
  user(login: $login) {
    contributionsCollection(from: $from, to: $to) {
      totalCommitContributions
      totalIssueContributions
      totalPullRequestContributions
      totalPullRequestReviewContributions
      totalRepositoriesWithContributedCommits
      totalRepositoriesWithContributedPullRequests
      totalRepositoriesWithContributedIssues
      restrictedContributionsCount
      commitContributionsByRepository(maxRepositories: 100) {
        contributions { totalCount }
        repository {
          name
          owner { login }
          languages(first: ${LANGUAGE_PAGE_SIZE}, orderBy: { field: SIZE, direction: DESC }) {
            edges { size node { name } }
            pageInfo { hasNextPage endCursor }
          }
        }
      }
    }
  }
  ${RATE_LIMIT_FIELDS}
}
`;

export interface RepositoryContribution {
	contributions: { totalCount: number };
	repository: {
		name: string;
		owner: { login: string };
		languages: LanguageConnection | null;
	};
}

export interface SummaryResponse extends RateLimitField {
	user: {
		contributionsCollection: {
			totalCommitContributions: number;
			totalIssueContributions: number;
			totalPullRequestContributions: number;
			totalPullRequestReviewContributions: number;
			totalRepositoriesWithContributedCommits: number;
			totalRepositoriesWithContributedPullRequests: number;
			totalRepositoriesWithContributedIssues: number;
			restrictedContributionsCount: number;
			commitContributionsByRepository: RepositoryContribution[];
		};
	} | null;
}

export const REPO_LANGUAGES_QUERY = `
query($owner: String!, $name: String!, $cursor: String) {
  repository(owner: $owner, name: $name) {
    languages(first: ${LANGUAGE_PAGE_SIZE}, after: $cursor, orderBy: { field: SIZE, direction: DESC }) {
      edges { size node { name } }
      pageInfo { hasNextPage endCursor }
    }
  }
  ${RATE_LIMIT_FIELDS}
}
`;

export interface RepoLanguagesResponse extends RateLimitField {
	repository: { languages: LanguageConnection | null } | null;
}

/** Adapts GitHub's edge-based language connection to the runner's shape. */
export function languageConnection(
	data: RepoLanguagesResponse
): Connection<LanguageEdge> | null {
	const langs = data.repository?.languages;
	if (!langs) return null;
	return { nodes: langs.edges ?? [], pageInfo: langs.pageInfo };
}

// ---------------------------------------------------------------------------
// Phase 3: commit history per repository
// ---------------------------------------------------------------------------

export const COMMIT_HISTORY_QUERY = `
query($owner: String!, $name: String!, $authorId: ID!, $since: GitTimestamp!, $until: GitTimestamp!, $cursor: String) {
  repository(owner: $owner, name: $name) {
    defaultBranchRef {
      target {
        ... on Commit {
          history(first: 100, after: $cursor, author: { id: $authorId }, since: $since, until: $until) {
            nodes {
              oid
              committedDate
              additions
              deletions
            }
            pageInfo { hasNextPage endCursor }
          }
        }
      }
    }
  }
  ${RATE_LIMIT_FIELDS}
}
`;

export interface CommitNode {
	oid: string;
	committedDate: string;
	additions: number | null;
	deletions: number | null;
}

export interface CommitHistoryResponse extends RateLimitField {
	repository: {
		defaultBranchRef: {
			target: { history?: Connection<CommitNode> } | null;
		} | null;
	} | null;
}

// ---------------------------------------------------------------------------
// Phase 4: pull requests, newest first
// ---------------------------------------------------------------------------

export const PULL_REQUESTS_QUERY = `
query($login: String!, $cursor: String) {
  user(login: $login) {
    pullRequests(first: 100, after: $cursor, orderBy: { field: CREATED_AT, direction: DESC }) {
      nodes {
        id
        createdAt
        additions
        deletions
        repository { nameWithOwner }
      }
      pageInfo { hasNextPage endCursor }
    }
  }
  ${RATE_LIMIT_FIELDS}
}
`;

export interface PullRequestNode {
	id: string;
	createdAt: string;
	additions: number | null;
	deletions: number | null;
	repository: { nameWithOwner: string };
}

export interface PullRequestsResponse extends RateLimitField {
	user: { pullRequests: Connection<PullRequestNode> } | null;
}

// ---------------------------------------------------------------------------
// Budget
// ---------------------------------------------------------------------------

export const RATE_LIMIT_QUERY = `
query {
  ${RATE_LIMIT_FIELDS}
}
`;

export type RateLimitResponse = RateLimitField;
