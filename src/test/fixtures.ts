import type { ContributionStats } from "../types.js";

export function sampleStats(overrides: Partial<ContributionStats> = {}): ContributionStats {
	return {
		subject: "octocat",
		range: { start: "2024-01-01", end: "2024-12-31", key: "2024" },
		commits: 120,
		pullRequests: 10,
		issues: 4,
		discussions: 1,
		reviews: 6,
		repositoriesContributed: 5,
		starredRepos: 30,
		followers: 900,
		following: 12,
		publicRepos: 8,
		privateContributions: 40,
		languages: { TypeScript: 5000, Go: 1200 },
		linesAdded: 4321,
		linesDeleted: 1234,
		lineMethod: "exact",
		generatedAt: "2025-01-02T00:00:00.000Z",
		...overrides
	};
}
