import type { ContributionAggregator } from "./aggregator.js";
import { DateRange, EPOCH_YEAR } from "./date-range.js";
import type { AllTimeStats, ContributionStats, LineMethod, ProgressSink } from "./types.js";

export interface AllTimeOptions {
	fromYear?: number;
	/** Restrict to these years instead of every year since `fromYear`. */
	years?: readonly number[];
	/** Years to aggregate again even when cached. */
	refreshYears?: readonly number[];
	progress?: ProgressSink;
	signal?: AbortSignal;
	now?: Date;
}

/** Calendar years from `fromYear` (default 2008) up to the current year. */
export function yearsSince(fromYear: number = EPOCH_YEAR, now: Date = new Date()): number[] {
	const first = Math.max(fromYear, EPOCH_YEAR);
	const years: number[] = [];
	for (let year = first; year <= now.getUTCFullYear(); year++) years.push(year);
	return years;
}

/**
 * One `ContributionStats` per calendar year, oldest first. Cached years are
 * served by the aggregator's cache, so only missing years reach GitHub.
 */
export async function collectAllTime(
	aggregator: ContributionAggregator,
	subject: string,
	options: AllTimeOptions = {}
): Promise<ContributionStats[]> {
	const now = options.now ?? new Date();
	const years = options.years
		? [...options.years].sort((a, b) => a - b)
		: yearsSince(options.fromYear, now);
	const refresh = new Set(options.refreshYears ?? []);

	const results: ContributionStats[] = [];
	for (const year of years) {
		const range = DateRange.calendarYear(year, now);
		results.push(
			await aggregator.contributions(subject, range, {
				progress: options.progress,
				signal: options.signal,
				refresh: refresh.has(year)
			})
		);
	}
	return results;
}

/**
 * Sum yearly stats. Account-level counts (followers, stars, repositories)
 * are snapshots, so they come from the latest year rather than being summed.
 */
export function summarizeAllTime(
	subject: string,
	yearly: readonly ContributionStats[]
): AllTimeStats | undefined {
	if (yearly.length === 0) return undefined;

	const byYear = [...yearly].sort((a, b) => a.range.start.localeCompare(b.range.start));
	const latest = byYear[byYear.length - 1];
	const languages: Record<string, number> = {};
	const methods = new Set<LineMethod>();
	let lastUpdated = byYear[0].generatedAt;

	const totals = {
		commits: 0,
		pullRequests: 0,
		issues: 0,
		discussions: 0,
		reviews: 0,
		privateContributions: 0,
		linesAdded: 0,
		linesDeleted: 0
	};

	for (const s of byYear) {
		totals.commits += s.commits;
		totals.pullRequests += s.pullRequests;
		totals.issues += s.issues;
		totals.discussions += s.discussions;
		totals.reviews += s.reviews;
		totals.privateContributions += s.privateContributions;
		totals.linesAdded += s.linesAdded;
		totals.linesDeleted += s.linesDeleted;
		methods.add(s.lineMethod);
		for (const [lang, bytes] of Object.entries(s.languages)) {
			languages[lang] = (languages[lang] ?? 0) + bytes;
		}
		if (s.generatedAt > lastUpdated) lastUpdated = s.generatedAt;
	}

	return {
		subject,
		years: byYear.length,
		firstYear: parseInt(byYear[0].range.start.slice(0, 4), 10),
		lastYear: parseInt(latest.range.start.slice(0, 4), 10),
		...totals,
		lineMethods: [...methods].sort(),
		repositoriesContributed: latest.repositoriesContributed,
		starredRepos: latest.starredRepos,
		followers: latest.followers,
		following: latest.following,
		publicRepos: latest.publicRepos,
		languages,
		lastUpdated
	};
}
