import type { AllTimeStats, ContributionStats } from "./types.js";

const LABEL_WIDTH = 24;
const BAR_WIDTH = 20;

export function formatReport(stats: ContributionStats, title?: string): string {
	const lines = [
		`${stats.subject} — ${title ?? describeRange(stats.range)}`,
		row("Commits", stats.commits),
		row("Pull requests", stats.pullRequests),
		row("Issues", stats.issues),
		row("Reviews", stats.reviews),
		row("Discussions", stats.discussions),
		row("Private contributions", stats.privateContributions),
		row("Repositories", stats.repositoriesContributed),
		row("Followers", stats.followers),
		row("Following", stats.following),
		row("Starred repositories", stats.starredRepos),
		row("Public repositories", stats.publicRepos),
		`  ${"Lines".padEnd(LABEL_WIDTH)}+${formatNum(stats.linesAdded)} / -${formatNum(stats.linesDeleted)} (${stats.lineMethod})`
	];
	return [...lines, ...formatLanguages(stats.languages)].join("\n");
}

export function formatAllTime(stats: AllTimeStats): string {
	const lines = [
		`${stats.subject} — all time (${stats.firstYear}–${stats.lastYear}, ${stats.years} years)`,
		row("Commits", stats.commits),
		row("Pull requests", stats.pullRequests),
		row("Issues", stats.issues),
		row("Reviews", stats.reviews),
		row("Discussions", stats.discussions),
		row("Private contributions", stats.privateContributions),
		row("Repositories", stats.repositoriesContributed),
		row("Followers", stats.followers),
		row("Starred repositories", stats.starredRepos),
		`  ${"Lines".padEnd(LABEL_WIDTH)}+${formatNum(stats.linesAdded)} / -${formatNum(stats.linesDeleted)} (${stats.lineMethods.join(", ")})`
	];
	return [...lines, ...formatLanguages(stats.languages)].join("\n");
}

/** Top languages by bytes, with a bar scaled to the largest. */
export function formatLanguages(
	languages: Readonly<Record<string, number>>,
	topN = 10
): string[] {
	const top = Object.entries(languages)
		.sort(([a, x], [b, y]) => y - x || a.localeCompare(b))
		.slice(0, topN);
	if (top.length === 0) return [];
	const max = top[0][1] || 1;
	return [
		"Top languages (bytes):",
		...top.map(([lang, bytes]) => {
			const bar = "█".repeat(Math.round((bytes / max) * BAR_WIDTH));
			return `  ${lang.padEnd(LABEL_WIDTH - 4)} ${bar.padEnd(BAR_WIDTH)} ${formatNum(bytes)}`;
		})
	];
}

function describeRange(range: ContributionStats["range"]): string {
	return /^\d{4}$/.test(range.key) ? range.key : `${range.start} to ${range.end}`;
}

function row(label: string, value: number): string {
	return `  ${label.padEnd(LABEL_WIDTH)}${formatNum(value)}`;
}

export function formatNum(n: number): string {
	return n.toLocaleString("en-US");
}
