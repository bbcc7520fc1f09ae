import pg from "pg";
import { freezeStats } from "./cache.js";
import { CacheError } from "./errors.js";
import type {
	CachedReport,
	ContributionStats,
	LineMethod,
	RememberedSubject,
	ReportCache,
	UserDirectory
} from "./types.js";

/** The part of `pg.Pool` / `pg.Client` the store uses. */
export interface Queryable {
	query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
	end(): Promise<void>;
}

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS contribution_reports (
    id SERIAL PRIMARY KEY,
    subject VARCHAR(255) NOT NULL,
    range_key VARCHAR(32) NOT NULL,
    login VARCHAR(255) NOT NULL,
    range_start VARCHAR(10) NOT NULL,
    range_end VARCHAR(10) NOT NULL,
    commits INTEGER NOT NULL DEFAULT 0,
    pull_requests INTEGER NOT NULL DEFAULT 0,
    issues INTEGER NOT NULL DEFAULT 0,
    discussions INTEGER NOT NULL DEFAULT 0,
    reviews INTEGER NOT NULL DEFAULT 0,
    repositories_contributed INTEGER NOT NULL DEFAULT 0,
    starred_repos INTEGER NOT NULL DEFAULT 0,
    followers INTEGER NOT NULL DEFAULT 0,
    following INTEGER NOT NULL DEFAULT 0,
    public_repos INTEGER NOT NULL DEFAULT 0,
    private_contributions INTEGER NOT NULL DEFAULT 0,
    languages JSONB NOT NULL DEFAULT '{}'::jsonb,
    lines_added INTEGER NOT NULL DEFAULT 0,
    lines_deleted INTEGER NOT NULL DEFAULT 0,
    line_method VARCHAR(16) NOT NULL,
    generated_at TIMESTAMP WITH TIME ZONE NOT NULL,
    created_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP,
    UNIQUE (subject, range_key)
);

CREATE TABLE IF NOT EXISTS remembered_subjects (
    caller_id VARCHAR(255) PRIMARY KEY,
    subject VARCHAR(255),
    last_query_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP
);
`;

const REPORT_COLUMNS = [
	"subject",
	"range_key",
	"login",
	"range_start",
	"range_end",
	"commits",
	"pull_requests",
	"issues",
	"discussions",
	"reviews",
	"repositories_contributed",
	"starred_repos",
	"followers",
	"following",
	"public_repos",
	"private_contributions",
	"languages",
	"lines_added",
	"lines_deleted",
	"line_method",
	"generated_at"
] as const;

const UPSERT_REPORT_SQL = `
INSERT INTO contribution_reports (${REPORT_COLUMNS.join(", ")})
VALUES (${REPORT_COLUMNS.map((_, i) => `$${i + 1}`).join(", ")})
ON CONFLICT (subject, range_key) DO UPDATE SET
    ${REPORT_COLUMNS.slice(2)
			.map((c) => `${c} = EXCLUDED.${c}`)
			.join(",\n    ")},
    created_at = CURRENT_TIMESTAMP
RETURNING *;
`;

const SELECT_REPORT_SQL = `
SELECT * FROM contribution_reports
WHERE subject = $1 AND range_key = $2
`;

const SELECT_KEYS_SQL = `
SELECT range_key FROM contribution_reports
WHERE subject = $1
ORDER BY range_key
`;

const UPSERT_SUBJECT_SQL = `
INSERT INTO remembered_subjects (caller_id, subject, last_query_at)
VALUES ($1, $2, CURRENT_TIMESTAMP)
ON CONFLICT (caller_id) DO UPDATE SET
    subject = COALESCE(EXCLUDED.subject, remembered_subjects.subject),
    last_query_at = CURRENT_TIMESTAMP
`;

const SELECT_SUBJECT_SQL = `
SELECT caller_id, subject, last_query_at FROM remembered_subjects
WHERE caller_id = $1
`;

/**
 * PostgreSQL-backed report cache. One row per (subject, range key); a later
 * `put` upserts over the earlier row in a single statement.
 */
export class PgReportCache implements ReportCache, UserDirectory {
	private db: Queryable;

	constructor(db: Queryable) {
		this.db = db;
	}

	static fromConnectionString(connectionString: string): PgReportCache {
		return new PgReportCache(new pg.Pool({ connectionString }));
	}

	async initializeSchema(): Promise<void> {
		await this.run("write", SCHEMA_SQL);
	}

	async get(subject: string, rangeKey: string): Promise<CachedReport | undefined> {
		const { rows } = await this.run("read", SELECT_REPORT_SQL, [
			subject.toLowerCase(),
			rangeKey
		]);
		return rows.length > 0 ? parseReport(rows[0]) : undefined;
	}

	async put(subject: string, rangeKey: string, stats: ContributionStats): Promise<CachedReport> {
		const values = [
			subject.toLowerCase(),
			rangeKey,
			stats.subject,
			stats.range.start,
			stats.range.end,
			stats.commits,
			stats.pullRequests,
			stats.issues,
			stats.discussions,
			stats.reviews,
			stats.repositoriesContributed,
			stats.starredRepos,
			stats.followers,
			stats.following,
			stats.publicRepos,
			stats.privateContributions,
			JSON.stringify(stats.languages),
			stats.linesAdded,
			stats.linesDeleted,
			stats.lineMethod,
			stats.generatedAt
		];
		const { rows } = await this.run("write", UPSERT_REPORT_SQL, values);
		if (rows.length === 0) {
			throw new CacheError("write", `Upsert for ${subject} (${rangeKey}) returned no row`);
		}
		return parseReport(rows[0]);
	}

	async keys(subject: string): Promise<string[]> {
		const { rows } = await this.run("read", SELECT_KEYS_SQL, [subject.toLowerCase()]);
		return rows.map((row) => readString(row, "range_key"));
	}

	async remember(callerId: string, subject?: string): Promise<void> {
		await this.run("write", UPSERT_SUBJECT_SQL, [callerId, subject ?? null]);
	}

	async recall(callerId: string): Promise<RememberedSubject | undefined> {
		const { rows } = await this.run("read", SELECT_SUBJECT_SQL, [callerId]);
		if (rows.length === 0) return undefined;
		const row = rows[0];
		if (!isRow(row) || typeof row.subject !== "string") return undefined;
		return {
			callerId: readString(row, "caller_id"),
			subject: row.subject,
			lastQueryAt: readTimestamp(row, "last_query_at")
		};
	}

	async close(): Promise<void> {
		await this.db.end();
	}

	private async run(
		operation: "read" | "write",
		text: string,
		values?: unknown[]
	): Promise<{ rows: unknown[] }> {
		try {
			return await this.db.query(text, values);
		} catch (err) {
			throw new CacheError(
				operation,
				`PostgreSQL ${operation} failed: ${err instanceof Error ? err.message : String(err)}`,
				{ cause: err }
			);
		}
	}
}

// ---------------------------------------------------------------------------
// Row decoding
// ---------------------------------------------------------------------------

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
	return typeof value === "object" && value !== null;
}

function parseReport(value: unknown): CachedReport {
	if (!isRow(value)) throw new CacheError("read", "Unexpected report row");
	const rangeKey = readString(value, "range_key");
	const stats: ContributionStats = {
		subject: readString(value, "login"),
		range: {
			start: readString(value, "range_start"),
			end: readString(value, "range_end"),
			key: rangeKey
		},
		commits: readNumber(value, "commits"),
		pullRequests: readNumber(value, "pull_requests"),
		issues: readNumber(value, "issues"),
		discussions: readNumber(value, "discussions"),
		reviews: readNumber(value, "reviews"),
		repositoriesContributed: readNumber(value, "repositories_contributed"),
		starredRepos: readNumber(value, "starred_repos"),
		followers: readNumber(value, "followers"),
		following: readNumber(value, "following"),
		publicRepos: readNumber(value, "public_repos"),
		privateContributions: readNumber(value, "private_contributions"),
		languages: readLanguages(value.languages),
		linesAdded: readNumber(value, "lines_added"),
		linesDeleted: readNumber(value, "lines_deleted"),
		lineMethod: readLineMethod(value.line_method),
		generatedAt: readTimestamp(value, "generated_at")
	};
	return {
		id: String(readNumber(value, "id")),
		createdAt: readTimestamp(value, "created_at"),
		subject: readString(value, "subject"),
		rangeKey,
		stats: freezeStats(stats)
	};
}

function readString(row: unknown, column: string): string {
	const value = isRow(row) ? row[column] : undefined;
	if (typeof value !== "string") {
		throw new CacheError("read", `Column ${column} is not text`);
	}
	return value;
}

function readNumber(row: Row, column: string): number {
	const value = row[column];
	// pg returns BIGINT/NUMERIC as strings
	const n = typeof value === "string" ? Number(value) : value;
	if (typeof n !== "number" || Number.isNaN(n)) {
		throw new CacheError("read", `Column ${column} is not numeric`);
	}
	return n;
}

function readTimestamp(row: Row, column: string): string {
	const value = row[column];
	if (value instanceof Date) return value.toISOString();
	if (typeof value === "string") return new Date(value).toISOString();
	throw new CacheError("read", `Column ${column} is not a timestamp`);
}

function readLanguages(value: unknown): Record<string, number> {
	let parsed: unknown = value;
	if (typeof value === "string") {
		try {
			parsed = JSON.parse(value);
		} catch (err) {
			throw new CacheError("read", "Column languages is not valid JSON", { cause: err });
		}
	}
	const languages: Record<string, number> = {};
	if (!isRow(parsed)) return languages;
	for (const [name, bytes] of Object.entries(parsed)) {
		if (typeof bytes === "number") languages[name] = bytes;
	}
	return languages;
}

function readLineMethod(value: unknown): LineMethod {
	if (value === "exact" || value === "estimated") return value;
	throw new CacheError("read", `Unknown line method ${String(value)}`);
}
