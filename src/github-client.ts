import {
	AuthenticationError,
	GraphQLSemanticError,
	type GraphQLErrorEntry,
	isAbortError,
	MalformedResponseError,
	RateLimitedError,
	TransientNetworkError
} from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { DEFAULT_POINTS_PER_HOUR, type RateLimitTracker } from "./rate-limit.js";
import { abortReason } from "./sleep.js";
import type { GraphQLExecutor, RateLimit } from "./types.js";

export const GH_GRAPHQL = "https://api.github.com/graphql";

/** Maximum characters kept from an error response body. */
const MAX_ERROR_BODY_LENGTH = 200;

export interface GitHubTransportOptions {
	token: string;
	tracker: RateLimitTracker;
	endpoint?: string;
	/** Per-request timeout. Defaults to 30s. */
	timeoutMs?: number;
	logger?: Logger;
}

/**
 * Sends one authenticated GraphQL request and turns the response envelope
 * into data or a typed failure. Every response, successful or not, updates
 * the shared rate-limit tracker.
 */
export class GitHubTransport implements GraphQLExecutor {
	private token: string;
	private endpoint: string;
	private timeoutMs: number;
	private tracker: RateLimitTracker;
	private log: Logger;

	constructor(options: GitHubTransportOptions) {
		this.token = options.token;
		this.endpoint = options.endpoint ?? GH_GRAPHQL;
		this.timeoutMs = options.timeoutMs ?? 30_000;
		this.tracker = options.tracker;
		this.log = options.logger ?? createLogger({ verbose: false, json: false });
	}

	private headers(): Record<string, string> {
		return {
			Authorization: `Bearer ${this.token}`,
			"Content-Type": "application/json",
			Accept: "application/json",
			"User-Agent": "github-contribution-stats/0.1"
		};
	}

	async execute<T>(
		query: string,
		variables: Record<string, unknown> = {},
		options: { signal?: AbortSignal } = {}
	): Promise<T> {
		const { signal } = options;
		if (signal?.aborted) throw abortReason(signal);

		const controller = new AbortController();
		let timedOut = false;
		const timer = setTimeout(() => {
			timedOut = true;
			controller.abort();
		}, this.timeoutMs);
		const onAbort = () => controller.abort(signal?.reason);
		signal?.addEventListener("abort", onAbort, { once: true });

		try {
			let res: Response;
			let text: string;
			try {
				res = await fetch(this.endpoint, {
					method: "POST",
					headers: this.headers(),
					body: JSON.stringify({ query, variables }),
					signal: controller.signal
				});
				text = await res.text();
			} catch (err) {
				if (signal?.aborted) throw abortReason(signal);
				if (timedOut) {
					throw new TransientNetworkError(
						`GraphQL request timed out after ${this.timeoutMs}ms`,
						{ cause: err }
					);
				}
				if (isAbortError(err)) throw err;
				throw new TransientNetworkError(
					`GraphQL request failed: ${err instanceof Error ? err.message : String(err)}`,
					{ cause: err }
				);
			}
			return this.handleResponse<T>(res, text);
		} finally {
			clearTimeout(timer);
			signal?.removeEventListener("abort", onAbort);
		}
	}

	// ---------------------------------------------------------------------------
	// Response classification
	// ---------------------------------------------------------------------------

	private handleResponse<T>(res: Response, text: string): T {
		this.updateRateLimitFromHeaders(res.headers);
		const status = res.status;

		if (status === 401) {
			throw new AuthenticationError(
				`Authentication failed (401): ${truncate(text)}`,
				{ status }
			);
		}
		if (status === 403 || status === 429) {
			if (status === 429 || isRateLimitResponse(res.headers, text)) {
				throw new RateLimitedError(
					`GitHub rate limit hit (${status}): ${truncate(text)}`,
					{ status, retryAfterMs: retryAfterMs(res.headers) }
				);
			}
			throw new AuthenticationError(`Forbidden (403): ${truncate(text)}`, {
				status
			});
		}
		if (status >= 500) {
			throw new TransientNetworkError(
				`GitHub server error (${status}): ${truncate(text)}`,
				{ status }
			);
		}

		let json: unknown;
		try {
			json = JSON.parse(text);
		} catch (err) {
			if (status >= 400) {
				throw new GraphQLSemanticError([{ message: `HTTP ${status}: ${truncate(text)}` }], {
					status
				});
			}
			throw new MalformedResponseError(
				`Failed to parse GraphQL response: ${truncate(text)}`,
				{ status, cause: err }
			);
		}

		if (!isRecord(json) || !("data" in json || "errors" in json)) {
			if (status >= 400) {
				throw new GraphQLSemanticError([{ message: `HTTP ${status}: ${truncate(text)}` }], {
					status
				});
			}
			throw new MalformedResponseError(
				`Unexpected GraphQL envelope: ${truncate(text)}`,
				{ status }
			);
		}

		const data = isRecord(json.data) ? json.data : undefined;
		if (data) this.updateRateLimitFromBody(data);

		const errors = parseErrors(json.errors);
		if (errors.length > 0) {
			if (errors.some(isRateLimitError)) {
				throw new RateLimitedError(
					`GraphQL rate limit: ${errors.map((e) => e.message).join("; ")}`,
					{ status }
				);
			}
			if (errors.some((e) => e.type === "TIMEOUT")) {
				throw new TransientNetworkError(
					`GraphQL query timed out: ${errors.map((e) => e.message).join("; ")}`,
					{ status }
				);
			}
			throw new GraphQLSemanticError(errors, { status, data });
		}
		if (status >= 400) {
			throw new GraphQLSemanticError([{ message: `HTTP ${status}` }], { status });
		}
		if (!data) {
			throw new MalformedResponseError("GraphQL response carried no data", {
				status
			});
		}
		return data as T;
	}

	private updateRateLimitFromHeaders(headers: Headers): void {
		const remaining = headers.get("x-ratelimit-remaining");
		const reset = headers.get("x-ratelimit-reset");
		if (remaining === null || reset === null) return;
		const limit = headers.get("x-ratelimit-limit");
		const snapshot: RateLimit = {
			limit: limit !== null ? parseInt(limit, 10) : DEFAULT_POINTS_PER_HOUR,
			remaining: parseInt(remaining, 10),
			resetAt: parseInt(reset, 10) * 1000
		};
		if (Number.isNaN(snapshot.remaining) || Number.isNaN(snapshot.resetAt)) {
			this.log.debug(`Ignoring unparsable rate-limit headers: ${remaining}/${reset}`);
			return;
		}
		this.tracker.observe(snapshot);
	}

	/** The `rateLimit` field each query requests alongside its payload. */
	private updateRateLimitFromBody(data: Record<string, unknown>): void {
		const rl = data.rateLimit;
		if (!isRecord(rl)) return;
		if (typeof rl.remaining !== "number" || typeof rl.resetAt !== "string")
			return;
		const resetAt = Date.parse(rl.resetAt);
		if (Number.isNaN(resetAt)) return;
		this.tracker.observe({
			limit: typeof rl.limit === "number" ? rl.limit : DEFAULT_POINTS_PER_HOUR,
			remaining: rl.remaining,
			resetAt,
			cost: typeof rl.cost === "number" ? rl.cost : undefined
		});
		this.log.debug(
			`Rate limit: ${rl.remaining} remaining, resets ${rl.resetAt}`
		);
	}
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseErrors(value: unknown): GraphQLErrorEntry[] {
	if (!Array.isArray(value)) return [];
	return value.map((e: unknown) => {
		if (!isRecord(e)) return { message: String(e) };
		return {
			message: typeof e.message === "string" ? e.message : "Unknown error",
			type: typeof e.type === "string" ? e.type : undefined,
			path: Array.isArray(e.path)
				? e.path.filter(
						(p: unknown): p is string | number =>
							typeof p === "string" || typeof p === "number"
					)
				: undefined
		};
	});
}

function isRateLimitError(e: GraphQLErrorEntry): boolean {
	return e.type === "RATE_LIMITED" || /rate limit/i.test(e.message);
}

function isRateLimitResponse(headers: Headers, body: string): boolean {
	return (
		headers.get("x-ratelimit-remaining") === "0" ||
		headers.get("retry-after") !== null ||
		/rate limit/i.test(body)
	);
}

function retryAfterMs(headers: Headers): number | undefined {
	const value = headers.get("retry-after");
	if (value === null) return undefined;
	const seconds = parseInt(value, 10);
	return Number.isNaN(seconds) ? undefined : seconds * 1000;
}

function truncate(s: string, max = MAX_ERROR_BODY_LENGTH): string {
	return s.length > max ? s.slice(0, max) + "..." : s;
}
