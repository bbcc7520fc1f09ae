import type { ContributionStats } from "./types.js";

/** A single entry from a GraphQL `errors` array. */
export interface GraphQLErrorEntry {
	message: string;
	type?: string;
	path?: ReadonlyArray<string | number>;
}

export class InvalidDateRangeError extends Error {
	override readonly name = "InvalidDateRangeError";
}

export class ConfigError extends Error {
	override readonly name = "ConfigError";
}

// ---------------------------------------------------------------------------
// Upstream failures
// ---------------------------------------------------------------------------

/** Base class for everything that went wrong talking to GitHub. */
export class UpstreamError extends Error {
	override readonly name: string = "UpstreamError";
	/** HTTP status, when the failure came from a response. */
	readonly status?: number;

	constructor(message: string, options?: { status?: number; cause?: unknown }) {
		super(message, { cause: options?.cause });
		this.status = options?.status;
	}
}

/** 401, or 403 without a rate-limit cause. Never retried. */
export class AuthenticationError extends UpstreamError {
	override readonly name = "AuthenticationError";
}

export class RateLimitedError extends UpstreamError {
	override readonly name = "RateLimitedError";
	readonly retryAfterMs?: number;
	/** Set when the wait until reset exceeded the tracker's cap. */
	readonly exhausted: boolean;

	constructor(
		message: string,
		options?: {
			status?: number;
			cause?: unknown;
			retryAfterMs?: number;
			exhausted?: boolean;
		}
	) {
		super(message, options);
		this.retryAfterMs = options?.retryAfterMs;
		this.exhausted = options?.exhausted ?? false;
	}
}

/** Timeouts, connection failures and 5xx responses. */
export class TransientNetworkError extends UpstreamError {
	override readonly name = "TransientNetworkError";
}

/** A well-formed response whose `errors` are unrelated to rate limiting. */
export class GraphQLSemanticError extends UpstreamError {
	override readonly name = "GraphQLSemanticError";
	readonly errors: readonly GraphQLErrorEntry[];
	readonly data?: unknown;

	constructor(
		errors: readonly GraphQLErrorEntry[],
		options?: { status?: number; data?: unknown }
	) {
		super(
			`GraphQL errors: ${errors.map((e) => e.message).join("; ") || "unknown error"}`,
			options
		);
		this.errors = errors;
		this.data = options?.data;
	}

	get isNotFound(): boolean {
		return (
			this.errors.length > 0 && this.errors.every((e) => e.type === "NOT_FOUND")
		);
	}
}

export class MalformedResponseError extends UpstreamError {
	override readonly name = "MalformedResponseError";
}

export class SubjectNotFoundError extends UpstreamError {
	override readonly name = "SubjectNotFoundError";
	readonly subject: string;

	constructor(subject: string, options?: { cause?: unknown }) {
		super(`GitHub user "${subject}" does not exist`, options);
		this.subject = subject;
	}
}

// ---------------------------------------------------------------------------
// Storage failures
// ---------------------------------------------------------------------------

export class CacheError extends Error {
	override readonly name = "CacheError";
	readonly operation: "read" | "write";
	/** Freshly computed stats that could not be written through. */
	readonly stats?: ContributionStats;

	constructor(
		operation: "read" | "write",
		message: string,
		options?: { cause?: unknown; stats?: ContributionStats }
	) {
		super(message, { cause: options?.cause });
		this.operation = operation;
		this.stats = options?.stats;
	}
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isAbortError(err: unknown): boolean {
	return (
		err instanceof Error &&
		(err.name === "AbortError" || err.name === "TimeoutError")
	);
}

export function isRetryable(err: unknown): boolean {
	return err instanceof RateLimitedError
		? !err.exhausted
		: err instanceof TransientNetworkError;
}

/** Process exit code for the CLI. */
export function exitCodeFor(err: unknown): number {
	if (err instanceof AuthenticationError) return 2;
	if (err instanceof RateLimitedError || err instanceof TransientNetworkError)
		return 3;
	if (err instanceof MalformedResponseError) return 4;
	if (err instanceof CacheError) return 5;
	if (isAbortError(err)) return 3;
	return 1;
}

/** User-facing message, walking the cause chain where it helps. */
export function describeError(err: unknown): string {
	if (err instanceof SubjectNotFoundError)
		return `No such user: ${err.subject}`;
	if (err instanceof AuthenticationError)
		return `GitHub rejected the token: ${err.message}`;
	if (err instanceof RateLimitedError)
		return "GitHub rate limit reached, try again later.";
	if (err instanceof TransientNetworkError)
		return `GitHub is not responding (${err.message}), try again later.`;
	if (err instanceof GraphQLSemanticError)
		return `Query rejected: ${err.message}`;
	if (err instanceof MalformedResponseError)
		return "GitHub returned an unexpected response.";
	if (err instanceof CacheError)
		return `Report cache ${err.operation} failed: ${extractErrorDetail(err)}`;
	if (isAbortError(err)) return "Analysis aborted: deadline exceeded.";
	if (err instanceof Error) return err.message;
	return String(err);
}

export function extractErrorDetail(err: Error): string {
	const parts = [err.message];
	let current: unknown = err.cause;
	while (current instanceof Error) {
		if (current.message && current.message !== err.message) {
			parts.push(current.message);
		}
		current = current.cause;
	}
	return parts.join(" → ");
}
