import { isRetryable, RateLimitedError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { RateLimitTracker } from "./rate-limit.js";
import { sleep as defaultSleep } from "./sleep.js";
import type { GraphQLExecutor } from "./types.js";

export interface RetryPolicy {
	/** Total attempts, first one included. Defaults to 4. */
	maxAttempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
	/** Upper bound of the random extra delay, as a share of the backoff. */
	jitterRatio: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
	maxAttempts: 4,
	baseDelayMs: 1000,
	maxDelayMs: 30_000,
	jitterRatio: 0.25
};

export interface RetryingClientOptions {
	tracker: RateLimitTracker;
	policy?: Partial<RetryPolicy>;
	logger?: Logger;
	sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
	random?: () => number;
}

/**
 * Waits out the rate-limit reserve before each call and retries rate-limited
 * or transient failures with exponential backoff. Everything else propagates
 * on the first attempt.
 */
export class RetryingClient implements GraphQLExecutor {
	private inner: GraphQLExecutor;
	private tracker: RateLimitTracker;
	readonly policy: RetryPolicy;
	private log: Logger;
	private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
	private random: () => number;

	constructor(inner: GraphQLExecutor, options: RetryingClientOptions) {
		this.inner = inner;
		this.tracker = options.tracker;
		this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
		this.log = options.logger ?? createLogger({ verbose: false, json: false });
		this.sleep = options.sleep ?? defaultSleep;
		this.random = options.random ?? Math.random;
	}

	async execute<T>(
		query: string,
		variables?: Record<string, unknown>,
		options: { signal?: AbortSignal } = {}
	): Promise<T> {
		const { signal } = options;

		for (let attempt = 1; ; attempt++) {
			await this.throttle(signal);
			try {
				return await this.inner.execute<T>(query, variables, { signal });
			} catch (err) {
				if (!isRetryable(err) || attempt >= this.policy.maxAttempts) throw err;
				const delay = this.backoff(attempt, err);
				this.log.warn(
					`${err instanceof Error ? err.message : String(err)} ` +
						`(attempt ${attempt}/${this.policy.maxAttempts}, retrying in ${Math.round(delay)}ms)`
				);
				await this.sleep(delay, signal);
			}
		}
	}

	/** Delay before the retry that follows `attempt`. */
	backoff(attempt: number, err?: unknown): number {
		const { baseDelayMs, maxDelayMs, jitterRatio } = this.policy;
		const exp = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
		const delay = exp + exp * jitterRatio * this.random();
		if (err instanceof RateLimitedError && err.retryAfterMs !== undefined) {
			return Math.max(delay, err.retryAfterMs);
		}
		return delay;
	}

	/** Wait if remaining requests would dip into the reserve. */
	private async throttle(signal?: AbortSignal): Promise<void> {
		if (this.tracker.isExhausted()) {
			const snap = this.tracker.snapshot();
			throw new RateLimitedError(
				`Rate limit reserve reached (${snap?.remaining ?? 0} remaining); ` +
					`reset at ${snap ? new Date(snap.resetAt).toISOString() : "unknown"} is too far away`,
				{ exhausted: true }
			);
		}
		const wait = this.tracker.waitTimeBeforeNextCall();
		if (wait > 0) {
			this.log.warn(
				`Rate limit reserve reached (${this.tracker.snapshot()?.remaining ?? 0} remaining, ` +
					`${this.tracker.reserveFloor()} reserved). Waiting ${Math.ceil(wait / 1000)}s until reset...`
			);
			await this.sleep(wait, signal);
		}
	}
}
