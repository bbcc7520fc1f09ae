import type { RateLimit } from "./types.js";

/** GitHub's GraphQL budget for a personal access token. */
export const DEFAULT_POINTS_PER_HOUR = 5000;

export interface RateLimitTrackerOptions {
	/** Share of the hourly budget kept in reserve. Defaults to 0.1. */
	reserveRatio?: number;
	/** Absolute reserve floor. Defaults to 100. */
	minimumReserve?: number;
	/** Extra wait after the reset time. Defaults to 1s. */
	safetyBufferMs?: number;
	/** Longest wait the tracker will ask for. Defaults to 15 min. */
	maxWaitMs?: number;
	now?: () => number;
}

/**
 * Latest observed API quota, shared by every request made with one token.
 *
 * Each observation replaces the snapshot with a new frozen object, so a
 * reader always sees one consistent (remaining, resetAt) pair.
 */
export class RateLimitTracker {
	private current: Readonly<RateLimit> | undefined;
	private readonly reserveRatio: number;
	private readonly minimumReserve: number;
	private readonly safetyBufferMs: number;
	readonly maxWaitMs: number;
	private readonly now: () => number;

	constructor(options: RateLimitTrackerOptions = {}) {
		this.reserveRatio = options.reserveRatio ?? 0.1;
		this.minimumReserve = options.minimumReserve ?? 100;
		this.safetyBufferMs = options.safetyBufferMs ?? 1000;
		this.maxWaitMs = options.maxWaitMs ?? 15 * 60 * 1000;
		this.now = options.now ?? Date.now;
	}

	/** Record the latest snapshot. Always overwrites the previous one. */
	observe(limit: RateLimit): void {
		this.current = Object.freeze({
			...limit,
			remaining: Math.max(0, Math.floor(limit.remaining))
		});
	}

	snapshot(): Readonly<RateLimit> | undefined {
		return this.current;
	}

	/** Requests never spent: 10% of the budget or the minimum, whichever is larger. */
	reserveFloor(): number {
		const limit = this.current?.limit ?? DEFAULT_POINTS_PER_HOUR;
		return Math.max(Math.ceil(limit * this.reserveRatio), this.minimumReserve);
	}

	/** Milliseconds to wait before the next call, capped at `maxWaitMs`. */
	waitTimeBeforeNextCall(): number {
		return Math.min(this.uncappedWait(), this.maxWaitMs);
	}

	/** True when the reserve is reached and the reset is further away than the cap. */
	isExhausted(): boolean {
		return this.uncappedWait() > this.maxWaitMs;
	}

	private uncappedWait(): number {
		const snap = this.current;
		if (!snap) return 0;
		if (snap.remaining > this.reserveFloor()) return 0;
		const now = this.now();
		if (now >= snap.resetAt) return 0;
		return snap.resetAt - now + this.safetyBufferMs;
	}
}
