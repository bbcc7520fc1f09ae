import { describe, expect, it, vi } from "vitest";
import {
	AuthenticationError,
	RateLimitedError,
	TransientNetworkError
} from "./errors.js";
import { silentLogger } from "./logger.js";
import { RateLimitTracker } from "./rate-limit.js";
import { RetryingClient } from "./retrying-client.js";
import type { GraphQLExecutor } from "./types.js";

const NOW = 1_700_000_000_000;

function setup(results: Array<unknown>, tracker = new RateLimitTracker({ now: () => NOW })) {
	const execute = vi.fn(async (_query: string, _variables?: Record<string, unknown>) => {
		const next = results.shift();
		if (next instanceof Error) throw next;
		return next;
	});
	const inner: GraphQLExecutor = {
		execute: <T>(query: string, variables?: Record<string, unknown>): Promise<T> =>
			execute(query, variables).then((value) => value as T)
	};
	const delays: number[] = [];
	const client = new RetryingClient(inner, {
		tracker,
		logger: silentLogger,
		random: () => 0,
		sleep: async (ms) => {
			delays.push(ms);
		}
	});
	return { client, execute, delays };
}

describe("RetryingClient", () => {
	it("retries transient failures with exponential backoff", async () => {
		const { client, execute, delays } = setup([
			new TransientNetworkError("boom"),
			new TransientNetworkError("boom"),
			{ ok: true }
		]);
		await expect(client.execute("query")).resolves.toEqual({ ok: true });
		expect(execute).toHaveBeenCalledTimes(3);
		expect(delays).toEqual([1000, 2000]);
	});

	it("gives up after maxAttempts and rethrows the last error", async () => {
		const last = new TransientNetworkError("still down");
		const { client, execute, delays } = setup([
			new TransientNetworkError("down"),
			new TransientNetworkError("down"),
			new TransientNetworkError("down"),
			last
		]);
		await expect(client.execute("query")).rejects.toBe(last);
		expect(execute).toHaveBeenCalledTimes(4);
		expect(delays).toEqual([1000, 2000, 4000]);
	});

	it("does not retry authentication failures", async () => {
		const { client, execute, delays } = setup([new AuthenticationError("bad token")]);
		await expect(client.execute("query")).rejects.toBeInstanceOf(AuthenticationError);
		expect(execute).toHaveBeenCalledTimes(1);
		expect(delays).toEqual([]);
	});

	it("honours Retry-After when it is longer than the backoff", async () => {
		const { client, delays } = setup([
			new RateLimitedError("slow down", { retryAfterMs: 5000 }),
			"done"
		]);
		await expect(client.execute("query")).resolves.toBe("done");
		expect(delays).toEqual([5000]);
	});

	it("waits for the reset before calling when the reserve is reached", async () => {
		const tracker = new RateLimitTracker({ now: () => NOW });
		tracker.observe({ limit: 5000, remaining: 400, resetAt: NOW + 60_000 });
		const { client, delays } = setup(["done"], tracker);
		await expect(client.execute("query")).resolves.toBe("done");
		expect(delays).toEqual([61_000]);
	});

	it("fails fast without a request when the reset is too far away", async () => {
		const tracker = new RateLimitTracker({ now: () => NOW });
		tracker.observe({ limit: 5000, remaining: 0, resetAt: NOW + 3_600_000 });
		const { client, execute } = setup(["never"], tracker);
		const err = await client.execute("query").catch((e: unknown) => e);
		expect(err).toBeInstanceOf(RateLimitedError);
		expect(err).toMatchObject({ exhausted: true });
		expect(execute).not.toHaveBeenCalled();
	});

	it("stops retrying once the signal aborts", async () => {
		const inner: GraphQLExecutor = {
			execute: () => Promise.reject(new TransientNetworkError("down"))
		};
		const client = new RetryingClient(inner, {
			tracker: new RateLimitTracker(),
			logger: silentLogger
		});
		const controller = new AbortController();
		controller.abort();
		await expect(
			client.execute("query", {}, { signal: controller.signal })
		).rejects.toMatchObject({ name: "AbortError" });
	});

	it("adds jitter and caps the exponential delay", () => {
		const client = new RetryingClient(
			{ execute: () => Promise.reject(new Error("unused")) },
			{ tracker: new RateLimitTracker(), logger: silentLogger, random: () => 0.5 }
		);
		expect(client.backoff(3)).toBe(4500);
		expect(client.backoff(10)).toBe(30_000 + 30_000 * 0.25 * 0.5);
	});
});
