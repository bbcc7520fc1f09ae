import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileReportCache, MemoryReportCache, reportKey } from "./cache.js";
import { CacheError } from "./errors.js";
import { silentLogger } from "./logger.js";
import { sampleStats } from "./test/fixtures.js";

const clock = () => new Date("2025-02-01T08:00:00Z");

describe("reportKey", () => {
	it("lower-cases the subject", () => {
		expect(reportKey("OctoCat", "2024")).toBe("octocat:2024");
	});
});

describe("MemoryReportCache", () => {
	it("stores, overwrites and lists reports per subject", async () => {
		const cache = new MemoryReportCache({ now: clock });
		await cache.put("octocat", "2024", sampleStats());
		await cache.put("octocat", "2023", sampleStats({ commits: 1 }));
		const latest = await cache.put("OctoCat", "2024", sampleStats({ commits: 999 }));

		expect(latest).toMatchObject({ subject: "octocat", rangeKey: "2024", createdAt: "2025-02-01T08:00:00.000Z" });
		expect((await cache.get("octocat", "2024"))?.stats.commits).toBe(999);
		expect(await cache.keys("OCTOCAT")).toEqual(["2023", "2024"]);
		expect(await cache.get("someone", "2024")).toBeUndefined();
	});

	it("keeps a frozen copy detached from the caller's object", async () => {
		const cache = new MemoryReportCache();
		const languages: Record<string, number> = { TypeScript: 1 };
		await cache.put("octocat", "2024", sampleStats({ languages }));
		languages.TypeScript = 1000;

		const hit = await cache.get("octocat", "2024");
		expect(hit?.stats.languages).toEqual({ TypeScript: 1 });
		expect(Object.isFrozen(hit?.stats)).toBe(true);
	});

	it("remembers the last subject per caller", async () => {
		const cache = new MemoryReportCache({ now: clock });
		await cache.remember("chat-42");
		expect(await cache.recall("chat-42")).toBeUndefined();

		await cache.remember("chat-42", "octocat");
		await cache.remember("chat-42");
		expect(await cache.recall("chat-42")).toEqual({
			callerId: "chat-42",
			subject: "octocat",
			lastQueryAt: "2025-02-01T08:00:00.000Z"
		});
	});
});

describe("FileReportCache", () => {
	let dir: string;
	let path: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "ghcs-cache-"));
		path = join(dir, "nested", "reports.json");
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("persists reports and subjects across instances", async () => {
		const first = new FileReportCache(path, { now: clock, logger: silentLogger });
		await first.put("octocat", "2024", sampleStats());
		await first.remember("chat-42", "octocat");

		const second = new FileReportCache(path, { logger: silentLogger });
		expect((await second.get("OctoCat", "2024"))?.stats).toEqual(sampleStats());
		expect(await second.keys("octocat")).toEqual(["2024"]);
		expect((await second.recall("chat-42"))?.subject).toBe("octocat");

		const onDisk: unknown = JSON.parse(readFileSync(path, "utf-8"));
		expect(onDisk).toMatchObject({ version: 1 });
	});

	it("starts fresh from a corrupt file", async () => {
		const file = join(dir, "reports.json");
		writeFileSync(file, "{not json", "utf-8");
		const cache = new FileReportCache(file, { logger: silentLogger });
		expect(await cache.keys("octocat")).toEqual([]);
	});

	it("starts fresh when the version does not match", async () => {
		const file = join(dir, "reports.json");
		writeFileSync(file, JSON.stringify({ version: 0, reports: { "octocat:2024": {} }, users: {} }), "utf-8");
		const cache = new FileReportCache(file, { logger: silentLogger });
		expect(await cache.get("octocat", "2024")).toBeUndefined();
	});

	it("raises CacheError when the file cannot be written and keeps the old state", async () => {
		const blocker = join(dir, "blocker");
		writeFileSync(blocker, "", "utf-8");
		const cache = new FileReportCache(join(blocker, "reports.json"), { logger: silentLogger });

		const err = await cache.put("octocat", "2024", sampleStats()).catch((e: unknown) => e);
		expect(err).toBeInstanceOf(CacheError);
		expect(err).toMatchObject({ operation: "write" });
		expect(await cache.get("octocat", "2024")).toBeUndefined();
	});

	it("keeps keys written by another instance on the same file", async () => {
		const a = new FileReportCache(path, { logger: silentLogger });
		const b = new FileReportCache(path, { logger: silentLogger });

		await a.put("octocat", "2023", sampleStats({ commits: 1 }));
		await b.put("octocat", "2024", sampleStats());
		await a.remember("chat-1", "octocat");
		await b.remember("chat-2", "hubot");

		const reader = new FileReportCache(path, { logger: silentLogger });
		expect(await reader.keys("octocat")).toEqual(["2023", "2024"]);
		expect((await reader.get("octocat", "2023"))?.stats.commits).toBe(1);
		expect((await reader.recall("chat-1"))?.subject).toBe("octocat");
		expect((await reader.recall("chat-2"))?.subject).toBe("hubot");
		expect(await a.keys("octocat")).toEqual(["2023", "2024"]);
	});
});
