import { describe, expect, it } from "vitest";
import { summarizeAllTime } from "./alltime.js";
import { formatAllTime, formatLanguages, formatNum, formatReport } from "./format.js";
import { sampleStats } from "./test/fixtures.js";

describe("formatReport", () => {
	it("lists counts, lines and top languages", () => {
		const lines = formatReport(sampleStats()).split("\n");

		expect(lines[0]).toBe("octocat — 2024");
		expect(lines[1]).toBe("  Commits                 120");
		expect(lines[12]).toBe("  Lines                   +4,321 / -1,234 (exact)");
		expect(lines[13]).toBe("Top languages (bytes):");
		expect(lines[14]).toBe(`  TypeScript           ${"█".repeat(20)} 5,000`);
		expect(lines[15]).toBe(`  Go                   █████${" ".repeat(15)} 1,200`);
		expect(lines).toHaveLength(16);
	});

	it("uses the given title, or the dates of a custom range", () => {
		const custom = sampleStats({ range: { start: "2024-01-01", end: "2024-06-30", key: "2024-01-01..2024-06-30" } });
		expect(formatReport(custom).split("\n")[0]).toBe("octocat — 2024-01-01 to 2024-06-30");
		expect(formatReport(custom, "First half").split("\n")[0]).toBe("octocat — First half");
	});

	it("omits the language section when there are none", () => {
		expect(formatReport(sampleStats({ languages: {} })).split("\n")).toHaveLength(13);
	});
});

describe("formatAllTime", () => {
	it("shows the covered years and every line method", () => {
		const summary = summarizeAllTime("octocat", [
			sampleStats({ range: { start: "2023-01-01", end: "2023-12-31", key: "2023" }, lineMethod: "estimated" }),
			sampleStats()
		]);
		if (!summary) throw new Error("expected a summary");
		const lines = formatAllTime(summary).split("\n");
		expect(lines[0]).toBe("octocat — all time (2023–2024, 2 years)");
		expect(lines[10]).toBe("  Lines                   +8,642 / -2,468 (estimated, exact)");
	});
});

describe("formatLanguages", () => {
	it("keeps the top N, ties broken by name", () => {
		const lines = formatLanguages({ Zig: 10, Ada: 10, C: 30 }, 2);
		expect(lines).toHaveLength(3);
		expect(lines[1].startsWith("  C ")).toBe(true);
		expect(lines[2].startsWith("  Ada ")).toBe(true);
	});
});

describe("formatNum", () => {
	it("groups thousands", () => {
		expect(formatNum(1234567)).toBe("1,234,567");
	});
});
