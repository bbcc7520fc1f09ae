import { describe, expect, it } from "vitest";
import { DateRange } from "./date-range.js";
import { InvalidDateRangeError } from "./errors.js";

const now = new Date("2025-03-15T10:00:00Z");

describe("DateRange", () => {
	it("defaults to the trailing 365 days ending today (UTC)", () => {
		const range = DateRange.parse([], now);
		expect(range.start).toBe("2024-03-16");
		expect(range.end).toBe("2025-03-15");
		expect(range.key).toBe("2024-03-16..2025-03-15");
		expect(range.describe()).toBe("Last 12 months (2024-03-16 to 2025-03-15)");
	});

	it("keeps the trailing range within one year of its start", () => {
		const range = DateRange.trailingYear(new Date("2026-10-19T08:00:00Z"));
		expect(range.from).toBe("2025-10-20T00:00:00Z");
		expect(range.to).toBe("2026-10-19T23:59:59Z");
		expect(Date.parse(range.to)).toBeLessThan(Date.parse("2026-10-20T00:00:00Z"));
	});

	it("parses a calendar year", () => {
		const range = DateRange.parse(["2024"], now);
		expect(range.key).toBe("2024");
		expect(range.from).toBe("2024-01-01T00:00:00Z");
		expect(range.to).toBe("2024-12-31T23:59:59Z");
		expect(range.describe()).toBe("2024");
	});

	it("rejects years before 2008 or after the current year", () => {
		expect(() => DateRange.calendarYear(2007, now)).toThrow(InvalidDateRangeError);
		expect(() => DateRange.calendarYear(2026, now)).toThrow(InvalidDateRangeError);
		expect(DateRange.calendarYear(2008, now).start).toBe("2008-01-01");
	});

	it("parses a custom range and validates its order", () => {
		const range = DateRange.parse(["2024-01-01", "2024-06-30"], now);
		expect(range.key).toBe("2024-01-01..2024-06-30");
		expect(range.to).toBe("2024-06-30T23:59:59Z");
		expect(() => DateRange.custom("2024-06-30", "2024-01-01")).toThrow(
			"End date 2024-01-01 is before start date 2024-06-30"
		);
	});

	it("accepts a single-day range", () => {
		const range = DateRange.custom("2024-05-05", "2024-05-05");
		expect(range.key).toBe("2024-05-05..2024-05-05");
		expect(range.contains("2024-05-05T12:00:00Z")).toBe(true);
	});

	it("rejects malformed dates and argument lists", () => {
		expect(() => DateRange.custom("2024-13-01", "2024-12-31")).toThrow(InvalidDateRangeError);
		expect(() => DateRange.custom("2024-1-1", "2024-12-31")).toThrow(InvalidDateRangeError);
		expect(() => DateRange.parse(["2024", "2025", "2026"], now)).toThrow(InvalidDateRangeError);
		expect(() => DateRange.parse(["24"], now)).toThrow(InvalidDateRangeError);
	});

	it("contains timestamps on both boundary days", () => {
		const range = DateRange.calendarYear(2024, now);
		expect(range.contains("2024-01-01T00:00:00Z")).toBe(true);
		expect(range.contains("2024-12-31T23:59:59Z")).toBe(true);
		expect(range.contains("2023-12-31T23:59:59Z")).toBe(false);
		expect(range.contains("2025-01-01T00:00:00Z")).toBe(false);
		expect(range.contains("not a date")).toBe(false);
	});
});
