import { format, isValid, parseISO, subDays } from "date-fns";
import { InvalidDateRangeError } from "./errors.js";
import type { RangeRef } from "./types.js";

/** GitHub's contribution data starts here. */
export const EPOCH_YEAR = 2008;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const YEAR = /^\d{4}$/;

type RangeKind = "trailing" | "year" | "custom";

/**
 * Inclusive range of calendar dates (UTC). `end` is never before `start`.
 */
export class DateRange {
	readonly start: string;
	readonly end: string;
	readonly kind: RangeKind;

	private constructor(start: string, end: string, kind: RangeKind) {
		this.start = start;
		this.end = end;
		this.kind = kind;
	}

	/**
	 * The 365 days ending on the UTC date of `now`, both included, so `to`
	 * stays within one year of `from` as `contributionsCollection` requires.
	 */
	static trailingYear(now: Date = new Date()): DateRange {
		const end = now.toISOString().slice(0, 10);
		const start = format(subDays(parseISO(end), 364), "yyyy-MM-dd");
		return new DateRange(start, end, "trailing");
	}

	static calendarYear(year: number, now: Date = new Date()): DateRange {
		const currentYear = now.getUTCFullYear();
		if (!Number.isInteger(year) || year < EPOCH_YEAR || year > currentYear) {
			throw new InvalidDateRangeError(
				`Invalid year ${year}: choose between ${EPOCH_YEAR} and ${currentYear}`
			);
		}
		return new DateRange(`${year}-01-01`, `${year}-12-31`, "year");
	}

	static custom(start: string, end: string): DateRange {
		assertIsoDate(start);
		assertIsoDate(end);
		if (end < start) {
			throw new InvalidDateRangeError(
				`End date ${end} is before start date ${start}`
			);
		}
		return new DateRange(start, end, "custom");
	}

	/**
	 * Build a range from command arguments: nothing → trailing 12 months,
	 * `YYYY` → calendar year, `YYYY-MM-DD YYYY-MM-DD` → custom range.
	 */
	static parse(args: readonly string[], now: Date = new Date()): DateRange {
		if (args.length === 0) return DateRange.trailingYear(now);
		if (args.length === 1 && YEAR.test(args[0])) {
			return DateRange.calendarYear(parseInt(args[0], 10), now);
		}
		if (args.length === 2) return DateRange.custom(args[0], args[1]);
		throw new InvalidDateRangeError(
			`Unrecognised range "${args.join(" ")}": use YYYY or YYYY-MM-DD YYYY-MM-DD`
		);
	}

	/** Discriminator used as the cache key. */
	get key(): string {
		return this.kind === "year"
			? this.start.slice(0, 4)
			: `${this.start}..${this.end}`;
	}

	/** Start as a GraphQL DateTime / GitTimestamp. */
	get from(): string {
		return `${this.start}T00:00:00Z`;
	}

	/** End of the last day as a GraphQL DateTime / GitTimestamp. */
	get to(): string {
		return `${this.end}T23:59:59Z`;
	}

	contains(timestamp: string): boolean {
		const t = Date.parse(timestamp);
		if (Number.isNaN(t)) return false;
		return t >= Date.parse(this.from) && t <= Date.parse(this.to);
	}

	describe(): string {
		switch (this.kind) {
			case "year":
				return this.start.slice(0, 4);
			case "trailing":
				return `Last 12 months (${this.start} to ${this.end})`;
			case "custom":
				return `${this.start} to ${this.end}`;
		}
	}

	toRef(): RangeRef {
		return { start: this.start, end: this.end, key: this.key };
	}
}

function assertIsoDate(value: string): void {
	if (!ISO_DATE.test(value) || !isValid(parseISO(value))) {
		throw new InvalidDateRangeError(
			`Invalid date "${value}": expected YYYY-MM-DD`
		);
	}
}
