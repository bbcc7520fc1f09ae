import checkbox from "@inquirer/checkbox";
import chalk from "chalk";
import { Command } from "commander";
import { formatDistance } from "date-fns";
import ora, { type Ora } from "ora";
import { ContributionAggregator } from "./aggregator.js";
import { collectAllTime, summarizeAllTime, yearsSince } from "./alltime.js";
import { type AppConfig, type CliFlags, requireToken, resolveConfig } from "./config.js";
import { DateRange, EPOCH_YEAR } from "./date-range.js";
import { CacheError, ConfigError, describeError } from "./errors.js";
import { formatAllTime, formatReport } from "./format.js";
import { createClient, getRateLimit, openReportStore, type ReportStore } from "./lib.js";
import { createLogger, type Logger } from "./logger.js";
import type { ContributionStats, ProgressSink } from "./types.js";

type GlobalFlags = CliFlags & { as?: string };

/** A leading argument that is a range, not a login. */
const RANGE_ARG = /^\d{4}(-\d{2}-\d{2})?$/;

export class NotCachedError extends Error {
	override readonly name = "NotCachedError";
}

export interface ProgramOptions {
	env?: NodeJS.ProcessEnv;
	now?: () => Date;
}

interface Session {
	config: AppConfig;
	log: Logger;
	store?: ReportStore;
	callerId?: string;
}

export function createProgram(options: ProgramOptions = {}): Command {
	const env = options.env ?? process.env;
	const now = options.now ?? (() => new Date());

	const program = new Command();

	program
		.name("ghcs")
		.description(
			"Contribution statistics for a GitHub user over a date range.\n" +
				"Lines added/deleted come from commit history, with pull requests as\n" +
				"the fallback. Results are cached per user and range."
		)
		.version("0.1.0")
		.option("-t, --token <pat>", "GitHub Personal Access Token (default: $GITHUB_TOKEN)")
		.option("--cache <path>", "Cache file path")
		.option("--no-cache", "Disable the report cache")
		.option("--database-url <url>", "Cache reports in PostgreSQL (default: $DATABASE_URL)")
		.option("--timeout <seconds>", "Abort the whole command after this many seconds")
		.option("--retries <n>", "Attempts per GitHub query, first one included (default: 4)")
		.option("--as <callerId>", "Remember the analysed user for this caller")
		.option("--json", "Print JSON on stdout")
		.option("-v, --verbose", "Debug output on stderr");

	program
		.command("analyze")
		.description("Aggregate contribution stats (default range: the last 12 months)")
		.argument("[user]", "GitHub login (optional with a remembered --as caller)")
		.argument("[range...]", "YYYY, or YYYY-MM-DD YYYY-MM-DD")
		.option("--refresh", "Ignore a cached report and fetch again")
		.action(
			async (
				userArg: string | undefined,
				rangeArgs: string[],
				opts: { refresh?: boolean },
				command: Command
			) => {
				await withSession(command, env, async (session) => {
					const [user, args] = splitArgs(userArg, rangeArgs);
					const range = DateRange.parse(args, now());
					const subject = await resolveSubject(user, session);
					const stats = await analyze(session, subject, range, opts.refresh ?? false);
					await rememberSubject(session, stats.subject);
					printStats(session, stats, range.describe());
				});
			}
		);

	program
		.command("cached")
		.description("Print a cached report without contacting GitHub")
		.argument("[user]", "GitHub login (optional with a remembered --as caller)")
		.argument("[range...]", "YYYY, or YYYY-MM-DD YYYY-MM-DD")
		.action(async (userArg: string | undefined, rangeArgs: string[], _opts, command: Command) => {
			await withSession(command, env, async (session) => {
				const { store } = session;
				if (!store) {
					throw new ConfigError("`cached` needs a cache: drop --no-cache.");
				}
				const [user, args] = splitArgs(userArg, rangeArgs);
				const range = DateRange.parse(args, now());
				const subject = await resolveSubject(user, session);
				const hit = await store.get(subject, range.key);
				if (!hit) {
					throw new NotCachedError(
						`No cached report for ${subject} (${range.describe()}). Run \`ghcs analyze\` first.`
					);
				}
				session.log.debug(`Cached at ${hit.createdAt}`);
				printStats(session, hit.stats, range.describe());
			});
		});

	program
		.command("alltime")
		.description("Sum calendar-year reports from --from-year to now")
		.argument("[user]", "GitHub login (optional with a remembered --as caller)")
		.option("--from-year <year>", `Earliest year (default: ${EPOCH_YEAR})`)
		.option("--refresh", "Fetch every year again")
		.option("--select-years", "Interactively choose which years to fetch again")
		.action(
			async (
				user: string | undefined,
				opts: { fromYear?: string; refresh?: boolean; selectYears?: boolean },
				command: Command
			) => {
				await withSession(command, env, async (session) => {
					const { config, log, store } = session;
					const subject = await resolveSubject(user, session);
					const fromYear = opts.fromYear !== undefined ? parseYear(opts.fromYear, now()) : EPOCH_YEAR;
					const years = yearsSince(fromYear, now());

					let refreshYears: number[] = opts.refresh ? years : [];
					if (opts.selectYears) {
						const cached = new Set(store ? await store.keys(subject) : []);
						refreshYears = await checkbox({
							message: "Years to fetch again (uncached years are always fetched)",
							choices: years.map((year) => ({
								name: cached.has(String(year)) ? `${year} ${chalk.gray("(cached)")}` : String(year),
								value: year,
								checked: opts.refresh ?? false
							})),
							pageSize: 20,
							loop: false
						});
					}

					const { client } = createClient({
						token: requireToken(config),
						maxAttempts: config.maxAttempts,
						logger: log
					});
					const aggregator = new ContributionAggregator({ client, cache: store, logger: log });
					const spinner = ora({ text: `Analyzing ${subject} since ${fromYear}…`, isSilent: config.json }).start();

					let yearly: ContributionStats[];
					try {
						yearly = await collectAllTime(aggregator, subject, {
							years,
							refreshYears,
							progress: spinnerProgress(spinner, log),
							signal: deadline(config),
							now: now()
						});
					} catch (err) {
						spinner.fail(describeError(err));
						throw err;
					}
					spinner.succeed(`Aggregated ${chalk.bold(yearly.length)} years`);

					const summary = summarizeAllTime(yearly[yearly.length - 1]?.subject ?? subject, yearly);
					if (!summary) {
						log.warn(`No years to aggregate for ${subject}.`);
						return;
					}
					await rememberSubject(session, summary.subject);
					if (config.json) {
						process.stdout.write(JSON.stringify({ summary, yearly }, null, 2) + "\n");
					} else {
						log.info("\n" + formatAllTime(summary));
					}
				});
			}
		);

	program
		.command("rate-limit")
		.description("Show the token's remaining GraphQL budget")
		.action(async (_opts, command: Command) => {
			await withSession(command, env, async ({ config, log }) => {
				const limit = await getRateLimit({
					token: requireToken(config),
					logger: log,
					signal: deadline(config)
				});
				if (config.json) {
					process.stdout.write(
						JSON.stringify({ ...limit, resetAt: new Date(limit.resetAt).toISOString() }, null, 2) + "\n"
					);
					return;
				}
				const color = limit.remaining < limit.limit * 0.1 ? chalk.red : chalk.green;
				log.info(
					`${color(`${limit.remaining} / ${limit.limit}`)} points remaining, ` +
						`resets in ${formatDistance(new Date(limit.resetAt), now())}`
				);
			}, { storage: false });
		});

	return program;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function withSession(
	command: Command,
	env: NodeJS.ProcessEnv,
	run: (session: Session) => Promise<void>,
	{ storage = true }: { storage?: boolean } = {}
): Promise<void> {
	const flags = command.optsWithGlobals<GlobalFlags>();
	const config = resolveConfig(flags, env);
	const log = createLogger({ verbose: config.verbose, json: config.json });
	const store = storage ? await openReportStore(config.storage, log) : undefined;
	try {
		await run({ config, log, store, callerId: flags.as });
	} finally {
		await store?.close();
	}
}

async function analyze(
	session: Session,
	subject: string,
	range: DateRange,
	refresh: boolean
): Promise<ContributionStats> {
	const { config, log, store } = session;
	const { client, tracker } = createClient({
		token: requireToken(config),
		maxAttempts: config.maxAttempts,
		logger: log
	});
	const aggregator = new ContributionAggregator({ client, cache: store, logger: log });

	log.time("analyze");
	const spinner = ora({ text: `Analyzing ${subject}…`, isSilent: config.json }).start();
	let stats: ContributionStats;
	try {
		stats = await aggregator.contributions(subject, range, {
			progress: spinnerProgress(spinner, log),
			signal: deadline(config),
			refresh
		});
		spinner.succeed(`${chalk.bold(stats.subject)}: ${range.describe()}`);
	} catch (err) {
		if (err instanceof CacheError && err.operation === "write" && err.stats) {
			spinner.warn(`Stats computed but not cached: ${describeError(err)}`);
			stats = err.stats;
		} else {
			spinner.fail(describeError(err));
			throw err;
		}
	}
	log.timeEnd("analyze");

	const rl = tracker.snapshot();
	if (rl) log.debug(`Rate limit after run: ${rl.remaining}/${rl.limit}`);
	return stats;
}

function spinnerProgress(spinner: Ora, log: Logger): ProgressSink {
	return {
		report(message) {
			spinner.text = message;
			log.debug(message);
		}
	};
}

function printStats(session: Session, stats: ContributionStats, title: string): void {
	if (session.config.json) {
		process.stdout.write(JSON.stringify(stats, null, 2) + "\n");
	} else {
		session.log.info("\n" + formatReport(stats, title));
	}
}

function splitArgs(user: string | undefined, range: string[]): [string | undefined, string[]] {
	if (user !== undefined && RANGE_ARG.test(user)) return [undefined, [user, ...range]];
	return [user, range];
}

async function resolveSubject(user: string | undefined, session: Session): Promise<string> {
	if (user) return user;
	const { callerId, store } = session;
	if (callerId && store) {
		const remembered = await store.recall(callerId);
		if (remembered) {
			session.log.debug(`Using remembered user ${remembered.subject} for ${callerId}`);
			return remembered.subject;
		}
	}
	throw new ConfigError("Missing <user>: pass a GitHub login, or --as a caller with a remembered user.");
}

/** Remembering is a convenience; a failure only warns. */
async function rememberSubject(session: Session, subject: string): Promise<void> {
	const { callerId, store, log } = session;
	if (!callerId || !store) return;
	try {
		await store.remember(callerId, subject);
	} catch (err) {
		log.warn(`Could not remember ${subject} for ${callerId}: ${describeError(err)}`);
	}
}

function deadline(config: AppConfig): AbortSignal | undefined {
	return config.timeoutMs !== undefined ? AbortSignal.timeout(config.timeoutMs) : undefined;
}

function parseYear(value: string, now: Date): number {
	const year = Number(value);
	if (!Number.isInteger(year) || year < EPOCH_YEAR || year > now.getUTCFullYear()) {
		throw new ConfigError(
			`--from-year must be between ${EPOCH_YEAR} and ${now.getUTCFullYear()}, got "${value}"`
		);
	}
	return year;
}
