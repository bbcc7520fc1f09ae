import chalk from "chalk";

export interface LoggerOptions {
	verbose: boolean;
	/** Machine-readable output on stdout: suppress informational lines. */
	json: boolean;
}

export interface Logger {
	info(msg: string): void;
	debug(msg: string): void;
	warn(msg: string): void;
	error(msg: string): void;
	time(label: string): void;
	timeEnd(label: string): number;
}

export function createLogger(opts: LoggerOptions): Logger {
	const timers = new Map<string, number>();

	return {
		info(msg: string): void {
			if (opts.json) return;
			process.stdout.write(msg + "\n");
		},

		debug(msg: string): void {
			if (!opts.verbose || opts.json) return;
			process.stderr.write(chalk.gray(msg) + "\n");
		},

		warn(msg: string): void {
			process.stderr.write(chalk.yellow(msg) + "\n");
		},

		error(msg: string): void {
			process.stderr.write(chalk.red(msg) + "\n");
		},

		time(label: string): void {
			timers.set(label, performance.now());
		},

		timeEnd(label: string): number {
			const start = timers.get(label);
			if (start === undefined) return 0;
			const elapsed = performance.now() - start;
			timers.delete(label);

			if (opts.verbose && !opts.json) {
				process.stderr.write(chalk.gray(`${label}: ${elapsed.toFixed(1)}ms`) + "\n");
			}

			return elapsed;
		}
	};
}

export const silentLogger: Logger = {
	info() {},
	debug() {},
	warn() {},
	error() {},
	time() {},
	timeEnd() {
		return 0;
	}
};
