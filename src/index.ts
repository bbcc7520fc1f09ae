#!/usr/bin/env node
import "dotenv/config";
import chalk from "chalk";
import { createProgram } from "./cli.js";
import { describeError, exitCodeFor } from "./errors.js";

try {
	await createProgram().parseAsync(process.argv);
} catch (err) {
	process.stderr.write(chalk.red(describeError(err)) + "\n");
	if (process.env.DEBUG && err instanceof Error && err.stack) {
		process.stderr.write(chalk.gray(err.stack) + "\n");
	}
	process.exitCode = exitCodeFor(err);
}
