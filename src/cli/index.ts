import process from "node:process";
import { ExitCode } from "./exit-code";
import { parseArgs } from "./parse-args";
import type { Command, CliOptions } from "./types";
import { setSilentMode, setVerboseMode, symbols } from "./ui";

export const CLI_NAME = "rule-relay";
export const CLI_VERSION = "0.1.0";

const HELP_TEXT = `
Usage: ${CLI_NAME} <command> [options]

Commands:
  run       Reconcile continuously until stopped
  sync-now  Force a sync and publish once
  status    Show the last recorded reconcile state

Global options:
  --config <path>
  --json
  --silent
  --verbose

Signals (run):
  SIGHUP   Re-read the config file
  SIGUSR1  Force a sync
`;

const printHelp = () => {
	process.stdout.write(HELP_TEXT.trimStart());
};

const printError = (message: string) => {
	process.stderr.write(`${symbols.error} ${message}\n`);
};

const runCommand = async (command: Command, options: CliOptions) => {
	if (command === "run") {
		const { runDaemon } = await import("#commands/run");
		await runDaemon({ configPath: options.config, json: options.json });
		return;
	}
	if (command === "sync-now") {
		const { printSyncNow, syncNow } = await import("#commands/sync-now");
		const result = await syncNow({ configPath: options.config });
		printSyncNow(result, options.json);
		if (!result.ok) {
			process.exit(ExitCode.SyncFailed);
		}
		return;
	}
	const { getStatus, printStatus } = await import("#commands/status");
	const status = await getStatus({ configPath: options.config });
	if (options.json) {
		process.stdout.write(`${JSON.stringify(status, null, 2)}\n`);
	} else {
		printStatus(status);
	}
};

/**
 * The main entry point of the CLI
 */
export async function main(): Promise<void> {
	try {
		process.on("uncaughtException", errorHandler);
		process.on("unhandledRejection", errorHandler);

		const parsed = parseArgs();

		setSilentMode(parsed.options.silent);
		setVerboseMode(parsed.options.verbose);

		if (parsed.help) {
			printHelp();
			process.exit(ExitCode.Success);
		}

		if (parsed.version) {
			process.stdout.write(`${CLI_VERSION}\n`);
			process.exit(ExitCode.Success);
		}

		if (!parsed.command) {
			printHelp();
			process.exit(ExitCode.InvalidArgument);
		}

		await runCommand(parsed.command, parsed.options);
	} catch (error) {
		errorHandler(error);
	}
}

function errorHandler(error: unknown): void {
	const message =
		error instanceof Error ? error.message || String(error) : String(error);
	printError(message);
	process.exit(ExitCode.FatalError);
}
