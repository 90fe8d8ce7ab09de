import process from "node:process";
import cac from "cac";
import { ExitCode } from "./exit-code";
import { type CliOptions, COMMANDS, type Command, type ParsedArgs } from "./types";

const isCommand = (value: string): value is Command =>
	COMMANDS.some((command) => command === value);

const buildOptions = (options: Record<string, unknown>): CliOptions => {
	const config = options.config;
	if (config !== undefined && (typeof config !== "string" || !config)) {
		throw new Error("--config expects a path.");
	}
	return {
		...(config ? { config } : {}),
		json: Boolean(options.json),
		silent: Boolean(options.silent),
		verbose: Boolean(options.verbose),
	};
};

export const parseArgs = (argv = process.argv): ParsedArgs => {
	try {
		const cli = cac("rule-relay");

		cli
			.option("--config <path>", "Path to config file")
			.option("--json", "Output JSON")
			.option("--silent", "Suppress non-error output")
			.option("--verbose", "Show git-sync output and reconcile decisions")
			.option("-v, --version", "Show version")
			.help();

		cli.command("run", "Reconcile continuously until stopped");
		cli.command("sync-now", "Force a sync and publish once");
		cli.command("status", "Show the last recorded reconcile state");

		const result = cli.parse(argv, { run: false });
		const matched = cli.matchedCommandName;
		const command = matched && isCommand(matched) ? matched : null;
		if (!command && result.args.length > 0) {
			throw new Error(`Unknown command '${result.args[0]}'.`);
		}
		if (result.args.length > 0) {
			throw new Error(`Unexpected arguments: ${result.args.join(" ")}`);
		}
		const options = buildOptions(result.options);
		if (options.silent && options.verbose) {
			throw new Error("--silent and --verbose cannot be combined.");
		}
		return {
			command,
			options,
			help: Boolean(result.options.help),
			version: Boolean(result.options.version),
		};
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		console.error(message);
		process.exit(ExitCode.InvalidArgument);
	}
};
