export const COMMANDS = ["run", "sync-now", "status"] as const;

export type Command = (typeof COMMANDS)[number];

export type CliOptions = {
	config?: string;
	json: boolean;
	silent: boolean;
	verbose: boolean;
};

export type ParsedArgs = {
	command: Command | null;
	options: CliOptions;
	help: boolean;
	version: boolean;
};
