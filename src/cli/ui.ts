import path from "node:path";
import pc from "picocolors";
import { toPosixPath } from "#core/paths";

export const symbols = {
	error: pc.red("✖"),
	success: pc.green("✔"),
	info: pc.blue("ℹ"),
	warn: pc.yellow("⚠"),
};

let _silentMode = false;
let _verboseMode = false;

export const setSilentMode = (silent: boolean) => {
	_silentMode = silent;
};

export const setVerboseMode = (verbose: boolean) => {
	_verboseMode = verbose;
};

export const ui = {
	// Formatters
	path: (value: string) => {
		const rel = path.relative(process.cwd(), value);
		const selected = rel.length < value.length ? rel : value;
		return toPosixPath(selected);
	},
	hash: (value: string | null | undefined) => {
		return value ? value.slice(0, 7) : "-";
	},

	// Components
	line: (text: string = "") => {
		if (_silentMode) return;
		process.stdout.write(`${text}\n`);
	},

	header: (label: string, value: string) => {
		if (_silentMode) return;
		process.stdout.write(`${pc.blue("ℹ")} ${label.padEnd(10)} ${value}\n`);
	},

	item: (icon: string, label: string, details?: string) => {
		if (_silentMode) return;
		const partLabel = pc.bold(label);
		const partDetails = details ? pc.gray(details) : "";
		process.stdout.write(`  ${icon} ${partLabel} ${partDetails}\n`);
	},
};

/**
 * Sink for progress and diagnostics from the engine. Core modules take one of
 * these instead of writing to the terminal themselves.
 */
export type Reporter = {
	info: (message: string) => void;
	warn: (message: string) => void;
	error: (message: string) => void;
	debug: (message: string) => void;
};

export const silentReporter: Reporter = {
	info: () => {},
	warn: () => {},
	error: () => {},
	debug: () => {},
};

export const createConsoleReporter = (): Reporter => ({
	info: (message) => ui.line(`${symbols.info} ${message}`),
	warn: (message) => ui.line(`${symbols.warn} ${message}`),
	error: (message) => {
		if (_silentMode) return;
		process.stderr.write(`${symbols.error} ${message}\n`);
	},
	debug: (message) => {
		if (!_verboseMode) return;
		ui.line(pc.dim(message));
	},
});
