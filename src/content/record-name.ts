import { toPosixPath } from "#core/paths";

const UNSAFE_NAME_CHARS = /[^A-Za-z0-9_.-]/g;

/**
 * Derives the downstream record name from a file path relative to its
 * subpath: `team/api.rules` becomes `team_api`.
 */
export const toRecordName = (relativePath: string, extensions: string[]) => {
	const posix = toPosixPath(relativePath);
	const extension = [...extensions]
		.sort((left, right) => right.length - left.length)
		.find((candidate) => posix.endsWith(candidate));
	const stem = extension ? posix.slice(0, -extension.length) : posix;
	return stem.replace(/\//g, "_").replace(UNSAFE_NAME_CHARS, "_");
};
