import { constants } from "node:fs";
import { lstat, open, stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { ContentReadError, getErrnoCode } from "#core/errors";
import { toPosixPath } from "#core/paths";

const ABSENT_CODES = new Set(["ENOENT", "ENOTDIR"]);

export const compareOrdinal = (left: string, right: string) =>
	left < right ? -1 : left > right ? 1 : 0;

/**
 * Lists files under `root/subpath` matching `include`, as posix paths relative
 * to the subpath, in ordinal order. A missing subpath lists as empty.
 */
export const listContentFiles = async (params: {
	root: string;
	subpath: string;
	include: string[];
}): Promise<string[]> => {
	const dir = path.join(params.root, params.subpath);
	try {
		const info = await stat(dir);
		if (!info.isDirectory()) {
			return [];
		}
	} catch (error) {
		const code = getErrnoCode(error);
		if (code && ABSENT_CODES.has(code)) {
			return [];
		}
		throw new ContentReadError(dir, error);
	}
	let files: string[];
	try {
		files = await fg(params.include, {
			cwd: dir,
			ignore: [".git/**", "**/.git/**"],
			dot: false,
			onlyFiles: true,
			followSymbolicLinks: false,
			suppressErrors: false,
		});
	} catch (error) {
		throw new ContentReadError(dir, error);
	}
	return files.map(toPosixPath).sort(compareOrdinal);
};

/**
 * Reads a file without following a symlink at its final component. Returns
 * null for symlinks, non-regular files and files removed since listing.
 */
export const readContentFile = async (
	filePath: string,
): Promise<Buffer | null> => {
	let handle: Awaited<ReturnType<typeof open>>;
	try {
		handle = await open(filePath, constants.O_RDONLY | constants.O_NOFOLLOW);
	} catch (error) {
		const code = getErrnoCode(error);
		if (code === "ELOOP" || (code && ABSENT_CODES.has(code))) {
			return null;
		}
		if (code === "EINVAL" || code === "ENOSYS" || code === "ENOTSUP") {
			const info = await lstat(filePath);
			if (info.isSymbolicLink()) {
				return null;
			}
			handle = await open(filePath, "r");
		} else {
			throw new ContentReadError(filePath, error);
		}
	}
	try {
		const info = await handle.stat();
		if (!info.isFile()) {
			return null;
		}
		return await handle.readFile();
	} catch (error) {
		throw new ContentReadError(filePath, error);
	} finally {
		await handle.close();
	}
};
