import { lstat, readFile, readlink, stat } from "node:fs/promises";
import path from "node:path";

const GITDIR_RE = /^gitdir:\s*.+\/([^/\s]+)\s*$/;
const REVISION_RE = /^[0-9a-f]{7,64}$/i;

export type MirrorRevision = {
	revision: string;
	timestamp: string;
};

const fromGitFile = async (repoDir: string) => {
	const gitFile = path.join(repoDir, ".git");
	try {
		const info = await stat(gitFile);
		if (!info.isFile()) {
			return null;
		}
		// gitdir: ../.git/worktrees/901551c1bdd2ff5a10f14027667c15a6b3a16777
		const contents = (await readFile(gitFile, "utf8")).trim();
		const match = GITDIR_RE.exec(contents);
		if (!match) {
			return null;
		}
		return { revision: match[1], timestamp: info.mtime.toISOString() };
	} catch {
		return null;
	}
};

const fromWorktreeLink = async (repoDir: string) => {
	try {
		const info = await lstat(repoDir);
		if (!info.isSymbolicLink()) {
			return null;
		}
		const target = path.basename(await readlink(repoDir));
		if (!REVISION_RE.test(target)) {
			return null;
		}
		return { revision: target, timestamp: info.mtime.toISOString() };
	} catch {
		return null;
	}
};

/**
 * The commit the agent last checked out, or null when nothing has been synced
 * or the checkout marker is in a format we do not recognise.
 */
export const readMirrorRevision = async (
	repoDir: string,
): Promise<MirrorRevision | null> =>
	(await fromGitFile(repoDir)) ?? (await fromWorktreeLink(repoDir));
