import path from "node:path";

export const DEFAULT_STATE_FILENAME = "state.json";
export const MIRROR_SUBDIR = "mirror";
export const REPO_SUBDIR = "repo";
export const MIRROR_SOURCE_FILENAME = "mirror.source";
export const LOCK_FILENAME = "relay.pid";

export const toPosixPath = (value: string) => value.replace(/\\/g, "/");

export const resolveStorageDir = (configPath: string, storageDir: string) => {
	const resolvedDir = path.resolve(path.dirname(configPath), storageDir);

	// Security: Validate storage directory path doesn't contain path traversal
	const normalized = path.normalize(resolvedDir);
	if (normalized !== resolvedDir || normalized.includes("..")) {
		throw new Error(
			`Security: Invalid storage directory path (path traversal detected): ${storageDir}`,
		);
	}

	return resolvedDir;
};

export const resolveChannelDir = (configPath: string, channelDir: string) =>
	path.resolve(path.dirname(configPath), channelDir);

/**
 * Repository subpaths come from configuration and are joined onto the
 * mirrored tree, so they must stay inside it.
 */
export const assertRepoSubpath = (value: string, label: string) => {
	const normalized = path.posix.normalize(toPosixPath(value));
	if (
		path.posix.isAbsolute(normalized) ||
		path.win32.isAbsolute(value) ||
		normalized === ".." ||
		normalized.startsWith("../")
	) {
		throw new Error(`${label} must be a path inside the repository: ${value}`);
	}
	return normalized === "." ? "" : normalized.replace(/\/+$/, "");
};

export const getStorageLayout = (storageDir: string) => ({
	storageDir,
	mirrorDir: path.join(storageDir, MIRROR_SUBDIR),
	repoDir: path.join(storageDir, MIRROR_SUBDIR, REPO_SUBDIR),
	mirrorSourcePath: path.join(storageDir, MIRROR_SOURCE_FILENAME),
	statePath: path.join(storageDir, DEFAULT_STATE_FILENAME),
	lockPath: path.join(storageDir, LOCK_FILENAME),
	sshDir: path.join(storageDir, "ssh"),
	sshKeyPath: path.join(storageDir, "ssh", "id"),
	knownHostsPath: path.join(storageDir, "ssh", "known_hosts"),
});

export type StorageLayout = ReturnType<typeof getStorageLayout>;
