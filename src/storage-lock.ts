import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import process from "node:process";
import { getErrnoCode } from "#core/errors";
import type { StorageLayout } from "#core/paths";

export type StorageLock = {
	path: string;
	release: () => Promise<void>;
};

export type LockAttempt =
	| { acquired: true; lock: StorageLock }
	| { acquired: false; ownerPid: number };

type LockDeps = {
	pid?: number;
	isRunning?: (pid: number) => boolean;
};

export const isProcessRunning = (pid: number) => {
	try {
		// signal 0 only checks that the process exists
		process.kill(pid, 0);
		return true;
	} catch (error) {
		return getErrnoCode(error) === "EPERM";
	}
};

const readOwner = async (lockPath: string) => {
	try {
		const pid = Number.parseInt((await readFile(lockPath, "utf8")).trim(), 10);
		return Number.isInteger(pid) && pid > 0 ? pid : null;
	} catch (error) {
		if (getErrnoCode(error) === "ENOENT") {
			return null;
		}
		throw error;
	}
};

/**
 * Takes the pidfile in the storage directory. A pidfile whose process is gone
 * is replaced; a live owner is reported back instead.
 */
export const acquireStorageLock = async (
	layout: StorageLayout,
	deps: LockDeps = {},
): Promise<LockAttempt> => {
	const pid = deps.pid ?? process.pid;
	const isRunning = deps.isRunning ?? isProcessRunning;
	await mkdir(layout.storageDir, { recursive: true });

	for (let attempt = 0; attempt < 2; attempt += 1) {
		try {
			await writeFile(layout.lockPath, `${pid}\n`, { flag: "wx" });
			return {
				acquired: true,
				lock: {
					path: layout.lockPath,
					release: async () => {
						if ((await readOwner(layout.lockPath)) === pid) {
							await rm(layout.lockPath, { force: true });
						}
					},
				},
			};
		} catch (error) {
			if (getErrnoCode(error) !== "EEXIST") {
				throw error;
			}
		}
		const owner = await readOwner(layout.lockPath);
		if (owner !== null && owner !== pid && isRunning(owner)) {
			return { acquired: false, ownerPid: owner };
		}
		await rm(layout.lockPath, { force: true });
	}
	throw new Error(`Failed to acquire storage lock ${layout.lockPath}.`);
};
