import { chmod, mkdir, writeFile } from "node:fs/promises";
import { execa } from "execa";
import { SyncError, toErrorMessage } from "#core/errors";
import type { StorageLayout } from "#core/paths";

const REMOTE_HOST_RE = /@(.+?)[:/]/;

/**
 * Host part of an SSH remote: `git@host:org/repo.git` or
 * `git+ssh://user@host/org/repo`.
 */
export const extractRemoteHost = (location: string): string | null =>
	REMOTE_HOST_RE.exec(location)?.[1] ?? null;

type ScanHost = (host: string) => Promise<string>;

const keyscan: ScanHost = async (host) => {
	const result = await execa("ssh-keyscan", [host], { timeout: 30000 });
	return result.stdout;
};

/**
 * Writes the private key readable by the owner only and replaces
 * known_hosts with the remote's current public keys.
 */
export const prepareSshCredentials = async (
	params: { location: string; sshKey: string; layout: StorageLayout },
	deps: { scanHost?: ScanHost } = {},
) => {
	const { layout } = params;
	await mkdir(layout.sshDir, { recursive: true, mode: 0o700 });
	const key = params.sshKey.endsWith("\n")
		? params.sshKey
		: `${params.sshKey}\n`;
	await writeFile(layout.sshKeyPath, key, { mode: 0o600 });
	await chmod(layout.sshKeyPath, 0o600);

	const host = extractRemoteHost(params.location);
	if (!host) {
		await writeFile(layout.knownHostsPath, "", "utf8");
		return { host: null };
	}
	let knownHosts: string;
	try {
		knownHosts = await (deps.scanHost ?? keyscan)(host);
	} catch (error) {
		throw new SyncError(
			`Failed to scan SSH host keys for ${host}.`,
			toErrorMessage(error),
		);
	}
	await writeFile(
		layout.knownHostsPath,
		knownHosts.endsWith("\n") ? knownHosts : `${knownHosts}\n`,
		"utf8",
	);
	return { host };
};
