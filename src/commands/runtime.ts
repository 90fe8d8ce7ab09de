import type { Reporter } from "#cli/ui";
import {
	type LoadedConfig,
	resolveContentPaths,
	resolveSourceSpec,
} from "#config";
import { DOWNSTREAM_KINDS } from "#content/kinds";
import {
	getStorageLayout,
	resolveChannelDir,
	resolveStorageDir,
	type StorageLayout,
} from "#core/paths";
import { GitSyncSupervisor } from "#git/git-sync";
import type { DownstreamChannel } from "#publish/channel";
import { FileChannel } from "#publish/file-channel";
import {
	ReconcileController,
	type ReconcileSettings,
} from "#reconcile/controller";

export type Runtime = {
	layout: StorageLayout;
	supervisor: GitSyncSupervisor;
	controller: ReconcileController;
	channels: DownstreamChannel[];
};

export const resolveSettings = (loaded: LoadedConfig): ReconcileSettings => ({
	spec: resolveSourceSpec(loaded.config),
	paths: resolveContentPaths(loaded.config),
});

export const resolveChannels = (loaded: LoadedConfig): FileChannel[] =>
	DOWNSTREAM_KINDS.flatMap((kind) => {
		const dir = loaded.config.channels[kind];
		return dir
			? [new FileChannel(kind, resolveChannelDir(loaded.resolvedPath, dir))]
			: [];
	});

export const resolveLayout = (loaded: LoadedConfig) =>
	getStorageLayout(
		resolveStorageDir(loaded.resolvedPath, loaded.config.storageDir),
	);

/**
 * Wires the supervisor, the file-backed channels and the controller for one
 * loaded config.
 */
export const createRuntime = (
	loaded: LoadedConfig,
	options: { reporter: Reporter; continuous: boolean },
): Runtime => {
	const layout = resolveLayout(loaded);
	const supervisor = new GitSyncSupervisor({
		layout,
		syncPeriodSeconds: loaded.config.syncPeriodSeconds,
		syncTimeoutMs: loaded.config.syncTimeoutMs,
		continuous: options.continuous,
		reporter: options.reporter,
	});
	const channels = resolveChannels(loaded);
	const controller = new ReconcileController({
		supervisor,
		contentRoot: layout.repoDir,
		settings: resolveSettings(loaded),
		channels,
		statePath: layout.statePath,
		reporter: options.reporter,
	});
	return { layout, supervisor, controller, channels };
};
