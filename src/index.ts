export type { Reporter } from "#cli/ui";
export { createConsoleReporter, silentReporter } from "#cli/ui";
export type {
	ContentPaths,
	LoadedConfig,
	RelayConfig,
	RelayConfigInput,
	SourceSpec,
} from "#config";
export {
	configFingerprint,
	DEFAULT_CONFIG,
	loadConfig,
	resolveContentPaths,
	resolveSourceSpec,
	validateConfig,
} from "#config";
export { loadDashboards, parseDashboardFile } from "#content/dashboards";
export { computeContentDigest } from "#content/digest";
export { DOWNSTREAM_KINDS, type DownstreamKind } from "#content/kinds";
export { loadRules, parseRuleFile } from "#content/rules";
export type { ContentRecord, FileIssue, LoadResult } from "#content/types";
export { ContentReadError, PublishError, SyncError } from "#core/errors";
export { getStorageLayout, type StorageLayout } from "#core/paths";
export {
	acquireStorageLock,
	type LockAttempt,
	type StorageLock,
} from "#core/storage-lock";
export {
	type AgentProcess,
	GitSyncSupervisor,
	type SpawnAgent,
	type SyncResult,
	type SyncSupervisor,
} from "#git/git-sync";
export type { ChannelDelta, DownstreamChannel } from "#publish/channel";
export { FileChannel } from "#publish/file-channel";
export { MemoryChannel } from "#publish/memory-channel";
export { type PublishOutcome, RelationPublisher } from "#publish/publisher";
export {
	type ReconcileOutcome,
	ReconcileController,
	type ReconcileSettings,
	type ReconcileTrigger,
	type ResyncResult,
} from "#reconcile/controller";
export { readState, type RelayState } from "#reconcile/state-store";
export { WorkloadState } from "#reconcile/state";
export type { WorkloadStatus } from "#reconcile/status";
