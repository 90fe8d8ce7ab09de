export type WorkloadStatus =
	| { kind: "active"; message?: string }
	| { kind: "blocked"; message: string }
	| { kind: "waiting"; message: string };

export const STATUS_KINDS = [
	"active",
	"blocked",
	"waiting",
] as const;

export const CONFIG_MISSING_MESSAGE =
	"Config options missing - set gitRepo in the config file";
export const NO_REVISION_MESSAGE = "No revision yet - confirm config is valid";

export const syncFailedMessage = (reason: string) => `Sync failed: ${reason}`;

export const formatStatus = (status: WorkloadStatus) =>
	status.message ? `${status.kind}: ${status.message}` : status.kind;
