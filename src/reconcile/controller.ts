import { type Reporter, silentReporter } from "#cli/ui";
import {
	type ContentPaths,
	configFingerprint,
	type SourceSpec,
} from "#config";
import { loadDashboards } from "#content/dashboards";
import { computeContentDigest } from "#content/digest";
import {
	DOWNSTREAM_KINDS,
	type DownstreamKind,
	includeForKind,
	kindLabel,
} from "#content/kinds";
import { loadRules } from "#content/rules";
import { describeIssue, type FileIssue, type LoadResult } from "#content/types";
import { toErrorMessage } from "#core/errors";
import type {
	OneShotResult,
	SyncResult,
	SyncSupervisor,
} from "#git/git-sync";
import type { DownstreamChannel } from "#publish/channel";
import { RelationPublisher } from "#publish/publisher";
import { type KindMap, readState, writeState } from "./state-store";
import { transition, WorkloadState } from "./state";
import {
	CONFIG_MISSING_MESSAGE,
	NO_REVISION_MESSAGE,
	syncFailedMessage,
	type WorkloadStatus,
} from "./status";

export type ReconcileTrigger =
	| "start"
	| "tick"
	| "manual"
	| "config-changed"
	| "channel-joined"
	| "channel-left";

export type KindReport = {
	kind: DownstreamKind;
	status: "published" | "unchanged" | "cleared" | "deferred" | "failed";
	added: string[];
	updated: string[];
	removed: string[];
	written: boolean;
	error?: string;
};

export type ReconcileOutcome = {
	state: WorkloadState;
	status: WorkloadStatus;
	triggers: ReconcileTrigger[];
	sync: SyncResult | null;
	kinds: KindReport[];
	issues: FileIssue[];
	oneShot?: OneShotResult;
};

export type ResyncResult = {
	ok: boolean;
	message: string;
	stdout: string;
	stderr: string;
	details?: string;
	outcome?: ReconcileOutcome;
};

export type ReconcileSettings = {
	spec: SourceSpec | null;
	paths: ContentPaths;
};

type ControllerDeps = {
	computeContentDigest?: typeof computeContentDigest;
	loadRules?: typeof loadRules;
	loadDashboards?: typeof loadDashboards;
};

type ControllerOptions = {
	supervisor: SyncSupervisor;
	contentRoot: string;
	settings: ReconcileSettings;
	channels?: DownstreamChannel[];
	statePath?: string;
	reporter?: Reporter;
	publisher?: RelationPublisher;
};

type Waiter = {
	resolve: (outcome: ReconcileOutcome) => void;
	reject: (error: unknown) => void;
};

type PendingPass = {
	triggers: Set<ReconcileTrigger>;
	waiters: Waiter[];
};

const emptyReport = (
	kind: DownstreamKind,
	status: KindReport["status"],
	error?: string,
): KindReport => ({
	kind,
	status,
	added: [],
	updated: [],
	removed: [],
	written: false,
	...(error ? { error } : {}),
});

/**
 * Converges the mirroring agent and the downstream stores on the configured
 * source. Passes never overlap: triggers that arrive during a pass are merged
 * into a single follow-up pass.
 */
export class ReconcileController {
	private readonly supervisor: SyncSupervisor;
	private readonly contentRoot: string;
	private readonly statePath?: string;
	private readonly reporter: Reporter;
	private readonly publisher: RelationPublisher;
	private readonly deps: Required<ControllerDeps>;
	private readonly channels = new Map<DownstreamKind, DownstreamChannel>();
	private settings: ReconcileSettings;
	private workloadState: WorkloadState = WorkloadState.Uninitialized;
	private configKey: string | null = null;
	private appliedDigests: KindMap<string> = {};
	private kindIssues: KindMap<FileIssue[]> = {};
	// Kinds published by this process. Restored digests only skip work once the
	// downstream has been compared against the tree at least once.
	private readonly verifiedKinds = new Set<DownstreamKind>();
	private agentVersion: string | null = null;
	private agentVersionChecked = false;
	private restored = false;
	private pending: PendingPass | null = null;
	private active: Promise<void> | null = null;

	constructor(options: ControllerOptions, deps: ControllerDeps = {}) {
		this.supervisor = options.supervisor;
		this.contentRoot = options.contentRoot;
		this.settings = options.settings;
		this.statePath = options.statePath;
		this.reporter = options.reporter ?? silentReporter;
		this.publisher = options.publisher ?? new RelationPublisher();
		this.deps = {
			computeContentDigest: deps.computeContentDigest ?? computeContentDigest,
			loadRules: deps.loadRules ?? loadRules,
			loadDashboards: deps.loadDashboards ?? loadDashboards,
		};
		for (const channel of options.channels ?? []) {
			this.channels.set(channel.kind, channel);
		}
	}

	get state() {
		return this.workloadState;
	}

	/** Resolves once no pass is running or queued. */
	async idle() {
		while (this.active) {
			await this.active;
		}
	}

	request(trigger: ReconcileTrigger): Promise<ReconcileOutcome> {
		const pending: PendingPass = this.pending ?? {
			triggers: new Set(),
			waiters: [],
		};
		this.pending = pending;
		pending.triggers.add(trigger);
		const outcome = new Promise<ReconcileOutcome>((resolve, reject) => {
			pending.waiters.push({ resolve, reject });
		});
		if (!this.active) {
			this.active = this.drain();
		}
		return outcome;
	}

	configure(settings: ReconcileSettings) {
		this.settings = settings;
		return this.request("config-changed");
	}

	attachChannel(channel: DownstreamChannel) {
		this.channels.set(channel.kind, channel);
		return this.request("channel-joined");
	}

	detachChannel(kind: DownstreamKind) {
		this.channels.delete(kind);
		return this.request("channel-left");
	}

	/**
	 * The manual re-sync action: forces a one-shot sync, then reconciles.
	 */
	async resync(): Promise<ResyncResult> {
		if (!this.settings.spec) {
			return {
				ok: false,
				message: CONFIG_MISSING_MESSAGE,
				stdout: "",
				stderr: "",
			};
		}
		const outcome = await this.request("manual");
		const oneShot = outcome.oneShot;
		if (!oneShot) {
			const message =
				outcome.status.kind === "active"
					? "Sync was not run."
					: (outcome.status.message ?? "Sync was not run.");
			return { ok: false, message, stdout: "", stderr: "", outcome };
		}
		const { result } = oneShot;
		return {
			ok: result.ok,
			message: result.ok
				? `Synced ${result.revision ?? "unknown revision"}`
				: (result.message ?? "Sync failed."),
			stdout: oneShot.stdout,
			stderr: oneShot.stderr,
			...(result.details ? { details: result.details } : {}),
			outcome,
		};
	}

	private async drain() {
		try {
			while (this.pending) {
				const batch = this.pending;
				this.pending = null;
				try {
					const outcome = await this.runPass(batch.triggers);
					for (const waiter of batch.waiters) {
						waiter.resolve(outcome);
					}
				} catch (error) {
					for (const waiter of batch.waiters) {
						waiter.reject(error);
					}
				}
			}
		} finally {
			this.active = null;
		}
	}

	private async runPass(
		triggerSet: Set<ReconcileTrigger>,
	): Promise<ReconcileOutcome> {
		await this.restore();
		const triggers = Array.from(triggerSet);
		const { spec, paths } = this.settings;
		const next = transition(this.workloadState, { configured: spec !== null });
		this.reporter.debug(
			`Reconcile (${triggers.join(", ")}): ${this.workloadState} -> ${next}`,
		);

		if (!spec) {
			return this.finish({
				state: next,
				status: { kind: "blocked", message: CONFIG_MISSING_MESSAGE },
				triggers,
				sync: null,
				kinds: await this.clearAll(),
				issues: [],
			});
		}

		this.workloadState = next;
		let oneShot: OneShotResult | undefined;
		try {
			await this.supervisor.ensureRunning(spec);
			if (triggerSet.has("manual")) {
				oneShot = await this.supervisor.triggerOneShot();
			}
			if (!this.agentVersionChecked) {
				this.agentVersionChecked = true;
				this.agentVersion = await this.supervisor.agentVersion();
			}
		} catch (error) {
			return this.finish({
				state: next,
				status: { kind: "blocked", message: syncFailedMessage(toErrorMessage(error)) },
				triggers,
				sync: null,
				kinds: [],
				issues: this.collectIssues(),
				...(oneShot ? { oneShot } : {}),
			});
		}

		const sync = oneShot?.result ?? (await this.supervisor.lastResult());
		const base = { state: next, triggers, sync, ...(oneShot ? { oneShot } : {}) };
		if (!sync) {
			return this.finish({
				...base,
				status: { kind: "blocked", message: NO_REVISION_MESSAGE },
				kinds: [],
				issues: this.collectIssues(),
			});
		}
		if (!sync.ok) {
			// Keep serving what was last published rather than nothing.
			this.reporter.warn(syncFailedMessage(sync.message ?? "unknown error"));
			return this.finish({
				...base,
				status: {
					kind: "blocked",
					message: syncFailedMessage(sync.message ?? "unknown error"),
				},
				kinds: [],
				issues: this.collectIssues(),
			});
		}

		const configKey = configFingerprint(spec, paths);
		if (configKey !== this.configKey) {
			this.configKey = configKey;
			this.appliedDigests = {};
		}
		const kinds: KindReport[] = [];
		for (const kind of DOWNSTREAM_KINDS) {
			kinds.push(await this.reconcileKind(kind, paths[kind]));
		}
		const issues = this.collectIssues();
		return this.finish({
			...base,
			status: this.summarize(kinds, issues),
			kinds,
			issues,
		});
	}

	private async reconcileKind(
		kind: DownstreamKind,
		subpath: string,
	): Promise<KindReport> {
		const channel = await this.attachedChannel(kind);
		if (channel === null) {
			this.reporter.debug(`Deferring ${kindLabel(kind)}: no downstream joined`);
			return emptyReport(kind, "deferred");
		}
		if (channel instanceof Error) {
			return emptyReport(kind, "failed", channel.message);
		}
		try {
			const { digest } = await this.deps.computeContentDigest({
				root: this.contentRoot,
				subpaths: [subpath],
				include: includeForKind(kind),
			});
			if (
				this.verifiedKinds.has(kind) &&
				this.appliedDigests[kind] === digest
			) {
				return emptyReport(kind, "unchanged");
			}
			const loaded: LoadResult<unknown> =
				kind === "dashboards"
					? await this.deps.loadDashboards({ root: this.contentRoot, subpath })
					: await this.deps.loadRules({ root: this.contentRoot, subpath });
			const outcome = await this.publisher.publish(channel, loaded.records);
			const issues = [...loaded.issues, ...outcome.issues];
			for (const issue of issues) {
				this.reporter.warn(`Skipped ${describeIssue(issue)}`);
			}
			this.kindIssues[kind] = issues;
			this.appliedDigests[kind] = digest;
			this.verifiedKinds.add(kind);
			if (outcome.written) {
				this.reporter.info(
					`Published ${kindLabel(kind)} (${outcome.added.length} added, ${outcome.updated.length} updated, ${outcome.removed.length} removed)`,
				);
			}
			return {
				kind,
				status: "published",
				added: outcome.added,
				updated: outcome.updated,
				removed: outcome.removed,
				written: outcome.written,
			};
		} catch (error) {
			const message = toErrorMessage(error);
			this.reporter.warn(message);
			return emptyReport(kind, "failed", message);
		}
	}

	/**
	 * Leaving the configured state empties every downstream that is joined.
	 * Detached ones are emptied once they join again.
	 */
	private async clearAll(): Promise<KindReport[]> {
		try {
			await this.supervisor.ensureRunning(null);
		} catch (error) {
			this.reporter.warn(`Failed to stop git-sync: ${toErrorMessage(error)}`);
		}
		this.configKey = null;
		const reports: KindReport[] = [];
		for (const kind of DOWNSTREAM_KINDS) {
			delete this.appliedDigests[kind];
			this.verifiedKinds.delete(kind);
			delete this.kindIssues[kind];
			const channel = await this.attachedChannel(kind);
			if (channel === null) {
				reports.push(emptyReport(kind, "deferred"));
				continue;
			}
			if (channel instanceof Error) {
				reports.push(emptyReport(kind, "failed", channel.message));
				continue;
			}
			try {
				const outcome = await this.publisher.clear(channel);
				if (outcome.written) {
					this.reporter.info(
						`Cleared ${kindLabel(kind)} (${outcome.removed.length} removed)`,
					);
				}
				reports.push({
					kind,
					status: "cleared",
					added: [],
					updated: [],
					removed: outcome.removed,
					written: outcome.written,
				});
			} catch (error) {
				const message = toErrorMessage(error);
				this.reporter.warn(message);
				reports.push(emptyReport(kind, "failed", message));
			}
		}
		return reports;
	}

	/**
	 * The joined channel for a kind, null when none has joined, or the error
	 * raised while asking. A kind without a downstream loses its applied
	 * digest so it is published in full when one joins.
	 */
	private async attachedChannel(
		kind: DownstreamKind,
	): Promise<DownstreamChannel | Error | null> {
		const channel = this.channels.get(kind);
		let attached = false;
		if (channel) {
			try {
				attached = await channel.isAttached();
			} catch (error) {
				return new Error(
					`Failed to reach ${kindLabel(kind)} downstream: ${toErrorMessage(error)}`,
				);
			}
		}
		if (!channel || !attached) {
			delete this.appliedDigests[kind];
			this.verifiedKinds.delete(kind);
			delete this.kindIssues[kind];
			this.publisher.forget(kind);
			return null;
		}
		return channel;
	}

	private collectIssues(): FileIssue[] {
		return DOWNSTREAM_KINDS.flatMap((kind) => this.kindIssues[kind] ?? []);
	}

	private summarize(kinds: KindReport[], issues: FileIssue[]): WorkloadStatus {
		const failed = kinds.filter((report) => report.status === "failed");
		if (failed.length > 0) {
			return {
				kind: "waiting",
				message: `Updating ${failed.map((report) => kindLabel(report.kind)).join(", ")} failed; retrying on next trigger`,
			};
		}
		if (issues.length > 0) {
			return { kind: "active", message: `${issues.length} file(s) skipped` };
		}
		return { kind: "active" };
	}

	private async restore() {
		if (this.restored) {
			return;
		}
		this.restored = true;
		if (!this.statePath) {
			return;
		}
		try {
			const saved = await readState(this.statePath);
			if (!saved) {
				return;
			}
			this.workloadState = saved.workloadState;
			this.configKey = saved.configKey;
			this.appliedDigests = { ...saved.appliedDigests };
			this.kindIssues = { ...saved.issues };
		} catch (error) {
			this.reporter.warn(
				`Ignoring saved state, starting fresh: ${toErrorMessage(error)}`,
			);
		}
	}

	private async finish(outcome: ReconcileOutcome): Promise<ReconcileOutcome> {
		this.workloadState = outcome.state;
		if (this.statePath) {
			try {
				await writeState(this.statePath, {
					version: 1,
					updatedAt: new Date().toISOString(),
					workloadState: outcome.state,
					configKey: this.configKey,
					appliedDigests: { ...this.appliedDigests },
					issues: { ...this.kindIssues },
					status: outcome.status,
					lastSync: outcome.sync,
					agentVersion: this.agentVersion,
				});
			} catch (error) {
				this.reporter.warn(`Failed to save state: ${toErrorMessage(error)}`);
			}
		}
		return outcome;
	}
}
