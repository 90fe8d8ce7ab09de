import { createHash } from "node:crypto";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { execa } from "execa";
import { type Reporter, silentReporter } from "#cli/ui";
import type { SourceSpec } from "#config";
import { getErrnoCode, toErrorMessage } from "#core/errors";
import { REPO_SUBDIR, type StorageLayout } from "#core/paths";
import { buildAgentEnv, resolveGitSyncCommand } from "#git/git-env";
import { redactRepoUrl } from "#git/redact";
import { readMirrorRevision } from "#git/revision";
import { prepareSshCredentials } from "#git/ssh";

const DEFAULT_TIMEOUT_MS = 120000; // 120 seconds (2 minutes)
const VERSION_TIMEOUT_MS = 10000;
const STDERR_TAIL_LINES = 20;

/**
 * Outcome of the agent's latest sync attempt. `revision` is the commit of the
 * last successful sync, which survives later failures.
 */
export type SyncResult = {
	ok: boolean;
	revision: string | null;
	timestamp: string;
	message?: string;
	details?: string;
};

export type OneShotResult = {
	result: SyncResult;
	stdout: string;
	stderr: string;
};

export type AgentState = "running" | "idle";

export interface SyncSupervisor {
	/** Starts or keeps the continuous agent for `spec`; stops it for null. */
	ensureRunning(spec: SourceSpec | null): Promise<AgentState>;
	/** Runs one sync cycle now and waits for it, bounded by the sync timeout. */
	triggerOneShot(): Promise<OneShotResult>;
	/** Null until the agent has produced anything. */
	lastResult(): Promise<SyncResult | null>;
	stop(): Promise<void>;
	agentVersion(): Promise<string | null>;
}

export type AgentExit = {
	exitCode: number | null;
	timedOut: boolean;
	stdout: string;
	stderr: string;
};

export type AgentProcess = {
	exited: Promise<AgentExit>;
	kill: () => void;
};

export type SpawnAgent = (
	command: string,
	args: string[],
	options: {
		env: NodeJS.ProcessEnv;
		timeoutMs?: number;
		buffer: boolean;
		onLine?: (line: string) => void;
	},
) => AgentProcess;

export const spawnWithExeca: SpawnAgent = (command, args, options) => {
	const subprocess = execa(command, args, {
		env: options.env,
		timeout: options.timeoutMs,
		reject: false,
		buffer: options.buffer,
		maxBuffer: 10 * 1024 * 1024,
		stdout: "pipe",
		stderr: "pipe",
	});
	const onLine = options.onLine ?? (() => {});
	const forward = (stream: NodeJS.ReadableStream | null) => {
		if (!stream) return;
		stream.on("data", (chunk) => {
			const text =
				chunk instanceof Buffer ? chunk.toString("utf8") : String(chunk);
			for (const line of text.split(/\r?\n/)) {
				if (line) onLine(line);
			}
		});
	};
	forward(subprocess.stdout);
	forward(subprocess.stderr);
	const exited = subprocess.then(
		(result): AgentExit => ({
			exitCode: typeof result.exitCode === "number" ? result.exitCode : null,
			timedOut: result.timedOut,
			stdout: typeof result.stdout === "string" ? result.stdout : "",
			stderr: typeof result.stderr === "string" ? result.stderr : "",
		}),
		(error: unknown): AgentExit => ({
			exitCode: null,
			timedOut: false,
			stdout: "",
			stderr: toErrorMessage(error),
		}),
	);
	return {
		exited,
		kill: () => {
			subprocess.kill();
		},
	};
};

type AgentMode = { oneTime: true } | { oneTime: false; waitSeconds: number };

export const buildGitSyncArgs = (
	spec: SourceSpec,
	layout: StorageLayout,
	mode: AgentMode,
) => {
	const args = ["--repo", spec.location];
	if (spec.branch) {
		args.push("--branch", spec.branch);
	}
	if (spec.rev) {
		args.push("--rev", spec.rev);
	}
	if (spec.depth > 0) {
		args.push("--depth", String(spec.depth));
	}
	args.push("--root", layout.mirrorDir, "--dest", REPO_SUBDIR);
	if (spec.sshKey) {
		args.push(
			"--ssh",
			"--ssh-key-file",
			layout.sshKeyPath,
			"--ssh-known-hosts-file",
			layout.knownHostsPath,
		);
	}
	if (mode.oneTime) {
		args.push("--one-time");
	} else {
		args.push("--wait", String(mode.waitSeconds));
	}
	return args;
};

export const parseAgentVersion = (output: string) =>
	/v(\d+\.\d+\.\d+)/.exec(output)?.[1] ?? null;

const specKey = (spec: SourceSpec) =>
	createHash("sha256").update(JSON.stringify(spec)).digest("hex");

// Identifies what the mirrored tree holds; the credential does not change it.
const mirrorSourceKey = (spec: SourceSpec) =>
	createHash("sha256")
		.update(JSON.stringify([spec.location, spec.branch, spec.rev, spec.depth]))
		.digest("hex");

type GitSyncOptions = {
	layout: StorageLayout;
	syncPeriodSeconds: number;
	syncTimeoutMs?: number;
	/** When false, the agent only runs for one-shot syncs. */
	continuous?: boolean;
	command?: string;
	env?: NodeJS.ProcessEnv;
	reporter?: Reporter;
};

type GitSyncDeps = {
	spawnAgent?: SpawnAgent;
	scanHost?: (host: string) => Promise<string>;
	now?: () => number;
};

type ContinuousAgent = {
	process: AgentProcess;
	startedAt: number;
	stopping: boolean;
	tail: string[];
	watch: Promise<void>;
};

type RecordedFailure = {
	message: string;
	details?: string;
	at: number;
};

/**
 * Drives git-sync as a sidecar process: one long-lived instance in continuous
 * mode, briefly replaced by a `--one-time` run when a sync is forced.
 */
export class GitSyncSupervisor implements SyncSupervisor {
	private readonly layout: StorageLayout;
	private readonly periodMs: number;
	private readonly waitSeconds: number;
	private readonly timeoutMs: number;
	private readonly continuous: boolean;
	private readonly command: string;
	private readonly env: NodeJS.ProcessEnv;
	private readonly reporter: Reporter;
	private readonly spawnAgent: SpawnAgent;
	private readonly scanHost?: (host: string) => Promise<string>;
	private readonly now: () => number;
	private spec: SourceSpec | null = null;
	private specKey: string | null = null;
	private child: ContinuousAgent | null = null;
	private failure: RecordedFailure | null = null;

	constructor(options: GitSyncOptions, deps: GitSyncDeps = {}) {
		this.layout = options.layout;
		this.waitSeconds = options.syncPeriodSeconds;
		this.periodMs = options.syncPeriodSeconds * 1000;
		this.timeoutMs = options.syncTimeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.continuous = options.continuous ?? true;
		this.command = options.command ?? resolveGitSyncCommand(options.env);
		this.env = buildAgentEnv(options.env);
		this.reporter = options.reporter ?? silentReporter;
		this.spawnAgent = deps.spawnAgent ?? spawnWithExeca;
		this.scanHost = deps.scanHost;
		this.now = deps.now ?? Date.now;
	}

	get running() {
		return this.child !== null;
	}

	async ensureRunning(spec: SourceSpec | null): Promise<AgentState> {
		if (!spec) {
			await this.stop();
			await rm(this.layout.mirrorDir, { recursive: true, force: true });
			await rm(this.layout.mirrorSourcePath, { force: true });
			this.spec = null;
			this.specKey = null;
			this.failure = null;
			return "idle";
		}
		const key = specKey(spec);
		if (this.specKey !== key) {
			await this.stop();
			const sourceKey = mirrorSourceKey(spec);
			if ((await this.readMirrorSource()) !== sourceKey) {
				// The tree on disk may belong to another source, possibly from an
				// earlier process; start from a clean one.
				await rm(this.layout.mirrorDir, { recursive: true, force: true });
			}
			await this.writeMirrorSource(sourceKey);
			if (spec.sshKey) {
				await prepareSshCredentials(
					{ location: spec.location, sshKey: spec.sshKey, layout: this.layout },
					{ scanHost: this.scanHost },
				);
			}
			this.spec = spec;
			this.specKey = key;
			this.failure = null;
		}
		if (!this.child && this.continuous) {
			await this.startContinuous(spec);
		}
		return "running";
	}

	async triggerOneShot(): Promise<OneShotResult> {
		const spec = this.spec;
		if (!spec) {
			return {
				result: {
					ok: false,
					revision: null,
					timestamp: new Date(this.now()).toISOString(),
					message: "No source configured.",
				},
				stdout: "",
				stderr: "",
			};
		}
		const wasRunning = this.child !== null;
		await this.stop();
		try {
			await mkdir(this.layout.mirrorDir, { recursive: true });
			const args = buildGitSyncArgs(spec, this.layout, { oneTime: true });
			this.logCommand(args);
			const exit = await this.spawnAgent(this.command, args, {
				env: this.env,
				timeoutMs: this.timeoutMs,
				buffer: true,
				onLine: (line) => this.reporter.debug(`git-sync | ${line}`),
			}).exited;
			const at = this.now();
			const revision = await readMirrorRevision(this.layout.repoDir);
			if (exit.exitCode === 0 && !exit.timedOut) {
				this.failure = null;
				return {
					result: {
						ok: true,
						revision: revision?.revision ?? null,
						timestamp: revision?.timestamp ?? new Date(at).toISOString(),
					},
					stdout: exit.stdout,
					stderr: exit.stderr,
				};
			}
			this.failure = {
				message: this.describeExit(exit),
				details: exit.stderr || undefined,
				at,
			};
			return {
				result: this.failureResult(this.failure, revision?.revision ?? null),
				stdout: exit.stdout,
				stderr: exit.stderr,
			};
		} finally {
			if (wasRunning) {
				await this.startContinuous(spec);
			}
		}
	}

	async lastResult(): Promise<SyncResult | null> {
		const revision = await readMirrorRevision(this.layout.repoDir);
		const failure = this.failure;
		if (failure) {
			// git-sync exits on its first failed cycle, so an instance that has
			// outlived a full period since the failure has synced successfully.
			const checkedOutSince =
				revision !== null && Date.parse(revision.timestamp) > failure.at;
			const survivedPeriod =
				this.child !== null &&
				this.child.startedAt > failure.at &&
				this.now() - this.child.startedAt >= this.periodMs;
			if (!checkedOutSince && !survivedPeriod) {
				return this.failureResult(failure, revision?.revision ?? null);
			}
			this.failure = null;
		}
		if (!revision) {
			return null;
		}
		return { ok: true, revision: revision.revision, timestamp: revision.timestamp };
	}

	async stop() {
		const child = this.child;
		if (!child) {
			return;
		}
		child.stopping = true;
		child.process.kill();
		await child.watch;
		this.child = null;
	}

	async agentVersion() {
		const exit = await this.spawnAgent(this.command, ["--version"], {
			env: this.env,
			timeoutMs: VERSION_TIMEOUT_MS,
			buffer: true,
		}).exited;
		if (exit.exitCode !== 0) {
			return null;
		}
		return parseAgentVersion(`${exit.stdout}\n${exit.stderr}`);
	}

	private async startContinuous(spec: SourceSpec) {
		await mkdir(this.layout.mirrorDir, { recursive: true });
		const args = buildGitSyncArgs(spec, this.layout, {
			oneTime: false,
			waitSeconds: this.waitSeconds,
		});
		this.logCommand(args);
		const tail: string[] = [];
		const agentProcess = this.spawnAgent(this.command, args, {
			env: this.env,
			buffer: false,
			onLine: (line) => {
				this.reporter.debug(`git-sync | ${line}`);
				tail.push(line);
				if (tail.length > STDERR_TAIL_LINES) {
					tail.shift();
				}
			},
		});
		const agent: ContinuousAgent = {
			process: agentProcess,
			startedAt: this.now(),
			stopping: false,
			tail,
			watch: Promise.resolve(),
		};
		agent.watch = agentProcess.exited.then((exit) => this.handleExit(agent, exit));
		this.child = agent;
	}

	private async readMirrorSource() {
		try {
			return (await readFile(this.layout.mirrorSourcePath, "utf8")).trim();
		} catch (error) {
			if (getErrnoCode(error) === "ENOENT") {
				return null;
			}
			throw error;
		}
	}

	private async writeMirrorSource(sourceKey: string) {
		await mkdir(this.layout.storageDir, { recursive: true });
		await writeFile(this.layout.mirrorSourcePath, `${sourceKey}\n`, "utf8");
	}

	private handleExit(agent: ContinuousAgent, exit: AgentExit) {
		if (this.child === agent) {
			this.child = null;
		}
		if (agent.stopping || exit.exitCode === 0) {
			return;
		}
		const message = this.describeExit(exit);
		this.reporter.warn(`git-sync stopped: ${message}`);
		this.failure = {
			message,
			details: agent.tail.join("\n") || exit.stderr || undefined,
			at: this.now(),
		};
	}

	private failureResult(
		failure: RecordedFailure,
		revision: string | null,
	): SyncResult {
		return {
			ok: false,
			revision,
			timestamp: new Date(failure.at).toISOString(),
			message: failure.message,
			...(failure.details ? { details: failure.details } : {}),
		};
	}

	private describeExit(exit: AgentExit) {
		if (exit.timedOut) {
			return `Timed out after ${this.timeoutMs}ms.`;
		}
		if (exit.exitCode === null) {
			return `Failed to run ${this.command}.`;
		}
		return `Exited with code ${exit.exitCode}.`;
	}

	private logCommand(args: string[]) {
		this.reporter.debug(
			`${this.command} ${args.map((arg) => redactRepoUrl(arg)).join(" ")}`,
		);
	}
}
