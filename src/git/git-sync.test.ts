import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import type { SourceSpec } from "#config";
import { getStorageLayout, type StorageLayout } from "#core/paths";
import {
	type AgentExit,
	buildGitSyncArgs,
	GitSyncSupervisor,
	parseAgentVersion,
	type SpawnAgent,
} from "./git-sync";

const REVISION = "901551c1bdd2ff5a10f14027667c15a6b3a16777";

const SPEC: SourceSpec = {
	location: "https://example.com/org/rules.git",
	branch: "main",
	rev: "HEAD",
	depth: 1,
};

type FakeRun = {
	args: string[];
	killed: boolean;
	emit: (line: string) => void;
	finish: (exit: Partial<AgentExit>) => void;
};

const createFakeSpawner = (onSpawn: (run: FakeRun) => void = () => {}) => {
	const runs: FakeRun[] = [];
	const spawnAgent: SpawnAgent = (_command, args, options) => {
		let settle: (exit: AgentExit) => void = () => {};
		const exited = new Promise<AgentExit>((resolve) => {
			settle = resolve;
		});
		const run: FakeRun = {
			args,
			killed: false,
			emit: (line) => options.onLine?.(line),
			finish: (exit) =>
				settle({
					exitCode: 0,
					timedOut: false,
					stdout: "",
					stderr: "",
					...exit,
				}),
		};
		runs.push(run);
		onSpawn(run);
		return {
			exited,
			kill: () => {
				run.killed = true;
				run.finish({ exitCode: null });
			},
		};
	};
	return { runs, spawnAgent };
};

const writeCheckout = (layout: StorageLayout) => {
	fs.mkdirSync(layout.repoDir, { recursive: true });
	fs.writeFileSync(
		path.join(layout.repoDir, ".git"),
		`gitdir: ../.git/worktrees/${REVISION}\n`,
	);
};

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

const tempDirs: string[] = [];

afterEach(() => {
	for (const dir of tempDirs.splice(0)) {
		fs.rmSync(dir, { recursive: true, force: true });
	}
});

const makeLayout = () => {
	const dir = fs.mkdtempSync(path.join(os.tmpdir(), "rule-relay-sync-"));
	tempDirs.push(dir);
	return getStorageLayout(dir);
};

describe("buildGitSyncArgs", () => {
	it("builds continuous-mode arguments with ssh", () => {
		const layout = getStorageLayout("/var/lib/relay");
		expect(
			buildGitSyncArgs(
				{ ...SPEC, location: "git@example.com:org/rules.git", sshKey: "test-key" },
				layout,
				{ oneTime: false, waitSeconds: 60 },
			),
		).toEqual([
			"--repo",
			"git@example.com:org/rules.git",
			"--branch",
			"main",
			"--rev",
			"HEAD",
			"--depth",
			"1",
			"--root",
			path.join("/var/lib/relay", "mirror"),
			"--dest",
			"repo",
			"--ssh",
			"--ssh-key-file",
			path.join("/var/lib/relay", "ssh", "id"),
			"--ssh-known-hosts-file",
			path.join("/var/lib/relay", "ssh", "known_hosts"),
			"--wait",
			"60",
		]);
	});

	it("omits depth zero and marks one-shot runs", () => {
		const args = buildGitSyncArgs(
			{ ...SPEC, depth: 0 },
			getStorageLayout("/var/lib/relay"),
			{ oneTime: true },
		);
		expect(args).not.toContain("--depth");
		expect(args.at(-1)).toBe("--one-time");
	});
});

describe("parseAgentVersion", () => {
	it("reads the semantic version", () => {
		expect(parseAgentVersion("git-sync v4.2.1\n")).toBe("4.2.1");
		expect(parseAgentVersion("unknown")).toBeNull();
	});
});

describe("GitSyncSupervisor", () => {
	it("starts the continuous agent once per spec", async () => {
		const layout = makeLayout();
		const { runs, spawnAgent } = createFakeSpawner();
		const supervisor = new GitSyncSupervisor(
			{ layout, syncPeriodSeconds: 30, env: {} },
			{ spawnAgent },
		);

		expect(await supervisor.ensureRunning(SPEC)).toBe("running");
		expect(await supervisor.ensureRunning(SPEC)).toBe("running");
		expect(runs).toHaveLength(1);
		expect(runs[0].args.slice(-2)).toEqual(["--wait", "30"]);

		await supervisor.ensureRunning({ ...SPEC, branch: "release" });
		expect(runs).toHaveLength(2);
		expect(runs[0].killed).toBe(true);

		await supervisor.stop();
	});

	it("stops the agent and drops the mirror for an absent spec", async () => {
		const layout = makeLayout();
		const { runs, spawnAgent } = createFakeSpawner();
		const supervisor = new GitSyncSupervisor(
			{ layout, syncPeriodSeconds: 30, env: {} },
			{ spawnAgent },
		);
		await supervisor.ensureRunning(SPEC);
		writeCheckout(layout);

		expect(await supervisor.ensureRunning(null)).toBe("idle");
		expect(runs[0].killed).toBe(true);
		expect(supervisor.running).toBe(false);
		expect(fs.existsSync(layout.mirrorDir)).toBe(false);
		expect(fs.existsSync(layout.mirrorSourcePath)).toBe(false);
	});

	it("drops a mirror left behind for another source by an earlier process", async () => {
		const layout = makeLayout();
		const first = new GitSyncSupervisor(
			{ layout, syncPeriodSeconds: 30, continuous: false, env: {} },
			{ spawnAgent: createFakeSpawner().spawnAgent },
		);
		await first.ensureRunning(SPEC);
		writeCheckout(layout);
		await first.stop();

		const next = new GitSyncSupervisor(
			{ layout, syncPeriodSeconds: 30, continuous: false, env: {} },
			{ spawnAgent: createFakeSpawner().spawnAgent },
		);
		await next.ensureRunning({
			...SPEC,
			location: "https://example.com/org/other.git",
		});

		expect(fs.existsSync(layout.repoDir)).toBe(false);
		expect(await next.lastResult()).toBeNull();
	});

	it("keeps the mirror of the same source across processes", async () => {
		const layout = makeLayout();
		const first = new GitSyncSupervisor(
			{ layout, syncPeriodSeconds: 30, continuous: false, env: {} },
			{ spawnAgent: createFakeSpawner().spawnAgent },
		);
		await first.ensureRunning(SPEC);
		writeCheckout(layout);
		await first.stop();

		const next = new GitSyncSupervisor(
			{ layout, syncPeriodSeconds: 30, continuous: false, env: {} },
			{
				spawnAgent: createFakeSpawner().spawnAgent,
				scanHost: async (host) => `${host} ssh-ed25519 test-host-key\n`,
			},
		);
		await next.ensureRunning({ ...SPEC, sshKey: "test-key" });

		expect(await next.lastResult()).toMatchObject({
			ok: true,
			revision: REVISION,
		});
	});

	it("drops a mirror with no recorded source", async () => {
		const layout = makeLayout();
		writeCheckout(layout);
		const supervisor = new GitSyncSupervisor(
			{ layout, syncPeriodSeconds: 30, continuous: false, env: {} },
			{ spawnAgent: createFakeSpawner().spawnAgent },
		);
		await supervisor.ensureRunning(SPEC);

		expect(fs.existsSync(layout.mirrorDir)).toBe(false);
		expect(fs.readFileSync(layout.mirrorSourcePath, "utf8")).toMatch(
			/^[0-9a-f]{64}\n$/,
		);
	});

	it("only runs one-shot syncs when not continuous", async () => {
		const layout = makeLayout();
		const { runs, spawnAgent } = createFakeSpawner((run) => {
			writeCheckout(layout);
			run.finish({ exitCode: 0, stdout: "synced" });
		});
		const supervisor = new GitSyncSupervisor(
			{ layout, syncPeriodSeconds: 30, continuous: false, env: {} },
			{ spawnAgent },
		);

		await supervisor.ensureRunning(SPEC);
		expect(runs).toHaveLength(0);

		const { result, stdout } = await supervisor.triggerOneShot();
		expect(result.ok).toBe(true);
		expect(result.revision).toBe(REVISION);
		expect(stdout).toBe("synced");
		expect(runs).toHaveLength(1);
		expect(runs[0].args.at(-1)).toBe("--one-time");
		expect(supervisor.running).toBe(false);
	});

	it("pauses the continuous agent around a one-shot sync", async () => {
		const layout = makeLayout();
		const { runs, spawnAgent } = createFakeSpawner((run) => {
			if (run.args.includes("--one-time")) {
				writeCheckout(layout);
				run.finish({ exitCode: 0 });
			}
		});
		const supervisor = new GitSyncSupervisor(
			{ layout, syncPeriodSeconds: 30, env: {} },
			{ spawnAgent },
		);
		await supervisor.ensureRunning(SPEC);

		const { result } = await supervisor.triggerOneShot();

		expect(result).toMatchObject({ ok: true, revision: REVISION });
		expect(runs.map((run) => run.args.at(-1))).toEqual([
			"30",
			"--one-time",
			"30",
		]);
		expect(runs[0].killed).toBe(true);
		expect(supervisor.running).toBe(true);
		await supervisor.stop();
	});

	it("reports a timed-out one-shot as a failure", async () => {
		const layout = makeLayout();
		const { spawnAgent } = createFakeSpawner((run) => {
			run.finish({ exitCode: null, timedOut: true, stderr: "still cloning" });
		});
		const supervisor = new GitSyncSupervisor(
			{
				layout,
				syncPeriodSeconds: 30,
				syncTimeoutMs: 5000,
				continuous: false,
				env: {},
			},
			{ spawnAgent },
		);
		await supervisor.ensureRunning(SPEC);

		const { result } = await supervisor.triggerOneShot();

		expect(result).toMatchObject({
			ok: false,
			revision: null,
			message: "Timed out after 5000ms.",
			details: "still cloning",
		});
		expect(await supervisor.lastResult()).toMatchObject({
			ok: false,
			message: "Timed out after 5000ms.",
		});
	});

	it("reports no result before the first checkout", async () => {
		const layout = makeLayout();
		const { spawnAgent } = createFakeSpawner();
		const supervisor = new GitSyncSupervisor(
			{ layout, syncPeriodSeconds: 30, env: {} },
			{ spawnAgent },
		);
		await supervisor.ensureRunning(SPEC);
		expect(await supervisor.lastResult()).toBeNull();
		await supervisor.stop();
	});

	it("records a crash of the continuous agent until a newer checkout", async () => {
		const layout = makeLayout();
		const { runs, spawnAgent } = createFakeSpawner();
		const supervisor = new GitSyncSupervisor(
			{ layout, syncPeriodSeconds: 30, env: {} },
			{ spawnAgent, now: () => 1000 },
		);
		await supervisor.ensureRunning(SPEC);

		runs[0].emit("fatal: repository not found");
		runs[0].finish({ exitCode: 1 });
		await flush();

		expect(supervisor.running).toBe(false);
		expect(await supervisor.lastResult()).toEqual({
			ok: false,
			revision: null,
			timestamp: new Date(1000).toISOString(),
			message: "Exited with code 1.",
			details: "fatal: repository not found",
		});

		writeCheckout(layout);
		expect(await supervisor.lastResult()).toMatchObject({
			ok: true,
			revision: REVISION,
		});
	});

	it("reads the agent version", async () => {
		const layout = makeLayout();
		const { spawnAgent } = createFakeSpawner((run) => {
			run.finish({ exitCode: 0, stdout: "git-sync v4.2.1" });
		});
		const supervisor = new GitSyncSupervisor(
			{ layout, syncPeriodSeconds: 30, env: {} },
			{ spawnAgent },
		);
		expect(await supervisor.agentVersion()).toBe("4.2.1");
	});
});
