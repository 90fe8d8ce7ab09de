import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { ContentPaths, SourceSpec } from "#config";
import { loadDashboards } from "#content/dashboards";
import { computeContentDigest } from "#content/digest";
import { loadRules } from "#content/rules";
import { ContentReadError } from "#core/errors";
import type {
	AgentState,
	OneShotResult,
	SyncResult,
	SyncSupervisor,
} from "#git/git-sync";
import { MemoryChannel } from "#publish/memory-channel";
import { ReconcileController } from "./controller";
import { CONFIG_MISSING_MESSAGE, NO_REVISION_MESSAGE } from "./status";

const SPEC: SourceSpec = {
	location: "https://example.com/org/rules.git",
	branch: "main",
	rev: "HEAD",
	depth: 1,
};

const PATHS: ContentPaths = {
	metricRules: "rules",
	logRules: "logs",
	dashboards: "dash",
};

const RULE = "alert: HostDown\nexpr: up == 0\n";

const OK_SYNC: SyncResult = {
	ok: true,
	revision: "abc1234",
	timestamp: "2024-05-01T12:00:00.000Z",
};

class FakeSupervisor implements SyncSupervisor {
	specs: Array<SourceSpec | null> = [];
	result: SyncResult | null = OK_SYNC;
	oneShot: OneShotResult = { result: OK_SYNC, stdout: "synced", stderr: "" };
	oneShots = 0;
	ensureError: Error | null = null;

	async ensureRunning(spec: SourceSpec | null): Promise<AgentState> {
		this.specs.push(spec);
		if (this.ensureError) {
			throw this.ensureError;
		}
		return spec ? "running" : "idle";
	}

	async triggerOneShot() {
		this.oneShots += 1;
		this.result = this.oneShot.result;
		return this.oneShot;
	}

	async lastResult() {
		return this.result;
	}

	async stop() {}

	async agentVersion() {
		return "4.2.1";
	}
}

const tempDirs: string[] = [];

afterEach(() => {
	for (const dir of tempDirs.splice(0)) {
		fs.rmSync(dir, { recursive: true, force: true });
	}
});

const writeFiles = (root: string, files: Record<string, string>) => {
	for (const [relativePath, contents] of Object.entries(files)) {
		const target = path.join(root, relativePath);
		fs.mkdirSync(path.dirname(target), { recursive: true });
		fs.writeFileSync(target, contents, "utf8");
	}
};

const setup = (options: { spec?: SourceSpec | null; statePath?: string } = {}) => {
	const root = fs.mkdtempSync(path.join(os.tmpdir(), "rule-relay-reconcile-"));
	tempDirs.push(root);
	writeFiles(root, {
		"rules/a.rules": RULE,
		"logs/l.rules": RULE,
		"dash/overview.json": '{"title":"Overview"}',
	});
	const supervisor = new FakeSupervisor();
	const channels = {
		metricRules: new MemoryChannel("metricRules"),
		logRules: new MemoryChannel("logRules"),
		dashboards: new MemoryChannel("dashboards"),
	};
	const deps = {
		loadRules: vi.fn(loadRules),
		loadDashboards: vi.fn(loadDashboards),
	};
	const controller = new ReconcileController(
		{
			supervisor,
			contentRoot: root,
			settings: {
				spec: options.spec === undefined ? SPEC : options.spec,
				paths: PATHS,
			},
			channels: Object.values(channels),
			statePath: options.statePath,
		},
		deps,
	);
	return { root, supervisor, channels, deps, controller };
};

const statuses = (kinds: Array<{ kind: string; status: string }>) =>
	Object.fromEntries(kinds.map((report) => [report.kind, report.status]));

describe("ReconcileController", () => {
	it("publishes every kind on the first configured pass", async () => {
		const { controller, channels, supervisor } = setup();

		const outcome = await controller.request("start");

		expect(outcome.state).toBe("configured");
		expect(outcome.status).toEqual({ kind: "active" });
		expect(statuses(outcome.kinds)).toEqual({
			metricRules: "published",
			logRules: "published",
			dashboards: "published",
		});
		expect(Array.from(channels.metricRules.records.keys())).toEqual(["a"]);
		expect(Array.from(channels.logRules.records.keys())).toEqual(["l"]);
		expect(channels.dashboards.records.get("overview")).toBe(
			'{"title":"Overview"}',
		);
		expect(supervisor.specs).toEqual([SPEC]);
	});

	it("skips loading when the content digest has not moved", async () => {
		const { controller, deps, channels } = setup();
		await controller.request("start");

		const outcome = await controller.request("tick");

		expect(statuses(outcome.kinds)).toEqual({
			metricRules: "unchanged",
			logRules: "unchanged",
			dashboards: "unchanged",
		});
		expect(deps.loadRules).toHaveBeenCalledTimes(2);
		expect(deps.loadDashboards).toHaveBeenCalledTimes(1);
		expect(channels.metricRules.writes).toHaveLength(1);
	});

	it("republishes only the kind whose files changed", async () => {
		const { controller, root, channels } = setup();
		await controller.request("start");
		writeFiles(root, { "rules/b.rules": RULE });

		const outcome = await controller.request("tick");

		expect(statuses(outcome.kinds)).toEqual({
			metricRules: "published",
			logRules: "unchanged",
			dashboards: "unchanged",
		});
		expect(channels.metricRules.writes[1]).toEqual({
			upserts: [
				{
					name: "b",
					payload:
						'{"groups":[{"name":"b","rules":[{"alert":"HostDown","expr":"up == 0"}]}]}',
				},
			],
			removals: [],
		});
	});

	it("keeps published content when the sync fails", async () => {
		const { controller, root, channels, supervisor } = setup();
		await controller.request("start");
		supervisor.result = {
			ok: false,
			revision: "abc1234",
			timestamp: "2024-05-01T12:05:00.000Z",
			message: "Exited with code 1.",
		};
		writeFiles(root, { "rules/b.rules": RULE });

		const outcome = await controller.request("tick");

		expect(outcome.status).toEqual({
			kind: "blocked",
			message: "Sync failed: Exited with code 1.",
		});
		expect(outcome.kinds).toEqual([]);
		expect(Array.from(channels.metricRules.records.keys())).toEqual(["a"]);
		expect(channels.metricRules.writes).toHaveLength(1);
	});

	it("blocks when the agent cannot be started", async () => {
		const { controller, supervisor, channels } = setup();
		supervisor.ensureError = new Error("spawn /git-sync ENOENT");

		const outcome = await controller.request("start");

		expect(outcome.status).toEqual({
			kind: "blocked",
			message: "Sync failed: spawn /git-sync ENOENT",
		});
		expect(channels.dashboards.writes).toEqual([]);
	});

	it("waits for the first revision before publishing", async () => {
		const { controller, supervisor, channels } = setup();
		supervisor.result = null;

		const outcome = await controller.request("start");

		expect(outcome.status).toEqual({
			kind: "blocked",
			message: NO_REVISION_MESSAGE,
		});
		expect(channels.metricRules.records.size).toBe(0);
	});

	it("clears every kind and goes idle when the location is removed", async () => {
		const { controller, channels, supervisor } = setup();
		await controller.request("start");

		const outcome = await controller.configure({ spec: null, paths: PATHS });

		expect(outcome.state).toBe("idle");
		expect(outcome.status).toEqual({
			kind: "blocked",
			message: CONFIG_MISSING_MESSAGE,
		});
		expect(statuses(outcome.kinds)).toEqual({
			metricRules: "cleared",
			logRules: "cleared",
			dashboards: "cleared",
		});
		for (const channel of Object.values(channels)) {
			expect(channel.records.size).toBe(0);
		}
		expect(supervisor.specs.at(-1)).toBeNull();
		expect(controller.state).toBe("idle");
	});

	it("stays uninitialized without a location", async () => {
		const { controller, supervisor } = setup({ spec: null });

		const outcome = await controller.request("start");

		expect(outcome.state).toBe("uninitialized");
		expect(outcome.status.kind).toBe("blocked");
		expect(supervisor.specs).toEqual([null]);
	});

	it("merges triggers that arrive during a pass into one follow-up", async () => {
		const { controller, supervisor } = setup();

		const first = controller.request("start");
		const second = controller.request("tick");
		const third = controller.request("config-changed");
		const [a, b, c] = await Promise.all([first, second, third]);

		expect(a.triggers).toEqual(["start"]);
		expect(b).toBe(c);
		expect(b.triggers).toEqual(["tick", "config-changed"]);
		expect(supervisor.specs).toHaveLength(2);
	});

	it("forces a one-shot sync on a manual re-sync", async () => {
		const { controller, supervisor } = setup();
		await controller.request("start");

		const result = await controller.resync();

		expect(supervisor.oneShots).toBe(1);
		expect(result).toMatchObject({
			ok: true,
			message: "Synced abc1234",
			stdout: "synced",
			stderr: "",
		});
	});

	it("reports a failed manual re-sync", async () => {
		const { controller, supervisor } = setup();
		supervisor.oneShot = {
			result: {
				ok: false,
				revision: null,
				timestamp: "2024-05-01T12:00:00.000Z",
				message: "Timed out after 120000ms.",
			},
			stdout: "",
			stderr: "still cloning",
		};

		const result = await controller.resync();

		expect(result).toMatchObject({
			ok: false,
			message: "Timed out after 120000ms.",
			stderr: "still cloning",
		});
		expect(result.outcome?.status).toEqual({
			kind: "blocked",
			message: "Sync failed: Timed out after 120000ms.",
		});
	});

	it("refuses a manual re-sync without a location", async () => {
		const { controller, supervisor } = setup({ spec: null });

		expect(await controller.resync()).toEqual({
			ok: false,
			message: CONFIG_MISSING_MESSAGE,
			stdout: "",
			stderr: "",
		});
		expect(supervisor.oneShots).toBe(0);
	});

	it("defers a kind until its downstream joins", async () => {
		const { controller, channels } = setup();
		channels.dashboards.attached = false;

		const first = await controller.request("start");
		expect(statuses(first.kinds).dashboards).toBe("deferred");
		expect(channels.dashboards.writes).toEqual([]);

		channels.dashboards.attached = true;
		const joined = await controller.request("channel-joined");
		expect(statuses(joined.kinds)).toEqual({
			metricRules: "unchanged",
			logRules: "unchanged",
			dashboards: "published",
		});
		expect(Array.from(channels.dashboards.records.keys())).toEqual([
			"overview",
		]);
	});

	it("reports invalid files without blocking the rest", async () => {
		const { controller, root, channels } = setup();
		writeFiles(root, { "rules/broken.rules": "" });

		const outcome = await controller.request("start");

		expect(outcome.status).toEqual({
			kind: "active",
			message: "1 file(s) skipped",
		});
		expect(outcome.issues).toEqual([
			{
				type: "invalid",
				path: "rules/broken.rules",
				message: "Rule file is empty.",
			},
		]);
		expect(Array.from(channels.metricRules.records.keys())).toEqual(["a"]);
	});

	it("retries a kind whose publish failed on the next trigger", async () => {
		const { controller, channels } = setup();
		channels.dashboards.failWith = new Error("store down");

		const failed = await controller.request("start");
		expect(failed.status).toEqual({
			kind: "waiting",
			message: "Updating dashboards failed; retrying on next trigger",
		});
		expect(failed.kinds.find((report) => report.kind === "dashboards")).toEqual({
			kind: "dashboards",
			status: "failed",
			added: [],
			updated: [],
			removed: [],
			written: false,
			error: "Failed to publish dashboards: store down",
		});

		channels.dashboards.failWith = null;
		const retried = await controller.request("tick");
		expect(retried.status).toEqual({ kind: "active" });
		expect(statuses(retried.kinds).dashboards).toBe("published");
	});

	it("checks an intact downstream after a restart without rewriting it", async () => {
		const stateDir = fs.mkdtempSync(path.join(os.tmpdir(), "rule-relay-statefile-"));
		tempDirs.push(stateDir);
		const statePath = path.join(stateDir, "state.json");
		const first = setup({ statePath });
		await first.controller.request("start");

		const restarted = new ReconcileController(
			{
				supervisor: new FakeSupervisor(),
				contentRoot: first.root,
				settings: { spec: SPEC, paths: PATHS },
				channels: Object.values(first.channels),
				statePath,
			},
			{ loadRules: first.deps.loadRules, loadDashboards: first.deps.loadDashboards },
		);
		const outcome = await restarted.request("start");

		expect(
			outcome.kinds.map((report) => [report.kind, report.status, report.written]),
		).toEqual([
			["metricRules", "published", false],
			["logRules", "published", false],
			["dashboards", "published", false],
		]);
		for (const channel of Object.values(first.channels)) {
			expect(channel.writes).toHaveLength(1);
		}

		const settled = await restarted.request("tick");
		expect(statuses(settled.kinds)).toEqual({
			metricRules: "unchanged",
			logRules: "unchanged",
			dashboards: "unchanged",
		});
	});

	it("republishes to a downstream that lost its records while stopped", async () => {
		const stateDir = fs.mkdtempSync(path.join(os.tmpdir(), "rule-relay-statefile-"));
		tempDirs.push(stateDir);
		const statePath = path.join(stateDir, "state.json");
		const first = setup({ statePath });
		await first.controller.request("start");

		const emptied = {
			metricRules: new MemoryChannel("metricRules"),
			logRules: new MemoryChannel("logRules"),
			dashboards: new MemoryChannel("dashboards"),
		};
		const restarted = new ReconcileController({
			supervisor: new FakeSupervisor(),
			contentRoot: first.root,
			settings: { spec: SPEC, paths: PATHS },
			channels: Object.values(emptied),
			statePath,
		});
		const outcome = await restarted.request("start");

		expect(
			outcome.kinds.map((report) => [report.kind, report.status, report.written]),
		).toEqual([
			["metricRules", "published", true],
			["logRules", "published", true],
			["dashboards", "published", true],
		]);
		expect(Array.from(emptied.metricRules.records.keys())).toEqual(["a"]);
		expect(Array.from(emptied.logRules.records.keys())).toEqual(["l"]);
		expect(Array.from(emptied.dashboards.records.keys())).toEqual(["overview"]);
	});

	it("confines a content read failure to its own kind", async () => {
		const { root, supervisor, channels } = setup();
		const computeDigest = vi.fn(
			async (params: Parameters<typeof computeContentDigest>[0]) => {
				if (params.subpaths.includes("logs")) {
					throw new ContentReadError(
						path.join(params.root, "logs"),
						new Error("permission denied"),
					);
				}
				return computeContentDigest(params);
			},
		);
		const controller = new ReconcileController(
			{
				supervisor,
				contentRoot: root,
				settings: { spec: SPEC, paths: PATHS },
				channels: Object.values(channels),
			},
			{ computeContentDigest: computeDigest },
		);

		const outcome = await controller.request("start");

		expect(statuses(outcome.kinds)).toEqual({
			metricRules: "published",
			logRules: "failed",
			dashboards: "published",
		});
		expect(
			outcome.kinds.find((report) => report.kind === "logRules")?.error,
		).toBe(`Failed to read ${path.join(root, "logs")}: permission denied`);
		expect(outcome.status).toEqual({
			kind: "waiting",
			message: "Updating log rules failed; retrying on next trigger",
		});
		expect(channels.logRules.writes).toEqual([]);
		expect(Array.from(channels.metricRules.records.keys())).toEqual(["a"]);
	});
});
