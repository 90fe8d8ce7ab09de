import process from "node:process";
import { createConsoleReporter, type Reporter } from "#cli/ui";
import { type LoadedConfig, loadConfig } from "#config";
import type { DownstreamKind } from "#content/kinds";
import { toErrorMessage } from "#core/errors";
import { acquireStorageLock } from "#core/storage-lock";
import type { ReconcileOutcome, ReconcileTrigger } from "#reconcile/controller";
import { printOutcome } from "./outcome";
import {
	createRuntime,
	resolveChannels,
	resolveLayout,
	resolveSettings,
} from "./runtime";

type RunOptions = {
	configPath?: string;
	json: boolean;
};

const channelDirs = (loaded: LoadedConfig) =>
	new Map<DownstreamKind, string>(
		resolveChannels(loaded).map((channel) => [channel.kind, channel.dir]),
	);

const serve = async (
	initial: LoadedConfig,
	options: RunOptions,
	reporter: Reporter,
) => {
	let loaded = initial;
	const runtime = createRuntime(loaded, { reporter, continuous: true });
	const { controller, supervisor } = runtime;
	let dirs = channelDirs(loaded);

	const report = (outcome: ReconcileOutcome) => {
		if (options.json) {
			process.stdout.write(`${JSON.stringify(outcome)}\n`);
			return;
		}
		printOutcome(outcome);
	};
	const fail = (error: unknown) => {
		reporter.error(toErrorMessage(error));
	};
	const track = (pending: Promise<ReconcileOutcome>) => {
		pending.then(report, fail);
	};
	const trigger = (reason: ReconcileTrigger) => {
		track(controller.request(reason));
	};

	const reload = async () => {
		const next = await loadConfig(options.configPath);
		if (resolveLayout(next).storageDir !== runtime.layout.storageDir) {
			reporter.warn("storageDir changes take effect after a restart.");
		}
		const nextDirs = channelDirs(next);
		for (const [kind, dir] of dirs) {
			if (nextDirs.get(kind) !== dir) {
				track(controller.detachChannel(kind));
			}
		}
		for (const channel of resolveChannels(next)) {
			if (dirs.get(channel.kind) !== channel.dir) {
				track(controller.attachChannel(channel));
			}
		}
		loaded = next;
		dirs = nextDirs;
		track(controller.configure(resolveSettings(loaded)));
	};

	trigger("start");
	const interval = setInterval(
		() => trigger("tick"),
		loaded.config.reconcileIntervalSeconds * 1000,
	);

	const onReload = () => {
		reporter.info("Reloading config");
		reload().catch(fail);
	};
	const onResync = () => {
		controller.resync().then((result) => {
			if (result.ok) {
				reporter.info(result.message);
			} else {
				reporter.warn(result.message);
			}
		}, fail);
	};

	await new Promise<void>((resolve) => {
		const shutdown = (signal: NodeJS.Signals) => {
			reporter.info(`Received ${signal}, stopping`);
			process.off("SIGHUP", onReload);
			process.off("SIGUSR1", onResync);
			process.off("SIGINT", shutdown);
			process.off("SIGTERM", shutdown);
			clearInterval(interval);
			resolve();
		};
		process.on("SIGHUP", onReload);
		process.on("SIGUSR1", onResync);
		process.on("SIGINT", shutdown);
		process.on("SIGTERM", shutdown);
	});

	await controller.idle();
	await supervisor.stop();
};

/**
 * Runs the relay until SIGINT or SIGTERM. SIGHUP re-reads the config file and
 * SIGUSR1 forces a one-shot sync.
 */
export const runDaemon = async (options: RunOptions) => {
	const reporter = createConsoleReporter();
	const loaded = await loadConfig(options.configPath);
	const layout = resolveLayout(loaded);
	const attempt = await acquireStorageLock(layout);
	if (!attempt.acquired) {
		throw new Error(
			`Another rule-relay process (pid ${attempt.ownerPid}) is using ${layout.storageDir}.`,
		);
	}
	try {
		await serve(loaded, options, reporter);
	} finally {
		await attempt.lock.release();
	}
};
