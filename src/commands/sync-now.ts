import process from "node:process";
import { createConsoleReporter, symbols, ui } from "#cli/ui";
import { loadConfig } from "#config";
import { acquireStorageLock } from "#core/storage-lock";
import type { ResyncResult } from "#reconcile/controller";
import { printOutcome } from "./outcome";
import { createRuntime, resolveLayout } from "./runtime";

type SyncNowOptions = {
	configPath?: string;
};

/**
 * Forces a one-shot sync and a reconcile pass, then exits. The continuous
 * agent is never started. When a daemon owns the storage directory the sync is
 * handed to it through SIGUSR1 instead.
 */
export const syncNow = async (options: SyncNowOptions): Promise<ResyncResult> => {
	const reporter = createConsoleReporter();
	const loaded = await loadConfig(options.configPath);
	const attempt = await acquireStorageLock(resolveLayout(loaded));
	if (!attempt.acquired) {
		process.kill(attempt.ownerPid, "SIGUSR1");
		return {
			ok: true,
			message: `Requested a sync from the running daemon (pid ${attempt.ownerPid}).`,
			stdout: "",
			stderr: "",
		};
	}
	try {
		const { controller, supervisor } = createRuntime(loaded, {
			reporter,
			continuous: false,
		});
		try {
			return await controller.resync();
		} finally {
			await controller.idle();
			await supervisor.stop();
		}
	} finally {
		await attempt.lock.release();
	}
};

export const printSyncNow = (result: ResyncResult, json: boolean) => {
	if (json) {
		process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
		return;
	}
	if (result.stdout) {
		ui.line(result.stdout.trimEnd());
	}
	ui.line(`${result.ok ? symbols.success : symbols.error} ${result.message}`);
	if (!result.ok && result.details) {
		ui.line(result.details.trimEnd());
	}
	if (result.outcome) {
		printOutcome(result.outcome);
	}
};
