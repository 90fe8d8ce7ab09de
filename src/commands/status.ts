import { access } from "node:fs/promises";
import pc from "picocolors";
import { symbols, ui } from "#cli/ui";
import { loadConfig } from "#config";
import { DOWNSTREAM_KINDS, kindLabel } from "#content/kinds";
import { describeIssue } from "#content/types";
import { readState } from "#reconcile/state-store";
import { formatStatus } from "#reconcile/status";
import { resolveChannels, resolveLayout, resolveSettings } from "./runtime";

type StatusOptions = {
	configPath?: string;
};

const exists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

export const getStatus = async (options: StatusOptions) => {
	const loaded = await loadConfig(options.configPath);
	const layout = resolveLayout(loaded);
	const { spec } = resolveSettings(loaded);
	const channels = await Promise.all(
		resolveChannels(loaded).map(async (channel) => ({
			kind: channel.kind,
			path: channel.filePath,
			attached: await channel.isAttached(),
		})),
	);
	return {
		configPath: loaded.resolvedPath,
		storageDir: layout.storageDir,
		mirrorExists: await exists(layout.repoDir),
		configured: spec !== null,
		channels,
		state: await readState(layout.statePath),
	};
};

export type RelayStatusReport = Awaited<ReturnType<typeof getStatus>>;

export const printStatus = (status: RelayStatusReport) => {
	ui.header("Config", ui.path(status.configPath));
	ui.header(
		"Storage",
		`${ui.path(status.storageDir)} (${status.mirrorExists ? pc.green("mirrored") : pc.yellow("no mirror")})`,
	);
	const state = status.state;
	if (!state) {
		ui.line();
		ui.line(`${symbols.warn} No reconcile pass recorded yet.`);
		return;
	}
	ui.header("State", `${state.workloadState} (${formatStatus(state.status)})`);
	ui.header("Revision", ui.hash(state.lastSync?.revision));
	if (state.agentVersion) {
		ui.header("git-sync", state.agentVersion);
	}

	ui.line();
	for (const kind of DOWNSTREAM_KINDS) {
		const channel = status.channels.find((entry) => entry.kind === kind);
		const icon = channel?.attached ? symbols.success : symbols.warn;
		const channelLabel = !channel
			? pc.yellow("no channel")
			: channel.attached
				? pc.green("joined")
				: pc.yellow("detached");
		ui.item(
			icon,
			kindLabel(kind).padEnd(14),
			`${channelLabel} ${ui.hash(state.appliedDigests[kind])}`,
		);
		for (const issue of state.issues[kind] ?? []) {
			ui.line(`      ${symbols.warn} ${describeIssue(issue)}`);
		}
	}
};
