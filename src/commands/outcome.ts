import pc from "picocolors";
import { symbols, ui } from "#cli/ui";
import { describeIssue } from "#content/types";
import { kindLabel } from "#content/kinds";
import type { KindReport, ReconcileOutcome } from "#reconcile/controller";
import { formatStatus, type WorkloadStatus } from "#reconcile/status";

const statusIcon = (status: WorkloadStatus) => {
	switch (status.kind) {
		case "active":
			return symbols.success;
		case "blocked":
			return symbols.error;
		default:
			return symbols.warn;
	}
};

const describeReport = (report: KindReport) => {
	switch (report.status) {
		case "published":
			return report.written
				? `+${report.added.length} ~${report.updated.length} -${report.removed.length}`
				: "up to date";
		case "cleared":
			return `-${report.removed.length}`;
		case "failed":
			return report.error ?? "failed";
		default:
			return report.status;
	}
};

export const printOutcome = (outcome: ReconcileOutcome) => {
	ui.line(
		`${statusIcon(outcome.status)} ${pc.bold(outcome.state)} ${formatStatus(outcome.status)}`,
	);
	if (outcome.sync?.revision) {
		ui.header("Revision", ui.hash(outcome.sync.revision));
	}
	for (const report of outcome.kinds) {
		if (report.status === "unchanged" || report.status === "deferred") {
			continue;
		}
		ui.item(
			report.status === "failed" ? symbols.error : symbols.success,
			kindLabel(report.kind),
			describeReport(report),
		);
	}
	for (const issue of outcome.issues) {
		ui.item(symbols.warn, describeIssue(issue));
	}
};
