import { DASHBOARD_EXTENSIONS, DASHBOARD_INCLUDE } from "./kinds";
import { type LoaderParams, loadContentFiles, type ParseOutcome } from "./loader";
import type { LoadResult } from "./types";

export type DashboardDocument = Record<string, unknown>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

// Panels and queries are the dashboard store's business; only the document
// shape is checked here.
export const parseDashboardFile = (
	text: string,
): ParseOutcome<DashboardDocument> => {
	let document: unknown;
	try {
		document = JSON.parse(text);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		return { ok: false, message: `Invalid JSON: ${message}` };
	}
	if (!isRecord(document)) {
		return { ok: false, message: "Dashboard must be a JSON object." };
	}
	return { ok: true, payload: document };
};

export const loadDashboards = (
	params: LoaderParams,
): Promise<LoadResult<DashboardDocument>> =>
	loadContentFiles(params, {
		include: DASHBOARD_INCLUDE,
		extensions: DASHBOARD_EXTENSIONS,
		parse: parseDashboardFile,
	});
