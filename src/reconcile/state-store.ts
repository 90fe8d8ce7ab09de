import { randomBytes } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { DOWNSTREAM_KINDS, type DownstreamKind } from "#content/kinds";
import type { FileIssue } from "#content/types";
import { getErrnoCode } from "#core/errors";
import type { SyncResult } from "#git/git-sync";
import { isWorkloadState, type WorkloadState } from "./state";
import { STATUS_KINDS, type WorkloadStatus } from "./status";

export type KindMap<T> = Partial<Record<DownstreamKind, T>>;

export interface RelayState {
	version: 1;
	updatedAt: string;
	workloadState: WorkloadState;
	configKey: string | null;
	appliedDigests: KindMap<string>;
	issues: KindMap<FileIssue[]>;
	status: WorkloadStatus;
	lastSync: SyncResult | null;
	agentVersion: string | null;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const assertString = (value: unknown, label: string): string => {
	if (typeof value !== "string" || value.length === 0) {
		throw new Error(`${label} must be a non-empty string.`);
	}
	return value;
};

const assertAnyString = (value: unknown, label: string): string => {
	if (typeof value !== "string") {
		throw new Error(`${label} must be a string.`);
	}
	return value;
};

const assertOptionalString = (value: unknown, label: string) =>
	value === undefined ? undefined : assertAnyString(value, label);

const assertNullableString = (value: unknown, label: string) =>
	value === null ? null : assertString(value, label);

const isDownstreamKind = (value: string): value is DownstreamKind =>
	DOWNSTREAM_KINDS.some((kind) => kind === value);

const validateKindMap = <T>(
	value: unknown,
	label: string,
	validateEntry: (entry: unknown, entryLabel: string) => T,
): KindMap<T> => {
	if (!isRecord(value)) {
		throw new Error(`${label} must be an object.`);
	}
	const result: KindMap<T> = {};
	for (const [key, entry] of Object.entries(value)) {
		if (!isDownstreamKind(key)) {
			throw new Error(`${label}.${key} is not a known downstream kind.`);
		}
		result[key] = validateEntry(entry, `${label}.${key}`);
	}
	return result;
};

const validateIssue = (value: unknown, label: string): FileIssue => {
	if (!isRecord(value)) {
		throw new Error(`${label} must be an object.`);
	}
	const issuePath = assertString(value.path, `${label}.path`);
	if (value.type === "invalid") {
		return {
			type: "invalid",
			path: issuePath,
			message: assertAnyString(value.message, `${label}.message`),
		};
	}
	if (value.type === "duplicate") {
		return {
			type: "duplicate",
			path: issuePath,
			name: assertString(value.name, `${label}.name`),
			winner: assertString(value.winner, `${label}.winner`),
		};
	}
	throw new Error(`${label}.type must be 'invalid' or 'duplicate'.`);
};

const validateStatus = (value: unknown): WorkloadStatus => {
	if (!isRecord(value)) {
		throw new Error("status must be an object.");
	}
	const message = assertOptionalString(value.message, "status.message");
	const kind = value.kind;
	if (kind === "active") {
		return message ? { kind, message } : { kind };
	}
	if (kind === "blocked" || kind === "waiting") {
		return { kind, message: assertString(message, "status.message") };
	}
	throw new Error(`status.kind must be one of ${STATUS_KINDS.join(", ")}.`);
};

const validateSync = (value: unknown): SyncResult | null => {
	if (value === null) {
		return null;
	}
	if (!isRecord(value)) {
		throw new Error("lastSync must be an object or null.");
	}
	const ok = value.ok;
	if (typeof ok !== "boolean") {
		throw new Error("lastSync.ok must be a boolean.");
	}
	const message = assertOptionalString(value.message, "lastSync.message");
	const details = assertOptionalString(value.details, "lastSync.details");
	return {
		ok,
		revision: assertNullableString(value.revision, "lastSync.revision"),
		timestamp: assertString(value.timestamp, "lastSync.timestamp"),
		...(message !== undefined ? { message } : {}),
		...(details !== undefined ? { details } : {}),
	};
};

export const validateState = (input: unknown): RelayState => {
	if (!isRecord(input)) {
		throw new Error("State file must be a JSON object.");
	}
	if (input.version !== 1) {
		throw new Error("State file version must be 1.");
	}
	const workloadState = input.workloadState;
	if (!isWorkloadState(workloadState)) {
		throw new Error("workloadState is not a known state.");
	}
	return {
		version: 1,
		updatedAt: assertString(input.updatedAt, "updatedAt"),
		workloadState,
		configKey: assertNullableString(input.configKey, "configKey"),
		appliedDigests: validateKindMap(
			input.appliedDigests,
			"appliedDigests",
			assertString,
		),
		issues: validateKindMap(input.issues, "issues", (entry, label) => {
			if (!Array.isArray(entry)) {
				throw new Error(`${label} must be an array.`);
			}
			return entry.map((issue, index) =>
				validateIssue(issue, `${label}[${index}]`),
			);
		}),
		status: validateStatus(input.status),
		lastSync: validateSync(input.lastSync),
		agentVersion: assertNullableString(input.agentVersion, "agentVersion"),
	};
};

/** Null when no state has been written yet. */
export const readState = async (statePath: string) => {
	let raw: string;
	try {
		raw = await readFile(statePath, "utf8");
	} catch (error) {
		if (getErrnoCode(error) === "ENOENT") {
			return null;
		}
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Failed to read state file at ${statePath}: ${message}`);
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Invalid JSON in ${statePath}: ${message}`);
	}
	return validateState(parsed);
};

export const writeState = async (statePath: string, state: RelayState) => {
	await mkdir(path.dirname(statePath), { recursive: true });
	const data = `${JSON.stringify(state, null, 2)}\n`;
	const tempPath = `${statePath}.tmp-${randomBytes(8).toString("hex")}`;
	try {
		await writeFile(tempPath, data, "utf8");
		await rename(tempPath, statePath);
	} catch (error) {
		await rm(tempPath, { force: true });
		throw error;
	}
};
