import { randomBytes } from "node:crypto";
import { readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import type { DownstreamKind } from "#content/kinds";
import { getErrnoCode } from "#core/errors";
import type { ChannelDelta, DownstreamChannel } from "./channel";
import { stableStringify } from "./serialize";

export type ChannelBag = {
	version: 1;
	kind: DownstreamKind;
	updatedAt: string;
	records: Record<string, unknown>;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export const validateChannelBag = (
	input: unknown,
	kind: DownstreamKind,
): ChannelBag => {
	if (!isRecord(input)) {
		throw new Error("Channel file must be a JSON object.");
	}
	if (input.version !== 1) {
		throw new Error("Channel file version must be 1.");
	}
	if (input.kind !== kind) {
		throw new Error(`Channel file kind must be ${kind}.`);
	}
	if (typeof input.updatedAt !== "string" || input.updatedAt.length === 0) {
		throw new Error("updatedAt must be a non-empty string.");
	}
	if (!isRecord(input.records)) {
		throw new Error("records must be an object.");
	}
	return {
		version: 1,
		kind,
		updatedAt: input.updatedAt,
		records: { ...input.records },
	};
};

/**
 * A downstream whose relation data lives in `<dir>/<kind>.json`. The
 * downstream has joined while `<dir>` exists.
 */
export class FileChannel implements DownstreamChannel {
	readonly kind: DownstreamKind;
	readonly dir: string;

	constructor(kind: DownstreamKind, dir: string) {
		this.kind = kind;
		this.dir = dir;
	}

	get filePath() {
		return path.join(this.dir, `${this.kind}.json`);
	}

	async isAttached() {
		try {
			return (await stat(this.dir)).isDirectory();
		} catch (error) {
			const code = getErrnoCode(error);
			if (code === "ENOENT" || code === "ENOTDIR") {
				return false;
			}
			throw error;
		}
	}

	async readCurrent() {
		const bag = await this.readBag();
		const current = new Map<string, string>();
		for (const [name, payload] of Object.entries(bag?.records ?? {})) {
			current.set(name, stableStringify(payload));
		}
		return current;
	}

	async apply(delta: ChannelDelta) {
		const bag = await this.readBag();
		const records = new Map<string, unknown>(
			Object.entries(bag?.records ?? {}),
		);
		for (const name of delta.removals) {
			records.delete(name);
		}
		for (const upsert of delta.upserts) {
			records.set(upsert.name, JSON.parse(upsert.payload));
		}
		const next: ChannelBag = {
			version: 1,
			kind: this.kind,
			updatedAt: new Date().toISOString(),
			records: Object.fromEntries(records),
		};
		await this.writeBag(next);
	}

	private async readBag(): Promise<ChannelBag | null> {
		let raw: string;
		try {
			raw = await readFile(this.filePath, "utf8");
		} catch (error) {
			if (getErrnoCode(error) === "ENOENT") {
				return null;
			}
			throw error;
		}
		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			throw new Error(`Invalid JSON in ${this.filePath}: ${message}`);
		}
		return validateChannelBag(parsed, this.kind);
	}

	private async writeBag(bag: ChannelBag) {
		const data = `${JSON.stringify(bag, null, 2)}\n`;
		const tempPath = `${this.filePath}.tmp-${randomBytes(8).toString("hex")}`;
		try {
			await writeFile(tempPath, data, "utf8");
			await rename(tempPath, this.filePath);
		} catch (error) {
			await rm(tempPath, { force: true });
			throw error;
		}
	}
}
