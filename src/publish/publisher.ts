import { compareOrdinal } from "#content/files";
import type { DownstreamKind } from "#content/kinds";
import type { ContentRecord, FileIssue } from "#content/types";
import { PublishError } from "#core/errors";
import {
	type ChannelDelta,
	type DownstreamChannel,
	isEmptyDelta,
} from "./channel";
import { stableStringify } from "./serialize";

export type PublishedSet = Map<string, string>;

export type DesiredSet = {
	records: PublishedSet;
	issues: FileIssue[];
};

export type PublishOutcome = {
	kind: DownstreamKind;
	added: string[];
	updated: string[];
	removed: string[];
	written: boolean;
	issues: FileIssue[];
};

/**
 * Serializes records into name-keyed payloads. When two files map to the same
 * name, the ordinally first source path keeps it and the others are reported.
 */
export const buildDesiredSet = (
	records: ContentRecord<unknown>[],
): DesiredSet => {
	const ordered = [...records].sort((left, right) =>
		compareOrdinal(left.sourcePath, right.sourcePath),
	);
	const desired: PublishedSet = new Map();
	const owners = new Map<string, string>();
	const issues: FileIssue[] = [];
	for (const record of ordered) {
		const winner = owners.get(record.name);
		if (winner !== undefined) {
			issues.push({
				type: "duplicate",
				path: record.sourcePath,
				name: record.name,
				winner,
			});
			continue;
		}
		owners.set(record.name, record.sourcePath);
		desired.set(record.name, stableStringify(record.payload));
	}
	return { records: desired, issues };
};

export const diffPublished = (previous: PublishedSet, next: PublishedSet) => {
	const added: string[] = [];
	const updated: string[] = [];
	const removed: string[] = [];
	for (const [name, payload] of next) {
		const prior = previous.get(name);
		if (prior === undefined) {
			added.push(name);
		} else if (prior !== payload) {
			updated.push(name);
		}
	}
	for (const name of previous.keys()) {
		if (!next.has(name)) {
			removed.push(name);
		}
	}
	return {
		added: added.sort(compareOrdinal),
		updated: updated.sort(compareOrdinal),
		removed: removed.sort(compareOrdinal),
	};
};

/**
 * Writes only what changed. The per-kind published set is a cache of the
 * downstream's content; it is rebuilt from the channel the first time a kind
 * is published and again after any failed write.
 */
export class RelationPublisher {
	private readonly published = new Map<DownstreamKind, PublishedSet>();

	async publish(
		channel: DownstreamChannel,
		records: ContentRecord<unknown>[],
	): Promise<PublishOutcome> {
		const desired = buildDesiredSet(records);
		const previous = await this.load(channel);
		const diff = diffPublished(previous, desired.records);
		const delta: ChannelDelta = {
			upserts: [...diff.added, ...diff.updated]
				.sort(compareOrdinal)
				.map((name) => ({ name, payload: desired.records.get(name) ?? "" })),
			removals: diff.removed,
		};
		const written = !isEmptyDelta(delta);
		if (written) {
			try {
				await channel.apply(delta);
			} catch (error) {
				this.published.delete(channel.kind);
				throw new PublishError(channel.kind, error);
			}
		}
		this.published.set(channel.kind, desired.records);
		return {
			kind: channel.kind,
			...diff,
			written,
			issues: desired.issues,
		};
	}

	clear(channel: DownstreamChannel) {
		return this.publish(channel, []);
	}

	/** Drops the cache for a kind whose downstream has left. */
	forget(kind: DownstreamKind) {
		this.published.delete(kind);
	}

	private async load(channel: DownstreamChannel): Promise<PublishedSet> {
		const cached = this.published.get(channel.kind);
		if (cached) {
			return cached;
		}
		try {
			const current = await channel.readCurrent();
			this.published.set(channel.kind, current);
			return current;
		} catch (error) {
			throw new PublishError(channel.kind, error);
		}
	}
}
