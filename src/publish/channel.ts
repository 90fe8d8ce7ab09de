import type { DownstreamKind } from "#content/kinds";

export type ChannelUpsert = {
	name: string;
	payload: string;
};

export type ChannelDelta = {
	upserts: ChannelUpsert[];
	removals: string[];
};

/**
 * One downstream store's relation data. Payloads cross this boundary in
 * stable serialized form.
 */
export interface DownstreamChannel {
	readonly kind: DownstreamKind;
	/** Whether the downstream has joined. Publishing is deferred until it has. */
	isAttached(): Promise<boolean>;
	/** The records the downstream currently holds, by name. */
	readCurrent(): Promise<Map<string, string>>;
	apply(delta: ChannelDelta): Promise<void>;
}

export const isEmptyDelta = (delta: ChannelDelta) =>
	delta.upserts.length === 0 && delta.removals.length === 0;
