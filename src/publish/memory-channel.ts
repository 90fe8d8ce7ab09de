import type { DownstreamKind } from "#content/kinds";
import type { ChannelDelta, DownstreamChannel } from "./channel";

/**
 * Keeps a downstream's records in memory. Used when embedding the engine in
 * a host that forwards writes itself, and as the stand-in store in tests.
 */
export class MemoryChannel implements DownstreamChannel {
	readonly kind: DownstreamKind;
	readonly records = new Map<string, string>();
	readonly writes: ChannelDelta[] = [];
	attached = true;
	failWith: Error | null = null;

	constructor(kind: DownstreamKind, initial?: Iterable<[string, string]>) {
		this.kind = kind;
		for (const [name, payload] of initial ?? []) {
			this.records.set(name, payload);
		}
	}

	async isAttached() {
		return this.attached;
	}

	async readCurrent() {
		if (this.failWith) {
			throw this.failWith;
		}
		return new Map(this.records);
	}

	async apply(delta: ChannelDelta) {
		if (this.failWith) {
			throw this.failWith;
		}
		this.writes.push(delta);
		for (const name of delta.removals) {
			this.records.delete(name);
		}
		for (const upsert of delta.upserts) {
			this.records.set(upsert.name, upsert.payload);
		}
	}
}
