export type ErrnoException = NodeJS.ErrnoException;

export const isErrnoException = (error: unknown): error is ErrnoException =>
	typeof error === "object" &&
	error !== null &&
	"code" in error &&
	(typeof (error as ErrnoException).code === "string" ||
		typeof (error as ErrnoException).code === "number" ||
		(error as ErrnoException).code === undefined);

export const getErrnoCode = (error: unknown): string | undefined =>
	isErrnoException(error) && typeof error.code === "string"
		? error.code
		: undefined;

export const toErrorMessage = (error: unknown) =>
	error instanceof Error ? error.message : String(error);

/**
 * The mirroring agent did not complete a sync. Previously published content
 * stays in place.
 */
export class SyncError extends Error {
	readonly details?: string;

	constructor(message: string, details?: string) {
		super(`Sync error: ${message}`);
		this.name = "SyncError";
		this.details = details;
	}
}

/** Files under the mirrored tree could not be read. */
export class ContentReadError extends Error {
	readonly path: string;

	constructor(filePath: string, cause: unknown) {
		super(`Failed to read ${filePath}: ${toErrorMessage(cause)}`, { cause });
		this.name = "ContentReadError";
		this.path = filePath;
	}
}

/** A downstream channel rejected or never received a write. */
export class PublishError extends Error {
	readonly kind: string;

	constructor(kind: string, cause: unknown) {
		super(`Failed to publish ${kind}: ${toErrorMessage(cause)}`, { cause });
		this.name = "PublishError";
		this.kind = kind;
	}
}
