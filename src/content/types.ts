/**
 * A problem with one source file. The file is left out of publication and its
 * siblings carry on.
 */
export type FileIssue =
	| { type: "invalid"; path: string; message: string }
	| { type: "duplicate"; path: string; name: string; winner: string };

/** One unit of published content, named after the file it came from. */
export type ContentRecord<TPayload> = {
	name: string;
	payload: TPayload;
	sourcePath: string;
};

export type LoadResult<TPayload> = {
	records: ContentRecord<TPayload>[];
	issues: FileIssue[];
};

export const describeIssue = (issue: FileIssue) =>
	issue.type === "invalid"
		? `${issue.path}: ${issue.message}`
		: `${issue.path}: record name '${issue.name}' already taken by ${issue.winner}`;
