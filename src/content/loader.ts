import path from "node:path";
import { toErrorMessage } from "#core/errors";
import { listContentFiles, readContentFile } from "./files";
import { toRecordName } from "./record-name";
import type { FileIssue, LoadResult } from "./types";

export type LoaderParams = {
	root: string;
	subpath: string;
};

export type ParseOutcome<TPayload> =
	| { ok: true; payload: TPayload }
	| { ok: false; message: string };

type FileFormat<TPayload> = {
	include: string[];
	extensions: string[];
	parse: (text: string, name: string) => ParseOutcome<TPayload>;
};

/**
 * Parses every matching file on its own. A file that fails to parse becomes
 * an issue; read failures of the tree itself still throw.
 */
export const loadContentFiles = async <TPayload>(
	params: LoaderParams,
	format: FileFormat<TPayload>,
): Promise<LoadResult<TPayload>> => {
	const files = await listContentFiles({
		root: params.root,
		subpath: params.subpath,
		include: format.include,
	});
	const result: LoadResult<TPayload> = { records: [], issues: [] };
	for (const relativePath of files) {
		const sourcePath = path.posix.join(params.subpath, relativePath);
		const data = await readContentFile(
			path.join(params.root, params.subpath, relativePath),
		);
		if (!data) {
			continue;
		}
		const name = toRecordName(relativePath, format.extensions);
		let outcome: ParseOutcome<TPayload>;
		try {
			outcome = format.parse(data.toString("utf8"), name);
		} catch (error) {
			outcome = { ok: false, message: toErrorMessage(error) };
		}
		if (outcome.ok) {
			result.records.push({ name, payload: outcome.payload, sourcePath });
			continue;
		}
		const issue: FileIssue = {
			type: "invalid",
			path: sourcePath,
			message: outcome.message,
		};
		result.issues.push(issue);
	}
	return result;
};
