import { createHash } from "node:crypto";
import path from "node:path";
import { listContentFiles, readContentFile } from "./files";

export type ContentDigest = string;

type DigestParams = {
	root: string;
	subpaths: string[];
	include: string[];
};

export type DigestResult = {
	digest: ContentDigest;
	fileCount: number;
	bytes: number;
};

/**
 * Hashes the matching files under each subpath. Every file contributes one
 * manifest line of its repository-relative path and content hash, in ordinal
 * path order, so the digest moves exactly when a file is added, removed,
 * renamed or edited. Missing subpaths contribute nothing.
 */
export const computeContentDigest = async (
	params: DigestParams,
): Promise<DigestResult> => {
	const manifestHash = createHash("sha256");
	let fileCount = 0;
	let bytes = 0;
	const subpaths = Array.from(new Set(params.subpaths)).sort();
	for (const subpath of subpaths) {
		const files = await listContentFiles({
			root: params.root,
			subpath,
			include: params.include,
		});
		for (const relativePath of files) {
			const data = await readContentFile(
				path.join(params.root, subpath, relativePath),
			);
			if (!data) {
				continue;
			}
			const line = `${JSON.stringify({
				path: path.posix.join(subpath, relativePath),
				sha256: createHash("sha256").update(data).digest("hex"),
			})}\n`;
			manifestHash.update(line);
			fileCount += 1;
			bytes += data.length;
		}
	}
	return {
		digest: manifestHash.digest("hex"),
		fileCount,
		bytes,
	};
};
