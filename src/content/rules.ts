import YAML from "yaml";
import * as z from "zod";
import { RULE_EXTENSIONS, RULE_INCLUDE } from "./kinds";
import { type LoaderParams, loadContentFiles, type ParseOutcome } from "./loader";
import type { LoadResult } from "./types";

const ScalarSchema = z
	.union([z.string(), z.number(), z.boolean()])
	.transform((value) => String(value));

export const RuleSchema = z
	.object({
		alert: z.string().min(1).optional(),
		record: z.string().min(1).optional(),
		expr: z.string().min(1),
		for: z.string().min(1).optional(),
		keep_firing_for: z.string().min(1).optional(),
		labels: z.record(ScalarSchema).optional(),
		annotations: z.record(ScalarSchema).optional(),
	})
	.strict()
	.superRefine((rule, ctx) => {
		if (Boolean(rule.alert) === Boolean(rule.record)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: "rule must set exactly one of 'alert' or 'record'",
			});
		}
	});

export const RuleGroupSchema = z
	.object({
		name: z.string().min(1),
		interval: z.string().min(1).optional(),
		limit: z.number().int().min(0).optional(),
		query_offset: z.string().min(1).optional(),
		rules: z.array(RuleSchema).min(1),
	})
	.strict();

export const RuleFileSchema = z
	.object({
		groups: z.array(RuleGroupSchema).min(1),
	})
	.strict()
	.superRefine((file, ctx) => {
		const seen = new Set<string>();
		const duplicates = new Set<string>();
		for (const group of file.groups) {
			if (seen.has(group.name)) {
				duplicates.add(group.name);
			} else {
				seen.add(group.name);
			}
		}
		if (duplicates.size > 0) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["groups"],
				message: `Duplicate group names found: ${Array.from(duplicates).join(", ")}.`,
			});
		}
	});

export type Rule = z.infer<typeof RuleSchema>;
export type RuleGroup = z.infer<typeof RuleGroupSchema>;
export type RuleGroupSet = z.infer<typeof RuleFileSchema>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const formatIssues = (error: z.ZodError) =>
	error.issues
		.map((issue) => `${issue.path.join(".") || "file"} ${issue.message}`)
		.join("; ");

/**
 * Accepts the grouped format, a single rule, or a bare list of rules. The
 * latter two are wrapped into one group named after the record.
 */
export const parseRuleFile = (
	text: string,
	name: string,
): ParseOutcome<RuleGroupSet> => {
	let document: unknown;
	try {
		document = YAML.parse(text);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		return { ok: false, message: `Invalid YAML: ${message}` };
	}
	if (document === null || document === undefined) {
		return { ok: false, message: "Rule file is empty." };
	}
	const candidate =
		isRecord(document) && "groups" in document
			? document
			: {
					groups: [
						{
							name,
							rules: Array.isArray(document) ? document : [document],
						},
					],
				};
	const parsed = RuleFileSchema.safeParse(candidate);
	if (!parsed.success) {
		return {
			ok: false,
			message: `Rule file does not match schema: ${formatIssues(parsed.error)}.`,
		};
	}
	return { ok: true, payload: parsed.data };
};

/** Loads metric or log rule files; both stores take the same group format. */
export const loadRules = (
	params: LoaderParams,
): Promise<LoadResult<RuleGroupSet>> =>
	loadContentFiles(params, {
		include: RULE_INCLUDE,
		extensions: RULE_EXTENSIONS,
		parse: parseRuleFile,
	});
