import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadRules, parseRuleFile } from "./rules";

const GROUPED = `groups:
  - name: host
    rules:
      - alert: HostDown
        expr: up == 0
        for: 5m
        labels:
          severity: critical
`;

const SINGLE = `alert: DiskFull
expr: disk_free < 0.1
labels:
  priority: 1
  paging: true
`;

const tempDirs: string[] = [];

afterEach(() => {
	for (const dir of tempDirs.splice(0)) {
		fs.rmSync(dir, { recursive: true, force: true });
	}
});

const makeTree = (files: Record<string, string>) => {
	const root = fs.mkdtempSync(path.join(os.tmpdir(), "rule-relay-rules-"));
	tempDirs.push(root);
	for (const [relativePath, contents] of Object.entries(files)) {
		const target = path.join(root, relativePath);
		fs.mkdirSync(path.dirname(target), { recursive: true });
		fs.writeFileSync(target, contents, "utf8");
	}
	return root;
};

describe("parseRuleFile", () => {
	it("accepts the grouped format", () => {
		expect(parseRuleFile(GROUPED, "host")).toEqual({
			ok: true,
			payload: {
				groups: [
					{
						name: "host",
						rules: [
							{
								alert: "HostDown",
								expr: "up == 0",
								for: "5m",
								labels: { severity: "critical" },
							},
						],
					},
				],
			},
		});
	});

	it("wraps a single rule into a group named after the record", () => {
		expect(parseRuleFile(SINGLE, "disk")).toEqual({
			ok: true,
			payload: {
				groups: [
					{
						name: "disk",
						rules: [
							{
								alert: "DiskFull",
								expr: "disk_free < 0.1",
								labels: { priority: "1", paging: "true" },
							},
						],
					},
				],
			},
		});
	});

	it("wraps a bare list of rules", () => {
		const text = "- record: job:up:sum\n  expr: sum(up) by (job)\n";
		expect(parseRuleFile(text, "jobs")).toEqual({
			ok: true,
			payload: {
				groups: [
					{
						name: "jobs",
						rules: [{ record: "job:up:sum", expr: "sum(up) by (job)" }],
					},
				],
			},
		});
	});

	it("rejects an empty file", () => {
		expect(parseRuleFile("", "empty")).toEqual({
			ok: false,
			message: "Rule file is empty.",
		});
	});

	it("rejects a rule that is both an alert and a record", () => {
		const text = "alert: A\nrecord: b\nexpr: up\n";
		expect(parseRuleFile(text, "both")).toEqual({
			ok: false,
			message:
				"Rule file does not match schema: groups.0.rules.0 rule must set exactly one of 'alert' or 'record'.",
		});
	});

	it("rejects duplicate group names", () => {
		const text = `groups:
  - name: dup
    rules:
      - alert: A
        expr: up
  - name: dup
    rules:
      - alert: B
        expr: up
`;
		expect(parseRuleFile(text, "dups")).toEqual({
			ok: false,
			message:
				"Rule file does not match schema: groups Duplicate group names found: dup..",
		});
	});

	it("reports YAML syntax errors", () => {
		const outcome = parseRuleFile("groups: [unclosed\n", "broken");
		expect(outcome.ok).toBe(false);
		if (!outcome.ok) {
			expect(outcome.message.startsWith("Invalid YAML: ")).toBe(true);
		}
	});
});

describe("loadRules", () => {
	it("loads valid files and reports the malformed one", async () => {
		const root = makeTree({
			"rules/a.rules": GROUPED,
			"rules/broken.yaml": "groups: [unclosed\n",
			"rules/nested/b.yml": SINGLE,
			"rules/README.md": "not a rule",
		});
		const result = await loadRules({ root, subpath: "rules" });

		expect(
			result.records.map((record) => [record.name, record.sourcePath]),
		).toEqual([
			["a", "rules/a.rules"],
			["nested_b", "rules/nested/b.yml"],
		]);
		expect(result.issues).toHaveLength(1);
		expect(result.issues[0]).toMatchObject({
			type: "invalid",
			path: "rules/broken.yaml",
		});
	});

	it("loads nothing from a missing subpath", async () => {
		const root = makeTree({});
		expect(await loadRules({ root, subpath: "rules" })).toEqual({
			records: [],
			issues: [],
		});
	});
});
