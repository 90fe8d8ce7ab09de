export const DOWNSTREAM_KINDS = ["metricRules", "logRules", "dashboards"] as const;

export type DownstreamKind = (typeof DOWNSTREAM_KINDS)[number];

export const RULE_EXTENSIONS = [".rules", ".rule", ".yaml", ".yml"];
export const DASHBOARD_EXTENSIONS = [".json.tmpl", ".json"];

export const RULE_INCLUDE = RULE_EXTENSIONS.map((ext) => `**/*${ext}`);
// Dashboards are only picked up from the top level of their subpath.
export const DASHBOARD_INCLUDE = DASHBOARD_EXTENSIONS.map((ext) => `*${ext}`);

export const includeForKind = (kind: DownstreamKind) =>
	kind === "dashboards" ? DASHBOARD_INCLUDE : RULE_INCLUDE;

export const kindLabel = (kind: DownstreamKind) => {
	switch (kind) {
		case "metricRules":
			return "metric rules";
		case "logRules":
			return "log rules";
		case "dashboards":
			return "dashboards";
	}
};
