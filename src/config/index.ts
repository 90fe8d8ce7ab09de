import { createHash } from "node:crypto";
import { access, readFile } from "node:fs/promises";
import path from "node:path";
import type {
	RelayChannels,
	RelayConfig,
	RelayConfigInput,
} from "#config/schema";
import { ConfigSchema } from "#config/schema";
import { assertRepoSubpath } from "#core/paths";

export type { RelayChannels, RelayConfig, RelayConfigInput };

export const DEFAULT_CONFIG_FILENAME = "rule-relay.config.json";
export const PACKAGE_CONFIG_KEY = "rule-relay";
const PACKAGE_JSON_FILENAME = "package.json";

export const DEFAULT_CONFIG: RelayConfig = {
	gitRepo: "",
	gitBranch: "master",
	gitRev: "HEAD",
	gitDepth: 1,
	metricRulesPath: "prometheus_alert_rules",
	logRulesPath: "loki_alert_rules",
	dashboardsPath: "grafana_dashboards",
	storageDir: ".rule-relay",
	channels: {},
	syncPeriodSeconds: 60,
	reconcileIntervalSeconds: 300,
	syncTimeoutMs: 120000,
};

/**
 * Where and what to mirror. Immutable for the duration of a reconcile pass.
 */
export type SourceSpec = {
	location: string;
	branch: string;
	rev: string;
	depth: number;
	sshKey?: string;
};

/** Repository subpaths, one per downstream kind. */
export type ContentPaths = {
	metricRules: string;
	logRules: string;
	dashboards: string;
};

export const validateConfig = (input: unknown): RelayConfig => {
	if (typeof input !== "object" || input === null || Array.isArray(input)) {
		throw new Error("Config must be a JSON object.");
	}
	const parsed = ConfigSchema.safeParse(input);
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".") || "config"} ${issue.message}`)
			.join("; ");
		throw new Error(`Config does not match schema: ${details}.`);
	}
	const { $schema: _schema, ...configInput } = parsed.data;
	const config: RelayConfig = {
		...DEFAULT_CONFIG,
		...configInput,
		channels: { ...(configInput.channels ?? {}) },
	};
	assertRepoSubpath(config.metricRulesPath, "metricRulesPath");
	assertRepoSubpath(config.logRulesPath, "logRulesPath");
	assertRepoSubpath(config.dashboardsPath, "dashboardsPath");
	return config;
};

export const applyEnvOverrides = (
	config: RelayConfig,
	env: NodeJS.ProcessEnv = process.env,
): RelayConfig => {
	const sshKey = env.RULE_RELAY_GIT_SSH_KEY;
	return sshKey ? { ...config, gitSshKey: sshKey } : config;
};

/**
 * An empty location is the only signal for "not configured".
 */
export const resolveSourceSpec = (config: RelayConfig): SourceSpec | null => {
	const location = config.gitRepo.trim();
	if (!location) {
		return null;
	}
	return {
		location,
		branch: config.gitBranch,
		rev: config.gitRev,
		depth: config.gitDepth,
		...(config.gitSshKey ? { sshKey: config.gitSshKey } : {}),
	};
};

export const resolveContentPaths = (config: RelayConfig): ContentPaths => ({
	metricRules: assertRepoSubpath(config.metricRulesPath, "metricRulesPath"),
	logRules: assertRepoSubpath(config.logRulesPath, "logRulesPath"),
	dashboards: assertRepoSubpath(config.dashboardsPath, "dashboardsPath"),
});

/**
 * Identifies "this configuration" for the unchanged-content fast path. The
 * credential is left out so rotating a key does not force a republish.
 */
export const configFingerprint = (
	spec: SourceSpec,
	paths: ContentPaths,
): string =>
	createHash("sha256")
		.update(
			JSON.stringify([
				spec.location,
				spec.branch,
				spec.rev,
				spec.depth,
				paths.metricRules,
				paths.logRules,
				paths.dashboards,
			]),
		)
		.digest("hex");

export const resolveConfigPath = (configPath?: string) =>
	configPath
		? path.resolve(configPath)
		: path.resolve(process.cwd(), DEFAULT_CONFIG_FILENAME);

const resolvePackagePath = () =>
	path.resolve(process.cwd(), PACKAGE_JSON_FILENAME);

const exists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const loadConfigFromFile = async (
	filePath: string,
	mode: "config" | "package",
) => {
	let raw: string;
	try {
		raw = await readFile(filePath, "utf8");
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Failed to read config at ${filePath}: ${message}`);
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Invalid JSON in ${filePath}: ${message}`);
	}
	const configInput =
		mode === "package"
			? isRecord(parsed)
				? parsed[PACKAGE_CONFIG_KEY]
				: undefined
			: parsed;
	if (mode === "package" && configInput === undefined) {
		throw new Error(`Missing ${PACKAGE_CONFIG_KEY} config in ${filePath}.`);
	}
	const config = applyEnvOverrides(validateConfig(configInput));
	return {
		config,
		resolvedPath: filePath,
	};
};

export type LoadedConfig = Awaited<ReturnType<typeof loadConfigFromFile>>;

export const loadConfig = async (configPath?: string): Promise<LoadedConfig> => {
	const resolvedPath = resolveConfigPath(configPath);
	const isPackageConfig = path.basename(resolvedPath) === PACKAGE_JSON_FILENAME;
	if (configPath) {
		return loadConfigFromFile(
			resolvedPath,
			isPackageConfig ? "package" : "config",
		);
	}
	if (await exists(resolvedPath)) {
		return loadConfigFromFile(resolvedPath, "config");
	}
	const packagePath = resolvePackagePath();
	if (await exists(packagePath)) {
		try {
			return await loadConfigFromFile(packagePath, "package");
		} catch (error) {
			if (
				!(error instanceof Error) ||
				!error.message.includes(`Missing ${PACKAGE_CONFIG_KEY} config`)
			) {
				throw error;
			}
		}
	}
	throw new Error(
		`No ${DEFAULT_CONFIG_FILENAME} found at ${resolvedPath} and no ${PACKAGE_CONFIG_KEY} config in ${packagePath}.`,
	);
};
