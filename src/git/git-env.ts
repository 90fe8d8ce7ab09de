export const DEFAULT_GIT_SYNC_COMMAND = "/git-sync";

export const resolveGitSyncCommand = (
	env: NodeJS.ProcessEnv = process.env,
): string => {
	// Allow deployments and tests to point at another agent binary
	const override = env.RULE_RELAY_GIT_SYNC_COMMAND;
	if (override) {
		return override;
	}
	return DEFAULT_GIT_SYNC_COMMAND;
};

const PROXY_KEYS = ["HTTP_PROXY", "HTTPS_PROXY", "NO_PROXY"] as const;

/**
 * Environment for the mirroring agent: the host's, with proxy settings
 * mirrored into both the upper- and lower-case spellings git understands.
 */
export const buildAgentEnv = (
	env: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv => {
	const proxies: NodeJS.ProcessEnv = {};
	for (const key of PROXY_KEYS) {
		const value = env[key] ?? env[key.toLowerCase()];
		if (value) {
			proxies[key] = value;
			proxies[key.toLowerCase()] = value;
		}
	}
	return {
		...env,
		...proxies,
		GIT_TERMINAL_PROMPT: "0",
		GIT_CONFIG_NOSYSTEM: "1",
		...(process.platform === "win32" ? {} : { GIT_ASKPASS: "/bin/false" }),
	};
};
