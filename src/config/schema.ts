import * as z from "zod";

const SubpathSchema = z.string().min(1);

export const ChannelsSchema = z
	.object({
		metricRules: z.string().min(1).optional(),
		logRules: z.string().min(1).optional(),
		dashboards: z.string().min(1).optional(),
	})
	.strict();

export const ConfigSchema = z
	.object({
		$schema: z.string().min(1).optional(),
		gitRepo: z.string().optional(),
		gitBranch: z.string().optional(),
		gitRev: z.string().optional(),
		gitDepth: z.number().int().min(0).optional(),
		gitSshKey: z.string().optional(),
		metricRulesPath: SubpathSchema.optional(),
		logRulesPath: SubpathSchema.optional(),
		dashboardsPath: SubpathSchema.optional(),
		storageDir: z.string().min(1).optional(),
		channels: ChannelsSchema.optional(),
		syncPeriodSeconds: z.number().int().min(1).optional(),
		reconcileIntervalSeconds: z.number().int().min(1).optional(),
		syncTimeoutMs: z.number().int().min(1).optional(),
	})
	.strict();

export type RelayChannels = z.infer<typeof ChannelsSchema>;
export type RelayConfigInput = z.infer<typeof ConfigSchema>;

export type RelayConfig = {
	gitRepo: string;
	gitBranch: string;
	gitRev: string;
	gitDepth: number;
	gitSshKey?: string;
	metricRulesPath: string;
	logRulesPath: string;
	dashboardsPath: string;
	storageDir: string;
	channels: RelayChannels;
	syncPeriodSeconds: number;
	reconcileIntervalSeconds: number;
	syncTimeoutMs: number;
};
