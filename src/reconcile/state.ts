/**
 * Lifecycle of the deployment. Driven only by whether a source location is
 * configured.
 */
export const WorkloadState = {
	Uninitialized: "uninitialized",
	Idle: "idle",
	Configured: "configured",
} as const;

export type WorkloadState = (typeof WorkloadState)[keyof typeof WorkloadState];

export const WORKLOAD_STATES: readonly WorkloadState[] = Object.values(
	WorkloadState,
);

export type DesiredSignal = {
	configured: boolean;
};

export const transition = (
	current: WorkloadState,
	signal: DesiredSignal,
): WorkloadState => {
	if (signal.configured) {
		return WorkloadState.Configured;
	}
	return current === WorkloadState.Uninitialized
		? WorkloadState.Uninitialized
		: WorkloadState.Idle;
};

export const isWorkloadState = (value: unknown): value is WorkloadState =>
	typeof value === "string" &&
	WORKLOAD_STATES.some((state) => state === value);
