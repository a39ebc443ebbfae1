// ─── Daemon Lifecycle State ──────────────────────────────────────────────────

export enum DaemonState {
	STARTING = 'starting',
	RUNNING = 'running',
	STOPPING = 'stopping',
	RESTARTING = 'restarting',
	TERMINATED = 'terminated',
}

/**
 * Whether the daemon still takes lifecycle and sync commands. Once a stop or
 * restart is requested nothing new is started.
 */
export function isActive(state: DaemonState): boolean {
	return state === DaemonState.STARTING || state === DaemonState.RUNNING;
}
