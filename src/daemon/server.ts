// ─── Control Daemon ──────────────────────────────────────────────────────────

import { AgentContext } from '../core/context';
import { ClientError, DaemonNotRunning, describeError } from '../core/errors';
import { Mutex } from '../core/mutex';
import { TaskScheduler } from '../collaborators/types';
import { CommandTarget, dispatchCommand } from './commands';
import { ControlServer } from './controlServer';
import { Logger } from './log';
import { SyncReport } from './reconciler';
import { DaemonState, isActive } from './state';

export { DaemonState } from './state';

/** How the daemon ended; the process entry point acts on it */
export type DaemonExit =
	| { kind: 'stopped' }
	| { kind: 'restart'; argv: string[]; reason: string }
	| { kind: 'fatal'; error: Error };

export interface SyncRunner {
	reconcile(): Promise<SyncReport>;
}

export interface ControlDaemonOptions {
	reconciler: SyncRunner;
	scheduler: TaskScheduler;
	/** Command that started this process, replayed on restart */
	argv?: string[];
}

/**
 * ControlDaemon - Owns the agent's lifecycle
 *
 * Lifecycle:
 * 1. STARTING: start task scheduler and the local control listener
 * 2. RUNNING: poll loop runs a sync cycle every `daemon.poll` seconds
 * 3. STOPPING / RESTARTING: requested by a command, a firmware install or a
 *    fatal client error; the listener stops accepting at once and the loop
 *    exits after the cycle in progress
 * 4. TERMINATED: listener and scheduler stopped, exit reported to caller
 */
export class ControlDaemon implements CommandTarget {
	private readonly logger: Logger;
	private readonly controlServer: ControlServer;
	private readonly argv: string[];
	private readonly cycles = new Mutex();
	private state = DaemonState.STARTING;
	private started = false;
	private lastSyncAt: number | null = null;
	private restartReason = '';
	private fatalError?: Error;
	private wake?: () => void;

	constructor(
		private readonly ctx: AgentContext,
		private readonly options: ControlDaemonOptions,
	) {
		this.logger = ctx.logger;
		this.argv = [...(options.argv ?? process.argv)];
		this.controlServer = new ControlServer(
			(line) => dispatchCommand(this, line, this.logger),
			{ host: ctx.config.daemon.host, port: ctx.config.daemon.port },
			this.logger,
		);
	}

	get currentState(): DaemonState {
		return this.state;
	}

	/** Port the control listener is bound to, once running */
	get controlPort(): number | undefined {
		return this.controlServer.port;
	}

	/**
	 * Run the daemon until it leaves RUNNING. Resolves once everything is
	 * shut down.
	 */
	async start(): Promise<DaemonExit> {
		if (this.started) {
			throw new Error('Daemon already started');
		}
		this.started = true;

		this.logger.info('daemon', 'starting', { config: this.ctx.config.source });

		try {
			await this.options.scheduler.start();
			await this.controlServer.start();
		} catch (error) {
			this.logger.error('daemon', 'unable to start daemon', { error: String(error) });
			this.fatalError = error instanceof Error ? error : new Error(String(error));
			this.state = DaemonState.STOPPING;
		}

		if (this.state === DaemonState.STARTING) {
			this.state = DaemonState.RUNNING;
			this.logger.info('daemon', 'ready');
			await this.pollLoop();
		}

		await this.shutdown();
		return this.exitResult();
	}

	requestStop(reason: string): void {
		this.transition(DaemonState.STOPPING, reason);
	}

	requestRestart(reason: string): void {
		if (this.transition(DaemonState.RESTARTING, reason)) {
			this.restartReason = reason;
		}
	}

	/**
	 * Run a sync cycle now, outside the poll schedule. Errors are logged and
	 * rethrown to the caller. A request still waiting for the cycle in
	 * progress is dropped if the daemon leaves RUNNING meanwhile.
	 */
	syncNow(): Promise<SyncReport> {
		return this.cycles.runExclusive(() => this.runSync());
	}

	/**
	 * Run a sync if one is due. ClientError escapes; anything else is logged.
	 */
	async poll(now: number): Promise<void> {
		const intervalMs = this.ctx.config.daemon.poll * 1000;
		if (this.lastSyncAt !== null && now - this.lastSyncAt < intervalMs) {
			return;
		}

		this.lastSyncAt = now;
		try {
			await this.syncNow();
		} catch (error) {
			if (error instanceof ClientError) {
				throw error;
			}
		}
	}

	// ─── Private ─────────────────────────────────────────────────────────────

	private async runSync(): Promise<SyncReport> {
		if (!isActive(this.state)) {
			throw new DaemonNotRunning(this.state);
		}
		try {
			const report = await this.options.reconciler.reconcile();
			this.logger.info('daemon', `sync ${report.outcome}`, {
				syncId: report.syncId,
				durationMs: report.durationMs,
			});
			return report;
		} catch (error) {
			this.logger.error('daemon', 'sync failed', { error: describeError(error) });
			throw error;
		}
	}

	private async pollLoop(): Promise<void> {
		while (this.state === DaemonState.RUNNING) {
			try {
				await this.poll(Date.now());
			} catch (error) {
				this.logger.error('daemon', 'fatal client error, terminating', {
					error: describeError(error),
				});
				this.fatalError = error instanceof Error ? error : new Error(String(error));
				this.state = DaemonState.STOPPING;
				this.controlServer.close();
				break;
			}

			if (this.state !== DaemonState.RUNNING) {
				break;
			}
			await this.sleep(this.ctx.config.daemon.pollQuantum);
		}
	}

	private async shutdown(): Promise<void> {
		this.logger.debug('daemon', 'closing');
		try {
			await this.controlServer.stop();
		} catch (error) {
			this.logger.error('daemon', 'error stopping control listener', { error: String(error) });
		}
		try {
			await this.options.scheduler.stop();
		} catch (error) {
			this.logger.error('daemon', 'error stopping tasks', { error: String(error) });
		}
		const previous = this.state;
		this.state = DaemonState.TERMINATED;
		this.logger.debug('daemon', 'goodbye', { from: previous });
	}

	private exitResult(): DaemonExit {
		if (this.fatalError) {
			return { kind: 'fatal', error: this.fatalError };
		}
		if (this.restartReason) {
			return { kind: 'restart', argv: [...this.argv], reason: this.restartReason };
		}
		return { kind: 'stopped' };
	}

	private transition(target: DaemonState.STOPPING | DaemonState.RESTARTING, reason: string): boolean {
		if (!isActive(this.state)) {
			this.logger.debug('daemon', `ignoring ${target} request while ${this.state}`, { reason });
			return false;
		}
		this.logger.info('daemon', `${target === DaemonState.RESTARTING ? 'restarting' : 'stopping'}...`, {
			reason,
		});
		this.state = target;
		this.controlServer.close();
		this.wake?.();
		return true;
	}

	private sleep(ms: number): Promise<void> {
		return new Promise((resolve) => {
			const done = (): void => {
				clearTimeout(timer);
				this.wake = undefined;
				resolve();
			};
			const timer = setTimeout(done, ms);
			this.wake = done;
		});
	}
}
