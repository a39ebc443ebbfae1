// ─── Supervisor (Watchdog Process) ───────────────────────────────────────────

import * as cp from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { readFileIfExists, removeIfExists } from '../core/files';
import { AgentConfig, loadConfig } from './config';
import { Logger } from './log';
import { EXIT_FATAL, EXIT_OK, EXIT_RESTART, isRestartMessage } from './worker';

/** The parts of a forked worker the supervisor relies on */
export interface WorkerProcess {
	readonly pid?: number;
	onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
	onMessage(listener: (message: unknown) => void): void;
	kill(signal: NodeJS.Signals): void;
}

export type WorkerLauncher = (args: string[]) => WorkerProcess;

export interface SupervisorOptions {
	configPath?: string;
	logger?: Logger;
	/** Replaces child_process.fork of the worker module */
	launch?: WorkerLauncher;
	/** Install SIGTERM/SIGINT handlers on start (default true) */
	handleSignals?: boolean;
	/** How long stop() waits before SIGKILL */
	stopTimeout?: number;
}

export type StartMode = 'supervising' | 'detached';

/**
 * Supervisor - Watchdog process that forks and monitors the worker
 *
 * Features:
 * - Forks the worker process and writes the PID file
 * - Worker exit 0 stops the supervisor, 70 stops it with a failure
 * - Worker exit 75 is a requested restart, replayed with the argv the
 *   worker reported over IPC
 * - Any other exit restarts under a circuit breaker (max restarts per window)
 * - Daemonization: detach from terminal unless EDGESYNC_FOREGROUND=1
 */
export class Supervisor {
	private readonly config: AgentConfig;
	private readonly configPath?: string;
	private readonly logger: Logger;
	private readonly launch: WorkerLauncher;
	private readonly pidFile: string;
	private child?: WorkerProcess;
	private childExited?: Promise<void>;
	private restartArgs?: string[];
	private restartHistory: number[] = [];
	private restartTimer?: NodeJS.Timeout;
	private stopping = false;
	private finish: (code: number) => void = () => undefined;
	private readonly finished = new Promise<number>((resolve) => {
		this.finish = resolve;
	});
	private readonly signalHandler = (): void => {
		this.stop().catch((error: unknown) => {
			this.logger.error('supervisor', 'error while stopping', { error: String(error) });
		});
	};

	constructor(private readonly options: SupervisorOptions = {}) {
		this.configPath = options.configPath;
		this.config = loadConfig(options.configPath);
		this.pidFile = this.config.daemon.pidFile;
		this.logger =
			options.logger ??
			new Logger({
				level: this.config.daemon.logLevel,
				logFile: this.config.daemon.logFile,
				foreground: process.env.EDGESYNC_FOREGROUND === '1',
			});
		this.launch = options.launch ?? forkWorkerModule;
	}

	/**
	 * Start the supervisor. Outside foreground mode this re-executes the
	 * current command detached from the terminal and returns 'detached'.
	 */
	async start(): Promise<StartMode> {
		if (this.isRunning()) {
			throw new Error('Daemon already running');
		}

		if (process.env.EDGESYNC_FOREGROUND !== '1') {
			this.daemonize();
			return 'detached';
		}

		this.forkWorker(this.initialArgs());
		this.writePidFile();
		if (this.options.handleSignals ?? true) {
			process.on('SIGTERM', this.signalHandler);
			process.on('SIGINT', this.signalHandler);
		}

		this.logger.info('supervisor', `Supervisor started (PID: ${process.pid})`);
		return 'supervising';
	}

	/**
	 * Resolves with the supervisor's exit code once it has stopped
	 */
	wait(): Promise<number> {
		return this.finished;
	}

	/**
	 * Stop the worker and the supervisor
	 */
	async stop(): Promise<void> {
		if (this.stopping) {
			return;
		}
		this.stopping = true;
		this.logger.info('supervisor', 'Stopping daemon');

		if (this.restartTimer) {
			clearTimeout(this.restartTimer);
			this.restartTimer = undefined;
		}

		const child = this.child;
		const exited = this.childExited;
		if (child && exited) {
			child.kill('SIGTERM');
			const timeout = this.options.stopTimeout ?? 10000;
			let timer: NodeJS.Timeout | undefined;
			const timedOut = new Promise<'timeout'>((resolve) => {
				timer = setTimeout(() => resolve('timeout'), timeout);
			});
			const result = await Promise.race([exited.then(() => 'exited' as const), timedOut]);
			clearTimeout(timer);
			if (result === 'timeout') {
				this.logger.warn('supervisor', 'Worker did not stop gracefully, sending SIGKILL');
				child.kill('SIGKILL');
			}
		}

		this.terminate(EXIT_OK);
	}

	/**
	 * Check if a daemon is running. A PID file naming a dead process is
	 * removed.
	 */
	isRunning(): boolean {
		const pid = this.getPid();
		if (pid === null) {
			return false;
		}

		try {
			process.kill(pid, 0);
			return true;
		} catch (error) {
			if (error instanceof Error && 'code' in error && error.code === 'EPERM') {
				return true;
			}
			this.logger.debug('supervisor', `Removing stale PID file (PID ${pid})`);
			removeIfExists(this.pidFile);
			return false;
		}
	}

	getPid(): number | null {
		const content = readFileIfExists(this.pidFile);
		if (content === null) {
			return null;
		}
		const pid = parseInt(content.trim(), 10);
		return Number.isInteger(pid) && pid > 0 ? pid : null;
	}

	// ─── Private Methods ─────────────────────────────────────────────────────

	private initialArgs(): string[] {
		return this.configPath ? ['--config', this.configPath] : [];
	}

	private forkWorker(args: string[]): void {
		this.logger.info('supervisor', 'Forking worker process', { args });
		this.restartArgs = undefined;

		const child = this.launch(args);
		this.child = child;
		this.childExited = new Promise((resolve) => {
			child.onExit((code, signal) => {
				resolve();
				this.onWorkerExit(code, signal, args);
			});
		});
		child.onMessage((message) => {
			if (isRestartMessage(message)) {
				this.restartArgs = message.argv.slice(2);
			}
		});
	}

	private onWorkerExit(code: number | null, signal: NodeJS.Signals | null, args: string[]): void {
		this.logger.info('supervisor', `Worker exited (code: ${code}, signal: ${signal})`);
		this.child = undefined;
		this.childExited = undefined;

		if (this.stopping) {
			return;
		}

		switch (code) {
			case EXIT_OK:
				this.terminate(EXIT_OK);
				return;

			case EXIT_FATAL:
				this.logger.error('supervisor', 'Worker hit a fatal error, not restarting');
				this.terminate(EXIT_FATAL);
				return;

			case EXIT_RESTART: {
				const nextArgs = this.restartArgs ?? args;
				this.logger.info('supervisor', 'Worker requested restart');
				this.scheduleFork(nextArgs, this.config.daemon.restartDelay);
				return;
			}
		}

		if (this.shouldRestart()) {
			this.restartHistory.push(Date.now());
			this.logger.warn('supervisor', `Restarting worker (restart ${this.restartHistory.length})`);
			this.scheduleFork(args, this.config.daemon.restartDelay);
		} else {
			const { backoffDelay } = this.config.daemon;
			this.logger.error('supervisor', `Circuit breaker triggered, backing off for ${backoffDelay}ms`);
			this.restartHistory = [];
			this.scheduleFork(args, backoffDelay);
		}
	}

	private scheduleFork(args: string[], delayMs: number): void {
		this.restartTimer = setTimeout(() => {
			this.restartTimer = undefined;
			if (!this.stopping) {
				this.forkWorker(args);
			}
		}, delayMs);
	}

	/**
	 * Check if we should restart (circuit breaker)
	 */
	private shouldRestart(): boolean {
		const now = Date.now();
		const { restartWindow, maxRestarts } = this.config.daemon;
		this.restartHistory = this.restartHistory.filter((timestamp) => now - timestamp < restartWindow);
		return this.restartHistory.length < maxRestarts;
	}

	private terminate(code: number): void {
		this.stopping = true;
		process.off('SIGTERM', this.signalHandler);
		process.off('SIGINT', this.signalHandler);
		this.removePidFile();
		this.logger.info('supervisor', 'Daemon stopped', { code });
		this.finish(code);
	}

	/**
	 * Daemonize: detach from terminal and re-exec in background
	 */
	private daemonize(): void {
		const child = cp.spawn(process.argv[0], process.argv.slice(1), {
			detached: true,
			stdio: 'ignore',
			env: {
				...process.env,
				EDGESYNC_FOREGROUND: '1',
			},
		});
		child.unref();
		this.logger.info('supervisor', `Daemon started in background (PID: ${child.pid})`);
	}

	private writePidFile(): void {
		fs.mkdirSync(path.dirname(this.pidFile), { recursive: true });
		fs.writeFileSync(this.pidFile, String(process.pid), 'utf-8');
	}

	private removePidFile(): void {
		const pid = this.getPid();
		if (pid === process.pid) {
			removeIfExists(this.pidFile);
		}
	}
}

/**
 * Fork the worker module next to this file. Works from both the compiled
 * output and the TypeScript sources.
 */
function forkWorkerModule(args: string[]): WorkerProcess {
	const workerPath = path.join(__dirname, 'worker' + path.extname(__filename));
	const child = cp.fork(workerPath, args, {
		detached: false,
		stdio: process.env.EDGESYNC_FOREGROUND === '1' ? 'inherit' : 'ignore',
		env: {
			...process.env,
			EDGESYNC_WORKER: '1',
		},
	});

	return {
		pid: child.pid,
		onExit: (listener) => {
			child.on('exit', listener);
		},
		onMessage: (listener) => {
			child.on('message', listener);
		},
		kill: (signal) => {
			child.kill(signal);
		},
	};
}
