// ─── Worker Entry Point ──────────────────────────────────────────────────────

import * as cp from 'child_process';
import * as fs from 'fs';
import { z } from 'zod';
import { AgentContext, createContext } from '../core/context';
import { ClientError, describeError } from '../core/errors';
import { removeIfExists } from '../core/files';
import { SamplerManager } from '../collaborators/fileSampler';
import { DirectoryFirmwareInstaller } from '../collaborators/firmwareInstaller';
import { DirectorySettingsStore } from '../collaborators/settingsStore';
import { IntervalTaskScheduler } from '../collaborators/taskScheduler';
import { RemoteClient } from '../rpc/client';
import { RpcTransport } from '../rpc/types';
import { AuthCredential } from '../sync/credential';
import { FirmwareVersionFile } from '../sync/firmwareVersion';
import { TimelineManager } from '../timeline/manager';
import { AgentConfig, ensureDirectories, loadConfig } from './config';
import { Logger } from './log';
import { Reconciler } from './reconciler';
import { ControlDaemon, DaemonExit } from './server';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_FATAL = 70;
export const EXIT_RESTART = 75;

/** IPC message a supervised worker sends before exiting with EXIT_RESTART */
export interface RestartMessage {
	type: 'restart';
	argv: string[];
}

const RestartMessageSchema = z.object({
	type: z.literal('restart'),
	argv: z.array(z.string()),
});

export function isRestartMessage(message: unknown): message is RestartMessage {
	return RestartMessageSchema.safeParse(message).success;
}

export interface Agent {
	ctx: AgentContext;
	daemon: ControlDaemon;
	reconciler: Reconciler;
	timelines: TimelineManager;
	samplers: SamplerManager;
	scheduler: IntervalTaskScheduler;
}

export interface CreateAgentOptions {
	argv?: string[];
	/** Replaces the HTTP transport; used by tests */
	transport?: RpcTransport;
}

/**
 * Wire every component of the agent from its context. Throws ClientError
 * when local state needed to start is unreadable.
 */
export function createAgent(ctx: AgentContext, options: CreateAgentOptions = {}): Agent {
	const { config, logger } = ctx;
	const versionFile = new FirmwareVersionFile(config.paths.firmwareVersionFile);
	const timelines = TimelineManager.fromContext(ctx);
	const samplers = SamplerManager.fromContext(ctx);
	const scheduler = new IntervalTaskScheduler(logger);

	let daemon: ControlDaemon | undefined;
	const reconciler = new Reconciler(ctx, {
		remote: new RemoteClient({
			url: config.server.url,
			timeout: config.server.timeout,
			transport: options.transport,
		}),
		credential: new AuthCredential(config.device.auth),
		samplers,
		settings: new DirectorySettingsStore(config.paths.settings, logger),
		timelines,
		scheduler,
		firmwareInstaller: new DirectoryFirmwareInstaller(config.paths.firmware, versionFile, logger),
		firmwareVersion: versionFile.read(),
		onRestartRequested: (reason) => daemon?.requestRestart(reason),
	});

	daemon = new ControlDaemon(ctx, { reconciler, scheduler, argv: options.argv });
	return { ctx, daemon, reconciler, timelines, samplers, scheduler };
}

export function createLogger(config: AgentConfig, foreground: boolean): Logger {
	return new Logger({
		level: config.daemon.logLevel,
		logFile: config.daemon.logFile,
		foreground,
	});
}

export interface RunWorkerOptions {
	configPath?: string;
	/** Command to replay on restart; defaults to this process's argv */
	argv?: string[];
	foreground?: boolean;
}

/**
 * Run the daemon in this process until it stops. Resolves with the process
 * exit code; never calls process.exit itself.
 */
export async function runWorker(options: RunWorkerOptions = {}): Promise<number> {
	let config: AgentConfig;
	try {
		config = loadConfig(options.configPath);
		ensureDirectories(config);
	} catch (error) {
		console.error(`[Worker] ${describeError(error)}`);
		return EXIT_FATAL;
	}

	const logger = createLogger(config, options.foreground ?? process.env.EDGESYNC_FOREGROUND === '1');
	const ctx = createContext(config, logger);
	const supervised = typeof process.send === 'function';

	let agent: Agent;
	try {
		agent = createAgent(ctx, { argv: options.argv });
	} catch (error) {
		logger.error('worker', 'unable to start agent', { error: describeError(error) });
		return error instanceof ClientError ? EXIT_FATAL : EXIT_FAILURE;
	}

	const onSignal = (signal: NodeJS.Signals): void => agent.daemon.requestStop(signal);
	process.on('SIGTERM', onSignal);
	process.on('SIGINT', onSignal);

	if (!supervised) {
		fs.writeFileSync(config.daemon.pidFile, String(process.pid), 'utf-8');
	}

	let exit: DaemonExit;
	try {
		exit = await agent.daemon.start();
	} finally {
		process.off('SIGTERM', onSignal);
		process.off('SIGINT', onSignal);
		if (!supervised) {
			removeIfExists(config.daemon.pidFile);
		}
	}

	return handleExit(exit, ctx, supervised);
}

async function handleExit(exit: DaemonExit, ctx: AgentContext, supervised: boolean): Promise<number> {
	const { logger, config } = ctx;
	switch (exit.kind) {
		case 'stopped':
			logger.info('worker', 'stopped');
			return EXIT_OK;

		case 'fatal':
			logger.error('worker', 'terminated by fatal error', { error: describeError(exit.error) });
			return EXIT_FATAL;

		case 'restart':
			if (supervised) {
				const message: RestartMessage = { type: 'restart', argv: exit.argv };
				await new Promise<void>((resolve) => {
					if (!process.send) {
						resolve();
						return;
					}
					process.send(message, undefined, undefined, () => resolve());
				});
				logger.info('worker', 'exiting for restart', { reason: exit.reason });
				return EXIT_RESTART;
			}
			await delay(config.daemon.restartDelay);
			respawn(exit.argv, logger);
			return EXIT_OK;
	}
}

/**
 * Start a detached copy of the given command line
 */
function respawn(argv: string[], logger: Logger): void {
	const [executable, ...args] = argv;
	if (!executable) {
		logger.error('worker', 'cannot restart: no command line recorded');
		return;
	}
	logger.info('worker', 'restarting', { command: argv.join(' ') });
	const child = cp.spawn(executable, args, {
		detached: true,
		stdio: 'ignore',
		env: process.env,
	});
	child.unref();
}

function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

function configPathFromArgv(argv: string[]): string | undefined {
	const index = argv.indexOf('--config');
	return index !== -1 ? argv[index + 1] : undefined;
}

// Only run if this is the worker process
if (process.env.EDGESYNC_WORKER === '1' && require.main === module) {
	runWorker({ configPath: configPathFromArgv(process.argv) }).then(
		(code) => process.exit(code),
		(error: unknown) => {
			console.error('[Worker] Failed to start:', error);
			process.exit(EXIT_FAILURE);
		},
	);
}
