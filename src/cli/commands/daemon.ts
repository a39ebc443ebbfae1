import { Command } from 'commander';
import { isConnectionRefused } from '../../client/controlClient';
import { describeError } from '../../core/errors';
import { ControlCommand, REPLY_OK } from '../../daemon/commands';
import { Supervisor } from '../../daemon/supervisor';
import { runWorker } from '../../daemon/worker';
import { controlClientFor, loadCliConfig } from '../util/context';
import { EXIT_FAILURE, EXIT_NOT_RUNNING, error, output } from '../util/output';

interface GlobalOptions {
	config?: string;
}

export function registerDaemonCommands(program: Command): void {
	const daemon = program
		.command('daemon')
		.description('Manage the edgesync daemon');

	daemon
		.command('start')
		.description('Start daemon under a supervisor (detached)')
		.option('--foreground', 'Run in foreground (do not detach)')
		.action(async (options: { foreground?: boolean }, command: Command) => {
			const { config: configPath } = command.optsWithGlobals<GlobalOptions>();
			const config = loadCliConfig(configPath);

			if ((await controlClientFor(config).status()).running) {
				output('Daemon is already running');
				return;
			}
			if (options.foreground) {
				process.env.EDGESYNC_FOREGROUND = '1';
			}

			try {
				const supervisor = new Supervisor({ configPath });
				const mode = await supervisor.start();
				if (mode === 'detached') {
					output('Daemon started in background');
					return;
				}
				process.exit(await supervisor.wait());
			} catch (err) {
				error(`Failed to start daemon: ${describeError(err)}`);
			}
		});

	daemon
		.command('run')
		.description('Run daemon in foreground without a supervisor')
		.action(async (_options: unknown, command: Command) => {
			const { config: configPath } = command.optsWithGlobals<GlobalOptions>();
			process.exit(await runWorker({ configPath, foreground: true }));
		});

	const sendCommand = (name: string, control: ControlCommand, description: string): void => {
		daemon
			.command(name)
			.description(description)
			.action(async (_options: unknown, command: Command) => {
				const { config: configPath } = command.optsWithGlobals<GlobalOptions>();
				const config = loadCliConfig(configPath);
				// a sync waits for a whole round trip to the server
				const client = controlClientFor(config, config.server.timeout + 5000);

				let reply: string;
				try {
					reply = await client.send(control);
				} catch (err) {
					if (isConnectionRefused(err)) {
						error('Daemon not running', EXIT_NOT_RUNNING);
					}
					error(describeError(err));
				}

				if (reply !== REPLY_OK) {
					error(reply, EXIT_FAILURE);
				}
				output(reply);
			});
	};

	sendCommand('stop', 'STOP', 'Stop daemon gracefully');
	sendCommand('restart', 'RESTART', 'Restart daemon');
	sendCommand('sync', 'SYNC', 'Run a sync cycle now');

	daemon
		.command('status')
		.description('Show daemon status')
		.option('--json', 'Output JSON')
		.action(async (options: { json?: boolean }, command: Command) => {
			const { config: configPath } = command.optsWithGlobals<GlobalOptions>();
			const config = loadCliConfig(configPath);

			let running: boolean;
			try {
				running = (await controlClientFor(config).status()).running;
			} catch (err) {
				error(describeError(err));
			}

			if (options.json) {
				output({ running, host: config.daemon.host, port: config.daemon.port }, { json: true });
			} else {
				output(running ? 'running' : 'not running');
			}
			if (!running) {
				process.exit(EXIT_NOT_RUNNING);
			}
		});
}
