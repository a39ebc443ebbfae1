// ─── Local Control Listener ──────────────────────────────────────────────────

import * as net from 'net';
import { describeError } from '../core/errors';
import { Logger } from './log';

export const MAX_COMMAND_BYTES = 128;

export interface ControlServerOptions {
	host: string;
	port: number;
	/** How long a client may take to send its command line */
	readTimeout?: number;
}

export type CommandHandler = (line: string) => Promise<string>;

/**
 * ControlServer - One-line command protocol on a loopback TCP port
 *
 * Each connection carries one request line (at most 128 bytes) and gets one
 * reply line before it is closed. Connections are served one at a time in
 * arrival order.
 */
export class ControlServer {
	private server?: net.Server;
	private closed?: Promise<void>;
	private queue: Promise<void> = Promise.resolve();
	private readonly sockets = new Set<net.Socket>();
	private boundPort?: number;

	constructor(
		private readonly handler: CommandHandler,
		private readonly options: ControlServerOptions,
		private readonly logger: Logger,
	) {}

	get port(): number | undefined {
		return this.boundPort;
	}

	/**
	 * Start listening. Resolves with the bound port.
	 */
	start(): Promise<number> {
		if (this.server) {
			return Promise.reject(new Error('Control server already started'));
		}

		// half-open so a client may end its side before reading the reply
		const server = net.createServer({ allowHalfOpen: true }, (socket) => {
			socket.pause();
			this.sockets.add(socket);
			socket.on('close', () => this.sockets.delete(socket));
			socket.on('error', (error) => {
				this.logger.debug('control', 'Client socket error', { error: String(error) });
			});
			this.queue = this.queue.then(() => this.serve(socket));
		});
		this.server = server;

		return new Promise((resolve, reject) => {
			const onError = (error: Error): void => {
				this.server = undefined;
				reject(error);
			};
			server.once('error', onError);
			server.listen(this.options.port, this.options.host, () => {
				server.off('error', onError);
				server.on('error', (error) => {
					this.logger.error('control', 'Control server error', { error: String(error) });
				});
				const address = server.address();
				this.boundPort = typeof address === 'object' && address ? address.port : this.options.port;
				this.logger.debug('control', `Listening on ${this.options.host}:${this.boundPort}`);
				resolve(this.boundPort);
			});
		});
	}

	/**
	 * Stop accepting new connections. Connections already accepted are still
	 * answered; stop() waits for them.
	 */
	close(): void {
		const server = this.server;
		if (!server || this.closed) {
			return;
		}
		this.closed = new Promise<void>((resolve) => {
			server.close(() => resolve());
		});
		this.logger.debug('control', 'No longer accepting commands');
	}

	/**
	 * Close the listener, answer queued connections, then drop any client
	 * still holding its side of a connection open.
	 */
	async stop(): Promise<void> {
		const server = this.server;
		if (!server) {
			return;
		}
		this.close();
		await this.queue;
		for (const socket of this.sockets) {
			socket.destroy();
		}
		await this.closed;

		this.server = undefined;
		this.closed = undefined;
		this.logger.debug('control', 'Stopped listening');
	}

	private async serve(socket: net.Socket): Promise<void> {
		try {
			const line = await this.readCommand(socket);
			if (line === null || line === '') {
				socket.end();
				return;
			}

			this.logger.debug('control', `Invoke command (${line})`);
			let reply: string;
			try {
				reply = await this.handler(line);
			} catch (error) {
				reply = describeError(error);
			}
			this.logger.debug('control', `Got response (${reply})`);

			socket.end(reply.replace(/\n+$/, '') + '\n');
		} catch (error) {
			this.logger.error('control', 'Command connection failed', { error: String(error) });
			socket.destroy();
		}
	}

	private readCommand(socket: net.Socket): Promise<string | null> {
		const timeout = this.options.readTimeout ?? 5000;

		return new Promise((resolve) => {
			let buffer = Buffer.alloc(0);
			let settled = false;

			const finish = (value: string | null): void => {
				if (settled) {
					return;
				}
				settled = true;
				socket.setTimeout(0);
				socket.off('data', onData);
				socket.off('end', onEnd);
				socket.off('error', onError);
				socket.off('timeout', onTimeout);
				resolve(value === null ? null : value.trim());
			};

			const onData = (chunk: Buffer): void => {
				buffer = Buffer.concat([buffer, chunk]);
				const newline = buffer.indexOf(0x0a);
				if (newline !== -1) {
					finish(buffer.subarray(0, Math.min(newline, MAX_COMMAND_BYTES)).toString('utf-8'));
				} else if (buffer.length >= MAX_COMMAND_BYTES) {
					finish(buffer.subarray(0, MAX_COMMAND_BYTES).toString('utf-8'));
				}
			};
			const onEnd = (): void => {
				finish(buffer.length > 0 ? buffer.subarray(0, MAX_COMMAND_BYTES).toString('utf-8') : null);
			};
			const onError = (): void => finish(null);
			const onTimeout = (): void => {
				this.logger.debug('control', 'Client did not send a command in time');
				finish(null);
			};

			socket.on('data', onData);
			socket.on('end', onEnd);
			socket.on('error', onError);
			socket.on('timeout', onTimeout);
			socket.setTimeout(timeout);
			socket.resume();
		});
	}
}
