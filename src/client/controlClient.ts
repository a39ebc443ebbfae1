// ─── Control Client ──────────────────────────────────────────────────────────

import * as net from 'net';
import { ControlCommand, REPLY_RUNNING } from '../daemon/commands';
import { DEFAULT_CONTROL_PORT } from '../daemon/config';

export interface ControlClientOptions {
	host?: string;
	port?: number;
	timeout?: number;
}

export interface DaemonStatus {
	running: boolean;
	reply?: string;
}

/**
 * ControlClient - Sends one command line to the daemon's control port and
 * reads the one-line reply
 */
export class ControlClient {
	private readonly host: string;
	private readonly port: number;
	private readonly timeout: number;

	constructor(options: ControlClientOptions = {}) {
		this.host = options.host || '127.0.0.1';
		this.port = options.port ?? DEFAULT_CONTROL_PORT;
		this.timeout = options.timeout || 30000;
	}

	/**
	 * Send a command; resolves with the trimmed reply line
	 */
	send(command: ControlCommand | string): Promise<string> {
		return new Promise((resolve, reject) => {
			const socket = net.connect({ host: this.host, port: this.port });
			let buffer = '';
			let settled = false;

			const settle = (error: Error | null, reply?: string): void => {
				if (settled) {
					return;
				}
				settled = true;
				socket.destroy();
				if (error) {
					reject(error);
				} else {
					resolve(reply ?? '');
				}
			};

			socket.setTimeout(this.timeout);
			socket.on('connect', () => {
				socket.write(command + '\n');
			});
			socket.on('data', (data) => {
				buffer += data.toString('utf-8');
				const newline = buffer.indexOf('\n');
				if (newline !== -1) {
					settle(null, buffer.slice(0, newline).trim());
				}
			});
			socket.on('end', () => settle(null, buffer.trim()));
			socket.on('timeout', () => settle(new Error(`Request timeout: ${command}`)));
			socket.on('error', (error) => settle(error));
		});
	}

	/**
	 * Ask the daemon for its status. A refused connection means no daemon
	 * is listening and is not an error.
	 */
	async status(): Promise<DaemonStatus> {
		try {
			const reply = await this.send('STATUS');
			return { running: reply === REPLY_RUNNING, reply };
		} catch (error) {
			if (isConnectionRefused(error)) {
				return { running: false };
			}
			throw error;
		}
	}
}

export function isConnectionRefused(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ECONNREFUSED';
}
