// ─── Agent Log ───────────────────────────────────────────────────────────────

import * as fs from 'fs';
import * as path from 'path';
import { isNotFound, removeIfExists } from '../core/files';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Ascending severity */
const LOG_LEVEL_NAMES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
	ts: string;
	level: LogLevel;
	component: string;
	msg: string;
	data?: unknown;
}

export type LogSink = (line: string, level: LogLevel) => void;

export interface LoggerOptions {
	level?: LogLevel;
	/** Agent log file; rotated as `<file>.1` … `<file>.<maxBackups>` */
	logFile?: string;
	/** Echo to the terminal (`daemon run`, `daemon start --foreground`) */
	foreground?: boolean;
	maxFileSizeBytes?: number;
	maxBackups?: number;
	/** Receives every line instead of the terminal */
	sink?: LogSink;
}

const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;
const DEFAULT_MAX_BACKUPS = 5;

function severity(level: LogLevel): number {
	return LOG_LEVEL_NAMES.indexOf(level);
}

/**
 * Logger - One JSON object per line for the agent's components
 *
 * Every component logs under its own name (`sync`, `daemon`, `control`, ...).
 * Lines go to the log file when one is configured and to the terminal only
 * in foreground mode, warnings and errors on stderr. Components receive it
 * through the agent context.
 */
export class Logger {
	private level: LogLevel;
	private readonly logFile?: string;
	private readonly terminal?: LogSink;
	private readonly maxFileSizeBytes: number;
	private readonly maxBackups: number;

	constructor(options: LoggerOptions = {}) {
		this.level = options.level ?? 'info';
		this.logFile = options.logFile;
		this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
		this.maxBackups = options.maxBackups ?? DEFAULT_MAX_BACKUPS;
		this.terminal = options.sink ?? (options.foreground ? writeToTerminal : undefined);

		if (this.logFile) {
			fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
		}
	}

	log(level: LogLevel, component: string, msg: string, data?: unknown): void {
		if (severity(level) < severity(this.level)) {
			return;
		}

		const entry: LogEntry = { ts: new Date().toISOString(), level, component, msg };
		if (data !== undefined) {
			entry.data = data;
		}
		const line = JSON.stringify(entry);

		this.terminal?.(line, level);
		if (this.logFile) {
			this.append(this.logFile, line);
		}
	}

	debug(component: string, msg: string, data?: unknown): void {
		this.log('debug', component, msg, data);
	}

	info(component: string, msg: string, data?: unknown): void {
		this.log('info', component, msg, data);
	}

	warn(component: string, msg: string, data?: unknown): void {
		this.log('warn', component, msg, data);
	}

	error(component: string, msg: string, data?: unknown): void {
		this.log('error', component, msg, data);
	}

	setLevel(level: LogLevel): void {
		this.level = level;
		this.info('logger', `Log level changed to ${level}`);
	}

	getLevel(): LogLevel {
		return this.level;
	}

	// ─── File output ─────────────────────────────────────────────────────────

	private append(logFile: string, line: string): void {
		try {
			if (this.currentSize(logFile) >= this.maxFileSizeBytes) {
				this.rotate(logFile);
			}
			fs.appendFileSync(logFile, line + '\n', 'utf-8');
		} catch (error) {
			// the line still reaches stderr when the log file is unwritable
			console.error(`Unable to write ${logFile}: ${String(error)}`);
			console.error(line);
		}
	}

	private currentSize(logFile: string): number {
		try {
			return fs.statSync(logFile).size;
		} catch (error) {
			if (isNotFound(error)) {
				return 0;
			}
			throw error;
		}
	}

	/**
	 * Shift `<file>.N-1` to `<file>.N` down to the live file, dropping the
	 * oldest backup.
	 */
	private rotate(logFile: string): void {
		const backup = (n: number): string => (n === 0 ? logFile : `${logFile}.${n}`);

		removeIfExists(backup(this.maxBackups));
		for (let n = this.maxBackups - 1; n >= 0; n--) {
			if (fs.existsSync(backup(n))) {
				fs.renameSync(backup(n), backup(n + 1));
			}
		}
	}
}

function writeToTerminal(line: string, level: LogLevel): void {
	if (severity(level) >= severity('warn')) {
		console.error(line);
	} else {
		console.log(line);
	}
}
