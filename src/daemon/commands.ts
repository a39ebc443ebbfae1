// ─── Control Commands ────────────────────────────────────────────────────────

import { BadLocalCommand, DaemonNotRunning, describeError } from '../core/errors';
import { Logger } from './log';
import { DaemonState, isActive } from './state';

export const CONTROL_COMMANDS = ['RESTART', 'STOP', 'SYNC', 'STATUS'] as const;
export type ControlCommand = (typeof CONTROL_COMMANDS)[number];

export const REPLY_OK = 'OK';
export const REPLY_BAD_COMMAND = 'BADCOMMAND';
export const REPLY_RUNNING = 'running';

/**
 * What a command can act on. The daemon implements this; anything else that
 * triggers lifecycle operations goes through the same vocabulary.
 */
export interface CommandTarget {
	readonly currentState: DaemonState;
	requestRestart(reason: string): void;
	requestStop(reason: string): void;
	syncNow(): Promise<unknown>;
}

export function parseCommand(line: string): ControlCommand {
	const command = line.trim();
	const known = CONTROL_COMMANDS.find((c) => c === command);
	if (!known) {
		throw new BadLocalCommand(command);
	}
	return known;
}

/**
 * Run one command line against the target and return the single-line reply.
 * STATUS reports the lifecycle state; the other commands are refused once
 * the target has left RUNNING. Never throws.
 */
export async function dispatchCommand(
	target: CommandTarget,
	line: string,
	logger: Logger,
): Promise<string> {
	let command: ControlCommand;
	try {
		command = parseCommand(line);
	} catch (error) {
		logger.warn('control', describeError(error));
		return REPLY_BAD_COMMAND;
	}

	const state = target.currentState;
	if (command === 'STATUS') {
		logger.debug('control', 'status requested');
		return state === DaemonState.RUNNING ? REPLY_RUNNING : state;
	}
	if (!isActive(state)) {
		logger.info('control', `refusing ${command} while ${state}`);
		return describeError(new DaemonNotRunning(state));
	}

	switch (command) {
		case 'RESTART':
			logger.info('control', 'restart requested');
			target.requestRestart('restart command');
			return REPLY_OK;

		case 'STOP':
			logger.info('control', 'stop requested');
			target.requestStop('stop command');
			return REPLY_OK;

		case 'SYNC':
			logger.info('control', 'sync requested');
			try {
				await target.syncNow();
				return REPLY_OK;
			} catch (error) {
				return describeError(error);
			}
	}
}
