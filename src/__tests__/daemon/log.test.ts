// ─── Logger Tests ────────────────────────────────────────────────────────────

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { Logger } from '../../daemon/log';
import { makeTempDir, removeTempDir } from '../helpers/agent';

describe('Logger', () => {
	let tempDir: string;
	let logFile: string;

	beforeEach(() => {
		tempDir = makeTempDir('log');
		logFile = path.join(tempDir, 'logs', 'agent.log');
	});

	afterEach(() => {
		vi.restoreAllMocks();
		removeTempDir(tempDir);
	});

	it('should write one JSON object per line', () => {
		const logger = new Logger({ logFile });
		logger.info('sync', 'sync complete', { syncId: 'abc' });

		const lines = fs.readFileSync(logFile, 'utf-8').trim().split('\n');
		expect(lines).toHaveLength(1);
		const entry = JSON.parse(lines[0]);
		expect(entry).toEqual({
			ts: expect.any(String),
			level: 'info',
			component: 'sync',
			msg: 'sync complete',
			data: { syncId: 'abc' },
		});
	});

	it('should drop entries below the configured level', () => {
		const lines: string[] = [];
		const logger = new Logger({ level: 'warn', sink: (line) => lines.push(line) });

		logger.debug('x', 'hidden');
		logger.info('x', 'hidden');
		logger.warn('x', 'shown');
		logger.error('x', 'shown');

		expect(lines.map((l) => JSON.parse(l).level)).toEqual(['warn', 'error']);
	});

	it('should change level at runtime', () => {
		const lines: string[] = [];
		const logger = new Logger({ level: 'error', sink: (line) => lines.push(line) });

		logger.setLevel('debug');
		logger.debug('x', 'now visible');

		expect(logger.getLevel()).toBe('debug');
		expect(JSON.parse(lines[lines.length - 1]).msg).toBe('now visible');
	});

	it('should rotate the file once it reaches the size limit', () => {
		const logger = new Logger({ logFile, maxFileSizeBytes: 200, maxBackups: 2 });

		for (let i = 0; i < 20; i++) {
			logger.info('rotation', `entry number ${i} with some padding`);
		}

		expect(fs.existsSync(logFile)).toBe(true);
		expect(fs.existsSync(`${logFile}.1`)).toBe(true);
		expect(fs.existsSync(`${logFile}.2`)).toBe(true);
		expect(fs.existsSync(`${logFile}.3`)).toBe(false);
		expect(fs.statSync(logFile).size).toBeLessThan(400);
	});

	it('should echo to stdout in foreground mode and send warnings to stderr', () => {
		const stdout = vi.spyOn(console, 'log').mockImplementation(() => undefined);
		const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
		const logger = new Logger({ foreground: true });

		logger.info('daemon', 'started');
		logger.warn('daemon', 'slow sync');

		expect(stdout).toHaveBeenCalledTimes(1);
		expect(JSON.parse(String(stdout.mock.calls[0][0])).msg).toBe('started');
		expect(stderr).toHaveBeenCalledTimes(1);
		expect(JSON.parse(String(stderr.mock.calls[0][0])).msg).toBe('slow sync');
	});

	it('should keep the newest lines in the live file after rotating', () => {
		const logger = new Logger({ logFile, maxFileSizeBytes: 200, maxBackups: 2 });

		for (let i = 0; i < 20; i++) {
			logger.info('rotation', `entry number ${i} with some padding`);
		}

		const live = fs.readFileSync(logFile, 'utf-8').trim().split('\n');
		expect(JSON.parse(live[live.length - 1]).msg).toBe('entry number 19 with some padding');
	});
});
