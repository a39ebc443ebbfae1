// ─── File-backed Collaborator Tests ──────────────────────────────────────────

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { ClientError } from '../../core/errors';
import { FileSampler } from '../../collaborators/fileSampler';
import { DirectoryFirmwareInstaller } from '../../collaborators/firmwareInstaller';
import { DirectorySettingsStore } from '../../collaborators/settingsStore';
import { IntervalTaskScheduler } from '../../collaborators/taskScheduler';
import { AuthCredential } from '../../sync/credential';
import { FirmwareVersionFile } from '../../sync/firmwareVersion';
import { makeTempDir, memoryLogger, removeTempDir } from '../helpers/agent';

describe('file-backed collaborators', () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = makeTempDir('collab');
	});

	afterEach(() => {
		removeTempDir(tempDir);
	});

	describe('FileSampler', () => {
		it('should return the same snapshot until it is removed', () => {
			const sampler = new FileSampler('temp', tempDir, memoryLogger().logger);
			sampler.sample(20, 1000);

			expect(sampler.snapshotSamples()).toEqual([[1000, 20]]);
			sampler.sample(21, 2000);
			expect(sampler.snapshotSamples()).toEqual([[1000, 20]]);

			sampler.removeSnapshot();
			expect(sampler.snapshotSamples()).toEqual([[2000, 21]]);
		});

		it('should return nothing when no samples were taken', () => {
			const sampler = new FileSampler('idle', tempDir, memoryLogger().logger);
			expect(sampler.snapshotSamples()).toEqual([]);
		});

		it('should drop malformed lines with a warning', () => {
			const { logger, entries } = memoryLogger();
			fs.writeFileSync(path.join(tempDir, 'temp.samples'), '[1,2]\ngarbage\n[3,"x"]\n[4,5]\n', 'utf-8');
			const sampler = new FileSampler('temp', tempDir, logger);

			expect(sampler.snapshotSamples()).toEqual([
				[1, 2],
				[4, 5],
			]);
			expect(entries.filter((e) => e.level === 'warn')).toHaveLength(2);
		});

		it('should reject non-numeric values', () => {
			const sampler = new FileSampler('temp', tempDir, memoryLogger().logger);
			expect(() => sampler.sample(Number.NaN)).toThrow('Sample value must be a finite number, got NaN');
		});
	});

	describe('DirectorySettingsStore', () => {
		it('should map setting names to file contents', () => {
			fs.writeFileSync(path.join(tempDir, 'wifi.conf'), 'ssid=test', 'utf-8');
			fs.writeFileSync(path.join(tempDir, 'ntp.conf'), 'server=pool', 'utf-8');
			fs.writeFileSync(path.join(tempDir, 'README'), 'ignored', 'utf-8');
			const store = new DirectorySettingsStore(tempDir, memoryLogger().logger);

			expect(store.contentsMap()).toEqual({ ntp: 'server=pool', wifi: 'ssid=test' });
		});

		it('should write changed settings and skip invalid names', () => {
			const store = new DirectorySettingsStore(tempDir, memoryLogger().logger);

			expect(store.update({ wifi: 'ssid=new', '../etc/passwd': 'x', alarm: 'on' })).toEqual([
				'alarm',
				'wifi',
			]);
			expect(fs.readFileSync(path.join(tempDir, 'wifi.conf'), 'utf-8')).toBe('ssid=new');
			expect(fs.existsSync(path.join(tempDir, '..', 'etc', 'passwd.conf'))).toBe(false);
		});
	});

	describe('FirmwareVersionFile', () => {
		it('should default to version 1 and persist new versions', () => {
			const file = new FirmwareVersionFile(path.join(tempDir, 'firmware.json'));

			expect(file.read()).toBe(1);
			file.write(4);
			expect(fs.readFileSync(file.filePath, 'utf-8')).toBe('{"version":4}\n');
			expect(file.read()).toBe(4);
		});

		it('should treat a corrupt file as a client error', () => {
			const filePath = path.join(tempDir, 'firmware.json');
			fs.writeFileSync(filePath, '{"version":"two"}', 'utf-8');

			expect(() => new FirmwareVersionFile(filePath).read()).toThrow(ClientError);
		});
	});

	describe('DirectoryFirmwareInstaller', () => {
		it('should reject an unsafe device class', async () => {
			const versionFile = new FirmwareVersionFile(path.join(tempDir, 'firmware.json'));
			const installer = new DirectoryFirmwareInstaller(tempDir, versionFile, memoryLogger().logger);

			await expect(installer.install('../x', 2, 'AAAA')).rejects.toThrow("Invalid device class '../x'");
			expect(versionFile.read()).toBe(1);
		});
	});

	describe('AuthCredential', () => {
		it('should use an inline token', () => {
			const credential = new AuthCredential('test-token');

			expect(credential.isFileReference).toBe(false);
			expect(credential.read()).toBe('test-token');
		});

		it('should read a referenced file lazily and write a new token with owner-only access', () => {
			const tokenPath = path.join(tempDir, 'auth', 'token');
			const credential = new AuthCredential(`file:${tokenPath}`);

			expect(credential.filePath).toBe(tokenPath);
			expect(credential.read()).toBeNull();

			credential.persist('test-secret');
			expect(credential.read()).toBe('test-secret');
			expect(fs.readFileSync(tokenPath, 'utf-8')).toBe('test-secret');
			expect(fs.statSync(tokenPath).mode & 0o777).toBe(0o600);
		});
	});

	describe('IntervalTaskScheduler', () => {
		afterEach(() => {
			vi.useRealTimers();
		});

		it('should run tasks on their interval and keep going after a failure', async () => {
			vi.useFakeTimers();
			const { logger, entries } = memoryLogger();
			const scheduler = new IntervalTaskScheduler(logger);
			const run = vi.fn().mockRejectedValueOnce(new Error('sensor offline')).mockResolvedValue(undefined);
			scheduler.register({ name: 'poll-sensor', intervalMs: 1000, run });

			scheduler.start();
			await vi.advanceTimersByTimeAsync(3000);
			await scheduler.stop();

			expect(run).toHaveBeenCalledTimes(3);
			expect(entries.some((e) => e.msg === "Task 'poll-sensor' failed")).toBe(true);
			expect(scheduler.running).toBe(false);
		});

		it('should tell tasks which settings changed', () => {
			const scheduler = new IntervalTaskScheduler(memoryLogger().logger);
			const onSettingsChanged = vi.fn();
			scheduler.register({ name: 'wifi', intervalMs: 1000, run: vi.fn(), onSettingsChanged });

			scheduler.settingsChanged(['wifi']);

			expect(onSettingsChanged).toHaveBeenCalledWith(['wifi']);
		});

		it('should reject a duplicate task name', () => {
			const scheduler = new IntervalTaskScheduler(memoryLogger().logger);
			scheduler.register({ name: 'a', intervalMs: 10, run: vi.fn() });

			expect(() => scheduler.register({ name: 'a', intervalMs: 10, run: vi.fn() })).toThrow(
				"Task 'a' is already registered",
			);
		});
	});
});
