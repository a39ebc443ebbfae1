// ─── Reconciler Tests ────────────────────────────────────────────────────────

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { AuthRejected, CredentialRequired, TransportFailure } from '../../core/errors';
import { SamplerManager } from '../../collaborators/fileSampler';
import { DirectoryFirmwareInstaller } from '../../collaborators/firmwareInstaller';
import { DirectorySettingsStore } from '../../collaborators/settingsStore';
import { TaskScheduler } from '../../collaborators/types';
import { Reconciler } from '../../daemon/reconciler';
import { RemoteClient } from '../../rpc/client';
import { JsonRpcRequest, JsonRpcResponse } from '../../rpc/types';
import { AuthCredential } from '../../sync/credential';
import { FirmwareVersionFile } from '../../sync/firmwareVersion';
import { TimelineManager } from '../../timeline/manager';
import { FakeTransport, makeContext, makeTempDir, removeTempDir } from '../helpers/agent';

const EventsParamsSchema = z.object({
	events: z.array(z.object({ _id: z.string() })),
});

function sentEventIds(request: JsonRpcRequest): string[] {
	return EventsParamsSchema.parse(request.params).events.map((e) => e._id);
}

interface Harness {
	reconciler: Reconciler;
	transport: FakeTransport;
	timelines: TimelineManager;
	samplers: SamplerManager;
	scheduler: TaskScheduler & { settingsChanged: ReturnType<typeof vi.fn> };
	onRestartRequested: ReturnType<typeof vi.fn>;
	dataDir: string;
}

interface HarnessOptions {
	auth?: string;
	checkFirmware?: boolean;
	transport?: FakeTransport;
}

function build(dataDir: string, options: HarnessOptions = {}): Harness {
	const { ctx } = makeContext(
		dataDir,
		[
			'[device]',
			'serial = "dev-1"',
			'class = "camera"',
			'company = "acme"',
			`auth = "${options.auth ?? 'test-token'}"`,
			'',
			'[daemon]',
			`checkFirmware = ${options.checkFirmware ?? false}`,
			'',
			'[[timeline]]',
			'name = "alerts"',
			'',
			'[[sampler]]',
			'name = "temp"',
		].join('\n'),
	);

	const transport = (options.transport ?? new FakeTransport())
		.result('device.check_auth', true)
		.result('device.set_firmware', true)
		.result('device.add_samples', true)
		.result('device.update_conf_map', null)
		.on('device.add_events', (request) => ({
			jsonrpc: '2.0',
			id: request.id,
			result: sentEventIds(request),
		}));

	const timelines = TimelineManager.fromContext(ctx);
	const samplers = SamplerManager.fromContext(ctx);
	const scheduler = { start: vi.fn(), stop: vi.fn(), settingsChanged: vi.fn() };
	const onRestartRequested = vi.fn();
	const versionFile = new FirmwareVersionFile(ctx.config.paths.firmwareVersionFile);

	const reconciler = new Reconciler(ctx, {
		remote: new RemoteClient({ url: ctx.config.server.url, transport }),
		credential: new AuthCredential(ctx.config.device.auth),
		samplers,
		settings: new DirectorySettingsStore(ctx.config.paths.settings, ctx.logger),
		timelines,
		scheduler,
		firmwareInstaller: new DirectoryFirmwareInstaller(ctx.config.paths.firmware, versionFile, ctx.logger),
		firmwareVersion: versionFile.read(),
		onRestartRequested,
	});

	return { reconciler, transport, timelines, samplers, scheduler, onRestartRequested, dataDir };
}

describe('Reconciler', () => {
	let dataDir: string;

	beforeEach(() => {
		dataDir = makeTempDir('reconciler');
	});

	afterEach(() => {
		removeTempDir(dataDir);
	});

	const snapshotPath = (): string => path.join(dataDir, 'samplers', 'camera', 'temp.snapshot');

	it('should queue every outbound call in one batch, in order', async () => {
		const h = build(dataDir);
		h.samplers.getSampler('temp')?.sample(21.5, 1000);
		h.timelines.getTimeline('alerts').addEvent('TEXT', { title: 'motion' });

		const report = await h.reconciler.reconcile();

		expect(h.transport.sent).toHaveLength(1);
		expect(h.transport.lastMethods()).toEqual([
			'device.check_auth',
			'device.set_firmware',
			'device.add_samples',
			'device.update_conf_map',
			'device.add_events',
		]);

		const [auth, firmware, samples, conf, events] = h.transport.sent[0];
		expect(auth.id).toBe('authenticate_result');
		expect(auth.params).toEqual({
			device_class: 'camera',
			serial: 'dev-1',
			auth_token: 'test-token',
			sync_id: report.syncId,
		});
		expect(firmware.params).toEqual({ version: 1 });
		expect(samples.id).toBe('samples.temp');
		expect(samples.params).toEqual({
			device_class: 'camera',
			serial: 'dev-1',
			sampler_name: 'temp',
			samples: [[1000, 21.5]],
		});
		expect(conf.params).toEqual({ conf_map: {} });
		expect(events.id).toBe('timeline_result_alerts');
		expect(report.syncId).toMatch(/^[a-z0-9]{12}$/);
	});

	it('should remove local data once the server confirmed it', async () => {
		const h = build(dataDir);
		h.samplers.getSampler('temp')?.sample(1, 1000);
		const event = h.timelines.getTimeline('alerts').addEvent('TEXT', { title: 'motion' });

		const report = await h.reconciler.reconcile();

		expect(report.outcome).toBe('completed');
		expect(report.firmwareReported).toBe(true);
		expect(report.samplers).toEqual({ uploaded: ['temp'], failed: [] });
		expect(report.clearedEvents).toEqual({ alerts: [event._id] });
		expect(h.timelines.getTimeline('alerts').count()).toBe(0);
		expect(fs.existsSync(snapshotPath())).toBe(false);
	});

	it('should skip samplers with nothing to send and timelines with no events', async () => {
		const h = build(dataDir);

		await h.reconciler.reconcile();

		expect(h.transport.lastMethods()).toEqual([
			'device.check_auth',
			'device.set_firmware',
			'device.update_conf_map',
		]);
	});

	it('should keep events the server did not confirm', async () => {
		const transport = new FakeTransport();
		const h = build(dataDir, { transport });
		const alerts = h.timelines.getTimeline('alerts');
		const first = alerts.addEvent('TEXT', { title: 'first' }, { timestamp: 1 });
		const second = alerts.addEvent('TEXT', { title: 'second' }, { timestamp: 2 });
		transport.on('device.add_events', (request) => ({
			jsonrpc: '2.0',
			id: request.id,
			result: [sentEventIds(request)[0], 'TEXT_9_9'],
		}));

		const report = await h.reconciler.reconcile();

		expect(report.clearedEvents).toEqual({ alerts: [first._id] });
		expect(alerts.listEvents().map((e) => e._id)).toEqual([second._id]);
	});

	it('should keep the sampler snapshot when the upload fails and resend it next cycle', async () => {
		const transport = new FakeTransport();
		const h = build(dataDir, { transport });
		const sampler = h.samplers.getSampler('temp');
		sampler?.sample(1, 1000);
		sampler?.sample(2, 2000);
		transport.error('device.add_samples', -32000, 'storage offline');

		const first = await h.reconciler.reconcile();
		const snapshotBytes = fs.readFileSync(snapshotPath(), 'utf-8');

		expect(first.samplers).toEqual({ uploaded: [], failed: ['temp'] });
		expect(snapshotBytes).toBe('[1000,1]\n[2000,2]\n');

		sampler?.sample(3, 3000);
		transport.result('device.add_samples', true);
		await h.reconciler.reconcile();

		const retried = h.transport.sent[1].find((r) => r.method === 'device.add_samples');
		expect(retried?.params?.samples).toEqual([
			[1000, 1],
			[2000, 2],
		]);
		expect(fs.existsSync(snapshotPath())).toBe(false);
	});

	it('should treat a false add_samples result as a failure', async () => {
		const transport = new FakeTransport();
		const h = build(dataDir, { transport });
		h.samplers.getSampler('temp')?.sample(5, 1000);
		transport.result('device.add_samples', false);

		const report = await h.reconciler.reconcile();

		expect(report.samplers.failed).toEqual(['temp']);
		expect(fs.existsSync(snapshotPath())).toBe(true);
	});

	it('should abort the cycle and clear nothing when authentication fails', async () => {
		const transport = new FakeTransport();
		const h = build(dataDir, { transport });
		h.samplers.getSampler('temp')?.sample(5, 1000);
		h.timelines.getTimeline('alerts').addEvent('TEXT', { title: 'kept' });
		transport.error('device.check_auth', 401, 'bad token');
		transport.result('device.update_conf_map', { wifi: 'ssid=test' });

		await expect(h.reconciler.reconcile()).rejects.toThrow(AuthRejected);

		expect(h.timelines.getTimeline('alerts').count()).toBe(1);
		expect(fs.existsSync(snapshotPath())).toBe(true);
		expect(fs.existsSync(path.join(dataDir, 'settings', 'wifi.conf'))).toBe(false);
		expect(h.scheduler.settingsChanged).not.toHaveBeenCalled();
	});

	it('should surface a failed round trip and keep all local data', async () => {
		const transport = new FakeTransport();
		const h = build(dataDir, { transport });
		h.timelines.getTimeline('alerts').addEvent('TEXT', { title: 'kept' });
		transport.failWith = new Error('socket hang up');

		await expect(h.reconciler.reconcile()).rejects.toThrow(TransportFailure);
		expect(h.timelines.getTimeline('alerts').count()).toBe(1);
	});

	it('should write settings changed remotely and notify the scheduler', async () => {
		const transport = new FakeTransport();
		const h = build(dataDir, { transport });
		fs.writeFileSync(path.join(dataDir, 'settings', 'wifi.conf'), 'ssid=old', 'utf-8');
		transport.result('device.update_conf_map', { wifi: 'ssid=new' });

		const report = await h.reconciler.reconcile();

		const conf = h.transport.sent[0].find((r) => r.method === 'device.update_conf_map');
		expect(conf?.params).toEqual({ conf_map: { wifi: 'ssid=old' } });
		expect(fs.readFileSync(path.join(dataDir, 'settings', 'wifi.conf'), 'utf-8')).toBe('ssid=new');
		expect(h.scheduler.settingsChanged).toHaveBeenCalledWith(['wifi']);
		expect(report.settingsChanged).toEqual(['wifi']);
	});

	describe('credential bootstrap', () => {
		const tokenPath = (): string => path.join(dataDir, 'token');

		it('should stop quietly while approval is pending', async () => {
			const transport = new FakeTransport().result('device.check_approval', { state: 'pending' });
			const h = build(dataDir, { auth: `file:${tokenPath()}`, transport });

			const report = await h.reconciler.reconcile();

			expect(report.outcome).toBe('approval-pending');
			expect(transport.sent).toHaveLength(1);
			expect(transport.sent[0]).toEqual([
				{
					jsonrpc: '2.0',
					method: 'device.check_approval',
					params: { company: 'acme', serial: 'dev-1', name: 'dev-1', info: null },
					id: 'call',
				},
			]);
		});

		it('should report a denied device', async () => {
			const transport = new FakeTransport().result('device.check_approval', { state: 'rejected' });
			const h = build(dataDir, { auth: `file:${tokenPath()}`, transport });

			const report = await h.reconciler.reconcile();

			expect(report.outcome).toBe('approval-denied');
			expect(transport.sent).toHaveLength(1);
		});

		it('should store the issued token and sync with it', async () => {
			const transport = new FakeTransport().result('device.check_approval', {
				state: 'approved',
				auth_token: 'test-secret',
			});
			const h = build(dataDir, { auth: `file:${tokenPath()}`, transport });

			const report = await h.reconciler.reconcile();

			expect(report.outcome).toBe('completed');
			expect(fs.readFileSync(tokenPath(), 'utf-8')).toBe('test-secret');
			expect(transport.sent[1][0].params?.auth_token).toBe('test-secret');

			await h.reconciler.reconcile();
			expect(transport.sent).toHaveLength(3);
			expect(transport.lastMethods()[0]).toBe('device.check_auth');
		});

		it('should use an existing token file without asking for approval', async () => {
			fs.writeFileSync(tokenPath(), 'test-secret\n', 'utf-8');
			const h = build(dataDir, { auth: `file:${tokenPath()}` });

			await h.reconciler.reconcile();

			expect(h.transport.sent).toHaveLength(1);
			expect(h.transport.sent[0][0].params?.auth_token).toBe('test-secret');
		});

		it('should fail without a network call when no credential is configured', async () => {
			const h = build(dataDir, { auth: '' });

			await expect(h.reconciler.reconcile()).rejects.toThrow(CredentialRequired);
			expect(h.transport.sent).toHaveLength(0);
		});
	});

	describe('firmware', () => {
		it('should do nothing more when the firmware is current', async () => {
			const transport = new FakeTransport().result('device.check_firmware', { current: true });
			const h = build(dataDir, { checkFirmware: true, transport });

			const report = await h.reconciler.reconcile();

			expect(transport.sent[0][2]).toEqual({
				jsonrpc: '2.0',
				method: 'device.check_firmware',
				params: { current_version: 1 },
				id: 'firmware_result',
			});
			expect(report.firmware).toBe('current');
			expect(h.onRestartRequested).not.toHaveBeenCalled();
		});

		it('should install new firmware after the rest of the cycle and request a restart', async () => {
			const transport = new FakeTransport().result('device.check_firmware', {
				current: false,
				firmware: Buffer.from('firmware-image').toString('base64'),
				device_class: 'camera',
				version: 2,
			});
			const h = build(dataDir, { checkFirmware: true, transport });
			const alerts = h.timelines.getTimeline('alerts');
			alerts.addEvent('TEXT', { title: 'before update' });
			let pendingAtRestart = -1;
			h.onRestartRequested.mockImplementation(() => {
				pendingAtRestart = alerts.count();
			});

			const report = await h.reconciler.reconcile();

			expect(report.firmware).toBe('installed');
			expect(h.onRestartRequested).toHaveBeenCalledTimes(1);
			expect(pendingAtRestart).toBe(0);
			expect(
				fs.readFileSync(path.join(dataDir, 'firmware', 'camera', '2', 'firmware.zip'), 'utf-8'),
			).toBe('firmware-image');
			expect(JSON.parse(fs.readFileSync(path.join(dataDir, 'firmware.json'), 'utf-8'))).toEqual({
				version: 2,
			});
		});

		it('should fail without restarting when the update is incomplete', async () => {
			const transport = new FakeTransport().result('device.check_firmware', { current: false });
			const h = build(dataDir, { checkFirmware: true, transport });

			const report = await h.reconciler.reconcile();

			expect(report.firmware).toBe('failed');
			expect(h.onRestartRequested).not.toHaveBeenCalled();
		});
	});

	it('should never run two cycles at once', async () => {
		let active = 0;
		let maxActive = 0;
		class SlowTransport extends FakeTransport {
			async send(requests: readonly JsonRpcRequest[]): Promise<JsonRpcResponse[]> {
				active++;
				maxActive = Math.max(maxActive, active);
				await new Promise((resolve) => setTimeout(resolve, 20));
				active--;
				return super.send(requests);
			}
		}
		const h = build(dataDir, { transport: new SlowTransport() });

		const cycles = [h.reconciler.reconcile(), h.reconciler.reconcile(), h.reconciler.reconcile()];
		expect(h.reconciler.busy).toBe(true);
		const reports = await Promise.all(cycles);

		expect(reports.every((r) => r.outcome === 'completed')).toBe(true);
		expect(h.transport.sent).toHaveLength(3);
		expect(maxActive).toBe(1);
		expect(h.reconciler.busy).toBe(false);
	});
});
