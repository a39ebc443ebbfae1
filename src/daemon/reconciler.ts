// ─── Reconciliation (one sync cycle) ─────────────────────────────────────────

import { z } from 'zod';
import { AgentContext } from '../core/context';
import { AuthRejected, CallFailed, CredentialRequired, TransportFailure, describeError } from '../core/errors';
import { Mutex } from '../core/mutex';
import {
	FirmwareInstaller,
	Sampler,
	SamplerProvider,
	SettingsStore,
	TaskScheduler,
} from '../collaborators/types';
import { Batch } from '../rpc/batch';
import { RemoteClient } from '../rpc/client';
import { AuthCredential } from '../sync/credential';
import { defaultSerial, newSyncId } from '../sync/serial';
import { Timeline } from '../timeline/timeline';
import { Logger } from './log';

// ─── Remote result shapes ────────────────────────────────────────────────────

const ApprovalSchema = z.object({
	state: z.string(),
	auth_token: z.string().optional(),
});

const FirmwareCheckSchema = z.object({
	current: z.boolean(),
	firmware: z.string().optional(),
	device_class: z.string().optional(),
	version: z.number().int().optional(),
});

const SamplesAcceptedSchema = z.boolean();
const ChangedSettingsSchema = z.record(z.string(), z.string()).nullable();
const AcceptedEventIdsSchema = z.array(z.string());

export const CALL_AUTHENTICATE = 'authenticate_result';
export const CALL_SET_FIRMWARE = 'set_firmware_result';
export const CALL_CHECK_FIRMWARE = 'firmware_result';
export const CALL_CONF = 'conf_result';
export const samplerCallId = (name: string): string => `samples.${name}`;
export const timelineCallId = (name: string): string => `timeline_result_${name}`;

// ─── Types ───────────────────────────────────────────────────────────────────

export type SyncOutcome = 'completed' | 'approval-pending' | 'approval-denied';
export type FirmwareOutcome = 'skipped' | 'current' | 'installed' | 'failed';

export interface SyncReport {
	outcome: SyncOutcome;
	syncId: string | null;
	firmwareReported: boolean;
	samplers: { uploaded: string[]; failed: string[] };
	settingsChanged: string[];
	/** Timeline name → ids removed after the server confirmed them */
	clearedEvents: Record<string, string[]>;
	failedTimelines: string[];
	firmware: FirmwareOutcome;
	durationMs: number;
}

export interface ReconcilerDeps {
	remote: RemoteClient;
	credential: AuthCredential;
	samplers: SamplerProvider;
	settings: SettingsStore;
	timelines: Iterable<Timeline>;
	scheduler: TaskScheduler;
	firmwareInstaller: FirmwareInstaller;
	/** Installed firmware version, read at startup */
	firmwareVersion: number;
	/** Called once new firmware is installed; the daemon restarts itself */
	onRestartRequested: (reason: string) => void;
}

/** State captured for one cycle; dropped when the cycle ends */
interface SyncCycle {
	syncId: string;
	batch: Batch;
	samplers: Sampler[];
	conf: boolean;
	timelines: { timeline: Timeline; eventIds: Set<string> }[];
	checkFirmware: boolean;
}

/**
 * Reconciler - Runs sync cycles against the management server
 *
 * One cycle queues every outbound call in a single batch, then resolves the
 * results in a fixed order. Local data is only removed once its call
 * succeeded; anything else stays for the next cycle. Cycles never overlap.
 */
export class Reconciler {
	private readonly logger: Logger;
	private readonly lock = new Mutex();
	private readonly serial: string;

	constructor(
		private readonly ctx: AgentContext,
		private readonly deps: ReconcilerDeps,
	) {
		this.logger = ctx.logger;
		this.serial = ctx.config.device.serial ?? defaultSerial();
	}

	get busy(): boolean {
		return this.lock.isLocked;
	}

	/**
	 * Run one cycle. If a cycle is already running this waits for it to
	 * finish and then runs its own.
	 */
	reconcile(): Promise<SyncReport> {
		return this.lock.runExclusive(() => this.runCycle());
	}

	private async runCycle(): Promise<SyncReport> {
		const start = Date.now();
		const report: SyncReport = {
			outcome: 'completed',
			syncId: null,
			firmwareReported: false,
			samplers: { uploaded: [], failed: [] },
			settingsChanged: [],
			clearedEvents: {},
			failedTimelines: [],
			firmware: 'skipped',
			durationMs: 0,
		};
		this.logger.debug('sync', 'syncing...');

		const approval = await this.bootstrapCredential();
		if (approval !== 'completed') {
			report.outcome = approval;
			report.durationMs = Date.now() - start;
			return report;
		}

		const token = this.deps.credential.read();
		if (!token) {
			this.logger.error('sync', 'No auth token available, device must be registered');
			throw new CredentialRequired();
		}

		const cycle = await this.queueCalls(token);
		report.syncId = cycle.syncId;
		await cycle.batch.send();

		this.resolveAuthentication(cycle.batch);
		report.firmwareReported = this.resolveFirmwareReport(cycle.batch);
		await this.resolveSamplers(cycle, report);
		await this.resolveConf(cycle, report);
		this.resolveTimelines(cycle, report);

		report.durationMs = Date.now() - start;
		this.logger.debug('sync', `sync complete ${(report.durationMs / 1000).toFixed(2)}s`, {
			syncId: cycle.syncId,
		});

		if (cycle.checkFirmware) {
			report.firmware = await this.resolveFirmwareCheck(cycle.batch);
		}
		return report;
	}

	// ─── Step 1: credential bootstrap ────────────────────────────────────────

	private async bootstrapCredential(): Promise<SyncOutcome> {
		const { credential } = this.deps;
		if (credential.read() || !credential.isFileReference) {
			return 'completed';
		}

		const { device } = this.ctx.config;
		const result = ApprovalSchema.parse(
			await this.deps.remote.call('device.check_approval', {
				company: device.company ?? null,
				serial: this.serial,
				name: device.name ?? this.serial,
				info: device.autoDeviceText ?? null,
			}),
		);

		if (result.state === 'pending') {
			this.logger.debug('sync', 'device approval pending...');
			return 'approval-pending';
		}
		if (result.state !== 'approved') {
			this.logger.error('sync', `device approval ${result.state}`);
			return 'approval-denied';
		}
		if (!result.auth_token) {
			this.logger.error('sync', 'device approved but no auth token was issued');
			return 'approval-denied';
		}

		try {
			credential.persist(result.auth_token);
			this.logger.info('sync', 'device approved, auth token stored', {
				path: credential.filePath,
			});
		} catch (error) {
			this.logger.error('sync', 'unable to write auth token', { error: String(error) });
		}
		return 'completed';
	}

	// ─── Step 2: queue ───────────────────────────────────────────────────────

	private async queueCalls(token: string): Promise<SyncCycle> {
		const { device, daemon } = this.ctx.config;
		const { firmwareVersion } = this.deps;
		const cycle: SyncCycle = {
			syncId: newSyncId(),
			batch: this.deps.remote.batch(),
			samplers: [],
			conf: false,
			timelines: [],
			checkFirmware: daemon.checkFirmware,
		};
		const { batch } = cycle;

		batch.callWithId(CALL_AUTHENTICATE, 'device.check_auth', {
			device_class: device.class,
			serial: this.serial,
			auth_token: token,
			sync_id: cycle.syncId,
		});

		batch.callWithId(CALL_SET_FIRMWARE, 'device.set_firmware', { version: firmwareVersion });

		if (cycle.checkFirmware) {
			batch.callWithId(CALL_CHECK_FIRMWARE, 'device.check_firmware', {
				current_version: firmwareVersion,
			});
		}

		for (const sampler of this.deps.samplers.listSamplers()) {
			try {
				const samples = await sampler.snapshotSamples();
				if (samples.length === 0) {
					await sampler.removeSnapshot();
					continue;
				}
				batch.callWithId(samplerCallId(sampler.name), 'device.add_samples', {
					device_class: device.class,
					serial: this.serial,
					sampler_name: sampler.name,
					samples,
				});
				cycle.samplers.push(sampler);
			} catch (error) {
				this.logger.error('sync', `unable to snapshot sampler '${sampler.name}'`, {
					error: String(error),
				});
			}
		}

		try {
			const confMap = await this.deps.settings.contentsMap();
			batch.callWithId(CALL_CONF, 'device.update_conf_map', { conf_map: confMap });
			cycle.conf = true;
		} catch (error) {
			this.logger.error('sync', 'unable to read settings', { error: String(error) });
		}

		for (const timeline of this.deps.timelines) {
			try {
				const events = timeline.listEvents();
				if (events.length === 0) {
					continue;
				}
				batch.callWithId(timelineCallId(timeline.name), 'device.add_events', {
					name: timeline.name,
					events,
				});
				cycle.timelines.push({ timeline, eventIds: new Set(events.map((e) => e._id)) });
			} catch (error) {
				this.logger.error('sync', `unable to read timeline '${timeline.name}'`, {
					error: String(error),
				});
			}
		}

		return cycle;
	}

	// ─── Steps 4-9: resolve ──────────────────────────────────────────────────

	private resolveAuthentication(batch: Batch): void {
		try {
			batch.getResult(CALL_AUTHENTICATE);
		} catch (error) {
			if (error instanceof TransportFailure) {
				this.logger.error('sync', 'sync round trip failed', { error: error.detail });
				throw error;
			}
			const detail = error instanceof CallFailed ? error.detail : describeError(error);
			throw new AuthRejected(detail);
		}
	}

	private resolveFirmwareReport(batch: Batch): boolean {
		try {
			batch.getResult(CALL_SET_FIRMWARE);
			return true;
		} catch (error) {
			this.logger.error('sync', 'error setting current firmware version', {
				error: describeError(error),
			});
			return false;
		}
	}

	private async resolveSamplers(cycle: SyncCycle, report: SyncReport): Promise<void> {
		for (const sampler of cycle.samplers) {
			let accepted: boolean;
			try {
				accepted = cycle.batch.getResult(samplerCallId(sampler.name), SamplesAcceptedSchema);
			} catch (error) {
				this.logger.error('sync', `error adding samples to ${sampler.name}`, {
					error: describeError(error),
				});
				report.samplers.failed.push(sampler.name);
				continue;
			}

			if (!accepted) {
				this.logger.warn('sync', `server did not accept samples for '${sampler.name}'`);
				report.samplers.failed.push(sampler.name);
				continue;
			}

			try {
				await sampler.removeSnapshot();
				report.samplers.uploaded.push(sampler.name);
			} catch (error) {
				this.logger.error('sync', `unable to remove snapshot for '${sampler.name}'`, {
					error: String(error),
				});
				report.samplers.failed.push(sampler.name);
			}
		}
	}

	private async resolveConf(cycle: SyncCycle, report: SyncReport): Promise<void> {
		if (!cycle.conf) {
			return;
		}

		let changed: Record<string, string> | null;
		try {
			changed = cycle.batch.getResult(CALL_CONF, ChangedSettingsSchema);
		} catch (error) {
			this.logger.error('sync', 'error sending settings', { error: describeError(error) });
			return;
		}
		if (!changed || Object.keys(changed).length === 0) {
			return;
		}

		try {
			const written = await this.deps.settings.update(changed);
			this.deps.scheduler.settingsChanged(written);
			report.settingsChanged = written;
			this.logger.debug('sync', `settings file(s) changed: ${written.join(', ')}`);
		} catch (error) {
			this.logger.error('sync', 'unable to apply changed settings', { error: String(error) });
		}
	}

	private resolveTimelines(cycle: SyncCycle, report: SyncReport): void {
		for (const { timeline, eventIds } of cycle.timelines) {
			let acceptedIds: string[];
			try {
				acceptedIds = cycle.batch.getResult(timelineCallId(timeline.name), AcceptedEventIdsSchema);
			} catch (error) {
				this.logger.error('sync', `error sending timeline '${timeline.name}'`, {
					error: describeError(error),
				});
				report.failedTimelines.push(timeline.name);
				continue;
			}

			const confirmed = acceptedIds.filter((id) => eventIds.has(id));
			if (confirmed.length !== acceptedIds.length) {
				this.logger.warn('sync', 'server confirmed events that were not sent this cycle', {
					timeline: timeline.name,
					ignored: acceptedIds.filter((id) => !eventIds.has(id)),
				});
			}

			try {
				timeline.clear(confirmed);
				report.clearedEvents[timeline.name] = confirmed;
			} catch (error) {
				this.logger.error('sync', `unable to clear timeline '${timeline.name}'`, {
					error: String(error),
				});
				report.failedTimelines.push(timeline.name);
			}
		}
	}

	private async resolveFirmwareCheck(batch: Batch): Promise<FirmwareOutcome> {
		let result: z.infer<typeof FirmwareCheckSchema>;
		try {
			result = batch.getResult(CALL_CHECK_FIRMWARE, FirmwareCheckSchema);
		} catch (error) {
			this.logger.error('sync', 'error checking firmware', { error: describeError(error) });
			return 'failed';
		}

		if (result.current) {
			this.logger.debug('sync', 'firmware is current');
			return 'current';
		}

		const { firmware, device_class: deviceClass, version } = result;
		if (firmware === undefined || deviceClass === undefined || version === undefined) {
			this.logger.error('sync', 'firmware update is missing payload, device class or version');
			return 'failed';
		}

		this.logger.info('sync', `installing firmware v${version}`, { deviceClass });
		let installPath: string;
		try {
			installPath = await this.deps.firmwareInstaller.install(deviceClass, version, firmware);
		} catch (error) {
			this.logger.error('sync', `unable to install firmware v${version}`, { error: String(error) });
			return 'failed';
		}

		this.logger.info('sync', `firmware installed in "${installPath}"`);
		this.deps.onRestartRequested(`firmware v${version} installed`);
		return 'installed';
	}
}
