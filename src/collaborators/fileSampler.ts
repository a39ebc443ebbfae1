// ─── File-backed Samplers ────────────────────────────────────────────────────

import * as fs from 'fs';
import * as path from 'path';
import { AgentContext } from '../core/context';
import { isNotFound, readFileIfExists, removeIfExists } from '../core/files';
import { Logger } from '../daemon/log';
import { Sample, Sampler, SamplerProvider } from './types';

/**
 * FileSampler - Buffers samples in `<name>.samples` (one JSON pair per line)
 *
 * A snapshot is taken by renaming the live buffer to `<name>.snapshot`, so
 * samples recorded during an upload go to a fresh buffer.
 */
export class FileSampler implements Sampler {
	private readonly livePath: string;
	private readonly snapshotPath: string;

	constructor(
		readonly name: string,
		dir: string,
		private readonly logger: Logger,
	) {
		fs.mkdirSync(dir, { recursive: true });
		this.livePath = path.join(dir, `${name}.samples`);
		this.snapshotPath = path.join(dir, `${name}.snapshot`);
	}

	sample(value: number, timestamp: number = Date.now()): void {
		if (!Number.isFinite(value)) {
			throw new Error(`Sample value must be a finite number, got ${value}`);
		}
		fs.appendFileSync(this.livePath, JSON.stringify([timestamp, value]) + '\n', 'utf-8');
	}

	snapshotSamples(): Sample[] {
		if (!fs.existsSync(this.snapshotPath)) {
			try {
				fs.renameSync(this.livePath, this.snapshotPath);
			} catch (error) {
				if (isNotFound(error)) {
					return [];
				}
				throw error;
			}
		}

		const content = readFileIfExists(this.snapshotPath);
		return content === null ? [] : this.parse(content);
	}

	removeSnapshot(): void {
		removeIfExists(this.snapshotPath);
	}

	private parse(content: string): Sample[] {
		const samples: Sample[] = [];
		for (const line of content.split('\n')) {
			if (!line.trim()) {
				continue;
			}
			try {
				const parsed: unknown = JSON.parse(line);
				if (
					Array.isArray(parsed) &&
					parsed.length === 2 &&
					typeof parsed[0] === 'number' &&
					typeof parsed[1] === 'number'
				) {
					samples.push([parsed[0], parsed[1]]);
					continue;
				}
			} catch {
				// fall through to the warning below
			}
			this.logger.warn('sampler', 'Dropping malformed sample line', { sampler: this.name, line });
		}
		return samples;
	}
}

/**
 * SamplerManager - The configured samplers, in config order
 */
export class SamplerManager implements SamplerProvider {
	private readonly samplers = new Map<string, FileSampler>();

	constructor(
		private readonly dir: string,
		private readonly logger: Logger,
	) {}

	static fromContext(ctx: AgentContext): SamplerManager {
		const manager = new SamplerManager(
			path.join(ctx.config.paths.samplers, ctx.config.device.class),
			ctx.logger,
		);
		for (const entry of ctx.config.samplers) {
			manager.add(entry.name);
		}
		return manager;
	}

	add(name: string): FileSampler {
		const sampler = new FileSampler(name, this.dir, this.logger);
		this.samplers.set(name, sampler);
		return sampler;
	}

	getSampler(name: string): FileSampler | undefined {
		return this.samplers.get(name);
	}

	listSamplers(): FileSampler[] {
		return [...this.samplers.values()];
	}
}
