// ─── Timeline Manager ────────────────────────────────────────────────────────

import * as path from 'path';
import { AgentContext } from '../core/context';
import { UnknownTimeline } from '../core/errors';
import { Logger } from '../daemon/log';
import { Timeline } from './timeline';

/**
 * TimelineManager - Owns the configured timelines for one device class
 */
export class TimelineManager implements Iterable<Timeline> {
	private readonly timelines = new Map<string, Timeline>();

	constructor(
		readonly rootDir: string,
		private readonly logger: Logger,
	) {}

	/**
	 * Build the manager from `[[timeline]]` config entries. Timelines live
	 * under `<paths.timelines>/<device class>/<name>`.
	 */
	static fromContext(ctx: AgentContext): TimelineManager {
		const { config } = ctx;
		const manager = new TimelineManager(
			path.join(config.paths.timelines, config.device.class),
			ctx.logger,
		);
		for (const entry of config.timelines) {
			manager.newTimeline(entry.name, entry.maxEvents);
		}
		return manager;
	}

	newTimeline(name: string, maxEvents?: number): Timeline {
		const timeline = new Timeline(name, path.join(this.rootDir, name), maxEvents, this.logger);
		this.timelines.set(name, timeline);
		return timeline;
	}

	getTimeline(name: string): Timeline {
		const timeline = this.timelines.get(name);
		if (!timeline) {
			throw new UnknownTimeline(name);
		}
		return timeline;
	}

	get size(): number {
		return this.timelines.size;
	}

	[Symbol.iterator](): Iterator<Timeline> {
		return this.timelines.values();
	}
}
