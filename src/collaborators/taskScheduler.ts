// ─── Periodic Tasks ──────────────────────────────────────────────────────────

import { Logger } from '../daemon/log';
import { TaskScheduler } from './types';

export interface ScheduledTask {
	name: string;
	intervalMs: number;
	run(): void | Promise<void>;
	/** Called when remotely managed settings this task may read have changed */
	onSettingsChanged?(names: readonly string[]): void;
}

/**
 * IntervalTaskScheduler - Runs registered tasks on fixed intervals
 *
 * A run is skipped while the previous run of the same task is still going.
 * Task failures are logged and never stop the scheduler.
 */
export class IntervalTaskScheduler implements TaskScheduler {
	private readonly tasks: ScheduledTask[] = [];
	private readonly timers = new Map<string, NodeJS.Timeout>();
	private readonly inFlight = new Map<string, Promise<void>>();

	constructor(private readonly logger: Logger) {}

	register(task: ScheduledTask): void {
		if (this.tasks.some((t) => t.name === task.name)) {
			throw new Error(`Task '${task.name}' is already registered`);
		}
		this.tasks.push(task);
		if (this.timers.size > 0) {
			this.schedule(task);
		}
	}

	get running(): boolean {
		return this.timers.size > 0;
	}

	start(): void {
		if (this.running) {
			return;
		}
		for (const task of this.tasks) {
			this.schedule(task);
		}
		this.logger.debug('tasks', `Started ${this.tasks.length} task(s)`);
	}

	async stop(): Promise<void> {
		for (const timer of this.timers.values()) {
			clearInterval(timer);
		}
		this.timers.clear();
		await Promise.all(this.inFlight.values());
		this.logger.debug('tasks', 'Stopped');
	}

	settingsChanged(names: readonly string[]): void {
		for (const task of this.tasks) {
			if (!task.onSettingsChanged) {
				continue;
			}
			try {
				task.onSettingsChanged(names);
			} catch (error) {
				this.logger.error('tasks', `Task '${task.name}' failed to apply settings`, {
					error: String(error),
				});
			}
		}
	}

	private schedule(task: ScheduledTask): void {
		const timer = setInterval(() => this.runOnce(task), task.intervalMs);
		timer.unref();
		this.timers.set(task.name, timer);
	}

	private runOnce(task: ScheduledTask): void {
		if (this.inFlight.has(task.name)) {
			return;
		}
		const run = (async () => {
			try {
				await task.run();
			} catch (error) {
				this.logger.error('tasks', `Task '${task.name}' failed`, { error: String(error) });
			} finally {
				this.inFlight.delete(task.name);
			}
		})();
		this.inFlight.set(task.name, run);
	}
}
