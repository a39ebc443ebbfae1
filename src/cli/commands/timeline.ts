import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';
import { describeError } from '../../core/errors';
import { TEXT_FORMATS } from '../../timeline/events';
import { TimelineManager } from '../../timeline/manager';
import { Timeline } from '../../timeline/timeline';
import { loadCliContext } from '../util/context';
import { error, output } from '../util/output';

interface GlobalOptions {
	config?: string;
}

function openTimeline(command: Command, name: string): Timeline {
	const ctx = loadCliContext(command.optsWithGlobals<GlobalOptions>().config);
	try {
		return TimelineManager.fromContext(ctx).getTimeline(name);
	} catch (err) {
		return error(describeError(err));
	}
}

export function registerTimelineCommands(program: Command): void {
	const timeline = program
		.command('timeline')
		.description('Inspect and edit pending timeline events');

	timeline
		.command('list')
		.description('Print pending events as JSON')
		.argument('<name>', 'Timeline name')
		.action((name: string, _options: unknown, command: Command) => {
			output(openTimeline(command, name).listEvents(), { json: true });
		});

	timeline
		.command('clear')
		.description('Delete every pending event')
		.argument('<name>', 'Timeline name')
		.action((name: string, _options: unknown, command: Command) => {
			const removed = openTimeline(command, name).clearAll();
			output(`Removed ${removed} event(s) from '${name}'`);
		});

	timeline
		.command('add')
		.description('Record a TEXT event')
		.argument('<name>', 'Timeline name')
		.requiredOption('--title <title>', 'Event title')
		.requiredOption('--text <text>', 'Event body')
		.option('--format <format>', `Text format (${TEXT_FORMATS.join(', ')})`, 'TEXT')
		.option('--attach <file...>', 'Attach files to the event')
		.action(
			async (
				name: string,
				options: { title: string; text: string; format: string; attach?: string[] },
				command: Command,
			) => {
				const target = openTimeline(command, name);
				try {
					const event = await target.record(
						'TEXT',
						{ title: options.title, text: options.text, textFormat: options.format },
						(pending) => {
							for (const file of options.attach ?? []) {
								pending.attach(path.basename(file), fs.readFileSync(file));
							}
						},
					);
					output(event._id);
				} catch (err) {
					error(describeError(err));
				}
			},
		);
}
