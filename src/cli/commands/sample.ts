import { Command } from 'commander';
import { describeError } from '../../core/errors';
import { SamplerManager } from '../../collaborators/fileSampler';
import { loadCliContext } from '../util/context';
import { error, output } from '../util/output';

export function registerSampleCommand(program: Command): void {
	program
		.command('sample')
		.description("Append a sample to a sampler's buffer")
		.argument('<sampler>', 'Sampler name')
		.argument('<value>', 'Numeric sample value')
		.option('--timestamp <ms>', 'Sample time in epoch milliseconds')
		.action((name: string, rawValue: string, options: { timestamp?: string }, command: Command) => {
			const ctx = loadCliContext(command.optsWithGlobals<{ config?: string }>().config);
			const sampler = SamplerManager.fromContext(ctx).getSampler(name);
			if (!sampler) {
				error(`Unknown sampler '${name}'`);
			}

			const value = Number(rawValue);
			const timestamp = options.timestamp === undefined ? Date.now() : Number(options.timestamp);
			if (rawValue.trim() === '' || !Number.isFinite(value)) {
				error(`Sample value must be a number, got '${rawValue}'`);
			}
			if (!Number.isInteger(timestamp)) {
				error(`Timestamp must be an integer, got '${options.timestamp}'`);
			}

			try {
				sampler.sample(value, timestamp);
			} catch (err) {
				error(describeError(err));
			}
			output(`${name}: ${value}`);
		});
}
