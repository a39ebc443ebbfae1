#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';
import { z } from 'zod';
import { registerDaemonCommands } from './commands/daemon';
import { registerSampleCommand } from './commands/sample';
import { registerTimelineCommands } from './commands/timeline';

const PackageSchema = z.object({ version: z.string() });

function packageVersion(): string {
	// same relative location from src/cli and dist/cli
	const file = path.join(__dirname, '..', '..', 'package.json');
	return PackageSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8'))).version;
}

export function buildProgram(): Command {
	const program = new Command();

	program
		.name('edgesync')
		.description('Device agent that keeps local state in sync with a management server')
		.version(packageVersion())
		.option('-c, --config <path>', 'Config file (default ~/.edgesync/config.toml)');

	registerDaemonCommands(program);
	registerTimelineCommands(program);
	registerSampleCommand(program);

	return program;
}

if (require.main === module) {
	buildProgram()
		.parseAsync(process.argv)
		.catch((err: unknown) => {
			console.error(err instanceof Error ? err.message : String(err));
			process.exit(1);
		});
}
