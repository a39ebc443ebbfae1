export const EXIT_FAILURE = 1;
export const EXIT_NOT_RUNNING = 2;

export interface OutputOptions {
	json?: boolean;
}

export function output(data: unknown, options: OutputOptions = {}): void {
	if (options.json) {
		console.log(JSON.stringify(data, null, 2));
	} else if (typeof data === 'string') {
		console.log(data);
	} else if (data === null || data === undefined) {
		// Silent for void/null results
	} else {
		console.log(data);
	}
}

export function error(message: string, exitCode: number = EXIT_FAILURE): never {
	console.error(message);
	process.exit(exitCode);
}
