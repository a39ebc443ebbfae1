// ─── Installed Firmware Version ──────────────────────────────────────────────

import { z } from 'zod';
import { ClientError } from '../core/errors';
import { readFileIfExists, writeFileAtomic } from '../core/files';

const FirmwareFileSchema = z.object({
	version: z.number().int().positive(),
});

export const INITIAL_FIRMWARE_VERSION = 1;

/**
 * FirmwareVersionFile - `{"version": N}` on disk; absent means version 1
 */
export class FirmwareVersionFile {
	constructor(readonly filePath: string) {}

	read(): number {
		const content = readFileIfExists(this.filePath);
		if (content === null) {
			return INITIAL_FIRMWARE_VERSION;
		}
		try {
			return FirmwareFileSchema.parse(JSON.parse(content)).version;
		} catch (error) {
			throw new ClientError(`Unreadable firmware version file ${this.filePath}: ${String(error)}`);
		}
	}

	write(version: number): void {
		writeFileAtomic(this.filePath, JSON.stringify(FirmwareFileSchema.parse({ version })) + '\n');
	}
}
