// ─── File Helpers ────────────────────────────────────────────────────────────

import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';

/**
 * Write a file so that readers see either the old contents or the new ones,
 * never a partial write: write a sibling temp file, fsync, then rename.
 */
export function writeFileAtomic(
	filePath: string,
	data: string | Buffer,
	options: { mode?: number } = {},
): void {
	const dir = path.dirname(filePath);
	if (!fs.existsSync(dir)) {
		fs.mkdirSync(dir, { recursive: true });
	}

	const tmpPath = path.join(
		dir,
		`.${path.basename(filePath)}.${crypto.randomBytes(6).toString('hex')}.tmp`,
	);
	const fd = fs.openSync(tmpPath, 'w', options.mode ?? 0o644);
	try {
		fs.writeFileSync(fd, data);
		fs.fsyncSync(fd);
	} finally {
		fs.closeSync(fd);
	}

	try {
		fs.renameSync(tmpPath, filePath);
	} catch (error) {
		fs.rmSync(tmpPath, { force: true });
		throw error;
	}
}

/**
 * Read a file, returning null if it does not exist (or vanished between
 * listing and reading).
 */
export function readFileIfExists(filePath: string): string | null {
	try {
		return fs.readFileSync(filePath, 'utf-8');
	} catch (error) {
		if (isNotFound(error)) {
			return null;
		}
		throw error;
	}
}

/**
 * Delete a file. Returns false if it was already gone.
 */
export function removeIfExists(filePath: string): boolean {
	try {
		fs.unlinkSync(filePath);
		return true;
	} catch (error) {
		if (isNotFound(error)) {
			return false;
		}
		throw error;
	}
}

export function isNotFound(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
