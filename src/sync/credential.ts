// ─── Device Credential ───────────────────────────────────────────────────────

import * as fs from 'fs';
import { writeFileAtomic } from '../core/files';

const FILE_PREFIX = 'file:';

/**
 * AuthCredential - The device auth token, given inline in config or as
 * `file:<path>`. A file reference starts out absent until the device is
 * approved and the token is written there.
 */
export class AuthCredential {
	private token: string | null;
	readonly filePath: string | null;

	constructor(source: string) {
		if (source.startsWith(FILE_PREFIX)) {
			this.filePath = source.slice(FILE_PREFIX.length);
			this.token = null;
		} else {
			this.filePath = null;
			this.token = source || null;
		}
	}

	get isFileReference(): boolean {
		return this.filePath !== null;
	}

	/**
	 * Current token, or null when there is none yet.
	 */
	read(): string | null {
		if (this.token !== null || this.filePath === null) {
			return this.token;
		}
		try {
			const content = fs.readFileSync(this.filePath, 'utf-8').trim();
			this.token = content || null;
		} catch {
			return null;
		}
		return this.token;
	}

	/**
	 * Adopt a freshly issued token and write it to the referenced file. The
	 * token stays in use for this process even if the write fails.
	 */
	persist(token: string): void {
		this.token = token;
		if (this.filePath === null) {
			return;
		}
		writeFileAtomic(this.filePath, token, { mode: 0o600 });
	}
}
