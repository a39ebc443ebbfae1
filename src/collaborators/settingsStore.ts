// ─── Settings Directory ──────────────────────────────────────────────────────

import * as fs from 'fs';
import * as path from 'path';
import { isNotFound, readFileIfExists, writeFileAtomic } from '../core/files';
import { Logger } from '../daemon/log';
import { SettingsStore } from './types';

const SETTINGS_SUFFIX = '.conf';
const SETTING_NAME = /^[A-Za-z0-9_.-]+$/;

/**
 * DirectorySettingsStore - One `<name>.conf` file per setting
 */
export class DirectorySettingsStore implements SettingsStore {
	constructor(
		private readonly dir: string,
		private readonly logger: Logger,
	) {
		fs.mkdirSync(dir, { recursive: true });
	}

	contentsMap(): Record<string, string> {
		const map: Record<string, string> = {};
		for (const name of this.names()) {
			const content = readFileIfExists(this.settingPath(name));
			if (content !== null) {
				map[name] = content;
			}
		}
		return map;
	}

	update(changed: Record<string, string>): string[] {
		const written: string[] = [];
		for (const name of Object.keys(changed).sort()) {
			if (!SETTING_NAME.test(name) || name.startsWith('.')) {
				this.logger.warn('settings', 'Ignoring setting with invalid name', { name });
				continue;
			}
			writeFileAtomic(this.settingPath(name), changed[name]);
			written.push(name);
		}
		return written;
	}

	private names(): string[] {
		let entries: string[];
		try {
			entries = fs.readdirSync(this.dir);
		} catch (error) {
			if (isNotFound(error)) {
				return [];
			}
			throw error;
		}
		return entries
			.filter((n) => n.endsWith(SETTINGS_SUFFIX) && !n.startsWith('.'))
			.map((n) => n.slice(0, -SETTINGS_SUFFIX.length))
			.sort();
	}

	private settingPath(name: string): string {
		return path.join(this.dir, `${name}${SETTINGS_SUFFIX}`);
	}
}
