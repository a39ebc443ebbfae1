// ─── Firmware Installer ──────────────────────────────────────────────────────

import * as path from 'path';
import { writeFileAtomic } from '../core/files';
import { Logger } from '../daemon/log';
import { FirmwareVersionFile } from '../sync/firmwareVersion';
import { FirmwareInstaller } from './types';

const SAFE_SEGMENT = /^[A-Za-z0-9_.-]+$/;

/**
 * DirectoryFirmwareInstaller - Unpacks the base64 payload to
 * `<root>/<device class>/<version>/firmware.zip` and records the version
 */
export class DirectoryFirmwareInstaller implements FirmwareInstaller {
	constructor(
		private readonly root: string,
		private readonly versionFile: FirmwareVersionFile,
		private readonly logger: Logger,
	) {}

	async install(deviceClass: string, version: number, payloadBase64: string): Promise<string> {
		if (!SAFE_SEGMENT.test(deviceClass) || deviceClass.startsWith('.')) {
			throw new Error(`Invalid device class '${deviceClass}'`);
		}
		if (!Number.isInteger(version) || version < 1) {
			throw new Error(`Invalid firmware version ${version}`);
		}

		const payload = Buffer.from(payloadBase64, 'base64');
		if (payload.length === 0) {
			throw new Error('Firmware payload is empty');
		}

		const installDir = path.join(this.root, deviceClass, String(version));
		writeFileAtomic(path.join(installDir, 'firmware.zip'), payload);
		this.versionFile.write(version);

		this.logger.info('firmware', `Installed firmware v${version}`, {
			deviceClass,
			installDir,
			bytes: payload.length,
		});
		return installDir;
	}
}
