// ─── Device Serial ───────────────────────────────────────────────────────────

import * as crypto from 'crypto';
import * as os from 'os';

/**
 * Stable serial derived from the hostname and first external MAC address.
 */
export function defaultSerial(): string {
	let mac = '';
	for (const addresses of Object.values(os.networkInterfaces())) {
		const external = (addresses ?? []).find((a) => !a.internal && a.mac !== '00:00:00:00:00:00');
		if (external) {
			mac = external.mac;
			break;
		}
	}
	const digest = crypto.createHash('sha1').update(`${os.hostname()}|${mac}`).digest('hex');
	return digest.slice(0, 16);
}

const SYNC_ID_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';

/**
 * Random 12 character id naming one sync cycle.
 */
export function newSyncId(): string {
	let id = '';
	for (let i = 0; i < 12; i++) {
		id += SYNC_ID_ALPHABET[crypto.randomInt(SYNC_ID_ALPHABET.length)];
	}
	return id;
}
