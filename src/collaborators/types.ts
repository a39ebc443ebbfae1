// ─── Collaborator Interfaces ─────────────────────────────────────────────────

/** [timestamp ms, value] */
export type Sample = readonly [timestamp: number, value: number];

export interface Sampler {
	readonly name: string;
	/**
	 * Pending samples for upload. Calling this again before removeSnapshot()
	 * returns the same snapshot.
	 */
	snapshotSamples(): readonly Sample[] | Promise<readonly Sample[]>;
	removeSnapshot(): void | Promise<void>;
}

export interface SamplerProvider {
	listSamplers(): readonly Sampler[];
}

export interface SettingsStore {
	/** Setting name → current contents */
	contentsMap(): Record<string, string> | Promise<Record<string, string>>;
	/** Apply settings changed remotely; returns the names written */
	update(changed: Record<string, string>): string[] | Promise<string[]>;
}

export interface TaskScheduler {
	start(): void | Promise<void>;
	stop(): void | Promise<void>;
	settingsChanged(names: readonly string[]): void;
}

export interface FirmwareInstaller {
	/** Install a base64 firmware package; returns where it was installed */
	install(deviceClass: string, version: number, payloadBase64: string): Promise<string>;
}
