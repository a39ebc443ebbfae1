// ─── Mutex ───────────────────────────────────────────────────────────────────

/**
 * Mutex - Runs async sections one at a time, in arrival order
 */
export class Mutex {
	private tail: Promise<void> = Promise.resolve();
	private waiting = 0;

	/** True while a section is running or queued */
	get isLocked(): boolean {
		return this.waiting > 0;
	}

	async runExclusive<T>(section: () => Promise<T>): Promise<T> {
		let release: () => void = () => undefined;
		const done = new Promise<void>((resolve) => {
			release = resolve;
		});

		const previous = this.tail;
		this.tail = previous.then(() => done);
		this.waiting++;

		await previous;
		try {
			return await section();
		} finally {
			this.waiting--;
			release();
		}
	}
}
