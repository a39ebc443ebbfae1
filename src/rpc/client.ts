// ─── Remote Client ───────────────────────────────────────────────────────────

import { Batch } from './batch';
import { HttpTransport } from './httpTransport';
import { RpcTransport } from './types';

export interface RemoteClientOptions {
	url: string;
	timeout?: number;
	transport?: RpcTransport;
}

/**
 * RemoteClient - Entry point for talking to the management server
 */
export class RemoteClient {
	private readonly transport: RpcTransport;

	constructor(options: RemoteClientOptions) {
		this.transport =
			options.transport ?? new HttpTransport({ url: options.url, timeout: options.timeout });
	}

	/**
	 * Start an empty batch. The caller sends it.
	 */
	batch(): Batch {
		return new Batch(this.transport);
	}

	/**
	 * Queue calls inside `fill`, then send them once when it returns. If
	 * `fill` throws nothing is sent.
	 */
	async withBatch(fill: (batch: Batch) => void | Promise<void>): Promise<Batch> {
		const batch = this.batch();
		await fill(batch);
		return batch.send();
	}

	/**
	 * Single call outside any batch; throws the call's failure.
	 */
	async call(method: string, params: Record<string, unknown> = {}): Promise<unknown> {
		const batch = await this.withBatch((b) => {
			b.callWithId('call', method, params);
		});
		return batch.getResult('call');
	}
}
