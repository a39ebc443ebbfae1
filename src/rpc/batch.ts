// ─── Batched Remote Calls ────────────────────────────────────────────────────

import { z } from 'zod';
import {
	BatchAlreadySent,
	CallFailed,
	DuplicateCallId,
	TransportFailure,
	UnknownCallId,
} from '../core/errors';
import { JsonRpcRequest, JsonRpcResponse, RpcTransport } from './types';

type CallOutcome =
	| { ok: true; value: unknown }
	| { ok: false; detail: string };

interface QueuedCall {
	method: string;
	params: Record<string, unknown>;
}

/**
 * Batch - Queues named remote calls and sends them in one round trip
 *
 * Each call is keyed by a caller-chosen id. After send(), results are read
 * back by id; reads are cached and may be repeated. A failed call only
 * affects its own id, while a failed round trip fails every id.
 */
export class Batch {
	private readonly calls = new Map<string, QueuedCall>();
	private readonly outcomes = new Map<string, CallOutcome>();
	private sent = false;
	private transportError?: string;

	constructor(private readonly transport: RpcTransport) {}

	/**
	 * Queue a call. No network I/O happens here.
	 */
	callWithId(callId: string, method: string, params: Record<string, unknown> = {}): this {
		if (this.sent) {
			throw new BatchAlreadySent();
		}
		if (this.calls.has(callId)) {
			throw new DuplicateCallId(callId);
		}
		this.calls.set(callId, { method, params });
		return this;
	}

	get isSent(): boolean {
		return this.sent;
	}

	/**
	 * Send every queued call in one request. Never rejects: a failed round
	 * trip is recorded and reported by getResult for every id.
	 */
	async send(): Promise<this> {
		if (this.sent) {
			throw new BatchAlreadySent();
		}
		this.sent = true;

		if (this.calls.size === 0) {
			return this;
		}

		const requests: JsonRpcRequest[] = [...this.calls].map(([id, call]) => ({
			jsonrpc: '2.0',
			method: call.method,
			params: call.params,
			id,
		}));

		let responses: JsonRpcResponse[];
		try {
			responses = await this.transport.send(requests);
		} catch (error) {
			this.transportError = error instanceof Error ? error.message : String(error);
			return this;
		}

		for (const response of responses) {
			if (response.id === undefined || response.id === null) {
				continue;
			}
			const id = String(response.id);
			if (!this.calls.has(id) || this.outcomes.has(id)) {
				continue;
			}
			if (response.error) {
				this.outcomes.set(id, {
					ok: false,
					detail: `${response.error.message} (code ${response.error.code})`,
				});
			} else {
				this.outcomes.set(id, { ok: true, value: response.result ?? null });
			}
		}

		return this;
	}

	/**
	 * Result of one call. Throws UnknownCallId if the id was never queued and
	 * CallFailed (TransportFailure for a failed round trip) otherwise. With a
	 * schema, the result is validated and typed.
	 */
	getResult(callId: string): unknown;
	getResult<S extends z.ZodTypeAny>(callId: string, schema: S): z.output<S>;
	getResult(callId: string, schema?: z.ZodTypeAny): unknown {
		if (!this.calls.has(callId)) {
			throw new UnknownCallId(callId);
		}
		if (!this.sent) {
			throw new CallFailed(callId, 'batch was not sent');
		}
		if (this.transportError !== undefined) {
			throw new TransportFailure(callId, this.transportError);
		}

		const outcome = this.outcomes.get(callId);
		if (!outcome) {
			throw new CallFailed(callId, 'no response returned for this call');
		}
		if (!outcome.ok) {
			throw new CallFailed(callId, outcome.detail);
		}

		if (!schema) {
			return outcome.value;
		}
		const parsed = schema.safeParse(outcome.value);
		if (!parsed.success) {
			throw new CallFailed(callId, `unexpected result: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
		}
		return parsed.data;
	}
}
