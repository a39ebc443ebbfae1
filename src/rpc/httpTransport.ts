// ─── HTTP Transport ──────────────────────────────────────────────────────────

import * as http from 'http';
import * as https from 'https';
import { z } from 'zod';
import { JsonRpcRequest, JsonRpcResponse, JsonRpcResponseSchema, RpcTransport } from './types';

const BatchResponseSchema = z.array(JsonRpcResponseSchema);

export interface HttpTransportOptions {
	url: string;
	timeout?: number;
	headers?: Record<string, string>;
}

/**
 * HttpTransport - POSTs a JSON-RPC batch and parses the array of responses
 */
export class HttpTransport implements RpcTransport {
	private readonly url: URL;
	private readonly timeout: number;
	private readonly headers: Record<string, string>;

	constructor(options: HttpTransportOptions) {
		this.url = new URL(options.url);
		this.timeout = options.timeout ?? 30000;
		this.headers = options.headers ?? {};
	}

	async send(requests: readonly JsonRpcRequest[]): Promise<JsonRpcResponse[]> {
		const body = await this.post(JSON.stringify(requests));

		let parsed: unknown;
		try {
			parsed = JSON.parse(body);
		} catch {
			throw new Error('Invalid JSON response');
		}

		// A server that cannot parse the batch answers with a single error object
		const single = JsonRpcResponseSchema.safeParse(parsed);
		if (single.success && single.data.error) {
			throw new Error(`Server rejected batch: ${single.data.error.message}`);
		}

		const responses = BatchResponseSchema.safeParse(parsed);
		if (!responses.success) {
			throw new Error('Response is not a JSON-RPC batch');
		}
		return responses.data;
	}

	private post(data: string): Promise<string> {
		const client = this.url.protocol === 'https:' ? https : http;

		return new Promise((resolve, reject) => {
			const req = client.request(
				this.url,
				{
					method: 'POST',
					headers: {
						...this.headers,
						'Content-Type': 'application/json',
						'Content-Length': Buffer.byteLength(data),
					},
					timeout: this.timeout,
				},
				(res) => {
					let body = '';
					res.setEncoding('utf-8');
					res.on('data', (chunk: string) => (body += chunk));
					res.on('end', () => {
						const status = res.statusCode ?? 0;
						if (status < 200 || status >= 300) {
							reject(new Error(`HTTP ${status} from ${this.url.host}`));
							return;
						}
						resolve(body);
					});
					res.on('error', reject);
				},
			);

			req.on('error', reject);
			req.on('timeout', () => {
				req.destroy(new Error(`Request timeout after ${this.timeout}ms`));
			});

			req.write(data);
			req.end();
		});
	}
}
