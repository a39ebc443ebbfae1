// ─── JSON-RPC Types ──────────────────────────────────────────────────────────

import { z } from 'zod';

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
	jsonrpc: '2.0';
	method: string;
	params?: Record<string, unknown>;
	id?: JsonRpcId;
}

export interface JsonRpcError {
	code: number;
	message: string;
	data?: unknown;
}

export interface JsonRpcResponse {
	jsonrpc: '2.0';
	result?: unknown;
	error?: JsonRpcError;
	id?: JsonRpcId;
}

export const JsonRpcErrorSchema = z.object({
	code: z.number().int(),
	message: z.string(),
	data: z.unknown().optional(),
});

export const JsonRpcResponseSchema = z.object({
	jsonrpc: z.literal('2.0'),
	result: z.unknown().optional(),
	error: JsonRpcErrorSchema.optional(),
	id: z.union([z.string(), z.number(), z.null()]).optional(),
});

/**
 * Anything that can carry one JSON-RPC batch to the server and bring back the
 * responses. Rejects when the round trip as a whole fails.
 */
export interface RpcTransport {
	send(requests: readonly JsonRpcRequest[]): Promise<JsonRpcResponse[]>;
}
