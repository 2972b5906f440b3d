import { z } from 'zod';

export const JSONRPC_VERSION = '2.0';

export type RequestId = string | number;

/**
 * Incoming JSON-RPC 2.0 request or notification. A missing `id` marks a notification.
 */
export const JsonRpcRequestSchema = z.object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: z.union([z.string(), z.number().int()]).optional(),
    method: z.string().min(1),
    params: z.record(z.unknown()).optional(),
});

export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;

export interface JsonRpcErrorObject {
    code: number;
    message: string;
}

export interface JsonRpcSuccess {
    jsonrpc: typeof JSONRPC_VERSION;
    id: RequestId | null;
    result: unknown;
}

export interface JsonRpcFailure {
    jsonrpc: typeof JSONRPC_VERSION;
    id: RequestId | null;
    error: JsonRpcErrorObject;
}

// Exactly one of result/error, enforced by the union.
export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

export const ClientInfoSchema = z.object({
    name: z.string(),
    version: z.string(),
}).passthrough();

export const InitializeParamsSchema = z.object({
    protocolVersion: z.string().optional(),
    capabilities: z.record(z.unknown()).optional(),
    clientInfo: ClientInfoSchema.optional(),
}).passthrough();

export const CallToolParamsSchema = z.object({
    name: z.string({ required_error: 'tool name is required', invalid_type_error: 'tool name is required' }),
    arguments: z.record(z.unknown()).optional(),
}).passthrough();
