import { z } from 'zod';
import type { Implementation } from '@modelcontextprotocol/sdk/types.js';
import type { PlatformApiClient } from '../services/PlatformApiClient.js';

/**
 * Any value that survives a JSON round trip unchanged.
 */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

export interface TextBlock {
    type: 'text';
    text: string;
}

/**
 * The closed set of outcomes a tool handler can produce.
 * The dispatcher shapes each variant into the JSON-RPC result without inspecting payloads.
 */
export type HandlerResult =
    | { kind: 'content'; blocks: TextBlock[] }
    | { kind: 'raw'; value: JsonValue }
    | { kind: 'error'; message: string };

export type TransportKind = 'stdio' | 'http';

/**
 * Per-call carrier handed to every handler. Built fresh for each invocation and never reused.
 */
export interface InvocationContext {
    /** Upstream API client bound to this call's credential, or null when none was supplied. */
    client: PlatformApiClient | null;
    /** Caller identity from the initialize handshake (advisory only). */
    clientInfo: Implementation | null;
    transport: TransportKind;
    /** Aborted when the caller goes away or the process shuts down. */
    signal: AbortSignal;
}

export type ToolHandler<TArgs> = (ctx: InvocationContext, args: TArgs) => Promise<HandlerResult>;

/**
 * A tool as registered with the ToolRegistry.
 * `inputSchema` validates the raw arguments before `handler` runs and is published via tools/list.
 */
export interface ToolDefinition<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
    /**
     * Unique dispatch key.
     */
    readonly name: string;
    readonly description: string;
    readonly inputSchema: TSchema;
    readonly handler: ToolHandler<z.output<TSchema>>;
}

/**
 * Erased form stored in the registry; arguments are validated against `inputSchema` first.
 */
export interface RegisteredTool {
    readonly name: string;
    readonly description: string;
    readonly inputSchema: z.ZodTypeAny;
    readonly run: (ctx: InvocationContext, args: unknown) => Promise<HandlerResult>;
}
