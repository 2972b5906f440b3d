import {
    ErrorCode,
    Implementation,
    LATEST_PROTOCOL_VERSION,
    SUPPORTED_PROTOCOL_VERSIONS,
} from '@modelcontextprotocol/sdk/types.js';
import { HandlerResult, TransportKind } from '../types/toolTypes.js';
import {
    CallToolParamsSchema,
    InitializeParamsSchema,
    JSONRPC_VERSION,
    JsonRpcRequest,
    JsonRpcRequestSchema,
    JsonRpcResponse,
    RequestId,
} from '../types/rpcTypes.js';
import { ToolRegistry } from './ToolRegistry.js';
import { ContextFactory } from './ContextFactory.js';
import { RpcError, errorMessage } from '../utils/errors.js';
import { formatZodIssues } from '../utils/toolHelpers.js';
import { logger } from '../utils/logger.js';

/**
 * Mutable per-session state. The stdio transport keeps one for the life of the process;
 * the HTTP transport builds a new one for every request.
 */
export interface SessionState {
    clientInfo: Implementation | null;
}

export interface DispatchOptions {
    transport: TransportKind;
    /** Credential for the upstream API, or null when none is available. */
    credential: string | null;
    session: SessionState;
    signal: AbortSignal;
}

export interface DispatcherOptions {
    serverInfo: Implementation;
    /** Free-text operating instructions returned by initialize over stdio. */
    instructions?: (clientInfo: Implementation | null) => string;
}

/**
 * Outcome of handling one raw message. `response` is null for notifications.
 */
export interface DispatchOutcome {
    response: JsonRpcResponse | null;
    parseFailed: boolean;
}

/**
 * Routes JSON-RPC messages to the registry and shapes results. Both transports funnel through here.
 */
export class Dispatcher {
    private registry: ToolRegistry;
    private contextFactory: ContextFactory;
    private options: DispatcherOptions;

    constructor(registry: ToolRegistry, contextFactory: ContextFactory, options: DispatcherOptions) {
        this.registry = registry;
        this.contextFactory = contextFactory;
        this.options = options;
    }

    /**
     * Parses one raw JSON-RPC message and dispatches it.
     */
    public async handleRaw(raw: string, options: DispatchOptions): Promise<DispatchOutcome> {
        let message: unknown;
        try {
            message = JSON.parse(raw);
        } catch (error: unknown) {
            logger.warn(`Rejecting malformed JSON-RPC message: ${errorMessage(error)}`);
            return { response: errorResponse(null, ErrorCode.ParseError, 'Parse error'), parseFailed: true };
        }
        return { response: await this.handleMessage(message, options), parseFailed: false };
    }

    /**
     * Dispatches an already-parsed message.
     * @returns The response, or null when the message was a notification.
     */
    public async handleMessage(message: unknown, options: DispatchOptions): Promise<JsonRpcResponse | null> {
        const parsed = JsonRpcRequestSchema.safeParse(message);
        if (!parsed.success) {
            logger.warn(`Invalid JSON-RPC request: ${formatZodIssues(parsed.error)}`);
            return errorResponse(extractId(message), ErrorCode.InvalidRequest, 'Invalid Request');
        }

        const request = parsed.data;
        const id = request.id ?? null;
        try {
            const result = await this.route(request, options);
            if (request.id === undefined) {
                return null;
            }
            return { jsonrpc: JSONRPC_VERSION, id, result };
        } catch (error: unknown) {
            if (request.id === undefined) {
                logger.warn(`Notification ${request.method} failed: ${errorMessage(error)}`);
                return null;
            }
            if (error instanceof RpcError) {
                return errorResponse(id, error.code, error.message);
            }
            logger.error(`Unexpected error while handling ${request.method}: ${errorMessage(error)}`, error);
            return errorResponse(id, ErrorCode.InternalError, `Internal error: ${errorMessage(error)}`);
        }
    }

    private async route(request: JsonRpcRequest, options: DispatchOptions): Promise<unknown> {
        if (request.id === undefined) {
            // Notifications (e.g. notifications/initialized) need no answer.
            logger.debug(`Received notification: ${request.method}`);
            return null;
        }

        switch (request.method) {
            case 'initialize':
                return this.initialize(request, options);
            case 'tools/list':
                return { tools: this.registry.listTools() };
            case 'tools/call':
                return this.callTool(request, options);
            default:
                throw new RpcError(ErrorCode.MethodNotFound, `Method not found: ${request.method}`);
        }
    }

    private initialize(request: JsonRpcRequest, options: DispatchOptions): Record<string, unknown> {
        const params = InitializeParamsSchema.safeParse(request.params ?? {});
        const requestedVersion = params.success ? params.data.protocolVersion : undefined;
        const clientInfo = params.success && params.data.clientInfo
            ? { name: params.data.clientInfo.name, version: params.data.clientInfo.version }
            : null;

        options.session.clientInfo = clientInfo;
        if (clientInfo) {
            logger.info(`Client identified over ${options.transport}: ${clientInfo.name} ${clientInfo.version}`);
        } else {
            logger.info(`Client over ${options.transport} sent no clientInfo`);
        }

        const protocolVersion = requestedVersion && SUPPORTED_PROTOCOL_VERSIONS.includes(requestedVersion)
            ? requestedVersion
            : LATEST_PROTOCOL_VERSION;

        const result: Record<string, unknown> = {
            protocolVersion,
            capabilities: { tools: { listChanged: false } },
            serverInfo: this.options.serverInfo,
        };
        if (options.transport === 'stdio' && this.options.instructions) {
            result.instructions = this.options.instructions(clientInfo);
        }
        return result;
    }

    private async callTool(request: JsonRpcRequest, options: DispatchOptions): Promise<unknown> {
        const params = CallToolParamsSchema.safeParse(request.params ?? {});
        if (!params.success) {
            throw new RpcError(ErrorCode.InvalidParams, `Invalid params: ${params.error.errors[0]?.message ?? 'malformed tools/call params'}`);
        }

        const ctx = this.contextFactory.create({
            credential: options.credential,
            clientInfo: options.session.clientInfo,
            transport: options.transport,
            signal: options.signal,
        });
        const outcome = await this.registry.invoke(ctx, params.data.name, params.data.arguments ?? {});
        return shapeToolResult(outcome);
    }
}

/**
 * Maps a handler outcome onto the tools/call result payload.
 */
export function shapeToolResult(outcome: HandlerResult): unknown {
    switch (outcome.kind) {
        case 'content':
            return { content: outcome.blocks };
        case 'raw':
            return outcome.value;
        case 'error':
            return { content: [{ type: 'text', text: outcome.message }], isError: true };
    }
}

export function errorResponse(id: RequestId | null, code: number, message: string): JsonRpcResponse {
    return { jsonrpc: JSONRPC_VERSION, id, error: { code, message } };
}

function extractId(message: unknown): RequestId | null {
    if (typeof message === 'object' && message !== null && 'id' in message) {
        const id = message.id;
        if (typeof id === 'string' || typeof id === 'number') {
            return id;
        }
    }
    return null;
}
