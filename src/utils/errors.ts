import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';

/**
 * A JSON-RPC protocol-level error. The message is sent to the caller verbatim.
 */
export class RpcError extends Error {
    public readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string) {
        super(message);
        this.name = 'RpcError';
        this.code = code;
    }
}

/**
 * Failure of a call to the infrastructure API (transport error, timeout or non-2xx answer).
 */
export class UpstreamError extends Error {
    public readonly status: number | null;
    /** Machine-readable error code from the API body, e.g. `serviceStackTypeNotFound`. */
    public readonly upstreamCode: string | null;

    constructor(detail: string, status: number | null = null, upstreamCode: string | null = null) {
        super(`remote call failed: ${detail}`);
        this.name = 'UpstreamError';
        this.status = status;
        this.upstreamCode = upstreamCode;
    }
}

export class KnowledgeUnavailableError extends Error {
    public readonly detail: string;

    constructor(detail: string) {
        super('knowledge service unavailable');
        this.name = 'KnowledgeUnavailableError';
        this.detail = detail;
    }
}

/**
 * Fatal problem found before serving starts (missing credential, bad config file).
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

export function isAbortError(error: unknown): boolean {
    return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}
