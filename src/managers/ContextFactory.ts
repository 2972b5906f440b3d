import { Implementation } from '@modelcontextprotocol/sdk/types.js';
import { InvocationContext, TransportKind } from '../types/toolTypes.js';
import { PlatformApiClient, PlatformApiClientOptions } from '../services/PlatformApiClient.js';
import { ConfigurationError } from '../utils/errors.js';

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

/**
 * Extracts the token from an `Authorization: Bearer <token>` header.
 * @returns The token, or null when the header is absent or malformed.
 */
export function parseBearerToken(header: string | undefined): string | null {
    if (!header) {
        return null;
    }
    const match = BEARER_PATTERN.exec(header);
    return match ? match[1] : null;
}

/**
 * Resolves the single credential a stdio session runs with.
 * @throws ConfigurationError when no credential is set and validation is not skipped.
 */
export function resolveStdioCredential(credential: string | undefined, skipValidation: boolean): string | null {
    if (credential && credential.trim() !== '') {
        return credential.trim();
    }
    if (skipValidation) {
        return null;
    }
    throw new ConfigurationError('ZEROPS_API_KEY environment variable is required for the stdio transport (use --skip-validation to start without it)');
}

export interface ContextRequest {
    credential: string | null;
    clientInfo: Implementation | null;
    transport: TransportKind;
    signal: AbortSignal;
}

export type ApiClientFactory = (credential: string) => PlatformApiClient;

/**
 * Builds a fresh InvocationContext for every tool call.
 * Clients are never cached, so concurrent callers with different tokens cannot see each other's client.
 */
export class ContextFactory {
    private createClient: ApiClientFactory;

    constructor(createClient: ApiClientFactory) {
        this.createClient = createClient;
    }

    /**
     * Factory backed by the real HTTP client.
     */
    public static forApi(options: Omit<PlatformApiClientOptions, 'token'>): ContextFactory {
        return new ContextFactory(token => new PlatformApiClient({ ...options, token }));
    }

    public create(request: ContextRequest): InvocationContext {
        return {
            client: request.credential ? this.createClient(request.credential) : null,
            clientInfo: request.clientInfo,
            transport: request.transport,
            signal: request.signal,
        };
    }
}
