import { z } from 'zod';
import { KnowledgeUnavailableError, errorMessage } from '../utils/errors.js';
import { withTimeout } from '../utils/abort.js';
import { logger } from '../utils/logger.js';

export const SearchResultSchema = z.object({
    id: z.string(),
    name: z.string(),
    type: z.string(),
    summary: z.string().nullish(),
    tags: z.array(z.string()).nullish(),
    score: z.number().default(0),
});
export type SearchResult = z.infer<typeof SearchResultSchema>;

export const SearchResponseSchema = z.object({
    count: z.number().int().optional(),
    query: z.string().optional(),
    results: z.array(SearchResultSchema).default([]),
});
export type SearchResponse = z.infer<typeof SearchResponseSchema>;

export const KnowledgeItemSchema = z.object({
    id: z.string(),
    name: z.string(),
    type: z.string(),
    content: z.unknown(),
});
export type KnowledgeItem = z.infer<typeof KnowledgeItemSchema>;

export interface KnowledgeClientOptions {
    baseUrl: string;
    timeoutMs: number;
}

/**
 * Client for the external knowledge search service.
 * Every failure (network, timeout, non-2xx other than 404, bad body) surfaces as KnowledgeUnavailableError.
 */
export class KnowledgeClient {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;

    constructor(options: KnowledgeClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs;
    }

    public getBaseUrl(): string {
        return this.baseUrl;
    }

    public async search(query: string, limit: number, signal?: AbortSignal): Promise<SearchResponse> {
        const json = await this.fetchJson('POST', '/api/v1/search', { query, limit }, signal);
        const parsed = SearchResponseSchema.safeParse(json);
        if (!parsed.success) {
            throw new KnowledgeUnavailableError('unexpected search response');
        }
        return parsed.data;
    }

    /**
     * @returns The item, or null when the service reports it does not exist.
     */
    public async get(id: string, signal?: AbortSignal): Promise<KnowledgeItem | null> {
        const path = `/api/v1/knowledge/${id.split('/').map(encodeURIComponent).join('/')}`;
        const json = await this.fetchJson('GET', path, undefined, signal);
        if (json === null) {
            return null;
        }
        const parsed = KnowledgeItemSchema.safeParse(json);
        if (!parsed.success) {
            throw new KnowledgeUnavailableError('unexpected knowledge response');
        }
        return parsed.data;
    }

    /**
     * @returns Parsed JSON body, or null on 404.
     */
    private async fetchJson(method: 'GET' | 'POST', path: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
        const guard = withTimeout(signal, this.timeoutMs);
        try {
            const response = await fetch(`${this.baseUrl}${path}`, {
                method,
                headers: body === undefined ? { Accept: 'application/json' } : { Accept: 'application/json', 'Content-Type': 'application/json' },
                body: body === undefined ? undefined : JSON.stringify(body),
                signal: guard.signal,
            });
            if (response.status === 404) {
                return null;
            }
            if (!response.ok) {
                throw new KnowledgeUnavailableError(`HTTP ${response.status}: ${(await response.text()).trim()}`);
            }
            return await response.json();
        } catch (error: unknown) {
            if (error instanceof KnowledgeUnavailableError) {
                logger.warn(`Knowledge service error on ${method} ${path}: ${error.detail}`);
                throw error;
            }
            logger.warn(`Knowledge service unreachable on ${method} ${path}: ${errorMessage(error)}`);
            throw new KnowledgeUnavailableError(errorMessage(error));
        } finally {
            guard.dispose();
        }
    }
}
