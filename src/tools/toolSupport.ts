import { z } from 'zod';
import type { Implementation } from '@modelcontextprotocol/sdk/types.js';
import { HandlerResult, InvocationContext, RegisteredTool, ToolHandler } from '../types/toolTypes.js';
import type { PlatformApiClient } from '../services/PlatformApiClient.js';
import type { KnowledgeClient } from '../services/KnowledgeClient.js';
import type { GuideService } from '../services/GuideService.js';
import type { CommandExecutor } from '../services/CommandExecutor.js';
import type { ServiceTypeCatalogue } from '../services/ServiceTypeCatalogue.js';
import type { KnowledgeBase } from '../services/KnowledgeBase.js';
import { UpstreamError } from '../utils/errors.js';
import { defineTool, domainError } from '../utils/toolHelpers.js';
import { logger } from '../utils/logger.js';

export const NO_CLIENT_MESSAGE = 'No API key provided. Set ZEROPS_API_KEY or send an Authorization: Bearer header.';

export const IdSchema = z.string().regex(/^[A-Za-z0-9_-]+$/, 'must contain only letters, digits, "_" or "-"');

/**
 * Settings the tool modules read. Filled from the resolved configuration at startup.
 */
export interface ToolSettings {
    serverInfo: Implementation;
    apiEndpoint: string;
    defaultProjectId: string | null;
    deployCommand: string;
    deployTimeoutMs: number;
    upstreamTimeoutMs: number;
}

/**
 * Collaborators shared by all tools. None of them holds a credential; the per-call client lives on the context.
 */
export interface ToolDependencies {
    settings: ToolSettings;
    knowledge: KnowledgeClient;
    guides: GuideService;
    executor: CommandExecutor;
    serviceTypes: ServiceTypeCatalogue;
    knowledgeBase: KnowledgeBase;
}

export type ClientHandler<TArgs> = (client: PlatformApiClient, args: TArgs, ctx: InvocationContext) => Promise<HandlerResult>;

/**
 * Wraps a handler that needs the platform API.
 * Returns the no-credential domain error when the context carries no client, and turns
 * UpstreamError into a domain error prefixed with `failurePrefix`.
 */
export function withClient<TArgs>(failurePrefix: string, handler: ClientHandler<TArgs>): ToolHandler<TArgs> {
    return async (ctx, args) => {
        if (!ctx.client) {
            return domainError(NO_CLIENT_MESSAGE);
        }
        try {
            return await handler(ctx.client, args, ctx);
        } catch (error: unknown) {
            if (error instanceof UpstreamError) {
                logger.warn(`${failurePrefix}: ${error.message}`);
                return domainError(`${failurePrefix}: ${error.message}`);
            }
            throw error;
        }
    };
}

export interface ClientToolDefinition<TSchema extends z.ZodTypeAny> {
    name: string;
    description: string;
    inputSchema: TSchema;
    /** Prepended to upstream failure messages, e.g. `Failed to start service`. */
    failurePrefix: string;
    handler: ClientHandler<z.output<TSchema>>;
}

/**
 * defineTool for tools that call the platform API through the per-call client.
 */
export function defineClientTool<TSchema extends z.ZodTypeAny>(definition: ClientToolDefinition<TSchema>): RegisteredTool {
    return defineTool({
        name: definition.name,
        description: definition.description,
        inputSchema: definition.inputSchema,
        handler: withClient(definition.failurePrefix, definition.handler),
    });
}

/**
 * Picks the project id from the arguments, falling back to the configured default.
 */
export function resolveProjectId(argument: string | undefined, settings: ToolSettings): string | null {
    return argument ?? settings.defaultProjectId;
}

export const MISSING_PROJECT_MESSAGE = 'Project ID is required. Provide project_id parameter or set $projectId environment variable.';
