import { z } from 'zod';
import { RegisteredTool } from '../types/toolTypes.js';
import { GUIDE_TYPES } from '../services/GuideService.js';
import { SearchResponse } from '../services/KnowledgeClient.js';
import { KnowledgeUnavailableError } from '../utils/errors.js';
import { defineTool, domainError, rawResult, textResult } from '../utils/toolHelpers.js';
import { ToolDependencies } from './toolSupport.js';

/**
 * `nextjs-postgres_app` -> `Nextjs Postgres App`
 */
export function formatName(name: string): string {
    return name
        .split(/[-_.]/)
        .filter(part => part.length > 0)
        .map(part => part[0].toUpperCase() + part.slice(1).toLowerCase())
        .join(' ');
}

export function formatSearchResults(query: string, response: SearchResponse): string {
    if (response.results.length === 0) {
        return `No results found for: ${query}\n\n`
            + 'Try different search terms:\n'
            + '  • Framework names: laravel, django, nextjs\n'
            + '  • Service types: nodejs, postgresql, valkey\n'
            + '  • Features: database, cache, email';
    }

    let message = `Found ${response.count ?? response.results.length} result(s) for: ${query}\n\n`;
    response.results.forEach((result, index) => {
        message += `${index + 1}. ${formatName(result.name)}\n`;
        message += `   ID: ${result.id}\n`;
        message += `   Type: ${result.type}\n`;
        if (result.summary) {
            message += `   Summary: ${result.summary}\n`;
        }
        if (result.tags && result.tags.length > 0) {
            message += `   Tags: ${result.tags.join(', ')}\n`;
        }
        message += `   Relevance: ${Math.round(result.score * 100)}%\n\n`;
    });
    message += "Use 'knowledge_get' with the ID to retrieve full content.";
    return message;
}

function unavailable(error: KnowledgeUnavailableError, baseUrl: string): string {
    return `${error.message} (${baseUrl}): ${error.detail}. Please try again later.`;
}

export function createKnowledgeTools(deps: ToolDependencies): RegisteredTool[] {
    return [
        defineTool({
            name: 'knowledge_base',
            description: 'Returns bundled zerops.yml and import YAML examples for a runtime (nodejs, python, go, php, postgresql, mariadb, mongodb, valkey, ...).',
            inputSchema: z.object({
                runtime: z.string().min(1).describe('Runtime or service name, e.g. "nodejs" or "postgres".'),
            }).strict(),
            handler: async (_ctx, args) => {
                const lookup = deps.knowledgeBase.lookup(args.runtime);
                if (lookup.found) {
                    return rawResult(lookup.knowledge);
                }
                return rawResult({ runtime: lookup.runtime, message: lookup.message, pattern: lookup.pattern });
            },
        }),
        defineTool({
            name: 'load_platform_guide',
            description: 'Loads a step-by-step workflow guide: fresh_project, existing_service or add_services. Guides are cached for 10 minutes.',
            inputSchema: z.object({
                path_type: z.enum(GUIDE_TYPES),
            }).strict(),
            handler: async (_ctx, args) => rawResult(await deps.guides.load(args.path_type)),
        }),
        defineTool({
            name: 'knowledge_search',
            description: 'Searches the knowledge service for recipes, service configurations and deployment patterns.',
            inputSchema: z.object({
                query: z.string().min(1).describe('Framework names (laravel, django), services (nodejs, postgresql) or features (database, cache).'),
                limit: z.number().int().min(1).max(20).default(10).describe('Number of results (1-20, default 10).'),
            }).strict(),
            handler: async (ctx, args) => {
                try {
                    const response = await deps.knowledge.search(args.query, args.limit, ctx.signal);
                    return textResult(formatSearchResults(args.query, response));
                } catch (error: unknown) {
                    if (error instanceof KnowledgeUnavailableError) {
                        return domainError(unavailable(error, deps.knowledge.getBaseUrl()));
                    }
                    throw error;
                }
            },
        }),
        defineTool({
            name: 'knowledge_get',
            description: 'Gets the full content of a knowledge item by its ID ({type}/{name}, e.g. "recipe/laravel").',
            inputSchema: z.object({
                id: z.string().min(1).describe('Knowledge ID from knowledge_search.'),
            }).strict(),
            handler: async (ctx, args) => {
                if (!args.id.includes('/')) {
                    return domainError(`Invalid ID format: ${args.id}\n\nExpected format: {type}/{name}\nExamples:\n  • service/nodejs\n  • recipe/laravel`);
                }
                try {
                    const item = await deps.knowledge.get(args.id, ctx.signal);
                    if (!item) {
                        return textResult(`Knowledge not found: ${args.id}\n\nUse 'knowledge_search' to find available content.`);
                    }
                    const content = JSON.stringify(item.content ?? null, null, 2);
                    return textResult(`Knowledge: ${formatName(item.name)}\nType: ${item.type}\nID: ${item.id}\n\nContent:\n\`\`\`json\n${content}\n\`\`\``);
                } catch (error: unknown) {
                    if (error instanceof KnowledgeUnavailableError) {
                        return domainError(unavailable(error, deps.knowledge.getBaseUrl()));
                    }
                    throw error;
                }
            },
        }),
    ];
}
