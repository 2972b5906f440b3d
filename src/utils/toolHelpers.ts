import { z } from 'zod';
import {
    HandlerResult,
    JsonValue,
    RegisteredTool,
    ToolDefinition,
} from '../types/toolTypes.js';

export function textResult(...texts: string[]): HandlerResult {
    return { kind: 'content', blocks: texts.map(text => ({ type: 'text', text })) };
}

export function rawResult(value: JsonValue): HandlerResult {
    return { kind: 'raw', value };
}

export function domainError(message: string): HandlerResult {
    return { kind: 'error', message };
}

/**
 * Renders zod issues as `path: message` pairs joined by `; `.
 */
export function formatZodIssues(error: z.ZodError): string {
    return error.errors
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Erases a typed tool definition into the form the registry stores.
 * Arguments are validated against the input schema; a mismatch is a domain error, not a throw.
 */
export function defineTool<TSchema extends z.ZodTypeAny>(definition: ToolDefinition<TSchema>): RegisteredTool {
    return {
        name: definition.name,
        description: definition.description,
        inputSchema: definition.inputSchema,
        run: async (ctx, args) => {
            const parseResult = definition.inputSchema.safeParse(args ?? {});
            if (!parseResult.success) {
                return domainError(`Invalid arguments for tool ${definition.name}: ${formatZodIssues(parseResult.error)}`);
            }
            return definition.handler(ctx, parseResult.data);
        },
    };
}
