import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { HandlerResult, InvocationContext, RegisteredTool } from '../types/toolTypes.js';
import { RpcError, errorMessage } from '../utils/errors.js';
import { domainError } from '../utils/toolHelpers.js';
import { logger } from '../utils/logger.js';

const WireInputSchema = z.object({
    type: z.literal('object'),
    properties: z.record(z.unknown()).optional(),
    required: z.array(z.string()).optional(),
}).passthrough();

export type WireInputSchema = z.infer<typeof WireInputSchema>;

/**
 * Tool descriptor as published by tools/list.
 */
export interface ToolDescriptor {
    name: string;
    description: string;
    inputSchema: WireInputSchema;
}

/**
 * In-memory catalogue of tools, created once at startup and shared by both transports.
 * Map reads and writes are synchronous, so no handler ever runs while the map is being touched.
 */
export class ToolRegistry {
    private tools: Map<string, RegisteredTool> = new Map();

    /**
     * Inserts or replaces a tool under its name. The last registration for a name wins.
     */
    public register(tool: RegisteredTool): void {
        if (this.tools.has(tool.name)) {
            logger.warn(`Tool "${tool.name}" registered twice. Replacing the earlier definition.`);
        }
        this.tools.set(tool.name, tool);
        logger.debug(`Registered tool: ${tool.name}`);
    }

    /**
     * Looks up a tool by name.
     * @returns The tool, or undefined when no tool has that name.
     */
    public get(name: string): RegisteredTool | undefined {
        return this.tools.get(name);
    }

    /**
     * Snapshot of all tools sorted by name.
     */
    public list(): RegisteredTool[] {
        return [...this.tools.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    }

    /**
     * Lists tools in the wire shape, converting each zod input schema to JSON Schema.
     */
    public listTools(): ToolDescriptor[] {
        return this.list().map(tool => ({
            name: tool.name,
            description: tool.description,
            inputSchema: this.toWireSchema(tool),
        }));
    }

    /**
     * Runs a tool by name.
     * Handler throws are converted to domain errors so one failing call never takes the server down.
     * @throws RpcError (MethodNotFound) if no tool has that name.
     */
    public async invoke(ctx: InvocationContext, name: string, args: unknown): Promise<HandlerResult> {
        const tool = this.tools.get(name);
        if (!tool) {
            throw new RpcError(ErrorCode.MethodNotFound, `tool not found: ${name}`);
        }

        logger.debug(`Invoking tool ${name} over ${ctx.transport}`);
        try {
            return await tool.run(ctx, args);
        } catch (error: unknown) {
            logger.error(`Error executing tool "${name}": ${errorMessage(error)}`);
            return domainError(`Error executing tool ${name}: ${errorMessage(error)}`);
        }
    }

    private toWireSchema(tool: RegisteredTool): WireInputSchema {
        const converted = zodToJsonSchema(tool.inputSchema, {
            target: 'jsonSchema7',
            $refStrategy: 'none',
        });
        const parsed = WireInputSchema.safeParse(converted);
        if (!parsed.success) {
            logger.error(`Input schema for tool ${tool.name} is not an object schema. Publishing an empty object schema.`);
            return { type: 'object' };
        }
        // The wire descriptor carries no $schema marker.
        const { $schema: _ignored, ...schema } = parsed.data;
        return schema;
    }
}
