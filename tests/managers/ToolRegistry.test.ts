import { jest } from '@jest/globals';
import { z } from 'zod';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';

jest.mock('../../src/utils/logger', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

import { logger } from '../../src/utils/logger';
import { ToolRegistry } from '../../src/managers/ToolRegistry';
import { RpcError } from '../../src/utils/errors';
import { defineTool, textResult } from '../../src/utils/toolHelpers';
import { makeContext } from '../support/toolFixtures';

function echoTool(description = 'Echoes msg') {
    return defineTool({
        name: 'echo',
        description,
        inputSchema: z.object({ msg: z.string() }),
        handler: async (_ctx, args) => textResult(args.msg),
    });
}

describe('ToolRegistry', () => {
    let registry: ToolRegistry;

    beforeEach(() => {
        jest.clearAllMocks();
        registry = new ToolRegistry();
    });

    describe('register / get', () => {
        it('returns a registered tool by name', () => {
            const tool = echoTool();
            registry.register(tool);
            expect(registry.get('echo')).toBe(tool);
        });

        it('reports an unknown name as undefined without throwing', () => {
            expect(registry.get('never-registered')).toBeUndefined();
        });

        it('keeps only the last registration for a name', () => {
            registry.register(echoTool('first'));
            const second = echoTool('second');
            registry.register(second);

            expect(registry.list()).toHaveLength(1);
            expect(registry.get('echo')).toBe(second);
            expect(logger.warn).toHaveBeenCalledWith('Tool "echo" registered twice. Replacing the earlier definition.');
        });
    });

    describe('list / listTools', () => {
        it('lists tools sorted by name', () => {
            for (const name of ['zeta', 'alpha', 'mid']) {
                registry.register(defineTool({
                    name,
                    description: name,
                    inputSchema: z.object({}),
                    handler: async () => textResult(name),
                }));
            }
            expect(registry.list().map(tool => tool.name)).toEqual(['alpha', 'mid', 'zeta']);
        });

        it('publishes the input schema as JSON Schema without $schema', () => {
            registry.register(echoTool());
            const [descriptor] = registry.listTools();

            expect(descriptor.name).toBe('echo');
            expect(descriptor.description).toBe('Echoes msg');
            expect(descriptor.inputSchema).toMatchObject({
                type: 'object',
                properties: { msg: { type: 'string' } },
                required: ['msg'],
            });
            expect(descriptor.inputSchema).not.toHaveProperty('$schema');
        });
    });

    describe('invoke', () => {
        it('runs the handler with validated arguments', async () => {
            registry.register(echoTool());
            const result = await registry.invoke(makeContext(), 'echo', { msg: 'hi' });
            expect(result).toEqual({ kind: 'content', blocks: [{ type: 'text', text: 'hi' }] });
        });

        it('throws MethodNotFound for an unknown tool', async () => {
            const call = registry.invoke(makeContext(), 'missing', {});
            await expect(call).rejects.toBeInstanceOf(RpcError);
            await expect(registry.invoke(makeContext(), 'missing', {})).rejects.toMatchObject({
                code: ErrorCode.MethodNotFound,
                message: 'tool not found: missing',
            });
        });

        it('turns invalid arguments into a domain error', async () => {
            registry.register(echoTool());
            const result = await registry.invoke(makeContext(), 'echo', {});
            expect(result).toEqual({ kind: 'error', message: 'Invalid arguments for tool echo: msg: Required' });
        });

        it('turns a handler throw into a domain error and keeps serving', async () => {
            registry.register(defineTool({
                name: 'boom',
                description: 'Always throws',
                inputSchema: z.object({}),
                handler: async () => {
                    throw new Error('kaput');
                },
            }));
            registry.register(echoTool());

            const failed = await registry.invoke(makeContext(), 'boom', {});
            const next = await registry.invoke(makeContext(), 'echo', { msg: 'still here' });

            expect(failed).toEqual({ kind: 'error', message: 'Error executing tool boom: kaput' });
            expect(next).toEqual({ kind: 'content', blocks: [{ type: 'text', text: 'still here' }] });
            expect(logger.error).toHaveBeenCalledWith('Error executing tool "boom": kaput');
        });

        it('passes the context through to the handler', async () => {
            const seen: string[] = [];
            registry.register(defineTool({
                name: 'transport',
                description: 'Reports the transport',
                inputSchema: z.object({}),
                handler: async ctx => {
                    seen.push(ctx.transport);
                    return textResult(ctx.transport);
                },
            }));

            await registry.invoke(makeContext({ transport: 'http' }), 'transport', {});
            expect(seen).toEqual(['http']);
        });
    });
});
