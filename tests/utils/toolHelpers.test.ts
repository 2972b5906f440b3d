import { z } from 'zod';
import { defineTool, domainError, formatZodIssues, rawResult, textResult } from '../../src/utils/toolHelpers';
import { makeContext } from '../support/toolFixtures';

describe('formatZodIssues', () => {
    it('joins issues as path: message pairs', () => {
        const schema = z.object({ name: z.string(), limits: z.object({ max: z.number() }) });
        const parsed = schema.safeParse({ limits: { max: 'x' } });
        if (parsed.success) {
            throw new Error('expected a failure');
        }
        expect(formatZodIssues(parsed.error)).toBe('name: Required; limits.max: Expected number, received string');
    });

    it('labels root issues', () => {
        const parsed = z.string().safeParse(1);
        if (parsed.success) {
            throw new Error('expected a failure');
        }
        expect(formatZodIssues(parsed.error)).toBe('(root): Expected string, received number');
    });
});

describe('result builders', () => {
    it('builds each handler outcome', () => {
        expect(textResult('a')).toEqual({ kind: 'content', blocks: [{ type: 'text', text: 'a' }] });
        expect(rawResult({ ok: true })).toEqual({ kind: 'raw', value: { ok: true } });
        expect(domainError('nope')).toEqual({ kind: 'error', message: 'nope' });
    });
});

describe('defineTool', () => {
    const tool = defineTool({
        name: 'greet',
        description: 'Greets',
        inputSchema: z.object({ name: z.string().default('world') }),
        handler: async (_ctx, args) => textResult(`hello ${args.name}`),
    });

    it('applies schema defaults to missing arguments', async () => {
        expect(await tool.run(makeContext(), undefined)).toEqual(textResult('hello world'));
    });

    it('reports a mismatch as a domain error', async () => {
        expect(await tool.run(makeContext(), { name: 5 })).toEqual(
            domainError('Invalid arguments for tool greet: name: Expected string, received number'),
        );
    });
});
