import { jest } from '@jest/globals';

jest.mock('../../src/utils/logger', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

import { createKnowledgeTools, formatName, formatSearchResults } from '../../src/tools/knowledgeTools';
import { KnowledgeClient } from '../../src/services/KnowledgeClient';
import { domainError, textResult } from '../../src/utils/toolHelpers';
import { FakeHttpServer } from '../support/fakeHttpServer';
import { findTool, makeContext, makeDependencies } from '../support/toolFixtures';

describe('formatName', () => {
    it('title-cases the parts of a slug', () => {
        expect(formatName('nextjs-postgres_app')).toBe('Nextjs Postgres App');
        expect(formatName('LARAVEL..jetstream')).toBe('Laravel Jetstream');
    });
});

describe('formatSearchResults', () => {
    it('lists each hit with its relevance', () => {
        expect(formatSearchResults('laravel', {
            count: 1,
            results: [{ id: 'recipe/laravel', name: 'laravel-jetstream', type: 'recipe', summary: 'Full stack', tags: ['php', 'mysql'], score: 0.876 }],
        })).toBe(
            'Found 1 result(s) for: laravel\n\n'
            + '1. Laravel Jetstream\n   ID: recipe/laravel\n   Type: recipe\n   Summary: Full stack\n   Tags: php, mysql\n   Relevance: 88%\n\n'
            + "Use 'knowledge_get' with the ID to retrieve full content.",
        );
    });

    it('suggests other terms when nothing matched', () => {
        expect(formatSearchResults('cobol', { results: [] })).toBe(
            'No results found for: cobol\n\n'
            + 'Try different search terms:\n'
            + '  • Framework names: laravel, django, nextjs\n'
            + '  • Service types: nodejs, postgresql, valkey\n'
            + '  • Features: database, cache, email',
        );
    });
});

describe('knowledge tools', () => {
    let upstream: FakeHttpServer;
    let baseUrl: string;

    beforeEach(async () => {
        upstream = new FakeHttpServer();
        baseUrl = await upstream.start();
    });

    afterEach(async () => {
        await upstream.stop();
    });

    function tools(remote: boolean) {
        const deps = remote ? makeDependencies({ knowledge: new KnowledgeClient({ baseUrl, timeoutMs: 2000 }) }) : makeDependencies();
        return createKnowledgeTools(deps);
    }

    it('returns bundled examples for an aliased runtime', async () => {
        const result = await findTool(tools(false), 'knowledge_base').run(makeContext(), { runtime: 'postgres' });
        expect(result).toMatchObject({ kind: 'raw', value: { runtime: 'PostgreSQL', deployment_yaml: null } });
    });

    it('offers the fallback pattern for an unknown runtime', async () => {
        const result = await findTool(tools(false), 'knowledge_base').run(makeContext(), { runtime: 'elixir' });
        expect(result).toMatchObject({
            kind: 'raw',
            value: {
                runtime: 'elixir',
                message: "Runtime 'elixir' not directly supported. Use Node.js pattern as reference.",
                pattern: { runtime: 'Node.js' },
            },
        });
    });

    it('loads a guide, falling back when the repository is unreachable', async () => {
        const result = await findTool(tools(false), 'load_platform_guide').run(makeContext(), { path_type: 'add_services' });
        expect(result).toMatchObject({ kind: 'raw', value: { source: 'fallback', path_type: 'add_services', title: 'Add services' } });
    });

    it('searches the knowledge service', async () => {
        upstream.route('POST', '/api/v1/search', { body: { results: [{ id: 'service/valkey', name: 'valkey', type: 'service', score: 0.5 }] } });

        const result = await findTool(tools(true), 'knowledge_search').run(makeContext(), { query: 'cache' });

        expect(result).toEqual(textResult(
            'Found 1 result(s) for: cache\n\n1. Valkey\n   ID: service/valkey\n   Type: service\n   Relevance: 50%\n\n'
            + "Use 'knowledge_get' with the ID to retrieve full content.",
        ));
        expect(upstream.requests[0].body).toEqual({ query: 'cache', limit: 10 });
    });

    it('caps the search limit', async () => {
        const result = await findTool(tools(true), 'knowledge_search').run(makeContext(), { query: 'cache', limit: 50 });
        expect(result).toEqual(domainError('Invalid arguments for tool knowledge_search: limit: Number must be less than or equal to 20'));
    });

    it('reports an unreachable knowledge service as a domain error', async () => {
        const result = await findTool(tools(false), 'knowledge_search').run(makeContext(), { query: 'cache' });
        if (result.kind !== 'error') {
            throw new Error('expected a domain error');
        }
        expect(result.message.startsWith('knowledge service unavailable (http://127.0.0.1:9): ')).toBe(true);
        expect(result.message.endsWith('. Please try again later.')).toBe(true);
    });

    it('renders a knowledge item as JSON', async () => {
        upstream.route('GET', '/api/v1/knowledge/recipe/laravel', {
            body: { id: 'recipe/laravel', name: 'laravel', type: 'recipe', content: { services: ['app'] } },
        });

        const result = await findTool(tools(true), 'knowledge_get').run(makeContext(), { id: 'recipe/laravel' });

        expect(result).toEqual(textResult(
            'Knowledge: Laravel\nType: recipe\nID: recipe/laravel\n\nContent:\n```json\n{\n  "services": [\n    "app"\n  ]\n}\n```',
        ));
    });

    it('says so when an item does not exist', async () => {
        const result = await findTool(tools(true), 'knowledge_get').run(makeContext(), { id: 'recipe/unknown' });
        expect(result).toEqual(textResult("Knowledge not found: recipe/unknown\n\nUse 'knowledge_search' to find available content."));
    });

    it('rejects an id without a type prefix', async () => {
        const result = await findTool(tools(true), 'knowledge_get').run(makeContext(), { id: 'laravel' });
        expect(result).toEqual(domainError(
            'Invalid ID format: laravel\n\nExpected format: {type}/{name}\nExamples:\n  • service/nodejs\n  • recipe/laravel',
        ));
        expect(upstream.requests).toEqual([]);
    });
});
