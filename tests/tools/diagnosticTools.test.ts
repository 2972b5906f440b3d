import { jest } from '@jest/globals';

jest.mock('../../src/utils/logger', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

import { createDiagnosticTools, formatAuthSuccess } from '../../src/tools/diagnosticTools';
import { domainError, textResult } from '../../src/utils/toolHelpers';
import { FakeHttpServer } from '../support/fakeHttpServer';
import { findTool, makeClient, makeContext, makeDependencies } from '../support/toolFixtures';

const USER = {
    id: 'u1',
    email: 'dev@example.com',
    firstName: 'Dana',
    lastName: 'Dev',
    clientUserList: [
        { clientId: 'c1', client: { id: 'c1', accountName: 'Acme' } },
        { clientId: 'c2', client: { id: 'c2', accountName: 'Side Project' } },
    ],
};

describe('formatAuthSuccess', () => {
    it('lists the organisations', () => {
        expect(formatAuthSuccess(USER)).toBe(
            'Authentication successful\n\nUser: Dana Dev\nEmail: dev@example.com\n\nAccess to 2 organization(s):\n• Acme\n• Side Project\n',
        );
    });

    it('handles a user without a name', () => {
        expect(formatAuthSuccess({ id: 'u1', email: 'x@example.com', clientUserList: [] })).toBe(
            'Authentication successful\n\nUser: (no name)\nEmail: x@example.com\n\nAccess to 0 organization(s):\n',
        );
    });
});

describe('diagnostic tools', () => {
    const tools = createDiagnosticTools(makeDependencies());
    let upstream: FakeHttpServer;
    let baseUrl: string;

    beforeEach(async () => {
        upstream = new FakeHttpServer();
        baseUrl = await upstream.start();
    });

    afterEach(async () => {
        await upstream.stop();
    });

    it('validates the credential', async () => {
        upstream.route('GET', '/api/rest/public/user/info', { body: USER });

        const result = await findTool(tools, 'auth_validate').run(makeContext({ client: makeClient(baseUrl) }), {});

        expect(result).toEqual(textResult(formatAuthSuccess(USER)));
    });

    it('reports a rejected credential', async () => {
        upstream.route('GET', '/api/rest/public/user/info', { status: 401, body: { error: { code: 'unauthorized', message: 'invalid token' } } });

        const result = await findTool(tools, 'auth_validate').run(makeContext({ client: makeClient(baseUrl) }), {});

        expect(result).toEqual(domainError('Authentication failed: remote call failed: HTTP 401 unauthorized: invalid token'));
    });

    it('describes an anonymous stdio session', async () => {
        const result = await findTool(tools, 'debug_info').run(makeContext(), {});

        expect(result).toEqual(textResult([
            '=== CLIENT INFORMATION ===',
            'Client: unknown (no clientInfo sent in initialize)',
            '',
            '=== TRANSPORT ===',
            'Mode: stdio (local)',
            'Auth: ZEROPS_API_KEY environment variable',
            '',
            '=== SERVER ===',
            'Server: zerops-mcp',
            'Version: 1.0.0',
            `Node.js: ${process.version}`,
            `OS/Arch: ${process.platform}/${process.arch}`,
            '',
            '=== API CONNECTION ===',
            'Platform API: not initialized (no credential)',
            'Endpoint: http://api.invalid',
        ].join('\n')));
    });

    it('describes an HTTP caller with a working credential', async () => {
        upstream.route('GET', '/api/rest/public/user/info', { body: USER });
        const ctx = makeContext({ client: makeClient(baseUrl), clientInfo: { name: 'claude-ai', version: '0.1.0' }, transport: 'http' });

        const result = await findTool(tools, 'debug_info').run(ctx, {});
        if (result.kind !== 'content') {
            throw new Error('expected text content');
        }
        const lines = result.blocks[0].text.split('\n');

        expect(lines.slice(0, 7)).toEqual([
            '=== CLIENT INFORMATION ===',
            'Client: claude-ai',
            'Version: 0.1.0',
            'Detected model family: claude',
            '',
            '=== TRANSPORT ===',
            'Mode: HTTP (remote)',
        ]);
        expect(lines).toContain('Platform API: connected as dev@example.com');
    });
});
