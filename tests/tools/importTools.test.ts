import { jest } from '@jest/globals';

jest.mock('../../src/utils/logger', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

import { logger } from '../../src/utils/logger';
import { createImportTools, listServiceTypeNames, reviewServiceTypes } from '../../src/tools/importTools';
import { ServiceTypeCatalogue } from '../../src/services/ServiceTypeCatalogue';
import { domainError, rawResult } from '../../src/utils/toolHelpers';
import { FakeHttpServer } from '../support/fakeHttpServer';
import { findTool, makeClient, makeContext, makeDependencies } from '../support/toolFixtures';

const API = '/api/rest/public';

describe('listServiceTypeNames', () => {
    it('lists default then other versions and skips internal types', () => {
        expect(listServiceTypeNames([
            { name: 'nodejs', defaultServiceStackVersion: { name: '20' }, serviceStackTypeVersionList: [{ name: '18' }] },
            { name: 'build nodejs', defaultServiceStackVersion: { name: '20' }, serviceStackTypeVersionList: [] },
            { name: 'Core', defaultServiceStackVersion: null, serviceStackTypeVersionList: [{ name: '1' }] },
            { name: 'valkey', serviceStackTypeVersionList: [{ name: '7' }] },
        ])).toEqual(['nodejs@20', 'nodejs@18', 'valkey@7']);
    });
});

describe('reviewServiceTypes', () => {
    it('rejects known wrong names and warns about unlisted ones', () => {
        expect(reviewServiceTypes([
            { hostname: 'cache', type: 'redis@7' },
            { hostname: 'db', type: 'postgresql@16' },
            { type: 'bun@1' },
        ], new ServiceTypeCatalogue())).toEqual({
            rejected: ["cache: 'redis@7' is not a valid service type, use valkey (Redis-compatible, use valkey@7)"],
            warnings: ["'bun@1' is not in the bundled type list"],
        });
    });
});

describe('import tools', () => {
    const tools = createImportTools(makeDependencies());
    let upstream: FakeHttpServer;
    let baseUrl: string;

    beforeEach(async () => {
        jest.clearAllMocks();
        upstream = new FakeHttpServer();
        baseUrl = await upstream.start();
    });

    afterEach(async () => {
        await upstream.stop();
    });

    function run(name: string, args: unknown) {
        return findTool(tools, name).run(makeContext({ client: makeClient(baseUrl) }), args);
    }

    it('lists the live service types', async () => {
        upstream.route('POST', `${API}/service-stack-type/search`, {
            body: { items: [{ name: 'postgresql', defaultServiceStackVersion: { name: '16' } }] },
        });

        expect(await run('get_service_types', {})).toEqual(rawResult({
            service_types: ['postgresql@16'],
            count: 1,
            note: 'Use knowledge_base tool for detailed configuration examples',
        }));
    });

    describe('import_services', () => {
        const yaml = 'services:\n  - hostname: api\n    type: nodejs@20\n  - hostname: edge\n    type: bun@1\n';

        it('sends the YAML and summarises the created stacks', async () => {
            upstream.route('POST', `${API}/service-stack/import`, {
                body: {
                    projectId: 'p1',
                    projectName: 'demo',
                    serviceStacks: [
                        { id: 's1', name: 'api', processes: [{ id: 'proc1', status: 'PENDING' }] },
                        { id: 's2', name: 'edge', error: { code: 'quota', message: 'limit reached' } },
                    ],
                },
            });

            const result = await run('import_services', { project_id: 'p1', yaml });

            expect(result).toEqual(rawResult({
                status: 'import_completed',
                project_id: 'p1',
                project_name: 'demo',
                service_stacks: [
                    { id: 's1', name: 'api', process_ids: ['proc1'], error: null },
                    { id: 's2', name: 'edge', process_ids: [], error: { code: 'quota', message: 'limit reached' } },
                ],
                warnings: ["edge: 'bun@1' is not in the bundled type list"],
                message: "Services imported successfully. Use 'discovery' tool to see details.",
            }));
            expect(upstream.requests[0].body).toEqual({ projectId: 'p1', yaml });
            expect(logger.warn).toHaveBeenCalledWith("Import into p1: edge: 'bun@1' is not in the bundled type list");
        });

        it('stops before the API on a known wrong type', async () => {
            const result = await run('import_services', { project_id: 'p1', yaml: 'services:\n  - hostname: cache\n    type: redis@7\n' });

            expect(result).toEqual(domainError(
                "Invalid service types:\n- cache: 'redis@7' is not a valid service type, use valkey (Redis-compatible, use valkey@7)\n\nCheck available types with 'get_service_types'.",
            ));
            expect(upstream.requests).toEqual([]);
        });

        it('rejects YAML without a services list', async () => {
            expect(await run('import_services', { project_id: 'p1', yaml: 'project:\n  name: demo\n' })).toEqual(
                domainError('Invalid import YAML: services: Required'),
            );
        });

        it('rejects unparseable YAML', async () => {
            const result = await run('import_services', { project_id: 'p1', yaml: 'services: [\n' });
            expect(result.kind).toBe('error');
            expect(result.kind === 'error' && result.message.startsWith('Invalid YAML: ')).toBe(true);
        });

        it('explains an unknown type reported by the API', async () => {
            upstream.route('POST', `${API}/service-stack/import`, {
                status: 400,
                body: { error: { code: 'serviceStackTypeNotFound', message: 'nope' } },
            });

            expect(await run('import_services', { project_id: 'p1', yaml })).toEqual(
                domainError("Service type not found. Check available types with 'get_service_types' or 'knowledge_base'"),
            );
        });

        it('passes other API failures through the tool prefix', async () => {
            upstream.route('POST', `${API}/service-stack/import`, { status: 403, body: { error: { code: 'forbidden', message: 'no access' } } });

            expect(await run('import_services', { project_id: 'p1', yaml })).toEqual(
                domainError('Import failed: remote call failed: HTTP 403 forbidden: no access'),
            );
        });
    });
});
