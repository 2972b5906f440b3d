import { jest } from '@jest/globals';

jest.mock('../../src/utils/logger', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

import { createProjectTools, formatProjectList } from '../../src/tools/projectTools';
import { domainError, textResult } from '../../src/utils/toolHelpers';
import { FakeHttpServer } from '../support/fakeHttpServer';
import { findTool, makeClient, makeContext } from '../support/toolFixtures';

const API = '/api/rest/public';

const USER = {
    id: 'u1',
    email: 'dev@example.com',
    clientUserList: [{ clientId: 'c1', client: { id: 'c1', accountName: 'Acme' } }],
};

describe('formatProjectList', () => {
    it('numbers projects with their organisation', () => {
        expect(formatProjectList([
            {
                project: { id: 'p1', clientId: 'c1', name: 'demo', status: 'ACTIVE', description: 'Demo app', created: '2024-05-01', envList: [] },
                organisation: 'Acme',
            },
            {
                project: { id: 'p2', clientId: 'c1', name: 'blog', status: 'CREATING', envList: [] },
                organisation: 'Acme',
            },
        ])).toBe(
            'Found 2 project(s):\n\n'
            + '1. demo\n   ID: p1\n   Organization: Acme\n   Status: ACTIVE\n   Description: Demo app\n   Created: 2024-05-01\n\n'
            + '2. blog\n   ID: p2\n   Organization: Acme\n   Status: CREATING\n   Created: unknown\n\n',
        );
    });

    it('suggests creating a project when there are none', () => {
        expect(formatProjectList([])).toBe("No projects found.\n\nCreate your first project with 'project_create'");
    });
});

describe('project tools', () => {
    const tools = createProjectTools();
    let upstream: FakeHttpServer;
    let baseUrl: string;

    beforeEach(async () => {
        upstream = new FakeHttpServer();
        baseUrl = await upstream.start();
    });

    afterEach(async () => {
        await upstream.stop();
    });

    function run(name: string, args: unknown) {
        return findTool(tools, name).run(makeContext({ client: makeClient(baseUrl) }), args);
    }

    it('lists projects of each organisation', async () => {
        upstream
            .route('GET', `${API}/user/info`, { body: USER })
            .route('POST', `${API}/project/search`, { body: { items: [{ id: 'p1', clientId: 'c1', name: 'demo', status: 'ACTIVE' }] } });

        expect(await run('project_list', {})).toEqual(textResult(
            'Found 1 project(s):\n\n1. demo\n   ID: p1\n   Organization: Acme\n   Status: ACTIVE\n   Created: unknown\n\n',
        ));
        expect(upstream.requestsTo('POST', `${API}/project/search`)[0].body).toEqual({
            search: [{ name: 'clientId', operator: 'eq', value: 'c1' }],
        });
    });

    describe('project_create', () => {
        it('creates the project in the first organisation', async () => {
            upstream
                .route('GET', `${API}/user/info`, { body: USER })
                .route('POST', `${API}/project`, { body: { id: 'p9', clientId: 'c1', name: 'shop', status: 'CREATING' } });

            expect(await run('project_create', { name: 'shop', description: 'Store' })).toEqual(textResult(
                "Project created successfully\n\nName: shop\nID: p9\n\nNext: Use 'import_services' to add services",
            ));
            expect(upstream.requestsTo('POST', `${API}/project`)[0].body).toEqual({
                clientId: 'c1',
                name: 'shop',
                description: 'Store',
                tagList: [],
            });
        });

        it('sends a known region as the location', async () => {
            upstream
                .route('GET', `${API}/user/info`, { body: USER })
                .route('GET', `${API}/region`, { body: { items: [{ name: 'prg1', address: 'api.prg1', isDefault: true }] } })
                .route('POST', `${API}/project`, { body: { id: 'p9', clientId: 'c1', name: 'shop', status: 'CREATING' } });

            await run('project_create', { name: 'shop', region: 'prg1' });

            expect(upstream.requestsTo('POST', `${API}/project`)[0].body).toEqual({
                clientId: 'c1',
                name: 'shop',
                location: 'prg1',
                tagList: [],
            });
        });

        it('rejects an unknown region', async () => {
            upstream
                .route('GET', `${API}/user/info`, { body: USER })
                .route('GET', `${API}/region`, { body: { items: [{ name: 'prg1', address: 'a' }, { name: 'fra1', address: 'b' }] } });

            expect(await run('project_create', { name: 'shop', region: 'mars1' })).toEqual(
                domainError("Unknown region 'mars1'. Available regions: prg1, fra1"),
            );
            expect(upstream.requestsTo('POST', `${API}/project`)).toEqual([]);
        });

        it('needs an organisation', async () => {
            upstream.route('GET', `${API}/user/info`, { body: { id: 'u1', email: 'dev@example.com' } });

            expect(await run('project_create', { name: 'shop' })).toEqual(domainError('No organizations found for this user'));
        });
    });

    describe('project_search', () => {
        it('matches part of the name regardless of case', async () => {
            upstream
                .route('GET', `${API}/user/info`, { body: USER })
                .route('POST', `${API}/project/search`, {
                    body: {
                        items: [
                            { id: 'p1', clientId: 'c1', name: 'Shop-Front', status: 'ACTIVE' },
                            { id: 'p2', clientId: 'c1', name: 'blog', status: 'ACTIVE' },
                            { id: 'p3', clientId: 'c1', name: 'shop-api', status: 'CREATING' },
                        ],
                    },
                });

            expect(await run('project_search', { name: 'shop' })).toEqual(textResult(
                "Found 2 project(s) matching 'shop':\n\n"
                + '1. Shop-Front\n   ID: p1\n   Status: ACTIVE\n\n'
                + '2. shop-api\n   ID: p3\n   Status: CREATING\n\n',
            ));
        });

        it('reports when nothing matches', async () => {
            upstream
                .route('GET', `${API}/user/info`, { body: USER })
                .route('POST', `${API}/project/search`, { body: { items: [{ id: 'p2', clientId: 'c1', name: 'blog', status: 'ACTIVE' }] } });

            expect(await run('project_search', { name: 'shop' })).toEqual(textResult("No projects found matching 'shop'"));
        });

        it('requires a name', async () => {
            expect(await run('project_search', { name: '' })).toEqual(
                domainError('Invalid arguments for tool project_search: name: String must contain at least 1 character(s)'),
            );
        });
    });

    describe('region_list', () => {
        it('lists regions and marks the default', async () => {
            upstream.route('GET', `${API}/region`, {
                body: { items: [{ name: 'prg1', address: 'api.app-prg1.zerops.io', isDefault: true }, { name: 'fra1', address: 'api.app-fra1.zerops.io' }] },
            });

            expect(await run('region_list', {})).toEqual(textResult(
                'Available regions (2):\n\n• prg1 - api.app-prg1.zerops.io [DEFAULT]\n• fra1 - api.app-fra1.zerops.io\n',
            ));
        });
    });

    describe('project_delete', () => {
        it('does nothing without confirmation', async () => {
            expect(await run('project_delete', { project_id: 'p1' })).toEqual(textResult('Deletion cancelled. Set confirm=true to proceed.'));
            expect(upstream.requests).toEqual([]);
        });

        it('deletes when confirmed', async () => {
            upstream.route('DELETE', `${API}/project/p1`, { body: { id: 'proc5', status: 'PENDING' } });

            expect(await run('project_delete', { project_id: 'p1', confirm: true })).toEqual(
                textResult('Project deletion initiated\nProcess ID: proc5'),
            );
        });
    });
});
