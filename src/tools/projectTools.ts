import { z } from 'zod';
import { RegisteredTool } from '../types/toolTypes.js';
import { Project, Region } from '../types/apiTypes.js';
import { PlatformApiClient } from '../services/PlatformApiClient.js';
import { domainError, textResult } from '../utils/toolHelpers.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { IdSchema, defineClientTool } from './toolSupport.js';

interface OrganisationProject {
    project: Project;
    organisation: string;
}

export function formatProjectList(projects: OrganisationProject[]): string {
    if (projects.length === 0) {
        return "No projects found.\n\nCreate your first project with 'project_create'";
    }
    let message = `Found ${projects.length} project(s):\n\n`;
    projects.forEach(({ project, organisation }, index) => {
        message += `${index + 1}. ${project.name}\n`;
        message += `   ID: ${project.id}\n`;
        message += `   Organization: ${organisation}\n`;
        message += `   Status: ${project.status}\n`;
        if (project.description) {
            message += `   Description: ${project.description}\n`;
        }
        message += `   Created: ${project.created ?? 'unknown'}\n\n`;
    });
    return message;
}

export function formatProjectMatches(query: string, projects: Project[]): string {
    if (projects.length === 0) {
        return `No projects found matching '${query}'`;
    }
    let message = `Found ${projects.length} project(s) matching '${query}':\n\n`;
    projects.forEach((project, index) => {
        message += `${index + 1}. ${project.name}\n`;
        message += `   ID: ${project.id}\n`;
        message += `   Status: ${project.status}\n\n`;
    });
    return message;
}

export function formatRegionList(regions: Region[]): string {
    let message = `Available regions (${regions.length}):\n\n`;
    for (const region of regions) {
        message += `• ${region.name} - ${region.address}${region.isDefault ? ' [DEFAULT]' : ''}\n`;
    }
    return message;
}

/**
 * Projects of every organisation the credential belongs to. An organisation whose search fails is skipped.
 */
async function listOrganisationProjects(client: PlatformApiClient, signal: AbortSignal): Promise<OrganisationProject[]> {
    const user = await client.getUserInfo(signal);
    const perOrganisation = await Promise.all(user.clientUserList.map(async clientUser => {
        try {
            const projects = await client.searchProjects([{ name: 'clientId', operator: 'eq', value: clientUser.clientId }], signal);
            return projects.map(project => ({ project, organisation: clientUser.client.accountName }));
        } catch (error: unknown) {
            logger.warn(`Skipping projects of organisation ${clientUser.client.accountName}: ${errorMessage(error)}`);
            return [];
        }
    }));
    return perOrganisation.flat();
}

export function createProjectTools(): RegisteredTool[] {
    return [
        defineClientTool({
            name: 'project_list',
            description: 'Lists projects across all organisations the credential can access.',
            inputSchema: z.object({}).strict(),
            failurePrefix: 'Failed to list projects',
            handler: async (client, _args, ctx) => textResult(formatProjectList(await listOrganisationProjects(client, ctx.signal))),
        }),
        defineClientTool({
            name: 'project_search',
            description: 'Finds projects whose name contains the given text (case-insensitive).',
            inputSchema: z.object({
                name: z.string().min(1).describe('Project name or part of it.'),
            }).strict(),
            failurePrefix: 'Search failed',
            handler: async (client, args, ctx) => {
                const needle = args.name.toLowerCase();
                const matches = (await listOrganisationProjects(client, ctx.signal))
                    .map(({ project }) => project)
                    .filter(project => project.name.toLowerCase().includes(needle));
                return textResult(formatProjectMatches(args.name, matches));
            },
        }),
        defineClientTool({
            name: 'region_list',
            description: "Lists the platform regions usable as project_create's region.",
            inputSchema: z.object({}).strict(),
            failurePrefix: 'Failed to list regions',
            handler: async (client, _args, ctx) => textResult(formatRegionList(await client.getRegions(ctx.signal))),
        }),
        defineClientTool({
            name: 'project_create',
            description: 'Creates a project in the first organisation of the credential.',
            inputSchema: z.object({
                name: z.string().min(1).max(255),
                description: z.string().optional(),
                region: z.string().optional().describe('Region name; defaults to the platform default region.'),
            }).strict(),
            failurePrefix: 'Failed to create project',
            handler: async (client, args, ctx) => {
                const user = await client.getUserInfo(ctx.signal);
                const [organisation] = user.clientUserList;
                if (!organisation) {
                    return domainError('No organizations found for this user');
                }

                if (args.region) {
                    const regions = await client.getRegions(ctx.signal);
                    if (!regions.some(region => region.name === args.region)) {
                        return domainError(`Unknown region '${args.region}'. Available regions: ${regions.map(region => region.name).join(', ')}`);
                    }
                }

                const project = await client.createProject({
                    clientId: organisation.clientId,
                    name: args.name,
                    description: args.description,
                    location: args.region,
                }, ctx.signal);
                return textResult(`Project created successfully\n\nName: ${project.name}\nID: ${project.id}\n\nNext: Use 'import_services' to add services`);
            },
        }),
        defineClientTool({
            name: 'project_delete',
            description: 'Deletes a project and all its services. Requires confirm: true.',
            inputSchema: z.object({
                project_id: IdSchema,
                confirm: z.boolean().default(false).describe('Must be true to delete.'),
            }).strict(),
            failurePrefix: 'Failed to delete project',
            handler: async (client, args, ctx) => {
                if (!args.confirm) {
                    return textResult('Deletion cancelled. Set confirm=true to proceed.');
                }
                const process = await client.deleteProject(args.project_id, ctx.signal);
                return textResult(`Project deletion initiated\nProcess ID: ${process.id}`);
            },
        }),
    ];
}
