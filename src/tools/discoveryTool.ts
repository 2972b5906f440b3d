import { z } from 'zod';
import { RegisteredTool, JsonValue } from '../types/toolTypes.js';
import { PlatformApiClient } from '../services/PlatformApiClient.js';
import { ServiceStack } from '../types/apiTypes.js';
import { domainError, rawResult } from '../utils/toolHelpers.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { IdSchema, MISSING_PROJECT_MESSAGE, ToolDependencies, defineClientTool, resolveProjectId } from './toolSupport.js';

export const discoveryInputSchema = z.object({
    project_id: IdSchema.optional().describe('Project ID. Defaults to the $projectId environment variable.'),
}).strict();

type ServiceSummary = {
    id: string;
    hostname: string;
    type: string | null;
    status: string;
    environment_variables: { service_env_keys: string[] };
    running_processes: Array<{ id: string; status: string; created: string | null }>;
    public_access: { subdomain_access: boolean };
};

/**
 * Env keys and running processes are best-effort: a failure there is logged and leaves the list empty.
 */
async function summarizeService(client: PlatformApiClient, service: ServiceStack, signal: AbortSignal): Promise<ServiceSummary> {
    const [envKeys, processes] = await Promise.all([
        client.getServiceStackEnv(service.id, signal)
            .then(env => env.map(item => item.key))
            .catch((error: unknown) => {
                logger.warn(`Could not read env of service ${service.id}: ${errorMessage(error)}`);
                return [];
            }),
        client.searchProcesses([
            { name: 'serviceStackId', operator: 'eq', value: service.id },
            { name: 'status', operator: 'eq', value: 'RUNNING' },
        ], signal)
            .then(items => items.map(process => ({ id: process.id, status: process.status, created: process.created ?? null })))
            .catch((error: unknown) => {
                logger.warn(`Could not read processes of service ${service.id}: ${errorMessage(error)}`);
                return [];
            }),
    ]);

    return {
        id: service.id,
        hostname: service.name,
        type: service.serviceStackTypeInfo?.serviceStackTypeVersionName ?? null,
        status: service.status,
        environment_variables: { service_env_keys: envKeys },
        running_processes: processes,
        public_access: { subdomain_access: service.subdomainAccess ?? false },
    };
}

export function createDiscoveryTool(deps: ToolDependencies): RegisteredTool {
    return defineClientTool({
        name: 'discovery',
        description: 'Shows a project with its services: IDs, hostnames, types, status, env variable keys, public access and running processes. Start every session here.',
        inputSchema: discoveryInputSchema,
        failurePrefix: 'Failed to discover project',
        handler: async (client, args, ctx) => {
            const projectId = resolveProjectId(args.project_id, deps.settings);
            if (!projectId) {
                return domainError(MISSING_PROJECT_MESSAGE);
            }

            const details = await client.getProject(projectId, ctx.signal);
            const [project] = await client.searchProjects([
                { name: 'id', operator: 'eq', value: projectId },
                { name: 'clientId', operator: 'eq', value: details.clientId },
            ], ctx.signal);
            if (!project) {
                return domainError(`Project not found: ${projectId}`);
            }

            const projectSummary = {
                id: project.id,
                name: project.name,
                environment_variables: { project_env_keys: project.envList.map(item => item.key) },
            };

            const services = await client.searchServiceStacks([
                { name: 'projectId', operator: 'eq', value: projectId },
                { name: 'clientId', operator: 'eq', value: details.clientId },
            ], ctx.signal);

            if (services.length === 0) {
                const empty: JsonValue = {
                    services: [],
                    count: 0,
                    project: projectSummary,
                    message: "No services found in this project. Use 'import_services' to add services.",
                };
                return rawResult(empty);
            }

            const summaries = await Promise.all(services.map(service => summarizeService(client, service, ctx.signal)));
            return rawResult({
                services: summaries,
                count: summaries.length,
                project: projectSummary,
            });
        },
    });
}
