import { z } from 'zod';
import { parse as parseYaml } from 'yaml';
import { RegisteredTool } from '../types/toolTypes.js';
import { ServiceStackType } from '../types/apiTypes.js';
import { ServiceTypeCatalogue } from '../services/ServiceTypeCatalogue.js';
import { UpstreamError, errorMessage } from '../utils/errors.js';
import { domainError, formatZodIssues, rawResult } from '../utils/toolHelpers.js';
import { logger } from '../utils/logger.js';
import { IdSchema, MISSING_PROJECT_MESSAGE, ToolDependencies, defineClientTool, resolveProjectId } from './toolSupport.js';

const INTERNAL_TYPE_PREFIXES = ['build ', 'prepare ', 'zbuild '];
const HIDDEN_TYPE_NAMES = new Set(['MongoDB', 'RabbitMQ', 'Core', 'L7 HTTP Balancer', 'Generic Runtime']);

/**
 * Flattens the type catalogue into `name@version` strings, default version first, skipping internal types.
 */
export function listServiceTypeNames(types: ServiceStackType[]): string[] {
    const names: string[] = [];
    for (const type of types) {
        if (INTERNAL_TYPE_PREFIXES.some(prefix => type.name.startsWith(prefix)) || HIDDEN_TYPE_NAMES.has(type.name)) {
            continue;
        }
        if (type.defaultServiceStackVersion) {
            names.push(`${type.name}@${type.defaultServiceStackVersion.name}`);
        }
        for (const version of type.serviceStackTypeVersionList) {
            names.push(`${type.name}@${version.name}`);
        }
    }
    return names;
}

const ImportYamlSchema = z.object({
    services: z.array(z.object({
        hostname: z.string().optional(),
        type: z.string(),
    }).passthrough()).min(1),
}).passthrough();

export type TypeReview = {
    rejected: string[];
    warnings: string[];
};

/**
 * Checks every service `type` of an import document against the bundled catalogue.
 * Names the platform never accepts are rejected; types missing from the bundled list only warn.
 */
export function reviewServiceTypes(services: Array<{ hostname?: string; type: string }>, catalogue: ServiceTypeCatalogue): TypeReview {
    const review: TypeReview = { rejected: [], warnings: [] };
    for (const service of services) {
        const label = service.hostname ? `${service.hostname}: '${service.type}'` : `'${service.type}'`;
        const check = catalogue.check(service.type);
        if (check.status === 'wrong') {
            review.rejected.push(`${label} is not a valid service type, use ${check.hint}`);
        } else if (check.status === 'unknown') {
            review.warnings.push(`${label} is not in the bundled type list${check.hint ? `, ${check.hint}` : ''}`);
        }
    }
    return review;
}

export const importServicesInputSchema = z.object({
    project_id: IdSchema.optional().describe('Project ID. Defaults to the $projectId environment variable.'),
    yaml: z.string().min(1).describe('Import YAML with a top-level `services` list (hostname, type, mode, ...).'),
}).strict();

export function createImportTools(deps: ToolDependencies): RegisteredTool[] {
    return [
        defineClientTool({
            name: 'get_service_types',
            description: 'Lists the service types (name@version) that can be used in import YAML.',
            inputSchema: z.object({}).strict(),
            failurePrefix: 'Failed to get service types',
            handler: async (client, _args, ctx) => {
                const serviceTypes = listServiceTypeNames(await client.searchServiceStackTypes(ctx.signal));
                return rawResult({
                    service_types: serviceTypes,
                    count: serviceTypes.length,
                    note: 'Use knowledge_base tool for detailed configuration examples',
                });
            },
        }),
        defineClientTool({
            name: 'import_services',
            description: 'Creates services in a project from import YAML. Service types are checked before the import is sent.',
            inputSchema: importServicesInputSchema,
            failurePrefix: 'Import failed',
            handler: async (client, args, ctx) => {
                const projectId = resolveProjectId(args.project_id, deps.settings);
                if (!projectId) {
                    return domainError(MISSING_PROJECT_MESSAGE);
                }

                let document: unknown;
                try {
                    document = parseYaml(args.yaml);
                } catch (error: unknown) {
                    return domainError(`Invalid YAML: ${errorMessage(error)}`);
                }
                const parsed = ImportYamlSchema.safeParse(document);
                if (!parsed.success) {
                    return domainError(`Invalid import YAML: ${formatZodIssues(parsed.error)}`);
                }

                const review = reviewServiceTypes(parsed.data.services, deps.serviceTypes);
                if (review.rejected.length > 0) {
                    return domainError(`Invalid service types:\n- ${review.rejected.join('\n- ')}\n\nCheck available types with 'get_service_types'.`);
                }
                review.warnings.forEach(warning => logger.warn(`Import into ${projectId}: ${warning}`));

                try {
                    const result = await client.importServiceStacks(projectId, args.yaml, ctx.signal);
                    return rawResult({
                        status: 'import_completed',
                        project_id: result.projectId,
                        project_name: result.projectName,
                        service_stacks: result.serviceStacks.map(stack => ({
                            id: stack.id,
                            name: stack.name,
                            process_ids: stack.processes.map(process => process.id),
                            error: stack.error ? { code: stack.error.code, message: stack.error.message } : null,
                        })),
                        warnings: review.warnings,
                        message: "Services imported successfully. Use 'discovery' tool to see details.",
                    });
                } catch (error: unknown) {
                    if (error instanceof UpstreamError && error.upstreamCode === 'serviceStackTypeNotFound') {
                        return domainError("Service type not found. Check available types with 'get_service_types' or 'knowledge_base'");
                    }
                    throw error;
                }
            },
        }),
    ];
}
