import { z } from 'zod';
import { RegisteredTool } from '../types/toolTypes.js';
import { rawResult } from '../utils/toolHelpers.js';
import { IdSchema, defineClientTool } from './toolSupport.js';

const EnvKeySchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a valid environment variable name');

export function createEnvironmentTools(): RegisteredTool[] {
    return [
        defineClientTool({
            name: 'set_project_env',
            description: 'Creates a project-level environment variable shared by all services. Restart services to pick it up.',
            inputSchema: z.object({
                project_id: IdSchema,
                key: EnvKeySchema,
                value: z.string(),
            }).strict(),
            failurePrefix: 'Failed to set project environment variable',
            handler: async (client, args, ctx) => {
                const process = await client.createProjectEnv(args.project_id, args.key, args.value, ctx.signal);
                return rawResult({
                    process_id: process.id,
                    status: 'env_var_set',
                    key: args.key,
                    message: `Project environment variable '${args.key}' has been set`,
                });
            },
        }),
        defineClientTool({
            name: 'set_service_env',
            description: 'Creates a service-level environment variable. Restart the service to pick it up.',
            inputSchema: z.object({
                service_id: IdSchema,
                key: EnvKeySchema,
                value: z.string(),
            }).strict(),
            failurePrefix: 'Failed to set service environment variable',
            handler: async (client, args, ctx) => {
                const process = await client.createServiceEnv(args.service_id, args.key, args.value, ctx.signal);
                return rawResult({
                    process_id: process.id,
                    status: 'env_var_set',
                    key: args.key,
                    message: `Service environment variable '${args.key}' has been set. Use 'restart_service' to apply it.`,
                });
            },
        }),
    ];
}
