import { z } from 'zod';
import { RegisteredTool } from '../types/toolTypes.js';
import { Process } from '../types/apiTypes.js';
import { rawResult } from '../utils/toolHelpers.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { IdSchema, defineClientTool } from './toolSupport.js';

type ProcessSummary = {
    id: string;
    status: string;
    action_name: string | null;
    created: string | null;
};

function summarize(process: Process): ProcessSummary {
    return {
        id: process.id,
        status: process.status,
        action_name: process.actionName ?? null,
        created: process.created ?? null,
    };
}

export function createProcessTools(): RegisteredTool[] {
    return [
        defineClientTool({
            name: 'get_process_status',
            description: 'Shows the status of an asynchronous platform process (start, stop, import, subdomain, ...).',
            inputSchema: z.object({
                process_id: IdSchema.describe('Process ID returned by another tool.'),
            }).strict(),
            failurePrefix: 'Failed to get process',
            handler: async (client, args, ctx) => {
                const process = await client.getProcess(args.process_id, ctx.signal);
                return rawResult({
                    process_id: process.id,
                    status: process.status,
                    action_name: process.actionName ?? null,
                    created: process.created ?? null,
                });
            },
        }),
        defineClientTool({
            name: 'get_running_processes',
            description: 'Lists processes of one service, or of every organisation the credential can access.',
            inputSchema: z.object({
                service_id: IdSchema.optional().describe('Limit to one service.'),
            }).strict(),
            failurePrefix: 'Failed to get processes',
            handler: async (client, args, ctx) => {
                if (args.service_id) {
                    const serviceId = args.service_id;
                    const service = await client.getServiceStack(serviceId, ctx.signal);
                    const processes = await client.searchProcesses([{ name: 'serviceStackId', operator: 'eq', value: serviceId }], ctx.signal);
                    return rawResult({
                        processes: processes.map(process => ({ ...summarize(process), service_name: service.name, service_id: serviceId })),
                        count: processes.length,
                        service: service.name,
                    });
                }

                const user = await client.getUserInfo(ctx.signal);
                const perOrganisation = await Promise.all(user.clientUserList.map(clientUser =>
                    client.searchProcesses([{ name: 'clientId', operator: 'eq', value: clientUser.clientId }], ctx.signal)
                        .catch((error: unknown) => {
                            logger.warn(`Skipping processes of organisation ${clientUser.client.accountName}: ${errorMessage(error)}`);
                            return [];
                        })));
                const processes = perOrganisation.flat().map(summarize);

                if (processes.length === 0) {
                    return rawResult({ processes: [], count: 0, message: 'No running processes found' });
                }
                return rawResult({ processes, count: processes.length });
            },
        }),
    ];
}
