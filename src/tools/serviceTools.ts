import { z } from 'zod';
import { RegisteredTool } from '../types/toolTypes.js';
import { AutoscalingUpdate, Process } from '../types/apiTypes.js';
import { PlatformApiClient } from '../services/PlatformApiClient.js';
import { defineTool, rawResult, textResult } from '../utils/toolHelpers.js';
import { IdSchema, defineClientTool } from './toolSupport.js';

const serviceIdInput = z.object({
    service_id: IdSchema.describe('Service ID as reported by discovery (not the hostname).'),
}).strict();

type ServiceAction = (client: PlatformApiClient, serviceId: string, signal: AbortSignal) => Promise<Process>;

/**
 * Builds a tool that fires one service-level action and reports the resulting process.
 */
function processTool(name: string, description: string, failurePrefix: string, action: ServiceAction, message: string): RegisteredTool {
    return defineClientTool({
        name,
        description,
        inputSchema: serviceIdInput,
        failurePrefix,
        handler: async (client, args, ctx) => {
            const process = await action(client, args.service_id, ctx.signal);
            return rawResult({
                process_id: process.id,
                service_id: args.service_id,
                status: process.status,
                message,
            });
        },
    });
}

export const scaleServiceInputSchema = z.object({
    service_id: IdSchema.describe('Service ID as reported by discovery.'),
    min_cpu: z.number().min(0.25).max(20).optional().describe('Minimum vCPU (0.25-20).'),
    max_cpu: z.number().min(0.25).max(20).optional().describe('Maximum vCPU (0.25-20).'),
    min_ram: z.number().min(0.5).max(32).optional().describe('Minimum RAM in GB (0.5-32).'),
    max_ram: z.number().min(0.5).max(32).optional().describe('Maximum RAM in GB (0.5-32).'),
    min_containers: z.number().int().min(1).max(6).optional().describe('Minimum container count (1-6).'),
    max_containers: z.number().int().min(1).max(6).optional().describe('Maximum container count (1-6).'),
}).strict().superRefine((args, issue) => {
    const pairs: Array<[keyof typeof args, keyof typeof args]> = [
        ['min_cpu', 'max_cpu'],
        ['min_ram', 'max_ram'],
        ['min_containers', 'max_containers'],
    ];
    for (const [minKey, maxKey] of pairs) {
        const min = args[minKey];
        const max = args[maxKey];
        if (typeof min === 'number' && typeof max === 'number' && min > max) {
            issue.addIssue({ code: z.ZodIssueCode.custom, path: [minKey], message: `must not exceed ${maxKey}` });
        }
    }
    const { service_id: _serviceId, ...limits } = args;
    if (Object.values(limits).every(value => value === undefined)) {
        issue.addIssue({ code: z.ZodIssueCode.custom, message: 'at least one scaling parameter is required' });
    }
});

export const remountInputSchema = z.object({
    service_name: z.string()
        .regex(/^[A-Za-z0-9]+$/, 'must contain only letters and digits')
        .describe('Service hostname to remount, e.g. "api".'),
}).strict();

export function buildRemountCommands(serviceName: string) {
    const mountPath = `/var/www/${serviceName}`;
    const sshfsOptions = 'StrictHostKeyChecking=no,reconnect,ServerAliveInterval=15,ServerAliveCountMax=3,auto_cache,kernel_cache';
    const checkMount = `mount | grep "${mountPath}"`;
    const unmount = `fusermount -u "${mountPath}" 2>/dev/null || umount "${mountPath}" 2>/dev/null || true`;
    const mkdir = `mkdir -p "${mountPath}"`;
    const sshfs = `sshfs -o ${sshfsOptions} "${serviceName}:/var/www" "${mountPath}"`;
    const combined = [
        `if mount | grep -q "${mountPath}"; then`,
        `    ${unmount}`,
        'fi',
        mkdir,
        sshfs,
    ].join('\n');
    return { mountPath, checkMount, unmount, mkdir, sshfs, combined };
}

export function createServiceTools(): RegisteredTool[] {
    return [
        processTool(
            'start_service',
            'Starts a stopped service.',
            'Failed to start service',
            (client, id, signal) => client.startServiceStack(id, signal),
            "Service start initiated. Use 'get_process_status' to monitor progress.",
        ),
        processTool(
            'stop_service',
            'Stops a running service.',
            'Failed to stop service',
            (client, id, signal) => client.stopServiceStack(id, signal),
            "Service stop initiated. Use 'get_process_status' to monitor progress.",
        ),
        processTool(
            'enable_preview_subdomain',
            'Enables the public zerops.app preview subdomain of a service.',
            'Failed to enable subdomain',
            (client, id, signal) => client.enableSubdomainAccess(id, signal),
            "Subdomain enablement started. Use 'get_process_status' to check progress, then 'discovery' to see the URL.",
        ),
        processTool(
            'disable_preview_subdomain',
            'Disables the public zerops.app preview subdomain of a service.',
            'Failed to disable subdomain',
            (client, id, signal) => client.disableSubdomainAccess(id, signal),
            "Subdomain disablement started. Use 'get_process_status' to check progress.",
        ),
        defineClientTool({
            name: 'restart_service',
            description: 'Restarts a service (stop, then start). Use after changing env variables.',
            inputSchema: serviceIdInput,
            failurePrefix: 'Failed to restart service',
            handler: async (client, args, ctx) => {
                const service = await client.getServiceStack(args.service_id, ctx.signal);
                const stopProcess = await client.stopServiceStack(args.service_id, ctx.signal);
                const startProcess = await client.startServiceStack(args.service_id, ctx.signal);
                return rawResult({
                    process_id: startProcess.id,
                    service_id: args.service_id,
                    service_name: service.name,
                    status: startProcess.status,
                    action_name: startProcess.actionName ?? null,
                    created: startProcess.created ?? null,
                    stop_process_id: stopProcess.id,
                    start_process_id: startProcess.id,
                    message: "Service restart initiated (stop + start). Use 'get_process_status' to monitor progress.",
                });
            },
        }),
        defineClientTool({
            name: 'service_delete',
            description: 'Deletes a service and its data. Requires confirm: true.',
            inputSchema: z.object({
                service_id: IdSchema.describe('Service ID as reported by discovery (not the hostname).'),
                confirm: z.boolean().default(false).describe('Must be true to delete.'),
            }).strict(),
            failurePrefix: 'Failed to delete service',
            handler: async (client, args, ctx) => {
                if (!args.confirm) {
                    return textResult('Deletion cancelled. Set confirm=true to proceed.');
                }
                const process = await client.deleteServiceStack(args.service_id, ctx.signal);
                return textResult(`Service deletion initiated\nProcess ID: ${process.id}`);
            },
        }),
        defineClientTool({
            name: 'scale_service',
            description: 'Updates the vertical (CPU, RAM) and horizontal (container count) autoscaling limits of a service.',
            inputSchema: scaleServiceInputSchema,
            failurePrefix: 'Failed to scale service',
            handler: async (client, args, ctx) => {
                const update: AutoscalingUpdate = {
                    minCpu: args.min_cpu,
                    maxCpu: args.max_cpu,
                    minRam: args.min_ram,
                    maxRam: args.max_ram,
                    minContainers: args.min_containers,
                    maxContainers: args.max_containers,
                };
                const process = await client.updateAutoscaling(args.service_id, update, ctx.signal);
                return rawResult({
                    process_id: process.id,
                    service_id: args.service_id,
                    status: process.status,
                    parameters: {
                        min_cpu: args.min_cpu ?? null,
                        max_cpu: args.max_cpu ?? null,
                        min_ram: args.min_ram ?? null,
                        max_ram: args.max_ram ?? null,
                        min_containers: args.min_containers ?? null,
                        max_containers: args.max_containers ?? null,
                    },
                    message: "Scaling update started. Use 'get_process_status' to monitor progress.",
                });
            },
        }),
        defineTool({
            name: 'remount_service',
            description: 'Returns the shell commands that (re)mount a service filesystem over SSHFS at /var/www/<service_name>. Nothing is executed.',
            inputSchema: remountInputSchema,
            handler: async (_ctx, args) => {
                const commands = buildRemountCommands(args.service_name);
                return rawResult({
                    status: 'success',
                    service_name: args.service_name,
                    mount_path: commands.mountPath,
                    commands: {
                        check_mount: commands.checkMount,
                        unmount: commands.unmount,
                        mkdir: commands.mkdir,
                        sshfs: commands.sshfs,
                        combined: commands.combined,
                    },
                    message: `Commands to remount SSHFS for service '${args.service_name}':`,
                });
            },
        }),
    ];
}
