import { z } from 'zod';
import { JsonValue, RegisteredTool } from '../types/toolTypes.js';
import { LogEntry } from '../types/apiTypes.js';
import { rawResult } from '../utils/toolHelpers.js';
import { IdSchema, defineClientTool } from './toolSupport.js';

export const SEVERITY_NAMES = ['emergency', 'alert', 'critical', 'error', 'warning', 'notice', 'informational', 'debug'] as const;
export type SeverityName = typeof SEVERITY_NAMES[number];

export const SEVERITY_LEVELS: Record<SeverityName, number> = {
    emergency: 0,
    alert: 1,
    critical: 2,
    error: 3,
    warning: 4,
    notice: 5,
    informational: 6,
    debug: 7,
};

export const FACILITY_CODES = {
    APPLICATION: 16,
    WEBSERVER: 17,
} as const;

export const serviceLogsInputSchema = z.object({
    service_id: IdSchema.describe('Service ID as reported by discovery.'),
    limit: z.number().int().min(1).max(1000).default(100).describe('Number of entries (1-1000, default 100).'),
    minimum_severity: z.enum(SEVERITY_NAMES).optional().describe('Only entries at this severity or more severe.'),
    message_type: z.enum(['APPLICATION', 'WEBSERVER']).default('APPLICATION'),
    format: z.enum(['FULL', 'SHORT', 'JSON']).default('FULL'),
}).strict();

export type LogFormat = z.infer<typeof serviceLogsInputSchema>['format'];

export function buildLogQuery(args: z.infer<typeof serviceLogsInputSchema>): string {
    let query = `&limit=${args.limit}&desc=1&facility=${FACILITY_CODES[args.message_type]}&serviceStackId=${args.service_id}`;
    if (args.minimum_severity) {
        query += `&minimumSeverity=${SEVERITY_LEVELS[args.minimum_severity]}`;
    }
    return query;
}

export function formatLogs(entries: LogEntry[], format: LogFormat): JsonValue[] {
    switch (format) {
        case 'SHORT':
            return entries.map(entry => ({
                timestamp: entry.timestamp,
                severity: entry.severityLabel ?? null,
                message: entry.message,
            }));
        case 'JSON':
            return entries.map(entry => ({
                timestamp: entry.timestamp,
                severityLabel: entry.severityLabel ?? null,
                facilityLabel: entry.facilityLabel ?? null,
                hostname: entry.hostname ?? null,
                appName: entry.appName ?? null,
                message: entry.message,
                content: entry.content ?? null,
                priority: entry.priority ?? null,
                procId: entry.procId ?? null,
                tag: entry.tag ?? null,
            }));
        case 'FULL':
            return entries.map(entry => ({
                timestamp: entry.timestamp,
                severity: entry.severityLabel ?? null,
                facility: entry.facilityLabel ?? null,
                hostname: entry.hostname ?? null,
                app_name: entry.appName ?? null,
                message: entry.message,
                content: entry.content ?? null,
                priority: entry.priority ?? null,
                proc_id: entry.procId ?? null,
                tag: entry.tag ?? null,
            }));
    }
}

export function createLogTools(): RegisteredTool[] {
    return [
        defineClientTool({
            name: 'get_service_logs',
            description: 'Fetches recent runtime logs of a service, newest first.',
            inputSchema: serviceLogsInputSchema,
            failurePrefix: 'Failed to get service logs',
            handler: async (client, args, ctx) => {
                const service = await client.getServiceStack(args.service_id, ctx.signal);
                const access = await client.getProjectLogAccess(service.projectId, ctx.signal);
                const entries = await client.fetchLogs(access, buildLogQuery(args), ctx.signal);
                return rawResult({
                    service_id: args.service_id,
                    service_name: service.name,
                    project_id: service.projectId,
                    logs: formatLogs(entries, args.format),
                    total_entries: entries.length,
                    parameters: {
                        limit: args.limit,
                        minimum_severity: args.minimum_severity ?? null,
                        message_type: args.message_type,
                        format: args.format,
                    },
                    status: 'success',
                });
            },
        }),
    ];
}
