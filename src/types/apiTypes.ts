import { z } from 'zod';

// Typed projections of the infrastructure API records this server reads.
// Unknown fields are stripped on parse.

export const ApiErrorBodySchema = z.object({
    error: z.object({
        code: z.string().optional(),
        message: z.string().optional(),
    }),
});

export const ClientUserSchema = z.object({
    clientId: z.string(),
    roleCode: z.string().nullish(),
    client: z.object({
        id: z.string(),
        accountName: z.string(),
    }),
});

export const UserInfoSchema = z.object({
    id: z.string(),
    email: z.string(),
    fullName: z.string().nullish(),
    firstName: z.string().nullish(),
    lastName: z.string().nullish(),
    clientUserList: z.array(ClientUserSchema).default([]),
});
export type UserInfo = z.infer<typeof UserInfoSchema>;

export const EnvVarSchema = z.object({
    key: z.string(),
    content: z.string().nullish(),
});
export type EnvVar = z.infer<typeof EnvVarSchema>;

export const ProjectSchema = z.object({
    id: z.string(),
    clientId: z.string(),
    name: z.string(),
    description: z.string().nullish(),
    status: z.string(),
    created: z.string().nullish(),
    envList: z.array(EnvVarSchema).default([]),
});
export type Project = z.infer<typeof ProjectSchema>;

export const ServiceStackSchema = z.object({
    id: z.string(),
    projectId: z.string(),
    name: z.string(),
    status: z.string(),
    serviceStackTypeInfo: z.object({
        serviceStackTypeVersionName: z.string().nullish(),
    }).nullish(),
    subdomainAccess: z.boolean().nullish(),
});
export type ServiceStack = z.infer<typeof ServiceStackSchema>;

export const ProcessSchema = z.object({
    id: z.string(),
    status: z.string(),
    actionName: z.string().nullish(),
    created: z.string().nullish(),
    serviceStacks: z.array(z.object({ id: z.string(), name: z.string() })).nullish(),
});
export type Process = z.infer<typeof ProcessSchema>;

export const ServiceStackTypeSchema = z.object({
    name: z.string(),
    defaultServiceStackVersion: z.object({ name: z.string() }).nullish(),
    serviceStackTypeVersionList: z.array(z.object({ name: z.string() })).default([]),
});
export type ServiceStackType = z.infer<typeof ServiceStackTypeSchema>;

export const ImportResultSchema = z.object({
    projectId: z.string(),
    projectName: z.string(),
    serviceStacks: z.array(z.object({
        id: z.string(),
        name: z.string(),
        processes: z.array(ProcessSchema).default([]),
        error: z.object({ code: z.string(), message: z.string() }).nullish(),
    })).default([]),
});
export type ImportResult = z.infer<typeof ImportResultSchema>;

export const ProjectLogAccessSchema = z.object({
    url: z.string(),
});

export const LogEntrySchema = z.object({
    timestamp: z.string(),
    severityLabel: z.string().nullish(),
    facilityLabel: z.string().nullish(),
    hostname: z.string().nullish(),
    appName: z.string().nullish(),
    message: z.string(),
    content: z.string().nullish(),
    priority: z.number().nullish(),
    procId: z.string().nullish(),
    tag: z.string().nullish(),
});
export type LogEntry = z.infer<typeof LogEntrySchema>;

export const RegionSchema = z.object({
    name: z.string(),
    address: z.string(),
    isDefault: z.boolean().default(false),
});
export type Region = z.infer<typeof RegionSchema>;

export function itemsOf<T extends z.ZodTypeAny>(item: T) {
    return z.object({ items: z.array(item).default([]) });
}

export interface SearchFilter {
    name: string;
    operator: 'eq' | 'ne';
    value: string;
}

export interface AutoscalingUpdate {
    minCpu?: number;
    maxCpu?: number;
    minRam?: number;
    maxRam?: number;
    minContainers?: number;
    maxContainers?: number;
}
