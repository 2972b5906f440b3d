import { z } from 'zod';
import { LogLevel } from './loggingTypes.js';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']) satisfies z.ZodType<LogLevel>;

export const TransportSchema = z.enum(['stdio', 'http']);

/**
 * Shape of the optional JSON config file. Every key is optional; omitted keys keep their defaults.
 * The credential is deliberately absent: it only comes from the environment.
 */
export const ConfigFileSchema = z.object({
    transport: TransportSchema.optional(),
    httpHost: z.string().min(1).optional(),
    httpPort: z.number().int().min(0).max(65535).optional(),
    httpPath: z.string().startsWith('/').optional(),
    allowedOrigins: z.array(z.string().min(1)).optional(),
    logLevel: LogLevelSchema.optional(),
    apiEndpoint: z.string().url().optional(),
    knowledgeEndpoint: z.string().url().optional(),
    guideBaseUrl: z.string().url().optional(),
    upstreamTimeoutMs: z.number().int().positive().optional(),
    guideCacheTtlMs: z.number().int().positive().optional(),
    deployCommand: z.string().min(1).optional(),
    deployTimeoutMs: z.number().int().positive().optional(),
    skipValidation: z.boolean().optional(),
    defaultProjectId: z.string().min(1).optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export type Transport = z.infer<typeof TransportSchema>;

/**
 * Fully resolved settings after defaults, config file, environment and CLI flags are merged.
 */
export interface ServerSettings {
    transport: Transport;
    httpHost: string;
    httpPort: number;
    httpPath: string;
    /** Empty means any origin is accepted. */
    allowedOrigins: string[];
    logLevel: LogLevel;
    apiEndpoint: string;
    knowledgeEndpoint: string;
    guideBaseUrl: string;
    upstreamTimeoutMs: number;
    guideCacheTtlMs: number;
    deployCommand: string;
    deployTimeoutMs: number;
    skipValidation: boolean;
    credential: string | null;
    defaultProjectId: string | null;
}

/**
 * Overrides from the environment or the command line, applied over the file settings.
 */
export type SettingsOverrides = Partial<ServerSettings>;

export const DEFAULT_SETTINGS: ServerSettings = {
    transport: 'stdio',
    httpHost: '0.0.0.0',
    httpPort: 8080,
    httpPath: '/mcp',
    allowedOrigins: [],
    logLevel: 'info',
    apiEndpoint: 'https://api.app-prg1.zerops.io',
    knowledgeEndpoint: 'https://kbapi-167b-8080.prg1.zerops.app',
    guideBaseUrl: 'https://raw.githubusercontent.com/zeropsio/zagent-knowledge/main',
    upstreamTimeoutMs: 10000,
    guideCacheTtlMs: 600000,
    deployCommand: 'zcli',
    deployTimeoutMs: 900000,
    skipValidation: false,
    credential: null,
    defaultProjectId: null,
};
