import { z } from 'zod';
import {
    ApiErrorBodySchema,
    AutoscalingUpdate,
    ImportResult,
    ImportResultSchema,
    LogEntry,
    LogEntrySchema,
    Process,
    ProcessSchema,
    Project,
    ProjectLogAccessSchema,
    ProjectSchema,
    Region,
    RegionSchema,
    SearchFilter,
    ServiceStack,
    ServiceStackSchema,
    ServiceStackType,
    ServiceStackTypeSchema,
    EnvVar,
    EnvVarSchema,
    UserInfo,
    UserInfoSchema,
    itemsOf,
} from '../types/apiTypes.js';
import { UpstreamError, errorMessage, isAbortError } from '../utils/errors.js';
import { withTimeout } from '../utils/abort.js';
import { formatZodIssues } from '../utils/toolHelpers.js';
import { logger } from '../utils/logger.js';

const API_PREFIX = '/api/rest/public';

export interface PlatformApiClientOptions {
    baseUrl: string;
    token: string;
    timeoutMs: number;
}

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Typed client for the infrastructure REST API, bound to a single credential.
 * Every call is bounded by `timeoutMs` and by the caller's signal.
 */
export class PlatformApiClient {
    private readonly baseUrl: string;
    private readonly token: string;
    private readonly timeoutMs: number;

    constructor(options: PlatformApiClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.token = options.token;
        this.timeoutMs = options.timeoutMs;
    }

    /**
     * The credential this client is bound to. Needed by tools that hand it to the deploy CLI.
     */
    public getCredential(): string {
        return this.token;
    }

    public getUserInfo(signal?: AbortSignal): Promise<UserInfo> {
        return this.request('GET', '/user/info', UserInfoSchema, undefined, signal);
    }

    public async getRegions(signal?: AbortSignal): Promise<Region[]> {
        const page = await this.request('GET', '/region', itemsOf(RegionSchema), undefined, signal);
        return page.items;
    }

    public getProject(projectId: string, signal?: AbortSignal): Promise<Project> {
        return this.request('GET', `/project/${encodeURIComponent(projectId)}`, ProjectSchema, undefined, signal);
    }

    public async searchProjects(filters: SearchFilter[], signal?: AbortSignal): Promise<Project[]> {
        const page = await this.request('POST', '/project/search', itemsOf(ProjectSchema), { search: filters }, signal);
        return page.items;
    }

    public createProject(input: { clientId: string; name: string; description?: string; location?: string }, signal?: AbortSignal): Promise<Project> {
        return this.request('POST', '/project', ProjectSchema, { ...input, tagList: [] }, signal);
    }

    public deleteProject(projectId: string, signal?: AbortSignal): Promise<Process> {
        return this.request('DELETE', `/project/${encodeURIComponent(projectId)}`, ProcessSchema, undefined, signal);
    }

    public async searchServiceStacks(filters: SearchFilter[], signal?: AbortSignal): Promise<ServiceStack[]> {
        const page = await this.request('POST', '/service-stack/search', itemsOf(ServiceStackSchema), { search: filters }, signal);
        return page.items;
    }

    public getServiceStack(serviceId: string, signal?: AbortSignal): Promise<ServiceStack> {
        return this.request('GET', `/service-stack/${encodeURIComponent(serviceId)}`, ServiceStackSchema, undefined, signal);
    }

    public deleteServiceStack(serviceId: string, signal?: AbortSignal): Promise<Process> {
        return this.request('DELETE', `/service-stack/${encodeURIComponent(serviceId)}`, ProcessSchema, undefined, signal);
    }

    public async getServiceStackEnv(serviceId: string, signal?: AbortSignal): Promise<EnvVar[]> {
        const page = await this.request('GET', `/service-stack/${encodeURIComponent(serviceId)}/env`, itemsOf(EnvVarSchema), undefined, signal);
        return page.items;
    }

    public startServiceStack(serviceId: string, signal?: AbortSignal): Promise<Process> {
        return this.serviceAction(serviceId, 'start', signal);
    }

    public stopServiceStack(serviceId: string, signal?: AbortSignal): Promise<Process> {
        return this.serviceAction(serviceId, 'stop', signal);
    }

    public enableSubdomainAccess(serviceId: string, signal?: AbortSignal): Promise<Process> {
        return this.serviceAction(serviceId, 'enable-subdomain-access', signal);
    }

    public disableSubdomainAccess(serviceId: string, signal?: AbortSignal): Promise<Process> {
        return this.serviceAction(serviceId, 'disable-subdomain-access', signal);
    }

    public updateAutoscaling(serviceId: string, update: AutoscalingUpdate, signal?: AbortSignal): Promise<Process> {
        const body = {
            verticalAutoscaling: {
                minCpu: update.minCpu,
                maxCpu: update.maxCpu,
                minRam: update.minRam,
                maxRam: update.maxRam,
            },
            horizontalAutoscaling: {
                minContainers: update.minContainers,
                maxContainers: update.maxContainers,
            },
        };
        return this.request('PUT', `/service-stack/${encodeURIComponent(serviceId)}/autoscaling`, ProcessSchema, body, signal);
    }

    public importServiceStacks(projectId: string, yaml: string, signal?: AbortSignal): Promise<ImportResult> {
        return this.request('POST', '/service-stack/import', ImportResultSchema, { projectId, yaml }, signal);
    }

    public async searchServiceStackTypes(signal?: AbortSignal): Promise<ServiceStackType[]> {
        const page = await this.request('POST', '/service-stack-type/search', itemsOf(ServiceStackTypeSchema), { search: [] }, signal);
        return page.items;
    }

    public getProcess(processId: string, signal?: AbortSignal): Promise<Process> {
        return this.request('GET', `/process/${encodeURIComponent(processId)}`, ProcessSchema, undefined, signal);
    }

    public async searchProcesses(filters: SearchFilter[], signal?: AbortSignal): Promise<Process[]> {
        const page = await this.request('POST', '/process/search', itemsOf(ProcessSchema), { search: filters }, signal);
        return page.items;
    }

    public createProjectEnv(projectId: string, key: string, content: string, signal?: AbortSignal): Promise<Process> {
        return this.request('POST', '/project-env', ProcessSchema, { projectId, key, content }, signal);
    }

    public createServiceEnv(serviceId: string, key: string, content: string, signal?: AbortSignal): Promise<Process> {
        return this.request('POST', '/user-data', ProcessSchema, { serviceStackId: serviceId, key, content }, signal);
    }

    /**
     * Returns the signed log endpoint for a project as `METHOD URL`.
     */
    public async getProjectLogAccess(projectId: string, signal?: AbortSignal): Promise<string> {
        const access = await this.request('GET', `/project/${encodeURIComponent(projectId)}/log`, ProjectLogAccessSchema, undefined, signal);
        return access.url;
    }

    /**
     * Queries a signed log endpoint. The URL is pre-authorised, so no bearer header is sent.
     * @param access - `METHOD URL` as returned by getProjectLogAccess.
     * @param query - Query string fragment starting with `&`.
     */
    public async fetchLogs(access: string, query: string, signal?: AbortSignal): Promise<LogEntry[]> {
        const parts = access.trim().split(' ');
        if (parts.length !== 2) {
            throw new UpstreamError(`invalid log URL format: ${access}`);
        }
        const [method, target] = parts;
        const url = /^https?:\/\//.test(target) ? `${target}${query}` : `https://${target}${query}`;
        const json = await this.send(method, url, undefined, signal, false);
        return this.parse(itemsOf(LogEntrySchema), json, `${method} log endpoint`).items;
    }

    private serviceAction(serviceId: string, action: string, signal?: AbortSignal): Promise<Process> {
        return this.request('PUT', `/service-stack/${encodeURIComponent(serviceId)}/${action}`, ProcessSchema, undefined, signal);
    }

    private async request<S extends z.ZodTypeAny>(
        method: HttpMethod,
        path: string,
        schema: S,
        body: unknown,
        signal: AbortSignal | undefined,
    ): Promise<z.output<S>> {
        const json = await this.send(method, `${this.baseUrl}${API_PREFIX}${path}`, body, signal, true);
        return this.parse(schema, json, `${method} ${path}`);
    }

    private parse<S extends z.ZodTypeAny>(schema: S, json: unknown, label: string): z.output<S> {
        const parsed = schema.safeParse(json);
        if (!parsed.success) {
            throw new UpstreamError(`unexpected response from ${label}: ${formatZodIssues(parsed.error)}`);
        }
        return parsed.data;
    }

    private async send(method: string, url: string, body: unknown, signal: AbortSignal | undefined, authorize: boolean): Promise<unknown> {
        const headers: Record<string, string> = { Accept: 'application/json' };
        if (authorize) {
            headers.Authorization = `Bearer ${this.token}`;
        }
        if (body !== undefined) {
            headers['Content-Type'] = 'application/json';
        }

        const guard = withTimeout(signal, this.timeoutMs);
        logger.debug(`API ${method} ${url}`);
        try {
            const response = await fetch(url, {
                method,
                headers,
                body: body === undefined ? undefined : JSON.stringify(body),
                signal: guard.signal,
            });
            const text = await response.text();
            if (!response.ok) {
                throw this.toUpstreamError(response.status, text);
            }
            if (text.trim() === '') {
                return {};
            }
            try {
                return JSON.parse(text);
            } catch {
                throw new UpstreamError(`invalid JSON from ${method} ${url}`, response.status);
            }
        } catch (error: unknown) {
            if (error instanceof UpstreamError) {
                throw error;
            }
            if (isAbortError(error)) {
                throw new UpstreamError(`${method} ${url} aborted: ${errorMessage(error)}`);
            }
            throw new UpstreamError(`${method} ${url}: ${errorMessage(error)}`);
        } finally {
            guard.dispose();
        }
    }

    private toUpstreamError(status: number, text: string): UpstreamError {
        let parsedBody: unknown = null;
        try {
            parsedBody = JSON.parse(text);
        } catch {
            parsedBody = null;
        }
        const apiError = ApiErrorBodySchema.safeParse(parsedBody);
        if (apiError.success) {
            const code = apiError.data.error.code ?? null;
            const message = apiError.data.error.message ?? 'no message';
            return new UpstreamError(`HTTP ${status}${code ? ` ${code}` : ''}: ${message}`, status, code);
        }
        return new UpstreamError(`HTTP ${status}: ${text.trim() || 'empty response'}`, status);
    }
}
