import { Implementation } from '@modelcontextprotocol/sdk/types.js';
import { ServerSettings } from './types/configTypes.js';
import { ToolRegistry } from './managers/ToolRegistry.js';
import { ApiClientFactory, ContextFactory } from './managers/ContextFactory.js';
import { Dispatcher } from './managers/Dispatcher.js';
import { KnowledgeClient } from './services/KnowledgeClient.js';
import { GuideDocument, GuideService } from './services/GuideService.js';
import { TtlCache } from './services/TtlCache.js';
import { CommandExecutor, SpawnExecutor } from './services/CommandExecutor.js';
import { ServiceTypeCatalogue } from './services/ServiceTypeCatalogue.js';
import { KnowledgeBase } from './services/KnowledgeBase.js';
import { ToolDependencies } from './tools/toolSupport.js';
import { registerAllTools } from './tools/index.js';
import { createInstructionProvider } from './utils/instructions.js';

export const SERVER_INFO: Implementation = { name: 'zerops-mcp', version: '1.0.0' };

export interface Application {
    registry: ToolRegistry;
    dispatcher: Dispatcher;
    dependencies: ToolDependencies;
}

/**
 * Collaborators replaced in tests.
 */
export interface ApplicationOverrides {
    executor?: CommandExecutor;
    createClient?: ApiClientFactory;
}

/**
 * Wires registry, services and dispatcher from resolved settings. Transports are started by the caller.
 */
export function createApplication(settings: ServerSettings, overrides: ApplicationOverrides = {}): Application {
    const dependencies: ToolDependencies = {
        settings: {
            serverInfo: SERVER_INFO,
            apiEndpoint: settings.apiEndpoint,
            defaultProjectId: settings.defaultProjectId,
            deployCommand: settings.deployCommand,
            deployTimeoutMs: settings.deployTimeoutMs,
            upstreamTimeoutMs: settings.upstreamTimeoutMs,
        },
        knowledge: new KnowledgeClient({ baseUrl: settings.knowledgeEndpoint, timeoutMs: settings.upstreamTimeoutMs }),
        guides: new GuideService({
            baseUrl: settings.guideBaseUrl,
            timeoutMs: settings.upstreamTimeoutMs,
            cache: new TtlCache<GuideDocument>(settings.guideCacheTtlMs),
        }),
        executor: overrides.executor ?? new SpawnExecutor(),
        serviceTypes: new ServiceTypeCatalogue(),
        knowledgeBase: new KnowledgeBase(),
    };

    const registry = new ToolRegistry();
    registerAllTools(registry, dependencies);

    const contextFactory = overrides.createClient
        ? new ContextFactory(overrides.createClient)
        : ContextFactory.forApi({ baseUrl: settings.apiEndpoint, timeoutMs: settings.upstreamTimeoutMs });

    const dispatcher = new Dispatcher(registry, contextFactory, {
        serverInfo: SERVER_INFO,
        instructions: createInstructionProvider(),
    });

    return { registry, dispatcher, dependencies };
}
