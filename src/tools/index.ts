import { ToolRegistry } from '../managers/ToolRegistry.js';
import { RegisteredTool } from '../types/toolTypes.js';
import { logger } from '../utils/logger.js';
import { ToolDependencies } from './toolSupport.js';
import { createDiscoveryTool } from './discoveryTool.js';
import { createImportTools } from './importTools.js';
import { createServiceTools } from './serviceTools.js';
import { createLogTools } from './logTools.js';
import { createProcessTools } from './processTools.js';
import { createEnvironmentTools } from './environmentTools.js';
import { createProjectTools } from './projectTools.js';
import { createKnowledgeTools } from './knowledgeTools.js';
import { createDeployTools } from './deployTools.js';
import { createDiagnosticTools } from './diagnosticTools.js';

export function createAllTools(deps: ToolDependencies): RegisteredTool[] {
    return [
        createDiscoveryTool(deps),
        ...createImportTools(deps),
        ...createServiceTools(),
        ...createLogTools(),
        ...createProcessTools(),
        ...createEnvironmentTools(),
        ...createProjectTools(),
        ...createKnowledgeTools(deps),
        ...createDeployTools(deps),
        ...createDiagnosticTools(deps),
    ];
}

/**
 * Registers every tool with the registry. Called once at startup, before any transport starts.
 * @returns The registered tool names.
 */
export function registerAllTools(registry: ToolRegistry, deps: ToolDependencies): string[] {
    logger.info('Registering tools...');
    const tools = createAllTools(deps);
    tools.forEach(tool => registry.register(tool));
    logger.info(`Registered ${tools.length} tools.`);
    return tools.map(tool => tool.name);
}
