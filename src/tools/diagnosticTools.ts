import { z } from 'zod';
import { InvocationContext, RegisteredTool } from '../types/toolTypes.js';
import { UserInfo } from '../types/apiTypes.js';
import { defineTool, textResult } from '../utils/toolHelpers.js';
import { detectModelFamily } from '../utils/instructions.js';
import { errorMessage } from '../utils/errors.js';
import { ToolDependencies, defineClientTool } from './toolSupport.js';

function displayName(user: UserInfo): string {
    if (user.fullName) {
        return user.fullName;
    }
    return [user.firstName, user.lastName].filter(Boolean).join(' ') || '(no name)';
}

export function formatAuthSuccess(user: UserInfo): string {
    let message = 'Authentication successful\n\n';
    message += `User: ${displayName(user)}\n`;
    message += `Email: ${user.email}\n`;
    message += `\nAccess to ${user.clientUserList.length} organization(s):\n`;
    for (const clientUser of user.clientUserList) {
        message += `• ${clientUser.client.accountName}\n`;
    }
    return message;
}

async function describeApiConnection(ctx: InvocationContext, apiEndpoint: string): Promise<string[]> {
    if (!ctx.client) {
        return ['Platform API: not initialized (no credential)', `Endpoint: ${apiEndpoint}`];
    }
    try {
        const user = await ctx.client.getUserInfo(ctx.signal);
        return [`Platform API: connected as ${user.email}`, `Endpoint: ${apiEndpoint}`];
    } catch (error: unknown) {
        return [`Platform API: unreachable (${errorMessage(error)})`, `Endpoint: ${apiEndpoint}`];
    }
}

export function createDiagnosticTools(deps: ToolDependencies): RegisteredTool[] {
    return [
        defineClientTool({
            name: 'auth_validate',
            description: 'Checks that the credential works and lists the organisations it can access.',
            inputSchema: z.object({}).strict(),
            failurePrefix: 'Authentication failed',
            handler: async (client, _args, ctx) => textResult(formatAuthSuccess(await client.getUserInfo(ctx.signal))),
        }),
        defineTool({
            name: 'debug_info',
            description: 'Shows the calling client identity, transport, server version and platform API connectivity.',
            inputSchema: z.object({}).strict(),
            handler: async (ctx) => {
                const lines: string[] = ['=== CLIENT INFORMATION ==='];
                if (ctx.clientInfo) {
                    lines.push(`Client: ${ctx.clientInfo.name}`);
                    lines.push(`Version: ${ctx.clientInfo.version}`);
                    lines.push(`Detected model family: ${detectModelFamily(ctx.clientInfo.name)}`);
                } else {
                    lines.push('Client: unknown (no clientInfo sent in initialize)');
                }

                lines.push('', '=== TRANSPORT ===');
                if (ctx.transport === 'http') {
                    lines.push('Mode: HTTP (remote)', 'Auth: per-request Bearer token');
                } else {
                    lines.push('Mode: stdio (local)', 'Auth: ZEROPS_API_KEY environment variable');
                }

                lines.push('', '=== SERVER ===');
                lines.push(`Server: ${deps.settings.serverInfo.name}`);
                lines.push(`Version: ${deps.settings.serverInfo.version}`);
                lines.push(`Node.js: ${process.version}`);
                lines.push(`OS/Arch: ${process.platform}/${process.arch}`);

                lines.push('', '=== API CONNECTION ===');
                lines.push(...await describeApiConnection(ctx, deps.settings.apiEndpoint));

                return textResult(lines.join('\n'));
            },
        }),
    ];
}
