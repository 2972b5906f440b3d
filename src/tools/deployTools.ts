import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { HandlerResult, RegisteredTool } from '../types/toolTypes.js';
import { CommandNotFoundError, ExecResult } from '../services/CommandExecutor.js';
import { defineTool, domainError, textResult } from '../utils/toolHelpers.js';
import { logger } from '../utils/logger.js';
import { IdSchema, ToolDependencies, defineClientTool } from './toolSupport.js';

const LOGIN_TIMEOUT_MS = 60000;
const OUTPUT_TAIL_LINES = 40;
const CLI_DOCS_URL = 'https://docs.zerops.io/references/cli';

async function pathExists(target: string): Promise<boolean> {
    try {
        await fs.access(target);
        return true;
    } catch {
        return false;
    }
}

/**
 * Last lines of the combined stdout and stderr of a command.
 */
export function outputTail(result: ExecResult, maxLines: number = OUTPUT_TAIL_LINES): string {
    const combined = [result.stdout.trim(), result.stderr.trim()].filter(part => part.length > 0).join('\n');
    if (!combined) {
        return '(no output)';
    }
    const lines = combined.split(/\r?\n/);
    if (lines.length <= maxLines) {
        return combined;
    }
    return [`... (${lines.length - maxLines} earlier lines omitted)`, ...lines.slice(-maxLines)].join('\n');
}

function gitMissingMessage(workDir: string): string {
    return `Git not initialized in ${workDir}\n\n`
        + 'Run these commands in your project directory:\n'
        + `  cd ${workDir}\n`
        + '  git init\n'
        + '  git add .\n'
        + '  git commit -m "Initial commit"\n\n'
        + 'Note: at least one commit is required to deploy.';
}

function resolveConfigPath(workDir: string, configPath: string | undefined): string {
    if (!configPath) {
        return path.join(workDir, 'zerops.yml');
    }
    return path.isAbsolute(configPath) ? configPath : path.join(workDir, configPath);
}

function cliMissingMessage(command: string): string {
    return `${command} not found\n\nInstall the CLI: ${CLI_DOCS_URL}`;
}

export interface PushSummary {
    command: string;
    workDir: string;
    projectId: string;
    serviceId: string;
}

/**
 * Decides the outcome of a push from its exit code. Output is only used for the message.
 */
export function describePushResult(result: ExecResult, summary: PushSummary): HandlerResult {
    if (result.aborted) {
        return domainError(`Deployment cancelled\n\nCommand: ${summary.command}`);
    }
    if (result.timedOut) {
        return domainError(`Deployment timed out\n\nCommand: ${summary.command}\nWorking dir: ${summary.workDir}\n\nOutput:\n${outputTail(result)}`);
    }
    if (result.exitCode === 0) {
        return textResult(`Deployment successful\n\nProject ID: ${summary.projectId}\nService ID: ${summary.serviceId}\n\nOutput:\n${outputTail(result)}`);
    }
    const exit = result.exitCode === null ? `signal ${result.signal ?? 'unknown'}` : `exit code ${result.exitCode}`;
    return domainError(`Deployment failed (${exit})\n\nCommand: ${summary.command}\nWorking dir: ${summary.workDir}\n\nOutput:\n${outputTail(result)}`);
}

export const deployValidateInputSchema = z.object({
    working_dir: z.string().optional().describe('Directory with the application code (default: server working directory).'),
    config_path: z.string().optional().describe('Path to zerops.yml, relative to working_dir (default: zerops.yml).'),
}).strict();

export const deployPushInputSchema = z.object({
    project_id: IdSchema.describe('Project ID from project_list or discovery.'),
    service_id: IdSchema.describe('Service ID from discovery (not the hostname).'),
    working_dir: z.string().optional().describe('Directory with the application code (default: server working directory).'),
    config_path: z.string().optional().describe('Path to zerops.yml passed to the CLI.'),
}).strict();

export function createDeployTools(deps: ToolDependencies): RegisteredTool[] {
    const { deployCommand, deployTimeoutMs, upstreamTimeoutMs } = deps.settings;

    return [
        defineTool({
            name: 'deploy_validate',
            description: 'Checks deployment prerequisites: working directory, git repository, zerops.yml and the deploy CLI.',
            inputSchema: deployValidateInputSchema,
            handler: async (ctx, args) => {
                const workDir = path.resolve(args.working_dir ?? '.');
                if (!(await pathExists(workDir))) {
                    return domainError(`Directory not found: ${workDir}`);
                }
                const gitDir = path.join(workDir, '.git');
                if (!(await pathExists(gitDir))) {
                    return domainError(gitMissingMessage(workDir));
                }
                const configPath = resolveConfigPath(workDir, args.config_path);
                if (!(await pathExists(configPath))) {
                    return domainError(`Config file not found: ${configPath}\n\nCreate a zerops.yml file with your deployment configuration.`);
                }

                let version: ExecResult;
                try {
                    version = await deps.executor.execute({
                        command: deployCommand,
                        args: ['version'],
                        cwd: workDir,
                        signal: ctx.signal,
                        timeoutMs: upstreamTimeoutMs,
                    });
                } catch (error: unknown) {
                    if (error instanceof CommandNotFoundError) {
                        return domainError(cliMissingMessage(deployCommand));
                    }
                    throw error;
                }
                if (version.exitCode !== 0) {
                    return domainError(`Failed to check ${deployCommand} version\n\n${outputTail(version)}`);
                }

                return textResult([
                    'Deployment validation successful',
                    '',
                    `✓ Working directory: ${workDir}`,
                    `✓ Git initialized: ${gitDir}`,
                    `✓ Config file: ${configPath}`,
                    `✓ CLI: ${deployCommand}`,
                    `✓ CLI version: ${version.stdout.trim() || version.stderr.trim()}`,
                ].join('\n'));
            },
        }),
        defineClientTool({
            name: 'deploy_push',
            description: 'Deploys the code in working_dir to a service with the deploy CLI. Needs a git repository with at least one commit.',
            inputSchema: deployPushInputSchema,
            failurePrefix: 'Deployment failed',
            handler: async (client, args, ctx) => {
                const workDir = path.resolve(args.working_dir ?? '.');
                if (!(await pathExists(workDir))) {
                    return domainError(`Directory not found: ${workDir}`);
                }
                if (!(await pathExists(path.join(workDir, '.git')))) {
                    return domainError(gitMissingMessage(workDir));
                }

                const token = client.getCredential();
                const pushArgs = ['push', '--projectId', args.project_id, '--serviceId', args.service_id];
                if (args.config_path) {
                    pushArgs.push('--zeropsYamlPath', args.config_path);
                }
                if (args.working_dir) {
                    pushArgs.push('--workingDir', workDir);
                }
                const summary: PushSummary = {
                    command: `${deployCommand} ${pushArgs.join(' ')}`,
                    workDir,
                    projectId: args.project_id,
                    serviceId: args.service_id,
                };

                try {
                    const login = await deps.executor.execute({
                        command: deployCommand,
                        args: ['login', token],
                        secrets: [token],
                        cwd: workDir,
                        signal: ctx.signal,
                        timeoutMs: LOGIN_TIMEOUT_MS,
                    });
                    if (login.aborted) {
                        return domainError('Deployment cancelled');
                    }
                    if (login.exitCode !== 0) {
                        return domainError(`Deployment failed: ${deployCommand} login exited with code ${login.exitCode ?? 'null'}\n\nOutput:\n${outputTail(login)}`);
                    }

                    logger.info(`Running ${summary.command} in ${workDir}`);
                    const push = await deps.executor.execute({
                        command: deployCommand,
                        args: pushArgs,
                        env: { ZEROPS_TOKEN: token },
                        secrets: [token],
                        cwd: workDir,
                        signal: ctx.signal,
                        timeoutMs: deployTimeoutMs,
                    });
                    return describePushResult(push, summary);
                } catch (error: unknown) {
                    if (error instanceof CommandNotFoundError) {
                        return domainError(cliMissingMessage(deployCommand));
                    }
                    throw error;
                }
            },
        }),
    ];
}
