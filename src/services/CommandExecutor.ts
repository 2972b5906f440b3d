import { spawn } from 'child_process';
import * as path from 'path';
import { logger, maskCredential } from '../utils/logger.js';

const GRACEFUL_SHUTDOWN_TIMEOUT_MS = 5000; // Time to wait after SIGTERM before SIGKILL

export interface ExecRequest {
    command: string;
    args: string[];
    /** Added on top of the server's own environment. */
    env?: Record<string, string>;
    cwd?: string;
    /** Values replaced by their masked form in everything this request logs. */
    secrets?: string[];
    signal?: AbortSignal;
    timeoutMs?: number;
}

export interface ExecResult {
    exitCode: number | null;
    /** Signal that terminated the process, if any. */
    signal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
    timedOut: boolean;
    aborted: boolean;
}

/**
 * Runs an external executable to completion. Implemented by SpawnExecutor; tests supply fakes.
 */
export interface CommandExecutor {
    execute(request: ExecRequest): Promise<ExecResult>;
}

function redactor(secrets: string[]): (text: string) => string {
    const active = secrets.filter(secret => secret.length > 0);
    return text => active.reduce((result, secret) => result.split(secret).join(maskCredential(secret)), text);
}

export class CommandNotFoundError extends Error {
    public readonly command: string;

    constructor(command: string) {
        super(`command not found: ${command}`);
        this.name = 'CommandNotFoundError';
        this.command = command;
    }
}

/**
 * Spawns the command without a shell and collects its output.
 * On abort or timeout the process gets SIGTERM, then SIGKILL if it is still alive after the grace period.
 */
export class SpawnExecutor implements CommandExecutor {
    public execute(request: ExecRequest): Promise<ExecResult> {
        const label = path.basename(request.command);
        const redact = redactor(request.secrets ?? []);

        return new Promise((resolve, reject) => {
            if (request.signal?.aborted) {
                resolve({ exitCode: null, signal: null, stdout: '', stderr: '', timedOut: false, aborted: true });
                return;
            }

            logger.debug(redact(`Spawning ${request.command} ${request.args.join(' ')}${request.cwd ? ` in ${request.cwd}` : ''}`));
            const child = spawn(request.command, request.args, {
                cwd: request.cwd,
                env: { ...process.env, ...request.env },
                stdio: ['ignore', 'pipe', 'pipe'],
                shell: false,
            });

            let stdout = '';
            let stderr = '';
            let timedOut = false;
            let aborted = false;
            let killTimer: NodeJS.Timeout | null = null;

            const terminate = (): void => {
                if (child.exitCode !== null || child.signalCode !== null) {
                    return;
                }
                child.kill('SIGTERM');
                killTimer = setTimeout(() => {
                    if (child.exitCode === null && child.signalCode === null) {
                        logger.warn(`${label} (PID: ${child.pid}) did not stop after ${GRACEFUL_SHUTDOWN_TIMEOUT_MS}ms. Sending SIGKILL.`);
                        child.kill('SIGKILL');
                    }
                }, GRACEFUL_SHUTDOWN_TIMEOUT_MS);
            };

            const onAbort = (): void => {
                aborted = true;
                logger.info(`Aborting ${label} (PID: ${child.pid})`);
                terminate();
            };
            request.signal?.addEventListener('abort', onAbort, { once: true });

            const timeoutTimer = request.timeoutMs
                ? setTimeout(() => {
                    timedOut = true;
                    logger.warn(`${label} exceeded ${request.timeoutMs}ms. Terminating.`);
                    terminate();
                }, request.timeoutMs)
                : null;

            const cleanup = (): void => {
                if (timeoutTimer) clearTimeout(timeoutTimer);
                if (killTimer) clearTimeout(killTimer);
                request.signal?.removeEventListener('abort', onAbort);
            };

            child.stdout.on('data', (data: Buffer) => {
                const text = data.toString();
                stdout += text;
                logger.captureOutput(label, redact(text), false);
            });
            child.stderr.on('data', (data: Buffer) => {
                const text = data.toString();
                stderr += text;
                logger.captureOutput(label, redact(text), true);
            });

            child.on('error', (error: NodeJS.ErrnoException) => {
                cleanup();
                if (error.code === 'ENOENT') {
                    reject(new CommandNotFoundError(request.command));
                } else {
                    reject(error);
                }
            });

            child.on('close', (code, signal) => {
                cleanup();
                logger.debug(`${label} exited with code ${code}${signal ? ` (signal ${signal})` : ''}`);
                resolve({ exitCode: code, signal, stdout, stderr, timedOut, aborted });
            });
        });
    }
}
