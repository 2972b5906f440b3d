import { jest } from '@jest/globals';

jest.mock('../../src/utils/logger', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
        captureOutput: jest.fn(),
    },
    maskCredential: jest.requireActual<typeof import('../../src/utils/logger')>('../../src/utils/logger').maskCredential,
}));

import * as path from 'path';
import { logger } from '../../src/utils/logger';
import { CommandNotFoundError, SpawnExecutor } from '../../src/services/CommandExecutor';

describe('SpawnExecutor', () => {
    const executor = new SpawnExecutor();

    it('collects output and the exit code', async () => {
        const result = await executor.execute({
            command: process.execPath,
            args: ['-e', 'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)'],
        });

        expect(result).toEqual({ exitCode: 3, signal: null, stdout: 'out', stderr: 'err', timedOut: false, aborted: false });
    });

    it('adds the given variables to the environment', async () => {
        const result = await executor.execute({
            command: process.execPath,
            args: ['-e', 'process.stdout.write(process.env.EXECUTOR_TEST_VALUE ?? "")'],
            env: { EXECUTOR_TEST_VALUE: 'from-env' },
        });

        expect(result.stdout).toBe('from-env');
    });

    it('terminates a process that runs past its timeout', async () => {
        const result = await executor.execute({
            command: process.execPath,
            args: ['-e', 'setTimeout(() => undefined, 10000)'],
            timeoutMs: 100,
        });

        expect(result.timedOut).toBe(true);
        expect(result.exitCode).toBeNull();
        expect(result.signal).toBe('SIGTERM');
    });

    it('terminates a process when the caller aborts', async () => {
        const controller = new AbortController();
        const pending = executor.execute({
            command: process.execPath,
            args: ['-e', 'setTimeout(() => undefined, 10000)'],
            signal: controller.signal,
        });
        setTimeout(() => controller.abort(), 50);

        const result = await pending;

        expect(result.aborted).toBe(true);
        expect(result.timedOut).toBe(false);
    });

    it('does not start when already aborted', async () => {
        const controller = new AbortController();
        controller.abort();

        const result = await executor.execute({ command: process.execPath, args: ['-e', ''], signal: controller.signal });

        expect(result).toEqual({ exitCode: null, signal: null, stdout: '', stderr: '', timedOut: false, aborted: true });
    });

    it('masks secrets in the command line and captured output', async () => {
        jest.clearAllMocks();
        const script = 'process.stdout.write(process.argv[1])';

        const result = await executor.execute({
            command: process.execPath,
            args: ['-e', script, 'test-secret-token'],
            secrets: ['test-secret-token'],
        });

        expect(result.stdout).toBe('test-secret-token');
        expect(logger.debug).toHaveBeenCalledWith(`Spawning ${process.execPath} -e ${script} test…`);
        expect(logger.captureOutput).toHaveBeenCalledWith(path.basename(process.execPath), 'test…', false);
        const logged = JSON.stringify([
            jest.mocked(logger.debug).mock.calls,
            jest.mocked(logger.info).mock.calls,
            jest.mocked(logger.captureOutput).mock.calls,
        ]);
        expect(logged).not.toContain('test-secret-token');
    });

    it('reports a missing executable', async () => {
        const call = executor.execute({ command: '/nonexistent/deploy-cli', args: [] });

        await expect(call).rejects.toBeInstanceOf(CommandNotFoundError);
        await expect(executor.execute({ command: '/nonexistent/deploy-cli', args: [] })).rejects.toThrow('command not found: /nonexistent/deploy-cli');
    });
});
