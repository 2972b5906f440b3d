import { jest } from '@jest/globals';
import { Logger, maskCredential } from '../../src/utils/logger';

function captureStderr() {
    return jest.spyOn(console, 'error').mockImplementation(() => undefined);
}

describe('Logger', () => {
    let logger: Logger;

    beforeEach(() => {
        logger = new Logger();
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    function lines(stderr: ReturnType<typeof captureStderr>): string[] {
        return stderr.mock.calls.map(call => String(call[0]).replace(/^\S+ /, ''));
    }

    it('writes levelled lines to stderr', () => {
        const stderr = captureStderr();
        logger.warn('careful');
        expect(lines(stderr)).toEqual(['[WARN] careful']);
    });

    it('drops messages below the current level', () => {
        const stderr = captureStderr();
        logger.debug('hidden');
        logger.setLevel('error');
        logger.warn('also hidden');
        logger.error('shown');

        expect(lines(stderr)).toEqual(['[ERROR] shown']);
        expect(logger.getLevel()).toBe('error');
    });

    it('logs captured child output line by line', () => {
        const stderr = captureStderr();
        logger.setLevel('debug');
        stderr.mockClear();

        logger.captureOutput('zcli', 'first\n\n  second  \r\n', false);
        logger.captureOutput('zcli', 'failed\n', true);

        expect(lines(stderr)).toEqual(['[DEBUG] [zcli] first', '[DEBUG] [zcli] second', '[ERROR] [zcli/ERR] failed']);
    });
});

describe('maskCredential', () => {
    it('keeps only a short prefix', () => {
        expect(maskCredential('test-secret')).toBe('test…');
        expect(maskCredential('abc')).toBe('****');
    });
});
