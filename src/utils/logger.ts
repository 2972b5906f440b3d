import { LogLevel } from '../types/loggingTypes.js';

// Numeric level for each log type, used for filtering.
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

/**
 * Leveled logger for the tool server.
 * Everything goes to stderr; stdout belongs to the stdio JSON-RPC stream.
 */
export class Logger {
    private currentLevel: LogLevel = 'info';
    private currentLevelValue: number = LOG_LEVEL_VALUES[this.currentLevel];

    /**
     * Sets the minimum log level to output.
     * @param level - The minimum log level ('error', 'warn', 'info', 'debug').
     */
    public setLevel(level: LogLevel): void {
        this.currentLevel = level;
        this.currentLevelValue = LOG_LEVEL_VALUES[level];
        this.info(`Log level set to: ${level}`);
    }

    public getLevel(): LogLevel {
        return this.currentLevel;
    }

    public debug(message: string, ...args: unknown[]): void {
        this.log('debug', message, args);
    }

    public info(message: string, ...args: unknown[]): void {
        this.log('info', message, args);
    }

    public warn(message: string, ...args: unknown[]): void {
        this.log('warn', message, args);
    }

    /**
     * Logs an error message (highest level).
     * @param args - Additional arguments to log (often an Error object).
     */
    public error(message: string, ...args: unknown[]): void {
        this.log('error', message, args);
    }

    /**
     * Logs output captured from a child process, one entry per non-empty line.
     * @param source - Label for the process, e.g. the CLI name.
     * @param output - The raw chunk (can contain multiple lines).
     * @param isErrorOutput - True when the chunk came from stderr.
     */
    public captureOutput(source: string, output: string, isErrorOutput: boolean = false): void {
        const level: LogLevel = isErrorOutput ? 'error' : 'debug';
        const prefix = `[${source}${isErrorOutput ? '/ERR' : ''}]`;

        output.split(/\r?\n/).forEach(line => {
            const trimmedLine = line.trim();
            if (trimmedLine) {
                this.log(level, `${prefix} ${trimmedLine}`);
            }
        });
    }

    private log(level: LogLevel, message: string, args: unknown[] = []): void {
        if (LOG_LEVEL_VALUES[level] >= this.currentLevelValue) {
            const timestamp = new Date().toISOString();
            const formattedMessage = `${timestamp} [${level.toUpperCase()}] ${message}`;

            if (args.length > 0) {
                console.error(formattedMessage, ...args);
            } else {
                console.error(formattedMessage);
            }
        }
    }
}

/**
 * Shortens a credential for log output: first four characters and an ellipsis.
 */
export function maskCredential(credential: string): string {
    if (credential.length <= 4) {
        return '****';
    }
    return `${credential.slice(0, 4)}…`;
}

// Export a singleton instance
export const logger = new Logger();
