import yargs from 'yargs';
import { ConfigurationError } from '../utils/errors.js';
import { SettingsOverrides } from '../types/configTypes.js';

export interface CliOptions {
    overrides: SettingsOverrides;
    configPath: string | null;
}

/**
 * Parses command-line flags. `argv` is the argument list without the node binary and script,
 * i.e. `hideBin(process.argv)`.
 * @throws ConfigurationError on unknown flags or invalid values.
 */
export function parseCliOptions(argv: string[]): CliOptions {
    const parsed = yargs(argv)
        .scriptName('zerops-mcp')
        .usage('$0 [options]')
        .option('transport', {
            type: 'string',
            choices: ['stdio', 'http'] as const,
            describe: 'Transport to serve on',
        })
        .option('host', { type: 'string', describe: 'HTTP listen host' })
        .option('port', { type: 'number', describe: 'HTTP listen port' })
        .option('log-level', {
            type: 'string',
            choices: ['error', 'warn', 'info', 'debug'] as const,
            describe: 'Minimum log level',
        })
        .option('skip-validation', {
            type: 'boolean',
            describe: 'Start stdio mode without ZEROPS_API_KEY (local testing only)',
        })
        .option('config', { type: 'string', describe: 'Path to a JSON config file' })
        .strict()
        .exitProcess(false)
        .fail((message: string | null | undefined, error: Error | undefined) => {
            throw new ConfigurationError(`Invalid command line: ${message ?? error?.message ?? 'unknown error'}`);
        })
        .parseSync();

    const overrides: SettingsOverrides = {};
    if (parsed.transport !== undefined) {
        overrides.transport = parsed.transport;
    }
    if (parsed.host !== undefined) {
        overrides.httpHost = parsed.host;
    }
    if (parsed.port !== undefined) {
        if (!Number.isInteger(parsed.port) || parsed.port < 0 || parsed.port > 65535) {
            throw new ConfigurationError(`Invalid command line: --port must be a port number, got '${parsed.port}'`);
        }
        overrides.httpPort = parsed.port;
    }
    if (parsed.logLevel !== undefined) {
        overrides.logLevel = parsed.logLevel;
    }
    if (parsed.skipValidation !== undefined) {
        overrides.skipValidation = parsed.skipValidation;
    }

    return { overrides, configPath: parsed.config ?? null };
}
