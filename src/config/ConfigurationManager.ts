import * as fs from 'fs/promises';
import * as path from 'path';
import { EventEmitter } from 'events';
import { FSWatcher, watch } from 'chokidar';
import {
    ConfigFile,
    ConfigFileSchema,
    DEFAULT_SETTINGS,
    LogLevelSchema,
    ServerSettings,
    SettingsOverrides,
    TransportSchema,
} from '../types/configTypes.js';
import { ConfigEvents, SettingsUpdatedPayload } from '../types/eventTypes.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { parseCliOptions } from './cliOptions.js';

const RELOAD_DEBOUNCE_MS = 500;

// Applied on reload; every other setting is read once at startup.
const LIVE_SETTINGS: ReadonlySet<keyof ServerSettings> = new Set<keyof ServerSettings>(['logLevel']);

export interface ConfigSources {
    /** Command-line arguments without the node binary and script path. */
    argv: string[];
    env: NodeJS.ProcessEnv;
}

/**
 * Replaces `${VAR}` references in every string of a parsed JSON value. Unset variables become ''.
 */
export function substituteEnvVars(value: unknown, env: NodeJS.ProcessEnv): unknown {
    if (typeof value === 'string') {
        return value.replace(/\$\{([^}]+)\}/g, (_match: string, name: string) => env[name] ?? '');
    }
    if (Array.isArray(value)) {
        return value.map(item => substituteEnvVars(item, env));
    }
    if (typeof value === 'object' && value !== null) {
        return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, substituteEnvVars(item, env)]));
    }
    return value;
}

function nonEmpty(value: string | undefined): string | undefined {
    if (value === undefined) {
        return undefined;
    }
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
}

/**
 * Reads the settings the environment can override.
 * @throws ConfigurationError when a variable holds a value of the wrong shape.
 */
export function envOverrides(env: NodeJS.ProcessEnv): SettingsOverrides {
    const overrides: SettingsOverrides = {};

    const transport = nonEmpty(env.MCP_TRANSPORT);
    if (transport !== undefined) {
        const parsed = TransportSchema.safeParse(transport.toLowerCase());
        if (!parsed.success) {
            throw new ConfigurationError(`MCP_TRANSPORT must be 'stdio' or 'http', got '${transport}'`);
        }
        overrides.transport = parsed.data;
    }

    const host = nonEmpty(env.MCP_HOST);
    if (host !== undefined) {
        overrides.httpHost = host;
    }

    const port = nonEmpty(env.MCP_PORT);
    if (port !== undefined) {
        const value = Number(port);
        if (!Number.isInteger(value) || value < 0 || value > 65535) {
            throw new ConfigurationError(`MCP_PORT must be a port number, got '${port}'`);
        }
        overrides.httpPort = value;
    }

    const logLevel = nonEmpty(env.LOG_LEVEL);
    if (logLevel !== undefined) {
        const parsed = LogLevelSchema.safeParse(logLevel.toLowerCase());
        if (!parsed.success) {
            throw new ConfigurationError(`LOG_LEVEL must be one of error, warn, info, debug, got '${logLevel}'`);
        }
        overrides.logLevel = parsed.data;
    }

    const apiEndpoint = nonEmpty(env.ZEROPS_API_URL);
    if (apiEndpoint !== undefined) {
        overrides.apiEndpoint = apiEndpoint;
    }
    const knowledgeEndpoint = nonEmpty(env.ZEROPS_KNOWLEDGE_URL);
    if (knowledgeEndpoint !== undefined) {
        overrides.knowledgeEndpoint = knowledgeEndpoint;
    }
    const deployCommand = nonEmpty(env.ZEROPS_CLI);
    if (deployCommand !== undefined) {
        overrides.deployCommand = deployCommand;
    }

    const skipValidation = nonEmpty(env.SKIP_VALIDATION);
    if (skipValidation !== undefined) {
        overrides.skipValidation = skipValidation === 'true' || skipValidation === '1';
    }

    const credential = nonEmpty(env.ZEROPS_API_KEY);
    if (credential !== undefined) {
        overrides.credential = credential;
    }
    const projectId = nonEmpty(env.projectId);
    if (projectId !== undefined) {
        overrides.defaultProjectId = projectId;
    }

    return overrides;
}

/**
 * Settings that differ between the two snapshots and only take effect after a restart.
 */
export function settingsNeedingRestart(oldSettings: ServerSettings, newSettings: ServerSettings): Array<keyof ServerSettings> {
    const keys = Object.keys(DEFAULT_SETTINGS).filter((key): key is keyof ServerSettings => key in newSettings);
    return keys.filter(key => !LIVE_SETTINGS.has(key)
        && JSON.stringify(oldSettings[key]) !== JSON.stringify(newSettings[key]));
}

function mergeSettings(file: ConfigFile, env: SettingsOverrides, cli: SettingsOverrides): ServerSettings {
    return {
        ...DEFAULT_SETTINGS,
        ...file,
        ...env,
        ...cli,
    };
}

/**
 * Loads layered settings (defaults, JSON file, environment, command line) and watches the file for changes.
 * Emits 'settingsUpdated' after a reload that changed something and 'configError' when a reload fails.
 */
export class ConfigurationManager extends EventEmitter {
    private static instance: ConfigurationManager;
    private sources: ConfigSources;
    private settings: ServerSettings | null = null;
    private configPath: string | null = null;
    private envLayer: SettingsOverrides = {};
    private cliLayer: SettingsOverrides = {};
    private watcher: FSWatcher | null = null;
    private isLoading = false;
    private debounceTimer: NodeJS.Timeout | null = null;

    constructor(sources: ConfigSources) {
        super();
        this.sources = sources;
    }

    /**
     * Process-wide instance reading `process.argv` and `process.env`.
     */
    public static getInstance(argv: string[] = process.argv.slice(2)): ConfigurationManager {
        if (!ConfigurationManager.instance) {
            ConfigurationManager.instance = new ConfigurationManager({ argv, env: process.env });
        }
        return ConfigurationManager.instance;
    }

    /**
     * Resolves the settings once. Call before anything reads them.
     * @throws ConfigurationError on invalid flags, environment values or config file.
     */
    public async load(): Promise<ServerSettings> {
        if (this.settings) {
            logger.warn('Configuration already loaded. Ignoring subsequent load call.');
            return this.settings;
        }

        const cli = parseCliOptions(this.sources.argv);
        this.cliLayer = cli.overrides;
        this.envLayer = envOverrides(this.sources.env);

        const configPath = cli.configPath ?? nonEmpty(this.sources.env.MCP_CONFIG) ?? null;
        let file: ConfigFile = {};
        if (configPath) {
            this.configPath = path.resolve(configPath);
            logger.info(`Loading configuration file: ${this.configPath}`);
            file = await this.readConfigFile(this.configPath);
        }

        this.settings = mergeSettings(file, this.envLayer, this.cliLayer);
        this.applyLogLevel(this.settings);
        return this.settings;
    }

    /**
     * Starts watching the config file, if one was loaded.
     */
    public watch(): void {
        if (!this.configPath) {
            return;
        }
        if (this.watcher) {
            logger.warn('Config watcher already running.');
            return;
        }

        logger.info(`Watching configuration file: ${this.configPath}`);
        this.watcher = watch(this.configPath, {
            persistent: true,
            ignoreInitial: true,
            awaitWriteFinish: {
                stabilityThreshold: RELOAD_DEBOUNCE_MS,
                pollInterval: 100,
            },
        });
        this.watcher
            .on('change', () => this.handleFileChange())
            .on('error', (error: unknown) => logger.error(`Watcher error: ${errorMessage(error)}`));
    }

    /**
     * Re-reads the config file and re-applies the environment and command-line layers on top.
     * On failure the previous settings stay active.
     */
    public async reload(): Promise<void> {
        if (!this.configPath || !this.settings) {
            return;
        }
        if (this.isLoading) {
            logger.warn('Skipping config reload: already loading.');
            return;
        }

        this.isLoading = true;
        try {
            const file = await this.readConfigFile(this.configPath);
            const oldSettings = this.settings;
            const newSettings = mergeSettings(file, this.envLayer, this.cliLayer);
            if (JSON.stringify(oldSettings) === JSON.stringify(newSettings)) {
                logger.info('Configuration file reloaded, but no effective changes detected.');
                return;
            }
            this.settings = newSettings;
            this.applyLogLevel(newSettings);
            const pending = settingsNeedingRestart(oldSettings, newSettings);
            if (pending.length > 0) {
                logger.warn(`Configuration reloaded. Restart the server to apply: ${pending.join(', ')}`);
            } else {
                logger.info('Configuration reloaded.');
            }
            const payload: SettingsUpdatedPayload = { newSettings, oldSettings };
            this.emit(ConfigEvents.SETTINGS_UPDATED, payload);
        } catch (error: unknown) {
            logger.error(`Failed to reload configuration: ${errorMessage(error)}. Keeping previous configuration active.`);
            this.emit(ConfigEvents.CONFIG_ERROR, error);
        } finally {
            this.isLoading = false;
        }
    }

    public async closeWatcher(): Promise<void> {
        if (this.debounceTimer) {
            clearTimeout(this.debounceTimer);
            this.debounceTimer = null;
        }
        if (this.watcher) {
            logger.info('Closing configuration file watcher.');
            await this.watcher.close();
            this.watcher = null;
        }
    }

    private handleFileChange(): void {
        if (this.debounceTimer) {
            clearTimeout(this.debounceTimer);
        }
        this.debounceTimer = setTimeout(() => {
            this.debounceTimer = null;
            logger.info(`Configuration file change detected: ${this.configPath}`);
            void this.reload();
        }, RELOAD_DEBOUNCE_MS);
    }

    private async readConfigFile(filePath: string): Promise<ConfigFile> {
        let raw: unknown;
        try {
            raw = JSON.parse(await fs.readFile(filePath, 'utf-8'));
        } catch (error: unknown) {
            throw new ConfigurationError(`Failed to read config file ${filePath}: ${errorMessage(error)}`);
        }

        const result = ConfigFileSchema.safeParse(substituteEnvVars(raw, this.sources.env));
        if (!result.success) {
            const lines = result.error.errors.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
            throw new ConfigurationError(`Invalid config file ${filePath}:\n- ${lines.join('\n- ')}`);
        }
        return result.data;
    }

    private applyLogLevel(settings: ServerSettings): void {
        if (settings.logLevel !== logger.getLevel()) {
            logger.setLevel(settings.logLevel);
        }
    }
}
