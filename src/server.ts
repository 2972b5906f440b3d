#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { hideBin } from 'yargs/helpers';
import { ConfigurationManager } from './config/ConfigurationManager.js';
import { resolveStdioCredential } from './managers/ContextFactory.js';
import { HttpInterface } from './interfaces/HttpInterface.js';
import { StdioInterface } from './interfaces/StdioInterface.js';
import { createApplication, SERVER_INFO } from './app.js';
import { ConfigurationError, errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

interface Transport {
    stop(): Promise<void>;
}

// --- Main Application ---
async function main(): Promise<void> {
    // .env never overrides variables already set in the environment.
    dotenv.config();

    logger.info(`--- ${SERVER_INFO.name} ${SERVER_INFO.version} starting ---`);

    const configManager = ConfigurationManager.getInstance(hideBin(process.argv));
    const shutdownController = new AbortController();
    let transport: Transport | null = null;
    let shuttingDown = false;

    const shutdown = async (exitCode: number): Promise<void> => {
        if (shuttingDown) {
            return;
        }
        shuttingDown = true;
        logger.info('Initiating shutdown sequence...');
        shutdownController.abort();
        const results = await Promise.allSettled([transport?.stop(), configManager.closeWatcher()]);
        for (const result of results) {
            if (result.status === 'rejected') {
                logger.error(`Error during shutdown: ${errorMessage(result.reason)}`);
                exitCode = exitCode || 1;
            }
        }
        logger.info(`--- ${SERVER_INFO.name} exiting (code: ${exitCode}) ---`);
        process.exit(exitCode);
    };

    process.on('SIGINT', () => void shutdown(0));
    process.on('SIGTERM', () => void shutdown(0));
    process.on('unhandledRejection', (reason: unknown) => {
        logger.error(`Unhandled rejection: ${errorMessage(reason)}`, reason);
    });

    try {
        const settings = await configManager.load();
        configManager.watch();

        const app = createApplication(settings);
        logger.info(`Tools registered: ${app.registry.list().length}`);

        if (settings.transport === 'http') {
            const http = new HttpInterface(app.dispatcher, {
                host: settings.httpHost,
                port: settings.httpPort,
                path: settings.httpPath,
                allowedOrigins: settings.allowedOrigins,
                serviceName: SERVER_INFO.name,
                shutdownSignal: shutdownController.signal,
            });
            transport = http;
            await http.start();
        } else {
            const credential = resolveStdioCredential(settings.credential ?? undefined, settings.skipValidation);
            if (!credential) {
                logger.warn('Starting without a credential; tools needing the platform API will report an error.');
            }
            const stdio = new StdioInterface(app.dispatcher, {
                credential,
                shutdownSignal: shutdownController.signal,
            });
            transport = stdio;
            await stdio.start();
            logger.info(`--- ${SERVER_INFO.name} ready (stdio) ---`);
            await stdio.closed();
            await shutdown(0);
            return;
        }

        logger.info(`--- ${SERVER_INFO.name} ready (http) ---`);
    } catch (error: unknown) {
        if (error instanceof ConfigurationError) {
            logger.error(`Configuration error: ${error.message}`);
        } else {
            logger.error(`Fatal error during startup: ${errorMessage(error)}`, error);
        }
        await shutdown(1);
    }
}

main().catch((error: unknown) => {
    logger.error(`Unhandled error in main function: ${errorMessage(error)}`, error);
    process.exit(1);
});
