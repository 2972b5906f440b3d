import * as readline from 'readline';
import { Readable, Writable } from 'stream';
import { Dispatcher, SessionState } from '../managers/Dispatcher.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface StdioInterfaceOptions {
    /** Credential shared by every call in this session; null only when validation was skipped. */
    credential: string | null;
    input?: Readable;
    output?: Writable;
    shutdownSignal?: AbortSignal;
}

/**
 * Newline-delimited JSON-RPC over stdin/stdout. One session per process, one request at a time,
 * responses written in the order requests were read.
 */
export class StdioInterface {
    private dispatcher: Dispatcher;
    private credential: string | null;
    private input: Readable;
    private output: Writable;
    private session: SessionState = { clientInfo: null };
    private controller = new AbortController();
    private reader: readline.Interface | null = null;
    private loop: Promise<void> | null = null;

    constructor(dispatcher: Dispatcher, options: StdioInterfaceOptions) {
        this.dispatcher = dispatcher;
        this.credential = options.credential;
        this.input = options.input ?? process.stdin;
        this.output = options.output ?? process.stdout;

        const shutdownSignal = options.shutdownSignal;
        if (shutdownSignal?.aborted) {
            this.controller.abort();
        }
        shutdownSignal?.addEventListener('abort', () => this.stopReading(), { once: true });
    }

    /**
     * Starts the read-dispatch-write loop. Returns once reading has begun; see closed().
     */
    public async start(): Promise<void> {
        if (this.loop) {
            logger.warn('STDIO interface already started.');
            return;
        }
        this.reader = readline.createInterface({ input: this.input, crlfDelay: Infinity, terminal: false });
        this.loop = this.run(this.reader).catch((error: unknown) => {
            logger.error(`STDIO loop failed: ${errorMessage(error)}`, error);
        });
        logger.info('STDIO interface ready.');
    }

    /**
     * Resolves when the input stream ends or the interface is stopped.
     */
    public async closed(): Promise<void> {
        await this.loop;
    }

    public async stop(): Promise<void> {
        logger.info('Stopping STDIO interface...');
        this.stopReading();
        await this.loop;
    }

    private stopReading(): void {
        this.controller.abort();
        this.reader?.close();
    }

    private async run(reader: readline.Interface): Promise<void> {
        for await (const line of reader) {
            if (this.controller.signal.aborted) {
                break;
            }
            const message = line.trim();
            if (!message) {
                continue;
            }

            const outcome = await this.dispatcher.handleRaw(message, {
                transport: 'stdio',
                credential: this.credential,
                session: this.session,
                signal: this.controller.signal,
            });

            // Abandoned on shutdown: nothing is written for the interrupted request.
            if (this.controller.signal.aborted) {
                break;
            }
            if (outcome.response) {
                await this.write(`${JSON.stringify(outcome.response)}\n`);
            }
        }
        logger.info('STDIO input closed.');
    }

    private write(data: string): Promise<void> {
        return new Promise((resolve, reject) => {
            this.output.write(data, (error?: Error | null) => {
                if (error) {
                    reject(error);
                } else {
                    resolve();
                }
            });
        });
    }
}
