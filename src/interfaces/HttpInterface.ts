import * as http from 'http';
import { AddressInfo } from 'net';
import { URL } from 'url';
import { Dispatcher } from '../managers/Dispatcher.js';
import { parseBearerToken } from '../managers/ContextFactory.js';
import { JsonRpcResponse } from '../types/rpcTypes.js';
import { errorMessage } from '../utils/errors.js';
import { logger, maskCredential } from '../utils/logger.js';

export const MAX_BODY_BYTES = 1024 * 1024;

const CORS_HEADERS: Record<string, string> = {
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type, Authorization, MCP-Protocol-Version, Mcp-Session-Id, Accept',
};

export interface HttpInterfaceOptions {
    host: string;
    /** 0 picks an ephemeral port; see getPort(). */
    port: number;
    /** Path of the JSON-RPC endpoint, e.g. `/mcp`. */
    path: string;
    /** Origins allowed to call the endpoint. Empty means any. */
    allowedOrigins: string[];
    /** Reported by the health endpoint. */
    serviceName: string;
    /** Process-wide shutdown signal; aborting it cancels every in-flight request. */
    shutdownSignal?: AbortSignal;
}

type BodyResult = { tooLarge: false; body: string } | { tooLarge: true };

function readBody(req: http.IncomingMessage, limit: number): Promise<BodyResult> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        let size = 0;
        let tooLarge = false;
        req.on('data', (chunk: Buffer) => {
            size += chunk.length;
            if (size > limit) {
                // Keep draining so the 413 can still be written on this socket.
                tooLarge = true;
                chunks.length = 0;
                return;
            }
            if (!tooLarge) {
                chunks.push(chunk);
            }
        });
        req.on('end', () => {
            resolve(tooLarge ? { tooLarge: true } : { tooLarge: false, body: Buffer.concat(chunks).toString('utf-8') });
        });
        req.on('error', reject);
    });
}

function wantsEventStream(req: http.IncomingMessage): boolean {
    return (req.headers.accept ?? '').includes('text/event-stream');
}

/**
 * Stateless HTTP transport: one JSON-RPC envelope per POST, authenticated per request by a bearer token.
 */
export class HttpInterface {
    private dispatcher: Dispatcher;
    private options: HttpInterfaceOptions;
    private httpServer: http.Server | null = null;

    constructor(dispatcher: Dispatcher, options: HttpInterfaceOptions) {
        this.dispatcher = dispatcher;
        this.options = options;
    }

    /**
     * Binds the listener. Rejects when the port cannot be bound.
     */
    public async start(): Promise<void> {
        if (this.httpServer) {
            logger.warn('HTTP server already running.');
            return;
        }

        const server = http.createServer((req, res) => {
            this.handleHttpRequest(req, res).catch((error: unknown) => {
                logger.error(`Unhandled error serving ${req.method} ${req.url}: ${errorMessage(error)}`, error);
                if (!res.headersSent) {
                    res.writeHead(500, { 'Content-Type': 'text/plain' });
                }
                res.end('Internal Server Error');
            });
        });

        await new Promise<void>((resolve, reject) => {
            server.once('error', (err: Error) => {
                logger.error(`HTTP server error: ${err.message}`);
                reject(err);
            });
            server.listen(this.options.port, this.options.host, () => {
                this.httpServer = server;
                logger.info(`HTTP interface listening on http://${this.options.host}:${this.getPort()}${this.options.path}`);
                resolve();
            });
        });
    }

    /**
     * Bound port, or null when not listening.
     */
    public getPort(): number | null {
        const address = this.httpServer?.address();
        if (!address || typeof address === 'string') {
            return null;
        }
        const info: AddressInfo = address;
        return info.port;
    }

    public async stop(): Promise<void> {
        const server = this.httpServer;
        if (!server) {
            return;
        }
        logger.info('Stopping HTTP interface...');
        this.httpServer = null;
        await new Promise<void>((resolve, reject) => {
            server.close((err?: Error) => {
                if (err) {
                    logger.error(`Error closing HTTP server: ${err.message}`);
                    reject(err);
                } else {
                    logger.info('HTTP interface stopped.');
                    resolve();
                }
            });
            server.closeIdleConnections();
        });
    }

    private async handleHttpRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
        const requestUrl = new URL(req.url ?? '/', 'http://localhost');
        logger.debug(`HTTP request: ${req.method} ${requestUrl.pathname}`);

        res.setHeader('X-Content-Type-Options', 'nosniff');
        res.setHeader('X-Frame-Options', 'DENY');
        for (const [name, value] of Object.entries(CORS_HEADERS)) {
            res.setHeader(name, value);
        }

        // Liveness answers regardless of origin or credentials.
        if (requestUrl.pathname === '/health' && req.method === 'GET') {
            const body = JSON.stringify({ status: 'healthy', service: this.options.serviceName, transport: 'http' });
            res.writeHead(200, { 'Content-Type': 'application/json' }).end(body);
            return;
        }

        const origin = req.headers.origin;
        if (this.options.allowedOrigins.length === 0) {
            res.setHeader('Access-Control-Allow-Origin', '*');
        } else if (origin !== undefined) {
            if (!this.options.allowedOrigins.includes(origin)) {
                logger.warn(`Rejecting request from disallowed origin: ${origin}`);
                res.writeHead(403, { 'Content-Type': 'text/plain' }).end('Forbidden');
                return;
            }
            res.setHeader('Access-Control-Allow-Origin', origin);
            res.setHeader('Vary', 'Origin');
        }

        if (req.method === 'OPTIONS') {
            res.writeHead(200).end();
            return;
        }

        if (requestUrl.pathname !== this.options.path) {
            res.writeHead(404, { 'Content-Type': 'text/plain' }).end('Not Found');
            return;
        }

        if (req.method !== 'POST') {
            res.writeHead(405, { 'Content-Type': 'text/plain', Allow: 'POST, OPTIONS' }).end('Method Not Allowed');
            return;
        }

        const token = parseBearerToken(req.headers.authorization);
        if (!token) {
            logger.debug('Rejecting request without bearer token');
            res.writeHead(401, { 'Content-Type': 'text/plain', 'WWW-Authenticate': 'Bearer' }).end('Unauthorized');
            return;
        }

        const declaredLength = Number(req.headers['content-length']);
        if (Number.isFinite(declaredLength) && declaredLength > MAX_BODY_BYTES) {
            res.writeHead(413, { 'Content-Type': 'text/plain', Connection: 'close' }).end('Payload Too Large');
            req.resume();
            return;
        }
        const body = await readBody(req, MAX_BODY_BYTES);
        if (body.tooLarge) {
            res.writeHead(413, { 'Content-Type': 'text/plain' }).end('Payload Too Large');
            return;
        }

        logger.debug(`Dispatching HTTP request for token ${maskCredential(token)}`);
        const controller = new AbortController();
        const abort = () => controller.abort();
        res.on('close', () => {
            if (!res.writableFinished) {
                abort();
            }
        });
        const shutdownSignal = this.options.shutdownSignal;
        if (shutdownSignal?.aborted) {
            controller.abort();
        }
        shutdownSignal?.addEventListener('abort', abort, { once: true });

        try {
            const outcome = await this.dispatcher.handleRaw(body.body, {
                transport: 'http',
                credential: token,
                session: { clientInfo: null },
                signal: controller.signal,
            });
            if (outcome.response === null) {
                res.writeHead(202).end();
                return;
            }
            this.writeResponse(req, res, outcome.parseFailed ? 400 : 200, outcome.response);
        } finally {
            shutdownSignal?.removeEventListener('abort', abort);
        }
    }

    private writeResponse(req: http.IncomingMessage, res: http.ServerResponse, status: number, response: JsonRpcResponse): void {
        const payload = JSON.stringify(response);
        if (wantsEventStream(req)) {
            res.writeHead(status, {
                'Content-Type': 'text/event-stream',
                'Cache-Control': 'no-cache',
                Connection: 'keep-alive',
            });
            res.end(`data: ${payload}\n\n`);
            return;
        }
        res.writeHead(status, { 'Content-Type': 'application/json' });
        res.end(payload);
    }
}
