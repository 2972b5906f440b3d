import * as http from 'http';
import { AddressInfo } from 'net';

export interface RecordedRequest {
    method: string;
    /** Path without the query string. */
    path: string;
    /** Path and query string as received. */
    url: string;
    headers: http.IncomingHttpHeaders;
    body: unknown;
}

export interface FakeReply {
    status?: number;
    body?: unknown;
    /** Sent verbatim instead of JSON-encoding `body`. */
    raw?: string;
    delayMs?: number;
}

export type RouteHandler = (request: RecordedRequest) => FakeReply;

/**
 * In-process stand-in for an upstream HTTP API. Routes are matched on `METHOD path`.
 */
export class FakeHttpServer {
    public readonly requests: RecordedRequest[] = [];
    private routes = new Map<string, RouteHandler>();
    private server: http.Server;

    constructor() {
        this.server = http.createServer((req, res) => {
            const chunks: Buffer[] = [];
            req.on('data', (chunk: Buffer) => chunks.push(chunk));
            req.on('end', () => {
                const text = Buffer.concat(chunks).toString('utf-8');
                const url = req.url ?? '/';
                const recorded: RecordedRequest = {
                    method: req.method ?? 'GET',
                    path: url.split('?')[0],
                    url,
                    headers: req.headers,
                    body: text === '' ? undefined : JSON.parse(text),
                };
                this.requests.push(recorded);

                const handler = this.routes.get(`${recorded.method} ${recorded.path}`);
                const reply: FakeReply = handler
                    ? handler(recorded)
                    : { status: 404, body: { error: { code: 'routeNotFound', message: `no route for ${recorded.method} ${recorded.path}` } } };
                const send = () => {
                    const payload = reply.raw ?? (reply.body === undefined ? '' : JSON.stringify(reply.body));
                    res.writeHead(reply.status ?? 200, { 'Content-Type': 'application/json' });
                    res.end(payload);
                };
                if (reply.delayMs) {
                    setTimeout(send, reply.delayMs);
                } else {
                    send();
                }
            });
        });
    }

    public route(method: string, path: string, reply: FakeReply | RouteHandler): this {
        this.routes.set(`${method} ${path}`, typeof reply === 'function' ? reply : () => reply);
        return this;
    }

    /**
     * @returns Base URL, e.g. `http://127.0.0.1:40123`.
     */
    public async start(): Promise<string> {
        await new Promise<void>(resolve => this.server.listen(0, '127.0.0.1', resolve));
        const address: AddressInfo | string | null = this.server.address();
        if (!address || typeof address === 'string') {
            throw new Error('fake server has no port');
        }
        return `http://127.0.0.1:${address.port}`;
    }

    public async stop(): Promise<void> {
        this.server.closeAllConnections();
        await new Promise<void>(resolve => this.server.close(() => resolve()));
    }

    public requestsTo(method: string, path: string): RecordedRequest[] {
        return this.requests.filter(request => request.method === method && request.path === path);
    }
}
