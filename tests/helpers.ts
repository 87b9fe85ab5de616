/**
 * In-process HTTP stand-ins for Google, Supabase and the BrainLift API
 */
import * as http from 'http';
import * as net from 'net';

export interface RecordedRequest {
    method: string;
    path: string;
    query: URLSearchParams;
    headers: http.IncomingHttpHeaders;
    body: string;
}

export interface Reply {
    status?: number;
    body?: unknown;
    delayMs?: number;
}

export interface StubServer {
    url: string;
    requests: RecordedRequest[];
    close(): Promise<void>;
}

export async function startServer(handler: (req: RecordedRequest) => Reply | Promise<Reply>): Promise<StubServer> {
    const requests: RecordedRequest[] = [];

    const server = http.createServer((req, res) => {
        const chunks: Buffer[] = [];
        req.on('data', (chunk: Buffer) => chunks.push(chunk));
        req.on('end', async () => {
            const parsed = new URL(req.url ?? '/', 'http://127.0.0.1');
            const recorded: RecordedRequest = {
                method: req.method ?? 'GET',
                path: parsed.pathname,
                query: parsed.searchParams,
                headers: req.headers,
                body: Buffer.concat(chunks).toString('utf8'),
            };
            requests.push(recorded);

            const reply = await handler(recorded);
            if (reply.delayMs) {
                await new Promise((resolve) => setTimeout(resolve, reply.delayMs));
            }
            if (res.destroyed) return;

            const isText = typeof reply.body === 'string';
            res.writeHead(reply.status ?? 200, {
                'Content-Type': isText ? 'text/plain' : 'application/json',
                Connection: 'close',
            });
            res.end(reply.body === undefined ? '' : isText ? reply.body : JSON.stringify(reply.body));
        });
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;

    return {
        url: `http://127.0.0.1:${port}`,
        requests,
        close: () =>
            new Promise<void>((resolve) => {
                server.closeAllConnections();
                server.close(() => resolve());
            }),
    };
}

/** A port nothing is listening on right now */
export async function freePort(): Promise<number> {
    const server = net.createServer();
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;
    await new Promise<void>((resolve) => server.close(() => resolve()));
    return port;
}

/** GET a URL, retrying while the listener is still starting up */
export async function fetchWhenListening(url: string, attempts = 40): Promise<Response> {
    for (let i = 1; ; i++) {
        try {
            return await fetch(url, { headers: { Connection: 'close' } });
        } catch (error) {
            if (i >= attempts) throw error;
            await new Promise((resolve) => setTimeout(resolve, 25));
        }
    }
}
