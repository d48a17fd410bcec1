/**
 * Core HTTP client implementation based on undici.
 */
import { Dispatcher, Pool } from 'undici';
import { AuthHandler, createAuthHandler } from '../auth/auth-handler.js';
import { ClientConfig, ResolvedConfig, resolveConfig } from '../config.js';
import { TransportError } from '../errors.js';
import { maskHeaders } from '../sensitive.js';
import { ClientLogger, RequestContext, RequestOptions, StoreResponse } from '../types.js';

const LOG_PREFIX = '[KvStoreClient]';

const silentLogger: ClientLogger = {
    debug: () => undefined,
    trace: () => undefined
};

/**
 * Format body for logging; long bodies are truncated.
 */
function formatBody(body: string): string {
    if (!body) {
        return '<empty>';
    }
    if (body.length > 5000) {
        return body.slice(0, 5000) + '... (truncated)';
    }
    return body;
}

// Socket errors are raised by Node itself and may fail `instanceof Error` under a sandboxed runner
function toError(error: unknown): Error {
    if (error instanceof Error) return error;
    const message = typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string'
        ? error.message
        : String(error);
    return new Error(message, { cause: error });
}

function flattenHeaders(headers: Dispatcher.ResponseData['headers']): Record<string, string> {
    const flat: Record<string, string> = {};
    for (const [name, value] of Object.entries(headers)) {
        if (value === undefined) continue;
        flat[name] = Array.isArray(value) ? value.join(', ') : value;
    }
    return flat;
}

export class BaseClient {
    protected config: ResolvedConfig;
    protected logger: ClientLogger;
    private dispatcher?: Dispatcher;
    private authHandler: AuthHandler;
    private ownDispatcher: boolean = false;
    private origin: string;
    private basePath: string;

    constructor(config: ClientConfig) {
        this.config = resolveConfig(config);
        this.logger = config.logger ?? silentLogger;

        // undici.Pool only accepts an origin, so a path on the address is
        // prepended to every request path instead.
        const url = new URL(this.config.address);
        this.origin = url.origin;
        this.basePath = url.pathname;
        if (this.basePath.endsWith('/')) {
            this.basePath = this.basePath.slice(0, -1);
        }

        this.authHandler = createAuthHandler(this.config.auth);

        this.dispatcher = config.dispatcher;
        this.ownDispatcher = !this.dispatcher;
    }

    /**
     * Initialize dispatcher if needed.
     */
    private ensureDispatcher(): Dispatcher {
        if (this.dispatcher) return this.dispatcher;

        this.dispatcher = new Pool(this.origin, {
            connect: {
                timeout: this.config.timeout.connect
            },
            headersTimeout: this.config.timeout.read,
            bodyTimeout: this.config.timeout.read
        });
        this.ownDispatcher = true;
        return this.dispatcher;
    }

    async close(): Promise<void> {
        if (this.ownDispatcher && this.dispatcher) {
            await this.dispatcher.close();
            this.dispatcher = undefined;
        }
    }

    async request(options: RequestOptions): Promise<StoreResponse> {
        const { response, path } = await this.dispatchRequest(options);

        let text: string;
        try {
            text = await response.body.text();
        } catch (error) {
            throw new TransportError(options.method || 'GET', path, toError(error));
        }
        this.logger.trace(`${LOG_PREFIX} Response ${response.statusCode} ${path}: ${formatBody(text)}`);

        let data: unknown = text;
        if (text) {
            try {
                data = JSON.parse(text);
            } catch {
                data = text;
            }
        }

        return {
            status: response.statusCode,
            headers: flattenHeaders(response.headers),
            path,
            data,
            ok: response.statusCode >= 200 && response.statusCode < 300
        };
    }

    protected buildPath(options: RequestOptions): string {
        const reqPath = options.url || '/';
        const withBase = `${this.basePath}${reqPath.startsWith('/') ? '' : '/'}${reqPath}`;
        const query = new URLSearchParams(options.query ?? {}).toString();
        return query ? `${withBase}?${query}` : withBase;
    }

    protected async dispatchRequest(options: RequestOptions): Promise<{ response: Dispatcher.ResponseData, path: string }> {
        const dispatcher = this.ensureDispatcher();

        const method = options.method || 'GET';
        const path = this.buildPath(options);

        const headers: Record<string, string> = { ...this.config.headers };

        let body: string | undefined;
        if (options.json !== undefined) {
            body = JSON.stringify(options.json);
            if (!headers['Content-Type']) {
                headers['Content-Type'] = 'application/json';
            }
        }

        const context: RequestContext = {
            method,
            url: `${this.origin}${path}`,
            headers
        };
        const authHeaders = this.authHandler.getHeader(context);
        if (authHeaders) {
            Object.assign(headers, authHeaders);
        }

        this.logger.debug(`${LOG_PREFIX} Request: ${method} ${path}`, maskHeaders(headers));

        try {
            const response = await dispatcher.request({
                method,
                path,
                headers,
                body,
                headersTimeout: this.config.timeout.read,
                bodyTimeout: this.config.timeout.read
            });
            return { response, path };
        } catch (error) {
            throw new TransportError(method, path, toError(error));
        }
    }
}
