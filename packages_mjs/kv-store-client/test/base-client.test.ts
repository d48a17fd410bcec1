/**
 * Tests for BaseClient.
 */
import { MockAgent } from 'undici';
import { BaseClient } from '../src/core/base-client.js';
import { ClientLogger } from '../src/types.js';

const ORIGIN = 'https://store.test';

describe('BaseClient', () => {
    let mockAgent: MockAgent;

    beforeEach(() => {
        mockAgent = new MockAgent();
        mockAgent.disableNetConnect();
    });

    afterEach(async () => {
        await mockAgent.close();
    });

    test('prepends the address path to request paths', async () => {
        mockAgent.get(ORIGIN).intercept({ path: '/proxy/v1/sys/health', method: 'GET' }).reply(200, { ok: true });

        const client = new BaseClient({
            address: `${ORIGIN}/proxy`,
            auth: { token: 'test-token', namespace: 'team-a' },
            dispatcher: mockAgent.get(ORIGIN)
        });

        const res = await client.request({ method: 'GET', url: '/v1/sys/health' });
        expect(res.status).toBe(200);
        expect(res.ok).toBe(true);
        expect(res.path).toBe('/proxy/v1/sys/health');
        expect(res.data).toEqual({ ok: true });

        await client.close();
    });

    test('keeps a non-JSON body as text', async () => {
        mockAgent.get(ORIGIN).intercept({ path: '/plain', method: 'GET' }).reply(200, 'hello');

        const client = new BaseClient({
            address: ORIGIN,
            auth: { token: 'test-token', namespace: 'team-a' },
            dispatcher: mockAgent.get(ORIGIN)
        });

        const res = await client.request({ method: 'GET', url: '/plain' });
        expect(res.data).toBe('hello');
    });

    test('logs requests with the token masked', async () => {
        mockAgent.get(ORIGIN).intercept({ path: '/v1/kv/data/app', method: 'GET' }).reply(200, {});

        const debugLines: unknown[][] = [];
        const logger: ClientLogger = {
            debug: (message, ...args) => { debugLines.push([message, ...args]); },
            trace: () => undefined
        };
        const client = new BaseClient({
            address: ORIGIN,
            auth: { token: 'test-token', namespace: 'team-a' },
            dispatcher: mockAgent.get(ORIGIN),
            logger
        });

        await client.request({ method: 'GET', url: '/v1/kv/data/app' });

        expect(debugLines).toEqual([[
            '[KvStoreClient] Request: GET /v1/kv/data/app',
            { 'X-Vault-Token': '[REDACTED]', 'X-Vault-Namespace': 'team-a' }
        ]]);
    });
});
