/**
 * Configuration models and validation for kv-store-client.
 */

import { z } from 'zod';
import type { Dispatcher } from 'undici';
import { ClientLogger } from './types.js';

// Constants
export const DEFAULT_TIMEOUT_CONNECT = 5000;
export const DEFAULT_TIMEOUT_READ = 30000;
export const API_VERSION_PREFIX = '/v1';

// Schemas

export const TimeoutConfigSchema = z.object({
    connect: z.number().int().positive().default(DEFAULT_TIMEOUT_CONNECT),
    read: z.number().int().positive().default(DEFAULT_TIMEOUT_READ)
});

export type TimeoutConfig = z.infer<typeof TimeoutConfigSchema>;

export const AuthConfigSchema = z.object({
    token: z.string().min(1, 'token is required'),
    namespace: z.string().min(1, 'namespace is required')
});

export type AuthConfig = z.infer<typeof AuthConfigSchema>;

export const ClientConfigSchema = z.object({
    address: z.string().url().transform(url => url.endsWith('/') ? url.slice(0, -1) : url),
    auth: AuthConfigSchema,
    timeout: z.union([z.number().int().positive(), TimeoutConfigSchema]).optional(),
    headers: z.record(z.string()).default({})
});

export type ClientConfig = z.input<typeof ClientConfigSchema> & {
    // Must be bound to the store origin (a Pool, or a MockPool in tests)
    dispatcher?: Dispatcher;
    logger?: ClientLogger;
};

export interface ResolvedConfig {
    address: string;
    auth: AuthConfig;
    timeout: TimeoutConfig;
    headers: Record<string, string>;
}

export function normalizeTimeout(timeout?: number | TimeoutConfig): TimeoutConfig {
    if (timeout === undefined) {
        return {
            connect: DEFAULT_TIMEOUT_CONNECT,
            read: DEFAULT_TIMEOUT_READ
        };
    }
    if (typeof timeout === 'number') {
        return {
            connect: timeout,
            read: timeout
        };
    }
    return timeout;
}

export function resolveConfig(config: ClientConfig): ResolvedConfig {
    const validated = ClientConfigSchema.parse(config);
    return {
        address: validated.address,
        auth: validated.auth,
        timeout: normalizeTimeout(validated.timeout),
        headers: validated.headers
    };
}
