/**
 * Core type definitions for kv-store-client.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Scalar-or-nested value held under one key of a secret.
 */
export type SecretValue =
    | string
    | number
    | boolean
    | null
    | SecretValue[]
    | { [key: string]: SecretValue };

/**
 * Full content of one secret version.
 */
export type SecretPayload = { [key: string]: SecretValue };

export interface StoreResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    path: string;
    data: T;
    ok: boolean;
}

export interface RequestOptions {
    method?: HttpMethod;
    url?: string; // Path relative to the store address
    query?: Record<string, string>;
    json?: unknown;
}

export interface RequestContext {
    method: string;
    url: string;
    headers: Record<string, string>;
}

/**
 * Minimal logging surface the client writes request diagnostics to.
 */
export interface ClientLogger {
    debug(message: string, ...args: unknown[]): void;
    trace(message: string, ...args: unknown[]): void;
}

/**
 * Operations the sync engine consumes from a KVv2-style store.
 */
export interface SecretStore {
    list(metadataPath: string): Promise<string[]>;
    read(dataPath: string): Promise<SecretPayload>;
    write(dataPath: string, payload: SecretPayload): Promise<void>;
}
