/**
 * Auth handler utilities for @kvsync/kv-store-client
 */
import { RequestContext } from '../types.js';
import { AuthConfig } from '../config.js';

export const TOKEN_HEADER = 'X-Vault-Token';
export const NAMESPACE_HEADER = 'X-Vault-Namespace';

/**
 * Auth handler interface
 */
export interface AuthHandler {
    getHeader(context: RequestContext): Record<string, string> | null;
}

/**
 * Store token auth handler. Sends the bearer credential and the tenant
 * namespace on every request.
 */
export class StoreTokenAuthHandler implements AuthHandler {
    constructor(
        private token: string,
        private namespace: string
    ) { }

    getHeader(_context: RequestContext): Record<string, string> | null {
        if (!this.token) return null;
        return {
            [TOKEN_HEADER]: this.token,
            [NAMESPACE_HEADER]: this.namespace
        };
    }
}

export function createAuthHandler(config: AuthConfig): AuthHandler {
    return new StoreTokenAuthHandler(config.token, config.namespace);
}
