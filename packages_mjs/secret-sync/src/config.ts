/**
 * Environment configuration for the store connection.
 */
import { config as loadDotenv, DotenvPopulateInput } from 'dotenv';
import { z } from 'zod';
import { ClientConfig, ClientLogger, DEFAULT_TIMEOUT_READ } from '@kvsync/kv-store-client';
import { ConfigurationError } from './errors.js';

export const ENV_ADDRESS = 'VAULT_ADDR';
export const ENV_TOKEN = 'VAULT_TOKEN';
export const ENV_TIMEOUT = 'KVSYNC_TIMEOUT_MS';

const emptyAsMissing = (value: unknown) => (value === '' ? undefined : value);

const EnvSchema = z.object({
    [ENV_ADDRESS]: z.preprocess(
        emptyAsMissing,
        z.string({ required_error: `${ENV_ADDRESS} environment variable is required` })
            .url(`${ENV_ADDRESS} must be a URL`)
    ),
    [ENV_TOKEN]: z.preprocess(
        emptyAsMissing,
        z.string({ required_error: `${ENV_TOKEN} environment variable is required` })
    ),
    [ENV_TIMEOUT]: z.preprocess(
        emptyAsMissing,
        z.string()
            .regex(/^[1-9]\d*$/, `${ENV_TIMEOUT} must be a positive integer (milliseconds)`)
            .transform(Number)
            .optional()
    )
});

export interface StoreSettings {
    address: string;
    token: string;
    namespace: string;
    timeoutMs: number;
}

/**
 * Loads variables from a dotenv file without overriding ones already set.
 */
export function loadEnvFile(filePath: string, env: NodeJS.ProcessEnv = process.env): void {
    const loaded: DotenvPopulateInput = {};
    const result = loadDotenv({ path: filePath, processEnv: loaded });
    if (result.error) {
        throw new ConfigurationError(`cannot load env file ${filePath}: ${result.error.message}`);
    }
    for (const [key, value] of Object.entries(loaded)) {
        if (env[key] === undefined) {
            env[key] = value;
        }
    }
}

export function resolveStoreSettings(namespace: string, env: NodeJS.ProcessEnv = process.env): StoreSettings {
    if (!namespace) {
        throw new ConfigurationError('namespace is required');
    }

    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigurationError(parsed.error.errors.map(issue => issue.message).join('; '));
    }

    return {
        address: parsed.data[ENV_ADDRESS],
        token: parsed.data[ENV_TOKEN],
        namespace,
        timeoutMs: parsed.data[ENV_TIMEOUT] ?? DEFAULT_TIMEOUT_READ
    };
}

export function toClientConfig(settings: StoreSettings, logger?: ClientLogger): ClientConfig {
    return {
        address: settings.address,
        auth: { token: settings.token, namespace: settings.namespace },
        timeout: { connect: Math.min(settings.timeoutMs, 5000), read: settings.timeoutMs },
        logger
    };
}
