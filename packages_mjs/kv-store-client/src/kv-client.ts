/**
 * KVv2 store client: list, read and write over the store's HTTP API.
 */
import { BaseClient } from './core/base-client.js';
import { RequestBuilder } from './core/request.js';
import { API_VERSION_PREFIX, ClientConfig } from './config.js';
import { DecodeError, RemoteStatusError, SecretNotFoundError } from './errors.js';
import { ListResponseSchema, SecretResponseSchema, formatIssues } from './schemas.js';
import { SecretPayload, SecretStore, StoreResponse } from './types.js';

const LOG_PREFIX = '[KvStoreClient]';

/**
 * Builds the request path for a store path, encoding each segment.
 */
export function apiPath(storePath: string): string {
    const encoded = storePath
        .split('/')
        .map(segment => encodeURIComponent(segment))
        .join('/');
    return `${API_VERSION_PREFIX}/${encoded}`;
}

function bodyText(response: StoreResponse): string {
    return typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
}

export class KvStoreClient extends BaseClient implements SecretStore {

    static create(config: ClientConfig): KvStoreClient {
        return new KvStoreClient(config);
    }

    /**
     * Lists the keys directly under a metadata path. Keys naming a subtree
     * end with `/`.
     */
    async list(metadataPath: string): Promise<string[]> {
        const response = await this.request(
            new RequestBuilder(apiPath(metadataPath), 'GET').param('list', 'true').build()
        );

        if (!response.ok) {
            throw new RemoteStatusError('GET', response.path, response.status, bodyText(response));
        }

        const parsed = ListResponseSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new DecodeError(`list response for ${metadataPath}`, formatIssues(parsed.error));
        }
        return parsed.data.data.keys;
    }

    /**
     * Reads the current version of the secret at a data path.
     */
    async read(dataPath: string): Promise<SecretPayload> {
        this.logger.debug(`${LOG_PREFIX} Reading secret ${dataPath}`);
        const response = await this.request(new RequestBuilder(apiPath(dataPath), 'GET').build());

        if (response.status === 404) {
            throw new SecretNotFoundError(response.path, bodyText(response));
        }
        if (!response.ok) {
            throw new RemoteStatusError('GET', response.path, response.status, bodyText(response));
        }

        const parsed = SecretResponseSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new DecodeError(`secret response for ${dataPath}`, formatIssues(parsed.error));
        }
        if (parsed.data.data.data === null) {
            // Deleted or destroyed versions carry metadata only
            throw new SecretNotFoundError(response.path, bodyText(response));
        }
        return parsed.data.data.data;
    }

    /**
     * Writes a new version of the secret at a data path. The versioned-write
     * contract nests the payload under a single `data` field.
     */
    async write(dataPath: string, payload: SecretPayload): Promise<void> {
        const response = await this.request(
            new RequestBuilder(apiPath(dataPath), 'POST').json({ data: payload }).build()
        );

        if (!response.ok) {
            throw new RemoteStatusError('POST', response.path, response.status, bodyText(response));
        }
    }
}
