/**
 * Depth-first enumeration of the remote secret tree.
 */
import { SecretPayload, SecretStore, SkippedSecret, RemoteWalkResult, TreeEntry } from './domain.js';
import { TreeListingError, describeError } from './errors.js';
import { getLogger, SyncLogger } from './logger.js';
import { METADATA_SEGMENT, toDataPath } from './path-translator.js';

const SUBTREE_MARKER = '/';

export class RemoteTreeWalker {
    constructor(
        private store: SecretStore,
        private logger: SyncLogger = getLogger()
    ) { }

    /**
     * Yields every subtree and leaf under `metadataPath`. A listing failure
     * aborts the walk; a leaf that cannot be fetched is warned about,
     * recorded in `skipped`, and not yielded.
     */
    async *entries(metadataPath: string, skipped: SkippedSecret[] = []): AsyncGenerator<TreeEntry> {
        let keys: string[];
        try {
            keys = await this.store.list(metadataPath);
        } catch (error) {
            throw new TreeListingError(metadataPath, error instanceof Error ? error : new Error(describeError(error)));
        }

        for (const key of keys) {
            if (key.endsWith(SUBTREE_MARKER)) {
                const name = key.slice(0, -SUBTREE_MARKER.length);
                const subtreePath = `${metadataPath}/${name}/${METADATA_SEGMENT}`;
                yield { path: subtreePath, payload: {}, isLeaf: false };
                yield* this.entries(subtreePath, skipped);
                continue;
            }

            const secretPath = `${metadataPath}/${key}`;
            const dataPath = toDataPath(secretPath);
            this.logger.debug(`Getting secret ${secretPath} (data path ${dataPath})`);

            let payload: SecretPayload;
            try {
                payload = await this.store.read(dataPath);
            } catch (error) {
                const reason = describeError(error);
                this.logger.warn(`Failed to get secret ${secretPath}: ${reason}`);
                skipped.push({ path: secretPath, reason });
                continue;
            }
            yield { path: secretPath, payload, isLeaf: true };
        }
    }

    async walk(metadataPath: string): Promise<RemoteWalkResult> {
        const secrets = new Map<string, SecretPayload>();
        const skipped: SkippedSecret[] = [];
        for await (const entry of this.entries(metadataPath, skipped)) {
            if (entry.isLeaf) {
                secrets.set(entry.path, entry.payload);
            }
        }
        return { secrets, skipped };
    }
}
