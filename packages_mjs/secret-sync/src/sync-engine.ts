/**
 * Pull and push orchestration between a secret store and a local directory.
 */
import fs from 'fs/promises';
import path from 'path';
import { SecretNotFoundError } from '@kvsync/kv-store-client';
import {
    PullResult, PushOptions, PushResult, SecretPayload, SecretStore, TextSink
} from './domain.js';
import {
    MissingDirectoryError, PushWriteError, describeError, isErrnoException
} from './errors.js';
import { diffPayloads } from './diff-engine.js';
import { LocalTreeWalker } from './local-walker.js';
import { getLogger, SyncLogger } from './logger.js';
import {
    localBaseDir, localFileToRemotePath, parseMetadataBasePath, remoteToLocalFile, toDataPath
} from './path-translator.js';
import { PreviewSink } from './preview-sink.js';
import { RemoteTreeWalker } from './remote-walker.js';
import { encodePayload } from './yaml-codec.js';

export interface SyncEngineOptions {
    logger?: SyncLogger;
    // Progress lines ("Written: ...", "Pushing: ...")
    output?: TextSink;
    // Dry-run diffs; defaults to raw diffs on `output`
    preview?: PreviewSink;
}

export class SecretSyncEngine {
    private logger: SyncLogger;
    private output: TextSink;
    private preview: PreviewSink;
    private remoteWalker: RemoteTreeWalker;
    private localWalker: LocalTreeWalker;

    constructor(
        private store: SecretStore,
        options: SyncEngineOptions = {}
    ) {
        this.logger = options.logger ?? getLogger();
        this.output = options.output ?? process.stdout;
        this.preview = options.preview ?? new PreviewSink(null, this.output, this.logger);
        this.remoteWalker = new RemoteTreeWalker(store, this.logger);
        this.localWalker = new LocalTreeWalker(this.logger);
    }

    async list(metadataPath: string): Promise<string[]> {
        return this.store.list(metadataPath);
    }

    /**
     * Mirrors every secret under `metadataBasePath` into `outputDir`,
     * overwriting existing files. Only a listing failure rejects; secrets
     * that cannot be fetched or written are reported in `skipped`.
     */
    async pull(metadataBasePath: string, outputDir: string): Promise<PullResult> {
        parseMetadataBasePath(metadataBasePath);
        const basePath = metadataBasePath.replace(/\/+$/, '');

        const { secrets, skipped } = await this.remoteWalker.walk(basePath);
        this.logger.debug(`Fetched ${secrets.size} secrets under ${basePath}`);

        const written: string[] = [];
        for (const [secretPath, payload] of secrets) {
            try {
                const filePath = await this.writeSecretFile(secretPath, payload, basePath, outputDir);
                written.push(filePath);
                this.output.write(`Written: ${filePath}\n`);
            } catch (error) {
                const reason = describeError(error);
                this.logger.warn(`Failed to write secret ${secretPath}: ${reason}`);
                skipped.push({ path: secretPath, reason });
            }
        }

        return { written, skipped };
    }

    /**
     * Pushes every secret file under the directory mirroring
     * `metadataBasePath`. All files are decoded and mapped to remote paths
     * before the first remote call.
     * With `dryRun`, shows a diff per changed secret instead of writing.
     */
    async push(inputDir: string, metadataBasePath: string, options: PushOptions = {}): Promise<PushResult> {
        const { engine, subPath } = parseMetadataBasePath(metadataBasePath);
        const baseDir = localBaseDir(metadataBasePath, inputDir);
        await this.assertDirectory(baseDir, metadataBasePath);

        const entries = await this.localWalker.walk(baseDir);
        const policy = options.onWriteError ?? 'abort';
        const result: PushResult = { pushed: [], previewed: [], unchanged: [], failed: [] };

        const targets = entries.map(entry => ({
            secretPath: localFileToRemotePath(entry.relativePath, engine, subPath),
            payload: entry.payload
        }));

        for (const { secretPath, payload } of targets) {
            if (options.dryRun) {
                await this.previewSecret(secretPath, payload, result);
                continue;
            }

            this.output.write(`Pushing: ${secretPath}\n`);
            try {
                await this.store.write(toDataPath(secretPath), payload);
                result.pushed.push(secretPath);
            } catch (error) {
                const reason = describeError(error);
                if (policy === 'abort') {
                    throw new PushWriteError(`failed to push ${secretPath}: ${reason}`, [{ path: secretPath, reason }]);
                }
                this.logger.warn(`Failed to push ${secretPath}: ${reason}`);
                result.failed.push({ path: secretPath, reason });
            }
        }

        if (result.failed.length > 0) {
            throw new PushWriteError(
                `${result.failed.length} of ${entries.length} secrets failed to push`,
                result.failed
            );
        }
        return result;
    }

    private async writeSecretFile(
        secretPath: string,
        payload: SecretPayload,
        metadataBasePath: string,
        outputDir: string
    ): Promise<string> {
        const filePath = remoteToLocalFile(secretPath, metadataBasePath, outputDir);
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, encodePayload(payload), 'utf-8');
        return filePath;
    }

    private async previewSecret(secretPath: string, payload: SecretPayload, result: PushResult): Promise<void> {
        let existing: SecretPayload | undefined;
        try {
            existing = await this.store.read(toDataPath(secretPath));
        } catch (error) {
            if (!(error instanceof SecretNotFoundError)) {
                this.logger.warn(`Could not read ${secretPath}, previewing it as new: ${describeError(error)}`);
            }
            existing = undefined;
        }

        const diff = diffPayloads(existing, payload, secretPath);
        if (!diff.changed) {
            result.unchanged.push(secretPath);
            return;
        }
        await this.preview.show(diff.text);
        result.previewed.push(secretPath);
    }

    private async assertDirectory(directory: string, metadataPath: string): Promise<void> {
        try {
            const stat = await fs.stat(directory);
            if (!stat.isDirectory()) {
                throw new MissingDirectoryError(directory, metadataPath);
            }
        } catch (error) {
            if (error instanceof MissingDirectoryError) throw error;
            if (isErrnoException(error) && error.code === 'ENOENT') {
                throw new MissingDirectoryError(directory, metadataPath);
            }
            throw error;
        }
    }
}
