/**
 * Enumeration of secret files under a local directory.
 */
import fs from 'fs/promises';
import path from 'path';
import { glob } from 'glob';
import { DecodeError } from '@kvsync/kv-store-client';
import { LocalFileEntry } from './domain.js';
import { describeError } from './errors.js';
import { getLogger, SyncLogger } from './logger.js';
import { SECRET_FILE_EXTENSION } from './path-translator.js';
import { decodePayload } from './yaml-codec.js';

export class LocalTreeWalker {
    constructor(private logger: SyncLogger = getLogger()) { }

    /**
     * Relative ('/'-separated) paths of every secret file under `baseDir`,
     * hidden files included, sorted.
     */
    async discover(baseDir: string): Promise<string[]> {
        const files = await glob(`**/*${SECRET_FILE_EXTENSION}`, {
            cwd: baseDir,
            nodir: true,
            dot: true,
            posix: true
        });
        return files.sort();
    }

    /**
     * Reads and decodes every secret file. The first file that cannot be
     * read or decoded rejects the whole walk.
     */
    async walk(baseDir: string): Promise<LocalFileEntry[]> {
        const relativePaths = await this.discover(baseDir);
        this.logger.debug(`Found ${relativePaths.length} secret files under ${baseDir}`);

        const entries: LocalFileEntry[] = [];
        for (const relativePath of relativePaths) {
            const absolutePath = path.join(baseDir, ...relativePath.split('/'));

            let text: string;
            try {
                text = await fs.readFile(absolutePath, 'utf-8');
            } catch (error) {
                throw new DecodeError(absolutePath, `cannot read file: ${describeError(error)}`);
            }

            entries.push({
                absolutePath,
                relativePath,
                payload: decodePayload(text, absolutePath)
            });
        }
        return entries;
    }
}
