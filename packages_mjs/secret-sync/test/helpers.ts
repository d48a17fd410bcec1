/**
 * In-process stand-ins shared by the secret-sync tests.
 */
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
    RemoteStatusError, SecretNotFoundError, SecretPayload, SecretStore
} from '@kvsync/kv-store-client';
import { LogLevel, SyncLogger } from '../src/logger.js';
import { TextSink } from '../src/domain.js';

export class InMemoryStore implements SecretStore {
    listings = new Map<string, string[]>();
    secrets = new Map<string, SecretPayload>(); // keyed by data path
    failingReads = new Set<string>();
    failingWrites = new Set<string>();
    failingLists = new Set<string>();
    reads: string[] = [];
    writes: Array<{ path: string; payload: SecretPayload }> = [];
    closed = false;

    async list(metadataPath: string): Promise<string[]> {
        if (this.failingLists.has(metadataPath)) {
            throw new RemoteStatusError('GET', `/v1/${metadataPath}?list=true`, 500, 'list failed');
        }
        const keys = this.listings.get(metadataPath);
        if (!keys) {
            throw new RemoteStatusError('GET', `/v1/${metadataPath}?list=true`, 404, '{"errors":[]}');
        }
        return [...keys];
    }

    async read(dataPath: string): Promise<SecretPayload> {
        this.reads.push(dataPath);
        if (this.failingReads.has(dataPath)) {
            throw new RemoteStatusError('GET', `/v1/${dataPath}`, 500, 'read failed');
        }
        const payload = this.secrets.get(dataPath);
        if (!payload) {
            throw new SecretNotFoundError(`/v1/${dataPath}`, '{"errors":[]}');
        }
        return structuredClone(payload);
    }

    async write(dataPath: string, payload: SecretPayload): Promise<void> {
        this.writes.push({ path: dataPath, payload });
        if (this.failingWrites.has(dataPath)) {
            throw new RemoteStatusError('POST', `/v1/${dataPath}`, 500, 'write failed');
        }
        this.secrets.set(dataPath, structuredClone(payload));
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}

export interface LogLine {
    level: 'error' | 'warn' | 'info' | 'debug' | 'trace';
    message: string;
}

export class CaptureLogger implements SyncLogger {
    lines: LogLine[] = [];
    level: LogLevel | undefined;

    setLevel(level: LogLevel): void { this.level = level; }

    error(message: string): void { this.lines.push({ level: 'error', message }); }
    warn(message: string): void { this.lines.push({ level: 'warn', message }); }
    info(message: string): void { this.lines.push({ level: 'info', message }); }
    debug(message: string): void { this.lines.push({ level: 'debug', message }); }
    trace(message: string): void { this.lines.push({ level: 'trace', message }); }

    at(level: LogLine['level']): string[] {
        return this.lines.filter(line => line.level === level).map(line => line.message);
    }
}

export class CaptureSink implements TextSink {
    text = '';

    write(text: string): boolean {
        this.text += text;
        return true;
    }
}

export async function makeTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'kvsync-test-'));
}

export async function removeDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}

export async function writeFile(filePath: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
}
