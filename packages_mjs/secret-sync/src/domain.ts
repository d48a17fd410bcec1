import type { SecretPayload } from '@kvsync/kv-store-client';

export type { SecretPayload, SecretValue, SecretStore } from '@kvsync/kv-store-client';

export interface TreeEntry {
    path: string; // Full metadata path
    payload: SecretPayload;
    isLeaf: boolean;
}

export interface LocalFileEntry {
    absolutePath: string;
    relativePath: string; // '/'-separated, relative to the walk base directory
    payload: SecretPayload;
}

export interface DiffResult {
    changed: boolean;
    text: string;
    hash: string;
}

export interface SkippedSecret {
    path: string;
    reason: string;
}

export interface RemoteWalkResult {
    secrets: Map<string, SecretPayload>;
    skipped: SkippedSecret[];
}

export interface PullResult {
    written: string[];
    skipped: SkippedSecret[];
}

export interface PushResult {
    pushed: string[];
    previewed: string[];
    unchanged: string[];
    failed: SkippedSecret[];
}

export type WriteErrorPolicy = 'abort' | 'continue';

export interface PushOptions {
    dryRun?: boolean;
    onWriteError?: WriteErrorPolicy;
}

export interface MetadataBase {
    engine: string;
    subPath: string; // Empty when the base is the engine root
}

/**
 * Receives progress lines and diff text. `process.stdout` satisfies it.
 */
export interface TextSink {
    write(text: string): unknown;
}
