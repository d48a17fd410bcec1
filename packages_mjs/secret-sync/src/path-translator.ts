/**
 * Mapping between store paths and local secret files.
 *
 * A metadata path (`kv/metadata/app/db`) and its data path (`kv/data/app/db`)
 * differ only in segment 1. Local files mirror the segments after the engine
 * and namespace segments, with a `.yaml` extension.
 */
import path from 'path';
import { AmbiguousPathError, InvalidPathError } from './errors.js';
import { MetadataBase } from './domain.js';

export const SECRET_FILE_EXTENSION = '.yaml';
export const METADATA_SEGMENT = 'metadata';
export const DATA_SEGMENT = 'data';

export function toDataPath(metadataPath: string): string {
    const parts = metadataPath.split('/');
    if (parts.length >= 2 && parts[1] === METADATA_SEGMENT) {
        parts[1] = DATA_SEGMENT;
        return parts.join('/');
    }
    return metadataPath;
}

export function parseMetadataBasePath(metadataPath: string): MetadataBase {
    const trimmed = metadataPath.replace(/\/+$/, '');
    const parts = trimmed.split('/');
    if (parts.length < 2 || !parts[0] || parts[1] !== METADATA_SEGMENT) {
        throw new InvalidPathError(metadataPath);
    }
    return {
        engine: parts[0],
        subPath: parts.slice(2).join('/')
    };
}

export function buildMetadataBasePath(engine: string, subPath?: string): string {
    const trimmed = (subPath ?? '').replace(/^\/+|\/+$/g, '');
    return trimmed
        ? `${engine}/${METADATA_SEGMENT}/${trimmed}`
        : `${engine}/${METADATA_SEGMENT}`;
}

/**
 * Local directory that mirrors a metadata base path:
 * `kv/metadata/app` under `out` is `out/app`.
 */
export function localBaseDir(metadataBasePath: string, baseDir: string): string {
    const subPath = metadataBasePath.replace(/\/+$/, '').split('/').slice(2).join('/');
    return subPath ? path.join(baseDir, ...subPath.split('/')) : baseDir;
}

export function remoteToLocalFile(secretPath: string, metadataBasePath: string, outputBaseDir: string): string {
    const base = metadataBasePath.replace(/\/+$/, '');
    if (secretPath !== base && !secretPath.startsWith(`${base}/`)) {
        throw new AmbiguousPathError(secretPath, metadataBasePath);
    }

    const suffix = secretPath.slice(base.length).replace(/^\/+/, '');
    if (!suffix) {
        throw new AmbiguousPathError(secretPath, metadataBasePath);
    }

    const targetDir = localBaseDir(base, outputBaseDir);
    return path.join(targetDir, ...`${suffix}${SECRET_FILE_EXTENSION}`.split('/'));
}

export function localFileToRemotePath(fileRelativePath: string, kvEngineName: string, metadataSubPath: string): string {
    let secretName = fileRelativePath.endsWith(SECRET_FILE_EXTENSION)
        ? fileRelativePath.slice(0, -SECRET_FILE_EXTENSION.length)
        : fileRelativePath;
    secretName = secretName.split(path.sep).join('/');

    const basePath = buildMetadataBasePath(kvEngineName, metadataSubPath);
    // A bare `.yaml` has no secret name; it would address the subtree itself
    if (secretName.split('/').some(segment => segment === '')) {
        throw new AmbiguousPathError(fileRelativePath, basePath);
    }
    return `${basePath}/${secretName}`;
}
