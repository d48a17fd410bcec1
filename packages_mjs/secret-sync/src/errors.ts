export class SecretSyncError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SecretSyncError';
    }
}

export class ConfigurationError extends SecretSyncError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export class AmbiguousPathError extends SecretSyncError {
    constructor(
        public secretPath: string,
        public basePath: string
    ) {
        super(`cannot determine file name for secret ${secretPath} (base path ${basePath})`);
        this.name = 'AmbiguousPathError';
    }
}

export class InvalidPathError extends SecretSyncError {
    constructor(public path: string) {
        super(`invalid metadata path: ${path} (expected <engine>/metadata[/subpath])`);
        this.name = 'InvalidPathError';
    }
}

export class MissingDirectoryError extends SecretSyncError {
    constructor(
        public directory: string,
        public metadataPath: string
    ) {
        super(`directory ${directory} does not exist (derived from path ${metadataPath})`);
        this.name = 'MissingDirectoryError';
    }
}

export class TreeListingError extends SecretSyncError {
    constructor(
        public path: string,
        public cause: Error
    ) {
        super(`failed to list secrets at ${path}: ${cause.message}`);
        this.name = 'TreeListingError';
    }
}

export class PushWriteError extends SecretSyncError {
    constructor(
        message: string,
        public failures: Array<{ path: string; reason: string }>
    ) {
        super(message);
        this.name = 'PushWriteError';
    }
}

// Shape checks: errors raised by Node's own modules may come from another realm
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return typeof error === 'object' && error !== null && 'code' in error && 'message' in error;
}

export function describeError(error: unknown): string {
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }
    return String(error);
}
