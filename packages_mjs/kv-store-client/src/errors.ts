export class KvStoreError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'KvStoreError';
    }
}

export class TransportError extends KvStoreError {
    constructor(
        public method: string,
        public path: string,
        public cause: Error
    ) {
        super(`${method} ${path}: request failed: ${cause.message}`);
        this.name = 'TransportError';
    }
}

export class RemoteStatusError extends KvStoreError {
    constructor(
        public method: string,
        public path: string,
        public statusCode: number,
        public body: string
    ) {
        super(`${method} ${path}: HTTP ${statusCode}: ${body}`);
        this.name = 'RemoteStatusError';
    }
}

export class SecretNotFoundError extends RemoteStatusError {
    constructor(path: string, body: string) {
        super('GET', path, 404, body);
        this.name = 'SecretNotFoundError';
    }
}

export class DecodeError extends KvStoreError {
    constructor(
        public source: string,
        public reason: string
    ) {
        super(`failed to decode ${source}: ${reason}`);
        this.name = 'DecodeError';
    }
}
