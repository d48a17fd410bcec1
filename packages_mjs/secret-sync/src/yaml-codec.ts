/**
 * YAML encoding of secret payloads.
 *
 * Both directions use the core schema (no timestamps or binary tags) so every
 * string, number, boolean and nested mapping survives a file round-trip.
 * Keys are sorted so encoded text is stable across fetches.
 */
import * as yaml from 'js-yaml';
import { DecodeError, SecretPayloadSchema, formatIssues } from '@kvsync/kv-store-client';
import { SecretPayload } from './domain.js';
import { describeError } from './errors.js';

const DUMP_OPTIONS: yaml.DumpOptions = {
    schema: yaml.CORE_SCHEMA,
    sortKeys: true,
    lineWidth: -1,
    noRefs: true
};

export function encodePayload(payload: SecretPayload): string {
    return yaml.dump(payload, DUMP_OPTIONS);
}

export function decodePayload(text: string, source: string): SecretPayload {
    let loaded: unknown;
    try {
        loaded = yaml.load(text, { schema: yaml.CORE_SCHEMA, filename: source });
    } catch (error) {
        throw new DecodeError(source, describeError(error));
    }

    // An empty file holds an empty secret
    if (loaded === undefined || loaded === null) {
        return {};
    }

    if (typeof loaded !== 'object' || Array.isArray(loaded)) {
        throw new DecodeError(source, 'YAML content must be a mapping');
    }

    const result = SecretPayloadSchema.safeParse(loaded);
    if (!result.success) {
        throw new DecodeError(source, formatIssues(result.error));
    }
    return result.data;
}
