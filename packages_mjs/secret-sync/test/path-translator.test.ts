import path from 'path';
import {
    buildMetadataBasePath,
    localBaseDir,
    localFileToRemotePath,
    parseMetadataBasePath,
    remoteToLocalFile,
    toDataPath
} from '../src/path-translator.js';
import { AmbiguousPathError, InvalidPathError } from '../src/errors.js';

describe('toDataPath', () => {
    it('swaps only the second segment', () => {
        expect(toDataPath('kv/metadata/app/db')).toBe('kv/data/app/db');
        expect(toDataPath('secret/metadata')).toBe('secret/data');
    });

    it('keeps later "metadata" segments', () => {
        expect(toDataPath('kv/metadata/app/metadata/db')).toBe('kv/data/app/metadata/db');
    });

    it('passes other paths through unchanged', () => {
        expect(toDataPath('kv/data/app/db')).toBe('kv/data/app/db');
        expect(toDataPath('kv')).toBe('kv');
        expect(toDataPath(toDataPath('kv/metadata/x'))).toBe('kv/data/x');
    });

    it('works for engine names other than kv', () => {
        expect(toDataPath('team-secrets/metadata/a/b/c')).toBe('team-secrets/data/a/b/c');
    });
});

describe('parseMetadataBasePath', () => {
    it('splits engine and sub path', () => {
        expect(parseMetadataBasePath('kv/metadata/app/db')).toEqual({ engine: 'kv', subPath: 'app/db' });
        expect(parseMetadataBasePath('kv/metadata')).toEqual({ engine: 'kv', subPath: '' });
        expect(parseMetadataBasePath('kv/metadata/app/')).toEqual({ engine: 'kv', subPath: 'app' });
    });

    it.each(['kv', 'kv/data/app', '/metadata/app', ''])('rejects %p', input => {
        expect(() => parseMetadataBasePath(input)).toThrow(InvalidPathError);
    });
});

describe('buildMetadataBasePath', () => {
    it('appends the metadata segment and optional sub path', () => {
        expect(buildMetadataBasePath('kv')).toBe('kv/metadata');
        expect(buildMetadataBasePath('kv', '')).toBe('kv/metadata');
        expect(buildMetadataBasePath('kv', '/app/db/')).toBe('kv/metadata/app/db');
    });
});

describe('localBaseDir', () => {
    it('joins the sub path onto the base directory', () => {
        expect(localBaseDir('kv/metadata/app', 'out')).toBe(path.join('out', 'app'));
        expect(localBaseDir('kv/metadata', 'out')).toBe('out');
    });
});

describe('remoteToLocalFile', () => {
    it('mirrors the sub path and adds the extension', () => {
        expect(remoteToLocalFile('kv/metadata/app/db', 'kv/metadata/app', 'out'))
            .toBe(path.join('out', 'app', 'db.yaml'));
        expect(remoteToLocalFile('kv/metadata/app/nested/key', 'kv/metadata', 'out'))
            .toBe(path.join('out', 'app', 'nested', 'key.yaml'));
    });

    it('rejects a secret equal to the base path', () => {
        expect(() => remoteToLocalFile('kv/metadata/app', 'kv/metadata/app', 'out'))
            .toThrow(AmbiguousPathError);
    });

    it('rejects a secret outside the base path', () => {
        expect(() => remoteToLocalFile('kv/metadata/other/db', 'kv/metadata/app', 'out'))
            .toThrow(AmbiguousPathError);
        expect(() => remoteToLocalFile('kv/metadata/application', 'kv/metadata/app', 'out'))
            .toThrow(AmbiguousPathError);
    });
});

describe('localFileToRemotePath', () => {
    it('strips the extension and prefixes engine and sub path', () => {
        expect(localFileToRemotePath('db.yaml', 'kv', 'app')).toBe('kv/metadata/app/db');
        expect(localFileToRemotePath('nested/key.yaml', 'kv', '')).toBe('kv/metadata/nested/key');
    });

    it.each(['.yaml', 'sub/.yaml', 'a//b.yaml'])('rejects %p, which has an empty secret name', file => {
        expect(() => localFileToRemotePath(file, 'kv', 'app')).toThrow(new AmbiguousPathError(file, 'kv/metadata/app'));
    });

    it('inverts remoteToLocalFile', () => {
        const file = remoteToLocalFile('kv/metadata/app/nested/key', 'kv/metadata/app', 'out');
        const relative = path.relative(localBaseDir('kv/metadata/app', 'out'), file);
        expect(localFileToRemotePath(relative, 'kv', 'app')).toBe('kv/metadata/app/nested/key');
    });
});
