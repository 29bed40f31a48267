/**
 * @module
 * Fingerprint Store: persists the last fingerprint of every target between runs.
 *
 * Layout: `<cacheDir>/recipes/<base64url(target name)>`, each file holding a base64 digest.
 * Encoded names longer than {@link MAX_SEGMENT_LENGTH} are split into nested directories.
 * Concurrent invocations sharing a cache directory are not synchronized.
 */
import {
    CacheDirectoryError,
} from './errors';
import fs = require('fs-extra');
import path = require('path');

/**
 * Digest of the state that made a target's result valid. Empty when absent.
 */
export type Fingerprint = Buffer;

/** Length in bytes of a valid fingerprint (md5). */
export const FINGERPRINT_LENGTH = 16;

export const EMPTY_FINGERPRINT: Fingerprint = Buffer.alloc(0);

/** Name of the cache directory, relative to the working directory. */
export const DEFAULT_CACHE_DIR = '.pmake_caches';

/** Environment variable overriding the cache directory. */
export const CACHE_DIR_ENV = 'PMAKE_CACHE_DIR';

/** Older name of {@link CACHE_DIR_ENV}, used when the former is unset. */
export const LEGACY_CACHE_DIR_ENV = 'PMAKEFILE_CACHE_DIR';

/** Longest path segment of an encoded name; file systems cap names at 255 bytes. */
export const MAX_SEGMENT_LENGTH = 200;

// Not in the base64url alphabet, so a directory segment never collides with a file segment.
const DIRECTORY_MARKER = '~';

/**
 * What a path refers to.
 */
export type PathKind = 'file' | 'directory' | 'other' | 'missing';

/**
 * Returns what `filename` refers to, following symlinks.
 */
export async function statPath(filename: string): Promise<PathKind> {
    let stats;
    try {
        stats = await fs.stat(filename);
    } catch (e) {
        if (isMissingError(e))
            return 'missing';
        throw e;
    }
    if (stats.isFile())
        return 'file';
    if (stats.isDirectory())
        return 'directory';
    return 'other';
}

function isMissingError(e: unknown): boolean {
    if (!(e instanceof Error) || !('code' in e))
        return false;
    return e.code === 'ENOENT' || e.code === 'ENOTDIR';
}

/**
 * Encodes a target name into a filesystem-safe relative path.
 * Long names are split into directories of at most {@link MAX_SEGMENT_LENGTH} characters.
 */
export function encodeName(name: string): string {
    const encoded = Buffer.from(name, 'utf-8').toString('base64url');
    const segments: string[] = [];
    for (let i = 0; i < encoded.length; i += MAX_SEGMENT_LENGTH)
        segments.push(encoded.substring(i, i + MAX_SEGMENT_LENGTH));
    return segments.map((x, i) => i < segments.length - 1 ? x + DIRECTORY_MARKER : x).join('/');
}

/**
 * Inverse of {@link encodeName}.
 */
export function decodeName(encoded: string): string {
    const joined = encoded.split(/[\\/]/).map(x => x.endsWith(DIRECTORY_MARKER) ? x.slice(0, -1) : x).join('');
    return Buffer.from(joined, 'base64url').toString('utf-8');
}

export function encodeFingerprint(fingerprint: Fingerprint): string {
    return fingerprint.toString('base64');
}

/**
 * Decodes a stored fingerprint. Anything that is not a base64 md5 digest decodes to {@link EMPTY_FINGERPRINT}.
 */
export function decodeFingerprint(text: string): Fingerprint {
    const trimmed = text.trim();
    if (!/^[A-Za-z0-9+/]*={0,2}$/.test(trimmed))
        return EMPTY_FINGERPRINT;
    const fingerprint = Buffer.from(trimmed, 'base64');
    return fingerprint.length === FINGERPRINT_LENGTH ? fingerprint : EMPTY_FINGERPRINT;
}

/**
 * Returns the cache directory for an invocation in `cwd`.
 */
export function cacheDirFor(cwd: string, env: NodeJS.ProcessEnv): string {
    const specified = env[CACHE_DIR_ENV] || env[LEGACY_CACHE_DIR_ENV];
    if (specified)
        return path.resolve(cwd, specified);
    return path.join(cwd, DEFAULT_CACHE_DIR);
}

/**
 * Persistent mapping from target name to its last saved fingerprint.
 */
export class FingerprintStore {
    readonly cacheDir: string;
    private readonly recipesDir: string;
    private readonly loaded: Map<string, Fingerprint>;

    constructor(cacheDir: string) {
        this.cacheDir = cacheDir;
        this.recipesDir = path.join(cacheDir, 'recipes');
        this.loaded = new Map();
    }

    entryPath(name: string): string {
        return path.join(this.recipesDir, encodeName(name));
    }

    /**
     * Returns the saved fingerprint of `name`, reading it from disk on first use.
     */
    async load(name: string): Promise<Fingerprint> {
        let fingerprint = this.loaded.get(name);
        if (fingerprint)
            return fingerprint;
        fingerprint = await this.read(name);
        this.loaded.set(name, fingerprint);
        return fingerprint;
    }

    async save(name: string, fingerprint: Fingerprint): Promise<void> {
        await fs.outputFile(this.entryPath(name), encodeFingerprint(fingerprint));
        this.loaded.set(name, fingerprint);
    }

    private async read(name: string): Promise<Fingerprint> {
        const filename = this.entryPath(name);
        const kind = await statPath(filename);
        if (kind === 'missing')
            return EMPTY_FINGERPRINT;
        if (kind !== 'file')
            throw new CacheDirectoryError(filename, `cache for "${name}" is not a file, try removing the cache directory`);
        return decodeFingerprint(await fs.readFile(filename, 'utf-8'));
    }
}

/**
 * Opens the store in `cacheDir`, creating the directory if needed.
 */
export async function openStore(cacheDir: string): Promise<FingerprintStore> {
    const kind = await statPath(cacheDir);
    if (kind !== 'missing' && kind !== 'directory')
        throw new CacheDirectoryError(cacheDir, 'cache directory is not a directory');
    await fs.ensureDir(path.join(cacheDir, 'recipes'));
    return new FingerprintStore(cacheDir);
}
