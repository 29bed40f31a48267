/**
 * @module
 * Helpers shared by the specs.
 */
import fs = require('fs-extra');
import os = require('os');
import path = require('path');
import stream = require('stream');

/**
 * Writable stream keeping everything written to it.
 */
export class MemoryStream extends stream.Writable {
    private readonly chunks: string[] = [];

    _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        this.chunks.push(chunk.toString());
        callback();
    }

    text(): string {
        return this.chunks.join('');
    }
}

export function makeTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'pmake-'));
}
