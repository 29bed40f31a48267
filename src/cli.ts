#!/usr/bin/env node
/**
 * @module
 * Command line entry point: runs targets of the make script found in the working directory.
 */
import {
    Makefile,
    RunOptions,
} from './index';
import {
    createProgress,
} from './progress';
import fs = require('fs-extra');
import path = require('path');

/** Script file names looked up in the working directory, in order. */
export const SCRIPT_NAMES = ['make.js', 'make.cjs'];

/**
 * Loads the make script in `options.cwd`.
 * The script exports either a {@link Makefile} or a function that registers recipes on the one it receives.
 *
 * @returns undefined if there is no make script.
 */
export async function loadMakefile(options: RunOptions = {}): Promise<Makefile | undefined> {
    const cwd = options.cwd || process.cwd();
    for (const name of SCRIPT_NAMES) {
        const filename = path.join(cwd, name);
        if (!(await fs.pathExists(filename)))
            continue;
        return toMakefile(require(filename), filename, {...options, cwd});
    }
    return undefined;
}

async function toMakefile(exported: unknown, filename: string, options: RunOptions): Promise<Makefile> {
    if (typeof exported === 'object' && exported !== null && 'default' in exported)
        exported = exported.default;
    if (exported instanceof Makefile)
        return exported;
    if (typeof exported === 'function') {
        const makefile = new Makefile(options);
        const ret: unknown = exported(makefile);
        if (ret instanceof Promise)
            await ret;
        return makefile;
    }
    throw new Error(`${filename} must export a Makefile or a function`);
}

/**
 * Runs `targets` from the make script in `options.cwd`.
 *
 * @returns the exit code.
 */
export async function main(targets: string[], options: RunOptions = {}): Promise<number> {
    const makefile = await loadMakefile(options);
    if (!makefile) {
        createProgress(options.stream).log('warn', `Warning: no ${SCRIPT_NAMES.join(' or ')} found`);
        return 1;
    }
    return makefile.run(targets);
}

if (require.main === module) {
    main(process.argv.slice(2)).then(code => {
        process.exitCode = code;
    }, e => {
        process.stderr.write(`${e instanceof Error ? e.stack : String(e)}\n`);
        process.exitCode = 1;
    });
}
