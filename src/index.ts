/**
 * @module
 * pmake Public API
 */
import {
    ActionLike,
} from './action';
import {
    PmakeError,
} from './errors';
import {
    createProgress,
    LogLevel,
    Progress,
} from './progress';
import {
    Recipe,
} from './recipe';
import {
    RecipeOptions,
    Registry,
} from './registry';
import {
    ResolutionContext,
    Resolver,
} from './resolver';
import {
    cacheDirFor,
    openStore,
} from './store';

/** Target resolved when none is requested. */
export const DEFAULT_TARGET = 'all';

/** Environment variable enabling per-target timing. */
export const BENCH_ENV = 'PMAKE_BENCH';

/** Older name of {@link BENCH_ENV}, still honored. */
export const LEGACY_BENCH_ENV = 'PMAKEFILE_BENCH';

/**
 * Options for {@link Makefile}.
 */
export interface RunOptions {
    /**
     * Directory target names are relative to.
     * Default: `process.cwd()`.
     */
    cwd?: string;

    /**
     * Cache directory.
     * Default: `$PMAKE_CACHE_DIR` (or `$PMAKEFILE_CACHE_DIR`), or `.pmake_caches` in `cwd`.
     */
    cacheDir?: string;

    /**
     * Environment consulted for defaults.
     * Default: `process.env`.
     */
    env?: NodeJS.ProcessEnv;

    /**
     * Stream receiving status, action output and diagnostics.
     * Default: `process.stdout`.
     */
    stream?: NodeJS.WritableStream;

    /**
     * Log the time spent on each target.
     * Default: true if `$PMAKE_BENCH` (or `$PMAKEFILE_BENCH`) is set.
     */
    bench?: boolean;
}

/**
 * A set of recipes and the entry point to run them.
 * All recipes must be registered before the first call to {@link Makefile#run}.
 */
export class Makefile {
    readonly registry: Registry;
    private readonly cwd: string;
    private readonly cacheDir: string;
    private readonly bench: boolean;
    private readonly progress: Progress;
    private hasRun: boolean;

    constructor(options: RunOptions = {}) {
        const env = options.env || process.env;
        this.cwd = options.cwd || process.cwd();
        this.registry = new Registry({cwd: this.cwd});
        this.cacheDir = options.cacheDir || cacheDirFor(this.cwd, env);
        this.bench = options.bench === undefined ? !!(env[BENCH_ENV] || env[LEGACY_BENCH_ENV]) : options.bench;
        this.progress = createProgress(options.stream);
        this.hasRun = false;
    }

    /**
     * Registers a recipe. Its target name is `options.name`, or `identifier` with underscores replaced by hyphens.
     *
     * @example
     * makefile.recipe('build_docs', ['docs/index.md'], ['mkdocs', 'build'], {rebuild: 'always'});
     */
    recipe(identifier: string, prerequisites: readonly string[], action: ActionLike, options?: RecipeOptions): Recipe {
        return this.registry.recipe(identifier, prerequisites, action, options);
    }

    /** Marks names as phony: targets not represented by a path. */
    phony(names: Iterable<string>): void {
        this.registry.markPhony(names);
    }

    /**
     * Resolves `targets` in order, or {@link DEFAULT_TARGET} if none is given.
     * Requesting `help` lists the phony recipes instead.
     *
     * @returns the exit code: 0 on success, 1 if a target could not be brought up to date.
     */
    async run(targets: readonly string[] = []): Promise<number> {
        if (!targets.length)
            targets = [DEFAULT_TARGET];

        if (targets.some(x => x.toLowerCase() === 'help')) {
            this.printHelp();
            return 0;
        }

        try {
            const store = await openStore(this.cacheDir);
            const resolver = new Resolver(this.registry, store, {
                bench: this.bench,
                cwd: this.cwd,
                progress: this.progress,
            });
            const ctx = new ResolutionContext();
            for (const target of targets)
                await resolver.resolve(target, ctx);
        } catch (e) {
            if (!(e instanceof PmakeError))
                throw e;
            this.progress.log('error', e.message);
            return 1;
        } finally {
            this.progress.unrender();
        }
        return 0;
    }

    /**
     * Like {@link Makefile#run}, but only once per makefile, and reports through `process.exitCode`.
     */
    async make(targets?: readonly string[]): Promise<void> {
        if (this.hasRun)
            return;
        this.hasRun = true;
        process.exitCode = await this.run(targets);
    }

    /**
     * Writes a message for script authors, colored by level on terminals.
     */
    log(message: string, level: LogLevel = 'info'): void {
        this.progress.log(level, message);
    }

    private printHelp(): void {
        this.progress.write('Available recipes:\n');
        for (const entry of this.registry.helpEntries()) {
            const description = entry.description.split('\n').map(x => `${' '.repeat(14)}${x}`).join('\n');
            this.progress.write(`${entry.name.padEnd(15)} \n${description}\n`);
        }
    }
}

export type {
    Action,
    ActionContext,
    ActionFunction,
    RebuildPolicy,
    Recipe,
} from './recipe';
export {
    CommandAction,
    FunctionAction,
    quote,
    toAction,
} from './action';
export type {
    ActionLike,
    CommandOptions,
} from './action';
export {
    recipeName,
    Registry,
} from './registry';
export type {
    HelpEntry,
    RecipeOptions,
} from './registry';
export {
    ResolutionContext,
    Resolver,
} from './resolver';
export type {
    LogLevel,
} from './progress';
export {
    CACHE_DIR_ENV,
    LEGACY_CACHE_DIR_ENV,
    DEFAULT_CACHE_DIR,
    FingerprintStore,
    openStore,
} from './store';
export * from './errors';
