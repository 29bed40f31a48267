/**
 * @module
 * Rebuild-decision engine: resolves targets depth-first and decides, from fingerprints and
 * rebuild policies, which actions have to run.
 */
import {
    ActionError,
    CycleError,
    MissingTargetError,
    OutsideActionError,
    UnresolvablePhonyError,
} from './errors';
import {
    computeFingerprint,
} from './fingerprint';
import {
    Progress,
} from './progress';
import {
    ActionContext,
    Recipe,
} from './recipe';
import {
    Registry,
} from './registry';
import {
    Fingerprint,
    FingerprintStore,
    statPath,
} from './store';
import fs = require('fs-extra');
import path = require('path');

/**
 * State of one invocation, shared by every target resolved in it.
 */
export class ResolutionContext {
    /** Targets already resolved. */
    readonly visited: Set<string>;
    /** Targets whose action ran, in execution order. */
    readonly executed: string[];
    /** Targets being resolved, outermost first. */
    private readonly stack: string[];
    /** Prerequisites of the recipe whose action is running. */
    private current?: readonly string[];

    constructor() {
        this.visited = new Set();
        this.executed = [];
        this.stack = [];
    }

    /**
     * Returns the prerequisites of the running action's recipe.
     */
    currentPrerequisites(): string[] {
        if (!this.current)
            throw new OutsideActionError();
        return [...this.current];
    }

    /**
     * Runs `fn` with `prerequisites` exposed through {@link currentPrerequisites}.
     */
    async withPrerequisites(prerequisites: readonly string[], fn: () => Promise<void>): Promise<void> {
        const previous = this.current;
        this.current = prerequisites;
        try {
            await fn();
        } finally {
            this.current = previous;
        }
    }

    enter(name: string): void {
        const start = this.stack.indexOf(name);
        if (start >= 0)
            throw new CycleError([...this.stack.slice(start), name]);
        this.stack.push(name);
    }

    leave(): void {
        this.stack.pop();
    }

    wasExecuted(name: string): boolean {
        return this.executed.includes(name);
    }
}

/**
 * Options for {@link Resolver}.
 */
export interface ResolverOptions {
    /** Directory target names are relative to. */
    cwd: string;
    progress: Progress;
    /** Log the time spent resolving each target. */
    bench?: boolean;
}

/**
 * Resolves targets against a registry, keeping fingerprints in a store.
 * Creating a resolver freezes the registry.
 */
export class Resolver {
    private readonly registry: Registry;
    private readonly store: FingerprintStore;
    private readonly options: ResolverOptions;

    constructor(registry: Registry, store: FingerprintStore, options: ResolverOptions) {
        this.registry = registry;
        this.store = store;
        this.options = options;
        registry.freeze();
    }

    /**
     * Brings `name` up to date, resolving its prerequisites first, in declared order.
     * Resolving a target twice in one context runs its action at most once.
     */
    async resolve(name: string, ctx: ResolutionContext): Promise<void> {
        if (ctx.visited.has(name))
            return;
        const started = Date.now();
        ctx.enter(name);
        try {
            await this.resolveTarget(name, ctx);
        } finally {
            ctx.leave();
        }
        ctx.visited.add(name);
        if (this.options.bench)
            this.options.progress.log('info', `[pmake] run ${name}: ${(Date.now() - started) / 1000}s`);
    }

    private async resolveTarget(name: string, ctx: ResolutionContext): Promise<void> {
        const recipe = this.registry.lookup(name);
        if (recipe) {
            for (const prerequisite of recipe.prerequisites)
                await this.resolve(prerequisite, ctx);
        }

        const isPhony = this.registry.isPhony(name);
        const filename = path.resolve(this.options.cwd, name);

        if (!recipe) {
            const kind = await statPath(filename);
            if (isPhony) {
                // A marker: satisfied by the existence of its path.
                if (kind !== 'missing')
                    return;
                throw new UnresolvablePhonyError(name);
            }
            if (kind === 'missing')
                throw new MissingTargetError(name);
            // Plain file: nothing to run, only record its state.
            await this.store.save(name, await computeFingerprint(this.store, filename, [], false));
            return;
        }

        let fingerprint = await computeFingerprint(this.store, filename, recipe.prerequisites, isPhony);
        const saved = await this.store.load(name);

        if (!(await this.isUpToDate(recipe, filename, isPhony, fingerprint, saved, ctx))) {
            if (!isPhony)
                await this.removeStale(recipe, filename);
            await this.runAction(recipe, ctx);
            fingerprint = await computeFingerprint(this.store, filename, recipe.prerequisites, isPhony);
        }

        await this.store.save(name, fingerprint);
    }

    private async isUpToDate(recipe: Recipe, filename: string, isPhony: boolean, fingerprint: Fingerprint,
                             saved: Fingerprint, ctx: ResolutionContext): Promise<boolean> {
        switch (recipe.rebuild) {
        case 'always':
            return false;
        case 'no':
            return !isPhony && (await statPath(filename)) !== 'missing';
        case 'auto':
        case 'autoWithDir':
            if (!fingerprint.equals(saved))
                return false;
            // A prerequisite rebuilt in this run may have been restored to identical content.
            if (recipe.prerequisites.some(x => ctx.wasExecuted(x)))
                return false;
            return isPhony || (await statPath(filename)) !== 'missing';
        }
    }

    /**
     * Removes the existing artifact of `recipe`.
     * Directories are kept under `auto`; the action is expected to overwrite into them.
     */
    private async removeStale(recipe: Recipe, filename: string): Promise<void> {
        const kind = await statPath(filename);
        if (kind === 'missing')
            return;
        if (kind === 'directory' && recipe.rebuild !== 'always' && recipe.rebuild !== 'autoWithDir')
            return;
        await fs.remove(filename);
    }

    private async runAction(recipe: Recipe, ctx: ResolutionContext): Promise<void> {
        const progress = this.options.progress;
        const actionCtx: ActionContext = {
            output: [],
            prerequisites: () => ctx.currentPrerequisites(),
            target: recipe.name,
        };
        ctx.executed.push(recipe.name);
        progress.status = `[${ctx.executed.length}] ${recipe.description || recipe.name}`;
        progress.render();
        try {
            await ctx.withPrerequisites(recipe.prerequisites, async () => {
                await recipe.action.run(actionCtx);
            });
        } catch (error) {
            throw new ActionError(recipe.name, error);
        } finally {
            for (const chunk of actionCtx.output)
                progress.write(chunk);
        }
    }
}
