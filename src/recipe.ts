/**
 * Rebuild policy of a recipe.
 *
 * - `auto`: rebuild when the fingerprint changed or the artifact is gone.
 * - `no`: never rebuild an existing artifact.
 * - `always`: rebuild on every invocation.
 * - `autoWithDir`: like `auto`, but also removes a stale output directory before rebuilding.
 */
export type RebuildPolicy = 'auto' | 'no' | 'always' | 'autoWithDir';

/**
 * Context that will be passed to the action during execution.
 */
export interface ActionContext {
    /** Name of the target being built. */
    readonly target: string;
    /** Action output, written to the console once the action finishes. */
    readonly output: Buffer[];
    /**
     * Returns the prerequisites of the recipe being built.
     * Throws if called after the action has finished.
     */
    prerequisites(): string[];
}

/**
 * Function that runs an action.
 */
export type ActionFunction = (ctx: ActionContext) => (Promise<void> | void);

/**
 * Something a recipe does when its target is out of date.
 */
export interface Action {
    /** Human readable description, shown by `help`. */
    readonly description?: string;
    run(ctx: ActionContext): Promise<void> | void;
}

/**
 * Represents a recipe.
 */
export interface Recipe {
    /** Target name: a path relative to the working directory, or a phony name. */
    readonly name: string;
    /** Prerequisite names, resolved in this order. */
    readonly prerequisites: readonly string[];
    readonly action: Action;
    readonly rebuild: RebuildPolicy;
    /** Recipe description. Default: the action's description. */
    readonly description?: string;
}
