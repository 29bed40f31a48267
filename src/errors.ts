/**
 * @module
 * Errors that abort an invocation.
 */

/**
 * Base class of every error raised by pmake itself.
 * Any of these terminates the invocation with a non-zero exit code.
 */
export class PmakeError extends Error {
    /** Target being resolved when the error occurred, if any. */
    readonly target?: string;

    constructor(message: string, target?: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
        this.target = target;
    }
}

/**
 * The cache directory, or an entry inside it, is not usable.
 */
export class CacheDirectoryError extends PmakeError {
    constructor(readonly path: string, reason: string) {
        super(`${reason}: ${path}`);
    }
}

/**
 * A name is neither a recipe nor an existing path.
 */
export class MissingTargetError extends PmakeError {
    constructor(target: string) {
        super(`No recipe for "${target}"`, target);
    }
}

/**
 * A phony marker without a recipe whose path does not exist.
 */
export class UnresolvablePhonyError extends PmakeError {
    constructor(target: string) {
        super(`No phony recipe for "${target}"`, target);
    }
}

/**
 * The action of a recipe failed.
 */
export class ActionError extends PmakeError {
    constructor(target: string, cause: unknown) {
        super(`Recipe "${target}" failed: ${cause instanceof Error ? cause.message : String(cause)}`, target, {cause});
    }
}

/**
 * A target (transitively) depends on itself.
 */
export class CycleError extends PmakeError {
    readonly cycle: string[];

    constructor(cycle: string[]) {
        super(`Circular dependency detected: ${cycle.join(' -> ')}`, cycle[0]);
        this.cycle = cycle;
    }
}

/**
 * The prerequisites accessor was used while no action is running.
 */
export class OutsideActionError extends PmakeError {
    constructor() {
        super('prerequisites() can only be used inside a running action');
    }
}

/**
 * The registry was modified after resolution started.
 */
export class RegistryFrozenError extends PmakeError {
    constructor(name: string) {
        super(`cannot register "${name}" after resolution has started`, name);
    }
}
