/**
 * @module
 * In-memory table of recipes and phony names.
 */
import {
    ActionLike,
    CommandOptions,
    toAction,
} from './action';
import {
    RegistryFrozenError,
} from './errors';
import {
    RebuildPolicy,
    Recipe,
} from './recipe';

/**
 * Options for {@link Registry#recipe}.
 */
export interface RecipeOptions {
    /** Explicit target name. Default: the normalized identifier. */
    name?: string;
    /** Default: `auto`. */
    rebuild?: RebuildPolicy;
    /** Shown by `help`. Default: the action's description. */
    description?: string;
}

/**
 * Entry listed by `help`.
 */
export interface HelpEntry {
    name: string;
    description: string;
}

/**
 * Derives a target name from an identifier: underscores become hyphens.
 */
export function recipeName(identifier: string): string {
    return identifier.replace(/_/g, '-');
}

/**
 * Mapping from target name to recipe, plus the set of phony names.
 * A phony name does not need a recipe: such a marker is satisfied when its path exists.
 *
 * All registration must happen before the first resolution; the registry is frozen afterwards.
 */
export class Registry {
    private readonly recipes: Map<string, Recipe>;
    private readonly phonyNames: Set<string>;
    private readonly commandOptions: CommandOptions;
    private frozen: boolean;

    /**
     * @param commandOptions options of the commands registered as arrays, typically the invocation's `cwd`.
     */
    constructor(commandOptions: CommandOptions = {}) {
        this.commandOptions = commandOptions;
        this.recipes = new Map();
        this.phonyNames = new Set();
        this.frozen = false;
    }

    /**
     * Inserts or replaces the recipe for `name`.
     * Prerequisites are not checked: they may be registered later or be plain paths.
     */
    register(name: string, prerequisites: readonly string[], action: ActionLike,
             rebuild: RebuildPolicy = 'auto', description?: string): Recipe {
        if (this.frozen)
            throw new RegistryFrozenError(name);
        const recipe: Recipe = {
            action: toAction(action, this.commandOptions),
            description,
            name,
            prerequisites: [...prerequisites],
            rebuild,
        };
        this.recipes.set(name, recipe);
        return recipe;
    }

    /**
     * Registers a recipe named after `identifier` unless `options.name` is given.
     */
    recipe(identifier: string, prerequisites: readonly string[], action: ActionLike, options: RecipeOptions = {}): Recipe {
        const name = options.name || recipeName(identifier);
        return this.register(name, prerequisites, action, options.rebuild, options.description);
    }

    markPhony(names: Iterable<string>): void {
        if (this.frozen)
            throw new RegistryFrozenError([...names].join(', '));
        for (const name of names)
            this.phonyNames.add(name);
    }

    lookup(name: string): Recipe | undefined {
        return this.recipes.get(name);
    }

    isPhony(name: string): boolean {
        return this.phonyNames.has(name);
    }

    /**
     * Disallows further registration.
     */
    freeze(): void {
        this.frozen = true;
    }

    isFrozen(): boolean {
        return this.frozen;
    }

    /**
     * Returns the phony recipes, in registration order.
     */
    helpEntries(): HelpEntry[] {
        const entries: HelpEntry[] = [];
        for (const recipe of this.recipes.values()) {
            if (!this.phonyNames.has(recipe.name))
                continue;
            entries.push({
                description: recipe.description || recipe.action.description || 'undocumented command',
                name: recipe.name,
            });
        }
        return entries;
    }
}
