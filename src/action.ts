/**
 * @module
 * Implements the actions a recipe can run.
 */
import {
    Action,
    ActionContext,
    ActionFunction,
} from './recipe';
import childProcess = require('child_process');

/**
 * Options for {@link CommandAction}.
 */
export interface CommandOptions {
    /** Working directory of the command. Default: the current working directory. */
    cwd?: string;
    /** Environment of the command. Default: `process.env`. */
    env?: NodeJS.ProcessEnv;
    description?: string;
}

/**
 * Action that runs a single external command and fails if it exits with a non-zero code.
 */
export class CommandAction implements Action {
    readonly command: string[];
    readonly description: string;
    private readonly options: CommandOptions;

    constructor(command: string[], options: CommandOptions = {}) {
        if (!command.length)
            throw new Error('command must not be empty');
        this.command = command;
        this.options = options;
        this.description = options.description || command.map(quote).join(' ');
    }

    run(ctx: ActionContext): Promise<void> {
        return runCommand(this.command, ctx.output, this.options);
    }
}

/**
 * Action backed by a plain function.
 */
export class FunctionAction implements Action {
    readonly description?: string;
    private readonly fn: ActionFunction;

    constructor(fn: ActionFunction, description?: string) {
        this.fn = fn;
        this.description = description;
    }

    run(ctx: ActionContext): Promise<void> | void {
        return this.fn(ctx);
    }
}

/**
 * Anything that can be registered as the action of a recipe.
 * An array is a command line.
 */
export type ActionLike = Action | ActionFunction | string[];

/**
 * Converts `x` into an {@link Action}. Command lines run with `commandOptions`.
 */
export function toAction(x: ActionLike, commandOptions: CommandOptions = {}): Action {
    if (Array.isArray(x))
        return new CommandAction(x, commandOptions);
    if (typeof x === 'function')
        return new FunctionAction(x);
    return x;
}

function runCommand(command: string[], output: Buffer[], options: CommandOptions): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        const cmdFile = command[0];
        const cmdArgs = command.slice(1);
        const cp = childProcess.spawn(cmdFile, cmdArgs, {
            cwd: options.cwd,
            env: options.env,
            stdio: ['ignore', 'pipe', 'pipe'],
        });
        cp.on('error', e => {
            reject(e);
        });
        cp.on('close', (code, signal) => {
            if (code === 0)
                return resolve();
            reject(new Error(`Command returned code ${code}, signal ${signal}`));
        });
        const chunkCallback = (chunk: string | Buffer) => {
            output.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
        };
        cp.stdout.on('data', chunkCallback);
        cp.stderr.on('data', chunkCallback);
    });
}

/**
 * Return a shell-escaped version of `x`
 */
export function quote(x: string): string {
    if (!x.length)
        return '\'\'';
    else if (!/[^\w@%+=:,./-]/.test(x))
        return x;

    const y = x.replace(/'/g, `'"'"'`);
    return `'${y}'`;
}
