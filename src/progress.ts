/**
 * @module
 * Console status and log output.
 */
import readline = require('readline');
import tty = require('tty');

export type LogLevel = 'info' | 'ok' | 'warn' | 'error' | 'debug' | 'normal';

const colors: Record<LogLevel, string> = {
    debug: '\x1b[36m',
    error: '\x1b[31m',
    info: '\x1b[34m',
    normal: '',
    ok: '\x1b[32m',
    warn: '\x1b[33m',
};

const reset = '\x1b[0m';

/**
 * Console progress status.
 */
export interface Progress {
    status: string;
    /** Write chunk to console. */
    write(chunk: Buffer | string): void;
    /** Write a line, colored by level on terminals. */
    log(level: LogLevel, message: string): void;
    /** Renders status. */
    render(): void;
    /** Un-renders status by printing a newline. */
    unrender(): void;
}

class ConsoleProgress implements Progress {
    status: string;
    private readonly stream: NodeJS.WritableStream;
    private readonly terminal?: tty.WriteStream;
    private rendered: boolean;

    constructor(stream: NodeJS.WritableStream) {
        this.status = '';
        this.stream = stream;
        this.terminal = isTerminal(stream) ? stream : undefined;
        this.rendered = false;
    }

    write(chunk: Buffer | string): void {
        this.unrender();
        this.stream.write(chunk);
    }

    log(level: LogLevel, message: string): void {
        this.write(this.terminal && colors[level] ? `${colors[level]}${message}${reset}\n` : `${message}\n`);
    }

    render(): void {
        // Status lines can't be redrawn in place on pipes and files.
        if (!this.terminal) {
            this.stream.write(`${this.status}\n`);
            return;
        }
        if (this.rendered)
            readline.cursorTo(this.terminal, 0);
        this.terminal.write(truncateString(this.status, this.terminal.columns));
        if (this.rendered)
            readline.clearLine(this.terminal, 1);
        this.rendered = true;
    }

    unrender(): void {
        if (this.rendered) {
            this.stream.write('\n');
            this.rendered = false;
        }
    }
}

/**
 * Create status.
 */
export function createProgress(stream?: NodeJS.WritableStream): Progress {
    if (!stream)
        stream = process.stdout;
    return new ConsoleProgress(stream);
}

function isTerminal(stream: NodeJS.WritableStream): stream is tty.WriteStream {
    return 'isTTY' in stream && stream.isTTY === true;
}

export function truncateString(x: string, len: number): string {
    if (x.length <= len)
        return x;
    else if (len <= 3)
        return x.substring(0, len);
    else
        return `${x.substring(0, len - 3)}...`;
}
