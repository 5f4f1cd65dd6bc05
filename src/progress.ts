/**
 * @module
 * Console status and messages.
 */
import readline = require('readline');
import tty = require('tty');

/**
 * Console reporter: a status line plus messages printed above it.
 */
export interface Progress {
    status: string;
    /** Write chunk to console. */
    write(chunk: Buffer | string): void;
    /** Renders status. */
    render(): void;
    /** Un-renders status by printing a newline. */
    unrender(): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    /** Section header, e.g. the tool that is about to run. */
    heading(message: string): void;
    /** A line added to the run environment. */
    env(line: string): void;
}

const COLORS = {
    cyan: '\u001b[0;96m',
    blue: '\u001b[0;94m',
    red: '\u001b[0;91m',
    yellow: '\u001b[0;93m',
    reset: '\u001b[0;0m',
};

type Color = Exclude<keyof typeof COLORS, 'reset'>;

class ConsoleProgress implements Progress {
    status: string;
    private readonly stream: NodeJS.WritableStream;
    private readonly isTTY: boolean;
    private rendered: boolean;

    constructor(stream: NodeJS.WritableStream) {
        this.status = '';
        this.stream = stream;
        this.isTTY = stream instanceof tty.WriteStream && stream.isTTY;
        this.rendered = false;
    }

    write(chunk: Buffer | string): void {
        this.unrender();
        this.stream.write(chunk);
    }

    render(): void {
        if (!this.isTTY) {
            this.stream.write(`${this.status}\n`);
            return;
        }
        if (this.rendered)
            readline.cursorTo(this.stream, 0);
        this.stream.write(truncateString(this.status, this.columns()));
        if (this.rendered)
            readline.clearLine(this.stream, 1);
        this.rendered = true;
    }

    unrender(): void {
        if (this.rendered) {
            this.stream.write('\n');
            this.rendered = false;
        }
    }

    info(message: string): void {
        this.write(`${message}\n`);
    }

    warn(message: string): void {
        this.write(`${this.paint('yellow', 'warning:')} ${message}\n`);
    }

    error(message: string): void {
        this.write(`${this.paint('red', 'error:')} ${message}\n`);
    }

    heading(message: string): void {
        this.write(`${this.paint('blue', `   ${message}`)}\n`);
    }

    env(line: string): void {
        this.write(`${this.paint('cyan', `   ENV:  ${line}`)}\n`);
    }

    private paint(color: Color, text: string): string {
        return this.isTTY ? `${COLORS[color]}${text}${COLORS.reset}` : text;
    }

    private columns(): number {
        return this.stream instanceof tty.WriteStream ? this.stream.columns : 80;
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

function truncateString(x: string, len: number): string {
    if (x.length <= len)
        return x;
    else if (len <= 3)
        return x.substring(0, len);
    else
        return `${x.substring(0, len - 3)}...`;
}
