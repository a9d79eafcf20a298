import { Console } from 'console';

/**
 * Output sink for rules-lint. Rule diagnostics and errors go through
 * error(); the JSON report, summaries and help go through info().
 */
export interface LintLogger {
    info(msg: string, ...args: unknown[]): void;
    error(msg: string, ...args: unknown[]): void;
    success(msg: string, ...args: unknown[]): void;
    warn(msg: string, ...args: unknown[]): void;
}

export interface LoggerStreams {
    stdout: NodeJS.WritableStream;
    stderr: NodeJS.WritableStream;
}

/**
 * Writes info/success to stdout and warn/error to stderr, one line per call.
 * Defaults to the process streams.
 */
export class ConsoleLogger implements LintLogger {
    private console: Console;

    constructor(streams: LoggerStreams = { stdout: process.stdout, stderr: process.stderr }) {
        this.console = new Console({ stdout: streams.stdout, stderr: streams.stderr, colorMode: false });
    }

    info(msg: string, ...args: unknown[]): void {
        this.console.log(msg, ...args);
    }

    error(msg: string, ...args: unknown[]): void {
        this.console.error(msg, ...args);
    }

    success(msg: string, ...args: unknown[]): void {
        this.console.log(msg, ...args);
    }

    warn(msg: string, ...args: unknown[]): void {
        this.console.warn(msg, ...args);
    }
}

/**
 * Collects lines in memory, split by stream.
 */
export class MemoryLogger implements LintLogger {
    readonly stdout: string[] = [];
    readonly stderr: string[] = [];

    info(msg: string): void {
        this.stdout.push(msg);
    }

    error(msg: string): void {
        this.stderr.push(msg);
    }

    success(msg: string): void {
        this.stdout.push(msg);
    }

    warn(msg: string): void {
        this.stderr.push(msg);
    }
}
