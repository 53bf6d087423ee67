import { format } from "util";

import { DiagnosticSink } from "../../utils/log";

export interface ConsoleModule {
    log(...args: unknown[]): void;
    info(...args: unknown[]): void;
    debug(...args: unknown[]): void;
    warn(...args: unknown[]): void;
    error(...args: unknown[]): void;
}

/**
 * `console` of the embedded interpreter, printing to its own streams
 * instead of the host's
 */
export function createConsoleModule(
    stdout: DiagnosticSink,
    stderr: DiagnosticSink,
): ConsoleModule {
    const printer = (sink: DiagnosticSink) => (...args: unknown[]) => {
        sink.write(format(...args) + "\n");
    };

    return Object.freeze({
        log: printer(stdout),
        info: printer(stdout),
        debug: printer(stdout),
        warn: printer(stderr),
        error: printer(stderr),
    });
}
