import chalk from "chalk";

/**
 * Anything diagnostics can be written to. `process.stderr` qualifies.
 */
export interface DiagnosticSink {
    write(chunk: string): unknown;
}

export interface Logger {
    /** Lifecycle step, verbose only */
    info(message: string): void;
    /** Completed step, verbose only */
    success(message: string): void;
    debug(message: string): void;
    /** Always written */
    error(message: string): void;
}

export function createLogger(
    scope: string,
    sink: DiagnosticSink,
    verbose = false,
): Logger {
    const line = (text: string) => sink.write(`[${scope}] ${text}\n`);

    return {
        info(message) {
            if (verbose) line(chalk.yellow(message));
        },
        success(message) {
            if (verbose) line(chalk.green(message));
        },
        debug(message) {
            if (verbose) line(chalk.dim(message));
        },
        error(message) {
            line(chalk.red(message));
        },
    };
}

/**
 * Seconds elapsed since `startTime`, one decimal
 */
export function took(startTime: number): string {
    return ((Date.now() - startTime) / 1000).toFixed(1);
}
