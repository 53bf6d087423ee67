import { DiagnosticSink } from "../../utils/log";

/**
 * Thrown by `sys.exit()` to unwind the embedded program. Deliberately not an
 * `Error`: like SystemExit it is a termination request, not a failure.
 */
export class ExitSignal {
    constructor(public readonly payload: unknown) {}
}

export interface SysStream {
    write(text: unknown): void;
}

export interface SysModule {
    readonly argv: readonly string[];
    readonly env: Readonly<Record<string, string>>;
    readonly platform: string;
    readonly stdout: SysStream;
    readonly stderr: SysStream;
    exit(payload?: unknown): never;
}

export interface SysOptions {
    argv: readonly string[];
    env: Record<string, string>;
    stdout: DiagnosticSink;
    stderr: DiagnosticSink;
}

function stream(sink: DiagnosticSink): SysStream {
    return Object.freeze({
        write(text: unknown) {
            sink.write(String(text));
        },
    });
}

/**
 * `sys` binding of the embedded interpreter's standard library
 */
export function createSysModule(options: SysOptions): SysModule {
    return Object.freeze({
        argv: Object.freeze([...options.argv]),
        env: Object.freeze({ ...options.env }),
        platform: process.platform,
        stdout: stream(options.stdout),
        stderr: stream(options.stderr),
        exit(payload?: unknown): never {
            throw new ExitSignal(payload);
        },
    });
}
