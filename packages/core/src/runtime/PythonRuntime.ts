import { spawn, SpawnOptions } from "child_process";
import { EventEmitter } from "events";
import fs from "fs/promises";
import path from "path";
import { Readable, Writable } from "stream";

import { BootstrapUnit } from "../bootstrap/BootstrapUnit";
import {
    BootstrapResult,
    failureOf,
    statusOf,
} from "../bootstrap/BootstrapResult";
import {
    BootstrapError,
    errorMessage,
    SessionStateError,
    StartupError,
} from "../utils/err";
import { createLogger, Logger } from "../utils/log";
import { IInterpreterRuntime } from "./IInterpreterRuntime";

// Reads the bootstrap unit from fd 3, so stdin stays with the program.
// The argument after -c becomes sys.argv[0].
const PRELUDE = `
import os, sys
del sys.argv[0]
with os.fdopen(3, "r", encoding="utf-8") as channel:
    source = channel.read()
del os, sys, channel
exec(compile(source, "<bootstrap>", "exec"), {"__name__": "__main__", "__builtins__": __builtins__})
`;

/**
 * The part of a ChildProcess the runtime relies on
 */
export interface InterpreterProcess extends EventEmitter {
    readonly stdio: ReadonlyArray<Readable | Writable | null | undefined>;
    kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnInterpreter = (
    command: string,
    args: readonly string[],
    options: SpawnOptions,
) => InterpreterProcess;

export interface PythonRuntimeOptions {
    /** Directory put first on PYTHONPATH */
    moduleRoot: string;
    /** Interpreter command, `python3` by default */
    python?: string;
    /** `sys.argv[0]`, `clipfix` by default */
    program?: string;
    /** Arguments the program sees as `sys.argv[1:]` */
    args?: readonly string[];
    /** Environment of the interpreter */
    env?: Record<string, string>;
    spawn?: SpawnInterpreter;
    logger?: Logger;
}

interface Exit {
    code: number | null;
    signal: NodeJS.Signals | null;
}

// Signals that would end the host; the interpreter goes down with it
const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = [
    "SIGTERM",
    "SIGHUP",
    "SIGINT",
];

const spawnInterpreter: SpawnInterpreter = (command, args, options) =>
    spawn(command, args, options);

/**
 * Implements the interpreter as a CPython child process
 */
export class PythonRuntime implements IInterpreterRuntime {
    private static readonly PYTHON_CLI = "python3";

    readonly name = "python";
    readonly language = "python";

    private process?: InterpreterProcess;
    private exited?: Promise<Exit>;
    private running = false;
    private forwarders = new Map<NodeJS.Signals, () => void>();
    private logger: Logger;

    constructor(private options: PythonRuntimeOptions) {
        this.logger =
            options.logger ?? createLogger(this.name, process.stderr);
    }

    private get command(): string {
        return this.options.python ?? PythonRuntime.PYTHON_CLI;
    }

    async init(): Promise<void> {
        const root = this.options.moduleRoot;
        const stat = await fs.stat(root).catch(() => undefined);
        if (!stat?.isDirectory()) {
            throw new StartupError(`Module root not found: ${root}`, {
                hint: "Set 'moduleRoot' in launcher.yml to the directory holding your Python package",
            });
        }

        const env = { ...this.options.env };
        env.PYTHONPATH = env.PYTHONPATH
            ? root + path.delimiter + env.PYTHONPATH
            : root;

        const spawnProcess = this.options.spawn ?? spawnInterpreter;
        const child = spawnProcess(
            this.command,
            [
                "-c",
                PRELUDE,
                this.options.program ?? "clipfix",
                ...(this.options.args ?? []),
            ],
            { env, stdio: ["inherit", "inherit", "inherit", "pipe"] },
        );
        this.process = child;

        this.exited = new Promise<Exit>((resolve) => {
            child.once(
                "close",
                (code: number | null, signal: NodeJS.Signals | null) => {
                    this.running = false;
                    this.stopForwarding();
                    resolve({ code, signal });
                },
            );
        });

        await new Promise<void>((resolve, reject) => {
            let started = false;
            child.once("spawn", () => {
                started = true;
                this.running = true;
                this.forwardSignals(child);
                resolve();
            });
            child.on("error", (error: Error) => {
                if (!started) {
                    reject(
                        new StartupError(`Could not start '${this.command}'`, {
                            cause: error,
                            hint: "Install Python 3 or set 'python' in launcher.yml",
                        }),
                    );
                    return;
                }
                this.logger.error(errorMessage(error));
            });
        });
    }

    async execute(unit: BootstrapUnit): Promise<BootstrapResult> {
        if (!this.process || !this.exited) {
            throw new SessionStateError("Python runtime is not initialized");
        }
        if (unit.language !== this.language) {
            throw new BootstrapError(
                `Python runtime cannot run a ${unit.language} bootstrap unit`,
            );
        }

        const channel = this.process.stdio[3];
        if (!(channel instanceof Writable)) {
            return failureOf(
                "The bootstrap channel to the Python interpreter is not writable",
                "unhandled",
            );
        }
        channel.on("error", (error: Error) =>
            this.logger.error(`Bootstrap channel: ${errorMessage(error)}`),
        );
        channel.end(unit.source);

        const { code, signal } = await this.exited;
        if (code !== null) return statusOf(code);

        return failureOf(
            `The Python interpreter was terminated by ${signal ?? "an unknown signal"}`,
            "unhandled",
        );
    }

    async destroy(): Promise<void> {
        this.stopForwarding();
        if (this.process && this.running) {
            this.process.kill();
        }
        this.running = false;
        this.process = undefined;
        this.exited = undefined;
    }

    private forwardSignals(child: InterpreterProcess): void {
        for (const signal of FORWARDED_SIGNALS) {
            const forward = () => {
                this.forwarders.delete(signal);
                this.logger.debug(`Forwarding ${signal} to the interpreter`);
                child.kill(signal);
            };
            this.forwarders.set(signal, forward);
            process.once(signal, forward);
        }
    }

    private stopForwarding(): void {
        for (const [signal, forward] of this.forwarders) {
            process.removeListener(signal, forward);
        }
        this.forwarders.clear();
    }
}
