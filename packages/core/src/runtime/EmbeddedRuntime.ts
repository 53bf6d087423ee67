import vm from "vm";

import { BootstrapUnit } from "../bootstrap/BootstrapUnit";
import {
    BootstrapResult,
    fromExitPayload,
    NO_STATUS,
    unhandled,
} from "../bootstrap/BootstrapResult";
import { BootstrapError, SessionStateError } from "../utils/err";
import { createLogger, DiagnosticSink, Logger } from "../utils/log";
import { IInterpreterRuntime } from "./IInterpreterRuntime";
import { ModuleLoader } from "./modules/ModuleLoader";
import { IModuleSource } from "./modules/ModuleSource";
import { createConsoleModule } from "./stdlib/console";
import { createSysModule, ExitSignal } from "./stdlib/sys";

export interface EmbeddedRuntimeOptions {
    source: IModuleSource;
    /** `sys.argv`, program name first */
    argv?: readonly string[];
    /** `sys.env` */
    env?: Record<string, string>;
    /** Extra globals installed next to the standard library */
    globals?: Record<string, unknown>;
    stdout?: DiagnosticSink;
    stderr?: DiagnosticSink;
    logger?: Logger;
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
    return (
        (typeof value === "object" || typeof value === "function") &&
        value !== null &&
        "then" in value &&
        typeof value.then === "function"
    );
}

/**
 * In-process JavaScript interpreter on top of a `vm` context.
 *
 * The context gets its own globals and a small standard library: `sys`,
 * `console` and `importModule(name)`, which loads dotted module names from
 * the configured module source.
 */
export class EmbeddedRuntime implements IInterpreterRuntime {
    readonly name = "embedded";
    readonly language = "javascript";

    private context?: vm.Context;
    private loader?: ModuleLoader;
    private logger: Logger;

    constructor(private options: EmbeddedRuntimeOptions) {
        this.logger =
            options.logger ?? createLogger(this.name, process.stderr);
    }

    async init(): Promise<void> {
        await this.options.source.verify();

        const stdout = this.options.stdout ?? process.stdout;
        const stderr = this.options.stderr ?? process.stderr;
        const sys = createSysModule({
            argv: this.options.argv ?? ["clipfix"],
            env: this.options.env ?? {},
            stdout,
            stderr,
        });
        const console = createConsoleModule(stdout, stderr);

        const context = vm.createContext(
            { ...this.options.globals, console, sys },
            {
                name: `${this.name} interpreter`,
                codeGeneration: { strings: false, wasm: false },
            },
        );
        const loader = new ModuleLoader(this.options.source, context);
        context.importModule = (name: unknown) => loader.load(name);

        this.context = context;
        this.loader = loader;
        this.logger.debug(`Serving modules from ${this.options.source.description}`);
    }

    async execute(unit: BootstrapUnit): Promise<BootstrapResult> {
        if (!this.context) {
            throw new SessionStateError("Embedded runtime is not initialized");
        }
        if (unit.language !== this.language) {
            throw new BootstrapError(
                `Embedded runtime cannot run a ${unit.language} bootstrap unit`,
            );
        }

        try {
            new vm.Script(unit.source, { filename: "<bootstrap>" }).runInContext(
                this.context,
            );
        } catch (e) {
            return this.settle(e);
        }

        // Finished without calling sys.exit
        return NO_STATUS;
    }

    async destroy(): Promise<void> {
        this.loader?.clear();
        this.loader = undefined;
        this.context = undefined;
    }

    /**
     * Turn whatever unwound the bootstrap unit into a result. An async entry
     * point hands `sys.exit` a promise, which is settled here.
     */
    private async settle(thrown: unknown): Promise<BootstrapResult> {
        if (!(thrown instanceof ExitSignal)) return unhandled(thrown);

        const payload = thrown.payload;
        if (!isThenable(payload)) return fromExitPayload(payload);

        let value: unknown;
        try {
            value = await payload;
        } catch (rejection) {
            return this.settle(rejection);
        }
        return fromExitPayload(value);
    }
}
