import { BootstrapResult } from "../bootstrap/BootstrapResult";
import { BootstrapUnit } from "../bootstrap/BootstrapUnit";
import { ExitCode, exitStatusOf } from "../bootstrap/ExitStatus";
import { IInterpreterRuntime } from "../runtime/IInterpreterRuntime";
import { InterpreterSession } from "../session/InterpreterSession";
import { formatDiagnostic } from "../utils/Error";
import {
    describeError,
    errorMessage,
    HostError,
    SessionStateError,
} from "../utils/err";
import { createLogger, DiagnosticSink } from "../utils/log";

export type Terminate = (status: number) => never;

export interface HostOptions {
    runtime: IInterpreterRuntime;
    bootstrap: BootstrapUnit;
    /** Where diagnostics go, `process.stderr` by default */
    stderr?: DiagnosticSink;
    verbose?: boolean;
    /** Decides the exit status width */
    platform?: NodeJS.Platform;
    terminate?: Terminate;
}

const exitProcess: Terminate = (status) => process.exit(status);

/**
 * Bridges the process lifecycle to one interpreter session: start it, run
 * the bootstrap unit, tear it down on every path, exit with the outcome.
 */
export class InterpreterHost {
    private started = false;
    private stderr: DiagnosticSink;
    private platform: NodeJS.Platform;
    private terminate: Terminate;

    constructor(private options: HostOptions) {
        this.stderr = options.stderr ?? process.stderr;
        this.platform = options.platform ?? process.platform;
        this.terminate = options.terminate ?? exitProcess;
    }

    /**
     * Run and terminate the process with the resulting status
     */
    public async run(): Promise<never> {
        let status: number;
        try {
            status = await this.execute();
        } catch (e) {
            this.stderr.write(
                formatDiagnostic("Interpreter host failed", describeError(e)),
            );
            status = ExitCode.UNHANDLED_FAILURE;
        }
        return this.terminate(status);
    }

    /**
     * Everything `run()` does short of exiting; resolves with the status
     */
    public async execute(): Promise<number> {
        if (this.started) {
            throw new SessionStateError("This interpreter host has already run");
        }
        this.started = true;

        const { runtime, bootstrap, verbose = false } = this.options;
        const session = new InterpreterSession(
            runtime,
            createLogger("session", this.stderr, verbose),
        );

        try {
            await session.init();
        } catch (e) {
            this.reportStartupFailure(e);
            return ExitCode.STARTUP_FAILURE;
        }

        let result: BootstrapResult;
        let teardownFailed = false;
        try {
            result = await session.run(bootstrap);
        } finally {
            try {
                await session.destroy();
            } catch (e) {
                teardownFailed = true;
                this.stderr.write(
                    formatDiagnostic(
                        `The ${runtime.name} runtime failed to shut down`,
                        errorMessage(e),
                    ),
                );
            }
        }

        const status = this.report(result);
        if (teardownFailed && status === ExitCode.SUCCESS) {
            return ExitCode.TEARDOWN_FAILURE;
        }
        return status;
    }

    private report(result: BootstrapResult): number {
        if (result.kind === "failure") {
            this.stderr.write(
                result.origin === "exit"
                    ? result.description + "\n"
                    : formatDiagnostic(
                          `Unhandled failure in ${this.options.bootstrap.module}`,
                          result.description,
                      ),
            );
        }
        return exitStatusOf(result, this.platform);
    }

    private reportStartupFailure(error: unknown): void {
        this.stderr.write(
            error instanceof HostError
                ? error.toDiagnostic()
                : formatDiagnostic(
                      "Interpreter failed to start",
                      errorMessage(error),
                  ),
        );
    }
}
