import { createBootstrapUnit } from "../bootstrap/BootstrapUnit";
import { ExitCode } from "../bootstrap/ExitStatus";
import { LauncherConfig } from "../config/Config";
import { withEnvDefaults } from "../config/env";
import { loadLauncherConfig } from "../config/loader";
import { EmbeddedRuntime } from "../runtime/EmbeddedRuntime";
import { IInterpreterRuntime } from "../runtime/IInterpreterRuntime";
import { DirectoryModuleSource } from "../runtime/modules/ModuleSource";
import { PythonRuntime } from "../runtime/PythonRuntime";
import { formatDiagnostic } from "../utils/Error";
import { errorMessage, HostError } from "../utils/err";
import { createLogger, DiagnosticSink } from "../utils/log";
import { InterpreterHost, Terminate } from "./InterpreterHost";

export interface LaunchOptions {
    configPath: string;
    /** Handed to the entry point untouched */
    args: readonly string[];
    /** `sys.argv[0]` of the program */
    program?: string;
    env?: NodeJS.ProcessEnv;
    /** Standard streams of the embedded runtime */
    stdout?: DiagnosticSink;
    stderr?: DiagnosticSink;
    terminate?: Terminate;
}

export function createRuntime(
    config: LauncherConfig,
    options: Pick<LaunchOptions, "args" | "program" | "env" | "stdout" | "stderr">,
): IInterpreterRuntime {
    const env = withEnvDefaults(options.env ?? process.env, config.env);
    const stderr = options.stderr ?? process.stderr;

    if (config.runtime === "python") {
        return new PythonRuntime({
            moduleRoot: config.moduleRoot,
            python: config.python,
            program: options.program,
            args: options.args,
            env,
            logger: createLogger("python", stderr, config.verbose),
        });
    }

    return new EmbeddedRuntime({
        source: new DirectoryModuleSource(config.moduleRoot),
        argv: [options.program ?? "clipfix", ...options.args],
        env,
        stdout: options.stdout,
        stderr,
        logger: createLogger("embedded", stderr, config.verbose),
    });
}

/**
 * Reads the launcher config and wires the host for it, without running
 */
export async function prepareLaunch(
    options: LaunchOptions,
): Promise<InterpreterHost> {
    const config = await loadLauncherConfig(options.configPath);
    const runtime = createRuntime(config, options);

    return new InterpreterHost({
        runtime,
        bootstrap: createBootstrapUnit(runtime.language, config),
        stderr: options.stderr,
        verbose: config.verbose,
        terminate: options.terminate,
    });
}

export async function launch(options: LaunchOptions): Promise<never> {
    let host: InterpreterHost;
    try {
        host = await prepareLaunch(options);
    } catch (e) {
        const stderr = options.stderr ?? process.stderr;
        stderr.write(
            e instanceof HostError
                ? e.toDiagnostic()
                : formatDiagnostic("Launcher failed to start", errorMessage(e)),
        );
        const terminate: Terminate =
            options.terminate ?? ((status) => process.exit(status));
        return terminate(ExitCode.STARTUP_FAILURE);
    }

    return host.run();
}
