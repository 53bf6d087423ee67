export * from "./bootstrap/BootstrapUnit";
export * from "./bootstrap/BootstrapResult";
export * from "./bootstrap/ExitStatus";
export * from "./session/SessionState";
export { InterpreterSession } from "./session/InterpreterSession";
export * from "./runtime/IInterpreterRuntime";
export { EmbeddedRuntime } from "./runtime/EmbeddedRuntime";
export type { EmbeddedRuntimeOptions } from "./runtime/EmbeddedRuntime";
export { PythonRuntime } from "./runtime/PythonRuntime";
export type {
    InterpreterProcess,
    PythonRuntimeOptions,
    SpawnInterpreter,
} from "./runtime/PythonRuntime";
export * from "./runtime/modules/ModuleSource";
export { ModuleLoader } from "./runtime/modules/ModuleLoader";
export { ExitSignal, createSysModule } from "./runtime/stdlib/sys";
export { createConsoleModule } from "./runtime/stdlib/console";
export * from "./config/Config";
export * from "./config/loader";
export { withEnvDefaults } from "./config/env";
export { InterpreterHost } from "./host/InterpreterHost";
export type { HostOptions, Terminate } from "./host/InterpreterHost";
export { createRuntime, launch, prepareLaunch } from "./host/launch";
export type { LaunchOptions } from "./host/launch";

export { formatDiagnostic } from "./utils/Error";
export {
    BootstrapError,
    ConfigError,
    HostError,
    ModuleNotFoundError,
    SessionStateError,
    StartupError,
    describeError,
    errorMessage,
} from "./utils/err";
export { createLogger } from "./utils/log";
export type { DiagnosticSink, Logger } from "./utils/log";
