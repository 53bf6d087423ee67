import { formatDiagnostic } from "./Error";

export interface HostErrorOptions {
    hint?: string;
    cause?: unknown;
}

/**
 * Base class of every error raised by the launcher itself (as opposed to
 * failures coming out of the launched program).
 */
export class HostError extends Error {
    public rawMessage: string;
    public hint?: string;

    constructor(message: string, options: HostErrorOptions = {}) {
        super(message, { cause: options.cause });
        this.name = "HostError";
        this.rawMessage = message;
        this.hint = options.hint;
    }

    /**
     * Render the error as a diagnostic block for standard error
     */
    public toDiagnostic(): string {
        const detail =
            this.cause === undefined ? undefined : errorMessage(this.cause);
        return formatDiagnostic(this.rawMessage, detail, this.hint);
    }
}

/**
 * The embedded runtime could not be constructed.
 */
export class StartupError extends HostError {
    constructor(message: string, options: HostErrorOptions = {}) {
        super(message, options);
        this.name = "StartupError";
    }
}

/**
 * The fixed bootstrap unit could not be built.
 */
export class BootstrapError extends HostError {
    constructor(message: string, options: HostErrorOptions = {}) {
        super(message, options);
        this.name = "BootstrapError";
    }
}

export class ModuleNotFoundError extends HostError {
    public moduleName: string;

    constructor(moduleName: string, options: HostErrorOptions = {}) {
        super(`No module named '${moduleName}'`, options);
        this.name = "ModuleNotFoundError";
        this.moduleName = moduleName;
    }
}

export class ConfigError extends HostError {
    public file: string;

    constructor(file: string, message: string, options: HostErrorOptions = {}) {
        super(`${file}: ${message}`, options);
        this.name = "ConfigError";
        this.file = file;
    }
}

/**
 * Raised when the session lifecycle is driven out of order.
 */
export class SessionStateError extends HostError {
    constructor(message: string, options: HostErrorOptions = {}) {
        super(message, options);
        this.name = "SessionStateError";
    }
}

function readStringProperty(value: unknown, key: string): string | undefined {
    if (typeof value !== "object" || value === null) return undefined;
    const property: unknown = Reflect.get(value, key);
    return typeof property === "string" ? property : undefined;
}

function stringify(value: unknown): string {
    try {
        return String(value);
    } catch {
        // Object.create(null) and friends have no toString
        return Object.prototype.toString.call(value);
    }
}

/**
 * Short, single-line description of a thrown value. Works across `vm`
 * realms, where `instanceof Error` does not.
 */
export function errorMessage(error: unknown): string {
    const message = readStringProperty(error, "message");
    if (message === undefined) return stringify(error);

    const name = readStringProperty(error, "name");
    return name ? `${name}: ${message}` : message;
}

/**
 * Full description of a thrown value, preferring its stack trace.
 */
export function describeError(error: unknown): string {
    const stack = readStringProperty(error, "stack");
    if (stack) return stack;
    return errorMessage(error);
}
