import path from "path";

import { DEFAULT_TARGET, isIdentifier, isModuleName } from "../bootstrap/BootstrapUnit";
import { ConfigError } from "../utils/err";

export type RuntimeKind = "embedded" | "python";

export const RUNTIME_KINDS: readonly RuntimeKind[] = ["embedded", "python"];

export interface LauncherConfig {
    runtime: RuntimeKind;
    /** Absolute path */
    moduleRoot: string;
    module: string;
    entry: string;
    python: string;
    /** Environment defaults, applied only where unset */
    env: Record<string, string>;
    verbose: boolean;
}

const KEYS = [
    "runtime",
    "moduleRoot",
    "module",
    "entry",
    "python",
    "env",
    "verbose",
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRuntimeKind(value: unknown): value is RuntimeKind {
    return value === "embedded" || value === "python";
}

/**
 * Validates a parsed launcher.yml document. Relative paths are resolved
 * against `baseDir`, the directory holding the file.
 */
export function parseLauncherConfig(
    raw: unknown,
    baseDir: string,
    file = "launcher.yml",
): LauncherConfig {
    // An empty document means "all defaults"
    const doc = raw ?? {};
    if (!isRecord(doc)) {
        throw new ConfigError(file, "expected a mapping at the top level");
    }

    const unknownKeys = Object.keys(doc).filter(
        (key) => !KEYS.some((known) => known === key),
    );
    if (unknownKeys.length > 0) {
        throw new ConfigError(
            file,
            `unknown key${unknownKeys.length > 1 ? "s" : ""} ${unknownKeys.map((k) => `'${k}'`).join(", ")}`,
            { hint: `Valid keys: ${KEYS.join(", ")}` },
        );
    }

    const runtime = doc.runtime ?? "embedded";
    if (!isRuntimeKind(runtime)) {
        throw new ConfigError(file, `unsupported runtime '${String(runtime)}'`, {
            hint: `Available: ${RUNTIME_KINDS.join(", ")}`,
        });
    }

    const moduleRoot = readString(doc, "moduleRoot", "modules", file);
    const module = readString(doc, "module", DEFAULT_TARGET.module, file);
    if (!isModuleName(module)) {
        throw new ConfigError(file, `'module' is not a dotted module name: ${module}`);
    }

    const entry = readString(doc, "entry", DEFAULT_TARGET.entry, file);
    if (!isIdentifier(entry)) {
        throw new ConfigError(file, `'entry' is not a function name: ${entry}`);
    }

    const verbose = doc.verbose ?? false;
    if (typeof verbose !== "boolean") {
        throw new ConfigError(file, "'verbose' must be true or false");
    }

    return {
        runtime,
        moduleRoot: path.resolve(baseDir, moduleRoot),
        module,
        entry,
        python: readString(doc, "python", "python3", file),
        env: readEnv(doc.env, file),
        verbose,
    };
}

function readString(
    doc: Record<string, unknown>,
    key: string,
    fallback: string,
    file: string,
): string {
    const value = doc[key] ?? fallback;
    if (typeof value !== "string" || value.trim().length === 0) {
        throw new ConfigError(file, `'${key}' must be a non-empty string`);
    }
    return value;
}

function readEnv(value: unknown, file: string): Record<string, string> {
    if (value === undefined || value === null) return {};
    if (!isRecord(value)) {
        throw new ConfigError(file, "'env' must be a mapping of names to values");
    }

    const env: Record<string, string> = {};
    for (const [name, entry] of Object.entries(value)) {
        // YAML reads `false` and `1` as scalars of their own type
        if (
            typeof entry !== "string" &&
            typeof entry !== "number" &&
            typeof entry !== "boolean"
        ) {
            throw new ConfigError(file, `'env.${name}' must be a scalar value`);
        }
        env[name] = String(entry);
    }
    return env;
}
