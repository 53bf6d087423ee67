import { BootstrapError } from "../utils/err";

export type BootstrapLanguage = "javascript" | "python";

export interface BootstrapTarget {
    /** Dotted module name, e.g. `clipfix.main` */
    module: string;
    /** Zero-argument callable exported by the module */
    entry: string;
}

export interface BootstrapUnit extends BootstrapTarget {
    readonly language: BootstrapLanguage;
    readonly source: string;
}

export const DEFAULT_TARGET: BootstrapTarget = Object.freeze({
    module: "clipfix.main",
    entry: "main",
});

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isIdentifier(name: string): boolean {
    return IDENTIFIER.test(name);
}

export function isModuleName(name: string): boolean {
    return name.split(".").every(isIdentifier);
}

const javascriptSource = ({ module, entry }: BootstrapTarget) => /*js*/ `
(function () {
    "use strict";
    const target = importModule(${JSON.stringify(module)});
    if (typeof target.${entry} !== "function") {
        throw new TypeError(${JSON.stringify(`module '${module}' has no callable '${entry}'`)});
    }
    sys.exit(target.${entry}());
})();
`;

const pythonSource = ({ module, entry }: BootstrapTarget) => `
import sys
from ${module} import ${entry}
sys.exit(${entry}())
`;

/**
 * Builds the fixed bootstrap unit for a runtime language: import `module`,
 * call `entry()` and hand its return value to `sys.exit`.
 */
export function createBootstrapUnit(
    language: BootstrapLanguage,
    target: BootstrapTarget = DEFAULT_TARGET,
): BootstrapUnit {
    if (!isModuleName(target.module)) {
        throw new BootstrapError(`Invalid module name '${target.module}'`, {
            hint: "Use a dotted name such as clipfix.main",
        });
    }
    if (!isIdentifier(target.entry)) {
        throw new BootstrapError(`Invalid entry point '${target.entry}'`, {
            hint: "Use a plain function name such as main",
        });
    }

    const source =
        language === "python"
            ? pythonSource(target)
            : javascriptSource(target);

    return Object.freeze({
        language,
        module: target.module,
        entry: target.entry,
        source,
    });
}
