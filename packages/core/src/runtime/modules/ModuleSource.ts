import fs from "fs";
import fsp from "fs/promises";
import path from "path";

import { StartupError } from "../../utils/err";

export interface ResolvedModule {
    /** Used as the file name in stack traces */
    id: string;
    code: string;
}

export interface IModuleSource {
    readonly description: string;

    /**
     * Check that the source can serve modules at all. Throws StartupError
     * when a runtime asset is missing.
     */
    verify(): Promise<void>;

    /**
     * Find a module by dotted name
     * @param name validated dotted module name
     */
    resolve(name: string): ResolvedModule | undefined;
}

/**
 * Serves `a.b` from `<root>/a/b.js` or `<root>/a/b/index.js`
 */
export class DirectoryModuleSource implements IModuleSource {
    constructor(private root: string) {}

    get description(): string {
        return this.root;
    }

    async verify(): Promise<void> {
        const stat = await fsp.stat(this.root).catch(() => undefined);
        if (!stat?.isDirectory()) {
            throw new StartupError(`Module root not found: ${this.root}`, {
                hint: "Set 'moduleRoot' in launcher.yml to the directory holding your modules",
            });
        }
    }

    resolve(name: string): ResolvedModule | undefined {
        const base = path.join(this.root, ...name.split("."));
        const candidates = [base + ".js", path.join(base, "index.js")];

        for (const candidate of candidates) {
            if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
                return {
                    id: candidate,
                    code: fs.readFileSync(candidate, "utf-8"),
                };
            }
        }
        return undefined;
    }
}

/**
 * Serves modules from a name → source map
 */
export class MemoryModuleSource implements IModuleSource {
    private modules: Map<string, string>;

    constructor(modules: Record<string, string>) {
        this.modules = new Map(Object.entries(modules));
    }

    get description(): string {
        return "<memory>";
    }

    async verify(): Promise<void> {}

    resolve(name: string): ResolvedModule | undefined {
        const code = this.modules.get(name);
        return code === undefined ? undefined : { id: `<${name}>`, code };
    }
}
