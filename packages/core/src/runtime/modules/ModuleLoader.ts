import vm from "vm";

import { isModuleName } from "../../bootstrap/BootstrapUnit";
import { ModuleNotFoundError } from "../../utils/err";
import { IModuleSource } from "./ModuleSource";

interface ModuleRecord {
    exports: unknown;
}

/**
 * CommonJS-style loader for modules evaluated inside a `vm` context.
 * Modules run once per loader; a cycle sees partially filled exports.
 */
export class ModuleLoader {
    private cache: Map<string, ModuleRecord> = new Map();

    constructor(
        private source: IModuleSource,
        private context: vm.Context,
    ) {}

    public load(name: unknown): unknown {
        if (typeof name !== "string" || !isModuleName(name)) {
            throw new ModuleNotFoundError(String(name));
        }

        const cached = this.cache.get(name);
        if (cached) return cached.exports;

        const resolved = this.source.resolve(name);
        if (!resolved) {
            throw new ModuleNotFoundError(name, {
                hint: `Looked in ${this.source.description}`,
            });
        }

        const record: ModuleRecord = { exports: {} };
        this.cache.set(name, record);

        try {
            const wrapper = new vm.Script(
                `(function (exports, module, importModule) {\n${resolved.code}\n})`,
                { filename: resolved.id, lineOffset: -1 },
            );
            const factory: unknown = wrapper.runInContext(this.context);
            if (typeof factory !== "function") {
                throw new TypeError(`Module '${name}' did not compile`);
            }
            const importModule = (inner: unknown) => this.load(inner);
            factory.call(record.exports, record.exports, record, importModule);
        } catch (e) {
            this.cache.delete(name);
            throw e;
        }

        return record.exports;
    }

    public clear(): void {
        this.cache.clear();
    }
}
