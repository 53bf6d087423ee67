import path from "path";

import { createBootstrapUnit, BootstrapUnit } from "../src/bootstrap/BootstrapUnit";
import { EmbeddedRuntime, EmbeddedRuntimeOptions } from "../src/runtime/EmbeddedRuntime";
import {
    DirectoryModuleSource,
    MemoryModuleSource,
} from "../src/runtime/modules/ModuleSource";
import { BootstrapError, SessionStateError, StartupError } from "../src/utils/err";
import { Capture, tempDir, writeFiles } from "./helpers";

const unit = createBootstrapUnit("javascript");

async function runMain(
    code: string,
    options: Partial<EmbeddedRuntimeOptions> = {},
    modules: Record<string, string> = {},
) {
    const runtime = new EmbeddedRuntime({
        source: new MemoryModuleSource({ "clipfix.main": code, ...modules }),
        ...options,
    });
    await runtime.init();
    try {
        return await runtime.execute(unit);
    } finally {
        await runtime.destroy();
    }
}

describe("EmbeddedRuntime", () => {
    test("entry point returning nothing gives no status", async () => {
        expect(await runMain("exports.main = () => {};")).toEqual({
            kind: "no-status",
        });
    });

    test("entry point returning an integer gives that status", async () => {
        expect(await runMain("exports.main = () => 2;")).toEqual({
            kind: "status",
            code: 2,
        });
    });

    test("module.exports can be replaced", async () => {
        expect(
            await runMain("module.exports = { main() { return 9; } };"),
        ).toEqual({ kind: "status", code: 9 });
    });

    test("a thrown error is an unhandled failure with its stack", async () => {
        const result = await runMain(
            'exports.main = () => { throw new Error("bad input"); };',
        );

        expect(result.kind).toBe("failure");
        if (result.kind === "failure") {
            expect(result.origin).toBe("unhandled");
            expect(result.description.split("\n")[0]).toBe("Error: bad input");
            expect(result.description).toContain("<clipfix.main>");
        }
    });

    test("a string handed to sys.exit fails with that text", async () => {
        expect(await runMain('exports.main = () => "clipboard empty";')).toEqual({
            kind: "failure",
            origin: "exit",
            description: "clipboard empty",
        });
    });

    test("sys.exit called deep inside the program unwinds it", async () => {
        const code = `
            function check() { sys.exit(3); }
            exports.main = () => { check(); return 0; };
        `;
        expect(await runMain(code)).toEqual({ kind: "status", code: 3 });
    });

    test("async entry points are awaited", async () => {
        expect(await runMain("exports.main = async () => 5;")).toEqual({
            kind: "status",
            code: 5,
        });
        expect(
            await runMain("exports.main = async () => { sys.exit(6); };"),
        ).toEqual({ kind: "status", code: 6 });

        const rejected = await runMain(
            'exports.main = async () => { throw new Error("late"); };',
        );
        expect(rejected.kind).toBe("failure");
        if (rejected.kind === "failure") {
            expect(rejected.description).toContain("Error: late");
        }
    });

    test("a missing module is an unhandled failure", async () => {
        const runtime = new EmbeddedRuntime({ source: new MemoryModuleSource({}) });
        await runtime.init();
        const result = await runtime.execute(unit);
        await runtime.destroy();

        expect(result.kind).toBe("failure");
        if (result.kind === "failure") {
            expect(result.description).toContain("No module named 'clipfix.main'");
        }
    });

    test("a module without the entry point is an unhandled failure", async () => {
        const result = await runMain("exports.other = () => 0;");
        expect(result.kind).toBe("failure");
        if (result.kind === "failure") {
            expect(result.description).toContain(
                "TypeError: module 'clipfix.main' has no callable 'main'",
            );
        }
    });

    test("a bootstrap unit that never calls sys.exit gives no status", async () => {
        const tracker = { touched: false };
        const runtime = new EmbeddedRuntime({
            source: new MemoryModuleSource({}),
            globals: { tracker },
        });
        const custom: BootstrapUnit = {
            language: "javascript",
            module: "clipfix.main",
            entry: "main",
            source: "tracker.touched = true;",
        };

        await runtime.init();
        expect(await runtime.execute(custom)).toEqual({ kind: "no-status" });
        await runtime.destroy();
        expect(tracker.touched).toBe(true);
    });

    test("modules import each other once per session", async () => {
        const tracker = { loads: 0 };
        const modules = {
            "clipfix.engines.cache": "tracker.loads++; exports.size = () => 4;",
            "clipfix.engines.history":
                'const cache = importModule("clipfix.engines.cache"); exports.depth = () => cache.size() * 2;',
        };
        const code = `
            const cache = importModule("clipfix.engines.cache");
            const history = importModule("clipfix.engines.history");
            exports.main = () => cache.size() + history.depth();
        `;

        expect(await runMain(code, { globals: { tracker } }, modules)).toEqual({
            kind: "status",
            code: 12,
        });
        expect(tracker.loads).toBe(1);
    });

    test("sys exposes argv, env and the output streams", async () => {
        const stdout = new Capture();
        const stderr = new Capture();
        const code = `
            exports.main = () => {
                sys.stdout.write(sys.argv.join(" ") + "\\n");
                sys.stderr.write(sys.env.TOKENIZERS_PARALLELISM);
                return sys.argv.length;
            };
        `;

        const result = await runMain(code, {
            argv: ["clipfix", "--diff", "--no-llm"],
            env: { TOKENIZERS_PARALLELISM: "false" },
            stdout,
            stderr,
        });

        expect(result).toEqual({ kind: "status", code: 3 });
        expect(stdout.text).toBe("clipfix --diff --no-llm\n");
        expect(stderr.text).toBe("false");
    });

    test("each runtime starts from fresh globals", async () => {
        const code = `
            globalThis.runs = (globalThis.runs || 0) + 1;
            exports.main = () => globalThis.runs;
        `;
        expect(await runMain(code)).toEqual({ kind: "status", code: 1 });
        expect(await runMain(code)).toEqual({ kind: "status", code: 1 });
    });

    test("string evaluation is disabled inside the interpreter", async () => {
        const result = await runMain('exports.main = () => eval("1 + 1");');
        expect(result.kind).toBe("failure");
    });

    test("loads modules from a directory", async () => {
        const root = tempDir();
        writeFiles(root, {
            "clipfix/main.js": 'exports.main = () => importModule("clipfix.util").code;',
            "clipfix/util/index.js": "exports.code = 8;",
        });

        const runtime = new EmbeddedRuntime({ source: new DirectoryModuleSource(root) });
        await runtime.init();
        expect(await runtime.execute(unit)).toEqual({ kind: "status", code: 8 });
        await runtime.destroy();
    });

    test("console prints to the runtime's own streams", async () => {
        const stdout = new Capture();
        const stderr = new Capture();
        const code = `exports.main = () => {
            console.log("loaded %d clips", 3);
            console.warn("slow", { seconds: 2 });
        };`;

        expect(await runMain(code, { stdout, stderr })).toEqual({ kind: "no-status" });
        expect(stdout.text).toBe("loaded 3 clips\n");
        expect(stderr.text).toBe("slow { seconds: 2 }\n");
    });

    test("a missing module root fails init", async () => {
        const runtime = new EmbeddedRuntime({
            source: new DirectoryModuleSource(path.join(tempDir(), "missing")),
        });
        await expect(runtime.init()).rejects.toThrow(StartupError);
    });

    test("refuses to run before init or after destroy", async () => {
        const runtime = new EmbeddedRuntime({ source: new MemoryModuleSource({}) });
        await expect(runtime.execute(unit)).rejects.toThrow(SessionStateError);

        await runtime.init();
        await runtime.destroy();
        await expect(runtime.execute(unit)).rejects.toThrow(SessionStateError);
    });

    test("refuses python bootstrap units", async () => {
        const runtime = new EmbeddedRuntime({ source: new MemoryModuleSource({}) });
        await runtime.init();
        await expect(
            runtime.execute(createBootstrapUnit("python")),
        ).rejects.toThrow(BootstrapError);
        await runtime.destroy();
    });
});
