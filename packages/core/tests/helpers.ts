import { EventEmitter } from "events";
import fs from "fs";
import os from "os";
import path from "path";
import { PassThrough } from "stream";

import { BootstrapResult, NO_STATUS } from "../src/bootstrap/BootstrapResult";
import { IInterpreterRuntime } from "../src/runtime/IInterpreterRuntime";
import { SpawnInterpreter } from "../src/runtime/PythonRuntime";

export class Capture {
    public text = "";

    write(chunk: string): boolean {
        this.text += chunk;
        return true;
    }

    get plain(): string {
        return stripAnsi(this.text);
    }
}

export function stripAnsi(text: string): string {
    return text.replace(/\x1B\[[0-9;]*[a-zA-Z]/g, "");
}

export function tempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), "clipfix-"));
}

export function writeFiles(root: string, files: Record<string, string>): void {
    for (const [name, contents] of Object.entries(files)) {
        const file = path.join(root, name);
        fs.mkdirSync(path.dirname(file), { recursive: true });
        fs.writeFileSync(file, contents);
    }
}

interface FakeRuntimeBehaviour {
    init?: () => Promise<void>;
    execute?: () => Promise<BootstrapResult>;
    destroy?: () => Promise<void>;
}

/**
 * Runtime that records its lifecycle calls
 */
export class FakeRuntime implements IInterpreterRuntime {
    readonly name = "fake";
    readonly language = "javascript";

    public calls = { init: 0, execute: 0, destroy: 0 };

    constructor(private behaviour: FakeRuntimeBehaviour = {}) {}

    async init(): Promise<void> {
        this.calls.init++;
        if (this.behaviour.init) await this.behaviour.init();
    }

    async execute(): Promise<BootstrapResult> {
        this.calls.execute++;
        return this.behaviour.execute ? this.behaviour.execute() : NO_STATUS;
    }

    async destroy(): Promise<void> {
        this.calls.destroy++;
        if (this.behaviour.destroy) await this.behaviour.destroy();
    }
}

export class FakeInterpreter extends EventEmitter {
    readonly channel = new PassThrough();
    readonly stdio = [null, null, null, this.channel];
    public signals: Array<NodeJS.Signals | undefined> = [];

    kill(signal?: NodeJS.Signals): boolean {
        this.signals.push(signal);
        return true;
    }

    /** Everything written to the bootstrap channel, once it is closed */
    received(): Promise<string> {
        return new Promise((resolve) => {
            let text = "";
            this.channel.on("data", (chunk) => (text += String(chunk)));
            this.channel.on("end", () => resolve(text));
        });
    }
}

export interface SpawnCall {
    command: string;
    args: string[];
    env: NodeJS.ProcessEnv | undefined;
    stdio: unknown;
}

/**
 * Spawner whose child either starts or fails with `failure` on the next tick
 */
export function fakeSpawn(failure?: Error) {
    const child = new FakeInterpreter();
    const calls: SpawnCall[] = [];

    const spawn: SpawnInterpreter = (command, args, options) => {
        calls.push({
            command,
            args: [...args],
            env: options.env,
            stdio: options.stdio,
        });
        process.nextTick(() =>
            failure ? child.emit("error", failure) : child.emit("spawn"),
        );
        return child;
    };

    return { spawn, child, calls };
}
