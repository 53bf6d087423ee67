import fs from "fs";
import fsp from "fs/promises";
import * as yaml from "js-yaml";
import path from "path";

import { ConfigError, StartupError } from "../utils/err";
import { LauncherConfig, parseLauncherConfig } from "./Config";

export const CONFIG_FILE_NAMES = ["launcher.yml", "launcher.yaml"] as const;

/**
 * Walks up from `startDir` to the first directory holding a launcher config
 */
export function findLauncherConfig(startDir: string): string | null {
    let currentDir = path.resolve(startDir);

    while (true) {
        for (const name of CONFIG_FILE_NAMES) {
            const configPath = path.join(currentDir, name);
            if (fs.existsSync(configPath)) return configPath;
        }

        const parent = path.dirname(currentDir);
        if (parent === currentDir) return null;
        currentDir = parent;
    }
}

export async function loadLauncherConfig(
    configPath: string,
): Promise<LauncherConfig> {
    const file = path.basename(configPath);

    let content: string;
    try {
        content = await fsp.readFile(configPath, "utf-8");
    } catch (e) {
        throw new StartupError(`Cannot read ${configPath}`, {
            cause: e,
            hint: "Create it with `clipfix-host init <name>`",
        });
    }

    let raw: unknown;
    try {
        raw = yaml.load(content, { filename: configPath });
    } catch (e) {
        throw new ConfigError(file, "invalid YAML", { cause: e });
    }

    return parseLauncherConfig(raw, path.dirname(configPath), file);
}
