import chalk from "chalk";
import path from "path";

import {
    ExitCode,
    findLauncherConfig,
    launch,
    Terminate,
} from "@clipfix-launcher/core";

/**
 * Launch the entry point of the project containing `projectDir`
 */
export async function runProject(
    projectDir: string,
    args: readonly string[],
    terminate?: Terminate,
): Promise<never> {
    const resolved = path.resolve(projectDir);
    const configPath = findLauncherConfig(resolved);

    if (!configPath) {
        console.error(
            chalk.red(`No launcher.yml found in ${resolved} or above.`),
        );
        console.error(chalk.white("Create one with: clipfix-host init <name>"));
        const exit: Terminate = terminate ?? ((status) => process.exit(status));
        return exit(ExitCode.STARTUP_FAILURE);
    }

    return launch({
        configPath,
        args,
        program: path.basename(path.dirname(configPath)),
        terminate,
    });
}
