#!/usr/bin/env node
import {
    describeError,
    ExitCode,
    findLauncherConfig,
    formatDiagnostic,
    launch,
} from "@clipfix-launcher/core";

// No flags of our own: every argument belongs to the entry point
const configPath = findLauncherConfig(__dirname);

if (!configPath) {
    process.stderr.write(
        formatDiagnostic(
            "No launcher.yml found for this launcher",
            undefined,
            `Searched ${__dirname} and its parent directories`,
        ),
    );
    process.exit(ExitCode.STARTUP_FAILURE);
}

launch({
    configPath,
    args: process.argv.slice(2),
    program: process.argv[1],
}).catch((e: unknown) => {
    process.stderr.write(formatDiagnostic("Launcher crashed", describeError(e)));
    process.exit(ExitCode.UNHANDLED_FAILURE);
});
