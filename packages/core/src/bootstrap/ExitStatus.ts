import { BootstrapResult } from "./BootstrapResult";

export const ExitCode = {
    SUCCESS: 0,
    /** Unhandled failure or a failing `sys.exit` payload */
    UNHANDLED_FAILURE: 1,
    /** The interpreter could not be started */
    STARTUP_FAILURE: 70,
    /** The run succeeded but the interpreter failed to shut down */
    TEARDOWN_FAILURE: 120,
} as const;

/**
 * Truncates a status to the width the platform keeps: one byte on POSIX,
 * an unsigned 32-bit value on Windows.
 */
export function toExitStatus(
    code: number,
    platform: NodeJS.Platform = process.platform,
): number {
    if (!Number.isFinite(code)) return ExitCode.UNHANDLED_FAILURE;

    const status = Math.trunc(code);
    if (platform === "win32") return status >>> 0;

    return ((status % 256) + 256) % 256;
}

export function exitStatusOf(
    result: BootstrapResult,
    platform: NodeJS.Platform = process.platform,
): number {
    switch (result.kind) {
        case "status":
            return toExitStatus(result.code, platform);
        case "no-status":
            return ExitCode.SUCCESS;
        case "failure":
            return ExitCode.UNHANDLED_FAILURE;
    }
}
