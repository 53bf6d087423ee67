import { describeError } from "../utils/err";

/**
 * Outcome of one bootstrap run, consumed once to pick the exit status.
 *
 * `origin` tells a failure raised by `sys.exit("message")` (reported as the
 * bare message) from an unhandled error (reported as a diagnostic).
 */
export type BootstrapResult =
    | { kind: "status"; code: number }
    | { kind: "no-status" }
    | {
          kind: "failure";
          origin: "exit" | "unhandled";
          description: string;
          cause?: unknown;
      };

export const NO_STATUS: BootstrapResult = { kind: "no-status" };

export function statusOf(code: number): BootstrapResult {
    return { kind: "status", code };
}

export function failureOf(
    description: string,
    origin: "exit" | "unhandled",
    cause?: unknown,
): BootstrapResult {
    return cause === undefined
        ? { kind: "failure", origin, description }
        : { kind: "failure", origin, description, cause };
}

export function unhandled(error: unknown): BootstrapResult {
    return failureOf(describeError(error), "unhandled", error);
}

/**
 * Converts a `sys.exit` payload the way `sys.exit` does: nothing means
 * success, integers (and booleans) are statuses, anything else is printed
 * and fails.
 */
export function fromExitPayload(payload: unknown): BootstrapResult {
    if (payload === undefined || payload === null) return NO_STATUS;

    if (typeof payload === "boolean") return statusOf(payload ? 1 : 0);

    if (typeof payload === "bigint") {
        return statusOf(Number(BigInt.asIntN(32, payload)));
    }

    if (typeof payload === "number" && Number.isInteger(payload)) {
        return statusOf(payload);
    }

    if (typeof payload === "string") return failureOf(payload, "exit");

    return failureOf(describeError(payload), "exit", payload);
}
