import { SessionStateError } from "../utils/err";

export type SessionState =
    | "uninitialized"
    | "initializing"
    | "running"
    | "finalizing"
    | "terminated";

// Strictly linear, with one shortcut for a failed initialization
const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
    uninitialized: ["initializing"],
    initializing: ["running", "terminated"],
    running: ["finalizing"],
    finalizing: ["terminated"],
    terminated: [],
};

export function canTransition(from: SessionState, to: SessionState): boolean {
    return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: SessionState, to: SessionState): void {
    if (!canTransition(from, to)) {
        throw new SessionStateError(
            `Interpreter session cannot go from '${from}' to '${to}'`,
        );
    }
}
