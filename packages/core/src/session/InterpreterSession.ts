import { BootstrapUnit } from "../bootstrap/BootstrapUnit";
import { BootstrapResult, unhandled } from "../bootstrap/BootstrapResult";
import { IInterpreterRuntime } from "../runtime/IInterpreterRuntime";
import {
    errorMessage,
    SessionStateError,
    StartupError,
} from "../utils/err";
import { createLogger, Logger, took } from "../utils/log";
import { assertTransition, SessionState } from "./SessionState";

/**
 * One initialized interpreter, owned by the host for a single run.
 *
 * Only one session may be live in a process at a time. The slot is claimed
 * by `init()` and given back when the session reaches `terminated`.
 */
export class InterpreterSession {
    private static live?: InterpreterSession;

    private current: SessionState = "uninitialized";
    private executed = false;
    private teardowns = 0;

    constructor(
        private runtime: IInterpreterRuntime,
        private logger: Logger = createLogger("session", process.stderr),
    ) {}

    /**
     * The live session of this process, if any
     */
    static get active(): InterpreterSession | undefined {
        return InterpreterSession.live;
    }

    get state(): SessionState {
        return this.current;
    }

    /**
     * How many times the runtime was released. Never more than one.
     */
    get teardownCount(): number {
        return this.teardowns;
    }

    public async init(): Promise<void> {
        const live = InterpreterSession.live;
        if (live && live !== this) {
            throw new SessionStateError(
                "Another interpreter session is already live in this process",
            );
        }

        this.transition("initializing");
        InterpreterSession.live = this;

        const startTime = Date.now();
        this.logger.info(`Initializing ${this.runtime.name} runtime...`);

        try {
            await this.runtime.init();
        } catch (e) {
            await this.releaseAfterFailedInit();
            this.transition("terminated");

            if (e instanceof StartupError) throw e;
            throw new StartupError(
                `The ${this.runtime.name} runtime failed to start`,
                { cause: e },
            );
        }

        this.transition("running");
        this.logger.success(
            `${this.runtime.name} runtime is ready, took ${took(startTime)}s`,
        );
    }

    /**
     * Execute the bootstrap unit. A session runs exactly one unit.
     */
    public async run(unit: BootstrapUnit): Promise<BootstrapResult> {
        if (this.current !== "running") {
            throw new SessionStateError(
                `Cannot run a bootstrap unit in a session that is '${this.current}'`,
            );
        }
        if (this.executed) {
            throw new SessionStateError(
                "This session has already run its bootstrap unit",
            );
        }
        this.executed = true;

        try {
            return await this.runtime.execute(unit);
        } catch (e) {
            return unhandled(e);
        }
    }

    /**
     * Tear the runtime down. Calling it again once terminated does nothing.
     */
    public async destroy(): Promise<void> {
        if (this.current === "terminated") return;

        this.transition("finalizing");
        try {
            await this.release();
        } finally {
            this.transition("terminated");
            this.logger.info(`${this.runtime.name} runtime is destroyed.`);
        }
    }

    private async release(): Promise<void> {
        this.teardowns++;
        try {
            await this.runtime.destroy();
        } finally {
            if (InterpreterSession.live === this) {
                InterpreterSession.live = undefined;
            }
        }
    }

    private async releaseAfterFailedInit(): Promise<void> {
        try {
            await this.release();
        } catch (e) {
            // The startup error is the one worth reporting
            this.logger.error(
                `Releasing the ${this.runtime.name} runtime failed: ${errorMessage(e)}`,
            );
        }
    }

    private transition(next: SessionState): void {
        assertTransition(this.current, next);
        this.logger.debug(`${this.current} -> ${next}`);
        this.current = next;
    }
}
