import { BootstrapLanguage, BootstrapUnit } from "../bootstrap/BootstrapUnit";
import { BootstrapResult } from "../bootstrap/BootstrapResult";

export interface IInterpreterRuntime {
    readonly name: string;

    /** Language of the bootstrap units this runtime executes */
    readonly language: BootstrapLanguage;

    /**
     * Acquire and initialize the interpreter. Either completes fully or
     * throws; `destroy()` releases whatever a failed call acquired.
     */
    init(): Promise<void>;

    /**
     * Run a bootstrap unit to completion. Failures of the launched program
     * are reported in the result, not thrown.
     * @param unit to execute
     */
    execute(unit: BootstrapUnit): Promise<BootstrapResult>;

    /**
     * Release the interpreter
     */
    destroy(): Promise<void>;
}
