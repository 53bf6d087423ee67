import chalk from "chalk";

/**
 * Creates a formatted diagnostic block for standard error.
 *
 * @param message The headline
 * @param detail Optional multi-line detail (a stack trace, a cause)
 * @param hint Optional hint to display below the detail
 */
export function formatDiagnostic(
    message: string,
    detail?: string,
    hint?: string,
): string {
    // Format:
    // Error: [Message]
    //  | [detail line]
    //  | [detail line]
    //  = [Hint]

    const output = [`${chalk.red.bold("Error:")} ${chalk.bold(message)}`];

    if (detail) {
        for (const line of detail.trimEnd().split("\n")) {
            output.push(` ${chalk.blue("|")} ${line}`);
        }
    }

    if (hint) {
        output.push(` ${chalk.blue("=")} ${hint}`);
    }

    return output.join("\n") + "\n";
}
