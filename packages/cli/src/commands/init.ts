import chalk from "chalk";
import fs from "fs/promises";
import path from "path";

const DEFAULT_CONFIG = `# Interpreter that hosts the program: embedded | python
runtime: embedded
moduleRoot: modules
module: clipfix.main
entry: main
verbose: false
env:
    # Defaults for the program, applied only where unset
`;

const DEFAULT_MAIN = `// Entry point started by the launcher.
// Return nothing (or 0) for success, or an exit status.
exports.main = function main() {
    const args = sys.argv.slice(1);
    sys.stdout.write("Hello from clipfix" + (args.length ? ": " + args.join(" ") : "") + "\\n");
};
`;

export interface ScaffoldedFile {
    path: string;
    contents: string;
}

export function scaffoldFiles(projectDir: string): ScaffoldedFile[] {
    return [
        { path: path.join(projectDir, "launcher.yml"), contents: DEFAULT_CONFIG },
        {
            path: path.join(projectDir, "modules", "clipfix", "main.js"),
            contents: DEFAULT_MAIN,
        },
    ];
}

/**
 * Create a project directory with a launcher.yml and a sample entry point.
 * Existing files are left alone.
 */
export async function initProject(projectDir: string): Promise<string[]> {
    const created: string[] = [];

    for (const file of scaffoldFiles(projectDir)) {
        await fs.mkdir(path.dirname(file.path), { recursive: true });
        try {
            await fs.writeFile(file.path, file.contents, { flag: "wx" });
        } catch (e) {
            if (e instanceof Error && "code" in e && e.code === "EEXIST") {
                console.log(chalk.gray(`Kept existing ${file.path}`));
                continue;
            }
            throw e;
        }
        created.push(file.path);
        console.log(chalk.gray(`Created ${path.relative(process.cwd(), file.path)}`));
    }

    return created;
}
