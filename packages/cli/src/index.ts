#!/usr/bin/env node
import chalk from "chalk";
import path from "path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { describeError, ExitCode, formatDiagnostic } from "@clipfix-launcher/core";
import { initProject } from "./commands/init";
import { runProject } from "./commands/run";

yargs(hideBin(process.argv))
    .scriptName("clipfix-host")
    .usage("$0 <cmd> [args]")
    .parserConfiguration({ "unknown-options-as-args": true })
    .command(
        "run [project] [args..]",
        "Launch a project's entry point",
        (yargs) => {
            return yargs
                .positional("project", {
                    describe: "Project directory holding launcher.yml",
                    type: "string",
                    default: ".",
                })
                .positional("args", {
                    describe: "Arguments handed to the entry point",
                    type: "string",
                    array: true,
                    default: [],
                });
        },
        async (argv) => {
            await runProject(argv.project, argv.args.map(String));
        },
    )
    .command(
        "init <name>",
        "Initialize a new launcher project",
        (yargs) => {
            return yargs.positional("name", {
                describe: "Name of the new project directory",
                type: "string",
                demandOption: true,
            });
        },
        async (argv) => {
            const projectDir = path.resolve(argv.name);
            try {
                await initProject(projectDir);
            } catch (e) {
                console.error(
                    chalk.red(`Failed to initialize project: ${describeError(e)}`),
                );
                process.exit(ExitCode.UNHANDLED_FAILURE);
            }
            console.log(chalk.green(`\nProject '${argv.name}' initialized successfully!`));
            console.log(chalk.white(`Run with: clipfix-host run ${argv.name}`));
        },
    )
    .demandCommand(1)
    .help()
    .parseAsync()
    .catch((e: unknown) => {
        process.stderr.write(formatDiagnostic("clipfix-host failed", describeError(e)));
        process.exit(ExitCode.UNHANDLED_FAILURE);
    });
