/**
 * cli.ts
 *
 * Runs one invocation: reads the configuration, wires the command context to
 * stdout and parses argv. `reportFailure` is what the bin does with anything
 * that escapes: one line on stderr, the stack only under debug, exit code 1.
 */

import chalk from "chalk";
import {loadConfig} from "./config.js";
import {buildProgram} from "./commands/index.js";
import {describeError} from "./errors.js";
import {debug, error, info, isDebugEnabled, setDebug} from "./logging.js";

export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()) {
    const config = loadConfig(env, cwd);
    setDebug(config.debug);
    debug('[config]', config);
    const program = buildProgram({config, ink: chalk, out: (text) => info(text)});
    await program.parseAsync(argv);
}

export function reportFailure(e: unknown) {
    error(describeError(e));
    if (isDebugEnabled() && e instanceof Error && e.stack) debug(e.stack);
    process.exitCode = 1;
}
