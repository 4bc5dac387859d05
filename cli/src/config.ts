/**
 * config.ts
 *
 * Builds the `CliConfig` injected into every command. Values come from the
 * environment (see `schemas/config.ts`) and relative paths are resolved
 * against the working directory once, here, so commands only ever see
 * absolute paths.
 */

import path from "node:path";
import {envSchema} from "./schemas/config.js";
import {ConfigError} from "./errors.js";

export interface CliConfig {
    /** Snapshot every command loads from and writes back to. */
    workingStatePath: string;
    /** Snapshot the `save` and `load` commands copy to and from. */
    saveStatePath: string;
    /** Optional list of card names, one per line, used for completion. */
    cardsPath: string;
    debug: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): CliConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
        throw new ConfigError(detail);
    }
    const vars = parsed.data;
    const config: CliConfig = {
        workingStatePath: path.resolve(cwd, vars.INFECTION_STATE_FILE),
        saveStatePath: path.resolve(cwd, vars.INFECTION_SAVE_FILE),
        cardsPath: path.resolve(cwd, vars.INFECTION_CARDS_FILE),
        debug: vars.LOG_DEBUG,
    };
    if (config.workingStatePath === config.saveStatePath) {
        throw new ConfigError(`state file and save file must differ (both are ${config.workingStatePath})`);
    }
    return config;
}
