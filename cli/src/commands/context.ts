/**
 * context.ts
 *
 * What every command needs: the resolved configuration, a sink for its
 * output, and the chalk instance used to color rendered cards. The entrypoint
 * builds one per process; tests build their own around a temporary directory.
 */

import type {ChalkInstance} from "chalk";
import type {CliConfig} from "../config.js";
import type {DeckState} from "../deck/deckState.js";
import {renderDeckState} from "../render/renderer.js";
import {loadDeckState, saveDeckState} from "../storage/snapshotStore.js";
import {debug} from "../logging.js";

export interface CommandContext {
    config: CliConfig;
    ink: ChalkInstance;
    out: (text: string) => void;
}

export function printState(ctx: CommandContext, state: DeckState) {
    ctx.out(renderDeckState(state, ctx.ink).join('\n'));
}

/**
 * Load the working snapshot, apply `mutate`, write it back and print it. A
 * failure while loading or mutating aborts before anything is written.
 */
export async function updateWorkingState(ctx: CommandContext, name: string, mutate: (state: DeckState) => void) {
    const state = await loadDeckState(ctx.config.workingStatePath);
    mutate(state);
    await saveDeckState(state, ctx.config.workingStatePath);
    debug(`[${name}] working state saved`);
    printState(ctx, state);
}
