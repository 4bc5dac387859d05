/**
 * snapshots.ts
 *
 * `save` and `load`: copy the whole tracked state between the working
 * snapshot and the save file. Nothing is merged; the target is replaced.
 */

import type {Command} from "commander";
import {DeckState} from "../deck/deckState.js";
import {loadDeckState, readSnapshot, saveDeckState} from "../storage/snapshotStore.js";
import {warn} from "../logging.js";
import {printState, type CommandContext} from "./context.js";

export function registerSnapshotCommands(program: Command, ctx: CommandContext) {
    program
        .command('save')
        .description('Copy the current state into the save file')
        .action(async () => {
            const state = await loadDeckState(ctx.config.workingStatePath);
            await saveDeckState(state, ctx.config.saveStatePath);
            printState(ctx, state);
        });

    program
        .command('load')
        .description('Replace the current state with the save file')
        .action(async () => {
            const snapshot = await readSnapshot(ctx.config.saveStatePath);
            if (!snapshot) {
                warn(`no save file at ${ctx.config.saveStatePath}; resetting to an empty state`);
            }
            const state = snapshot ? DeckState.fromSnapshot(snapshot) : DeckState.empty();
            await saveDeckState(state, ctx.config.workingStatePath);
            printState(ctx, state);
        });
}
