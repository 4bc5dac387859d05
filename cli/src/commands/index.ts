/**
 * index.ts
 *
 * Central command registration. Builds the commander program and composes the
 * individual command modules so the entrypoint only has to parse argv.
 */

import {Command} from "commander";
import {registerDeckCommands} from "./deck.js";
import {registerSnapshotCommands} from "./snapshots.js";
import {registerCompletionCommands} from "./completion.js";
import type {CommandContext} from "./context.js";

export const PROGRAM_NAME = 'infection-deck';

export function buildProgram(ctx: CommandContext): Command {
    const program = new Command(PROGRAM_NAME)
        .description('Track the infection decks, discard pile and marked cards of a game in progress')
        .showHelpAfterError();

    registerDeckCommands(program, ctx);
    registerSnapshotCommands(program, ctx);
    registerCompletionCommands(program, ctx);
    return program;
}
