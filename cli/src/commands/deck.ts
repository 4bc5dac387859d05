/**
 * deck.ts
 *
 * Commands that inspect or change the working snapshot: `print`, `draw_card`,
 * `remove_discard`, `shuffle` and `mark`. Card arguments are normalized here,
 * before they reach the model.
 */

import type {Command} from "commander";
import {normalizeCardName, normalizeColor} from "../cards/cardNames.js";
import {loadDeckState} from "../storage/snapshotStore.js";
import {backgroundFor} from "../render/colors.js";
import {debug, warn} from "../logging.js";
import {printState, updateWorkingState, type CommandContext} from "./context.js";

const UNMARK_COLOR = 'none';

export function registerDeckCommands(program: Command, ctx: CommandContext) {
    program
        .command('print')
        .alias('p')
        .description('Print the infection decks and the discard pile')
        .action(async () => {
            printState(ctx, await loadDeckState(ctx.config.workingStatePath));
        });

    program
        .command('draw_card')
        .alias('dc')
        .description('Draw cards from the topmost infection deck into the discard pile')
        .argument('[cards...]', 'cards drawn, in order (use _ for spaces)')
        .action(async (cards: string[]) => {
            const names = cards.map(normalizeCardName);
            await updateWorkingState(ctx, 'draw_card', (state) => {
                for (const card of names) {
                    debug('[draw_card]', card);
                    state.draw(card);
                }
            });
        });

    program
        .command('remove_discard')
        .alias('rd')
        .description('Remove cards from the discard pile')
        .argument('[cards...]', 'cards to remove (use _ for spaces)')
        .action(async (cards: string[]) => {
            const names = cards.map(normalizeCardName);
            await updateWorkingState(ctx, 'remove_discard', (state) => {
                for (const card of names) state.removeDiscard(card);
            });
        });

    program
        .command('shuffle')
        .description('Shuffle the discard pile back on top of the infection decks')
        .action(async () => {
            await updateWorkingState(ctx, 'shuffle', (state) => state.reshuffleDiscard());
        });

    program
        .command('mark')
        .description('Highlight cards with a background color, or clear it with --color none')
        .requiredOption('-c, --color <name>', 'red|yellow|none')
        .argument('[cards...]', 'cards to mark (use _ for spaces)')
        .action(async (cards: string[], options: { color: string }) => {
            const color = normalizeColor(options.color);
            const names = cards.map(normalizeCardName);
            if (color !== UNMARK_COLOR && !backgroundFor(color)) {
                warn(`color "${color}" has no terminal background; marked cards will print unhighlighted`);
            }
            await updateWorkingState(ctx, 'mark', (state) => {
                for (const card of names) {
                    if (color === UNMARK_COLOR) state.unmarkCard(card);
                    else state.markCard(card, color);
                }
            });
        });
}
