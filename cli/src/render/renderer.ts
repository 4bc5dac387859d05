/**
 * renderer.ts
 *
 * Formats a `DeckState` as the text block every command prints: each
 * non-empty infection deck (topmost first) followed by the discard pile, both
 * summarised with `DeckState.summarize`. Marked cards get their color as a
 * terminal background.
 */

import chalk, {type ChalkInstance} from "chalk";
import {DeckState} from "../deck/deckState.js";
import {paint} from "./colors.js";

function groupLines(state: DeckState, cards: readonly string[], ink: ChalkInstance): string[] {
    return DeckState.summarize(cards).map(
        ({count, card}) => `\tx${count} ${paint(ink, card, state.colorOf(card))}`,
    );
}

export function renderDeckState(state: DeckState, ink: ChalkInstance = chalk): string[] {
    const lines = ['Infection decks (topmost first):'];
    for (const deck of state.nonEmptyDecks()) {
        lines.push(`deck ${deck.position}: ${deck.cards.length}`);
        lines.push(...groupLines(state, deck.cards, ink));
    }
    lines.push('');
    lines.push(`Discard: ${state.discardPile.length}`);
    lines.push(...groupLines(state, state.discardPile, ink));
    return lines;
}
