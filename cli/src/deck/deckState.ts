/**
 * deckState.ts
 *
 * In-memory model of the infection deck tracker. Holds the stack of infection
 * decks (index 0 is the next deck to draw from), the discard pile and the
 * color annotations, and implements every mutation the commands perform.
 *
 * The model never normalizes card identifiers; callers pass them already
 * lowercased and space-separated (see `cards/cardNames.ts`).
 */

import type {InfectionSnapshot} from "../../../shared/types/infection.js";
import {CardNotMarkedError} from "../errors.js";
import {groupCards, type CardGroup} from "./grouping.js";

function removeFirst(cards: string[], card: string): boolean {
    const idx = cards.indexOf(card);
    if (idx === -1) return false;
    cards.splice(idx, 1);
    return true;
}

export class DeckState {
    infectionDecks: string[][];
    discardPile: string[];
    readonly cardColor: Map<string, string>;

    constructor(infectionDecks: string[][] = [[]], discardPile: string[] = [], cardColor: Map<string, string> = new Map()) {
        this.infectionDecks = infectionDecks;
        this.discardPile = discardPile;
        this.cardColor = cardColor;
    }

    static empty(): DeckState {
        return new DeckState();
    }

    static fromSnapshot(snapshot: InfectionSnapshot): DeckState {
        return new DeckState(
            snapshot.infection.map((deck) => [...deck]),
            [...snapshot.discard],
            new Map(Object.entries(snapshot.card_to_color)),
        );
    }

    toSnapshot(): InfectionSnapshot {
        return {
            infection: this.infectionDecks.map((deck) => [...deck]),
            discard: [...this.discardPile],
            card_to_color: Object.fromEntries(this.cardColor),
        };
    }

    /**
     * Record that `card` was drawn. The card leaves the topmost deck when it is
     * there and always ends up in the discard pile, so a draw that the tracked
     * deck does not know about (a manual correction) still gets discarded.
     */
    draw(card: string): void {
        const top = this.infectionDecks[0];
        if (top) {
            removeFirst(top, card);
            if (top.length === 0) this.infectionDecks.shift();
        }
        this.discardPile.push(card);
        this.discardPile.sort();
    }

    /** Put the whole discard pile back on top of the stack as one deck, in sorted order. */
    reshuffleDiscard(): void {
        if (this.discardPile.length === 0) return;
        this.infectionDecks.unshift([...this.discardPile].sort());
        this.discardPile = [];
    }

    removeDiscard(card: string): void {
        removeFirst(this.discardPile, card);
        this.discardPile.sort();
    }

    markCard(card: string, color: string): void {
        this.cardColor.set(card, color);
    }

    unmarkCard(card: string): void {
        if (!this.cardColor.delete(card)) {
            throw new CardNotMarkedError(card);
        }
    }

    colorOf(card: string): string | undefined {
        return this.cardColor.get(card);
    }

    /** Decks that still hold cards, with their 1-based position in the stack. */
    nonEmptyDecks(): { position: number; cards: string[] }[] {
        return this.infectionDecks
            .map((cards, i) => ({position: i + 1, cards}))
            .filter((deck) => deck.cards.length > 0);
    }

    static summarize(cards: readonly string[]): CardGroup[] {
        return groupCards(cards);
    }
}
