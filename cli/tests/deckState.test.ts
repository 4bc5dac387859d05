/**
 * deckState.test.ts
 *
 * Unit tests for the `DeckState` model: drawing from the topmost deck,
 * reshuffling the discard pile back on top, discard removal and card marks.
 */

import {describe, it, expect} from 'vitest';
import {DeckState} from '../src/deck/deckState.js';
import {CardNotMarkedError} from '../src/errors.js';

function countOf(cards: string[], card: string) {
    return cards.filter((c) => c === card).length;
}

describe('DeckState.draw', () => {
    it('moves the card from the topmost deck to the discard pile', () => {
        const s = new DeckState([['atlanta', 'lagos'], ['essen']]);
        s.draw('atlanta');
        expect(s.infectionDecks).toEqual([['lagos'], ['essen']]);
        expect(s.discardPile).toEqual(['atlanta']);
    });

    it('removes only the first copy of the card', () => {
        const s = new DeckState([['lagos', 'atlanta', 'lagos']]);
        s.draw('lagos');
        expect(s.infectionDecks).toEqual([['atlanta', 'lagos']]);
    });

    it('pops the topmost deck once its last card is drawn', () => {
        const s = new DeckState([['atlanta'], ['essen', 'lagos'], ['paris']]);
        s.draw('atlanta');
        expect(s.infectionDecks.length).toBe(2);
        expect(s.infectionDecks[0]).toEqual(['essen', 'lagos']);
    });

    it('still discards a card the topmost deck does not hold', () => {
        const s = new DeckState([['atlanta'], ['lagos']]);
        s.draw('lagos');
        expect(s.infectionDecks).toEqual([['atlanta'], ['lagos']]);
        expect(s.discardPile).toEqual(['lagos']);
    });

    it('keeps the discard pile sorted and adds exactly one copy', () => {
        const s = new DeckState([['x']], ['essen', 'lagos', 'lagos']);
        s.draw('lagos');
        s.draw('atlanta');
        expect(s.discardPile).toEqual(['atlanta', 'essen', 'lagos', 'lagos', 'lagos']);
        expect(countOf(s.discardPile, 'lagos')).toBe(3);
    });

    it('never fails when there are no decks left', () => {
        const s = new DeckState([], []);
        s.draw('paris');
        expect(s.infectionDecks).toEqual([]);
        expect(s.discardPile).toEqual(['paris']);
    });
});

describe('DeckState.reshuffleDiscard', () => {
    it('puts the sorted discard pile on top as one deck and clears it', () => {
        const s = new DeckState([['paris']], ['atlanta', 'lagos']);
        s.reshuffleDiscard();
        expect(s.infectionDecks).toEqual([['atlanta', 'lagos'], ['paris']]);
        expect(s.discardPile).toEqual([]);
    });

    it('has no further effect when called twice', () => {
        const s = new DeckState([['paris']], ['atlanta']);
        s.reshuffleDiscard();
        s.reshuffleDiscard();
        expect(s.infectionDecks).toEqual([['atlanta'], ['paris']]);
        expect(s.discardPile).toEqual([]);
    });

    it('sorts a hand-edited pile before putting it on top', () => {
        const s = new DeckState([], ['lagos', 'atlanta']);
        s.reshuffleDiscard();
        expect(s.infectionDecks).toEqual([['atlanta', 'lagos']]);
    });

    it('does nothing with an empty discard pile', () => {
        const s = new DeckState([['paris']], []);
        s.reshuffleDiscard();
        expect(s.infectionDecks).toEqual([['paris']]);
    });
});

describe('DeckState epidemic cycle', () => {
    it('drops the initial empty deck on the first draw and reshuffles into a fresh deck', () => {
        const s = DeckState.empty();
        expect(s.infectionDecks).toEqual([[]]);

        s.draw('epidemic');
        expect(s.discardPile).toEqual(['epidemic']);
        expect(s.infectionDecks).toEqual([]);

        s.reshuffleDiscard();
        expect(s.infectionDecks).toEqual([['epidemic']]);
        expect(s.discardPile).toEqual([]);
    });
});

describe('DeckState.removeDiscard', () => {
    it('removes one copy of the card', () => {
        const s = new DeckState([[]], ['atlanta', 'lagos', 'lagos']);
        s.removeDiscard('lagos');
        expect(s.discardPile).toEqual(['atlanta', 'lagos']);
    });

    it('leaves a hand-edited pile sorted after removing a card', () => {
        const s = new DeckState([[]], ['b', 'a', 'c']);
        s.removeDiscard('c');
        expect(s.discardPile).toEqual(['a', 'b']);
    });

    it('leaves the pile unchanged when the card is absent', () => {
        const s = new DeckState([[]], ['atlanta']);
        expect(() => s.removeDiscard('chicago')).not.toThrow();
        expect(s.discardPile).toEqual(['atlanta']);
    });
});

describe('DeckState marks', () => {
    it('marks and unmarks a card, and fails on a second unmark', () => {
        const s = DeckState.empty();
        s.markCard('atlanta', 'red');
        expect(s.colorOf('atlanta')).toBe('red');

        s.unmarkCard('atlanta');
        expect(s.colorOf('atlanta')).toBeUndefined();

        expect(() => s.unmarkCard('atlanta')).toThrow(CardNotMarkedError);
    });

    it('reports the missing card and its error code', () => {
        const s = DeckState.empty();
        try {
            s.unmarkCard('lagos');
            expect.unreachable();
        } catch (e) {
            expect(e).toBeInstanceOf(CardNotMarkedError);
            if (e instanceof CardNotMarkedError) {
                expect(e.code).toBe('CARD_NOT_MARKED');
                expect(e.card).toBe('lagos');
            }
        }
    });

    it('keeps marks independent of where the card is', () => {
        const s = new DeckState([['essen']], ['paris']);
        s.markCard('tokyo', 'yellow');
        s.markCard('tokyo', 'red');
        s.draw('essen');
        expect(Object.fromEntries(s.cardColor)).toEqual({tokyo: 'red'});
    });
});

describe('DeckState snapshots', () => {
    it('converts to and from the persisted shape', () => {
        const s = new DeckState([['b', 'a'], ['c']], ['x'], new Map([['a', 'red']]));
        const snap = s.toSnapshot();
        expect(snap).toEqual({infection: [['b', 'a'], ['c']], discard: ['x'], card_to_color: {a: 'red'}});
        expect(DeckState.fromSnapshot(snap).toSnapshot()).toEqual(snap);
    });

    it('does not share arrays with the snapshot it was built from', () => {
        const snap = {infection: [['a', 'b']], discard: [], card_to_color: {}};
        const s = DeckState.fromSnapshot(snap);
        s.draw('a');
        expect(snap.infection).toEqual([['a', 'b']]);
        expect(snap.discard).toEqual([]);
    });

    it('lists non-empty decks with their stack position', () => {
        const s = new DeckState([['a'], [], ['b', 'c']]);
        expect(s.nonEmptyDecks()).toEqual([
            {position: 1, cards: ['a']},
            {position: 3, cards: ['b', 'c']},
        ]);
    });
});
