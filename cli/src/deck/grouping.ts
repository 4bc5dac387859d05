/**
 * grouping.ts
 *
 * Summarises a card sequence (a deck or the discard pile) for display: one
 * entry per distinct card with its number of copies, most copies first and
 * ties ordered by card identifier.
 */

export interface CardGroup {
    count: number;
    card: string;
}

function compareIds(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

export function groupCards(cards: readonly string[]): CardGroup[] {
    const counts = new Map<string, number>();
    for (const card of cards) {
        counts.set(card, (counts.get(card) ?? 0) + 1);
    }
    const groups: CardGroup[] = Array.from(counts, ([card, count]) => ({count, card}));
    // count descending, then identifier ascending
    groups.sort((a, b) => b.count - a.count || compareIds(a.card, b.card));
    return groups;
}
