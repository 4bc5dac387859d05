/**
 * infection.ts
 *
 * On-disk snapshot shape of the infection deck tracker. Field names are part of
 * the file format read by other tooling, so they stay in snake_case.
 *
 * These are plain serializable shapes (no methods), safe to write to and read
 * from simple JSON files.
 */

export type InfectionSnapshot = {
  // Infection decks, topmost first; each deck lists its cards in draw order
  infection: string[][];
  // Discard pile, sorted by card identifier
  discard: string[];
  // Card identifier -> color label used to highlight the card
  card_to_color: Record<string, string>;
};
