/**
 * cardNames.ts
 *
 * Card identifier normalization and the optional card name catalogue.
 *
 * Users type cards as shell words (`new_york`, `Sao_Paulo`); the model stores
 * them lowercased with single spaces (`new york`). Completion goes the other
 * way and offers catalogue names as underscore-joined words.
 */

import {promises as fs} from "node:fs";
import {debug} from "../logging.js";

export function normalizeCardName(raw: string): string {
    return raw.replace(/[_\s]+/g, ' ').trim().toLowerCase();
}

export function normalizeColor(raw: string): string {
    return raw.trim().toLowerCase();
}

export function toCompletionWord(name: string): string {
    return name.trim().toLowerCase().replace(/\s+/g, '_');
}

/** Read the catalogue, one card name per line. A missing file is an empty catalogue. */
export async function loadCardCatalogue(file: string): Promise<string[]> {
    let text: string;
    try {
        text = await fs.readFile(file, 'utf8');
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
            debug('[cards] no catalogue at', file);
            return [];
        }
        throw err;
    }
    return text
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
}

export function completeCardNames(catalogue: readonly string[], partial: string): string[] {
    const prefix = partial.toLowerCase();
    return catalogue.map(toCompletionWord).filter((word) => word.startsWith(prefix));
}
