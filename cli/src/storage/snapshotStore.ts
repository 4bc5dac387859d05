/**
 * snapshotStore.ts
 *
 * Reads and writes infection snapshots as JSON files. A missing file is the
 * normal "nothing tracked yet" case and yields `null` / the empty state;
 * unreadable JSON or fields of the wrong shape raise `SnapshotFormatError`.
 *
 * Writes go to a temporary sibling first and are renamed over the target, so
 * a reader never sees a half-written snapshot. There is no locking: two
 * invocations racing on the same file can lose an update.
 */

import {promises as fs} from "node:fs";
import path from "node:path";
import {ZodError} from "zod";
import type {InfectionSnapshot} from "../../../shared/types/infection.js";
import {DeckState} from "../deck/deckState.js";
import {SnapshotFormatError} from "../errors.js";
import {parseSnapshot} from "../schemas/snapshot.js";
import {debug} from "../logging.js";

function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export async function readSnapshot(file: string): Promise<InfectionSnapshot | null> {
    let text: string;
    try {
        text = await fs.readFile(file, 'utf8');
    } catch (err) {
        if (isNotFound(err)) {
            debug('[store] no snapshot at', file);
            return null;
        }
        throw err;
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        throw new SnapshotFormatError(file, err instanceof Error ? err.message : String(err), err);
    }
    try {
        return parseSnapshot(raw);
    } catch (err) {
        if (err instanceof ZodError) {
            const detail = err.issues
                .map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`)
                .join('; ');
            throw new SnapshotFormatError(file, detail, err);
        }
        throw err;
    }
}

export async function loadDeckState(file: string): Promise<DeckState> {
    const snapshot = await readSnapshot(file);
    if (!snapshot) return DeckState.empty();
    debug('[store] loaded', file, {decks: snapshot.infection.length, discard: snapshot.discard.length});
    return DeckState.fromSnapshot(snapshot);
}

export async function saveDeckState(state: DeckState, file: string): Promise<void> {
    const body = JSON.stringify(state.toSnapshot(), null, 4) + '\n';
    const tmp = path.join(path.dirname(file), `.${path.basename(file)}.${process.pid}.tmp`);
    try {
        await fs.writeFile(tmp, body, 'utf8');
        await fs.rename(tmp, file);
    } catch (err) {
        await fs.rm(tmp, {force: true}).catch((rmErr: unknown) => {
            debug('[store] could not remove', tmp, rmErr);
        });
        throw err;
    }
    debug('[store] saved', file);
}
