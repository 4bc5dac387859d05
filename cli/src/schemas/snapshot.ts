/**
 * snapshot.ts
 *
 * Zod schema for a persisted infection snapshot. All three fields are
 * optional on read and defaulted independently, so snapshots written by older
 * versions (or edited by hand) still load.
 */

import {z} from "zod";
import type {InfectionSnapshot} from "../../../shared/types/infection.js";

export const snapshotSchema = z.object({
    infection: z.array(z.array(z.string())).default(() => [[]]),
    discard: z.array(z.string()).default(() => []),
    card_to_color: z.record(z.string(), z.string()).default(() => ({})),
});

export function parseSnapshot(raw: unknown): InfectionSnapshot {
    return snapshotSchema.parse(raw);
}
