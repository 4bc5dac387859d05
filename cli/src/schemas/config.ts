/**
 * config.ts
 *
 * Zod schema for the environment variables the CLI reads at startup. Every
 * variable is optional; absent or blank values fall back to the defaults the
 * tool has always used (files in the current directory).
 */

import {z} from "zod";

const pathVar = (fallback: string) =>
    z
        .string()
        .trim()
        .optional()
        .transform((value) => (value ? value : fallback));

export const envSchema = z.object({
    INFECTION_STATE_FILE: pathVar("state.json"),
    INFECTION_SAVE_FILE: pathVar("save.json"),
    INFECTION_CARDS_FILE: pathVar("cards.txt"),
    LOG_DEBUG: z
        .string()
        .trim()
        .toLowerCase()
        .optional()
        .transform((value) => value === "1" || value === "true"),
});
