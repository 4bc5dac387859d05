/**
 * colors.ts
 *
 * Maps user color labels onto chalk background styles. Labels are matched
 * loosely: `red`, `Red` and `bg_red` pick the red background, and a `light` or
 * `bright` prefix picks the bright variant (`light_blue` -> `bgBlueBright`).
 */

import {backgroundColorNames, type BackgroundColorName, type ChalkInstance} from "chalk";

export function backgroundFor(color: string): BackgroundColorName | undefined {
    let key = color.toLowerCase().replace(/[\s_-]+/g, '');
    if (key.startsWith('bg')) key = key.slice(2);
    const bright = /^(light|bright)/.exec(key);
    if (bright) key = key.slice(bright[0].length);
    const wanted = `bg${key}${bright ? 'bright' : ''}`;
    return backgroundColorNames.find((name) => name.toLowerCase() === wanted);
}

export function paint(chalk: ChalkInstance, text: string, color: string | undefined): string {
    if (!color) return text;
    const bg = backgroundFor(color);
    return bg ? chalk[bg](text) : text;
}
