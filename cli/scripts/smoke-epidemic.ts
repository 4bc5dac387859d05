/**
 * smoke-epidemic.ts
 *
 * Plays a short epidemic cycle against an in-memory `DeckState` (draw a few
 * cities, hit an epidemic, intensify by shuffling the discard back on top,
 * draw again) and prints the rendered state after each step. Handy to eyeball
 * rendering and colors without touching any snapshot file.
 */

import {DeckState} from '../src/deck/deckState.js';
import {renderDeckState} from '../src/render/renderer.js';

function show(label: string, state: DeckState) {
    console.log(`--- ${label}`);
    console.log(renderDeckState(state).join('\n'));
}

async function run() {
    const state = DeckState.empty();
    state.markCard('atlanta', 'red');
    state.markCard('lagos', 'yellow');

    for (const city of ['atlanta', 'lagos', 'essen']) state.draw(city);
    show('after first infections', state);

    state.draw('lagos');
    state.reshuffleDiscard();
    show('after epidemic', state);

    state.draw('lagos');
    state.draw('atlanta');
    show('after next infection step', state);
}

run().catch((e) => {
    console.error(e);
    process.exit(1);
});
