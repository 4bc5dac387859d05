/**
 * completion.ts
 *
 * Bash completion. `completion` prints a script to source from .bashrc. The
 * script completes the first word from the command names and aliases, leaves
 * the value of `-c`/`--color` alone, and otherwise asks the hidden `complete`
 * command for catalogue names matching the word being completed.
 */

import type {Command} from "commander";
import {completeCardNames, loadCardCatalogue} from "../cards/cardNames.js";
import type {CommandContext} from "./context.js";

const COMPLETE_COMMAND = 'complete';

/** Names and aliases of the user-facing commands, in registration order. */
export function commandWords(program: Command): string[] {
    return program.commands
        .filter((cmd) => cmd.name() !== COMPLETE_COMMAND)
        .flatMap((cmd) => [cmd.name(), ...cmd.aliases()]);
}

export function bashCompletionScript(bin: string, words: readonly string[]): string {
    const fn = `_${bin.replace(/[^A-Za-z0-9]/g, '_')}_complete`;
    return [
        `${fn}() {`,
        '    local cur="${COMP_WORDS[COMP_CWORD]}"',
        '    local prev="${COMP_WORDS[COMP_CWORD-1]}"',
        '    if [ "$COMP_CWORD" -eq 1 ]; then',
        `        COMPREPLY=( $(compgen -W "${words.join(' ')}" -- "$cur") )`,
        '        return',
        '    fi',
        '    case "$prev" in',
        '        -c|--color) COMPREPLY=(); return ;;',
        '    esac',
        `    COMPREPLY=( $(${bin} ${COMPLETE_COMMAND} -- "$cur") )`,
        '}',
        `complete -F ${fn} ${bin}`,
    ].join('\n');
}

export function registerCompletionCommands(program: Command, ctx: CommandContext) {
    program
        .command(COMPLETE_COMMAND, {hidden: true})
        .argument('[partial]', 'word being completed', '')
        .action(async (partial: string) => {
            // options are never card names
            if (partial.startsWith('-')) return;
            const catalogue = await loadCardCatalogue(ctx.config.cardsPath);
            for (const word of completeCardNames(catalogue, partial)) ctx.out(word);
        });

    program
        .command('completion')
        .description('Print a bash completion script (eval "$(infection-deck completion)")')
        .action(() => {
            ctx.out(bashCompletionScript(program.name(), commandWords(program)));
        });
}
