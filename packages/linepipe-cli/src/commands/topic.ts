/**
 * Help Topics
 *
 * Reference text for the command language, printed by `--topic <name>`.
 */

import { ERROR_DESCRIPTIONS, EXIT_STATUS, listErrorCodes } from 'linepipe-core';

export const HELP_TOPICS = ['options', 'input', 'op', 'output', 'cond', 'fmt', 'code'] as const;

export type HelpTopic = typeof HELP_TOPICS[number];

export function isHelpTopic(value: string): value is HelpTopic {
    return HELP_TOPICS.some(topic => topic === value);
}

const TOPIC_TEXT: Readonly<Record<Exclude<HelpTopic, 'code'>, string>> = {
    options: `Options must come before the first pipeline word.

  -e, --eval <token>   read the whole pipeline from one quoted string
  -n, --nocase         make every case-aware operator ignore case
  -s, --skip-err       skip input files that cannot be read
  -v, --verbose        print the parsed pipeline (and debug logs) to stderr
  -d, --dry-run        parse only
  -t, --topic <name>   print a help topic: ${HELP_TOPICS.join(', ')}
      --no-color       plain stderr output (also NO_COLOR)
  -V, --version        print the version
  -h, --help           print usage`,

    input: `Input (at most one, first; default :in)

  :in                         lines of standard input
  :file <name>+               lines of each file in turn
  :clip                       lines of the clipboard
  :of <value>+                the given values
  :gen <range>[ <fmt>]        integers start[,[=][end][,step]]
                                :gen 0,10,2 -> 0 2 4 6 8   :gen 1,=3 -> 1 2 3
                                a negative step counts down from the end
  :repeat <value>[ <count>]   the value, count times or forever

  <value>+ is bare words up to the next command, or [ a b c ].
  Write ::x or \\:x for a value starting with a colon.`,

    op: `Operators (any number, in order)

  :peek[ <file>[ append][ lf|crlf]]      copy items to stdout or a file
  :upper  :lower  :case                  change or swap letter case
  :replace <from> <to>[ <count>][ nocase]
  :trim :ltrim :rtrim [<text>[ nocase]]      strip whitespace or a substring
  :trimc :ltrimc :rtrimc [<chars>[ nocase]]  strip any of the characters
  :uniq[ nocase]                         drop repeated items
  :join[ <delim>[ <prefix>[ <postfix>[ <batch>]]]]
  :limit <n>  :skip <n>  :slice <from,to>+
  :take[ while] <cond>  :drop[ while] <cond>
  :count
  :sort[ nocase][ desc]  :sort num[ <default>][ desc]  :sort random`,

    output: `Output (at most one, last; default :to out)

  :to out
  :to file <name>[ append][ lf|crlf]
  :to clip[ lf|crlf]`,

    cond: `Conditions for :take and :drop, optionally prefixed with "not"

  len <min>,<max> | len <n>     length in characters
  num <min>,<max> | num <n>     numeric value
  num[ integer|float]           is a number
  upper | lower                 no letters of the other case
  ascii | nonascii              all ASCII / no ASCII
  empty | blank                 zero length / only whitespace
  reg <pattern>                 regular expression matching the whole item`,

    fmt: `Format for :gen, e.g. "item-{:03}"

  {} or {v}        the value
  {{ and }}        literal braces
  {:[[fill]align][+][#][0][width][type]}
    align   < left, ^ center, > right
    type    d decimal, x X hex, o octal, b binary, e E exponent
    #       0x/0o/0b prefix      0   zero padding`,
};

/**
 * Text of one help topic.
 */
export function getTopicText(topic: HelpTopic): string {
    if (topic !== 'code') {
        return TOPIC_TEXT[topic];
    }
    const lines = listErrorCodes().map(code =>
        `  ${String(EXIT_STATUS[code]).padStart(2)}  ${code.padEnd(26)}${ERROR_DESCRIPTIONS[code]}`);
    return ['Exit codes', '', '   0  SUCCESS', ...lines].join('\n');
}

/**
 * Print a help topic to stdout.
 */
export function executeTopic(topic: HelpTopic): number {
    process.stdout.write(`${getTopicText(topic)}\n`);
    return 0;
}
