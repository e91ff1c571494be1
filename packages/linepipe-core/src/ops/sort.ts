/**
 * Whole-stream ordering for `:sort`.
 */

import { compareNum, Num, parseFloatLiteral, parseInteger } from '../condition/num';
import { compareCodePoints, Item, itemText } from '../item';
import { SortSpec } from '../pipeline/types';

function numericKey(item: Item, defaultValue: Num | undefined): Num {
    if (typeof defaultValue === 'bigint') {
        return typeof item === 'bigint' ? item : parseInteger(item) ?? defaultValue;
    }
    if (typeof item === 'bigint') {
        return Number(item);
    }
    return parseFloatLiteral(item) ?? defaultValue ?? Number.MAX_VALUE;
}

/**
 * In-place Fisher-Yates shuffle.
 */
export function shuffle<T>(items: T[], random: () => number = Math.random): T[] {
    for (let i = items.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        [items[i], items[j]] = [items[j], items[i]];
    }
    return items;
}

/**
 * Return the items ordered per `spec`. Sorting is stable; `desc` reverses
 * the comparison, so equal items keep their input order.
 */
export function sortItems(items: Item[], spec: SortSpec, random?: () => number): Item[] {
    switch (spec.kind) {
        case 'random':
            return shuffle(items, random);
        case 'text': {
            const keyed = items.map(item => {
                const text = itemText(item);
                return { item, key: spec.nocase ? text.toLowerCase() : text };
            });
            const direction = spec.desc ? -1 : 1;
            keyed.sort((a, b) => direction * compareCodePoints(a.key, b.key));
            return keyed.map(entry => entry.item);
        }
        case 'num': {
            const keyed = items.map(item => ({ item, key: numericKey(item, spec.defaultValue) }));
            const direction = spec.desc ? -1 : 1;
            keyed.sort((a, b) => direction * compareNum(a.key, b.key));
            return keyed.map(entry => entry.item);
        }
    }
}
