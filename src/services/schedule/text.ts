export const ELLIPSIS = '…';

// Widths are counted in code points so astral characters are never split.
export function textLength(text: string) {
    return Array.from(text).length;
}

/**
 * Greedy word wrap. Words longer than the width are split into chunks,
 * whitespace runs collapse to single spaces.
 */
export function wrapText(text: string, width: number): string[] {
    if (width < 1) return [];
    const words = text
        .split(/\s+/)
        .filter(Boolean)
        .map((word) => Array.from(word));
    const lines: string[] = [];
    let current: string[] = [];
    for (const word of words) {
        let rest = word;
        if (current.length && current.length + 1 + rest.length <= width) {
            current = [...current, ' ', ...rest];
            continue;
        }
        if (current.length) {
            // fill the open line with the head of a word that can never fit
            if (rest.length > width && current.length + 1 < width) {
                const room = width - current.length - 1;
                current = [...current, ' ', ...rest.slice(0, room)];
                rest = rest.slice(room);
            }
            lines.push(current.join(''));
            current = [];
        }
        while (rest.length > width) {
            lines.push(rest.slice(0, width).join(''));
            rest = rest.slice(width);
        }
        current = rest;
    }
    if (current.length) lines.push(current.join(''));
    return lines;
}

export function truncate(text: string, limit: number) {
    const chars = Array.from(text);
    if (chars.length <= limit) return text;
    if (limit < 1) return '';
    return chars.slice(0, limit - 1).join('') + ELLIPSIS;
}

/** Truncate, then pad on the right to exactly `width` characters. */
export function fit(text: string, width: number) {
    const fitted = truncate(text, width);
    return fitted + ' '.repeat(Math.max(0, width - textLength(fitted)));
}
