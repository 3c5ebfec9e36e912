// Text styling kept out of the layout code: cards, grids and lists only
// ever call a Stylist, so swapping ansi for plain output touches nothing else.

export type SpanStyle = 'strong' | 'date' | 'time' | 'speaker' | 'locale';

export type Stylist = (style: SpanStyle, text: string) => string;

const RESET = '\x1b[0m';

const ANSI_CODES: Record<SpanStyle, string> = {
    strong: '\x1b[1m',
    date: '\x1b[33m',
    time: '\x1b[33m',
    speaker: '\x1b[33m',
    locale: '\x1b[38;5;246m',
};

export const ansiStylist: Stylist = (style, text) =>
    `${ANSI_CODES[style]}${text}${RESET}`;

export const plainStylist: Stylist = (_style, text) => text;

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export function stripAnsi(text: string) {
    return text.replace(ANSI_PATTERN, '');
}

export function visibleLength(text: string) {
    return Array.from(stripAnsi(text)).length;
}
