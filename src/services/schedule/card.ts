import { AppError } from '../../server/errors.js';
import type { Stylist } from './styles.js';
import { ELLIPSIS, fit, wrapText } from './text.js';
import { SLOT_MINUTES } from './time.js';
import type { Talk } from './types.js';

const LOCALE_WIDTH = 2;

function cardHeight(talk: Talk) {
    return Math.max(0, Math.floor(talk.duration / SLOT_MINUTES) - 1);
}

function fitTitle(lines: string[], maxLines: number, textWidth: number) {
    if (lines.length <= maxLines) return lines;
    const kept = lines.slice(0, maxLines);
    const remainder = lines.slice(maxLines).join(' ');
    const last = `${kept[kept.length - 1] ?? ''} ${remainder}`;
    kept[kept.length - 1] =
        Array.from(last).slice(0, textWidth - 1).join('') + ELLIPSIS;
    return kept;
}

/**
 * Lines of the card drawn inside a talk's column while it runs.
 *
 * Returns `duration / 5` lines, each exactly `columnWidth` visible
 * characters wide. The grid consumes one line per running row, which is
 * one fewer than the card holds; the last line is padding.
 */
export function buildCard(
    talk: Talk,
    columnWidth: number,
    stylist: Stylist
): string[] {
    const emptyLine = ' '.repeat(columnWidth);
    const textWidth = columnWidth - 4;
    const height = cardHeight(talk);
    if (height === 0) return [emptyLine];

    const { submission } = talk;
    const maxTitleLines = height <= 5 ? 1 : height - 4;
    const titleLines = fitTitle(
        wrapText(submission ? submission.title : talk.description, textWidth),
        maxTitleLines,
        textWidth
    );
    const heightAfterTitle = height - titleLines.length;
    const joinSpeakerAndLocale = heightAfterTitle <= 3 && Boolean(submission);

    const localeLine = (locale: string) =>
        ' '.repeat(textWidth - LOCALE_WIDTH) +
        `  ${stylist('locale', fit(locale, LOCALE_WIDTH))}  `;

    const lines: string[] = [];
    if (height > 4) lines.push(emptyLine);
    for (const line of titleLines) {
        lines.push(`  ${stylist('strong', fit(line, textWidth))}  `);
    }
    if (heightAfterTitle > 2) lines.push(emptyLine);

    if (submission) {
        const speaker = submission.speakerNames;
        if (joinSpeakerAndLocale) {
            const speakerWidth = textWidth - LOCALE_WIDTH - 2;
            lines.push(
                `  ${stylist('speaker', fit(speaker, speakerWidth))}` +
                    `  ${stylist('locale', fit(submission.locale, LOCALE_WIDTH))}  `
            );
        } else if (speaker) {
            lines.push(`  ${stylist('speaker', fit(speaker, textWidth))}  `);
            if (heightAfterTitle > 4) lines.push(emptyLine);
            lines.push(localeLine(submission.locale));
        } else {
            lines.push(localeLine(submission.locale));
        }
    }

    while (lines.length < height + 1) lines.push(emptyLine);
    return lines;
}

/** Pull-based cursor over one talk's card, advanced once per running row. */
export class CardCursor {
    private index = 0;

    constructor(
        readonly talkId: string,
        private readonly lines: string[]
    ) {}

    get remaining() {
        return this.lines.length - this.index;
    }

    next(): string {
        const line = this.lines[this.index];
        if (line === undefined) {
            throw new AppError(
                `Card for talk ${this.talkId} has no lines left`,
                500,
                'CARD_EXHAUSTED'
            );
        }
        this.index += 1;
        return line;
    }
}

export function createCardCursor(
    talk: Talk,
    columnWidth: number,
    stylist: Stylist
) {
    return new CardCursor(talk.id, buildCard(talk, columnWidth, stylist));
}
