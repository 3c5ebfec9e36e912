import { AppError } from '../../server/errors.js';
import {
    DEFAULT_COLUMN_WIDTH,
    MIN_COLUMN_WIDTH,
    buildDayGrid,
} from './grid.js';
import { ansiStylist, type Stylist } from './styles.js';
import { fmtDay } from './time.js';
import type { DateBucket } from './types.js';

export const NO_TALKS_MESSAGE = 'No talks on this day.';

export type TextRenderOptions = {
    columnWidth?: number;
    stylist?: Stylist;
};

export function dayHeader(bucket: DateBucket, stylist: Stylist) {
    return `\n${stylist('date', fmtDay(bucket.start))}\n`;
}

export function renderTable(
    days: DateBucket[],
    options: TextRenderOptions = {}
): string {
    const columnWidth = options.columnWidth ?? DEFAULT_COLUMN_WIDTH;
    const stylist = options.stylist ?? ansiStylist;
    if (!Number.isInteger(columnWidth) || columnWidth < MIN_COLUMN_WIDTH) {
        throw new AppError(
            `Column width must be an integer of at least ${MIN_COLUMN_WIDTH}`,
            400,
            'INVALID_COLUMN_WIDTH'
        );
    }

    let result = '';
    for (const day of days) {
        result += dayHeader(day, stylist);
        const lines = buildDayGrid(day, { columnWidth, stylist });
        result += lines ? lines.join('\n') + '\n' : `${NO_TALKS_MESSAGE}\n`;
    }
    return result;
}
