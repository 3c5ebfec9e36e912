import { AppError } from '../../server/errors.js';
import { CardCursor, createCardCursor } from './card.js';
import {
    HORIZONTAL,
    TEE_LEFT,
    TEE_RIGHT,
    VERTICAL,
    separator,
} from './separator.js';
import type { Stylist } from './styles.js';
import { fit } from './text.js';
import { assertTalk, fmtHM, isTick, slotInstants } from './time.js';
import type { DateBucket, Room, Talk } from './types.js';

export const DEFAULT_COLUMN_WIDTH = 20;
export const MIN_COLUMN_WIDTH = 8;
const GUTTER_WIDTH = 8;

export type GridOptions = {
    columnWidth: number;
    stylist: Stylist;
};

type RoomSlot = {
    starting?: Talk;
    running?: Talk;
    ending?: Talk;
};

function talksOf(bucket: DateBucket): Talk[] {
    return bucket.rooms
        .flatMap((room) => room.talks)
        .sort((a, b) => a.start.getTime() - b.start.getTime());
}

function classify(room: Room, t: number): RoomSlot {
    const slot: RoomSlot = {};
    for (const talk of room.talks) {
        const start = talk.start.getTime();
        const end = talk.end.getTime();
        if (start === t) slot.starting ??= talk;
        else if (end === t) slot.ending ??= talk;
        else if (start < t && t < end) slot.running ??= talk;
    }
    // a room with an event at t draws a border, never card text
    if (slot.starting || slot.ending) delete slot.running;
    return slot;
}

function hasEvent(slot: RoomSlot) {
    return Boolean(slot.starting || slot.ending);
}

class DayGrid {
    private readonly cursors = new Map<string, CardCursor>();

    constructor(
        private readonly rooms: Room[],
        private readonly options: GridOptions
    ) {}

    header(): string {
        const width = this.options.columnWidth - 2;
        return (
            ' '.repeat(GUTTER_WIDTH) +
            '| ' +
            this.rooms.map((room) => fit(room.name, width)).join(' | ')
        );
    }

    row(instant: Date): string {
        const width = this.options.columnWidth;
        const tick = isTick(instant);
        const fill = tick ? '-' : ' ';
        const t = instant.getTime();
        const slots = this.rooms.map((room) => classify(room, t));
        const parts: string[] = [
            tick ? `${fmtHM(instant)} --` : ' '.repeat(GUTTER_WIDTH),
        ];

        const first = slots[0];
        if (first && hasEvent(first)) {
            parts.push(
                separator(
                    Boolean(first.ending),
                    Boolean(first.starting),
                    false,
                    false
                ) + HORIZONTAL.repeat(width)
            );
        } else if (first?.running) {
            parts.push(VERTICAL + this.nextLine(first.running));
        } else {
            parts.push(fill.repeat(width + 1));
        }

        for (let i = 1; i < slots.length; i++) {
            const left = slots[i - 1];
            const right = slots[i];
            if (!left || !right) continue;
            parts.push(this.boundary(left, right, fill));
            if (right.running) parts.push(this.nextLine(right.running));
            else if (hasEvent(right)) parts.push(HORIZONTAL.repeat(width));
            else parts.push(fill.repeat(width));
        }

        const last = slots[slots.length - 1];
        if (last && hasEvent(last)) {
            parts.push(
                separator(
                    false,
                    false,
                    Boolean(last.starting),
                    Boolean(last.ending)
                )
            );
        } else if (last?.running) {
            parts.push(VERTICAL);
        } else {
            parts.push(fill);
        }
        return parts.join('');
    }

    private boundary(left: RoomSlot, right: RoomSlot, fill: string) {
        // a running talk's side border wins over a neighbour's horizontal one
        if (left.running && hasEvent(right)) return TEE_RIGHT;
        if (right.running && hasEvent(left)) return TEE_LEFT;
        if (hasEvent(left) || hasEvent(right)) {
            return separator(
                Boolean(right.ending),
                Boolean(right.starting),
                Boolean(left.starting),
                Boolean(left.ending)
            );
        }
        if (left.running || right.running) return VERTICAL;
        return fill;
    }

    // One cursor per talk id for the whole day, created on first use.
    private nextLine(talk: Talk) {
        let cursor = this.cursors.get(talk.id);
        if (!cursor) {
            cursor = createCardCursor(
                talk,
                this.options.columnWidth,
                this.options.stylist
            );
            this.cursors.set(talk.id, cursor);
        }
        return cursor.next();
    }
}

/**
 * Grid lines (header first) for one day, or null when it holds no talks.
 */
export function buildDayGrid(
    bucket: DateBucket,
    options: GridOptions
): string[] | null {
    const talks = talksOf(bucket);
    const first = talks[0];
    if (!first) return null;
    const ids = new Set<string>();
    for (const talk of talks) {
        assertTalk(talk);
        if (ids.has(talk.id)) {
            throw new AppError(
                `Talk id ${talk.id} is used more than once on one day`,
                500,
                'INVALID_TALK'
            );
        }
        ids.add(talk.id);
    }

    const globalStart = bucket.firstStart ?? first.start;
    const globalEnd =
        bucket.lastEnd ??
        talks.reduce(
            (latest, talk) => (talk.end > latest ? talk.end : latest),
            first.end
        );

    const grid = new DayGrid(bucket.rooms, options);
    const lines = [grid.header()];
    for (const instant of slotInstants(globalStart, globalEnd)) {
        lines.push(grid.row(instant));
    }
    return lines;
}
