import { AppError } from '../../server/errors.js';
import type { Talk } from './types.js';

// All instants are wall-clock times encoded in UTC, so formatting reads the
// UTC fields and never applies an offset.

export const MINUTE_MS = 60 * 1000;
export const SLOT_MINUTES = 5;
export const TICK_MINUTES = 30;
const SLOT_MS = SLOT_MINUTES * MINUTE_MS;

export function pad(n: number) {
    return n < 10 ? `0${n}` : String(n);
}

export function fmtHM(d: Date) {
    return `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}`;
}

export function fmtDay(d: Date) {
    return `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(
        d.getUTCDate()
    )}`;
}

export function minutesBetween(start: Date, end: Date) {
    return (end.getTime() - start.getTime()) / MINUTE_MS;
}

export function isTick(d: Date) {
    return d.getUTCMinutes() % TICK_MINUTES === 0 && d.getUTCSeconds() === 0;
}

/** Every 5-minute clock mark in [start, end]. */
export function slotInstants(start: Date, end: Date): Date[] {
    const instants: Date[] = [];
    let t = Math.ceil(start.getTime() / SLOT_MS) * SLOT_MS;
    for (; t <= end.getTime(); t += SLOT_MS) instants.push(new Date(t));
    return instants;
}

export function assertTalk(talk: Talk) {
    const minutes = minutesBetween(talk.start, talk.end);
    if (!(minutes > 0)) {
        throw new AppError(
            `Talk ${talk.id} does not end after it starts`,
            500,
            'INVALID_TALK'
        );
    }
    if (
        talk.start.getTime() % SLOT_MS !== 0 ||
        talk.end.getTime() % SLOT_MS !== 0
    ) {
        throw new AppError(
            `Talk ${talk.id} does not start and end on a ${SLOT_MINUTES}-minute mark`,
            500,
            'INVALID_TALK'
        );
    }
    if (talk.duration !== minutes || talk.duration % SLOT_MINUTES !== 0) {
        throw new AppError(
            `Talk ${talk.id} has a duration of ${talk.duration} minutes, expected a multiple of ${SLOT_MINUTES} matching its start and end`,
            500,
            'INVALID_TALK'
        );
    }
}
