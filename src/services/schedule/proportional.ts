import { fmtDay, fmtHM, MINUTE_MS, minutesBetween } from './time.js';
import type { DateBucket } from './types.js';

// Two pixels per minute of schedule.
const PX_PER_MINUTE = 2;
const HOUR_MS = 60 * MINUTE_MS;

export type ProportionalTalk = {
    id: string;
    title: string;
    speakerNames: string | null;
    locale: string | null;
    start: string;
    end: string;
    top: number;
    height: number;
    isActive: boolean;
};

export type ProportionalRoom = {
    name: string;
    talks: ProportionalTalk[];
};

export type ProportionalDay = {
    date: string;
    displayStart: string | null;
    height: number | null;
    hours: string[];
    rooms: ProportionalRoom[];
};

export type ProportionalLayout = {
    days: ProportionalDay[];
    maxRooms: number;
};

function startOfHour(d: Date) {
    return new Date(Math.floor(d.getTime() / HOUR_MS) * HOUR_MS);
}

function hourLabels(start: Date, end: Date) {
    const labels: string[] = [];
    for (let t = start.getTime(); t < end.getTime(); t += HOUR_MS) {
        labels.push(fmtHM(new Date(t)));
    }
    return labels;
}

/**
 * Vertical offsets and heights for drawing each day on a time axis.
 * Days without declared first start and last end are passed through
 * without measurements and are left out of the room count.
 */
export function buildProportionalLayout(
    days: DateBucket[],
    now: Date = new Date()
): ProportionalLayout {
    let maxRooms = 0;
    const result = days.map((day): ProportionalDay => {
        const { firstStart, lastEnd } = day;
        const displayStart =
            firstStart && lastEnd ? startOfHour(firstStart) : null;
        if (displayStart) maxRooms = Math.max(maxRooms, day.rooms.length);

        return {
            date: fmtDay(day.start),
            displayStart: displayStart ? displayStart.toISOString() : null,
            height:
                displayStart && lastEnd
                    ? Math.floor(
                          minutesBetween(displayStart, lastEnd) * PX_PER_MINUTE
                      )
                    : null,
            hours:
                displayStart && lastEnd
                    ? hourLabels(displayStart, lastEnd)
                    : [],
            rooms: day.rooms.map((room) => ({
                name: room.name,
                talks: room.talks.map((talk) => ({
                    id: talk.id,
                    title: talk.submission?.title ?? talk.description,
                    speakerNames: talk.submission?.speakerNames ?? null,
                    locale: talk.submission?.locale ?? null,
                    start: talk.start.toISOString(),
                    end: talk.end.toISOString(),
                    top: displayStart
                        ? Math.floor(
                              minutesBetween(displayStart, talk.start) *
                                  PX_PER_MINUTE
                          )
                        : 0,
                    height: Math.floor(talk.duration * PX_PER_MINUTE),
                    isActive: talk.start <= now && now <= talk.end,
                })),
            })),
        };
    });
    return { days: result, maxRooms };
}
