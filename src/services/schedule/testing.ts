import type { DateBucket, Room, Talk } from './types.js';

export const DAY = '2026-05-04';

export function at(hm: string, day = DAY) {
    return new Date(`${day}T${hm}:00Z`);
}

export type TalkInput = {
    id: string;
    start: string;
    end: string;
    title?: string;
    speakers?: string;
    locale?: string;
    description?: string;
};

export function makeTalk(input: TalkInput, roomName = 'Main Hall'): Talk {
    const start = at(input.start);
    const end = at(input.end);
    const talk: Talk = {
        id: input.id,
        start,
        end,
        duration: (end.getTime() - start.getTime()) / 60000,
        description: input.description ?? '',
        room: { name: roomName },
    };
    if (input.title !== undefined) {
        talk.submission = {
            title: input.title,
            speakerNames: input.speakers ?? '',
            locale: input.locale ?? 'en',
        };
    }
    return talk;
}

export function makeRoom(name: string, talks: TalkInput[]): Room {
    return { name, talks: talks.map((t) => makeTalk(t, name)) };
}

export function makeBucket(
    rooms: Room[],
    extra: Partial<Omit<DateBucket, 'rooms'>> = {}
): DateBucket {
    return { start: at('00:00'), rooms, ...extra };
}
