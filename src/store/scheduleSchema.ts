import { z } from 'zod';
import { minutesBetween } from '../services/schedule/time.js';
import type {
    DateBucket,
    ScheduleEvent,
    Talk,
} from '../services/schedule/types.js';

const instant = z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value));

const submissionSchema = z.object({
    title: z.string(),
    speakerNames: z.string().default(''),
    locale: z.string().min(1),
});

const talkSchema = z.object({
    id: z.union([z.string().min(1), z.number().int()]),
    start: instant,
    end: instant,
    description: z.string().default(''),
    submission: submissionSchema.optional(),
});

const roomSchema = z.object({
    name: z.string().min(1),
    talks: z.array(talkSchema).default([]),
});

const daySchema = z
    .object({
        date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
        firstStart: instant.optional(),
        lastEnd: instant.optional(),
        rooms: z.array(roomSchema).default([]),
    })
    .superRefine((day, ctx) => {
        // card cursors are keyed by talk id across all rooms of a day
        const seen = new Set<string>();
        day.rooms.forEach((room, roomIndex) => {
            room.talks.forEach((talk, talkIndex) => {
                const id = String(talk.id);
                if (seen.has(id)) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        message: `Talk id ${id} is used more than once on ${day.date}`,
                        path: ['rooms', roomIndex, 'talks', talkIndex, 'id'],
                    });
                }
                seen.add(id);
            });
        });
    });

const eventSchema = z.object({
    slug: z.string().regex(/^[a-z0-9-]+$/),
    name: z.string().min(1),
    days: z.array(daySchema).default([]),
});

const scheduleFileSchema = z.object({
    events: z.array(eventSchema),
});

type ParsedDay = z.output<typeof daySchema>;
type ParsedEvent = z.output<typeof eventSchema>;

function toDay(day: ParsedDay): DateBucket {
    const bucket: DateBucket = {
        start: new Date(`${day.date}T00:00:00Z`),
        rooms: day.rooms.map((room) => {
            const ref = { name: room.name };
            return {
                name: room.name,
                talks: room.talks.map(
                    (talk): Talk => ({
                        id: String(talk.id),
                        start: talk.start,
                        end: talk.end,
                        duration: minutesBetween(talk.start, talk.end),
                        description: talk.description,
                        ...(talk.submission
                            ? { submission: talk.submission }
                            : {}),
                        room: ref,
                    })
                ),
            };
        }),
    };
    if (day.firstStart) bucket.firstStart = day.firstStart;
    if (day.lastEnd) bucket.lastEnd = day.lastEnd;
    return bucket;
}

function toEvent(event: ParsedEvent): ScheduleEvent {
    return {
        slug: event.slug,
        name: event.name,
        days: event.days
            .map(toDay)
            .sort((a, b) => a.start.getTime() - b.start.getTime()),
    };
}

export function parseScheduleFile(raw: unknown): ScheduleEvent[] {
    return scheduleFileSchema.parse(raw).events.map(toEvent);
}
