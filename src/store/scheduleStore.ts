import { readFile } from 'node:fs/promises';
import { AppError } from '../server/errors.js';
import type { ScheduleEvent } from '../services/schedule/types.js';
import { parseScheduleFile } from './scheduleSchema.js';

export interface ScheduleStore {
    listEvents(): Promise<ScheduleEvent[]>;
    getEvent(slug: string): Promise<ScheduleEvent | null>;
}

export class InMemoryScheduleStore implements ScheduleStore {
    private readonly events = new Map<string, ScheduleEvent>();

    constructor(events: ScheduleEvent[] = []) {
        for (const event of events) this.events.set(event.slug, event);
    }

    async listEvents() {
        return Array.from(this.events.values());
    }

    async getEvent(slug: string) {
        return this.events.get(slug) ?? null;
    }
}

export async function loadScheduleFile(path: string): Promise<ScheduleStore> {
    let raw: unknown;
    try {
        raw = JSON.parse(await readFile(path, 'utf8'));
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        throw new AppError(
            `Could not read schedule data from ${path}: ${message}`,
            500,
            'SCHEDULE_FILE_UNREADABLE'
        );
    }
    const events = parseScheduleFile(raw);
    console.log(
        `[schedule-store] loaded ${events.length} events from ${path}`
    );
    return new InMemoryScheduleStore(events);
}

export async function requireEvent(store: ScheduleStore, slug: string) {
    const event = await store.getEvent(slug);
    if (!event) throw new AppError('Event not found', 404, 'EVENT_NOT_FOUND');
    return event;
}
