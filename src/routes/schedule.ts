import { Router } from 'express';
import { z } from 'zod';
import { MAX_COLUMN_WIDTH } from '../server/config.js';
import { describeError } from '../server/errors.js';
import { MIN_COLUMN_WIDTH } from '../services/schedule/grid.js';
import {
    parseScheduleView,
    renderSchedule,
} from '../services/schedule/index.js';
import { fmtDay } from '../services/schedule/time.js';
import { requireEvent, type ScheduleStore } from '../store/scheduleStore.js';

const scheduleQuerySchema = z.object({
    slug: z.string().min(1),
    // anything parseScheduleView does not know renders the table
    format: z.unknown().optional(),
    width: z.coerce
        .number()
        .int()
        .min(MIN_COLUMN_WIDTH)
        .max(MAX_COLUMN_WIDTH)
        .optional(),
});

export type ScheduleRouterOptions = {
    store: ScheduleStore;
    publicUrl: string;
    columnWidth: number;
};

export function createScheduleRouter(options: ScheduleRouterOptions) {
    const { store, publicUrl, columnWidth } = options;
    const router = Router();

    router.get('/', async (_req, res) => {
        try {
            const events = await store.listEvents();
            res.json({
                ok: true,
                events: events.map((event) => ({
                    slug: event.slug,
                    name: event.name,
                    days: event.days.map((day) => fmtDay(day.start)),
                })),
            });
        } catch (e) {
            const { status, message, code } = describeError(e);
            console.error('[schedule/events] error', { status, message, code });
            res.status(status).json({ error: message || 'Failed', code });
        }
    });

    router.get('/:slug/schedule', async (req, res) => {
        const params = scheduleQuerySchema.safeParse({
            ...req.query,
            slug: req.params.slug,
        });
        if (!params.success) {
            res.status(400).json({ error: params.error.flatten() });
            return;
        }
        try {
            const { slug, format, width } = params.data;
            const event = await requireEvent(store, slug);
            const rendered = renderSchedule(event, parseScheduleView(format), {
                scheduleUrl: `${publicUrl}/api/events/${event.slug}/schedule`,
                columnWidth: width ?? columnWidth,
            });
            if (rendered.kind === 'layout') {
                res.json({ ok: true, data: rendered.data });
                return;
            }
            res.type('text/plain; charset=utf-8').send(rendered.body);
        } catch (e) {
            const { status, message, code } = describeError(e);
            console.error('[schedule/render] error', {
                status,
                message,
                code,
            });
            res.status(status).json({ error: message || 'Failed', code });
        }
    });

    return router;
}
