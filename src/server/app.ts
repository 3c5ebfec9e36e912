import express from 'express';
import { createScheduleRouter } from '../routes/schedule.js';
import type { ScheduleStore } from '../store/scheduleStore.js';

export type AppOptions = {
    store: ScheduleStore;
    publicUrl: string;
    columnWidth: number;
};

export function createApp(options: AppOptions) {
    const app = express();
    app.disable('x-powered-by');

    app.get('/health', (_req, res) => {
        res.json({ ok: true });
    });
    app.use('/api/events', createScheduleRouter(options));

    app.use((_req, res) => {
        res.status(404).json({ error: 'Not found' });
    });
    return app;
}
