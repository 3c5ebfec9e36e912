import { z } from 'zod';
import {
    DEFAULT_COLUMN_WIDTH,
    MIN_COLUMN_WIDTH,
} from '../services/schedule/grid.js';

export const MAX_COLUMN_WIDTH = 80;

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3001),
    SCHEDULE_DATA_FILE: z.string().min(1).default('data/schedule.json'),
    PUBLIC_URL: z.string().url().optional(),
    SCHEDULE_COLUMN_WIDTH: z.coerce
        .number()
        .int()
        .min(MIN_COLUMN_WIDTH)
        .max(MAX_COLUMN_WIDTH)
        .default(DEFAULT_COLUMN_WIDTH),
});

export type AppConfig = {
    port: number;
    scheduleDataFile: string;
    publicUrl: string;
    columnWidth: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        console.error(
            '[config] invalid environment',
            parsed.error.flatten().fieldErrors
        );
        throw new Error('Invalid environment configuration');
    }
    const { PORT, SCHEDULE_DATA_FILE, PUBLIC_URL, SCHEDULE_COLUMN_WIDTH } =
        parsed.data;
    return {
        port: PORT,
        scheduleDataFile: SCHEDULE_DATA_FILE,
        publicUrl: (PUBLIC_URL ?? `http://localhost:${PORT}`).replace(/\/+$/, ''),
        columnWidth: SCHEDULE_COLUMN_WIDTH,
    };
}
