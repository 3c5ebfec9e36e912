import {
    buildProportionalLayout,
    type ProportionalLayout,
} from './proportional.js';
import { renderList } from './list.js';
import { ansiStylist, type Stylist } from './styles.js';
import { renderTable } from './table.js';
import type { ScheduleEvent } from './types.js';

export const SCHEDULE_VIEWS = ['table', 'list', 'proportional'] as const;
export type ScheduleView = (typeof SCHEDULE_VIEWS)[number];

export type RenderedSchedule =
    | { kind: 'text'; view: 'table' | 'list'; body: string }
    | { kind: 'layout'; view: 'proportional'; data: ProportionalLayout };

export type RenderScheduleOptions = {
    scheduleUrl: string;
    columnWidth?: number;
    stylist?: Stylist;
    now?: Date;
};

function isScheduleView(value: unknown): value is ScheduleView {
    return SCHEDULE_VIEWS.some((view) => view === value);
}

/** Unknown or missing values render the table. */
export function parseScheduleView(value: unknown): ScheduleView {
    return isScheduleView(value) ? value : 'table';
}

export function renderIntro(
    event: ScheduleEvent,
    scheduleUrl: string,
    stylist: Stylist
) {
    return [
        '',
        stylist('strong', event.name),
        '',
        'Get different formats:',
        `   curl ${scheduleUrl}\\?format=table (default)`,
        `   curl ${scheduleUrl}\\?format=list`,
        '',
    ].join('\n');
}

export function renderSchedule(
    event: ScheduleEvent,
    view: ScheduleView,
    options: RenderScheduleOptions
): RenderedSchedule {
    const stylist = options.stylist ?? ansiStylist;
    switch (view) {
        case 'proportional':
            return {
                kind: 'layout',
                view,
                data: buildProportionalLayout(event.days, options.now),
            };
        case 'list':
            return {
                kind: 'text',
                view,
                body:
                    renderIntro(event, options.scheduleUrl, stylist) +
                    renderList(event.days, { stylist }),
            };
        case 'table':
            return {
                kind: 'text',
                view,
                body:
                    renderIntro(event, options.scheduleUrl, stylist) +
                    renderTable(event.days, {
                        columnWidth: options.columnWidth,
                        stylist,
                    }),
            };
    }
}

export type {
    DateBucket,
    Room,
    ScheduleEvent,
    Submission,
    Talk,
} from './types.js';
export { NO_TALKS_MESSAGE } from './table.js';
export { ansiStylist, plainStylist, stripAnsi } from './styles.js';
