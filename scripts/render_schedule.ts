import { loadConfig } from '../src/server/config.js';
import {
    ansiStylist,
    parseScheduleView,
    plainStylist,
    renderSchedule,
} from '../src/services/schedule/index.js';
import { loadScheduleFile, requireEvent } from '../src/store/scheduleStore.js';

// Usage: tsx scripts/render_schedule.ts <event-slug> [table|list|proportional]

async function main() {
    const [slug, format] = process.argv.slice(2);
    if (!slug) {
        console.error(
            'Usage: render_schedule <event-slug> [table|list|proportional]'
        );
        process.exitCode = 1;
        return;
    }
    const config = loadConfig();
    const store = await loadScheduleFile(config.scheduleDataFile);
    const event = await requireEvent(store, slug);
    const rendered = renderSchedule(event, parseScheduleView(format), {
        scheduleUrl: `${config.publicUrl}/api/events/${event.slug}/schedule`,
        columnWidth: config.columnWidth,
        stylist: process.stdout.isTTY ? ansiStylist : plainStylist,
    });
    if (rendered.kind === 'layout') {
        console.log(JSON.stringify(rendered.data, null, 2));
    } else {
        process.stdout.write(rendered.body);
    }
}

main().catch((err) => {
    console.error(err);
    process.exitCode = 1;
});
