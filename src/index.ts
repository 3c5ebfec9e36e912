import { createApp } from './server/app.js';
import { loadConfig } from './server/config.js';
import { loadScheduleFile } from './store/scheduleStore.js';

async function main() {
    const config = loadConfig();
    const store = await loadScheduleFile(config.scheduleDataFile);
    const app = createApp({
        store,
        publicUrl: config.publicUrl,
        columnWidth: config.columnWidth,
    });
    const server = app.listen(config.port, () => {
        console.log(`[server] listening on ${config.publicUrl}`);
    });

    const shutdown = (signal: string) => {
        console.log(`[server] ${signal} received, closing`);
        server.close((err) => {
            if (err) {
                console.error('[server] close failed', err);
                process.exit(1);
            }
            process.exit(0);
        });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
    console.error('[server] failed to start', err);
    process.exit(1);
});
