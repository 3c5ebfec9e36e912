import { ansiStylist, type Stylist } from './styles.js';
import { NO_TALKS_MESSAGE, dayHeader } from './table.js';
import { fmtHM } from './time.js';
import type { DateBucket, Talk } from './types.js';

const NO_SPEAKERS = 'No speakers';

function titleOf(talk: Talk) {
    return talk.submission ? talk.submission.title : '';
}

function compareTitles(a: string, b: string) {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

/**
 * All talks of a day across rooms, by start time and then title.
 * Array.prototype.sort is stable, so breaks sharing a start keep their order.
 */
export function sortedTalks(bucket: DateBucket): Talk[] {
    return bucket.rooms
        .flatMap((room) => room.talks)
        .sort(
            (a, b) =>
                a.start.getTime() - b.start.getTime() ||
                compareTitles(titleOf(a), titleOf(b))
        );
}

function describeTalk(talk: Talk) {
    const { submission } = talk;
    if (!submission) return `${talk.description} in ${talk.room.name}`;
    return `${submission.title}, ${submission.speakerNames || NO_SPEAKERS} (${
        submission.locale
    }); in ${talk.room.name}`;
}

export function renderList(
    days: DateBucket[],
    options: { stylist?: Stylist } = {}
): string {
    const stylist = options.stylist ?? ansiStylist;
    let result = '';
    for (const day of days) {
        result += dayHeader(day, stylist);
        const talks = sortedTalks(day);
        if (!talks.length) {
            result += `${NO_TALKS_MESSAGE}\n`;
            continue;
        }
        for (const talk of talks) {
            result += `${stylist('time', fmtHM(talk.start))} ${describeTalk(
                talk
            )}\n`;
        }
    }
    return result;
}
