import { describe, expect, it } from 'vitest';
import { renderList, sortedTalks } from './list.js';
import { plainStylist, stripAnsi } from './styles.js';
import { makeBucket, makeRoom } from './testing.js';

describe('renderList', () => {
    it('renders talks and breaks one per line', () => {
        const bucket = makeBucket([
            makeRoom('Main Hall', [
                {
                    id: 'opening',
                    start: '09:00',
                    end: '09:30',
                    title: 'Opening',
                    speakers: 'Ada Lovelace',
                    locale: 'en',
                },
                {
                    id: 'coffee',
                    start: '10:30',
                    end: '11:00',
                    description: 'Coffee break',
                },
            ]),
            makeRoom('Workshop Room', [
                {
                    id: 'solo',
                    start: '09:15',
                    end: '10:00',
                    title: 'Parsing',
                    speakers: '',
                    locale: 'de',
                },
            ]),
        ]);
        expect(renderList([bucket], { stylist: plainStylist })).toBe(
            [
                '',
                '2026-05-04',
                '09:00 Opening, Ada Lovelace (en); in Main Hall',
                '09:15 Parsing, No speakers (de); in Workshop Room',
                '10:30 Coffee break in Main Hall',
                '',
            ].join('\n')
        );
    });

    it('orders talks sharing a start time by title', () => {
        const bucket = makeBucket([
            makeRoom('Main Hall', [
                { id: 'z', start: '09:00', end: '09:30', title: 'Zebra' },
            ]),
            makeRoom('Side Room', [
                { id: 'a', start: '09:00', end: '09:30', title: 'Alpha' },
            ]),
        ]);
        const lines = stripAnsi(renderList([bucket])).split('\n');
        expect(lines[2]).toBe('09:00 Alpha, No speakers (en); in Side Room');
        expect(lines[3]).toBe('09:00 Zebra, No speakers (en); in Main Hall');
    });

    it('compares titles case-sensitively and keeps break order', () => {
        const bucket = makeBucket([
            makeRoom('Main Hall', [
                { id: 'lower', start: '09:00', end: '09:30', title: 'alpha' },
                { id: 'lunch', start: '12:00', end: '13:00', description: 'Lunch' },
            ]),
            makeRoom('Side Room', [
                { id: 'upper', start: '09:00', end: '09:30', title: 'Zebra' },
                { id: 'walk', start: '12:00', end: '12:30', description: 'Walk' },
            ]),
        ]);
        expect(sortedTalks(bucket).map((talk) => talk.id)).toEqual([
            'upper',
            'lower',
            'lunch',
            'walk',
        ]);
    });

    it('renders the fallback line for a day without talks', () => {
        expect(renderList([makeBucket([])], { stylist: plainStylist })).toBe(
            '\n2026-05-04\nNo talks on this day.\n'
        );
    });
});
