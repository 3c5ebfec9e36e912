import { describe, expect, it } from 'vitest';
import { AppError } from '../../server/errors.js';
import { buildDayGrid } from './grid.js';
import { plainStylist } from './styles.js';
import { at, makeBucket, makeRoom, makeTalk } from './testing.js';

const GUTTER = ' '.repeat(8);

describe('buildDayGrid', () => {
    it('draws a bordered rectangle for a single talk', () => {
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
            ]),
        ]);
        const lines = buildDayGrid(bucket, {
            columnWidth: 20,
            stylist: plainStylist,
        });
        const rule = '─'.repeat(20);
        const cell = (s: string) => `${GUTTER}│  ${s.padEnd(16)}  │`;
        expect(lines).toEqual([
            `${GUTTER}| Main Hall${' '.repeat(9)}`,
            `09:00 --┌${rule}┐`,
            `${GUTTER}│${' '.repeat(20)}│`,
            cell('Opening'),
            `${GUTTER}│${' '.repeat(20)}│`,
            cell('Ada Lovelace'),
            `${GUTTER}│${' '.repeat(16)}en  │`,
            `09:30 --└${rule}┘`,
        ]);
    });

    it('keeps a running border unbroken next to a neighbouring event', () => {
        const bucket = makeBucket([
            makeRoom('A', [
                { id: 'a', start: '09:00', end: '09:10', description: 'A' },
            ]),
            makeRoom('B', [
                { id: 'b', start: '09:05', end: '09:15', description: 'B' },
            ]),
        ]);
        const rule = '─'.repeat(8);
        expect(
            buildDayGrid(bucket, { columnWidth: 8, stylist: plainStylist })
        ).toEqual([
            `${GUTTER}| A      | B     `,
            `09:00 --┌${rule}┐${'-'.repeat(9)}`,
            `${GUTTER}│  A     ├${rule}┐`,
            `${GUTTER}└${rule}┤  B     │`,
            `${GUTTER}${' '.repeat(9)}└${rule}┘`,
        ]);
    });

    it('fills empty tick rows with dashes', () => {
        const bucket = makeBucket(
            [
                makeRoom('Main Hall', [
                    { id: 'x', start: '09:00', end: '09:10', description: 'X' },
                ]),
            ],
            { firstStart: at('08:30') }
        );
        const lines = buildDayGrid(bucket, {
            columnWidth: 8,
            stylist: plainStylist,
        });
        expect(lines?.[1]).toBe(`08:30 --${'-'.repeat(10)}`);
        expect(lines?.[2]).toBe(' '.repeat(18));
        expect(lines).toHaveLength(1 + 9);
    });

    it('joins back-to-back talks in one room with tees', () => {
        const bucket = makeBucket([
            makeRoom('Main Hall', [
                { id: 'one', start: '09:00', end: '09:10', description: 'One' },
                { id: 'two', start: '09:10', end: '09:20', description: 'Two' },
            ]),
        ]);
        const lines = buildDayGrid(bucket, {
            columnWidth: 8,
            stylist: plainStylist,
        });
        expect(lines?.[3]).toBe(`${GUTTER}├${'─'.repeat(8)}┤`);
    });

    it('returns null for a day without talks', () => {
        expect(
            buildDayGrid(makeBucket([makeRoom('Main Hall', [])]), {
                columnWidth: 20,
                stylist: plainStylist,
            })
        ).toBeNull();
        expect(
            buildDayGrid(makeBucket([]), {
                columnWidth: 20,
                stylist: plainStylist,
            })
        ).toBeNull();
    });

    it('rejects talks off the five-minute marks', () => {
        const bucket = makeBucket([
            makeRoom('Main Hall', [
                { id: 'odd', start: '09:02', end: '09:32', title: 'Odd' },
            ]),
        ]);
        expect(() =>
            buildDayGrid(bucket, { columnWidth: 20, stylist: plainStylist })
        ).toThrow(/does not start and end on a 5-minute mark/);
    });

    it('rejects talk ids shared between rooms', () => {
        const bucket = makeBucket([
            makeRoom('Main Hall', [
                { id: 'break', start: '10:30', end: '11:00', description: 'Coffee' },
            ]),
            makeRoom('Side Room', [
                { id: 'break', start: '10:30', end: '11:00', description: 'Coffee' },
            ]),
        ]);
        expect(() =>
            buildDayGrid(bucket, { columnWidth: 20, stylist: plainStylist })
        ).toThrow(/Talk id break is used more than once/);
    });

    it('rejects talks that end before they start', () => {
        const broken = makeTalk({
            id: 'broken',
            start: '10:00',
            end: '09:00',
            description: 'Broken',
        });
        const bucket = makeBucket([{ name: 'Main Hall', talks: [broken] }]);
        expect(() =>
            buildDayGrid(bucket, { columnWidth: 20, stylist: plainStylist })
        ).toThrow(AppError);
    });
});
