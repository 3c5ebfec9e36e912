import { describe, expect, it } from 'vitest';
import { fit, truncate, wrapText } from './text.js';

describe('wrapText', () => {
    it('wraps greedily on word boundaries', () => {
        expect(
            wrapText('Typed state machines for the rest of us', 16)
        ).toEqual(['Typed state', 'machines for the', 'rest of us']);
    });

    it('splits words longer than the width', () => {
        expect(wrapText('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
        expect(wrapText('ab abcdefgh', 5)).toEqual(['ab ab', 'cdefg', 'h']);
    });

    it('splits long words between code points', () => {
        expect(wrapText('🦀🦀🦀🦀🦀', 2)).toEqual(['🦀🦀', '🦀🦀', '🦀']);
    });

    it('returns no lines for blank text', () => {
        expect(wrapText('', 10)).toEqual([]);
        expect(wrapText('   ', 10)).toEqual([]);
    });
});

describe('truncate', () => {
    it('cuts long text and appends an ellipsis', () => {
        expect(truncate('Ada Lovelace', 8)).toBe('Ada Lov…');
    });

    it('keeps astral characters whole', () => {
        expect(truncate('🦀🦀🦀', 2)).toBe('🦀…');
        expect(truncate('🦀🦀', 2)).toBe('🦀🦀');
    });

    it('leaves short text unchanged', () => {
        expect(truncate('Ada', 8)).toBe('Ada');
    });

    it('is idempotent for the same limit', () => {
        const once = truncate('Grace Hopper, Alan Turing', 12);
        expect(truncate(once, 12)).toBe(once);
    });
});

describe('fit', () => {
    it('pads to the exact width', () => {
        expect(fit('en', 4)).toBe('en  ');
        expect(fit('Lovelace', 6)).toBe('Lovel…');
        expect(fit('anything', 0)).toBe('');
        expect(fit('🦀', 3)).toBe('🦀  ');
    });
});
