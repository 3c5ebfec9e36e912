export const HORIZONTAL = '─';
export const VERTICAL = '│';
export const TEE_RIGHT = '├';
export const TEE_LEFT = '┤';

// Indexed by the arms of a junction: up = 1, down = 2, left = 4, right = 8.
const JUNCTIONS = [
    ' ',
    '╵',
    '╷',
    '│',
    '╴',
    '┘',
    '┐',
    '┤',
    '╶',
    '└',
    '┌',
    '├',
    '─',
    '┴',
    '┬',
    '┼',
] as const;

/**
 * Junction glyph on the boundary between two columns at one instant.
 *
 * A talk ending on either side pulls the border up, a talk starting pulls
 * it down, and any event on a side draws the horizontal arm toward it.
 */
export function separator(
    rightEnd: boolean,
    rightStart: boolean,
    leftStart: boolean,
    leftEnd: boolean
): string {
    const up = rightEnd || leftEnd;
    const down = rightStart || leftStart;
    const left = leftStart || leftEnd;
    const right = rightStart || rightEnd;
    const index =
        (up ? 1 : 0) | (down ? 2 : 0) | (left ? 4 : 0) | (right ? 8 : 0);
    return JUNCTIONS[index] ?? ' ';
}
