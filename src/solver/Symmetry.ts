import { CellIndex, SIZE, cellIndex } from './SolveUtility';

export type SymmetryMode = 'none' | 'rotational180' | 'rotational90' | 'horizontal' | 'vertical' | 'diagonal';

export const symmetryModes: readonly SymmetryMode[] = ['none', 'rotational180', 'rotational90', 'horizontal', 'vertical', 'diagonal'];

export function isSymmetryMode(name: string): name is SymmetryMode {
    return symmetryModes.some(mode => mode === name);
}

const last = SIZE - 1;

// Where each mode sends (row, col). Repeating a map until it returns to the start gives the orbit.
const maps: Record<SymmetryMode, (row: number, col: number) => [number, number]> = {
    none: (row, col) => [row, col],
    rotational180: (row, col) => [last - row, last - col],
    rotational90: (row, col) => [col, last - row],
    // Mirror top to bottom
    horizontal: (row, col) => [last - row, col],
    // Mirror left to right
    vertical: (row, col) => [row, last - col],
    // Mirror across the main diagonal
    diagonal: (row, col) => [col, row],
};

/**
 * The cells that must be removed together with the cell under the mode, sorted and including the cell itself.
 */
export function orbit(cell: CellIndex, mode: SymmetryMode): CellIndex[] {
    const cells = new Set<CellIndex>([cell]);
    let row = Math.floor(cell / SIZE);
    let col = cell % SIZE;
    while (true) {
        [row, col] = maps[mode](row, col);
        const next = cellIndex(row, col);
        if (cells.has(next)) {
            break;
        }
        cells.add(next);
    }
    return Array.from(cells).sort((a, b) => a - b);
}
