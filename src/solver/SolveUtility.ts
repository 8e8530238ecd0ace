export type CandidateIndex = number;
export type CellIndex = number;
export type CellMask = number;
export type CellValue = number;

export const SIZE = 9;
export const NUM_CELLS = SIZE * SIZE;
export const ALL_VALUES: CellMask = (1 << SIZE) - 1;

export interface CellCoords {
    row: number;
    col: number;
}

export interface Candidate {
    cell: CellIndex;
    value: CellValue;
}

// Bit counts of every 9-bit mask. Candidate masks and house slot masks both fit.
const bitCounts = new Uint8Array(ALL_VALUES + 1);
for (let mask = 1; mask <= ALL_VALUES; mask++) {
    bitCounts[mask] = bitCounts[mask >> 1] + (mask & 1);
}

export function popcount(mask: CellMask): number {
    return bitCounts[mask & ALL_VALUES];
}

// Index of the lowest set bit; -1 for an empty mask
export function firstSlot(mask: CellMask): number {
    return 31 - Math.clz32(mask & -mask);
}

export function valueBit(value: CellValue): CellMask {
    return 1 << (value - 1);
}

export function minValue(bits: CellMask): CellValue {
    return firstSlot(bits) + 1;
}

export function hasValue(bits: CellMask, value: CellValue): boolean {
    return (bits & valueBit(value)) !== 0;
}

export function valuesList(mask: CellMask): CellValue[] {
    const values: number[] = [];
    while (mask !== 0) {
        const value = minValue(mask);
        values.push(value);
        mask ^= valueBit(value);
    }
    return values;
}

// Positions within a house use the same bit layout as values, so slot i maps to bit i
export function slotsList(mask: number): number[] {
    return valuesList(mask).map(value => value - 1);
}

export function cellIndex(row: number, col: number): CellIndex {
    return row * SIZE + col;
}

export function cellCoords(cell: CellIndex): CellCoords {
    return { row: Math.floor(cell / SIZE), col: cell % SIZE };
}

export function boxIndex(row: number, col: number): number {
    return Math.floor(row / 3) * 3 + Math.floor(col / 3);
}

export function candidateIndex(cell: CellIndex, value: CellValue): CandidateIndex {
    return cell * SIZE + value - 1;
}

export function candidateFromIndex(index: CandidateIndex): Candidate {
    return { cell: Math.floor(index / SIZE), value: (index % SIZE) + 1 };
}

// Every subset of the given size, in lexicographic order of positions
export function* combinations<T>(items: readonly T[], size: number): Generator<T[]> {
    if (size < 0 || size > items.length) {
        return;
    }
    const picked = Array.from({ length: size }, (_, i) => i);
    while (true) {
        yield picked.map(index => items[index]);
        let i = size - 1;
        while (i >= 0 && picked[i] === items.length - size + i) {
            i--;
        }
        if (i < 0) {
            return;
        }
        picked[i]++;
        for (let j = i + 1; j < size; j++) {
            picked[j] = picked[j - 1] + 1;
        }
    }
}

export function maskToString(mask: CellMask): string {
    return valuesList(mask).join('');
}

export function cellName(cell: CellIndex): string {
    const { row, col } = cellCoords(cell);
    return `R${row + 1}C${col + 1}`;
}

// Compact name for a group of cells, eg. r1c23 or r12c4
export function compactName(cells: CellIndex[]): string {
    if (cells.length === 0) {
        return '';
    }

    const coords = cells.map(cellCoords);
    if (coords.length === 1) {
        return `r${coords[0].row + 1}c${coords[0].col + 1}`;
    }

    if (coords.every(coord => coord.row === coords[0].row)) {
        return `r${coords[0].row + 1}c${coords
            .map(coord => coord.col + 1)
            .sort((a, b) => a - b)
            .join('')}`;
    }

    if (coords.every(coord => coord.col === coords[0].col)) {
        return `r${coords
            .map(coord => coord.row + 1)
            .sort((a, b) => a - b)
            .join('')}c${coords[0].col + 1}`;
    }

    const colsPerRow: number[][] = Array.from({ length: SIZE }, () => []);
    for (const { row, col } of coords) {
        colsPerRow[row].push(col + 1);
    }
    for (const cols of colsPerRow) {
        cols.sort((a, b) => a - b);
    }

    const groups: string[] = [];
    for (let i = 0; i < SIZE; i++) {
        if (colsPerRow[i].length === 0) {
            continue;
        }

        const rowsInGroup = [i + 1];
        for (let j = i + 1; j < SIZE; j++) {
            if (colsPerRow[j].length === colsPerRow[i].length && colsPerRow[j].every((value, index) => value === colsPerRow[i][index])) {
                rowsInGroup.push(j + 1);
                colsPerRow[j].length = 0;
            }
        }

        groups.push(`r${rowsInGroup.join('')}c${colsPerRow[i].join('')}`);
    }

    return groups.join(',');
}

// Describe a list of candidates grouped by value, eg. -5r1c23;-7r4c4
export function describeCandidates(candidates: Candidate[], isElim: boolean = false): string {
    const minusSign = isElim ? '-' : '';
    const cellsByValue: CellIndex[][] = Array.from({ length: SIZE }, () => []);
    for (const { cell, value } of candidates) {
        cellsByValue[value - 1].push(cell);
    }

    const descs: string[] = [];
    for (let value = 1; value <= SIZE; value++) {
        const cells = cellsByValue[value - 1];
        if (cells.length > 0) {
            cells.sort((a, b) => a - b);
            descs.push(`${minusSign}${value}${compactName(cells)}`);
        }
    }
    return descs.join(';');
}

export function describeElims(elims: Candidate[]): string {
    return describeCandidates(elims, true);
}
