import { Board } from '../src/solver/Board';
import { CellIndex, CellValue, NUM_CELLS, SIZE, valuesList } from '../src/solver/SolveUtility';

// A valid solution built from shifted rows: 123456789, 456789123, 789123456, 234567891, ...
export function patternSolution(): CellValue[] {
    return Array.from({ length: NUM_CELLS }, (_, cell) => {
        const row = Math.floor(cell / SIZE);
        const col = cell % SIZE;
        return ((row * 3 + Math.floor(row / 3) + col) % SIZE) + 1;
    });
}

export function patternString(): string {
    return patternSolution().join('');
}

// The pattern solution with the given cells emptied
export function patternWithout(cells: CellIndex[]): CellValue[] {
    const values = patternSolution();
    for (const cell of cells) {
        values[cell] = 0;
    }
    return values;
}

export function boardFrom(values: CellValue[], asGivens: boolean = true): Board {
    const created = Board.create(values, asGivens);
    if (created.result !== 'board') {
        throw new Error(`Test grid conflicts at cell ${created.cell}`);
    }
    return created.board;
}

// Leaves only the listed candidates in an empty cell
export function keepOnly(board: Board, cell: CellIndex, values: CellValue[]) {
    for (const value of valuesList(board.candidates(cell))) {
        if (!values.includes(value)) {
            board.removeCandidate(cell, value);
        }
    }
}

export function removeFrom(board: Board, value: CellValue, cells: CellIndex[]) {
    for (const cell of cells) {
        board.removeCandidate(cell, value);
    }
}

export function range(from: number, to: number): number[] {
    return Array.from({ length: to - from + 1 }, (_, i) => from + i);
}

export function isValidSolution(values: ArrayLike<CellValue>): boolean {
    const board = Board.create(values);
    return board.result === 'board' && board.board.isComplete();
}
