import { ReadonlyBoard } from './Board';
import { Random } from './Random';
import { ALL_VALUES, CellIndex, CellMask, CellValue, NUM_CELLS, SIZE, boxIndex, popcount, valueBit, valuesList } from './SolveUtility';

// Solution counting by backtracking over bitmasks. Independent of the technique engines.

export type SolutionCount = 0 | 1 | 2;

export type VerifierInput = ReadonlyBoard | ArrayLike<CellValue>;

// No 9x9 grid with fewer clues than this has a unique solution
export const MIN_UNIQUE_CLUES = 17;

const rowOf = Array.from({ length: NUM_CELLS }, (_, cell) => Math.floor(cell / SIZE));
const colOf = Array.from({ length: NUM_CELLS }, (_, cell) => cell % SIZE);
const boxOf = Array.from({ length: NUM_CELLS }, (_, cell) => boxIndex(rowOf[cell], colOf[cell]));
const houseCells: CellIndex[][] = [
    ...Array.from({ length: SIZE }, (_, row) => Array.from({ length: SIZE }, (_, i) => row * SIZE + i)),
    ...Array.from({ length: SIZE }, (_, col) => Array.from({ length: SIZE }, (_, i) => i * SIZE + col)),
    ...Array.from({ length: SIZE }, (_, box) => Array.from({ length: NUM_CELLS }, (_, cell) => cell).filter(cell => boxOf[cell] === box)),
];

function isBoard(grid: VerifierInput): grid is ReadonlyBoard {
    return 'candidates' in grid;
}

class Search {
    values = new Uint8Array(NUM_CELLS);
    allowed = new Uint16Array(NUM_CELLS);
    rowUsed = new Uint16Array(SIZE);
    colUsed = new Uint16Array(SIZE);
    boxUsed = new Uint16Array(SIZE);
    empties: CellIndex[] = [];
    count = 0;
    solution: CellValue[] | null = null;
    cap: number;
    random: Random | null;
    valid = true;
    // Set when the candidates are exactly what the placed values leave open
    plainCandidates = true;
    filled = 0;

    constructor(grid: VerifierInput, cap: number, random: Random | null) {
        this.cap = cap;
        this.random = random;

        if (!isBoard(grid) && grid.length !== NUM_CELLS) {
            throw new Error(`Expected ${NUM_CELLS} values, got ${grid.length}`);
        }

        for (let cell = 0; cell < NUM_CELLS; cell++) {
            const value = isBoard(grid) ? grid.values[cell] : grid[cell];
            if (value === 0) {
                this.empties.push(cell);
                this.allowed[cell] = isBoard(grid) ? grid.candidates(cell) : ALL_VALUES;
                continue;
            }
            if (!Number.isInteger(value) || value < 0 || value > SIZE) {
                throw new Error(`Invalid value ${value} at cell ${cell}`);
            }
            const bit = valueBit(value);
            if (this.used(cell) & bit) {
                this.valid = false;
                return;
            }
            this.assign(cell, value);
            this.filled++;
        }

        if (isBoard(grid)) {
            this.plainCandidates = this.empties.every(cell => this.allowed[cell] === (ALL_VALUES & ~this.used(cell)));
        }
    }

    used(cell: CellIndex): CellMask {
        return this.rowUsed[rowOf[cell]] | this.colUsed[colOf[cell]] | this.boxUsed[boxOf[cell]];
    }

    assign(cell: CellIndex, value: CellValue) {
        const bit = valueBit(value);
        this.values[cell] = value;
        this.rowUsed[rowOf[cell]] |= bit;
        this.colUsed[colOf[cell]] |= bit;
        this.boxUsed[boxOf[cell]] |= bit;
    }

    unassign(cell: CellIndex, value: CellValue) {
        const bit = ~valueBit(value);
        this.values[cell] = 0;
        this.rowUsed[rowOf[cell]] &= bit;
        this.colUsed[colOf[cell]] &= bit;
        this.boxUsed[boxOf[cell]] &= bit;
    }

    // Returns true once enough solutions have been found
    run(): boolean {
        let bestCell = -1;
        let bestMask = 0;
        let bestCount = SIZE + 1;
        for (const cell of this.empties) {
            if (this.values[cell] !== 0) {
                continue;
            }
            const mask = this.allowed[cell] & ~this.used(cell);
            if (mask === 0) {
                return false;
            }
            const count = popcount(mask);
            if (count < bestCount) {
                bestCell = cell;
                bestMask = mask;
                bestCount = count;
                if (count === 1) {
                    break;
                }
            }
        }

        if (bestCell === -1) {
            this.count++;
            if (this.solution === null) {
                this.solution = Array.from(this.values);
            }
            return this.count >= this.cap;
        }

        if (bestCount > 1) {
            const single = this.findHiddenSingle();
            if (single === null) {
                return false;
            }
            if (single.cell !== -1) {
                bestCell = single.cell;
                bestMask = valueBit(single.value);
            }
        }

        const values = valuesList(bestMask);
        if (this.random !== null) {
            this.random.shuffle(values);
        }
        for (const value of values) {
            this.assign(bestCell, value);
            const done = this.run();
            this.unassign(bestCell, value);
            if (done) {
                return true;
            }
        }
        return false;
    }

    // A value with one place left in some house, { cell: -1 } when there is none, or null on a dead end
    private findHiddenSingle(): { cell: CellIndex; value: CellValue } | null {
        for (let house = 0; house < houseCells.length; house++) {
            let atLeastOnce = 0;
            let moreThanOnce = 0;
            let placed = 0;
            for (const cell of houseCells[house]) {
                const value = this.values[cell];
                if (value !== 0) {
                    placed |= valueBit(value);
                    continue;
                }
                const mask = this.allowed[cell] & ~this.used(cell);
                moreThanOnce |= atLeastOnce & mask;
                atLeastOnce |= mask;
            }
            if ((atLeastOnce | placed) !== ALL_VALUES) {
                return null;
            }
            const exactlyOnce = atLeastOnce & ~moreThanOnce & ~placed;
            if (exactlyOnce === 0) {
                continue;
            }
            for (const cell of houseCells[house]) {
                if (this.values[cell] !== 0) {
                    continue;
                }
                const mask = this.allowed[cell] & ~this.used(cell) & exactlyOnce;
                if (mask !== 0) {
                    return { cell, value: valuesList(mask)[0] };
                }
            }
        }
        return { cell: -1, value: 0 };
    }
}

/**
 * Counts solutions up to the cap: 0, 1, or 2 meaning at least two.
 * Candidates already removed from a board are respected.
 */
export function countSolutions(grid: VerifierInput, cap: 1 | 2 = 2): SolutionCount {
    const search = new Search(grid, cap, null);
    if (!search.valid) {
        return 0;
    }

    // Too few clues for uniqueness: only existence needs checking
    if (search.filled < MIN_UNIQUE_CLUES && search.plainCandidates) {
        search.cap = 1;
        search.run();
        return search.count === 0 ? 0 : cap;
    }

    search.run();
    return search.count >= 2 ? 2 : search.count === 1 ? 1 : 0;
}

export function isUnique(grid: VerifierInput): boolean {
    return countSolutions(grid, 2) === 1;
}

// Any one solution, with value order shuffled when a random source is given
export function findSolution(grid: VerifierInput, random: Random | null = null): CellValue[] | null {
    const search = new Search(grid, 1, random);
    if (!search.valid) {
        return null;
    }
    search.run();
    return search.solution;
}
