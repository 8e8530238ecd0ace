import { ReadonlyBoard } from '../Board';
import { Move, elimination } from '../Move';
import { commonPeers, sees } from '../Regions';
import { Candidate, CellIndex, NUM_CELLS, cellName, combinations, hasValue, maskToString, minValue, popcount, valuesList } from '../SolveUtility';
import { LogicalStep } from './LogicalStep';
import { conjugatePairs } from './Skyscraper';

function eliminationsFor(board: ReadonlyBoard, value: number, cells: CellIndex[]): Candidate[] {
    return commonPeers(cells)
        .filter(cell => hasValue(board.candidates(cell), value))
        .map(cell => ({ cell, value }));
}

function bivalueCells(board: ReadonlyBoard): CellIndex[] {
    const cells: CellIndex[] = [];
    for (let cell = 0; cell < NUM_CELLS; cell++) {
        if (popcount(board.candidates(cell)) === 2) {
            cells.push(cell);
        }
    }
    return cells;
}

export class XYWing extends LogicalStep {
    constructor() {
        super('xyWing');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        const bivalues = bivalueCells(board);
        for (const pivot of bivalues) {
            const pivotMask = board.candidates(pivot);
            const wings = bivalues.filter(cell => cell !== pivot && sees(cell, pivot));
            for (let i = 0; i < wings.length; i++) {
                const mask1 = board.candidates(wings[i]);
                const shared1 = mask1 & pivotMask;
                if (popcount(shared1) !== 1) {
                    continue;
                }
                const z = mask1 & ~pivotMask;
                for (let j = i + 1; j < wings.length; j++) {
                    const mask2 = board.candidates(wings[j]);
                    // Second wing holds the other pivot value and the same z
                    if (mask2 !== ((pivotMask & ~shared1) | z)) {
                        continue;
                    }

                    const value = minValue(z);
                    const elims = eliminationsFor(board, value, [wings[i], wings[j]]);
                    if (elims.length === 0) {
                        continue;
                    }
                    yield elimination(
                        this.technique,
                        elims,
                        [pivot, wings[i], wings[j]],
                        [],
                        `XY-Wing: ${maskToString(pivotMask)}${cellName(pivot)} with ${maskToString(mask1)}${cellName(wings[i])} and ${maskToString(mask2)}${cellName(wings[j])}`
                    );
                }
            }
        }
    }
}

export class XYZWing extends LogicalStep {
    constructor() {
        super('xyzWing');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        const bivalues = bivalueCells(board);
        for (let pivot = 0; pivot < NUM_CELLS; pivot++) {
            const pivotMask = board.candidates(pivot);
            if (popcount(pivotMask) !== 3) {
                continue;
            }

            const wings = bivalues.filter(cell => sees(cell, pivot) && (board.candidates(cell) & ~pivotMask) === 0);
            for (let i = 0; i < wings.length; i++) {
                for (let j = i + 1; j < wings.length; j++) {
                    const mask1 = board.candidates(wings[i]);
                    const mask2 = board.candidates(wings[j]);
                    const z = mask1 & mask2;
                    if (popcount(z) !== 1 || (mask1 | mask2) !== pivotMask) {
                        continue;
                    }

                    const value = minValue(z);
                    const elims = eliminationsFor(board, value, [pivot, wings[i], wings[j]]);
                    if (elims.length === 0) {
                        continue;
                    }
                    yield elimination(
                        this.technique,
                        elims,
                        [pivot, wings[i], wings[j]],
                        [],
                        `XYZ-Wing: ${maskToString(pivotMask)}${cellName(pivot)} with ${maskToString(mask1)}${cellName(wings[i])} and ${maskToString(mask2)}${cellName(wings[j])}`
                    );
                }
            }
        }
    }
}

// Two identical bivalue cells bridged by a strong link on one of their values
export class WWing extends LogicalStep {
    constructor() {
        super('wWing');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        const bivalues = bivalueCells(board);
        for (let i = 0; i < bivalues.length; i++) {
            const cellA = bivalues[i];
            const mask = board.candidates(cellA);
            for (let j = i + 1; j < bivalues.length; j++) {
                const cellB = bivalues[j];
                if (board.candidates(cellB) !== mask || sees(cellA, cellB)) {
                    continue;
                }

                for (const linkValue of valuesList(mask)) {
                    const elimValue = minValue(mask & ~(1 << (linkValue - 1)));
                    const elims = eliminationsFor(board, elimValue, [cellA, cellB]);
                    if (elims.length === 0) {
                        continue;
                    }

                    for (const pair of conjugatePairs(board, linkValue, ['row', 'col', 'box'])) {
                        const [end0, end1] = pair.cells;
                        if ([end0, end1].some(end => end === cellA || end === cellB)) {
                            continue;
                        }
                        const linked =
                            (sees(end0, cellA) && sees(end1, cellB)) || (sees(end0, cellB) && sees(end1, cellA));
                        if (!linked) {
                            continue;
                        }

                        yield elimination(
                            this.technique,
                            elims,
                            [cellA, end0, end1, cellB],
                            [pair.region.name],
                            `W-Wing: ${maskToString(mask)}${cellName(cellA)} and ${cellName(cellB)} linked by ${linkValue} in ${pair.region.name}`
                        );
                        break;
                    }
                }
            }
        }
    }
}

// Four cells holding four values between them, where all but one value are confined to cells that see each other.
// The odd value is then true in one of its cells.
export class WXYZWing extends LogicalStep {
    constructor() {
        super('wxyzWing');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        const small: CellIndex[] = [];
        for (let cell = 0; cell < NUM_CELLS; cell++) {
            const count = popcount(board.candidates(cell));
            if (board.isEmpty(cell) && count >= 2 && count <= 4) {
                small.push(cell);
            }
        }

        const seen = new Set<string>();
        for (const pivot of small) {
            const pivotMask = board.candidates(pivot);
            const wings = small.filter(cell => sees(cell, pivot) && popcount(board.candidates(cell) | pivotMask) <= 4);
            for (const wingCells of combinations(wings, 3)) {
                const cells = [pivot, ...wingCells].sort((a, b) => a - b);
                const mask = cells.reduce((acc, cell) => acc | board.candidates(cell), 0);
                if (popcount(mask) !== 4) {
                    continue;
                }
                const key = cells.join(',');
                if (seen.has(key)) {
                    continue;
                }
                seen.add(key);

                const unrestricted = valuesList(mask).filter(value => {
                    const holders = cells.filter(cell => hasValue(board.candidates(cell), value));
                    return holders.some((a, i) => holders.some((b, j) => j > i && !sees(a, b)));
                });
                if (unrestricted.length !== 1) {
                    continue;
                }

                const z = unrestricted[0];
                const holders = cells.filter(cell => hasValue(board.candidates(cell), z));
                const elims = eliminationsFor(board, z, holders).filter(({ cell }) => !cells.includes(cell));
                if (elims.length === 0) {
                    continue;
                }
                const names = cells.map(cell => `${maskToString(board.candidates(cell))}${cellName(cell)}`);
                yield elimination(
                    this.technique,
                    elims,
                    cells,
                    [],
                    `${this.name}: ${names.slice(0, -1).join(', ')} and ${names[names.length - 1]}, z=${z}`
                );
            }
        }
    }
}
