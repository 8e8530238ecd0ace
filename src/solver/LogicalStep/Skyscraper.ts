import { ReadonlyBoard } from '../Board';
import { Move, elimination } from '../Move';
import { Region, commonPeers } from '../Regions';
import { CellIndex, SIZE, boxIndex, cellCoords, combinations, hasValue, popcount, slotsList } from '../SolveUtility';
import { LogicalStep } from './LogicalStep';

type ConjugatePair = { region: Region; cells: [CellIndex, CellIndex] };

// Houses where the value has exactly two places left
export function conjugatePairs(board: ReadonlyBoard, value: number, types: Region['type'][]): ConjugatePair[] {
    const pairs: ConjugatePair[] = [];
    for (const region of board.regions) {
        if (!types.includes(region.type)) {
            continue;
        }
        const positions = board.positions(region.index, value);
        if (popcount(positions) !== 2) {
            continue;
        }
        const [slot0, slot1] = slotsList(positions);
        pairs.push({ region, cells: [region.cells[slot0], region.cells[slot1]] });
    }
    return pairs;
}

function sameBox(cell0: CellIndex, cell1: CellIndex): boolean {
    const coords0 = cellCoords(cell0);
    const coords1 = cellCoords(cell1);
    return boxIndex(coords0.row, coords0.col) === boxIndex(coords1.row, coords1.col);
}

function eliminationsFor(board: ReadonlyBoard, value: number, ends: CellIndex[]) {
    return commonPeers(ends)
        .filter(cell => hasValue(board.candidates(cell), value))
        .map(cell => ({ cell, value }));
}

// Two parallel conjugate pairs with one end aligned
export class Skyscraper extends LogicalStep {
    constructor() {
        super('skyscraper');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        for (let value = 1; value <= SIZE; value++) {
            for (const type of ['row', 'col'] as const) {
                const pairs = conjugatePairs(board, value, [type]);
                for (const [pair0, pair1] of combinations(pairs, 2)) {
                    const line = (cell: CellIndex) => (type === 'row' ? cellCoords(cell).col : cellCoords(cell).row);
                    for (let i = 0; i < 2; i++) {
                        for (let j = 0; j < 2; j++) {
                            const base0 = pair0.cells[i];
                            const base1 = pair1.cells[j];
                            const end0 = pair0.cells[1 - i];
                            const end1 = pair1.cells[1 - j];
                            if (line(base0) !== line(base1) || line(end0) === line(end1)) {
                                continue;
                            }

                            const elims = eliminationsFor(board, value, [end0, end1]);
                            if (elims.length === 0) {
                                continue;
                            }
                            yield elimination(
                                this.technique,
                                elims,
                                [base0, end0, base1, end1],
                                [pair0.region.name, pair1.region.name],
                                `Skyscraper on ${value} in ${pair0.region.name} and ${pair1.region.name}`
                            );
                        }
                    }
                }
            }
        }
    }
}

// A row pair and a column pair joined inside one box
export class TwoStringKite extends LogicalStep {
    constructor() {
        super('twoStringKite');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        for (let value = 1; value <= SIZE; value++) {
            const rowPairs = conjugatePairs(board, value, ['row']);
            const colPairs = conjugatePairs(board, value, ['col']);
            for (const rowPair of rowPairs) {
                for (const colPair of colPairs) {
                    if (rowPair.cells.some(cell => colPair.cells.includes(cell))) {
                        continue;
                    }
                    for (let i = 0; i < 2; i++) {
                        for (let j = 0; j < 2; j++) {
                            const rowBase = rowPair.cells[i];
                            const colBase = colPair.cells[j];
                            if (!sameBox(rowBase, colBase)) {
                                continue;
                            }

                            const rowEnd = rowPair.cells[1 - i];
                            const colEnd = colPair.cells[1 - j];
                            const elims = eliminationsFor(board, value, [rowEnd, colEnd]);
                            if (elims.length === 0) {
                                continue;
                            }
                            yield elimination(
                                this.technique,
                                elims,
                                [rowEnd, rowBase, colBase, colEnd],
                                [rowPair.region.name, colPair.region.name],
                                `2-String Kite on ${value} in ${rowPair.region.name} and ${colPair.region.name}`
                            );
                        }
                    }
                }
            }
        }
    }
}
