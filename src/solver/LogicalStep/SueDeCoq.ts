import { ReadonlyBoard } from '../Board';
import { Move, elimination } from '../Move';
import { Region } from '../Regions';
import { Candidate, CellIndex, CellMask, combinations, compactName, maskToString, popcount, valuesList } from '../SolveUtility';
import { LogicalStep } from './LogicalStep';

const MAX_SIDE_CELLS = 2;

function unionOf(board: ReadonlyBoard, cells: CellIndex[]): CellMask {
    return cells.reduce((mask, cell) => mask | board.candidates(cell), 0);
}

function* subsets(cells: CellIndex[]): Generator<CellIndex[]> {
    for (let size = 1; size <= Math.min(MAX_SIDE_CELLS, cells.length); size++) {
        yield* combinations(cells, size);
    }
}

// Two or three cells where a box meets a line, holding at least two more values than cells.
// Line cells and box cells with disjoint values account for the rest, so together the groups form a locked set.
export class SueDeCoq extends LogicalStep {
    constructor() {
        super('sueDeCoq');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        for (const box of board.regions) {
            if (box.type !== 'box') {
                continue;
            }
            for (const line of board.regions) {
                if (line.type === 'box') {
                    continue;
                }
                const crossing = box.cells.filter(cell => line.cells.includes(cell));
                if (crossing.length === 0) {
                    continue;
                }
                yield* this.fromCrossing(board, box, line, crossing);
            }
        }
    }

    private *fromCrossing(board: ReadonlyBoard, box: Region, line: Region, crossing: CellIndex[]): Generator<Move> {
        const emptyCrossing = crossing.filter(cell => board.isEmpty(cell));
        const lineRest = line.cells.filter(cell => board.isEmpty(cell) && !crossing.includes(cell));
        const boxRest = box.cells.filter(cell => board.isEmpty(cell) && !crossing.includes(cell));

        for (let size = 2; size <= emptyCrossing.length; size++) {
            for (const core of combinations(emptyCrossing, size)) {
                const coreMask = unionOf(board, core);
                if (popcount(coreMask) < size + 2) {
                    continue;
                }

                for (const lineCells of subsets(lineRest)) {
                    const lineMask = unionOf(board, lineCells);
                    if ((lineMask & coreMask) === 0) {
                        continue;
                    }
                    for (const boxCells of subsets(boxRest)) {
                        const boxMask = unionOf(board, boxCells);
                        if ((boxMask & coreMask) === 0 || (boxMask & lineMask) !== 0) {
                            continue;
                        }
                        const cellCount = size + lineCells.length + boxCells.length;
                        if (popcount(coreMask | lineMask | boxMask) !== cellCount) {
                            continue;
                        }

                        const elims: Candidate[] = [];
                        const lineElims = lineMask | (coreMask & ~boxMask);
                        const boxElims = boxMask | (coreMask & ~lineMask);
                        for (const cell of lineRest) {
                            if (!lineCells.includes(cell)) {
                                elims.push(...valuesList(board.candidates(cell) & lineElims).map(value => ({ cell, value })));
                            }
                        }
                        for (const cell of boxRest) {
                            if (!boxCells.includes(cell)) {
                                elims.push(...valuesList(board.candidates(cell) & boxElims).map(value => ({ cell, value })));
                            }
                        }
                        for (const cell of emptyCrossing) {
                            if (!core.includes(cell)) {
                                const values = valuesList(board.candidates(cell) & (lineElims | boxElims));
                                elims.push(...values.map(value => ({ cell, value })));
                            }
                        }
                        if (elims.length === 0) {
                            continue;
                        }

                        yield elimination(
                            this.technique,
                            elims,
                            [...core, ...lineCells, ...boxCells],
                            [line.name, box.name],
                            `${this.name}: ${maskToString(coreMask)}${compactName(core)} with ${maskToString(lineMask)}${compactName(lineCells)} and ${maskToString(boxMask)}${compactName(boxCells)}`
                        );
                    }
                }
            }
        }
    }
}
