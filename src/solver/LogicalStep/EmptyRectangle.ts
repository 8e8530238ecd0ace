import { ReadonlyBoard } from '../Board';
import { Move, elimination } from '../Move';
import { Region } from '../Regions';
import { CellCoords, CellIndex, SIZE, cellCoords, cellIndex, hasValue, slotsList } from '../SolveUtility';
import { LogicalStep } from './LogicalStep';
import { conjugatePairs } from './Skyscraper';

type Cross = { row: number; col: number };

const BOX_REGION_OFFSET = SIZE * 2;

function band(line: number): number {
    return Math.floor(line / 3);
}

// Row and column through the box that hold all of its candidates, when they are not all on one line
function crossesOf(coords: CellCoords[], box: number): Cross[] {
    if (coords.every(coord => coord.row === coords[0].row) || coords.every(coord => coord.col === coords[0].col)) {
        return [];
    }
    const baseRow = Math.floor(box / 3) * 3;
    const baseCol = (box % 3) * 3;
    const crosses: Cross[] = [];
    for (let row = baseRow; row < baseRow + 3; row++) {
        for (let col = baseCol; col < baseCol + 3; col++) {
            if (coords.every(coord => coord.row === row || coord.col === col)) {
                crosses.push({ row, col });
            }
        }
    }
    return crosses;
}

// A box whose candidates for a value lie on one row and one column of it.
// A conjugate pair with one end on that row (or column) pushes the value out of where its far end crosses the column (or row).
export class EmptyRectangle extends LogicalStep {
    constructor() {
        super('emptyRectangle');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        for (let value = 1; value <= SIZE; value++) {
            const rowPairs = conjugatePairs(board, value, ['row']);
            const colPairs = conjugatePairs(board, value, ['col']);
            if (rowPairs.length === 0 && colPairs.length === 0) {
                continue;
            }

            for (let box = 0; box < SIZE; box++) {
                const region = board.regions[BOX_REGION_OFFSET + box];
                if (hasValue(board.placedMask(region.index), value)) {
                    continue;
                }
                const cells = slotsList(board.positions(region.index, value)).map(slot => region.cells[slot]);
                if (cells.length < 2) {
                    continue;
                }

                for (const cross of crossesOf(cells.map(cellCoords), box)) {
                    for (const pair of colPairs) {
                        const pairCol = cellCoords(pair.cells[0]).col;
                        if (band(pairCol) === band(cross.col)) {
                            continue;
                        }
                        for (const [near, far] of [pair.cells, [pair.cells[1], pair.cells[0]]]) {
                            const farRow = cellCoords(far).row;
                            if (cellCoords(near).row !== cross.row || band(farRow) === band(cross.row)) {
                                continue;
                            }
                            const target = cellIndex(farRow, cross.col);
                            if (hasValue(board.candidates(target), value)) {
                                yield this.move(value, region, pair.region, target, cells, pair.cells);
                            }
                        }
                    }

                    for (const pair of rowPairs) {
                        const pairRow = cellCoords(pair.cells[0]).row;
                        if (band(pairRow) === band(cross.row)) {
                            continue;
                        }
                        for (const [near, far] of [pair.cells, [pair.cells[1], pair.cells[0]]]) {
                            const farCol = cellCoords(far).col;
                            if (cellCoords(near).col !== cross.col || band(farCol) === band(cross.col)) {
                                continue;
                            }
                            const target = cellIndex(cross.row, farCol);
                            if (hasValue(board.candidates(target), value)) {
                                yield this.move(value, region, pair.region, target, cells, pair.cells);
                            }
                        }
                    }
                }
            }
        }
    }

    private move(value: number, box: Region, link: Region, target: CellIndex, boxCells: CellIndex[], pairCells: CellIndex[]): Move {
        return elimination(
            this.technique,
            [{ cell: target, value }],
            [...boxCells, ...pairCells],
            [box.name, link.name],
            `${this.name} on ${value} in ${box.name} with ${link.name}`
        );
    }
}
