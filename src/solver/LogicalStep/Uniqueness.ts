import { ReadonlyBoard } from '../Board';
import { Move, elimination, placement } from '../Move';
import { cellRegions, commonPeers, sharedRegions } from '../Regions';
import {
    Candidate,
    CellIndex,
    NUM_CELLS,
    SIZE,
    cellIndex,
    cellName,
    combinations,
    compactName,
    hasValue,
    maskToString,
    minValue,
    popcount,
    valueBit,
    valuesList,
} from '../SolveUtility';
import { LogicalStep } from './LogicalStep';

// These steps rely on the puzzle having exactly one solution. The dispatcher only runs them once that is known.

type Rectangle = { cells: [CellIndex, CellIndex, CellIndex, CellIndex] };

// Rectangles spanning exactly two boxes. Corners are ordered top-left, top-right, bottom-left, bottom-right.
function* rectangles(): Generator<Rectangle> {
    for (let r1 = 0; r1 < SIZE; r1++) {
        for (let r2 = r1 + 1; r2 < SIZE; r2++) {
            const sameBand = Math.floor(r1 / 3) === Math.floor(r2 / 3);
            for (let c1 = 0; c1 < SIZE; c1++) {
                for (let c2 = c1 + 1; c2 < SIZE; c2++) {
                    const sameStack = Math.floor(c1 / 3) === Math.floor(c2 / 3);
                    if (sameBand === sameStack) {
                        continue;
                    }
                    yield { cells: [cellIndex(r1, c1), cellIndex(r1, c2), cellIndex(r2, c1), cellIndex(r2, c2)] };
                }
            }
        }
    }
}

// Pairs of corners sharing a row or column; diagonals are excluded
const sidePairs: [number, number][] = [
    [0, 1],
    [2, 3],
    [0, 2],
    [1, 3],
];

function candidatesIn(board: ReadonlyBoard, cells: CellIndex[], mask: number): Candidate[] {
    const result: Candidate[] = [];
    for (const cell of cells) {
        for (const value of valuesList(board.candidates(cell) & mask)) {
            result.push({ cell, value });
        }
    }
    return result;
}

function* rectanglePairs(board: ReadonlyBoard): Generator<{ rect: Rectangle; pair: number; masks: number[] }> {
    for (const rect of rectangles()) {
        if (rect.cells.some(cell => !board.isEmpty(cell))) {
            continue;
        }
        const masks = rect.cells.map(cell => board.candidates(cell));
        const common = masks.reduce((acc, mask) => acc & mask, masks[0]);
        if (popcount(common) < 2) {
            continue;
        }
        for (const [a, b] of combinations(valuesList(common), 2)) {
            yield { rect, pair: valueBit(a) | valueBit(b), masks };
        }
    }
}

export class UniqueRectangle extends LogicalStep {
    private type: 1 | 2 | 4;

    constructor(type: 1 | 2 | 4) {
        super(type === 1 ? 'uniqueRectangle1' : type === 2 ? 'uniqueRectangle2' : 'uniqueRectangle4');
        this.type = type;
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        for (const { rect, pair, masks } of rectanglePairs(board)) {
            const floorCount = masks.filter(mask => mask === pair).length;
            const label = `${this.name}: ${maskToString(pair)}${compactName(rect.cells)}`;

            if (this.type === 1) {
                if (floorCount !== 3) {
                    continue;
                }
                const roof = rect.cells[masks.findIndex(mask => mask !== pair)];
                yield elimination(this.technique, candidatesIn(board, [roof], pair), rect.cells, [], label);
                continue;
            }

            if (floorCount !== 2) {
                continue;
            }
            for (const [i, j] of sidePairs) {
                if (masks[i] === pair || masks[j] === pair) {
                    continue;
                }
                // The other side must be the floor
                const others = [0, 1, 2, 3].filter(k => k !== i && k !== j);
                if (!others.every(k => masks[k] === pair)) {
                    continue;
                }

                const roof = [rect.cells[i], rect.cells[j]];
                if (this.type === 2) {
                    const extra = masks[i] & ~pair;
                    if (popcount(extra) !== 1 || masks[j] !== masks[i]) {
                        continue;
                    }
                    const elims = candidatesIn(board, commonPeers(roof), extra);
                    if (elims.length > 0) {
                        yield elimination(this.technique, elims, rect.cells, [], label);
                    }
                    continue;
                }

                for (const region of sharedRegions(roof)) {
                    for (const value of valuesList(pair)) {
                        const positions = popcount(board.positions(region.index, value));
                        if (positions !== 2) {
                            continue;
                        }
                        const other = pair & ~valueBit(value);
                        const elims = candidatesIn(board, roof, other);
                        if (elims.length > 0) {
                            yield elimination(this.technique, elims, rect.cells, [region.name], `${label}, ${value} locked in ${region.name}`);
                        }
                    }
                }
            }
        }
    }
}

// Three solved, non-given corners a/b/b: the fourth corner cannot complete the swap with a
export class AvoidableRectangle extends LogicalStep {
    constructor() {
        super('avoidableRectangle');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        for (const rect of rectangles()) {
            const cells = rect.cells;
            if (cells.some(cell => board.isGiven(cell))) {
                continue;
            }
            const openIndex = cells.findIndex(cell => board.isEmpty(cell));
            if (openIndex === -1 || cells.filter(cell => board.isEmpty(cell)).length !== 1) {
                continue;
            }

            // Corner diagonal to the open one
            const diagonal = 3 - openIndex;
            const sides = [0, 1, 2, 3].filter(k => k !== openIndex && k !== diagonal);
            const a = board.values[cells[diagonal]];
            const b = board.values[cells[sides[0]]];
            if (b !== board.values[cells[sides[1]]] || a === b) {
                continue;
            }

            const open = cells[openIndex];
            if (!hasValue(board.candidates(open), a)) {
                continue;
            }
            yield elimination(this.technique, [{ cell: open, value: a }], cells, [], `${this.name}: ${a}${b}${compactName(cells)}`);
        }
    }
}

// Every empty cell bivalue except one: the value appearing three times in a house of that cell is its solution
export class BugPlusOne extends LogicalStep {
    constructor() {
        super('bugPlusOne');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        let extraCell = -1;
        for (let cell = 0; cell < NUM_CELLS; cell++) {
            if (!board.isEmpty(cell)) {
                continue;
            }
            const count = popcount(board.candidates(cell));
            if (count === 2) {
                continue;
            }
            if (count !== 3 || extraCell !== -1) {
                return;
            }
            extraCell = cell;
        }
        if (extraCell === -1) {
            return;
        }

        for (const value of valuesList(board.candidates(extraCell))) {
            const tripled = cellRegions[extraCell].some(regionIndex => popcount(board.positions(regionIndex, value)) === 3);
            if (!tripled) {
                continue;
            }
            yield placement(this.technique, extraCell, value, [extraCell], [], `${this.name}: ${cellName(extraCell)} = ${value}.`);
            return;
        }
    }
}

// A bivalue corner whose opposite corner is the only other place for x in both its row and its column.
// That corner cannot take y without completing the deadly pattern.
export class HiddenRectangle extends LogicalStep {
    constructor() {
        super('hiddenRectangle');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        for (const { rect, pair, masks } of rectanglePairs(board)) {
            const label = `${this.name}: ${maskToString(pair)}${compactName(rect.cells)}`;
            for (let floor = 0; floor < 4; floor++) {
                if (masks[floor] !== pair) {
                    continue;
                }
                const opposite = 3 - floor;
                const cell = rect.cells[opposite];
                const [rowIndex, colIndex] = cellRegions[cell];
                for (const x of valuesList(pair)) {
                    if (popcount(board.positions(rowIndex, x)) !== 2 || popcount(board.positions(colIndex, x)) !== 2) {
                        continue;
                    }
                    const y = minValue(pair & ~valueBit(x));
                    const rowName = board.regions[rowIndex].name;
                    const colName = board.regions[colIndex].name;
                    yield elimination(this.technique, [{ cell, value: y }], rect.cells, [rowName, colName], `${label}, ${x} locked in ${rowName} and ${colName}`);
                }
            }
        }
    }
}

// Two lines of one band (or stack) crossing three lines in three different stacks (or bands)
function* extendedRectangles(): Generator<CellIndex[]> {
    for (const transposed of [false, true]) {
        for (let band = 0; band < 3; band++) {
            for (const [i, j] of [
                [0, 1],
                [0, 2],
                [1, 2],
            ]) {
                const lines = [band * 3 + i, band * 3 + j];
                for (let a = 0; a < 3; a++) {
                    for (let b = 3; b < 6; b++) {
                        for (let c = 6; c < 9; c++) {
                            const cells = lines.flatMap(line => [a, b, c].map(cross => (transposed ? cellIndex(cross, line) : cellIndex(line, cross))));
                            yield cells.sort((x, y) => x - y);
                        }
                    }
                }
            }
        }
    }
}

// Six cells over three boxes where five hold only the same three values: the sixth must keep something else
export class ExtendedUniqueRectangle extends LogicalStep {
    constructor() {
        super('extendedUniqueRectangle');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        for (const cells of extendedRectangles()) {
            if (cells.some(cell => !board.isEmpty(cell))) {
                continue;
            }
            const masks = cells.map(cell => board.candidates(cell));
            for (let odd = 0; odd < cells.length; odd++) {
                const rest = masks.reduce((acc, mask, i) => (i === odd ? acc : acc | mask), 0);
                if (popcount(rest) !== 3 || (masks[odd] & ~rest) === 0 || (masks[odd] & rest) === 0) {
                    continue;
                }
                yield elimination(
                    this.technique,
                    candidatesIn(board, [cells[odd]], rest),
                    cells,
                    [],
                    `${this.name}: ${maskToString(rest)}${compactName(cells)}`
                );
            }
        }
    }
}
