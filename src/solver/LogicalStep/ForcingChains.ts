import { Board, ReadonlyBoard } from '../Board';
import { Move, applyMoveToBoard, elimination, placement } from '../Move';
import {
    ALL_VALUES,
    Candidate,
    CellIndex,
    NUM_CELLS,
    SIZE,
    cellName,
    compactName,
    firstSlot,
    hasValue,
    minValue,
    popcount,
    slotsList,
    valuesList,
} from '../SolveUtility';
import { TechniqueId } from '../Technique';
import { LogicalStep } from './LogicalStep';

// Where an assumption leads: the board after propagation, or a contradiction
export type Propagation = { board: Board; contradiction: boolean };

type Advance = (board: Board) => 'progress' | 'done' | 'contradiction';

const MAX_BRANCHES = 4;
const MAX_ROUNDS = NUM_CELLS;
const DYNAMIC_MAX_MOVES = 60;

function assume(board: ReadonlyBoard, cell: CellIndex, value: number, advance: Advance, maxRounds: number = MAX_ROUNDS): Propagation {
    const next = board.clone();
    if (next.place(cell, value).result !== 'placed') {
        return { board: next, contradiction: true };
    }
    for (let round = 0; round < maxRounds; round++) {
        if (next.hasContradiction()) {
            return { board: next, contradiction: true };
        }
        const outcome = advance(next);
        if (outcome === 'contradiction') {
            return { board: next, contradiction: true };
        }
        if (outcome === 'done') {
            break;
        }
    }
    return { board: next, contradiction: next.hasContradiction() };
}

// One round of naked and hidden singles
function placeSingles(board: Board): ReturnType<Advance> {
    let progress = false;
    for (let cell = 0; cell < NUM_CELLS; cell++) {
        const mask = board.candidates(cell);
        if (board.isEmpty(cell) && popcount(mask) === 1) {
            if (board.place(cell, minValue(mask)).result !== 'placed') {
                return 'contradiction';
            }
            progress = true;
        }
    }
    for (const region of board.regions) {
        for (const value of valuesList(ALL_VALUES & ~board.placedMask(region.index))) {
            const positions = board.positions(region.index, value);
            if (popcount(positions) !== 1) {
                continue;
            }
            if (board.place(region.cells[firstSlot(positions)], value).result !== 'placed') {
                return 'contradiction';
            }
            progress = true;
        }
    }
    return progress ? 'progress' : 'done';
}

export function propagateSingles(board: ReadonlyBoard, cell: CellIndex, value: number): Propagation {
    return assume(board, cell, value, placeSingles);
}

// Applies the first move any of the steps finds, lightest step first
export function propagateSteps(board: ReadonlyBoard, cell: CellIndex, value: number, steps: readonly LogicalStep[], maxMoves: number): Propagation {
    return assume(
        board,
        cell,
        value,
        next => {
            for (const step of steps) {
                const move = step.first(next);
                if (move !== null) {
                    return applyMoveToBoard(next, move).result === 'applied' ? 'progress' : 'contradiction';
                }
            }
            return 'done';
        },
        maxMoves
    );
}

// What every branch agrees on: a placement, else the candidates all of them remove
function commonOutcome(board: ReadonlyBoard, branches: Board[]): Candidate | Candidate[] {
    for (let cell = 0; cell < NUM_CELLS; cell++) {
        if (!board.isEmpty(cell)) {
            continue;
        }
        const value = branches[0].values[cell];
        if (value !== 0 && branches.every(branch => branch.values[cell] === value)) {
            return { cell, value };
        }
    }

    const elims: Candidate[] = [];
    for (let cell = 0; cell < NUM_CELLS; cell++) {
        if (!board.isEmpty(cell)) {
            continue;
        }
        for (const value of valuesList(board.candidates(cell))) {
            if (branches.every(branch => !hasValue(branch.candidates(cell), value))) {
                elims.push({ cell, value });
            }
        }
    }
    return elims;
}

function cellsByCandidateCount(board: ReadonlyBoard, min: number, max: number): CellIndex[] {
    const cells: CellIndex[] = [];
    for (let cell = 0; cell < NUM_CELLS; cell++) {
        const count = popcount(board.candidates(cell));
        if (board.isEmpty(cell) && count >= min && count <= max) {
            cells.push(cell);
        }
    }
    return cells.sort((a, b) => popcount(board.candidates(a)) - popcount(board.candidates(b)) || a - b);
}

abstract class ForcingChainStep extends LogicalStep {
    constructor(technique: TechniqueId) {
        super(technique);
    }

    protected propagate(board: ReadonlyBoard, cell: CellIndex, value: number): Propagation {
        return propagateSingles(board, cell, value);
    }

    // Every branch of a cell or house either breaks or agrees on something
    protected conclude(board: ReadonlyBoard, branches: Propagation[], cells: CellIndex[], regions: string[], label: string): Move | null {
        const alive = branches.filter(branch => !branch.contradiction).map(branch => branch.board);
        if (alive.length === 0) {
            return null;
        }
        const outcome = commonOutcome(board, alive);
        if (!Array.isArray(outcome)) {
            return placement(this.technique, outcome.cell, outcome.value, cells, regions, `${label} gives ${cellName(outcome.cell)} = ${outcome.value}.`);
        }
        if (outcome.length === 0) {
            return null;
        }
        return elimination(this.technique, outcome, cells, regions, label);
    }
}

// Assume a candidate and follow singles: a contradiction removes it
export class NishioForcingChain extends ForcingChainStep {
    constructor() {
        super('nishioForcingChain');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        for (const cell of cellsByCandidateCount(board, 2, MAX_BRANCHES)) {
            for (const value of valuesList(board.candidates(cell))) {
                if (this.propagate(board, cell, value).contradiction) {
                    yield elimination(this.technique, [{ cell, value }], [cell], [], `${this.name}: ${cellName(cell)} = ${value} leads to a contradiction`);
                }
            }
        }
    }
}

// Every candidate of one cell leads to the same conclusion
export class CellForcingChain extends ForcingChainStep {
    constructor() {
        super('cellForcingChain');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        for (const cell of cellsByCandidateCount(board, 2, MAX_BRANCHES)) {
            const branches = valuesList(board.candidates(cell)).map(value => this.propagate(board, cell, value));
            const move = this.conclude(board, branches, [cell], [], `${this.name}: every candidate of ${cellName(cell)}`);
            if (move !== null) {
                yield move;
            }
        }
    }
}

// Every place for a value in one house leads to the same conclusion
export class RegionForcingChain extends ForcingChainStep {
    constructor() {
        super('regionForcingChain');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        for (const region of board.regions) {
            for (const value of valuesList(ALL_VALUES & ~board.placedMask(region.index))) {
                const positions = board.positions(region.index, value);
                const count = popcount(positions);
                if (count < 2 || count > MAX_BRANCHES) {
                    continue;
                }
                const cells = slotsList(positions).map(slot => region.cells[slot]);
                const branches = cells.map(cell => this.propagate(board, cell, value));
                const move = this.conclude(board, branches, cells, [region.name], `${this.name}: every ${value} in ${region.name}`);
                if (move !== null) {
                    yield move;
                }
            }
        }
    }
}

// Like the cell chain, but each branch runs the given steps instead of singles alone
export class DynamicForcingChain extends ForcingChainStep {
    private steps: readonly LogicalStep[];

    constructor(steps: readonly LogicalStep[]) {
        super('dynamicForcingChain');
        this.steps = steps;
    }

    protected propagate(board: ReadonlyBoard, cell: CellIndex, value: number): Propagation {
        return propagateSteps(board, cell, value, this.steps, DYNAMIC_MAX_MOVES);
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        for (const cell of cellsByCandidateCount(board, 2, 2)) {
            const branches = valuesList(board.candidates(cell)).map(value => ({ value, ...this.propagate(board, cell, value) }));
            const broken = branches.filter(branch => branch.contradiction);
            for (const { value } of broken) {
                yield elimination(this.technique, [{ cell, value }], [cell], [], `${this.name}: ${cellName(cell)} = ${value} leads to a contradiction`);
            }
            if (broken.length > 0) {
                continue;
            }
            const move = this.conclude(board, branches, [cell], [], `${this.name}: every candidate of ${cellName(cell)}`);
            if (move !== null) {
                yield move;
            }
        }
    }
}

const MAX_KRAKEN_FINS = 2;

// A finned X-Wing whose fins reach a cover cell through singles: fish or fin, the cell loses the value
export class KrakenFish extends ForcingChainStep {
    constructor() {
        super('krakenFish');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        for (let value = 1; value <= SIZE; value++) {
            // Rows as base lines, then columns
            for (const offset of [0, SIZE]) {
                for (let line1 = 0; line1 < SIZE; line1++) {
                    for (let line2 = line1 + 1; line2 < SIZE; line2++) {
                        const move = this.fromBase(board, value, offset + line1, offset + line2);
                        if (move !== null) {
                            yield move;
                        }
                    }
                }
            }
        }
    }

    private fromBase(board: ReadonlyBoard, value: number, base1: number, base2: number): Move | null {
        const positions1 = board.positions(base1, value);
        const positions2 = board.positions(base2, value);
        const coverSlots = positions1 & positions2;
        if (popcount(coverSlots) !== 2) {
            return null;
        }
        const fins = [
            ...slotsList(positions1 & ~coverSlots).map(slot => board.regions[base1].cells[slot]),
            ...slotsList(positions2 & ~coverSlots).map(slot => board.regions[base2].cells[slot]),
        ];
        if (fins.length === 0 || fins.length > MAX_KRAKEN_FINS) {
            return null;
        }

        // Cover lines cross the base lines at the same slots
        const coverOffset = base1 < SIZE ? SIZE : 0;
        const covers = slotsList(coverSlots).map(slot => board.regions[coverOffset + slot]);
        const baseLines = [board.regions[base1], board.regions[base2]];
        const targets = covers.flatMap(cover =>
            cover.cells.filter(cell => hasValue(board.candidates(cell), value) && board.isEmpty(cell) && !baseLines.some(line => line.cells.includes(cell)))
        );
        if (targets.length === 0) {
            return null;
        }

        const branches = fins.map(fin => this.propagate(board, fin, value));
        const elims = targets
            .filter(target => branches.every(branch => branch.contradiction || !hasValue(branch.board.candidates(target), value)))
            .map(cell => ({ cell, value }));
        if (elims.length === 0) {
            return null;
        }

        const names = [...baseLines, ...covers].map(region => region.name);
        return elimination(
            this.technique,
            elims,
            fins,
            names,
            `${this.name} on ${value}: ${names.slice(0, 2).join(', ')} / ${names.slice(2).join(', ')} fins ${value}${compactName(fins)}`
        );
    }
}
