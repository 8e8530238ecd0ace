import * as lz from 'lz-string';
import { PuzzleCodeParams, encodePuzzleCode } from './PuzzleCode';
import { Board, PlaceResult, PlaceResultGivenConflict } from './solver/Board';
import { Tier, isTier } from './solver/Difficulty';
import { GeneratedPuzzle } from './solver/Generator';
import { InvalidFormat } from './solver/GridFormat';
import { Move } from './solver/Move';
import { peers } from './solver/Regions';
import { ALL_VALUES, CellIndex, CellMask, CellValue, NUM_CELLS, SIZE, valueBit } from './solver/SolveUtility';
import { Solver } from './solver/Solver';
import { isSymmetryMode } from './solver/Symmetry';

export interface PuzzleInstanceData {
    givens: CellValue[];
    solution: CellValue[];
    rating: number;
    tier: Tier;
    // Generation parameters, when the puzzle can be regenerated from a code
    params?: PuzzleCodeParams;
}

// Player state after one action. Snapshots are never mutated once recorded.
type Snapshot = {
    readonly values: readonly CellValue[];
    // Pencil marks of empty cells
    readonly marks: readonly CellMask[];
};

export type EraseResult = { result: 'erased' } | { result: 'empty'; cell: CellIndex } | PlaceResultGivenConflict;
export type ToggleResult = { result: 'toggled'; marked: boolean } | { result: 'filled'; cell: CellIndex } | PlaceResultGivenConflict;
export type HintResult = { result: 'hint'; move: Move; applied: boolean } | { result: 'stuck'; solved: boolean } | { result: 'invalid'; reason: string };
export type LoadResult = { result: 'instance'; instance: PuzzleInstance } | InvalidFormat;

type SavedState = PuzzleInstanceData & {
    history: Snapshot[];
    cursor: number;
    mistakes: number;
    hintsUsed: number;
};

const hintSolver = new Solver({ uniquenessVerified: true });

/**
 * A puzzle being played: givens, the retained solution, and an undoable history of player actions.
 */
export class PuzzleInstance {
    readonly givens: readonly CellValue[];
    readonly solution: readonly CellValue[];
    readonly rating: number;
    readonly tier: Tier;
    readonly params: PuzzleCodeParams | null;
    mistakes = 0;
    hintsUsed = 0;
    private history: Snapshot[];
    private cursor = 0;

    constructor(data: PuzzleInstanceData) {
        if (data.givens.length !== NUM_CELLS || data.solution.length !== NUM_CELLS) {
            throw new Error(`Expected ${NUM_CELLS} givens and solution values`);
        }
        this.givens = data.givens.slice();
        this.solution = data.solution.slice();
        this.rating = data.rating;
        this.tier = data.tier;
        this.params = data.params ?? null;
        this.history = [{ values: this.givens, marks: new Array(NUM_CELLS).fill(0) }];
    }

    static fromGenerated(puzzle: GeneratedPuzzle): PuzzleInstance {
        return new PuzzleInstance({
            givens: puzzle.givens,
            solution: puzzle.solution,
            rating: puzzle.rating,
            tier: puzzle.tier,
            params: { tier: puzzle.target, symmetry: puzzle.symmetry, seed: puzzle.seed },
        });
    }

    private get current(): Snapshot {
        return this.history[this.cursor];
    }

    get values(): CellValue[] {
        return this.current.values.slice();
    }

    get code(): string | null {
        return this.params === null ? null : encodePuzzleCode(this.params);
    }

    marks(cell: CellIndex): CellMask {
        return this.current.marks[cell];
    }

    isGiven(cell: CellIndex): boolean {
        return this.givens[cell] !== 0;
    }

    // The current grid with candidates derived from the placed values
    board(): Board {
        const created = Board.create(this.givens);
        if (created.result !== 'board') {
            throw new Error('Givens conflict with each other');
        }
        const board = created.board;
        this.current.values.forEach((value, cell) => {
            if (value !== 0 && !this.isGiven(cell) && board.place(cell, value).result !== 'placed') {
                throw new Error('Recorded values conflict with each other');
            }
        });
        return board;
    }

    private record(snapshot: Snapshot) {
        // A new action discards anything that could have been redone
        this.history.splice(this.cursor + 1);
        this.history.push(snapshot);
        this.cursor = this.history.length - 1;
    }

    private placeUnchecked(board: Board, cell: CellIndex, value: CellValue) {
        const marks = this.current.marks.slice();
        marks[cell] = 0;
        for (const peer of peers[cell]) {
            marks[peer] &= ~valueBit(value);
        }
        this.record({ values: board.getValueArray(), marks });
    }

    place(cell: CellIndex, value: CellValue): PlaceResult {
        const board = this.board();
        const result = board.place(cell, value);
        if (result.result !== 'placed' || this.current.values[cell] === value) {
            return result;
        }
        if (value !== this.solution[cell]) {
            this.mistakes++;
        }
        this.placeUnchecked(board, cell, value);
        return result;
    }

    erase(cell: CellIndex): EraseResult {
        if (this.isGiven(cell)) {
            return { result: 'given conflict', cell };
        }
        if (this.current.values[cell] === 0) {
            return { result: 'empty', cell };
        }
        const values = this.current.values.slice();
        values[cell] = 0;
        this.record({ values, marks: this.current.marks });
        return { result: 'erased' };
    }

    toggleCandidate(cell: CellIndex, value: CellValue): ToggleResult {
        if (value < 1 || value > SIZE || !Number.isInteger(value)) {
            throw new Error(`Invalid value ${value}`);
        }
        if (this.isGiven(cell)) {
            return { result: 'given conflict', cell };
        }
        if (this.current.values[cell] !== 0) {
            return { result: 'filled', cell };
        }
        const marks = this.current.marks.slice();
        marks[cell] ^= valueBit(value);
        this.record({ values: this.current.values, marks });
        return { result: 'toggled', marked: (marks[cell] & valueBit(value)) !== 0 };
    }

    get canUndo(): boolean {
        return this.cursor > 0;
    }

    get canRedo(): boolean {
        return this.cursor < this.history.length - 1;
    }

    undo(): boolean {
        if (!this.canUndo) {
            return false;
        }
        this.cursor--;
        return true;
    }

    redo(): boolean {
        if (!this.canRedo) {
            return false;
        }
        this.cursor++;
        return true;
    }

    // Next logical move from the current grid. Placements are applied for the player.
    hint(): HintResult {
        const board = this.board();
        const next = hintSolver.hintMove(board);
        if (next.result !== 'move') {
            return next;
        }
        this.hintsUsed++;
        const move = next.move;
        if (move.kind !== 'placement') {
            return { result: 'hint', move, applied: false };
        }
        if (board.place(move.cell, move.value).result !== 'placed') {
            return { result: 'invalid', reason: `${move.desc} cannot be applied` };
        }
        this.placeUnchecked(board, move.cell, move.value);
        return { result: 'hint', move, applied: true };
    }

    // Cells whose value differs from the solution
    wrongCells(): CellIndex[] {
        const result: CellIndex[] = [];
        this.current.values.forEach((value, cell) => {
            if (value !== 0 && value !== this.solution[cell]) {
                result.push(cell);
            }
        });
        return result;
    }

    isSolved(): boolean {
        return this.current.values.every((value, cell) => value === this.solution[cell]);
    }

    save(): string {
        const state: SavedState = {
            givens: this.givens.slice(),
            solution: this.solution.slice(),
            rating: this.rating,
            tier: this.tier,
            ...(this.params !== null ? { params: this.params } : {}),
            history: this.history,
            cursor: this.cursor,
            mistakes: this.mistakes,
            hintsUsed: this.hintsUsed,
        };
        return lz.compressToBase64(JSON.stringify(state));
    }

    static load(text: string): LoadResult {
        const json = lz.decompressFromBase64(text);
        if (!json) {
            return { result: 'invalid format', reason: 'Saved state could not be decompressed' };
        }
        let parsed: unknown;
        try {
            parsed = JSON.parse(json);
        } catch (error) {
            return { result: 'invalid format', reason: `Saved state is not valid JSON: ${error instanceof Error ? error.message : String(error)}` };
        }
        const state = readSavedState(parsed);
        if (typeof state === 'string') {
            return { result: 'invalid format', reason: state };
        }

        const instance = new PuzzleInstance(state);
        instance.history = state.history;
        instance.cursor = state.cursor;
        instance.mistakes = state.mistakes;
        instance.hintsUsed = state.hintsUsed;
        for (let cursor = 0; cursor < state.history.length; cursor++) {
            instance.cursor = cursor;
            if (state.history[cursor].values.some((value, cell) => instance.isGiven(cell) && value !== instance.givens[cell])) {
                return { result: 'invalid format', reason: `Snapshot ${cursor} overwrites a given` };
            }
            try {
                instance.board();
            } catch (error) {
                return { result: 'invalid format', reason: `Snapshot ${cursor} is not a valid grid: ${error instanceof Error ? error.message : String(error)}` };
            }
        }
        instance.cursor = state.cursor;
        return { result: 'instance', instance };
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCellArray(value: unknown, max: number): value is number[] {
    return Array.isArray(value) && value.length === NUM_CELLS && value.every(item => Number.isInteger(item) && item >= 0 && item <= max);
}

function isCount(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

// The saved state, or the reason it cannot be used
function readSavedState(value: unknown): SavedState | string {
    if (!isRecord(value)) {
        return 'Saved state is not an object';
    }
    const { givens, solution, rating, tier, params, history, cursor, mistakes, hintsUsed } = value;
    if (!isCellArray(givens, SIZE) || !isCellArray(solution, SIZE)) {
        return 'Givens and solution must be 81 values';
    }
    if (typeof rating !== 'number' || typeof tier !== 'string' || !isTier(tier)) {
        return 'Rating or tier is missing';
    }
    if (!Array.isArray(history) || history.length === 0) {
        return 'History is missing';
    }
    const snapshots: Snapshot[] = [];
    for (const entry of history) {
        if (!isRecord(entry)) {
            return 'History contains an invalid snapshot';
        }
        const { values, marks } = entry;
        if (!isCellArray(values, SIZE) || !isCellArray(marks, ALL_VALUES)) {
            return 'History contains an invalid snapshot';
        }
        snapshots.push({ values, marks });
    }
    if (!isCount(cursor) || cursor >= snapshots.length || !isCount(mistakes) || !isCount(hintsUsed)) {
        return 'Counters are invalid';
    }

    let codeParams: PuzzleCodeParams | undefined;
    if (params !== undefined) {
        if (!isRecord(params)) {
            return 'Generation parameters are invalid';
        }
        const { tier: codeTier, symmetry, seed } = params;
        if (typeof codeTier !== 'string' || !isTier(codeTier) || typeof symmetry !== 'string' || !isSymmetryMode(symmetry) || !isCount(seed)) {
            return 'Generation parameters are invalid';
        }
        codeParams = { tier: codeTier, symmetry, seed };
    }

    return { givens, solution, rating, tier, params: codeParams, history: snapshots, cursor, mistakes, hintsUsed };
}
