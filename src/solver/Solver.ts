import { Board, ReadonlyBoard } from './Board';
import { DispatchState } from './Enums/DispatchState';
import { LogicalStep } from './LogicalStep/LogicalStep';
import { createLogicalStep, logicalSteps } from './LogicalSteps';
import { Move, applyMoveToBoard } from './Move';
import { ALL_VALUES, NUM_CELLS, cellName, hasValue, valueBit } from './SolveUtility';

export type RatingPolicyName = 'max' | 'sum';
export type RatingPolicy = (weights: number[]) => number;

export const ratingPolicies: Record<RatingPolicyName, RatingPolicy> = {
    // Hardest technique needed
    max: weights => weights.reduce((max, weight) => Math.max(max, weight), 0),
    // Total effort over the whole trail
    sum: weights => Math.round(weights.reduce((sum, weight) => sum + weight, 0) * 10) / 10,
};

export type SolveOptions = {
    // Allows techniques that are only valid for puzzles with a single solution
    uniquenessVerified?: boolean;
    // Techniques and moves heavier than this are not used
    maxWeight?: number;
    ratingPolicy?: RatingPolicyName | RatingPolicy;
    // Maximum number of moves to apply before giving up
    maxMoves?: number;
};

export type SolveStepResult = { result: 'move'; move: Move } | { result: 'stuck'; solved: boolean } | { result: 'invalid'; reason: string };

export type LogicalSolveResult = {
    state: DispatchState.SOLVED | DispatchState.STUCK;
    // Set when the grid turned out to contradict itself
    invalid?: string;
    trail: Move[];
    board: Board;
};

export type RateResult =
    | { result: 'rating'; rating: number; trail: Move[] }
    | { result: 'unratable'; reason: 'stuck' | 'contradiction'; trail: Move[]; board: Board };

const DEFAULT_MAX_MOVES = 2000;

export function resolveRatingPolicy(policy: RatingPolicyName | RatingPolicy | undefined): RatingPolicy {
    if (policy === undefined) {
        return ratingPolicies.max;
    }
    return typeof policy === 'function' ? policy : ratingPolicies[policy];
}

const backtracking = createLogicalStep('backtracking');

export class Solver {
    private steps: readonly LogicalStep[];
    private options: SolveOptions;

    constructor(options: SolveOptions = {}, steps: readonly LogicalStep[] = logicalSteps) {
        this.options = options;
        const { uniquenessVerified = false, maxWeight = Infinity } = options;
        this.steps = steps.filter(step => (uniquenessVerified || !step.info.assumesUniqueness) && step.weight <= maxWeight);
    }

    get enabledSteps(): readonly LogicalStep[] {
        return this.steps;
    }

    // The first move of the lowest-weight technique that finds anything
    nextMove(board: ReadonlyBoard): SolveStepResult {
        if (board.isComplete()) {
            return { result: 'stuck', solved: true };
        }
        const contradiction = describeContradiction(board);
        if (contradiction !== null) {
            return { result: 'invalid', reason: contradiction };
        }

        const { maxWeight = Infinity } = this.options;
        for (const step of this.steps) {
            for (const move of step.moves(board)) {
                if (move.weight <= maxWeight) {
                    return { result: 'move', move };
                }
            }
        }
        return { result: 'stuck', solved: false };
    }

    // Hints fall back to a searched solution value once no technique applies
    hintMove(board: ReadonlyBoard): SolveStepResult {
        const next = this.nextMove(board);
        if (next.result !== 'stuck' || next.solved) {
            return next;
        }
        const guess = backtracking.first(board);
        return guess === null ? next : { result: 'move', move: guess };
    }

    logicalSolve(input: ReadonlyBoard): LogicalSolveResult {
        const board = input.clone();
        const trail: Move[] = [];
        const maxMoves = this.options.maxMoves ?? DEFAULT_MAX_MOVES;

        let state: DispatchState = DispatchState.SCANNING;
        let pending: Move | null = null;
        while (true) {
            switch (state) {
                case DispatchState.SCANNING: {
                    const next = this.nextMove(board);
                    if (next.result === 'move' && trail.length < maxMoves) {
                        pending = next.move;
                        state = DispatchState.APPLYING;
                    } else if (next.result === 'invalid') {
                        return { state: DispatchState.STUCK, invalid: next.reason, trail, board };
                    } else {
                        state = DispatchState.STUCK;
                    }
                    break;
                }
                case DispatchState.APPLYING: {
                    if (pending === null) {
                        throw new Error('No move to apply');
                    }
                    const applied = applyMoveToBoard(board, pending);
                    if (applied.result === 'invalid') {
                        return { state: DispatchState.STUCK, invalid: applied.reason, trail, board };
                    }
                    trail.push(pending);
                    pending = null;
                    state = DispatchState.SCANNING;
                    break;
                }
                default:
                    // Stuck with every cell filled is solved
                    return { state: board.isComplete() ? DispatchState.SOLVED : DispatchState.STUCK, trail, board };
            }
        }
    }

    rate(board: ReadonlyBoard): RateResult {
        const solve = this.logicalSolve(board);
        if (solve.invalid !== undefined) {
            return { result: 'unratable', reason: 'contradiction', trail: solve.trail, board: solve.board };
        }
        if (solve.state !== DispatchState.SOLVED) {
            return { result: 'unratable', reason: 'stuck', trail: solve.trail, board: solve.board };
        }
        const policy = resolveRatingPolicy(this.options.ratingPolicy);
        return { result: 'rating', rating: policy(solve.trail.map(move => move.weight)), trail: solve.trail };
    }
}

export function describeContradiction(board: ReadonlyBoard): string | null {
    for (let cell = 0; cell < NUM_CELLS; cell++) {
        if (board.isEmpty(cell) && board.candidates(cell) === 0) {
            return `${cellName(cell)} has no candidates left`;
        }
    }
    for (const region of board.regions) {
        let placed = 0;
        let available = 0;
        for (const cell of region.cells) {
            const value = board.values[cell];
            if (value !== 0) {
                if (hasValue(placed, value)) {
                    return `${region.name} contains ${value} more than once`;
                }
                placed |= valueBit(value);
            } else {
                available |= board.candidates(cell);
            }
        }
        if ((placed | available) !== ALL_VALUES) {
            return `${region.name} has nowhere to place some value`;
        }
    }
    return null;
}
