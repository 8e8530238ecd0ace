import { PuzzleInstance } from './PuzzleInstance';
import { decodePuzzleCode } from './PuzzleCode';
import { Board, PlaceResult, ReadonlyBoard } from './solver/Board';
import { Tier } from './solver/Difficulty';
import { GenerateOptions, GenerateResult, generate as generatePuzzle } from './solver/Generator';
import { InvalidFormat } from './solver/GridFormat';
import { Move } from './solver/Move';
import { cellName } from './solver/SolveUtility';
import { LogicalSolveResult, RateResult, SolveOptions, SolveStepResult, Solver } from './solver/Solver';
import { SymmetryMode } from './solver/Symmetry';
import { countSolutions } from './solver/Verifier';

export type { Logger } from './Logger';
export { consoleLogger, noopLogger } from './Logger';
export { PuzzleCache } from './PuzzleCache';
export type { GenerateFunction, PuzzleCacheOptions } from './PuzzleCache';
export { CODE_LENGTH, decodePuzzleCode, encodePuzzleCode } from './PuzzleCode';
export type { DecodeResult, PuzzleCodeParams } from './PuzzleCode';
export { PuzzleInstance } from './PuzzleInstance';
export type { EraseResult, HintResult, LoadResult, PuzzleInstanceData, ToggleResult } from './PuzzleInstance';
export { Board } from './solver/Board';
export type { CreateBoardResult, PlaceResult, ReadonlyBoard } from './solver/Board';
export { generatorConfigs, isTier, tierForRating, tierInfo, tiers } from './solver/Difficulty';
export type { GeneratorConfig, Tier, TierInfo } from './solver/Difficulty';
export { DispatchState } from './solver/Enums/DispatchState';
export { generateAsync } from './solver/Generator';
export type { FallbackPolicy, GenerateOptions, GenerateResult, GeneratedPuzzle } from './solver/Generator';
export { EMPTY_CHAR, parseBoard, parseGrid, serializeGrid } from './solver/GridFormat';
export type { InvalidFormat, ParseBoardResult, ParseGridResult } from './solver/GridFormat';
export { describeMove } from './solver/Move';
export type { Elimination, Move, Placement } from './solver/Move';
export { ratingPolicies } from './solver/Solver';
export type { LogicalSolveResult, RateResult, RatingPolicy, RatingPolicyName, SolveOptions, SolveStepResult } from './solver/Solver';
export { isSymmetryMode, orbit, symmetryModes } from './solver/Symmetry';
export type { SymmetryMode } from './solver/Symmetry';
export { techniqueIds, techniques } from './solver/Technique';
export type { TechniqueFamily, TechniqueId, TechniqueInfo } from './solver/Technique';
export { countSolutions, findSolution, isUnique } from './solver/Verifier';
export type { SolutionCount } from './solver/Verifier';

export type GenerateInstanceResult = { result: 'puzzle'; instance: PuzzleInstance } | Exclude<GenerateResult, { result: 'puzzle' }>;

export type HintOutput =
    | { result: 'hint'; move: Move; explanation: string; cells: string[]; houses: string[] }
    | Exclude<SolveStepResult, { result: 'move' }>;

/**
 * Generates a puzzle for the tier and wraps it in a playable instance.
 * @param symmetry - Defaults to the tier's configured symmetry.
 */
export function generate(difficulty: Tier = 'medium', symmetry?: SymmetryMode, options: Omit<GenerateOptions, 'difficulty' | 'symmetry'> = {}): GenerateInstanceResult {
    const result = generatePuzzle({ ...options, difficulty, symmetry });
    if (result.result !== 'puzzle') {
        return result;
    }
    return { result: 'puzzle', instance: PuzzleInstance.fromGenerated(result.puzzle) };
}

// Regenerates the puzzle a shared code stands for
export function generateFromCode(code: string, options: Pick<GenerateOptions, 'logger'> = {}): GenerateInstanceResult | InvalidFormat {
    const decoded = decodePuzzleCode(code);
    if (decoded.result !== 'code') {
        return decoded;
    }
    return generate(decoded.tier, decoded.symmetry, { ...options, seed: decoded.seed });
}

// Uniqueness techniques stay off unless options.uniquenessVerified is set
export function solveStep(grid: ReadonlyBoard, options: SolveOptions = {}): SolveStepResult {
    return new Solver(options).nextMove(grid);
}

// Falls back to a backtracking placement when no technique applies
export function hint(grid: ReadonlyBoard, options: SolveOptions = {}): HintOutput {
    const next = new Solver(options).hintMove(grid);
    if (next.result !== 'move') {
        return next;
    }
    const { move } = next;
    return { result: 'hint', move, explanation: move.desc, cells: move.cells.map(cellName), houses: move.regions };
}

export function logicalSolve(grid: ReadonlyBoard, options: SolveOptions = {}): LogicalSolveResult {
    return new Solver(options).logicalSolve(grid);
}

/**
 * Rates the grid by solving it logically.
 * Unless options.uniquenessVerified is given, the solution count is checked first and
 * uniqueness techniques are only enabled for a grid with exactly one solution.
 */
export function rate(grid: ReadonlyBoard, options: SolveOptions = {}): RateResult {
    let uniquenessVerified = options.uniquenessVerified;
    if (uniquenessVerified === undefined) {
        const count = countSolutions(grid);
        if (count === 0) {
            return { result: 'unratable', reason: 'contradiction', trail: [], board: grid.clone() };
        }
        uniquenessVerified = count === 1;
    }
    return new Solver({ ...options, uniquenessVerified }).rate(grid);
}

export function applyMove(board: Board, cell: number, value: number): PlaceResult {
    return board.place(cell, value);
}
