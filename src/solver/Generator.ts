import { Logger, noopLogger } from '../Logger';
import { Board } from './Board';
import { DispatchState } from './Enums/DispatchState';
import { GeneratorConfig, Tier, acceptsTier, bandDistance, generatorConfigs, tierIndex, tierForRating } from './Difficulty';
import { Move } from './Move';
import { Random, randomSeed } from './Random';
import { CellValue, NUM_CELLS, SIZE, cellIndex } from './SolveUtility';
import { RatingPolicy, RatingPolicyName, Solver } from './Solver';
import { SymmetryMode, orbit } from './Symmetry';
import { countSolutions, findSolution } from './Verifier';

// What to return when no attempt lands in the requested band:
// closest returns the best attempt seen, adjacent only one within a tier of the target, none fails
export type FallbackPolicy = 'closest' | 'adjacent' | 'none';

export interface GenerateOptions {
    difficulty?: Tier;
    symmetry?: SymmetryMode;
    seed?: number;
    maxAttempts?: number;
    fallback?: FallbackPolicy;
    ratingPolicy?: RatingPolicyName | RatingPolicy;
    logger?: Logger;
}

export interface GeneratedPuzzle {
    givens: CellValue[];
    solution: CellValue[];
    rating: number;
    // Tier the rating falls in, which can differ from the target after a fallback
    tier: Tier;
    target: Tier;
    symmetry: SymmetryMode;
    seed: number;
    attempts: number;
    trail: Move[];
}

export type GenerateResult =
    | { result: 'puzzle'; puzzle: GeneratedPuzzle }
    | { result: 'generation failed'; reason: string; attempts: number }
    | { result: 'cancelled' };

const DEFAULT_TIER: Tier = 'medium';

// Boxes 1, 5 and 9 share no house, so any fill of them extends to a full solution
const diagonalBoxCells: number[][] = [0, 4, 8].map(box => {
    const row0 = Math.floor(box / 3) * 3;
    const col0 = (box % 3) * 3;
    return Array.from({ length: SIZE }, (_, i) => cellIndex(row0 + Math.floor(i / 3), col0 + (i % 3)));
});

export function createSolution(random: Random): CellValue[] {
    const values: CellValue[] = new Array(NUM_CELLS).fill(0);
    for (const cells of diagonalBoxCells) {
        const digits = random.shuffle([1, 2, 3, 4, 5, 6, 7, 8, 9]);
        cells.forEach((cell, i) => (values[cell] = digits[i]));
    }
    const solution = findSolution(values, random);
    if (solution === null) {
        throw new Error('Diagonal boxes could not be completed');
    }
    return solution;
}

function solvesWithin(solver: Solver, values: CellValue[]): boolean {
    const created = Board.create(values);
    if (created.result !== 'board') {
        throw new Error('Removing givens produced a conflict');
    }
    return solver.logicalSolve(created.board).state === DispatchState.SOLVED;
}

/**
 * Removes givens from a full solution, orbit by orbit in random order, keeping the puzzle unique.
 * Stops at the tier's minimum number of givens.
 */
export function removeGivens(solution: CellValue[], random: Random, config: GeneratorConfig, symmetry: SymmetryMode): CellValue[] {
    const values = solution.slice();
    const restricted = config.removalCeiling === null ? null : new Solver({ maxWeight: config.removalCeiling });
    const order = random.shuffle(Array.from({ length: NUM_CELLS }, (_, cell) => cell));

    let givens = NUM_CELLS;
    for (const cell of order) {
        if (givens <= config.minGivens) {
            break;
        }
        if (values[cell] === 0) {
            continue;
        }
        const cells = orbit(cell, symmetry);
        if (givens - cells.length < config.minGivens) {
            continue;
        }

        for (const removed of cells) {
            values[removed] = 0;
        }
        if (countSolutions(values) === 1 && (restricted === null || solvesWithin(restricted, values))) {
            givens -= cells.length;
        } else {
            for (const restored of cells) {
                values[restored] = solution[restored];
            }
        }
    }
    return values;
}

type Attempt = { givens: CellValue[]; solution: CellValue[]; rating: number; tier: Tier; trail: Move[]; attempt: number };

// One generation run. Attempts are stepped one at a time so the async driver can yield between them.
class GenerationRun {
    readonly target: Tier;
    readonly symmetry: SymmetryMode;
    readonly seed: number;
    private config: GeneratorConfig;
    private maxAttempts: number;
    private fallback: FallbackPolicy;
    private logger: Logger;
    private random: Random;
    private rater: Solver;
    private attempts = 0;
    private best: Attempt | null = null;

    constructor(options: GenerateOptions) {
        this.target = options.difficulty ?? DEFAULT_TIER;
        this.config = generatorConfigs[this.target];
        this.symmetry = options.symmetry ?? this.config.symmetry;
        this.seed = options.seed ?? randomSeed();
        this.maxAttempts = options.maxAttempts ?? this.config.maxAttempts;
        this.fallback = options.fallback ?? 'closest';
        this.logger = options.logger ?? noopLogger;
        this.random = new Random(this.seed);
        this.rater = new Solver({ uniquenessVerified: true, ratingPolicy: options.ratingPolicy });
    }

    private get givenRange(): string {
        return `${this.config.minGivens}-${this.config.maxGivens}`;
    }

    get done(): boolean {
        return this.attempts >= this.maxAttempts;
    }

    // Returns a result once an attempt is accepted
    step(): GenerateResult | null {
        this.attempts++;
        const random = new Random(this.random.nextUint32());
        const solution = createSolution(random);
        const givens = removeGivens(solution, random, this.config, this.symmetry);
        const givenCount = givens.filter(value => value !== 0).length;

        const created = Board.create(givens);
        if (created.result !== 'board') {
            throw new Error('Generated givens conflict');
        }
        const rated = this.rater.rate(created.board);
        if (rated.result !== 'rating') {
            this.logger.debug(`Attempt ${this.attempts}: ${givenCount} givens, unratable (${rated.reason})`);
            return null;
        }

        const tier = tierForRating(rated.rating);
        this.logger.debug(`Attempt ${this.attempts}: ${givenCount} givens, rating ${rated.rating} (${tier})`);
        const attempt: Attempt = { givens, solution, rating: rated.rating, tier, trail: rated.trail, attempt: this.attempts };

        // Attempts outside the tier's given count are never returned, not even as a fallback
        if (givenCount < this.config.minGivens || givenCount > this.config.maxGivens) {
            return null;
        }
        if (acceptsTier(this.target, tier)) {
            return this.accept(attempt);
        }
        if (this.best === null || bandDistance(attempt.rating, this.target) < bandDistance(this.best.rating, this.target)) {
            this.best = attempt;
        }
        return null;
    }

    finish(): GenerateResult {
        const best = this.best;
        if (best === null) {
            this.logger.warn(`No ratable ${this.target} puzzle with ${this.givenRange} givens after ${this.attempts} attempts`);
            return {
                result: 'generation failed',
                reason: `No ratable puzzle with ${this.givenRange} givens after ${this.attempts} attempts`,
                attempts: this.attempts,
            };
        }

        const distance = Math.abs(tierIndex(best.tier) - tierIndex(this.target));
        if (this.fallback === 'none' || (this.fallback === 'adjacent' && distance > 1)) {
            this.logger.warn(`No ${this.target} puzzle after ${this.attempts} attempts, closest was ${best.tier} (${best.rating})`);
            return {
                result: 'generation failed',
                reason: `No ${this.target} puzzle after ${this.attempts} attempts`,
                attempts: this.attempts,
            };
        }

        this.logger.warn(`Falling back to a ${best.tier} puzzle (${best.rating}) for ${this.target}`);
        return this.accept(best);
    }

    private accept(attempt: Attempt): GenerateResult {
        return {
            result: 'puzzle',
            puzzle: {
                givens: attempt.givens,
                solution: attempt.solution,
                rating: attempt.rating,
                tier: attempt.tier,
                target: this.target,
                symmetry: this.symmetry,
                seed: this.seed,
                attempts: this.attempts,
                trail: attempt.trail,
            },
        };
    }
}

/**
 * Generates a uniquely solvable puzzle for the target tier.
 * The same difficulty, symmetry and seed always give the same puzzle.
 */
export function generate(options: GenerateOptions = {}): GenerateResult {
    const run = new GenerationRun(options);
    while (!run.done) {
        const result = run.step();
        if (result !== null) {
            return result;
        }
    }
    return run.finish();
}

// Same as generate, but yields to the event loop between attempts and stops when isCancelled returns true
export async function generateAsync(options: GenerateOptions = {}, isCancelled?: () => boolean): Promise<GenerateResult> {
    const run = new GenerationRun(options);
    while (!run.done) {
        await new Promise(resolve => setTimeout(resolve, 0));
        if (isCancelled && isCancelled()) {
            return { result: 'cancelled' };
        }
        const result = run.step();
        if (result !== null) {
            return result;
        }
    }
    return run.finish();
}
