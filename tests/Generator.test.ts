import { Logger } from '../src/Logger';
import { Board } from '../src/solver/Board';
import { Tier, acceptsTier, generatorConfigs, tierForRating, tierIndex } from '../src/solver/Difficulty';
import { createSolution, generate, generateAsync, removeGivens } from '../src/solver/Generator';
import { Random } from '../src/solver/Random';
import { Solver } from '../src/solver/Solver';
import { countSolutions } from '../src/solver/Verifier';
import { isValidSolution } from './TestUtility';

const givenCount = (values: number[]) => values.filter(value => value !== 0).length;

function mockLogger() {
    return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() } satisfies Logger;
}

describe('createSolution', () => {
    it('fills a valid grid', () => {
        expect(isValidSolution(createSolution(new Random(3)))).toBe(true);
    });

    it('depends only on the seed', () => {
        expect(createSolution(new Random(11))).toEqual(createSolution(new Random(11)));
        expect(createSolution(new Random(11))).not.toEqual(createSolution(new Random(12)));
    });
});

describe('removeGivens', () => {
    it('keeps the puzzle unique and stops at the minimum', () => {
        const solution = createSolution(new Random(5));
        const config = { ...generatorConfigs.intermediate, minGivens: 60 };
        const givens = removeGivens(solution, new Random(5), config, 'rotational180');
        expect(givenCount(givens)).toBeGreaterThanOrEqual(60);
        expect(countSolutions(givens)).toBe(1);
        givens.forEach((value, cell) => {
            if (value !== 0) {
                expect(value).toBe(solution[cell]);
            }
        });
    });

    it('removes cells in symmetric pairs', () => {
        const solution = createSolution(new Random(8));
        const givens = removeGivens(solution, new Random(8), generatorConfigs.easy, 'rotational180');
        givens.forEach((value, cell) => {
            expect(value === 0).toBe(givens[80 - cell] === 0);
        });
    });
});

describe('generate', () => {
    it('makes a unique beginner puzzle solvable with singles', () => {
        const result = generate({ difficulty: 'beginner', seed: 12345 });
        expect(result.result).toBe('puzzle');
        if (result.result !== 'puzzle') {
            return;
        }
        const { puzzle } = result;
        expect(puzzle.tier).toBe('beginner');
        expect(puzzle.target).toBe('beginner');
        expect(puzzle.seed).toBe(12345);
        expect(puzzle.symmetry).toBe('rotational180');
        expect(countSolutions(puzzle.givens)).toBe(1);
        expect(givenCount(puzzle.givens)).toBeGreaterThanOrEqual(45);
        expect(givenCount(puzzle.givens)).toBeLessThanOrEqual(55);
        expect(puzzle.trail.every(move => move.weight <= 2.0)).toBe(true);
        expect(puzzle.rating).toBeLessThanOrEqual(2.0);
        expect(isValidSolution(puzzle.solution)).toBe(true);
    });

    it('gives the same puzzle for the same seed', () => {
        const first = generate({ difficulty: 'beginner', seed: 777 });
        const second = generate({ difficulty: 'beginner', seed: 777 });
        expect(first.result === 'puzzle' && first.puzzle.givens).toEqual(second.result === 'puzzle' && second.puzzle.givens);
    });

    it('honours the symmetry option', () => {
        const result = generate({ difficulty: 'beginner', seed: 4, symmetry: 'vertical' });
        expect(result.result).toBe('puzzle');
        if (result.result === 'puzzle') {
            expect(result.puzzle.symmetry).toBe('vertical');
            result.puzzle.givens.forEach((value, cell) => {
                const mirror = cell - (cell % 9) + (8 - (cell % 9));
                expect(value === 0).toBe(result.puzzle.givens[mirror] === 0);
            });
        }
    });

    it('fails without attempts', () => {
        const logger = mockLogger();
        expect(generate({ difficulty: 'hard', seed: 1, maxAttempts: 0, logger })).toEqual({
            result: 'generation failed',
            reason: 'No ratable puzzle with 24-30 givens after 0 attempts',
            attempts: 0,
        });
        expect(logger.warn).toHaveBeenCalledWith('No ratable hard puzzle with 24-30 givens after 0 attempts');
    });

    it('logs every attempt', () => {
        const logger = mockLogger();
        generate({ difficulty: 'beginner', seed: 12345, logger });
        expect(logger.debug).toHaveBeenCalled();
        expect(logger.debug.mock.calls[0][0]).toMatch(/^Attempt 1: \d+ givens, rating \d(\.\d)? \(beginner\)$/);
    });
});

describe('given bounds', () => {
    const quickTiers: Tier[] = ['beginner', 'easy', 'medium', 'intermediate', 'hard'];

    it.each(quickTiers)('keeps %s puzzles inside the given range', tier => {
        const { minGivens, maxGivens } = generatorConfigs[tier];
        const result = generate({ difficulty: tier, seed: 31, maxAttempts: 2 });
        if (result.result === 'generation failed') {
            expect(result.reason).toBe(`No ratable puzzle with ${minGivens}-${maxGivens} givens after 2 attempts`);
            return;
        }
        expect(result.result).toBe('puzzle');
        if (result.result === 'puzzle') {
            expect(givenCount(result.puzzle.givens)).toBeGreaterThanOrEqual(minGivens);
            expect(givenCount(result.puzzle.givens)).toBeLessThanOrEqual(maxGivens);
        }
    });

    it('never removes below the minimum', () => {
        const solution = createSolution(new Random(21));
        const givens = removeGivens(solution, new Random(21), generatorConfigs.hard, 'none');
        expect(givenCount(givens)).toBeGreaterThanOrEqual(generatorConfigs.hard.minGivens);
    });
});

describe('seeded hard tiers', () => {
    const hardTiers: Tier[] = ['expert', 'master'];
    // Removal re-solves the grid with the heavier techniques after every step
    const slowTimeout = 300000;

    it.each(hardTiers)('generates a unique %s candidate from a seed', tier => {
        const config = generatorConfigs[tier];
        const result = generate({ difficulty: tier, seed: 4242, maxAttempts: 1 });
        if (result.result === 'generation failed') {
            expect(result.reason).toBe(`No ratable puzzle with ${config.minGivens}-${config.maxGivens} givens after 1 attempts`);
            return;
        }
        expect(result.result).toBe('puzzle');
        if (result.result !== 'puzzle') {
            return;
        }
        const { puzzle } = result;
        expect(puzzle.target).toBe(tier);
        expect(puzzle.tier).toBe(tierForRating(puzzle.rating));
        expect(countSolutions(puzzle.givens)).toBe(1);
        expect(givenCount(puzzle.givens)).toBeGreaterThanOrEqual(config.minGivens);
        expect(givenCount(puzzle.givens)).toBeLessThanOrEqual(config.maxGivens);
        expect(isValidSolution(puzzle.solution)).toBe(true);
    }, slowTimeout);

    it('only returns an accepted tier without a fallback', () => {
        const result = generate({ difficulty: 'expert', seed: 4242, maxAttempts: 1, fallback: 'none' });
        if (result.result === 'puzzle') {
            expect(acceptsTier('expert', result.puzzle.tier)).toBe(true);
        } else {
            expect(result.result).toBe('generation failed');
        }
    }, slowTimeout);
});

describe('monotonicity', () => {
    it('never raises the tier when a correct given is added', () => {
        const result = generate({ difficulty: 'beginner', seed: 12345 });
        expect(result.result).toBe('puzzle');
        if (result.result !== 'puzzle') {
            return;
        }
        const { puzzle } = result;
        const rater = new Solver({ uniquenessVerified: true });
        const givens = puzzle.givens.slice();
        const empty = givens.flatMap((value, cell) => (value === 0 ? [cell] : [])).slice(0, 6);
        for (const cell of empty) {
            givens[cell] = puzzle.solution[cell];
            const created = Board.create(givens);
            expect(created.result).toBe('board');
            if (created.result !== 'board') {
                return;
            }
            const rated = rater.rate(created.board);
            expect(rated.result).toBe('rating');
            if (rated.result === 'rating') {
                expect(tierIndex(tierForRating(rated.rating))).toBeLessThanOrEqual(tierIndex(puzzle.tier));
            }
        }
    });
});

describe('generateAsync', () => {
    it('matches the synchronous generator', async () => {
        const asyncResult = await generateAsync({ difficulty: 'beginner', seed: 2024 });
        const syncResult = generate({ difficulty: 'beginner', seed: 2024 });
        expect(asyncResult).toEqual(syncResult);
    });

    it('stops when cancelled', async () => {
        expect(await generateAsync({ difficulty: 'beginner', seed: 1 }, () => true)).toEqual({ result: 'cancelled' });
    });
});
