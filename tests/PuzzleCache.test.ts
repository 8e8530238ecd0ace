import { Logger } from '../src/Logger';
import { PuzzleCache } from '../src/PuzzleCache';
import { Tier } from '../src/solver/Difficulty';
import { GenerateResult, GeneratedPuzzle } from '../src/solver/Generator';
import { patternSolution, patternWithout } from './TestUtility';

function fakePuzzle(tier: Tier, seed: number): GeneratedPuzzle {
    return {
        givens: patternWithout([0, 80]),
        solution: patternSolution(),
        rating: 1.0,
        tier,
        target: tier,
        symmetry: 'rotational180',
        seed,
        attempts: 1,
        trail: [],
    };
}

// Hands out puzzles with increasing seeds and counts the calls
function fakeGenerator() {
    let calls = 0;
    const generate = jest.fn(async (tier: Tier): Promise<GenerateResult> => {
        calls++;
        return { result: 'puzzle', puzzle: fakePuzzle(tier, calls) };
    });
    return generate;
}

function mockLogger() {
    return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() } satisfies Logger;
}

describe('PuzzleCache', () => {
    it('generates on demand and refills in the background', async () => {
        const generate = fakeGenerator();
        const cache = new PuzzleCache({ generate });

        const taken = await cache.take('easy');
        expect(taken.result === 'puzzle' && taken.puzzle.seed).toBe(1);
        expect(generate).toHaveBeenCalledTimes(2);
        expect(cache.isGenerating('easy')).toBe(true);

        await cache.warm();
        expect(cache.has('easy')).toBe(true);
        const next = await cache.take('easy');
        expect(next.result === 'puzzle' && next.puzzle.seed).toBe(2);
        cache.dispose();
    });

    it('hands each waiting caller its own puzzle', async () => {
        const generate = fakeGenerator();
        const cache = new PuzzleCache({ generate, tiers: ['hard'] });

        const [first, second] = await Promise.all([cache.take('hard'), cache.take('hard')]);
        expect(first.result === 'puzzle' && first.puzzle.seed).toBe(1);
        expect(second.result === 'puzzle' && second.puzzle.seed).toBe(2);
        expect(generate).toHaveBeenCalledTimes(3);
        cache.dispose();
    });

    it('fills only the configured tiers when warming', async () => {
        const generate = fakeGenerator();
        const cache = new PuzzleCache({ generate, tiers: ['beginner', 'expert'] });
        await cache.warm();
        expect(generate.mock.calls.map(call => call[0])).toEqual(['beginner', 'expert']);
        expect(cache.has('beginner')).toBe(true);
        expect(cache.has('medium')).toBe(false);
        cache.dispose();
    });

    it('passes failures on and logs them', async () => {
        const logger = mockLogger();
        const generate = jest.fn(async (): Promise<GenerateResult> => ({ result: 'generation failed', reason: 'No hard puzzle after 3 attempts', attempts: 3 }));
        const cache = new PuzzleCache({ generate, logger });

        expect(await cache.take('hard')).toEqual({ result: 'generation failed', reason: 'No hard puzzle after 3 attempts', attempts: 3 });
        expect(logger.error).toHaveBeenCalledWith('Generating a hard puzzle failed: No hard puzzle after 3 attempts');
        expect(cache.isGenerating('hard')).toBe(false);
    });

    it('turns a thrown error into a failure', async () => {
        const logger = mockLogger();
        const error = new Error('test failure');
        const cache = new PuzzleCache({
            generate: async () => {
                throw error;
            },
            logger,
        });

        expect(await cache.take('medium')).toEqual({ result: 'generation failed', reason: 'test failure', attempts: 0 });
        expect(logger.error).toHaveBeenCalledWith('Generating a medium puzzle threw', error);
    });

    it('stops handing out puzzles once disposed', async () => {
        const generate = fakeGenerator();
        const cache = new PuzzleCache({ generate });
        await cache.warm();
        cache.dispose();
        expect(cache.has('easy')).toBe(false);
        expect(await cache.take('easy')).toEqual({ result: 'cancelled' });
    });
});
