import { acceptsTier, bandDistance, generatorConfigs, isTier, tierForRating, tierMinRating, tiers } from '../src/solver/Difficulty';

describe('tierForRating', () => {
    it('maps ratings onto bands', () => {
        expect(tierForRating(1.0)).toBe('beginner');
        expect(tierForRating(2.0)).toBe('beginner');
        expect(tierForRating(2.2)).toBe('easy');
        expect(tierForRating(2.8)).toBe('medium');
        expect(tierForRating(3.8)).toBe('intermediate');
        expect(tierForRating(4.2)).toBe('hard');
        expect(tierForRating(5.0)).toBe('expert');
        expect(tierForRating(6.6)).toBe('master');
        expect(tierForRating(8.0)).toBe('extreme');
    });

    it('puts anything above the last band in extreme', () => {
        expect(tierForRating(12)).toBe('extreme');
    });
});

describe('bands', () => {
    it('start where the previous tier ends', () => {
        expect(tierMinRating('beginner')).toBe(0);
        expect(tierMinRating('expert')).toBe(4.5);
    });

    it('measure distance outside the band', () => {
        expect(bandDistance(5.0, 'expert')).toBe(0);
        expect(bandDistance(5.0, 'hard')).toBe(0.5);
        expect(bandDistance(4.0, 'expert')).toBe(0.5);
        expect(bandDistance(1.0, 'beginner')).toBe(0);
    });

    it('accept the target or one tier easier', () => {
        expect(acceptsTier('medium', 'medium')).toBe(true);
        expect(acceptsTier('medium', 'easy')).toBe(true);
        expect(acceptsTier('medium', 'beginner')).toBe(false);
        expect(acceptsTier('medium', 'intermediate')).toBe(false);
        expect(acceptsTier('beginner', 'beginner')).toBe(true);
    });
});

describe('generator configs', () => {
    it('cover every tier with sane ranges', () => {
        for (const tier of tiers) {
            const config = generatorConfigs[tier];
            expect(config.minGivens).toBeGreaterThanOrEqual(17);
            expect(config.minGivens).toBeLessThanOrEqual(config.maxGivens);
            expect(config.maxAttempts).toBeGreaterThan(0);
        }
    });

    it('drop symmetry only for extreme puzzles', () => {
        expect(generatorConfigs.extreme.symmetry).toBe('none');
        expect(generatorConfigs.medium.symmetry).toBe('rotational180');
    });

    it('recognise tier names', () => {
        expect(isTier('master')).toBe(true);
        expect(isTier('Master')).toBe(false);
    });
});
