import { SymmetryMode } from './Symmetry';

export type Tier = 'beginner' | 'easy' | 'medium' | 'intermediate' | 'hard' | 'expert' | 'master' | 'extreme';

export const tiers: readonly Tier[] = ['beginner', 'easy', 'medium', 'intermediate', 'hard', 'expert', 'master', 'extreme'];

export interface TierInfo {
    name: string;
    // Highest rating that still belongs to the tier
    maxRating: number;
    hint: string;
}

export const tierInfo = {
    beginner: { name: 'Beginner', maxRating: 2.0, hint: 'Full houses, hidden singles and naked singles.' },
    easy: { name: 'Easy', maxRating: 2.5, hint: 'Singles plus pointing and claiming.' },
    medium: { name: 'Medium', maxRating: 3.4, hint: 'Naked and hidden pairs, X-Wings.' },
    intermediate: { name: 'Intermediate', maxRating: 3.8, hint: 'Naked and hidden triples, Swordfish.' },
    hard: { name: 'Hard', maxRating: 4.5, hint: 'Skyscrapers, kites, XY-, XYZ- and W-Wings, X-Chains.' },
    expert: { name: 'Expert', maxRating: 5.5, hint: 'Unique rectangles, empty rectangles, 3D Medusa, quads, Jellyfish, ALS-XZ.' },
    master: { name: 'Master', maxRating: 7.0, hint: 'AICs, aligned pair exclusion, Mutant fish, ALS-XY-Wings.' },
    extreme: { name: 'Extreme', maxRating: 11.0, hint: 'ALS chains, Death Blossoms and forcing chains.' },
} satisfies Record<Tier, TierInfo>;

export interface GeneratorConfig {
    minGivens: number;
    maxGivens: number;
    maxAttempts: number;
    symmetry: SymmetryMode;
    // While removing givens, the grid must stay solvable with techniques up to this weight.
    // Null lets removal go as far as uniqueness allows.
    removalCeiling: number | null;
}

export const generatorConfigs = {
    beginner: { minGivens: 45, maxGivens: 55, maxAttempts: 30, symmetry: 'rotational180', removalCeiling: 2.0 },
    easy: { minGivens: 36, maxGivens: 45, maxAttempts: 50, symmetry: 'rotational180', removalCeiling: 2.5 },
    medium: { minGivens: 32, maxGivens: 38, maxAttempts: 100, symmetry: 'rotational180', removalCeiling: 3.4 },
    intermediate: { minGivens: 28, maxGivens: 34, maxAttempts: 150, symmetry: 'rotational180', removalCeiling: 3.8 },
    hard: { minGivens: 24, maxGivens: 30, maxAttempts: 200, symmetry: 'rotational180', removalCeiling: 4.5 },
    expert: { minGivens: 22, maxGivens: 26, maxAttempts: 500, symmetry: 'rotational180', removalCeiling: 5.5 },
    master: { minGivens: 20, maxGivens: 24, maxAttempts: 1000, symmetry: 'rotational180', removalCeiling: 7.0 },
    extreme: { minGivens: 17, maxGivens: 22, maxAttempts: 2000, symmetry: 'none', removalCeiling: null },
} satisfies Record<Tier, GeneratorConfig>;

export function isTier(name: string): name is Tier {
    return tiers.some(tier => tier === name);
}

export function tierIndex(tier: Tier): number {
    return tiers.indexOf(tier);
}

export function tierForRating(rating: number): Tier {
    for (const tier of tiers) {
        if (rating <= tierInfo[tier].maxRating) {
            return tier;
        }
    }
    return 'extreme';
}

// Ratings above this and up to maxRating belong to the tier
export function tierMinRating(tier: Tier): number {
    const index = tierIndex(tier);
    return index === 0 ? 0 : tierInfo[tiers[index - 1]].maxRating;
}

// How far a rating lies outside the band of a tier, 0 when inside
export function bandDistance(rating: number, tier: Tier): number {
    const min = tierMinRating(tier);
    const max = tierInfo[tier].maxRating;
    if (tier !== 'beginner' && rating <= min) {
        return min - rating;
    }
    if (rating > max) {
        return rating - max;
    }
    return 0;
}

// The tier itself, or one tier easier. Beginner must match exactly.
export function acceptsTier(target: Tier, actual: Tier): boolean {
    return actual === target || (target !== 'beginner' && tierIndex(actual) === tierIndex(target) - 1);
}
