export type TechniqueFamily =
    | 'singles'
    | 'locked candidates'
    | 'subsets'
    | 'fish'
    | 'wings'
    | 'coloring'
    | 'almost locked sets'
    | 'chains'
    | 'uniqueness'
    | 'forcing'
    | 'guessing';

export type TechniqueId =
    | 'fullHouse'
    | 'hiddenSingleBox'
    | 'hiddenSingleLine'
    | 'nakedSingle'
    | 'pointing'
    | 'claiming'
    | 'nakedPair'
    | 'xWing'
    | 'hiddenPair'
    | 'finnedXWing'
    | 'nakedTriple'
    | 'swordfish'
    | 'hiddenTriple'
    | 'finnedSwordfish'
    | 'skyscraper'
    | 'twoStringKite'
    | 'xyWing'
    | 'xyzWing'
    | 'wWing'
    | 'xChain'
    | 'emptyRectangle'
    | 'uniqueRectangle1'
    | 'avoidableRectangle'
    | 'wxyzWing'
    | 'uniqueRectangle2'
    | 'hiddenRectangle'
    | 'uniqueRectangle4'
    | 'nakedQuad'
    | 'medusa'
    | 'sueDeCoq'
    | 'jellyfish'
    | 'finnedJellyfish'
    | 'hiddenQuad'
    | 'alsXz'
    | 'frankenFish'
    | 'siameseFish'
    | 'extendedUniqueRectangle'
    | 'bugPlusOne'
    | 'aic'
    | 'alignedPairExclusion'
    | 'mutantFish'
    | 'alsXyWing'
    | 'alsChain'
    | 'alignedTripletExclusion'
    | 'nishioForcingChain'
    | 'krakenFish'
    | 'cellForcingChain'
    | 'deathBlossom'
    | 'regionForcingChain'
    | 'dynamicForcingChain'
    | 'backtracking';

export interface TechniqueInfo {
    name: string;
    family: TechniqueFamily;
    // Base weight on the rating scale; also fixes the dispatch order
    weight: number;
    // Upper bound for techniques whose weight grows with the size of the pattern
    maxWeight: number;
    // Only valid once the grid is known to have a single solution
    assumesUniqueness: boolean;
}

function info(name: string, family: TechniqueFamily, weight: number, maxWeight: number = weight): TechniqueInfo {
    return { name, family, weight, maxWeight, assumesUniqueness: family === 'uniqueness' };
}

// Listed in dispatch order. Ties on weight keep this order.
export const techniques = {
    fullHouse: info('Full House', 'singles', 1.0),
    hiddenSingleBox: info('Hidden Single', 'singles', 1.2),
    hiddenSingleLine: info('Hidden Single', 'singles', 1.5),
    nakedSingle: info('Naked Single', 'singles', 2.0),
    pointing: info('Pointing', 'locked candidates', 2.2),
    claiming: info('Claiming', 'locked candidates', 2.4),
    nakedPair: info('Naked Pair', 'subsets', 3.0),
    xWing: info('X-Wing', 'fish', 3.2),
    hiddenPair: info('Hidden Pair', 'subsets', 3.4),
    finnedXWing: info('Finned X-Wing', 'fish', 3.4),
    nakedTriple: info('Naked Triple', 'subsets', 3.6),
    swordfish: info('Swordfish', 'fish', 3.8),
    hiddenTriple: info('Hidden Triple', 'subsets', 3.8),
    finnedSwordfish: info('Finned Swordfish', 'fish', 4.0),
    skyscraper: info('Skyscraper', 'wings', 4.0),
    twoStringKite: info('2-String Kite', 'wings', 4.1),
    xyWing: info('XY-Wing', 'wings', 4.2),
    xyzWing: info('XYZ-Wing', 'wings', 4.4),
    wWing: info('W-Wing', 'wings', 4.4),
    xChain: info('X-Chain', 'chains', 4.5, 5.5),
    emptyRectangle: info('Empty Rectangle', 'wings', 4.6),
    uniqueRectangle1: info('Unique Rectangle Type 1', 'uniqueness', 4.6),
    avoidableRectangle: info('Avoidable Rectangle', 'uniqueness', 4.6),
    wxyzWing: info('WXYZ-Wing', 'wings', 4.6),
    uniqueRectangle2: info('Unique Rectangle Type 2', 'uniqueness', 4.7),
    hiddenRectangle: info('Hidden Rectangle', 'uniqueness', 4.7),
    uniqueRectangle4: info('Unique Rectangle Type 4', 'uniqueness', 4.8),
    nakedQuad: info('Naked Quad', 'subsets', 5.0),
    medusa: info('3D Medusa', 'coloring', 5.0),
    sueDeCoq: info('Sue de Coq', 'almost locked sets', 5.0),
    jellyfish: info('Jellyfish', 'fish', 5.2),
    finnedJellyfish: info('Finned Jellyfish', 'fish', 5.4),
    hiddenQuad: info('Hidden Quad', 'subsets', 5.4),
    alsXz: info('ALS-XZ', 'almost locked sets', 5.5, 6.0),
    siameseFish: info('Siamese Fish', 'fish', 5.5, 5.7),
    frankenFish: info('Franken Fish', 'fish', 5.5, 5.7),
    extendedUniqueRectangle: info('Extended Unique Rectangle', 'uniqueness', 5.5),
    bugPlusOne: info('BUG+1', 'uniqueness', 5.6),
    aic: info('AIC', 'chains', 6.0, 7.0),
    alignedPairExclusion: info('Aligned Pair Exclusion', 'almost locked sets', 6.2),
    mutantFish: info('Mutant Fish', 'fish', 6.5),
    alsXyWing: info('ALS-XY-Wing', 'almost locked sets', 7.0, 7.4),
    alsChain: info('ALS Chain', 'almost locked sets', 7.5, 8.5),
    alignedTripletExclusion: info('Aligned Triplet Exclusion', 'almost locked sets', 7.5),
    nishioForcingChain: info('Nishio Forcing Chain', 'forcing', 7.5),
    krakenFish: info('Kraken Fish', 'forcing', 8.0),
    cellForcingChain: info('Cell Forcing Chain', 'forcing', 8.3),
    deathBlossom: info('Death Blossom', 'almost locked sets', 8.5),
    regionForcingChain: info('Region Forcing Chain', 'forcing', 8.5),
    dynamicForcingChain: info('Dynamic Forcing Chain', 'forcing', 9.3),
    backtracking: info('Backtracking', 'guessing', 11.0),
} satisfies Record<TechniqueId, TechniqueInfo>;

// The steps the dispatcher tries. Backtracking is left out: it only backs up hints once logic is stuck.
export const techniqueIds: TechniqueId[] = [
    'fullHouse',
    'hiddenSingleBox',
    'hiddenSingleLine',
    'nakedSingle',
    'pointing',
    'claiming',
    'nakedPair',
    'xWing',
    'hiddenPair',
    'finnedXWing',
    'nakedTriple',
    'swordfish',
    'hiddenTriple',
    'finnedSwordfish',
    'skyscraper',
    'twoStringKite',
    'xyWing',
    'xyzWing',
    'wWing',
    'xChain',
    'emptyRectangle',
    'uniqueRectangle1',
    'avoidableRectangle',
    'wxyzWing',
    'uniqueRectangle2',
    'hiddenRectangle',
    'uniqueRectangle4',
    'nakedQuad',
    'medusa',
    'sueDeCoq',
    'jellyfish',
    'finnedJellyfish',
    'hiddenQuad',
    'alsXz',
    'siameseFish',
    'frankenFish',
    'extendedUniqueRectangle',
    'bugPlusOne',
    'aic',
    'alignedPairExclusion',
    'mutantFish',
    'alsXyWing',
    'alsChain',
    'alignedTripletExclusion',
    'nishioForcingChain',
    'krakenFish',
    'cellForcingChain',
    'deathBlossom',
    'regionForcingChain',
    'dynamicForcingChain',
];

// Clamp a size-dependent weight into the technique's range
export function scaledWeight(id: TechniqueId, extra: number): number {
    const { weight, maxWeight } = techniques[id];
    return Math.round(Math.min(maxWeight, weight + extra) * 10) / 10;
}
