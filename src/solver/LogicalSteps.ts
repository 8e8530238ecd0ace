import { AlignedExclusion } from './LogicalStep/AlignedExclusion';
import { AlsChain, AlsXyWing, AlsXz, DeathBlossom } from './LogicalStep/AlmostLockedSets';
import { AlternatingInferenceChain } from './LogicalStep/AlternatingInferenceChain';
import { Backtracking } from './LogicalStep/Backtracking';
import { EmptyRectangle } from './LogicalStep/EmptyRectangle';
import { Fish } from './LogicalStep/Fish';
import { CellForcingChain, DynamicForcingChain, KrakenFish, NishioForcingChain, RegionForcingChain } from './LogicalStep/ForcingChains';
import { FullHouse, HiddenSingle } from './LogicalStep/HiddenSingle';
import { LockedCandidates } from './LogicalStep/LockedCandidates';
import { LogicalStep } from './LogicalStep/LogicalStep';
import { Medusa } from './LogicalStep/Medusa';
import { NakedSingle } from './LogicalStep/NakedSingle';
import { Skyscraper, TwoStringKite } from './LogicalStep/Skyscraper';
import { HiddenSubset, NakedSubset } from './LogicalStep/Subsets';
import { SueDeCoq } from './LogicalStep/SueDeCoq';
import { AvoidableRectangle, BugPlusOne, ExtendedUniqueRectangle, HiddenRectangle, UniqueRectangle } from './LogicalStep/Uniqueness';
import { WWing, WXYZWing, XYWing, XYZWing } from './LogicalStep/Wings';
import { TechniqueId, techniqueIds, techniques } from './Technique';

// Adding a technique means adding its id, a case here and nothing else
export function createLogicalStep(id: TechniqueId): LogicalStep {
    switch (id) {
        case 'fullHouse':
            return new FullHouse();
        case 'hiddenSingleBox':
            return new HiddenSingle(false);
        case 'hiddenSingleLine':
            return new HiddenSingle(true);
        case 'nakedSingle':
            return new NakedSingle();
        case 'pointing':
            return new LockedCandidates(true);
        case 'claiming':
            return new LockedCandidates(false);
        case 'nakedPair':
            return new NakedSubset(2);
        case 'hiddenPair':
            return new HiddenSubset(2);
        case 'nakedTriple':
            return new NakedSubset(3);
        case 'hiddenTriple':
            return new HiddenSubset(3);
        case 'nakedQuad':
            return new NakedSubset(4);
        case 'hiddenQuad':
            return new HiddenSubset(4);
        case 'xWing':
            return Fish.basic(2, false);
        case 'finnedXWing':
            return Fish.basic(2, true);
        case 'swordfish':
            return Fish.basic(3, false);
        case 'finnedSwordfish':
            return Fish.basic(3, true);
        case 'jellyfish':
            return Fish.basic(4, false);
        case 'finnedJellyfish':
            return Fish.basic(4, true);
        case 'frankenFish':
            return new Fish(id, { kind: 'franken', sizes: [2, 3], fins: 'allowed' });
        case 'siameseFish':
            return new Fish(id, { kind: 'franken', sizes: [2, 3], fins: 'allowed', siamese: true });
        case 'mutantFish':
            return new Fish(id, { kind: 'mutant', sizes: [2, 3], fins: 'allowed' });
        case 'uniqueRectangle1':
            return new UniqueRectangle(1);
        case 'uniqueRectangle2':
            return new UniqueRectangle(2);
        case 'avoidableRectangle':
            return new AvoidableRectangle();
        case 'uniqueRectangle4':
            return new UniqueRectangle(4);
        case 'hiddenRectangle':
            return new HiddenRectangle();
        case 'extendedUniqueRectangle':
            return new ExtendedUniqueRectangle();
        case 'bugPlusOne':
            return new BugPlusOne();
        case 'skyscraper':
            return new Skyscraper();
        case 'twoStringKite':
            return new TwoStringKite();
        case 'xyWing':
            return new XYWing();
        case 'xyzWing':
            return new XYZWing();
        case 'wWing':
            return new WWing();
        case 'wxyzWing':
            return new WXYZWing();
        case 'emptyRectangle':
            return new EmptyRectangle();
        case 'medusa':
            return new Medusa();
        case 'sueDeCoq':
            return new SueDeCoq();
        case 'deathBlossom':
            return new DeathBlossom();
        case 'alignedPairExclusion':
            return new AlignedExclusion(2);
        case 'alignedTripletExclusion':
            return new AlignedExclusion(3);
        case 'alsXz':
            return new AlsXz();
        case 'alsXyWing':
            return new AlsXyWing();
        case 'alsChain':
            return new AlsChain();
        case 'xChain':
            return new AlternatingInferenceChain(true);
        case 'aic':
            return new AlternatingInferenceChain(false);
        case 'nishioForcingChain':
            return new NishioForcingChain();
        case 'krakenFish':
            return new KrakenFish();
        case 'cellForcingChain':
            return new CellForcingChain();
        case 'regionForcingChain':
            return new RegionForcingChain();
        case 'dynamicForcingChain':
            return new DynamicForcingChain(dynamicPropagationSteps());
        case 'backtracking':
            return new Backtracking();
    }
}

// Branches of a dynamic forcing chain run every technique up to the Intermediate tier
const DYNAMIC_PROPAGATION_MAX_WEIGHT = 3.8;

function dynamicPropagationSteps(): LogicalStep[] {
    return techniqueIds
        .filter(id => !techniques[id].assumesUniqueness && techniques[id].weight <= DYNAMIC_PROPAGATION_MAX_WEIGHT)
        .sort((a, b) => techniques[a].weight - techniques[b].weight)
        .map(createLogicalStep);
}

// Every technique, lowest weight first. The sort is stable so equal weights keep table order.
export const logicalSteps: readonly LogicalStep[] = techniqueIds
    .slice()
    .sort((a, b) => techniques[a].weight - techniques[b].weight)
    .map(createLogicalStep);
