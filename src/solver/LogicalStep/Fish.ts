import { ReadonlyBoard } from '../Board';
import { Move, elimination } from '../Move';
import { Region, RegionType, cellRegions, seesAll } from '../Regions';
import { Candidate, CellIndex, NUM_CELLS, SIZE, combinations, compactName, hasValue, slotsList } from '../SolveUtility';
import { TechniqueId, scaledWeight } from '../Technique';
import { LogicalStep } from './LogicalStep';

export type FishKind = 'basic' | 'franken' | 'mutant';

type Orientation = { base: RegionType[]; cover: RegionType[] };

const basicOrientations: Orientation[] = [
    { base: ['row'], cover: ['col'] },
    { base: ['col'], cover: ['row'] },
];
const frankenOrientations: Orientation[] = [
    { base: ['row', 'box'], cover: ['col', 'box'] },
    { base: ['col', 'box'], cover: ['row', 'box'] },
];
const mutantOrientations: Orientation[] = [{ base: ['row', 'col', 'box'], cover: ['row', 'col', 'box'] }];

const basicTechniques: TechniqueId[][] = [
    ['xWing', 'finnedXWing'],
    ['swordfish', 'finnedSwordfish'],
    ['jellyfish', 'finnedJellyfish'],
];

const MAX_FINS = 2;

const cellBits: bigint[] = Array.from({ length: NUM_CELLS }, (_, cell) => 1n << BigInt(cell));

export interface FishOptions {
    kind: FishKind;
    sizes: number[];
    fins: 'none' | 'required' | 'allowed';
    // Merge the finned fish found on one base into a single move
    siamese?: boolean;
}

type FoundFish = { cover: Region[]; fins: CellIndex[]; kind: FishKind; elims: Candidate[] };

function onlyTypes(regions: Region[], types: RegionType[]): boolean {
    return regions.every(region => types.includes(region.type));
}

export function classifyFish(base: Region[], cover: Region[]): FishKind {
    if ((onlyTypes(base, ['row']) && onlyTypes(cover, ['col'])) || (onlyTypes(base, ['col']) && onlyTypes(cover, ['row']))) {
        return 'basic';
    }
    if ((onlyTypes(base, ['row', 'box']) && onlyTypes(cover, ['col', 'box'])) || (onlyTypes(base, ['col', 'box']) && onlyTypes(cover, ['row', 'box']))) {
        return 'franken';
    }
    return 'mutant';
}

// A value confined to the candidates of N base houses, which N cover houses contain.
// Finned fish allow base candidates outside the cover; eliminations must then see every fin.
export class Fish extends LogicalStep {
    private options: FishOptions;

    constructor(technique: TechniqueId, options: FishOptions) {
        super(technique);
        this.options = options;
    }

    static basic(size: 2 | 3 | 4, finned: boolean): Fish {
        const technique = basicTechniques[size - 2][finned ? 1 : 0];
        return new Fish(technique, { kind: 'basic', sizes: [size], fins: finned ? 'required' : 'none' });
    }

    private get orientations(): Orientation[] {
        switch (this.options.kind) {
            case 'basic':
                return basicOrientations;
            case 'franken':
                return frankenOrientations;
            case 'mutant':
                return mutantOrientations;
        }
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        for (let value = 1; value <= SIZE; value++) {
            // Candidate cells of the value for each house that still needs it
            const houseCells = new Map<Region, CellIndex[]>();
            const houseMasks = new Map<Region, bigint>();
            for (const region of board.regions) {
                if (hasValue(board.placedMask(region.index), value)) {
                    continue;
                }
                const cells = slotsList(board.positions(region.index, value)).map(slot => region.cells[slot]);
                if (cells.length === 0) {
                    continue;
                }
                houseCells.set(region, cells);
                houseMasks.set(
                    region,
                    cells.reduce((mask, cell) => mask | cellBits[cell], 0n)
                );
            }

            for (const orientation of this.orientations) {
                const pool = Array.from(houseCells.keys()).filter(region => orientation.base.includes(region.type));
                for (const size of this.options.sizes) {
                    for (const base of combinations(pool, size)) {
                        yield* this.findWithBase(board, value, base, orientation, houseCells, houseMasks);
                    }
                }
            }
        }
    }

    private *findWithBase(
        board: ReadonlyBoard,
        value: number,
        base: Region[],
        orientation: Orientation,
        houseCells: Map<Region, CellIndex[]>,
        houseMasks: Map<Region, bigint>
    ): Generator<Move> {
        const { fins: finRule } = this.options;
        const finned = finRule !== 'none';
        const size = base.length;

        // Base houses must not share candidates
        let baseMask = 0n;
        const baseCells: CellIndex[] = [];
        for (const region of base) {
            const mask = houseMasks.get(region) ?? 0n;
            if ((baseMask & mask) !== 0n) {
                return;
            }
            baseMask |= mask;
            baseCells.push(...(houseCells.get(region) ?? []));
        }
        baseCells.sort((a, b) => a - b);

        const seenCovers = new Set<string>();
        const found: { cover: Region[]; fins: CellIndex[] }[] = [];

        const search = (index: number, cover: Region[], coverMask: bigint, fins: CellIndex[]) => {
            while (index < baseCells.length && (coverMask & cellBits[baseCells[index]]) !== 0n) {
                index++;
            }
            if (index === baseCells.length) {
                // A fin picked before a later cover took it in is not a fin
                const realFins = fins.filter(fin => (coverMask & cellBits[fin]) === 0n);
                if (cover.length !== size || (finRule === 'none' && realFins.length > 0) || (finRule === 'required' && realFins.length === 0)) {
                    return;
                }
                const key = cover
                    .map(region => region.index)
                    .sort((a, b) => a - b)
                    .join(',');
                if (!seenCovers.has(key)) {
                    seenCovers.add(key);
                    found.push({ cover: cover.slice(), fins: realFins });
                }
                return;
            }

            const cell = baseCells[index];
            if (cover.length < size) {
                for (const regionIndex of cellRegions[cell]) {
                    const region = board.regions[regionIndex];
                    if (!orientation.cover.includes(region.type) || base.includes(region) || cover.includes(region)) {
                        continue;
                    }
                    cover.push(region);
                    search(index + 1, cover, coverMask | (houseMasks.get(region) ?? 0n), fins);
                    cover.pop();
                }
            }
            if (finned && fins.length < MAX_FINS) {
                fins.push(cell);
                search(index + 1, cover, coverMask, fins);
                fins.pop();
            }
        };
        search(0, [], 0n, []);

        const fishes: FoundFish[] = [];
        for (const { cover, fins } of found) {
            const kind = classifyFish(base, cover);
            if (this.options.siamese ? kind === 'mutant' || fins.length === 0 : kind !== this.options.kind) {
                continue;
            }

            const elims: Candidate[] = [];
            const elimCells = new Set<CellIndex>();
            for (const region of cover) {
                for (const cell of houseCells.get(region) ?? []) {
                    if ((baseMask & cellBits[cell]) !== 0n || elimCells.has(cell)) {
                        continue;
                    }
                    if (fins.length > 0 && !seesAll(cell, fins)) {
                        continue;
                    }
                    elimCells.add(cell);
                    elims.push({ cell, value });
                }
            }
            if (elims.length > 0) {
                fishes.push({ cover, fins, kind, elims });
            }
        }

        const baseNames = base.map(region => region.name);
        const describe = ({ cover, fins }: FoundFish) => {
            const finDesc = fins.length > 0 ? ` fins ${value}${compactName(fins)}` : '';
            return `${cover.map(region => region.name).join(', ')}${finDesc}`;
        };

        if (this.options.siamese) {
            // Finned fish on the same base, each sound alone, reported as one move
            if (fishes.length < 2) {
                return;
            }
            const elims = new Map<CellIndex, Candidate>();
            for (const fish of fishes) {
                for (const elim of fish.elims) {
                    elims.set(elim.cell, elim);
                }
            }
            if (fishes.every(fish => fish.elims.length === elims.size)) {
                return;
            }
            const covers = Array.from(new Set(fishes.flatMap(fish => fish.cover.map(region => region.name))));
            yield elimination(
                this.technique,
                Array.from(elims.values()),
                [...baseCells],
                [...baseNames, ...covers],
                `${this.name} on ${value}: ${baseNames.join(', ')} / ${fishes.map(describe).join(' + ')}`,
                scaledWeight(this.technique, 0.1 * (size - 2))
            );
            return;
        }

        for (const fish of fishes) {
            const weight = fish.kind === 'franken' ? scaledWeight(this.technique, 0.1 * (size - 2)) : this.weight;
            yield elimination(
                this.technique,
                fish.elims,
                [...baseCells],
                [...baseNames, ...fish.cover.map(region => region.name)],
                `${this.name} on ${value}: ${baseNames.join(', ')} / ${describe(fish)}`,
                weight
            );
        }
    }
}
