import { ReadonlyBoard } from '../Board';
import { Move, elimination } from '../Move';
import { commonPeers, sees } from '../Regions';
import { ALL_VALUES, Candidate, CellIndex, CellMask, NUM_CELLS, cellName, combinations, compactName, hasValue, maskToString, popcount, valueBit, valuesList } from '../SolveUtility';
import { TechniqueId, scaledWeight } from '../Technique';
import { LogicalStep } from './LogicalStep';

// N cells of one house holding exactly N + 1 candidates
export type AlmostLockedSet = {
    cells: CellIndex[];
    mask: CellMask;
    region: string;
};

type AlsLink = { other: number; rccMask: CellMask };

const MAX_ALS_CELLS = 4;
const MAX_CHAIN_LENGTH = 5;
const CHAIN_SEARCH_BUDGET = 20000;

export function findAlmostLockedSets(board: ReadonlyBoard, maxCells: number = MAX_ALS_CELLS): AlmostLockedSet[] {
    const result: AlmostLockedSet[] = [];
    const seen = new Set<string>();
    for (const region of board.regions) {
        const emptyCells = region.cells.filter(cell => board.isEmpty(cell));
        for (let size = 1; size <= Math.min(maxCells, emptyCells.length - 1); size++) {
            for (const cells of combinations(emptyCells, size)) {
                const mask = cells.reduce((acc, cell) => acc | board.candidates(cell), 0);
                if (popcount(mask) !== size + 1) {
                    continue;
                }
                const key = cells.join(',');
                if (seen.has(key)) {
                    continue;
                }
                seen.add(key);
                result.push({ cells, mask, region: region.name });
            }
        }
    }
    return result;
}

export function valueCells(board: ReadonlyBoard, als: AlmostLockedSet, value: number): CellIndex[] {
    return als.cells.filter(cell => hasValue(board.candidates(cell), value));
}

function overlaps(als1: AlmostLockedSet, als2: AlmostLockedSet): boolean {
    return als1.cells.some(cell => als2.cells.includes(cell));
}

// Values shared by both sets whose cells all see each other across the sets
export function restrictedCommons(board: ReadonlyBoard, als1: AlmostLockedSet, als2: AlmostLockedSet): CellMask {
    if (overlaps(als1, als2)) {
        return 0;
    }
    let rccMask = 0;
    for (const value of valuesList(als1.mask & als2.mask)) {
        const cells1 = valueCells(board, als1, value);
        const cells2 = valueCells(board, als2, value);
        if (cells1.every(cell1 => cells2.every(cell2 => sees(cell1, cell2)))) {
            rccMask |= valueBit(value);
        }
    }
    return rccMask;
}

// Remove z from every cell outside the sets which sees all z cells of both ends
function endEliminations(board: ReadonlyBoard, first: AlmostLockedSet, last: AlmostLockedSet, z: number, exclude: CellIndex[]): Candidate[] {
    const zCells = [...valueCells(board, first, z), ...valueCells(board, last, z)];
    return commonPeers(zCells)
        .filter(cell => !exclude.includes(cell) && hasValue(board.candidates(cell), z))
        .map(cell => ({ cell, value: z }));
}

function alsName(als: AlmostLockedSet): string {
    return `${maskToString(als.mask)}${compactName(als.cells)}`;
}

abstract class AlsStep extends LogicalStep {
    constructor(technique: TechniqueId) {
        super(technique);
    }

    protected buildLinks(board: ReadonlyBoard, sets: AlmostLockedSet[]): AlsLink[][] {
        const links: AlsLink[][] = sets.map(() => []);
        for (let i = 0; i < sets.length; i++) {
            for (let j = i + 1; j < sets.length; j++) {
                const rccMask = restrictedCommons(board, sets[i], sets[j]);
                if (rccMask !== 0) {
                    links[i].push({ other: j, rccMask });
                    links[j].push({ other: i, rccMask });
                }
            }
        }
        return links;
    }
}

export class AlsXz extends AlsStep {
    constructor() {
        super('alsXz');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        const sets = findAlmostLockedSets(board);
        const links = this.buildLinks(board, sets);
        for (let i = 0; i < sets.length; i++) {
            for (const { other, rccMask } of links[i]) {
                if (other < i) {
                    continue;
                }
                const a = sets[i];
                const b = sets[other];
                for (const x of valuesList(rccMask)) {
                    for (const z of valuesList(a.mask & b.mask & ~valueBit(x))) {
                        const elims = endEliminations(board, a, b, z, [...a.cells, ...b.cells]);
                        if (elims.length === 0) {
                            continue;
                        }
                        yield elimination(
                            this.technique,
                            elims,
                            [...a.cells, ...b.cells],
                            [a.region, b.region],
                            `ALS-XZ: ${alsName(a)} and ${alsName(b)}, x=${x}, z=${z}`,
                            scaledWeight(this.technique, 0.1 * (a.cells.length + b.cells.length - 2))
                        );
                    }
                }
            }
        }
    }
}

// Two sets each restricted to a pivot set by different values
export class AlsXyWing extends AlsStep {
    constructor() {
        super('alsXyWing');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        const sets = findAlmostLockedSets(board);
        const links = this.buildLinks(board, sets);
        for (let pivot = 0; pivot < sets.length; pivot++) {
            const pivotLinks = links[pivot];
            for (let i = 0; i < pivotLinks.length; i++) {
                for (let j = i + 1; j < pivotLinks.length; j++) {
                    const a = sets[pivotLinks[i].other];
                    const b = sets[pivotLinks[j].other];
                    if (overlaps(a, b)) {
                        continue;
                    }
                    const c = sets[pivot];
                    for (const x of valuesList(pivotLinks[i].rccMask)) {
                        for (const y of valuesList(pivotLinks[j].rccMask & ~valueBit(x))) {
                            for (const z of valuesList(a.mask & b.mask & ~valueBit(x) & ~valueBit(y))) {
                                const exclude = [...a.cells, ...b.cells, ...c.cells];
                                const elims = endEliminations(board, a, b, z, exclude);
                                if (elims.length === 0) {
                                    continue;
                                }
                                yield elimination(
                                    this.technique,
                                    elims,
                                    exclude,
                                    [a.region, c.region, b.region],
                                    `ALS-XY-Wing: ${alsName(a)} -${x}- ${alsName(c)} -${y}- ${alsName(b)}, z=${z}`,
                                    scaledWeight(this.technique, 0.1 * (exclude.length - 3))
                                );
                            }
                        }
                    }
                }
            }
        }
    }
}

// Sets joined by restricted commons, each link on a different value than the one before
export class AlsChain extends AlsStep {
    constructor() {
        super('alsChain');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        const sets = findAlmostLockedSets(board, 3);
        const links = this.buildLinks(board, sets);
        let budget = CHAIN_SEARCH_BUDGET;

        const path: number[] = [];
        const linkValues: number[] = [];
        const found: Move[] = [];

        const visit = (current: number) => {
            if (budget-- <= 0 || found.length > 0) {
                return;
            }

            if (path.length >= 4) {
                const first = sets[path[0]];
                const last = sets[current];
                const usedFirst = valueBit(linkValues[0]);
                const usedLast = valueBit(linkValues[linkValues.length - 1]);
                if (!overlaps(first, last)) {
                    for (const z of valuesList(first.mask & last.mask & ~usedFirst & ~usedLast)) {
                        const chainCells = path.flatMap(index => sets[index].cells);
                        const elims = endEliminations(board, first, last, z, chainCells);
                        if (elims.length === 0) {
                            continue;
                        }
                        const names = path.map((index, i) => (i === 0 ? alsName(sets[index]) : `-${linkValues[i - 1]}- ${alsName(sets[index])}`));
                        found.push(
                            elimination(
                                this.technique,
                                elims,
                                chainCells,
                                path.map(index => sets[index].region),
                                `ALS Chain: ${names.join(' ')}, z=${z}`,
                                scaledWeight(this.technique, 0.2 * (path.length - 4) + 0.05 * (chainCells.length - path.length))
                            )
                        );
                        return;
                    }
                }
            }

            if (path.length >= MAX_CHAIN_LENGTH) {
                return;
            }

            const previousValue = linkValues.length > 0 ? linkValues[linkValues.length - 1] : 0;
            for (const { other, rccMask } of links[current]) {
                if (path.some(index => index === other || overlaps(sets[index], sets[other]))) {
                    continue;
                }
                for (const value of valuesList(rccMask)) {
                    if (value === previousValue) {
                        continue;
                    }
                    path.push(other);
                    linkValues.push(value);
                    visit(other);
                    path.pop();
                    linkValues.pop();
                    if (found.length > 0) {
                        return;
                    }
                }
            }
        };

        for (let start = 0; start < sets.length && found.length === 0 && budget > 0; start++) {
            path.push(start);
            visit(start);
            path.pop();
        }

        yield* found;
    }
}

// A stem cell whose every candidate is seen by its own set: whichever value the stem takes,
// one set locks and z lands in it.
export class DeathBlossom extends AlsStep {
    constructor() {
        super('deathBlossom');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        const sets = findAlmostLockedSets(board, 3);
        let budget = CHAIN_SEARCH_BUDGET;
        for (let stem = 0; stem < NUM_CELLS && budget > 0; stem++) {
            const stemMask = board.candidates(stem);
            const stemCount = popcount(stemMask);
            if (!board.isEmpty(stem) || stemCount < 2 || stemCount > 3) {
                continue;
            }

            const stemValues = valuesList(stemMask);
            const petalsFor = stemValues.map(value =>
                sets.filter(als => !als.cells.includes(stem) && hasValue(als.mask, value) && valueCells(board, als, value).every(cell => sees(cell, stem)))
            );
            if (petalsFor.some(petals => petals.length === 0)) {
                continue;
            }

            const chosen: AlmostLockedSet[] = [];
            const found: Move[] = [];
            const pick = (index: number, common: CellMask) => {
                if (budget-- <= 0 || found.length > 0) {
                    return;
                }
                if (index === stemValues.length) {
                    const move = this.blossomMove(board, stem, stemValues, chosen, common);
                    if (move !== null) {
                        found.push(move);
                    }
                    return;
                }
                for (const petal of petalsFor[index]) {
                    const remaining = common & petal.mask;
                    if (remaining === 0 || chosen.some(other => overlaps(other, petal))) {
                        continue;
                    }
                    chosen.push(petal);
                    pick(index + 1, remaining);
                    chosen.pop();
                }
            };
            pick(0, ALL_VALUES & ~stemMask);
            yield* found;
        }
    }

    private blossomMove(board: ReadonlyBoard, stem: CellIndex, stemValues: number[], petals: AlmostLockedSet[], common: CellMask): Move | null {
        const blossomCells = [stem, ...petals.flatMap(petal => petal.cells)];
        for (const z of valuesList(common)) {
            const zCells = petals.flatMap(petal => valueCells(board, petal, z));
            const elims = commonPeers(zCells)
                .filter(cell => !blossomCells.includes(cell) && hasValue(board.candidates(cell), z))
                .map(cell => ({ cell, value: z }));
            if (elims.length === 0) {
                continue;
            }
            const petalNames = petals.map((petal, i) => `${stemValues[i]} in ${alsName(petal)}`);
            return elimination(
                this.technique,
                elims,
                blossomCells,
                petals.map(petal => petal.region),
                `${this.name}: stem ${maskToString(board.candidates(stem))}${cellName(stem)}, ${petalNames.join(', ')}, z=${z}`
            );
        }
        return null;
    }
}
