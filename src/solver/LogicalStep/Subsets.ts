import { ReadonlyBoard } from '../Board';
import { Move, elimination } from '../Move';
import { ALL_VALUES, Candidate, CellIndex, combinations, compactName, maskToString, popcount, valuesList } from '../SolveUtility';
import { TechniqueId } from '../Technique';
import { LogicalStep } from './LogicalStep';

const nakedTechniques: TechniqueId[] = ['nakedPair', 'nakedTriple', 'nakedQuad'];
const hiddenTechniques: TechniqueId[] = ['hiddenPair', 'hiddenTriple', 'hiddenQuad'];

// N cells of a house holding only N values between them
export class NakedSubset extends LogicalStep {
    private size: number;

    constructor(size: 2 | 3 | 4) {
        super(nakedTechniques[size - 2]);
        this.size = size;
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        const { size } = this;
        for (const region of board.regions) {
            const emptyCells = region.cells.filter(cell => board.isEmpty(cell));
            if (emptyCells.length <= size) {
                continue;
            }

            const tupleCandidates = emptyCells.filter(cell => {
                const count = popcount(board.candidates(cell));
                return count >= 2 && count <= size;
            });
            for (const tupleCells of combinations(tupleCandidates, size)) {
                const tupleMask = tupleCells.reduce((mask, cell) => mask | board.candidates(cell), 0);
                if (popcount(tupleMask) !== size) {
                    continue;
                }

                const elims: Candidate[] = [];
                for (const cell of emptyCells) {
                    if (tupleCells.includes(cell)) {
                        continue;
                    }
                    for (const value of valuesList(board.candidates(cell) & tupleMask)) {
                        elims.push({ cell, value });
                    }
                }
                if (elims.length === 0) {
                    continue;
                }

                yield elimination(this.technique, elims, tupleCells, [region.name], `${this.name} in ${region.name}: ${maskToString(tupleMask)}${compactName(tupleCells)}`);
            }
        }
    }
}

// N values of a house confined to the same N cells
export class HiddenSubset extends LogicalStep {
    private size: number;

    constructor(size: 2 | 3 | 4) {
        super(hiddenTechniques[size - 2]);
        this.size = size;
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        const { size } = this;
        for (const region of board.regions) {
            const missing = ALL_VALUES & ~board.placedMask(region.index);
            if (popcount(missing) <= size) {
                continue;
            }

            const tupleValues = valuesList(missing).filter(value => {
                const count = popcount(board.positions(region.index, value));
                return count >= 2 && count <= size;
            });
            for (const values of combinations(tupleValues, size)) {
                const slotMask = values.reduce((mask, value) => mask | board.positions(region.index, value), 0);
                if (popcount(slotMask) !== size) {
                    continue;
                }

                const valueMask = values.reduce((mask, value) => mask | (1 << (value - 1)), 0);
                const tupleCells: CellIndex[] = region.cells.filter((_, slot) => (slotMask & (1 << slot)) !== 0);
                const elims: Candidate[] = [];
                for (const cell of tupleCells) {
                    for (const value of valuesList(board.candidates(cell) & ~valueMask)) {
                        elims.push({ cell, value });
                    }
                }
                if (elims.length === 0) {
                    continue;
                }

                yield elimination(this.technique, elims, tupleCells, [region.name], `${this.name} in ${region.name}: ${maskToString(valueMask)}${compactName(tupleCells)}`);
            }
        }
    }
}
