import { ReadonlyBoard } from '../Board';
import { Move, elimination } from '../Move';
import { Region, sharedRegions } from '../Regions';
import { ALL_VALUES, Candidate, SIZE, hasValue, popcount, slotsList } from '../SolveUtility';
import { LogicalStep } from './LogicalStep';

// Pointing: a value confined to one line within a box. Claiming: a value confined to one box within a line.
export class LockedCandidates extends LogicalStep {
    private pointing: boolean;

    constructor(pointing: boolean) {
        super(pointing ? 'pointing' : 'claiming');
        this.pointing = pointing;
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        const baseRegions = board.regions.filter(region => (this.pointing ? region.type === 'box' : region.type !== 'box'));
        for (const region of baseRegions) {
            const missing = ALL_VALUES & ~board.placedMask(region.index);
            for (let value = 1; value <= SIZE; value++) {
                if (!hasValue(missing, value)) {
                    continue;
                }

                const positions = board.positions(region.index, value);
                if (popcount(positions) < 2) {
                    continue;
                }

                const cells = slotsList(positions).map(slot => region.cells[slot]);
                const targets: Region[] = sharedRegions(cells).filter(other => other !== region && (this.pointing ? other.type !== 'box' : other.type === 'box'));
                for (const target of targets) {
                    const elims: Candidate[] = target.cells
                        .filter(cell => !cells.includes(cell) && hasValue(board.candidates(cell), value))
                        .map(cell => ({ cell, value }));
                    if (elims.length === 0) {
                        continue;
                    }

                    yield elimination(this.technique, elims, cells, [region.name, target.name], `${this.name}: ${value} in ${region.name} is locked to ${target.name}`);
                }
            }
        }
    }
}
