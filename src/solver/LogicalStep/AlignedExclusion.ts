import { ReadonlyBoard } from '../Board';
import { Move, elimination } from '../Move';
import { commonPeers, sees } from '../Regions';
import { Candidate, CellIndex, CellValue, NUM_CELLS, cellName, combinations, hasValue, maskToString, popcount, valuesList } from '../SolveUtility';
import { LogicalStep } from './LogicalStep';

// Candidate limits for the group cells, pairs then triplets
const MAX_GROUP_CANDIDATES = [5, 4];

// Assignments of distinct values to cells that see each other
function* assignments(board: ReadonlyBoard, cells: CellIndex[], picked: CellValue[] = []): Generator<CellValue[]> {
    if (picked.length === cells.length) {
        yield picked.slice();
        return;
    }
    const cell = cells[picked.length];
    for (const value of valuesList(board.candidates(cell))) {
        if (picked.some((other, i) => other === value && sees(cells[i], cell))) {
            continue;
        }
        picked.push(value);
        yield* assignments(board, cells, picked);
        picked.pop();
    }
}

// Two or three cells of a house tried against every small cell around them.
// A combination that leaves some cell without a candidate cannot happen.
export class AlignedExclusion extends LogicalStep {
    private size: number;

    constructor(size: 2 | 3) {
        super(size === 2 ? 'alignedPairExclusion' : 'alignedTripletExclusion');
        this.size = size;
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        const { size } = this;
        const maxCandidates = MAX_GROUP_CANDIDATES[size - 2];
        const small: CellIndex[] = [];
        for (let cell = 0; cell < NUM_CELLS; cell++) {
            if (board.isEmpty(cell) && popcount(board.candidates(cell)) <= size) {
                small.push(cell);
            }
        }

        const seen = new Set<string>();
        for (const region of board.regions) {
            const groupCells = region.cells.filter(cell => {
                const count = popcount(board.candidates(cell));
                return board.isEmpty(cell) && count >= 2 && count <= maxCandidates;
            });
            for (const group of combinations(groupCells, size)) {
                const key = group.join(',');
                if (seen.has(key)) {
                    continue;
                }
                seen.add(key);

                const move = this.groupMove(board, group, small.filter(cell => !group.includes(cell) && group.some(member => sees(member, cell))));
                if (move !== null) {
                    yield move;
                }
            }
        }
    }

    private groupMove(board: ReadonlyBoard, group: CellIndex[], excluders: CellIndex[]): Move | null {
        const surviving: CellValue[][] = [];
        for (const combo of assignments(board, group)) {
            const excluded = excluders.some(cell => {
                // Values the group takes away from this cell
                const taken = combo.reduce((mask, value, i) => (sees(group[i], cell) ? mask | (1 << (value - 1)) : mask), 0);
                return (board.candidates(cell) & ~taken) === 0;
            });
            if (!excluded) {
                surviving.push(combo);
            }
        }
        if (surviving.length === 0) {
            return null;
        }

        const elims: Candidate[] = [];
        group.forEach((cell, i) => {
            for (const value of valuesList(board.candidates(cell))) {
                if (!surviving.some(combo => combo[i] === value)) {
                    elims.push({ cell, value });
                }
            }
        });

        // A value used by every surviving combination lands in the group
        const peers = commonPeers(group);
        const groupMask = group.reduce((mask, cell) => mask | board.candidates(cell), 0);
        for (const value of valuesList(groupMask)) {
            if (!surviving.every(combo => combo.includes(value))) {
                continue;
            }
            for (const cell of peers) {
                if (board.isEmpty(cell) && hasValue(board.candidates(cell), value)) {
                    elims.push({ cell, value });
                }
            }
        }
        if (elims.length === 0) {
            return null;
        }

        const names = group.map(cell => `${maskToString(board.candidates(cell))}${cellName(cell)}`);
        return elimination(this.technique, elims, group, [], `${this.name}: ${names.join(', ')}`);
    }
}
