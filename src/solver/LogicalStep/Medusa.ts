import { ReadonlyBoard } from '../Board';
import { Move, elimination } from '../Move';
import { peers, sees } from '../Regions';
import { Candidate, CandidateIndex, CellIndex, NUM_CELLS, SIZE, candidateFromIndex, candidateIndex, cellName, describeCandidates, valuesList } from '../SolveUtility';
import { LogicalStep } from './LogicalStep';
import { buildLinkGraph } from './AlternatingInferenceChain';

const NUM_CANDIDATES = NUM_CELLS * SIZE;
const UNCOLORED = -1;

type Coloring = {
    color: Int8Array;
    sides: [Candidate[], Candidate[]];
};

// Colors a cluster of strong links in two alternating colors, one of which is entirely true.
// Returns null when an odd cycle gives a candidate both colors.
function colorCluster(strong: CandidateIndex[][], start: CandidateIndex, color: Int8Array): CandidateIndex[] | null {
    const cluster = [start];
    color[start] = 0;
    let consistent = true;
    for (let head = 0; head < cluster.length; head++) {
        const node = cluster[head];
        for (const next of strong[node]) {
            if (color[next] === UNCOLORED) {
                color[next] = 1 - color[node];
                cluster.push(next);
            } else if (color[next] === color[node]) {
                consistent = false;
            }
        }
    }
    return consistent ? cluster : null;
}

export class Medusa extends LogicalStep {
    constructor() {
        super('medusa');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        const { strong } = buildLinkGraph(board, null);
        const visited = new Int8Array(NUM_CANDIDATES).fill(UNCOLORED);
        for (let start = 0; start < NUM_CANDIDATES; start++) {
            if (visited[start] !== UNCOLORED || strong[start].length === 0) {
                continue;
            }
            const cluster = colorCluster(strong, start, visited);
            if (cluster === null || cluster.length < 3) {
                continue;
            }

            const color = new Int8Array(NUM_CANDIDATES).fill(UNCOLORED);
            const sides: [Candidate[], Candidate[]] = [[], []];
            for (const index of cluster) {
                color[index] = visited[index];
                sides[visited[index]].push(candidateFromIndex(index));
            }
            const move = this.clusterMove(board, { color, sides });
            if (move !== null) {
                yield move;
            }
        }
    }

    private clusterMove(board: ReadonlyBoard, coloring: Coloring): Move | null {
        const { sides } = coloring;
        const cells = Array.from(new Set([...sides[0], ...sides[1]].map(({ cell }) => cell))).sort((a, b) => a - b);
        const desc = `${this.name}: ${describeCandidates(sides[0])} | ${describeCandidates(sides[1])}`;

        for (const side of [0, 1]) {
            const reason = this.contradiction(board, coloring, side);
            if (reason !== null) {
                return elimination(this.technique, sides[side], cells, [], `${desc}, ${describeCandidates(sides[side])} ${reason}`);
            }
        }

        const elims: Candidate[] = [];
        for (let cell = 0; cell < NUM_CELLS; cell++) {
            if (!board.isEmpty(cell)) {
                continue;
            }
            const cellColors = this.colorsInCell(board, coloring, cell);
            for (const value of valuesList(board.candidates(cell))) {
                if (coloring.color[candidateIndex(cell, value)] !== UNCOLORED) {
                    continue;
                }
                const seen = this.colorsSeen(coloring, cell, value);
                // Whichever color is true, the candidate is false
                if ((cellColors[0] || seen[0]) && (cellColors[1] || seen[1])) {
                    elims.push({ cell, value });
                }
            }
        }
        return elims.length > 0 ? elimination(this.technique, elims, cells, [], desc) : null;
    }

    // Why the given color cannot be the true one, if it cannot
    private contradiction(board: ReadonlyBoard, coloring: Coloring, side: number): string | null {
        const candidates = coloring.sides[side];
        for (let i = 0; i < candidates.length; i++) {
            for (let j = i + 1; j < candidates.length; j++) {
                const a = candidates[i];
                const b = candidates[j];
                if (a.cell === b.cell) {
                    return 'share a cell';
                }
                if (a.value === b.value && sees(a.cell, b.cell)) {
                    return 'share a house';
                }
            }
        }

        for (let cell = 0; cell < NUM_CELLS; cell++) {
            if (!board.isEmpty(cell)) {
                continue;
            }
            // Every candidate of the cell dies if this color is true
            const emptied = valuesList(board.candidates(cell)).every(value => {
                const own = coloring.color[candidateIndex(cell, value)];
                if (own !== UNCOLORED) {
                    return own !== side;
                }
                return this.colorsSeen(coloring, cell, value)[side];
            });
            if (emptied) {
                return `empty ${cellName(cell)}`;
            }
        }
        return null;
    }

    private colorsInCell(board: ReadonlyBoard, coloring: Coloring, cell: CellIndex): [boolean, boolean] {
        const found: [boolean, boolean] = [false, false];
        for (const value of valuesList(board.candidates(cell))) {
            const own = coloring.color[candidateIndex(cell, value)];
            if (own !== UNCOLORED) {
                found[own] = true;
            }
        }
        return found;
    }

    private colorsSeen(coloring: Coloring, cell: CellIndex, value: number): [boolean, boolean] {
        const found: [boolean, boolean] = [false, false];
        for (const peer of peers[cell]) {
            const own = coloring.color[candidateIndex(peer, value)];
            if (own !== UNCOLORED) {
                found[own] = true;
            }
        }
        return found;
    }
}
