import { ReadonlyBoard } from '../Board';
import { Move, elimination } from '../Move';
import { Candidate, CandidateIndex, NUM_CELLS, SIZE, candidateFromIndex, candidateIndex, compactName, hasValue, slotsList, valuesList } from '../SolveUtility';
import { scaledWeight } from '../Technique';
import { LogicalStep } from './LogicalStep';

// Strong: at least one of the pair is true. Weak: at most one is true.
export type LinkGraph = {
    strong: CandidateIndex[][];
    weak: CandidateIndex[][];
    nodes: CandidateIndex[];
};

const NUM_CANDIDATES = NUM_CELLS * SIZE;
const MAX_CHAIN_NODES = 12;

function sortedLists(sets: Set<CandidateIndex>[]): CandidateIndex[][] {
    return sets.map(set => Array.from(set).sort((a, b) => a - b));
}

export function buildLinkGraph(board: ReadonlyBoard, singleValue: number | null): LinkGraph {
    const strong = Array.from({ length: NUM_CANDIDATES }, () => new Set<CandidateIndex>());
    const weak = Array.from({ length: NUM_CANDIDATES }, () => new Set<CandidateIndex>());
    const nodes: CandidateIndex[] = [];

    const link = (sets: Set<CandidateIndex>[], a: CandidateIndex, b: CandidateIndex) => {
        sets[a].add(b);
        sets[b].add(a);
    };

    for (let cell = 0; cell < NUM_CELLS; cell++) {
        const mask = board.candidates(cell);
        const values = valuesList(mask).filter(value => singleValue === null || value === singleValue);
        for (const value of values) {
            nodes.push(candidateIndex(cell, value));
        }
        if (singleValue !== null) {
            continue;
        }
        for (let i = 0; i < values.length; i++) {
            for (let j = i + 1; j < values.length; j++) {
                const a = candidateIndex(cell, values[i]);
                const b = candidateIndex(cell, values[j]);
                link(weak, a, b);
                if (values.length === 2) {
                    link(strong, a, b);
                }
            }
        }
    }

    for (const region of board.regions) {
        for (let value = 1; value <= SIZE; value++) {
            if (singleValue !== null && value !== singleValue) {
                continue;
            }
            const cands = slotsList(board.positions(region.index, value)).map(slot => candidateIndex(region.cells[slot], value));
            for (let i = 0; i < cands.length; i++) {
                for (let j = i + 1; j < cands.length; j++) {
                    link(weak, cands[i], cands[j]);
                }
            }
            if (cands.length === 2) {
                link(strong, cands[0], cands[1]);
            }
        }
    }

    return { strong: sortedLists(strong), weak: sortedLists(weak), nodes };
}

function candidateName(index: CandidateIndex): string {
    const { cell, value } = candidateFromIndex(index);
    return `(${value})${compactName([cell])}`;
}

// Chains of alternating strong and weak links that start and end on a strong link.
// One of the two end candidates must be true, so anything weakly linked to both is removed.
export class AlternatingInferenceChain extends LogicalStep {
    private singleValue: boolean;

    constructor(singleValue: boolean) {
        super(singleValue ? 'xChain' : 'aic');
        this.singleValue = singleValue;
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        if (this.singleValue) {
            for (let value = 1; value <= SIZE; value++) {
                yield* this.search(board, buildLinkGraph(board, value));
            }
        } else {
            yield* this.search(board, buildLinkGraph(board, null));
        }
    }

    private *search(board: ReadonlyBoard, graph: LinkGraph): Generator<Move> {
        const { strong, weak } = graph;
        // State = candidate * 2 + parity, parity 1 meaning the candidate was reached by a strong link
        const parent = new Int32Array(NUM_CANDIDATES * 2);
        const depth = new Uint8Array(NUM_CANDIDATES * 2);

        for (const start of graph.nodes) {
            if (strong[start].length === 0) {
                continue;
            }

            parent.fill(-1);
            depth.fill(0);
            const startWeak = new Set(weak[start]);
            const startState = start * 2;
            depth[startState] = 1;
            const queue: number[] = [startState];
            const usedEnds = new Set<CandidateIndex>();

            for (let head = 0; head < queue.length; head++) {
                const state = queue[head];
                const node = state >> 1;
                const parity = state & 1;
                const nodeDepth = depth[state];

                if (parity === 1 && nodeDepth >= 4 && node !== start && !usedEnds.has(node)) {
                    const elims = weak[node]
                        .filter(other => other !== start && startWeak.has(other) && this.isCandidate(board, other))
                        .map(candidateFromIndex);
                    if (elims.length > 0) {
                        usedEnds.add(node);
                        yield this.chainMove(this.path(parent, state), elims);
                    }
                }

                if (nodeDepth >= MAX_CHAIN_NODES) {
                    continue;
                }

                const nextParity = parity === 0 ? 1 : 0;
                const neighbours = parity === 0 ? strong[node] : weak[node];
                for (const next of neighbours) {
                    const nextState = next * 2 + nextParity;
                    if (depth[nextState] !== 0) {
                        continue;
                    }
                    depth[nextState] = nodeDepth + 1;
                    parent[nextState] = state;
                    queue.push(nextState);
                }
            }
        }
    }

    private isCandidate(board: ReadonlyBoard, index: CandidateIndex): boolean {
        const { cell, value } = candidateFromIndex(index);
        return hasValue(board.candidates(cell), value);
    }

    private path(parent: Int32Array, endState: number): CandidateIndex[] {
        const path: CandidateIndex[] = [];
        for (let state = endState; state !== -1; state = parent[state]) {
            path.push(state >> 1);
        }
        return path.reverse();
    }

    private chainMove(path: CandidateIndex[], elims: Candidate[]): Move {
        let desc = candidateName(path[0]);
        for (let i = 1; i < path.length; i++) {
            desc += (i % 2 === 1 ? '=' : '-') + candidateName(path[i]);
        }

        const cells = Array.from(new Set(path.map(index => candidateFromIndex(index).cell)));
        const extra = this.singleValue ? 0.1 * Math.floor((path.length - 4) / 2) : 0.25 * Math.floor((path.length - 4) / 2);
        return elimination(this.technique, elims, cells, [], `${this.name}: ${desc}`, scaledWeight(this.technique, extra));
    }
}
