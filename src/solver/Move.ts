import { Board } from './Board';
import { Candidate, CellIndex, CellValue, cellName, describeElims } from './SolveUtility';
import { TechniqueId, techniques } from './Technique';

interface MoveBase {
    technique: TechniqueId;
    weight: number;
    // Cells and houses that justify the move, for hint display
    cells: CellIndex[];
    regions: string[];
    desc: string;
}

export interface Placement extends MoveBase {
    kind: 'placement';
    cell: CellIndex;
    value: CellValue;
}

// All candidate removals justified by one instance of a pattern
export interface Elimination extends MoveBase {
    kind: 'elimination';
    eliminations: Candidate[];
}

export type Move = Placement | Elimination;

export type ApplyMoveResult = { result: 'applied' } | { result: 'invalid'; reason: string };

export function placement(technique: TechniqueId, cell: CellIndex, value: CellValue, cells: CellIndex[], regions: string[], desc: string): Placement {
    return { kind: 'placement', technique, weight: techniques[technique].weight, cell, value, cells, regions, desc };
}

export function elimination(
    technique: TechniqueId,
    eliminations: Candidate[],
    cells: CellIndex[],
    regions: string[],
    desc: string,
    weight: number = techniques[technique].weight
): Elimination {
    const sorted = eliminations.slice().sort((a, b) => a.cell - b.cell || a.value - b.value);
    return {
        kind: 'elimination',
        technique,
        weight,
        eliminations: sorted,
        cells,
        regions,
        desc: `${desc} => ${describeElims(sorted)}`,
    };
}

export function describeMove(move: Move): string {
    return move.kind === 'placement' ? `${cellName(move.cell)} = ${move.value}` : describeElims(move.eliminations);
}

export function applyMoveToBoard(board: Board, move: Move): ApplyMoveResult {
    if (move.kind === 'placement') {
        const result = board.place(move.cell, move.value);
        if (result.result !== 'placed') {
            return { result: 'invalid', reason: `${move.desc} cannot be applied (${result.result})` };
        }
        return { result: 'applied' };
    }

    let removed = 0;
    for (const { cell, value } of move.eliminations) {
        if (board.removeCandidate(cell, value)) {
            removed++;
        }
    }
    if (removed === 0) {
        return { result: 'invalid', reason: `${move.desc} removes nothing` };
    }
    return { result: 'applied' };
}
