import { ReadonlyBoard } from '../Board';
import { Move, placement } from '../Move';
import { NUM_CELLS, cellName, popcount } from '../SolveUtility';
import { findSolution } from '../Verifier';
import { LogicalStep } from './LogicalStep';

// Not part of the dispatch order: hints fall back to it once no technique applies.
// Reveals the searched solution's value in the most constrained empty cell.
export class Backtracking extends LogicalStep {
    constructor() {
        super('backtracking');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        let target = -1;
        for (let cell = 0; cell < NUM_CELLS; cell++) {
            if (board.isEmpty(cell) && (target === -1 || popcount(board.candidates(cell)) < popcount(board.candidates(target)))) {
                target = cell;
            }
        }
        if (target === -1) {
            return;
        }

        const solution = findSolution(board);
        if (solution === null) {
            return;
        }
        const value = solution[target];
        yield placement(this.technique, target, value, [target], [], `${this.name}: ${cellName(target)} = ${value}.`);
    }
}
