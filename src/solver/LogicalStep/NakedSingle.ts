import { ReadonlyBoard } from '../Board';
import { Move, placement } from '../Move';
import { NUM_CELLS, cellName, minValue } from '../SolveUtility';
import { LogicalStep } from './LogicalStep';

export class NakedSingle extends LogicalStep {
    constructor() {
        super('nakedSingle');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        for (let cell = 0; cell < NUM_CELLS; cell++) {
            const mask = board.candidates(cell);
            if (mask === 0 || mask & (mask - 1)) continue;
            const value = minValue(mask);
            yield placement(this.technique, cell, value, [cell], [], `Naked Single: ${cellName(cell)} = ${value}.`);
        }
    }
}
