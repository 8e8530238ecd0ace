import { ReadonlyBoard } from '../Board';
import { Move } from '../Move';
import { TechniqueId, TechniqueInfo, techniques } from '../Technique';

export abstract class LogicalStep {
    readonly technique: TechniqueId;

    constructor(technique: TechniqueId) {
        this.technique = technique;
    }

    get info(): TechniqueInfo {
        return techniques[this.technique];
    }

    get name(): string {
        return this.info.name;
    }

    get weight(): number {
        return this.info.weight;
    }

    // Returns the name of the logical step
    toString() {
        return this.name;
    }

    // Lazily yields every move found, in a stable order. Never mutates the board.
    abstract moves(board: ReadonlyBoard): Generator<Move>;

    detect(board: ReadonlyBoard): Move[] {
        return Array.from(this.moves(board));
    }

    first(board: ReadonlyBoard): Move | null {
        for (const move of this.moves(board)) {
            return move;
        }
        return null;
    }
}
