import { ReadonlyBoard } from '../Board';
import { Move, placement } from '../Move';
import { Region, RegionType } from '../Regions';
import { ALL_VALUES, SIZE, cellName, firstSlot, minValue, popcount } from '../SolveUtility';
import { LogicalStep } from './LogicalStep';

// The last empty cell of a house
export class FullHouse extends LogicalStep {
    constructor() {
        super('fullHouse');
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        for (const region of board.regions) {
            const emptyCells = region.cells.filter(cell => board.isEmpty(cell));
            if (emptyCells.length !== 1) {
                continue;
            }

            const cell = emptyCells[0];
            const missing = ALL_VALUES & ~board.placedMask(region.index);
            if (popcount(missing) !== 1 || (board.candidates(cell) & missing) === 0) {
                continue;
            }

            const value = minValue(missing);
            yield placement(this.technique, cell, value, region.cells, [region.name], `Full House in ${region.name}: ${cellName(cell)} = ${value}.`);
        }
    }
}

// A value with only one place left in a house
export class HiddenSingle extends LogicalStep {
    private regionTypes: RegionType[];

    constructor(lines: boolean) {
        super(lines ? 'hiddenSingleLine' : 'hiddenSingleBox');
        this.regionTypes = lines ? ['row', 'col'] : ['box'];
    }

    *moves(board: ReadonlyBoard): Generator<Move> {
        const regions: Region[] = board.regions.filter(region => this.regionTypes.includes(region.type));
        for (const region of regions) {
            const missing = ALL_VALUES & ~board.placedMask(region.index);
            for (let value = 1; value <= SIZE; value++) {
                if ((missing & (1 << (value - 1))) === 0) {
                    continue;
                }

                const positions = board.positions(region.index, value);
                if (popcount(positions) !== 1) {
                    continue;
                }

                const cell = region.cells[firstSlot(positions)];
                yield placement(
                    this.technique,
                    cell,
                    value,
                    region.cells,
                    [region.name],
                    `Hidden Single in ${region.name}: ${cellName(cell)} = ${value}.`
                );
            }
        }
    }
}
