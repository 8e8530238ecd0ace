import { NUM_REGIONS, Region, cellRegionSlots, cellRegions, peers, regions } from './Regions';
import { ALL_VALUES, CellIndex, CellMask, CellValue, NUM_CELLS, SIZE, cellName, hasValue, popcount, valueBit, valuesList } from './SolveUtility';

export type PlaceResultPlaced = {
    result: 'placed';
    // Peer cells which lost the placed value as a candidate
    changed: CellIndex[];
};
export type PlaceResultGivenConflict = {
    result: 'given conflict';
    cell: CellIndex;
};
export type PlaceResultRuleViolation = {
    result: 'rule violation';
    cell: CellIndex;
    value: CellValue;
    conflicts: CellIndex[];
};
export type PlaceResult = PlaceResultPlaced | PlaceResultGivenConflict | PlaceResultRuleViolation;

export type CreateBoardResult = { result: 'board'; board: Board } | PlaceResultRuleViolation;

// Read-only view of the grid handed to the technique engines
export interface ReadonlyBoard {
    readonly cells: ArrayLike<CellMask>;
    readonly values: ArrayLike<CellValue>;
    readonly emptyCount: number;
    readonly regions: readonly Region[];
    isGiven(cell: CellIndex): boolean;
    isEmpty(cell: CellIndex): boolean;
    candidates(cell: CellIndex): CellMask;
    positions(regionIndex: number, value: CellValue): number;
    placedMask(regionIndex: number): CellMask;
    isComplete(): boolean;
    getValueArray(): CellValue[];
    clone(): Board;
}

function checkCellValue(cell: CellIndex, value: CellValue) {
    if (cell < 0 || cell >= NUM_CELLS || !Number.isInteger(cell)) {
        throw new Error(`Invalid cell index ${cell}`);
    }
    if (value < 1 || value > SIZE || !Number.isInteger(value)) {
        throw new Error(`Invalid value ${value}`);
    }
}

export class Board implements ReadonlyBoard {
    // Candidate mask of each empty cell, or the bit of the placed value
    cells: Uint16Array;
    values: Uint8Array;
    givens: Uint8Array;
    emptyCount: number;
    regions: readonly Region[];
    // For each region and value, a mask of the slots in the region where the value is still a candidate
    private regionPositions: Uint16Array;
    // For each region, a mask of the values placed in it
    private regionPlaced: Uint16Array;

    constructor() {
        this.cells = new Uint16Array(NUM_CELLS).fill(ALL_VALUES);
        this.values = new Uint8Array(NUM_CELLS);
        this.givens = new Uint8Array(NUM_CELLS);
        this.emptyCount = NUM_CELLS;
        this.regions = regions;
        this.regionPositions = new Uint16Array(NUM_REGIONS * SIZE).fill(ALL_VALUES);
        this.regionPlaced = new Uint16Array(NUM_REGIONS);
    }

    // Build a board from 81 values (0 for empty). Non-zero values become givens unless asGivens is false.
    static create(values: ArrayLike<CellValue>, asGivens: boolean = true): CreateBoardResult {
        if (values.length !== NUM_CELLS) {
            throw new Error(`Expected ${NUM_CELLS} values, got ${values.length}`);
        }

        const board = new Board();
        for (let cell = 0; cell < NUM_CELLS; cell++) {
            const value = values[cell];
            if (value === 0) {
                continue;
            }
            const result = asGivens ? board.setGiven(cell, value) : board.place(cell, value);
            if (result.result === 'rule violation') {
                return result;
            }
        }
        return { result: 'board', board };
    }

    clone(): Board {
        const clone = new Board();
        clone.cells.set(this.cells);
        clone.values.set(this.values);
        clone.givens.set(this.givens);
        clone.emptyCount = this.emptyCount;
        clone.regionPositions.set(this.regionPositions);
        clone.regionPlaced.set(this.regionPlaced);
        return clone;
    }

    isGiven(cell: CellIndex): boolean {
        return this.givens[cell] !== 0;
    }

    isEmpty(cell: CellIndex): boolean {
        return this.values[cell] === 0;
    }

    candidates(cell: CellIndex): CellMask {
        return this.values[cell] === 0 ? this.cells[cell] : 0;
    }

    positions(regionIndex: number, value: CellValue): number {
        return this.regionPositions[regionIndex * SIZE + value - 1];
    }

    placedMask(regionIndex: number): CellMask {
        return this.regionPlaced[regionIndex];
    }

    isComplete(): boolean {
        return this.emptyCount === 0;
    }

    getValueArray(): CellValue[] {
        return Array.from(this.values);
    }

    getGivenArray(): CellValue[] {
        return Array.from(this.values, (value, cell) => (this.givens[cell] ? value : 0));
    }

    // Cells in the same houses as the cell which already hold the value
    conflictsFor(cell: CellIndex, value: CellValue): CellIndex[] {
        return peers[cell].filter(peer => this.values[peer] === value);
    }

    setGiven(cell: CellIndex, value: CellValue): PlaceResult {
        const result = this.placeValue(cell, value);
        if (result.result === 'placed') {
            this.givens[cell] = 1;
        }
        return result;
    }

    place(cell: CellIndex, value: CellValue): PlaceResult {
        checkCellValue(cell, value);
        if (this.givens[cell]) {
            return { result: 'given conflict', cell };
        }
        if (this.values[cell] === value) {
            return { result: 'placed', changed: [] };
        }
        if (this.values[cell] !== 0) {
            const conflicts = this.conflictsFor(cell, value);
            if (conflicts.length > 0) {
                return { result: 'rule violation', cell, value, conflicts };
            }
            this.clear(cell);
        }
        return this.placeValue(cell, value);
    }

    private placeValue(cell: CellIndex, value: CellValue): PlaceResult {
        checkCellValue(cell, value);
        if (this.values[cell] !== 0) {
            throw new Error(`${cellName(cell)} is already filled`);
        }

        const conflicts = this.conflictsFor(cell, value);
        if (conflicts.length > 0) {
            return { result: 'rule violation', cell, value, conflicts };
        }

        this.removeFromPositions(cell, this.cells[cell]);
        this.cells[cell] = valueBit(value);
        this.values[cell] = value;
        this.emptyCount--;
        for (const regionIndex of cellRegions[cell]) {
            this.regionPlaced[regionIndex] |= valueBit(value);
        }

        const changed: CellIndex[] = [];
        for (const peer of peers[cell]) {
            if (this.removeCandidate(peer, value)) {
                changed.push(peer);
            }
        }
        return { result: 'placed', changed };
    }

    // Remove a non-given value and recompute candidates from the placed values.
    // Earlier candidate eliminations are not kept.
    clear(cell: CellIndex): boolean {
        if (this.givens[cell] || this.values[cell] === 0) {
            return false;
        }

        const values = this.getValueArray();
        const givens = this.givens.slice();
        values[cell] = 0;
        this.reset();
        for (let other = 0; other < NUM_CELLS; other++) {
            if (values[other] !== 0) {
                this.placeValue(other, values[other]);
                this.givens[other] = givens[other];
            }
        }
        return true;
    }

    private reset() {
        this.cells.fill(ALL_VALUES);
        this.values.fill(0);
        this.givens.fill(0);
        this.emptyCount = NUM_CELLS;
        this.regionPositions.fill(ALL_VALUES);
        this.regionPlaced.fill(0);
    }

    // Returns true if the candidate was present and has been removed
    removeCandidate(cell: CellIndex, value: CellValue): boolean {
        if (this.values[cell] !== 0) {
            return false;
        }
        const bit = valueBit(value);
        if ((this.cells[cell] & bit) === 0) {
            return false;
        }
        this.cells[cell] &= ~bit;
        this.removeFromPositions(cell, bit);
        return true;
    }

    private removeFromPositions(cell: CellIndex, mask: CellMask) {
        const cellRegion = cellRegions[cell];
        const slots = cellRegionSlots[cell];
        for (const value of valuesList(mask)) {
            for (let i = 0; i < 3; i++) {
                this.regionPositions[cellRegion[i] * SIZE + value - 1] &= ~(1 << slots[i]);
            }
        }
    }

    // Empty cells with no candidates left, or houses with nowhere to place a missing value
    hasContradiction(): boolean {
        for (let cell = 0; cell < NUM_CELLS; cell++) {
            if (this.values[cell] === 0 && this.cells[cell] === 0) {
                return true;
            }
        }
        for (const region of this.regions) {
            const missing = ALL_VALUES & ~this.regionPlaced[region.index];
            for (const value of valuesList(missing)) {
                if (this.positions(region.index, value) === 0) {
                    return true;
                }
            }
        }
        return false;
    }

    // Throws if the internal indices disagree with the cells. A failure here is a bug, not a bad puzzle.
    assertInvariants() {
        for (const region of this.regions) {
            let seen = 0;
            for (const cell of region.cells) {
                const value = this.values[cell];
                if (value === 0) {
                    continue;
                }
                if (hasValue(seen, value)) {
                    throw new Error(`Invariant violated: ${region.name} contains ${value} more than once`);
                }
                seen |= valueBit(value);
            }
            if (seen !== this.regionPlaced[region.index]) {
                throw new Error(`Invariant violated: placed index for ${region.name} is out of date`);
            }
            for (let value = 1; value <= SIZE; value++) {
                let positions = 0;
                region.cells.forEach((cell, slot) => {
                    if (this.values[cell] === 0 && hasValue(this.cells[cell], value)) {
                        positions |= 1 << slot;
                    }
                });
                if (positions !== this.positions(region.index, value)) {
                    throw new Error(`Invariant violated: position index for ${value} in ${region.name} is out of date`);
                }
            }
        }

        let emptyCount = 0;
        for (let cell = 0; cell < NUM_CELLS; cell++) {
            if (this.values[cell] !== 0) {
                if (popcount(this.cells[cell]) !== 1 || !hasValue(this.cells[cell], this.values[cell])) {
                    throw new Error(`Invariant violated: ${cellName(cell)} mask does not match its value`);
                }
                continue;
            }
            emptyCount++;
            for (const peer of peers[cell]) {
                const peerValue = this.values[peer];
                if (peerValue !== 0 && hasValue(this.cells[cell], peerValue)) {
                    throw new Error(`Invariant violated: ${cellName(cell)} still has candidate ${peerValue} placed at ${cellName(peer)}`);
                }
            }
        }
        if (emptyCount !== this.emptyCount) {
            throw new Error('Invariant violated: empty cell count is out of date');
        }
    }
}
