import { CellIndex, NUM_CELLS, SIZE, boxIndex, cellIndex } from './SolveUtility';

export type RegionType = 'row' | 'col' | 'box';

export type Region = {
    index: number;
    name: string;
    type: RegionType;
    cells: CellIndex[];
};

export const NUM_REGIONS = SIZE * 3;

function createRegions(): Region[] {
    const regions: Region[] = [];

    // Rows
    for (let row = 0; row < SIZE; row++) {
        const cells = Array.from({ length: SIZE }, (_, i) => cellIndex(row, i));
        regions.push({ index: regions.length, name: `Row ${row + 1}`, type: 'row', cells });
    }

    // Columns
    for (let col = 0; col < SIZE; col++) {
        const cells = Array.from({ length: SIZE }, (_, i) => cellIndex(i, col));
        regions.push({ index: regions.length, name: `Col ${col + 1}`, type: 'col', cells });
    }

    // Boxes
    for (let box = 0; box < SIZE; box++) {
        const baseRow = Math.floor(box / 3) * 3;
        const baseCol = (box % 3) * 3;
        const cells = Array.from({ length: SIZE }, (_, i) => cellIndex(baseRow + Math.floor(i / 3), baseCol + (i % 3)));
        regions.push({ index: regions.length, name: `Box ${box + 1}`, type: 'box', cells });
    }

    return regions;
}

export const regions: readonly Region[] = createRegions();

// Region indices for each cell, in row, col, box order
export const cellRegions: readonly (readonly [number, number, number])[] = Array.from({ length: NUM_CELLS }, (_, cell) => {
    const row = Math.floor(cell / SIZE);
    const col = cell % SIZE;
    return [row, SIZE + col, SIZE * 2 + boxIndex(row, col)] as const;
});

// The slot a cell occupies within each of its regions, matching cellRegions
export const cellRegionSlots: readonly (readonly [number, number, number])[] = Array.from({ length: NUM_CELLS }, (_, cell) => {
    const row = Math.floor(cell / SIZE);
    const col = cell % SIZE;
    return [col, row, (row % 3) * 3 + (col % 3)] as const;
});

const seesTable = new Uint8Array(NUM_CELLS * NUM_CELLS);

export const peers: readonly (readonly CellIndex[])[] = Array.from({ length: NUM_CELLS }, (_, cell) => {
    const peerSet = new Set<CellIndex>();
    for (const regionIndex of cellRegions[cell]) {
        for (const other of regions[regionIndex].cells) {
            if (other !== cell) {
                peerSet.add(other);
            }
        }
    }
    const cellPeers = Array.from(peerSet).sort((a, b) => a - b);
    for (const other of cellPeers) {
        seesTable[cell * NUM_CELLS + other] = 1;
    }
    return cellPeers;
});

export function sees(cell1: CellIndex, cell2: CellIndex): boolean {
    return seesTable[cell1 * NUM_CELLS + cell2] !== 0;
}

export function seesAll(cell: CellIndex, others: CellIndex[]): boolean {
    return others.every(other => other !== cell && sees(cell, other));
}

// Cells which see every one of the given cells, excluding the cells themselves
export function commonPeers(cells: CellIndex[]): CellIndex[] {
    if (cells.length === 0) {
        return [];
    }
    return peers[cells[0]].filter(cell => !cells.includes(cell) && cells.every(other => sees(cell, other)));
}

// Regions which contain all of the given cells
export function sharedRegions(cells: CellIndex[]): Region[] {
    if (cells.length === 0) {
        return [];
    }
    return cellRegions[cells[0]].map(index => regions[index]).filter(region => cells.every(cell => region.cells.includes(cell)));
}
