import { Board } from '../src/solver/Board';
import { Fish, classifyFish } from '../src/solver/LogicalStep/Fish';
import { FullHouse, HiddenSingle } from '../src/solver/LogicalStep/HiddenSingle';
import { LockedCandidates } from '../src/solver/LogicalStep/LockedCandidates';
import { NakedSingle } from '../src/solver/LogicalStep/NakedSingle';
import { HiddenSubset, NakedSubset } from '../src/solver/LogicalStep/Subsets';
import { createLogicalStep, logicalSteps } from '../src/solver/LogicalSteps';
import { regions } from '../src/solver/Regions';
import { techniqueIds } from '../src/solver/Technique';
import { boardFrom, keepOnly, patternWithout, range, removeFrom } from './TestUtility';

describe('technique table', () => {
    it('creates one step per technique, lightest first', () => {
        expect(logicalSteps).toHaveLength(techniqueIds.length);
        for (let i = 1; i < logicalSteps.length; i++) {
            expect(logicalSteps[i].weight).toBeGreaterThanOrEqual(logicalSteps[i - 1].weight);
        }
        expect(logicalSteps[0].technique).toBe('fullHouse');
    });
});

describe('singles', () => {
    it('finds a full house', () => {
        const move = new FullHouse().first(boardFrom(patternWithout([0])));
        expect(move).toMatchObject({ kind: 'placement', technique: 'fullHouse', cell: 0, value: 1, weight: 1.0 });
        expect(move?.desc).toBe('Full House in Row 1: R1C1 = 1.');
    });

    it('finds a hidden single in a box', () => {
        const board = new Board();
        removeFrom(board, 5, [1, 2, 9, 10, 11, 18, 19, 20]);
        const move = new HiddenSingle(false).first(board);
        expect(move?.desc).toBe('Hidden Single in Box 1: R1C1 = 5.');
        expect(move?.weight).toBe(1.2);
        // The same cell is not alone in its row or column
        expect(new HiddenSingle(true).first(board)).toBeNull();
    });

    it('finds a naked single', () => {
        const board = new Board();
        keepOnly(board, 40, [7]);
        const move = new NakedSingle().first(board);
        expect(move).toMatchObject({ kind: 'placement', cell: 40, value: 7 });
        expect(move?.desc).toBe('Naked Single: R5C5 = 7.');
    });

    it('finds nothing on an open board', () => {
        const board = new Board();
        expect(new FullHouse().first(board)).toBeNull();
        expect(new HiddenSingle(false).first(board)).toBeNull();
        expect(new NakedSingle().first(board)).toBeNull();
    });
});

describe('locked candidates', () => {
    it('finds pointing', () => {
        const board = new Board();
        removeFrom(board, 3, [2, 9, 10, 11, 18, 19, 20]);
        const move = new LockedCandidates(true).first(board);
        expect(move?.desc).toBe('Pointing: 3 in Box 1 is locked to Row 1 => -3r1c456789');
        expect(move?.kind === 'elimination' && move.eliminations).toHaveLength(6);
    });

    it('finds claiming', () => {
        const board = new Board();
        removeFrom(board, 3, range(2, 8));
        const move = new LockedCandidates(false).first(board);
        expect(move?.desc).toBe('Claiming: 3 in Row 1 is locked to Box 1 => -3r23c123');
    });
});

describe('subsets', () => {
    it('finds a naked pair', () => {
        const board = new Board();
        keepOnly(board, 0, [1, 2]);
        keepOnly(board, 1, [1, 2]);
        const move = new NakedSubset(2).first(board);
        expect(move?.desc).toBe('Naked Pair in Row 1: 12r1c12 => -1r1c3456789;-2r1c3456789');
    });

    it('finds a hidden pair', () => {
        const board = new Board();
        removeFrom(board, 4, range(2, 8));
        removeFrom(board, 5, range(2, 8));
        const move = new HiddenSubset(2).first(board);
        expect(move?.desc).toBe('Hidden Pair in Row 1: 45r1c12 => -1r1c12;-2r1c12;-3r1c12;-6r1c12;-7r1c12;-8r1c12;-9r1c12');
    });

    it('finds a hidden triple', () => {
        const board = new Board();
        for (const value of [4, 5, 6]) {
            removeFrom(board, value, range(3, 8));
        }
        const move = new HiddenSubset(3).first(board);
        expect(move?.desc).toBe('Hidden Triple in Row 1: 456r1c123 => -1r1c123;-2r1c123;-3r1c123;-7r1c123;-8r1c123;-9r1c123');
        expect(move?.weight).toBe(3.8);
    });

    it('finds a hidden quad', () => {
        const board = new Board();
        for (const value of [4, 5, 6, 7]) {
            removeFrom(board, value, range(4, 8));
        }
        const move = new HiddenSubset(4).first(board);
        expect(move?.desc).toBe('Hidden Quad in Row 1: 4567r1c1234 => -1r1c1234;-2r1c1234;-3r1c1234;-8r1c1234;-9r1c1234');
        expect(move?.weight).toBe(5.4);
    });

    it('needs every value of the tuple inside the cells', () => {
        const board = new Board();
        removeFrom(board, 4, range(3, 8));
        removeFrom(board, 5, range(3, 8));
        // 6 can still go anywhere in the row
        expect(new HiddenSubset(3).first(board)).toBeNull();
    });
});

describe('fish', () => {
    it('finds an X-Wing', () => {
        const board = new Board();
        removeFrom(board, 5, [0, 1, 3, 4, 5, 6, 8, 27, 28, 30, 31, 32, 33, 35]);
        const move = Fish.basic(2, false).first(board);
        expect(move?.desc).toBe('X-Wing on 5: Row 1, Row 4 / Col 3, Col 8 => -5r2356789c38');
        expect(move?.regions).toEqual(['Row 1', 'Row 4', 'Col 3', 'Col 8']);
    });

    it('finds a finned X-Wing', () => {
        const board = new Board();
        removeFrom(board, 5, [0, 1, 3, 4, 5, 6, 8, 27, 28, 30, 31, 32, 33]);
        expect(Fish.basic(2, false).first(board)).toBeNull();
        const move = Fish.basic(2, true).first(board);
        expect(move?.desc).toBe('Finned X-Wing on 5: Row 1, Row 4 / Col 3, Col 8 fins 5r4c9 => -5r56c8');
        expect(move?.weight).toBe(3.4);
    });

    it('finds a Swordfish', () => {
        const board = new Board();
        // Rows 1, 4 and 7 keep 5 only in columns 2, 5 and 8
        for (const row of [0, 3, 6]) {
            removeFrom(board, 5, [0, 2, 3, 5, 6, 8].map(col => row * 9 + col));
        }
        expect(Fish.basic(2, false).first(board)).toBeNull();
        const move = Fish.basic(3, false).first(board);
        expect(move?.desc).toBe('Swordfish on 5: Row 1, Row 4, Row 7 / Col 2, Col 5, Col 8 => -5r235689c258');
        expect(move?.kind === 'elimination' && move.eliminations).toHaveLength(18);
    });

    it('finds a Jellyfish', () => {
        const board = new Board();
        // Rows 1, 3, 5 and 7 keep 5 only in columns 2, 4, 6 and 8
        for (const row of [0, 2, 4, 6]) {
            removeFrom(board, 5, [0, 2, 4, 6, 8].map(col => row * 9 + col));
        }
        const move = Fish.basic(4, false).first(board);
        expect(move?.desc).toBe('Jellyfish on 5: Row 1, Row 3, Row 5, Row 7 / Col 2, Col 4, Col 6, Col 8 => -5r24689c2468');
        expect(move?.weight).toBe(5.2);
    });

    it('finds a Franken fish with a box cover', () => {
        const board = new Board();
        removeFrom(board, 5, [1, 2, 3, 4, 5, 8]);
        removeFrom(board, 5, [10, 11, 12, 13, 14, 16, 17]);
        const move = new Fish('frankenFish', { kind: 'franken', sizes: [2, 3], fins: 'allowed' }).first(board);
        expect(move?.desc).toBe('Franken Fish on 5: Row 1, Row 2 / Col 1, Box 3 => -5r3c1789,r456789c1');
        expect(move?.weight).toBe(5.5);
    });

    it('finds a Mutant fish over a row and a column', () => {
        const board = new Board();
        removeFrom(board, 5, [0, 1, 2, 5, 6, 7, 8]);
        removeFrom(board, 5, [9, 18, 45, 54, 63, 72]);
        const move = new Fish('mutantFish', { kind: 'mutant', sizes: [2], fins: 'none' }).first(board);
        expect(move?.desc).toBe('Mutant Fish on 5: Row 1, Col 1 / Box 2, Box 4 => -5r23c456,r456c23');
        expect(move?.weight).toBe(6.5);
    });

    it('merges finned fish on one base into a Siamese fish', () => {
        const board = new Board();
        // Rows 1 and 5 keep 5 only in columns 1 and 7
        removeFrom(board, 5, [1, 2, 3, 4, 5, 7, 8]);
        removeFrom(board, 5, [37, 38, 39, 40, 41, 43, 44]);
        const move = createLogicalStep('siameseFish').first(board);
        expect(move?.technique).toBe('siameseFish');
        expect(move?.weight).toBe(5.5);
        expect(move?.kind === 'elimination' && move.eliminations).toEqual([9, 15, 18, 24, 27, 33, 45, 51].map(cell => ({ cell, value: 5 })));
    });

    it('classifies base and cover sets', () => {
        const [row1, row2] = [regions[0], regions[1]];
        const [col1, col2] = [regions[9], regions[10]];
        const box1 = regions[18];
        expect(classifyFish([row1, row2], [col1, col2])).toBe('basic');
        expect(classifyFish([row1, box1], [col1, col2])).toBe('franken');
        expect(classifyFish([row1, col1], [row2, col2])).toBe('mutant');
    });
});
