import { parseBoard, parseGrid, serializeGrid } from '../src/solver/GridFormat';
import { boardFrom, patternSolution, patternString, patternWithout } from './TestUtility';

describe('serializeGrid', () => {
    it('writes digits and dots row by row', () => {
        const text = serializeGrid(patternWithout([0, 80]));
        expect(text).toHaveLength(81);
        expect(text.slice(0, 9)).toBe('.23456789');
        expect(text.slice(72)).toBe('91234567.');
    });

    it('writes boards the same way as arrays', () => {
        expect(serializeGrid(boardFrom(patternSolution()))).toBe(patternString());
    });

    it('throws on the wrong length', () => {
        expect(() => serializeGrid([1, 2])).toThrow('Expected 81 values, got 2');
    });
});

describe('parseGrid', () => {
    it('reads dots and zeros as empty', () => {
        const text = '0.' + patternString().slice(2);
        const parsed = parseGrid(text);
        expect(parsed).toEqual({ result: 'grid', values: patternWithout([0, 1]) });
    });

    it('reads back what it wrote', () => {
        const values = patternWithout([3, 30, 60]);
        expect(parseGrid(serializeGrid(values))).toEqual({ result: 'grid', values });
    });

    it('rejects the wrong length', () => {
        expect(parseGrid('123')).toEqual({ result: 'invalid format', reason: 'Expected 81 characters, got 3' });
    });

    it('points at the first bad character', () => {
        const text = patternString().slice(0, 5) + 'x' + patternString().slice(6);
        expect(parseGrid(text)).toEqual({ result: 'invalid format', reason: "Unexpected character 'x'", position: 5 });
    });
});

describe('parseBoard', () => {
    it('places digits as givens', () => {
        const parsed = parseBoard(serializeGrid(patternWithout([0])));
        expect(parsed.result).toBe('board');
        if (parsed.result === 'board') {
            expect(parsed.board.isGiven(1)).toBe(true);
            expect(parsed.board.emptyCount).toBe(1);
        }
    });

    it('reports repeated digits', () => {
        expect(parseBoard('11' + '.'.repeat(79))).toEqual({ result: 'rule violation', cell: 1, value: 1, conflicts: [0] });
    });
});
