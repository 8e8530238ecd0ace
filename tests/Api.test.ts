import { applyMove, generate, generateFromCode, hint, logicalSolve, rate, solveStep } from '../src/index';
import { Board } from '../src/solver/Board';
import { DispatchState } from '../src/solver/Enums/DispatchState';
import { boardFrom, patternWithout, range } from './TestUtility';

describe('public api', () => {
    it('explains the next step', () => {
        const result = hint(boardFrom(patternWithout([0, 10])));
        expect(result).toMatchObject({
            result: 'hint',
            explanation: 'Full House in Row 1: R1C1 = 1.',
            houses: ['Row 1'],
        });
        expect(result.result === 'hint' && result.cells).toHaveLength(9);
        expect(result.result === 'hint' && result.cells[0]).toBe('R1C1');
    });

    it('solves one step at a time', () => {
        const next = solveStep(boardFrom(patternWithout([40])));
        expect(next.result === 'move' && next.move).toMatchObject({ kind: 'placement', cell: 40, value: 9 });
    });

    it('solves a whole grid', () => {
        const solved = logicalSolve(boardFrom(patternWithout([0, 10, 20, 40])));
        expect(solved.state).toBe(DispatchState.SOLVED);
        expect(solved.trail).toHaveLength(4);
    });

    it('checks the solution count before rating', () => {
        expect(rate(boardFrom(patternWithout([0, 10])))).toMatchObject({ result: 'rating', rating: 1.0 });
        expect(rate(boardFrom(patternWithout(range(0, 17))))).toMatchObject({ result: 'unratable', reason: 'stuck' });

        const broken = boardFrom(patternWithout([0]));
        broken.removeCandidate(0, 1);
        expect(rate(broken)).toMatchObject({ result: 'unratable', reason: 'contradiction', trail: [] });
    });

    it('applies a player move', () => {
        const board = new Board();
        expect(applyMove(board, 0, 3).result).toBe('placed');
        expect(applyMove(board, 1, 3)).toEqual({ result: 'rule violation', cell: 1, value: 3, conflicts: [0] });
    });

    it('rejects out-of-range player moves', () => {
        const board = new Board();
        expect(() => applyMove(board, 0, 0)).toThrow('Invalid value 0');
        applyMove(board, 0, 3);
        expect(() => applyMove(board, 0, 0)).toThrow('Invalid value 0');
        expect(() => applyMove(board, 81, 3)).toThrow('Invalid cell index 81');
        expect(board.emptyCount).toBe(80);
    });

    it('wraps generated puzzles in an instance', () => {
        const result = generate('beginner', 'rotational180', { seed: 99 });
        expect(result.result).toBe('puzzle');
        if (result.result !== 'puzzle') {
            return;
        }
        const { instance } = result;
        expect(instance.code).not.toBeNull();
        expect(instance.isSolved()).toBe(false);

        const again = generateFromCode(instance.code ?? '');
        expect(again.result === 'puzzle' && again.instance.givens).toEqual(instance.givens);
    });

    it('reports bad codes', () => {
        expect(generateFromCode('bad')).toEqual({ result: 'invalid format', reason: 'Expected 8 characters, got 3' });
    });
});
