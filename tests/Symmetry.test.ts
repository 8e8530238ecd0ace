import { NUM_CELLS } from '../src/solver/SolveUtility';
import { isSymmetryMode, orbit, symmetryModes } from '../src/solver/Symmetry';

describe('orbit', () => {
    it('pairs opposite cells under a half turn', () => {
        expect(orbit(0, 'rotational180')).toEqual([0, 80]);
        expect(orbit(13, 'rotational180')).toEqual([13, 67]);
        expect(orbit(40, 'rotational180')).toEqual([40]);
    });

    it('groups four cells under a quarter turn', () => {
        expect(orbit(0, 'rotational90')).toEqual([0, 8, 72, 80]);
        expect(orbit(1, 'rotational90')).toEqual([1, 17, 63, 79]);
    });

    it('mirrors across the axes and the diagonal', () => {
        expect(orbit(1, 'horizontal')).toEqual([1, 73]);
        expect(orbit(1, 'vertical')).toEqual([1, 7]);
        expect(orbit(1, 'diagonal')).toEqual([1, 9]);
        expect(orbit(10, 'diagonal')).toEqual([10]);
    });

    it('leaves cells alone without symmetry', () => {
        expect(orbit(5, 'none')).toEqual([5]);
    });

    it('partitions the grid for every mode', () => {
        for (const mode of symmetryModes) {
            const seen = new Set<number>();
            for (let cell = 0; cell < NUM_CELLS; cell++) {
                for (const other of orbit(cell, mode)) {
                    expect(orbit(other, mode)).toEqual(orbit(cell, mode));
                    seen.add(other);
                }
            }
            expect(seen.size).toBe(NUM_CELLS);
        }
    });

    it('recognises mode names', () => {
        expect(isSymmetryMode('rotational90')).toBe(true);
        expect(isSymmetryMode('spiral')).toBe(false);
    });
});
