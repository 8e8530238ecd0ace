import { cellName, combinations, compactName, describeElims, firstSlot, minValue, popcount, valuesList } from '../src/solver/SolveUtility';

describe('combinations function', () => {
    function factorial(n: number): number {
        return n <= 1 ? 1 : n * factorial(n - 1);
    }

    function binomialCoefficient(n: number, k: number): number {
        return factorial(n) / (factorial(k) * factorial(n - k));
    }

    function testCombinations(inputArray: number[], size: number) {
        const results = Array.from(combinations(inputArray, size));
        const expectedLength = binomialCoefficient(inputArray.length, size);
        expect(results).toHaveLength(expectedLength);

        // Check for uniqueness and correct size of each combination
        const uniqueResults = new Set(results.map(result => JSON.stringify(result)));
        expect(uniqueResults.size).toBe(expectedLength);
        results.forEach(combination => {
            expect(combination).toHaveLength(size);
        });
    }

    it('generates correct combinations for an array of length 9 and size 4', () => {
        testCombinations([1, 2, 3, 4, 5, 6, 7, 8, 9], 4);
    });

    it('generates correct combinations for an array of length 4 and size 2', () => {
        testCombinations([1, 2, 3, 4], 2);
    });

    it('generates correct combinations for an array of length 5 and size 3', () => {
        testCombinations([1, 2, 3, 4, 5], 3);
    });

    it('generates correct combinations for an array of length 3 and size 0', () => {
        testCombinations([1, 2, 3], 0);
    });

    it('handles the 27 houses', () => {
        testCombinations(Array.from({ length: 27 }, (_, i) => i), 3);
    });

    it('yields one empty subset of an empty array', () => {
        expect(Array.from(combinations([], 0))).toEqual([[]]);
    });

    it('keeps the input order', () => {
        expect(Array.from(combinations(['a', 'b', 'c'], 2))).toEqual([
            ['a', 'b'],
            ['a', 'c'],
            ['b', 'c'],
        ]);
    });

    it('yields nothing for a size larger than the array', () => {
        expect(Array.from(combinations([1, 2], 3))).toEqual([]);
    });
});

describe('mask helpers', () => {
    it('counts bits', () => {
        expect(popcount(0)).toBe(0);
        expect(popcount(0b101101)).toBe(4);
        expect(popcount(0x1ff)).toBe(9);
    });

    it('lists the values of a mask', () => {
        expect(valuesList(0b100000101)).toEqual([1, 3, 9]);
        expect(valuesList(0)).toEqual([]);
        expect(minValue(0b100000100)).toBe(3);
    });

    it('finds the lowest slot', () => {
        expect(firstSlot(0b100010000)).toBe(4);
        expect(firstSlot(1)).toBe(0);
        expect(firstSlot(0)).toBe(-1);
    });
});

describe('cell names', () => {
    it('names cells by row and column', () => {
        expect(cellName(0)).toBe('R1C1');
        expect(cellName(80)).toBe('R9C9');
        expect(cellName(13)).toBe('R2C5');
    });

    it('compacts cells in one row or column', () => {
        expect(compactName([1, 2])).toBe('r1c23');
        expect(compactName([4, 13])).toBe('r12c5');
        expect(compactName([40])).toBe('r5c5');
    });

    it('groups rows with the same columns', () => {
        expect(compactName([0, 1, 9, 10, 20])).toBe('r12c12,r3c3');
    });

    it('describes eliminations grouped by value', () => {
        expect(
            describeElims([
                { cell: 2, value: 5 },
                { cell: 1, value: 5 },
                { cell: 30, value: 7 },
            ])
        ).toBe('-5r1c23;-7r4c4');
    });
});
