import { decodePuzzleCode, encodePuzzleCode } from '../src/PuzzleCode';

describe('encodePuzzleCode', () => {
    it('writes eight characters', () => {
        expect(encodePuzzleCode({ tier: 'beginner', symmetry: 'none', seed: 0 })).toBe('00000000');
        expect(encodePuzzleCode({ tier: 'medium', symmetry: 'rotational180', seed: 1 })).toBe('8G000004');
    });

    it('rejects seeds outside 32 bits', () => {
        expect(() => encodePuzzleCode({ tier: 'easy', symmetry: 'none', seed: -1 })).toThrow('Seed -1 is not a 32-bit unsigned integer');
        expect(() => encodePuzzleCode({ tier: 'easy', symmetry: 'none', seed: 2 ** 32 })).toThrow();
    });
});

describe('decodePuzzleCode', () => {
    it('reads back the parameters', () => {
        expect(decodePuzzleCode('8G000004')).toEqual({ result: 'code', tier: 'medium', symmetry: 'rotational180', seed: 1 });
    });

    it('round trips the largest values', () => {
        const params = { tier: 'extreme', symmetry: 'diagonal', seed: 2 ** 32 - 1 } as const;
        expect(decodePuzzleCode(encodePuzzleCode(params))).toEqual({ result: 'code', ...params });
    });

    it('ignores case, whitespace and look-alike characters', () => {
        expect(decodePuzzleCode(' 8g000004 ')).toEqual({ result: 'code', tier: 'medium', symmetry: 'rotational180', seed: 1 });
        expect(decodePuzzleCode('8GOOOOO4')).toEqual({ result: 'code', tier: 'medium', symmetry: 'rotational180', seed: 1 });
    });

    it('catches a mistyped character', () => {
        expect(decodePuzzleCode('8G000005')).toEqual({ result: 'invalid format', reason: 'Check bits do not match' });
    });

    it('rejects the wrong length', () => {
        expect(decodePuzzleCode('8G00000')).toEqual({ result: 'invalid format', reason: 'Expected 8 characters, got 7' });
    });

    it('rejects characters outside the alphabet', () => {
        expect(decodePuzzleCode('8G0000U4')).toEqual({ result: 'invalid format', reason: "Unexpected character 'U'", position: 6 });
    });

    it('rejects unknown symmetry bits', () => {
        expect(decodePuzzleCode('30000003')).toEqual({ result: 'invalid format', reason: 'Unknown symmetry' });
    });
});
