import { main } from '../src/cli';
import { serializeGrid } from '../src/solver/GridFormat';
import { patternString, patternWithout, range } from './TestUtility';

describe('cli', () => {
    let log: jest.SpyInstance;
    let error: jest.SpyInstance;

    beforeEach(() => {
        log = jest.spyOn(console, 'log').mockImplementation(() => {});
        error = jest.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    const printed = () => log.mock.calls.map(call => call.join(' '));

    it('prints help without a command', async () => {
        expect(await main([])).toBe(1);
        expect(printed()[0]).toBe('Usage: sudoku <command> [options]');
        expect(await main(['--help'])).toBe(0);
    });

    it('counts solutions', async () => {
        expect(await main(['count', patternString()])).toBe(0);
        expect(printed()).toEqual(['1']);
    });

    it('solves step by step', async () => {
        expect(await main(['solve', serializeGrid(patternWithout([0, 10]))])).toBe(0);
        expect(printed()).toEqual(['1. Full House in Row 1: R1C1 = 1.', '2. Full House in Row 2: R2C2 = 5.', patternString(), 'Solved!']);
    });

    it('reports a grid it cannot finish', async () => {
        const grid = serializeGrid(patternWithout(range(0, 17)));
        expect(await main(['solve', grid])).toBe(2);
        expect(printed()).toEqual([grid, 'No logical steps found.']);
        log.mockClear();
        expect(await main(['rate', grid])).toBe(2);
        expect(printed()).toEqual(['Unratable (stuck)']);
    });

    it('rates a grid', async () => {
        expect(await main(['rate', serializeGrid(patternWithout([0, 10]))])).toBe(0);
        expect(printed()).toEqual(['1 (Beginner)']);
    });

    it('rejects malformed grids', async () => {
        expect(await main(['count', 'abc'])).toBe(1);
        expect(error).toHaveBeenCalledWith('Invalid grid: Expected 81 characters, got 3');
        expect(await main(['count'])).toBe(1);
        expect(error).toHaveBeenCalledWith('Missing grid argument');
        expect(await main(['count', '11' + '.'.repeat(79)])).toBe(1);
        expect(error).toHaveBeenCalledWith('Invalid grid: 1 at R1C2 repeats R1C1');
    });

    it('rejects unknown options', async () => {
        expect(await main(['generate', '--difficulty', 'impossible'])).toBe(1);
        expect(error).toHaveBeenCalledWith("Unknown difficulty 'impossible'");
        expect(await main(['generate', '--symmetry', 'spiral'])).toBe(1);
        expect(error).toHaveBeenCalledWith("Unknown symmetry 'spiral'");
        expect(await main(['generate', '--seed=-5'])).toBe(1);
        expect(await main(['shuffle'])).toBe(1);
        expect(error).toHaveBeenCalledWith("Unknown command 'shuffle'");
    });

    it('rejects bad codes', async () => {
        expect(await main(['code', '30000003'])).toBe(1);
        expect(error).toHaveBeenCalledWith('Invalid code: Unknown symmetry');
    });

    it('generates a puzzle with a code', async () => {
        expect(await main(['generate', '-d', 'beginner', '--seed', '42'])).toBe(0);
        const lines = printed();
        expect(lines[0]).toMatch(/^[.1-9]{81}$/);
        expect(lines[1]).toMatch(/^Rating: [\d.]+ \(Beginner\)$/);
        expect(lines[2]).toMatch(/^Code: [0-9A-Z]{8}$/);

        log.mockClear();
        expect(await main(['code', lines[2].slice('Code: '.length)])).toBe(0);
        expect(printed()[0]).toBe(lines[0]);
    });
});
