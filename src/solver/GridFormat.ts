import { Board, PlaceResultRuleViolation, ReadonlyBoard } from './Board';
import { CellValue, NUM_CELLS } from './SolveUtility';

// 81 characters, row-major, digits for filled cells and '.' for empty ones. Parsing also accepts '0' for empty.

export const EMPTY_CHAR = '.';

export type InvalidFormat = {
    result: 'invalid format';
    reason: string;
    // Character offset of the first bad character, when there is one
    position?: number;
};

export type ParseGridResult = { result: 'grid'; values: CellValue[] } | InvalidFormat;
export type ParseBoardResult = { result: 'board'; board: Board } | InvalidFormat | PlaceResultRuleViolation;

export function serializeGrid(grid: ReadonlyBoard | ArrayLike<CellValue>): string {
    const values = 'getValueArray' in grid ? grid.getValueArray() : Array.from(grid);
    if (values.length !== NUM_CELLS) {
        throw new Error(`Expected ${NUM_CELLS} values, got ${values.length}`);
    }
    return values.map(value => (value === 0 ? EMPTY_CHAR : String(value))).join('');
}

export function parseGrid(text: string): ParseGridResult {
    if (text.length !== NUM_CELLS) {
        return { result: 'invalid format', reason: `Expected ${NUM_CELLS} characters, got ${text.length}` };
    }

    const values: CellValue[] = [];
    for (let i = 0; i < text.length; i++) {
        const char = text[i];
        if (char === EMPTY_CHAR || char === '0') {
            values.push(0);
        } else if (char >= '1' && char <= '9') {
            values.push(char.charCodeAt(0) - 48);
        } else {
            return { result: 'invalid format', reason: `Unexpected character '${char}'`, position: i };
        }
    }
    return { result: 'grid', values };
}

// Parse and place every digit as a given
export function parseBoard(text: string): ParseBoardResult {
    const parsed = parseGrid(text);
    if (parsed.result !== 'grid') {
        return parsed;
    }
    return Board.create(parsed.values);
}
