import { Tier, tiers } from './solver/Difficulty';
import { InvalidFormat } from './solver/GridFormat';
import { SymmetryMode, symmetryModes } from './solver/Symmetry';

// Shareable puzzle codes: 8 Crockford base32 characters carrying 3 bits of tier, 3 bits of symmetry,
// the 32-bit seed and 2 check bits, most significant first.

export interface PuzzleCodeParams {
    tier: Tier;
    symmetry: SymmetryMode;
    seed: number;
}

export type DecodeResult = ({ result: 'code' } & PuzzleCodeParams) | InvalidFormat;

export const CODE_LENGTH = 8;

const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
// Characters commonly mistyped for a digit
const ALIASES: Record<string, string> = { O: '0', I: '1', L: '1' };

const SEED_RANGE = 2 ** 32;
const CHECK_RANGE = 4;

function checkBits(digits: number[]): number {
    let sum = 0;
    digits.forEach((digit, i) => (sum += (i + 1) * digit));
    return sum % CHECK_RANGE;
}

// Digits of the payload with the check bits cleared from the last one
function payloadDigits(value: number): number[] {
    const digits: number[] = [];
    for (let i = 0; i < CODE_LENGTH; i++) {
        digits.unshift(value % 32);
        value = Math.floor(value / 32);
    }
    digits[CODE_LENGTH - 1] = Math.floor(digits[CODE_LENGTH - 1] / CHECK_RANGE);
    return digits;
}

export function encodePuzzleCode({ tier, symmetry, seed }: PuzzleCodeParams): string {
    if (!Number.isInteger(seed) || seed < 0 || seed >= SEED_RANGE) {
        throw new Error(`Seed ${seed} is not a 32-bit unsigned integer`);
    }
    const tierBits = tiers.indexOf(tier);
    const symmetryBits = symmetryModes.indexOf(symmetry);
    const payload = (tierBits * 8 + symmetryBits) * SEED_RANGE + seed;
    const digits = payloadDigits(payload * CHECK_RANGE);
    const check = checkBits(digits);
    digits[CODE_LENGTH - 1] = digits[CODE_LENGTH - 1] * CHECK_RANGE + check;
    return digits.map(digit => ALPHABET[digit]).join('');
}

export function decodePuzzleCode(code: string): DecodeResult {
    const text = code.trim().toUpperCase();
    if (text.length !== CODE_LENGTH) {
        return { result: 'invalid format', reason: `Expected ${CODE_LENGTH} characters, got ${text.length}` };
    }

    let value = 0;
    for (let i = 0; i < text.length; i++) {
        const char = ALIASES[text[i]] ?? text[i];
        const digit = ALPHABET.indexOf(char);
        if (digit === -1) {
            return { result: 'invalid format', reason: `Unexpected character '${code.trim()[i]}'`, position: i };
        }
        value = value * 32 + digit;
    }

    const check = value % CHECK_RANGE;
    if (checkBits(payloadDigits(value)) !== check) {
        return { result: 'invalid format', reason: 'Check bits do not match' };
    }

    const payload = Math.floor(value / CHECK_RANGE);
    const seed = payload % SEED_RANGE;
    const header = Math.floor(payload / SEED_RANGE);
    const tier = tiers[Math.floor(header / 8)];
    const symmetry = symmetryModes[header % 8];
    if (tier === undefined || symmetry === undefined) {
        return { result: 'invalid format', reason: 'Unknown symmetry' };
    }
    return { result: 'code', tier, symmetry, seed };
}
