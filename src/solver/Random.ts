// Seeded PRNG (mulberry32) so that a seed always regenerates the same puzzle
export class Random {
    private state: number;

    constructor(seed: number) {
        this.state = seed | 0;
    }

    // Uniform float in [0, 1)
    next(): number {
        this.state = (this.state + 0x6d2b79f5) | 0;
        let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    // Uniform integer in [0, max)
    nextInt(max: number): number {
        return Math.floor(this.next() * max);
    }

    // Unsigned 32-bit integer, used to derive per-attempt seeds
    nextUint32(): number {
        return Math.floor(this.next() * 4294967296) >>> 0;
    }

    shuffle<T>(array: T[]): T[] {
        for (let i = array.length - 1; i > 0; i--) {
            const j = this.nextInt(i + 1);
            [array[i], array[j]] = [array[j], array[i]];
        }
        return array;
    }
}

export function randomSeed(): number {
    return Math.floor(Math.random() * 4294967296) >>> 0;
}
