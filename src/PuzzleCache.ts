import { Logger, noopLogger } from './Logger';
import { Tier, tiers as allTiers } from './solver/Difficulty';
import { GenerateResult, GeneratedPuzzle, generateAsync } from './solver/Generator';

export type GenerateFunction = (tier: Tier) => Promise<GenerateResult>;

export interface PuzzleCacheOptions {
    generate?: GenerateFunction;
    // Tiers filled by warm()
    tiers?: readonly Tier[];
    logger?: Logger;
}

/**
 * Keeps one generated puzzle ready per tier.
 * At most one generation runs per tier; taking a puzzle starts a background refill of that tier.
 */
export class PuzzleCache {
    private generateFn: GenerateFunction;
    private tiers: readonly Tier[];
    private logger: Logger;
    private ready = new Map<Tier, GeneratedPuzzle>();
    private inFlight = new Map<Tier, Promise<GenerateResult>>();
    private disposed = false;

    constructor(options: PuzzleCacheOptions = {}) {
        this.logger = options.logger ?? noopLogger;
        this.generateFn = options.generate ?? (tier => generateAsync({ difficulty: tier, logger: this.logger }, () => this.disposed));
        this.tiers = options.tiers ?? allTiers;
    }

    has(tier: Tier): boolean {
        return this.ready.has(tier);
    }

    isGenerating(tier: Tier): boolean {
        return this.inFlight.has(tier);
    }

    async take(tier: Tier): Promise<GenerateResult> {
        while (!this.disposed) {
            const puzzle = this.ready.get(tier);
            if (puzzle !== undefined) {
                this.ready.delete(tier);
                this.refill(tier);
                return { result: 'puzzle', puzzle };
            }
            const result = await this.fill(tier);
            if (result.result !== 'puzzle') {
                return result;
            }
            // Another caller took the puzzle first; go round again
        }
        return { result: 'cancelled' };
    }

    async warm(): Promise<void> {
        await Promise.all(this.tiers.filter(tier => !this.ready.has(tier)).map(tier => this.fill(tier)));
    }

    // Stops refilling and drops the ready puzzles. Generations already running finish without being stored.
    dispose() {
        this.disposed = true;
        this.ready.clear();
    }

    private refill(tier: Tier) {
        if (this.disposed) {
            return;
        }
        this.fill(tier).catch(error => this.logger.error(`Refilling ${tier} failed`, error));
    }

    // Never rejects: failures are logged and returned
    private fill(tier: Tier): Promise<GenerateResult> {
        const existing = this.inFlight.get(tier);
        if (existing !== undefined) {
            return existing;
        }

        const promise = this.generateFn(tier)
            .catch((error: unknown): GenerateResult => {
                this.logger.error(`Generating a ${tier} puzzle threw`, error);
                return { result: 'generation failed', reason: error instanceof Error ? error.message : String(error), attempts: 0 };
            })
            .then(result => {
                this.inFlight.delete(tier);
                if (result.result === 'puzzle') {
                    if (!this.disposed) {
                        this.ready.set(tier, result.puzzle);
                    }
                } else if (result.result === 'generation failed') {
                    this.logger.error(`Generating a ${tier} puzzle failed: ${result.reason}`);
                }
                return result;
            });
        this.inFlight.set(tier, promise);
        return promise;
    }
}
