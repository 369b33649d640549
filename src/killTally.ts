import type { TallyEntry } from './constants.js';
import ParserUtils from './parserUtils.js';

// Read side of a tally; what games and parse results hand out.
export class KillTallyView {
    constructor(protected readonly counts: Map<string, number> = new Map()) {
    }

    public get(key: string): number | undefined {
        return this.counts.get(key);
    }

    public has(key: string): boolean {
        return this.counts.has(key);
    }

    public get size(): number {
        return this.counts.size;
    }

    public entries(): Iterable<[string, number]> {
        return this.counts.entries();
    }

    public sorted(): TallyEntry[] {
        return ParserUtils.sortTally(this.counts);
    }

    public toJSON(): Record<string, number> {
        return Object.fromEntries(this.counts);
    }
}

// Insert-or-increment counter keyed by kill method or player name.
export class KillTally extends KillTallyView {
    private view: KillTallyView | undefined;

    public increment(key: string, by: number = 1): void {
        this.counts.set(key, (this.counts.get(key) ?? 0) + by);
    }

    /** Key-wise sum of another tally into this one. */
    public merge(other: KillTallyView): void {
        for (const [key, count] of other.entries()) {
            this.increment(key, count);
        }
    }

    // live, without the mutators
    public asReadonly(): KillTallyView {
        if (!this.view) {
            this.view = new KillTallyView(this.counts);
        }
        return this.view;
    }
}

export default KillTally;
