import { CardOutcome, RawRecord, SkipReason, SkippedCard } from '../types';

/**
 * State of one harvesting run: the names already seen, the records kept and
 * every skipped card with its reason. Created per search, never shared.
 */
export class HarvestAccumulator {
    private readonly seen = new Set<string>();
    private readonly records: RawRecord[] = [];
    private readonly skipped: SkippedCard[] = [];

    constructor(readonly limit: number) {}

    get size(): number {
        return this.records.length;
    }

    get seenCount(): number {
        return this.seen.size;
    }

    get isFull(): boolean {
        return this.records.length >= this.limit;
    }

    /** Marks `name` as seen. False when it already was. */
    claim(name: string): boolean {
        if (this.seen.has(name)) return false;
        this.seen.add(name);
        return true;
    }

    accept(record: RawRecord): CardOutcome {
        this.records.push(record);
        return { kind: 'extracted', record };
    }

    skip(name: string | null, reason: SkipReason, detail?: string): CardOutcome {
        const outcome: SkippedCard = detail === undefined
            ? { kind: 'skipped', name, reason }
            : { kind: 'skipped', name, reason, detail };
        this.skipped.push(outcome);
        return outcome;
    }

    drain(): { records: RawRecord[]; skipped: SkippedCard[] } {
        return { records: [...this.records], skipped: [...this.skipped] };
    }
}
