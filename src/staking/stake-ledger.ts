import { StakeRecord, emptyStakeRecord } from './stake-record.js';

/**
 * Per-token staking records.
 * Records spring into existence on first access and are never removed.
 * Only the stake engine writes; every read hands out a copy.
 */
export class StakeLedger {
    private readonly records = new Map<number, StakeRecord>();
    private readonly dirty = new Set<number>();

    get(tokenId: number): StakeRecord {
        const record = this.records.get(tokenId);
        return record ? { ...record } : emptyStakeRecord();
    }

    set(tokenId: number, record: StakeRecord): void {
        this.records.set(tokenId, { ...record });
        this.dirty.add(tokenId);
    }

    /** Loads a record from storage without marking it for the next flush. */
    restore(tokenId: number, record: StakeRecord): void {
        this.records.set(tokenId, { ...record });
    }

    has(tokenId: number): boolean {
        return this.records.has(tokenId);
    }

    entries(): Array<[number, StakeRecord]> {
        return [...this.records.entries()].map(([tokenId, record]) => [tokenId, { ...record }]);
    }

    /** Returns the records changed since the previous call and clears the change set. */
    takeDirty(): Array<[number, StakeRecord]> {
        const changed: Array<[number, StakeRecord]> = [];
        for (const tokenId of this.dirty) {
            changed.push([tokenId, this.get(tokenId)]);
        }
        this.dirty.clear();
        return changed;
    }

    /** Puts records back in the change set, e.g. after a failed flush. */
    markDirty(tokenIds: number[]): void {
        for (const tokenId of tokenIds) {
            if (this.records.has(tokenId)) this.dirty.add(tokenId);
        }
    }

    get size(): number {
        return this.records.size;
    }
}
