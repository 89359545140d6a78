import { StakingError, StakingErrorKind } from '../errors.js';
import { OwnershipLedger } from '../ledger/token-ledger.js';
import logger from '../logger.js';
import { ConfigStore } from './config-store.js';
import { StakeLedger } from './stake-ledger.js';
import { StakePolicy, StakeRecord, getStakeDuration } from './stake-record.js';

/**
 * Stake/unstake transitions and the read-only projections built on them.
 * Every check runs before the record is written, so a rejected call leaves no trace.
 */
export class StakeEngine {
    constructor(
        private readonly config: ConfigStore,
        private readonly ledger: OwnershipLedger,
        private readonly stakes: StakeLedger
    ) {}

    getRecord(tokenId: number): StakeRecord {
        return this.stakes.get(tokenId);
    }

    /** True while an automatic stake window opened by mint or by the last transfer is still running. */
    isAutoStaked(tokenId: number, now: number): boolean {
        const token = this.ledger.getToken(tokenId);
        if (!token) return false;
        const { automaticStakeOnMint, automaticStakeOnTransfer } = this.config.staking;
        if (token.autoStakeOnMint && token.createdAt + automaticStakeOnMint > now) return true;
        if (token.autoStakeOnTransfer && token.lastTransferAt !== undefined && token.lastTransferAt + automaticStakeOnTransfer > now) return true;
        return false;
    }

    isStaked(tokenId: number, now: number): boolean {
        return this.stakes.get(tokenId).isStaked || this.isAutoStaked(tokenId, now);
    }

    canUnstake(tokenId: number, now: number): boolean {
        const record = this.stakes.get(tokenId);
        return record.isStaked && now - record.lastStakedAt >= this.config.staking.minStakingTime;
    }

    private assertOwner(tokenId: number, caller: string): void {
        const owner = this.ledger.ownerOf(tokenId);
        if (owner !== caller) {
            throw new StakingError(StakingErrorKind.NOT_OWNER, `${caller} does not own token ${tokenId}`, { tokenId, caller });
        }
    }

    checkStake(tokenId: number, caller: string, now: number): void {
        this.assertOwner(tokenId, caller);
        if (this.isStaked(tokenId, now)) {
            throw new StakingError(StakingErrorKind.ALREADY_STAKED, `Token ${tokenId} is already staked`, { tokenId });
        }
    }

    stake(tokenId: number, caller: string, now: number): StakeRecord {
        this.checkStake(tokenId, caller, now);
        const record = this.stakes.get(tokenId);
        record.isStaked = true;
        record.lastStakedAt = now;
        if (record.firstStakedAt === undefined) record.firstStakedAt = now;
        this.stakes.set(tokenId, record);
        logger.debug(`[stake-engine] Token ${tokenId} staked by ${caller} at ${now}`);
        return record;
    }

    checkUnstake(tokenId: number, caller: string, now: number): void {
        this.assertOwner(tokenId, caller);
        const record = this.stakes.get(tokenId);
        if (!record.isStaked) {
            throw new StakingError(StakingErrorKind.NOT_UNSTAKEABLE, `Token ${tokenId} is not manually staked`, { tokenId });
        }
        const minStakingTime = this.config.staking.minStakingTime;
        if (now - record.lastStakedAt < minStakingTime) {
            throw new StakingError(
                StakingErrorKind.NOT_UNSTAKEABLE,
                `Token ${tokenId} must stay staked until ${record.lastStakedAt + minStakingTime}`,
                { tokenId, unstakeableAt: record.lastStakedAt + minStakingTime }
            );
        }
    }

    /** Closes the open stake period and returns its length. */
    unstake(tokenId: number, caller: string, now: number): number {
        this.checkUnstake(tokenId, caller, now);
        const record = this.stakes.get(tokenId);
        const period = Math.max(0, now - record.lastStakedAt);
        record.accumulatedDuration += period;
        record.isStaked = false;
        this.stakes.set(tokenId, record);
        logger.debug(`[stake-engine] Token ${tokenId} unstaked by ${caller} after ${period}s`);
        return period;
    }

    /** Rejects the whole range if any token in it is staked, manually or automatically. */
    assertTransferable(startTokenId: number, quantity: number, now: number): void {
        for (let tokenId = startTokenId; tokenId < startTokenId + quantity; tokenId++) {
            if (this.isStaked(tokenId, now)) {
                throw new StakingError(StakingErrorKind.TOKEN_STAKED, `Token ${tokenId} is staked and cannot be transferred`, { tokenId });
            }
        }
    }

    getStakeDuration(tokenId: number, policy: StakePolicy, now: number): number {
        return getStakeDuration(this.stakes.get(tokenId), policy, now);
    }

    /** Evolution value of a token, undefined when no evolution strategy is configured. */
    evolutionOf(tokenId: number, now: number): number | undefined {
        const strategy = this.config.evolution;
        const evolution = this.config.get().evolution;
        if (!strategy || !evolution) return undefined;
        return strategy.compute(this.getStakeDuration(tokenId, evolution.policy, now));
    }

    tokenURI(tokenId: number, now: number): string {
        if (!this.ledger.exists(tokenId)) {
            throw new StakingError(StakingErrorKind.TOKEN_DOES_NOT_EXIST, `Token ${tokenId} does not exist`, { tokenId });
        }
        const baseUri = this.config.get().baseUri;
        if (!baseUri) return '';
        const evolution = this.evolutionOf(tokenId, now);
        return evolution === undefined ? `${baseUri}${tokenId}` : `${baseUri}${evolution}/${tokenId}`;
    }
}
