import { StakingError, StakingErrorKind } from '../errors.js';

/**
 * Creation metadata kept alongside each token's owner.
 * The auto-stake flags are written by mint/transfer and only read afterwards.
 */
export interface TokenInfo {
    owner: string;
    createdAt: number;
    autoStakeOnMint: boolean;
    lastTransferAt?: number;
    autoStakeOnTransfer: boolean;
}

/**
 * The slice of the ownership ledger the staking core depends on.
 */
export interface OwnershipLedger {
    exists(tokenId: number): boolean;
    ownerOf(tokenId: number): string;
    getToken(tokenId: number): Readonly<TokenInfo> | undefined;
}

/** Called with the whole range before any token in it changes hands. */
export type TransferGuard = (startTokenId: number, quantity: number) => void;

/**
 * In-memory ERC-721 style ledger with sequential token ids starting at 1.
 */
export class TokenLedger implements OwnershipLedger {
    private readonly tokens = new Map<number, TokenInfo>();
    private readonly balances = new Map<string, number>();
    private readonly dirty = new Set<number>();
    private nextTokenId = 1;

    get totalSupply(): number {
        return this.tokens.size;
    }

    exists(tokenId: number): boolean {
        return this.tokens.has(tokenId);
    }

    getToken(tokenId: number): Readonly<TokenInfo> | undefined {
        const token = this.tokens.get(tokenId);
        return token ? { ...token } : undefined;
    }

    ownerOf(tokenId: number): string {
        const token = this.tokens.get(tokenId);
        if (!token) {
            throw new StakingError(StakingErrorKind.TOKEN_DOES_NOT_EXIST, `Token ${tokenId} does not exist`, { tokenId });
        }
        return token.owner;
    }

    creationTimestamp(tokenId: number): number {
        const token = this.tokens.get(tokenId);
        if (!token) {
            throw new StakingError(StakingErrorKind.TOKEN_DOES_NOT_EXIST, `Token ${tokenId} does not exist`, { tokenId });
        }
        return token.createdAt;
    }

    balanceOf(owner: string): number {
        return this.balances.get(owner) ?? 0;
    }

    tokensOf(owner: string): number[] {
        const owned: number[] = [];
        for (const [tokenId, token] of this.tokens) {
            if (token.owner === owner) owned.push(tokenId);
        }
        return owned;
    }

    /** Assigns the next `quantity` ids to `to` and returns them. */
    mint(to: string, quantity: number, now: number, autoStake: boolean): number[] {
        const minted: number[] = [];
        for (let i = 0; i < quantity; i++) {
            const tokenId = this.nextTokenId++;
            this.tokens.set(tokenId, { owner: to, createdAt: now, autoStakeOnMint: autoStake, autoStakeOnTransfer: false });
            this.dirty.add(tokenId);
            minted.push(tokenId);
        }
        this.balances.set(to, this.balanceOf(to) + quantity);
        return minted;
    }

    /**
     * Moves `quantity` consecutive tokens from `from` to `to`.
     * Nothing changes unless `from` owns the whole range and the guard accepts it.
     */
    transfer(from: string, to: string, startTokenId: number, quantity: number, now: number, autoStake: boolean, guard?: TransferGuard): number[] {
        const range: number[] = [];
        for (let tokenId = startTokenId; tokenId < startTokenId + quantity; tokenId++) {
            if (this.ownerOf(tokenId) !== from) {
                throw new StakingError(StakingErrorKind.NOT_OWNER, `${from} does not own token ${tokenId}`, { tokenId, caller: from });
            }
            range.push(tokenId);
        }
        guard?.(startTokenId, quantity);

        for (const tokenId of range) {
            const token = this.tokens.get(tokenId);
            if (!token) continue;
            token.owner = to;
            token.lastTransferAt = now;
            token.autoStakeOnTransfer = autoStake;
            this.dirty.add(tokenId);
        }
        this.balances.set(from, this.balanceOf(from) - range.length);
        this.balances.set(to, this.balanceOf(to) + range.length);
        return range;
    }

    /** Loads a token from storage without marking it for the next flush. */
    restore(tokenId: number, token: TokenInfo): void {
        const previous = this.tokens.get(tokenId);
        if (previous) this.balances.set(previous.owner, this.balanceOf(previous.owner) - 1);
        this.tokens.set(tokenId, { ...token });
        this.balances.set(token.owner, this.balanceOf(token.owner) + 1);
        this.nextTokenId = Math.max(this.nextTokenId, tokenId + 1);
    }

    markDirty(tokenIds: number[]): void {
        for (const tokenId of tokenIds) {
            if (this.tokens.has(tokenId)) this.dirty.add(tokenId);
        }
    }

    takeDirty(): Array<[number, TokenInfo]> {
        const changed: Array<[number, TokenInfo]> = [];
        for (const tokenId of this.dirty) {
            const token = this.tokens.get(tokenId);
            if (token) changed.push([tokenId, { ...token }]);
        }
        this.dirty.clear();
        return changed;
    }
}
