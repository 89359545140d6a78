import { StakingError, StakingErrorKind } from './errors.js';
import { TokenLedger } from './ledger/token-ledger.js';
import { Treasury } from './ledger/treasury.js';
import logger from './logger.js';
import { ConfigStore } from './staking/config-store.js';
import { StakeEngine } from './staking/stake-engine.js';

/**
 * Minting, transfers and withdrawals around the ownership ledger.
 * Transfers go through the stake engine's guard; staking records survive a change of owner.
 */
export class NftCollection {
    constructor(
        private readonly config: ConfigStore,
        private readonly tokens: TokenLedger,
        private readonly treasury: Treasury,
        private readonly engine: StakeEngine
    ) {}

    checkMint(quantity: number, payment: bigint): void {
        const { maxPerMint, maxSupply, mintPrice } = this.config.get();
        if (!Number.isSafeInteger(quantity) || quantity < 1 || quantity > maxPerMint) {
            throw new StakingError(StakingErrorKind.INVALID_QUANTITY, `Quantity must be between 1 and ${maxPerMint}`, { quantity });
        }
        if (this.tokens.totalSupply + quantity > maxSupply) {
            throw new StakingError(
                StakingErrorKind.SUPPLY_EXCEEDED,
                `Minting ${quantity} would exceed max supply ${maxSupply}`,
                { quantity, totalSupply: this.tokens.totalSupply }
            );
        }
        const due = mintPrice * BigInt(quantity);
        if (payment < due) {
            throw new StakingError(StakingErrorKind.INSUFFICIENT_PAYMENT, `Payment ${payment} is below ${due}`, { payment: payment.toString(), due: due.toString() });
        }
    }

    mint(to: string, quantity: number, payment: bigint, now: number): number[] {
        this.checkMint(quantity, payment);
        const autoStake = this.config.staking.automaticStakeOnMint > 0;
        this.treasury.deposit(payment);
        const minted = this.tokens.mint(to, quantity, now, autoStake);
        logger.debug(`[collection] Minted tokens ${minted.join(', ')} to ${to}${autoStake ? ' (auto-staked)' : ''}`);
        return minted;
    }

    checkTransfer(from: string, startTokenId: number, quantity: number, now: number): void {
        for (let tokenId = startTokenId; tokenId < startTokenId + quantity; tokenId++) {
            if (this.tokens.ownerOf(tokenId) !== from) {
                throw new StakingError(StakingErrorKind.NOT_OWNER, `${from} does not own token ${tokenId}`, { tokenId, caller: from });
            }
        }
        this.engine.assertTransferable(startTokenId, quantity, now);
    }

    transfer(from: string, to: string, startTokenId: number, quantity: number, now: number): number[] {
        const autoStake = this.config.staking.automaticStakeOnTransfer > 0;
        const moved = this.tokens.transfer(from, to, startTokenId, quantity, now, autoStake, (start, count) =>
            this.engine.assertTransferable(start, count, now)
        );
        logger.debug(`[collection] Transferred tokens ${moved.join(', ')} from ${from} to ${to}`);
        return moved;
    }

    checkWithdraw(caller: string): void {
        if (caller !== this.config.admin) {
            throw new StakingError(StakingErrorKind.UNAUTHORIZED, `${caller} may not withdraw collection funds`, { caller });
        }
    }

    withdraw(caller: string, to: string): bigint {
        this.checkWithdraw(caller);
        const amount = this.treasury.withdrawAll(to);
        logger.info(`[collection] ${caller} withdrew ${amount} to ${to}`);
        return amount;
    }
}
