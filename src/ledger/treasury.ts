/**
 * Holds mint proceeds until the administrator withdraws them.
 * Withdrawals credit a payout account; nothing here touches staking state.
 */
export class Treasury {
    private held = 0n;
    private readonly payouts = new Map<string, bigint>();

    get balance(): bigint {
        return this.held;
    }

    deposit(amount: bigint): void {
        if (amount < 0n) throw new RangeError(`[treasury] Cannot deposit negative amount ${amount}`);
        this.held += amount;
    }

    /** Moves the entire held balance to `to` and returns the amount moved. */
    withdrawAll(to: string): bigint {
        const amount = this.held;
        this.held = 0n;
        this.payouts.set(to, this.paidTo(to) + amount);
        return amount;
    }

    paidTo(account: string): bigint {
        return this.payouts.get(account) ?? 0n;
    }

    payoutEntries(): Array<[string, bigint]> {
        return [...this.payouts.entries()];
    }

    restore(balance: bigint, payouts: Array<[string, bigint]>): void {
        this.held = balance;
        this.payouts.clear();
        for (const [account, amount] of payouts) this.payouts.set(account, amount);
    }
}
