import assert from 'assert';
import { StakingErrorKind, StakingError, isStakingError } from '../src/errors.js';
import { TokenLedger } from '../src/ledger/token-ledger.js';
import { Treasury } from '../src/ledger/treasury.js';
import { it, run } from './harness.js';

it('mint assigns sequential ids from 1', () => {
    const ledger = new TokenLedger();
    assert.deepStrictEqual(ledger.mint('alice', 3, 100, false), [1, 2, 3]);
    assert.deepStrictEqual(ledger.mint('bob', 1, 120, true), [4]);
    assert.strictEqual(ledger.totalSupply, 4);
    assert.strictEqual(ledger.balanceOf('alice'), 3);
    assert.strictEqual(ledger.creationTimestamp(4), 120);
    assert.strictEqual(ledger.getToken(4)?.autoStakeOnMint, true);
    assert.deepStrictEqual(ledger.tokensOf('alice'), [1, 2, 3]);
});

it('unknown tokens raise TokenDoesNotExist', () => {
    const ledger = new TokenLedger();
    assert.strictEqual(ledger.exists(1), false);
    assert.strictEqual(ledger.getToken(1), undefined);
    assert.throws(() => ledger.ownerOf(1), (e: unknown) => isStakingError(e, StakingErrorKind.TOKEN_DOES_NOT_EXIST));
    assert.throws(() => ledger.creationTimestamp(1), (e: unknown) => isStakingError(e, StakingErrorKind.TOKEN_DOES_NOT_EXIST));
});

it('transfer moves a range and records the transfer time', () => {
    const ledger = new TokenLedger();
    ledger.mint('alice', 3, 0, false);
    assert.deepStrictEqual(ledger.transfer('alice', 'bob', 2, 2, 50, true), [2, 3]);
    assert.strictEqual(ledger.ownerOf(1), 'alice');
    assert.strictEqual(ledger.ownerOf(3), 'bob');
    assert.strictEqual(ledger.balanceOf('alice'), 1);
    assert.strictEqual(ledger.balanceOf('bob'), 2);
    assert.strictEqual(ledger.getToken(2)?.lastTransferAt, 50);
    assert.strictEqual(ledger.getToken(2)?.autoStakeOnTransfer, true);
    assert.strictEqual(ledger.getToken(1)?.lastTransferAt, undefined);
});

it('transfer of a range the sender does not fully own changes nothing', () => {
    const ledger = new TokenLedger();
    ledger.mint('alice', 2, 0, false);
    ledger.mint('bob', 1, 0, false);
    assert.throws(() => ledger.transfer('alice', 'carol', 1, 3, 10, false), (e: unknown) => isStakingError(e, StakingErrorKind.NOT_OWNER));
    assert.strictEqual(ledger.ownerOf(1), 'alice');
    assert.strictEqual(ledger.balanceOf('carol'), 0);
});

it('a rejecting guard leaves the whole range untouched', () => {
    const ledger = new TokenLedger();
    ledger.mint('alice', 3, 0, false);
    const guard = (start: number, quantity: number) => {
        throw new StakingError(StakingErrorKind.TOKEN_STAKED, `range ${start}+${quantity}`);
    };
    assert.throws(() => ledger.transfer('alice', 'bob', 1, 3, 10, false, guard), (e: unknown) => isStakingError(e, StakingErrorKind.TOKEN_STAKED));
    assert.deepStrictEqual(ledger.tokensOf('alice'), [1, 2, 3]);
    assert.strictEqual(ledger.getToken(1)?.lastTransferAt, undefined);
});

it('takeDirty reports changed tokens once', () => {
    const ledger = new TokenLedger();
    ledger.mint('alice', 2, 0, false);
    assert.deepStrictEqual(ledger.takeDirty().map(([tokenId]) => tokenId), [1, 2]);
    assert.deepStrictEqual(ledger.takeDirty(), []);
    ledger.transfer('alice', 'bob', 2, 1, 5, false);
    assert.deepStrictEqual(ledger.takeDirty().map(([tokenId]) => tokenId), [2]);
});

it('restore rebuilds balances and continues the id sequence', () => {
    const ledger = new TokenLedger();
    ledger.restore(7, { owner: 'alice', createdAt: 1, autoStakeOnMint: false, autoStakeOnTransfer: false });
    assert.strictEqual(ledger.balanceOf('alice'), 1);
    assert.deepStrictEqual(ledger.takeDirty(), []);
    assert.deepStrictEqual(ledger.mint('bob', 1, 2, false), [8]);
});

it('treasury collects deposits and pays out everything at once', () => {
    const treasury = new Treasury();
    treasury.deposit(30n);
    treasury.deposit(12n);
    assert.strictEqual(treasury.balance, 42n);
    assert.strictEqual(treasury.withdrawAll('vault'), 42n);
    assert.strictEqual(treasury.balance, 0n);
    assert.strictEqual(treasury.paidTo('vault'), 42n);
    assert.strictEqual(treasury.withdrawAll('vault'), 0n);
    assert.throws(() => treasury.deposit(-1n), RangeError);
});

run().catch(error => {
    console.error(error);
    process.exitCode = 1;
});
