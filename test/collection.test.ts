import assert from 'assert';
import { StakingErrorKind, isStakingError } from '../src/errors.js';
import { Runtime } from '../src/runtime.js';
import { ADMIN, collectionConfig } from './fixtures.js';
import { it, run } from './harness.js';

const hasKind = (kind: StakingErrorKind) => (e: unknown) => isStakingError(e, kind);

it('minting before initialization fails', () => {
    const runtime = new Runtime({ admin: ADMIN });
    assert.throws(() => runtime.collection.mint('alice', 1, 10n, 0), hasKind(StakingErrorKind.NOT_INITIALIZED));
    assert.strictEqual(runtime.tokens.totalSupply, 0);
});

it('mint checks quantity, supply and payment', () => {
    const runtime = new Runtime({ admin: ADMIN, collection: collectionConfig() });
    const { collection } = runtime;
    assert.throws(() => collection.mint('alice', 0, 0n, 0), hasKind(StakingErrorKind.INVALID_QUANTITY));
    assert.throws(() => collection.mint('alice', 6, 60n, 0), hasKind(StakingErrorKind.INVALID_QUANTITY));
    assert.throws(() => collection.mint('alice', 2, 19n, 0), hasKind(StakingErrorKind.INSUFFICIENT_PAYMENT));

    for (let i = 0; i < 4; i++) collection.mint('alice', 5, 50n, 0);
    assert.strictEqual(runtime.tokens.totalSupply, 20);
    assert.throws(() => collection.mint('alice', 1, 10n, 0), hasKind(StakingErrorKind.SUPPLY_EXCEEDED));
    assert.strictEqual(runtime.treasury.balance, 200n);
});

it('overpayment is kept by the treasury', () => {
    const runtime = new Runtime({ admin: ADMIN, collection: collectionConfig() });
    assert.deepStrictEqual(runtime.collection.mint('alice', 2, 25n, 0), [1, 2]);
    assert.strictEqual(runtime.treasury.balance, 25n);
});

it('mint opens the auto-stake window only when it is configured', () => {
    const plain = new Runtime({ admin: ADMIN, collection: collectionConfig() });
    plain.collection.mint('alice', 1, 10n, 0);
    assert.strictEqual(plain.tokens.getToken(1)?.autoStakeOnMint, false);

    const auto = new Runtime({
        admin: ADMIN,
        collection: collectionConfig({ staking: { minStakingTime: 0, automaticStakeOnMint: 100, automaticStakeOnTransfer: 0 } }),
    });
    auto.collection.mint('alice', 1, 10n, 0);
    assert.strictEqual(auto.tokens.getToken(1)?.autoStakeOnMint, true);
    assert.strictEqual(auto.engine.isStaked(1, 99), true);
});

it('transfer refuses staked tokens and keeps unstaked ones moving', () => {
    const runtime = new Runtime({ admin: ADMIN, collection: collectionConfig() });
    runtime.collection.mint('alice', 2, 20n, 0);
    runtime.engine.stake(1, 'alice', 5);

    assert.throws(() => runtime.collection.checkTransfer('alice', 1, 1, 10), hasKind(StakingErrorKind.TOKEN_STAKED));
    assert.throws(() => runtime.collection.transfer('alice', 'bob', 1, 2, 10), hasKind(StakingErrorKind.TOKEN_STAKED));
    assert.strictEqual(runtime.tokens.ownerOf(2), 'alice');

    runtime.collection.checkTransfer('alice', 2, 1, 10);
    assert.deepStrictEqual(runtime.collection.transfer('alice', 'bob', 2, 1, 10), [2]);
    assert.strictEqual(runtime.tokens.ownerOf(2), 'bob');
});

it('checkTransfer rejects a sender that is not the owner', () => {
    const runtime = new Runtime({ admin: ADMIN, collection: collectionConfig() });
    runtime.collection.mint('alice', 1, 10n, 0);
    assert.throws(() => runtime.collection.checkTransfer('bob', 1, 1, 0), hasKind(StakingErrorKind.NOT_OWNER));
});

it('only the administrator withdraws the treasury', () => {
    const runtime = new Runtime({ admin: ADMIN, collection: collectionConfig() });
    runtime.collection.mint('alice', 3, 30n, 0);
    assert.throws(() => runtime.collection.withdraw('alice', 'alice'), hasKind(StakingErrorKind.UNAUTHORIZED));
    assert.strictEqual(runtime.collection.withdraw(ADMIN, 'vault'), 30n);
    assert.strictEqual(runtime.treasury.balance, 0n);
    assert.strictEqual(runtime.treasury.paidTo('vault'), 30n);
});

run().catch(error => {
    console.error(error);
    process.exitCode = 1;
});
