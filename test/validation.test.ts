import assert from 'assert';
import { parseAmount, toBigInt, toDbString } from '../src/utils/bigint.js';
import { readPositiveInt } from '../src/settings.js';
import validate from '../src/validation/index.js';
import { it, run } from './harness.js';

it('accountName follows the username charset', () => {
    assert.strictEqual(validate.accountName('alice'), true);
    assert.strictEqual(validate.accountName('a.b'), true);
    assert.strictEqual(validate.accountName('al'), false);
    assert.strictEqual(validate.accountName('.ab'), false);
    assert.strictEqual(validate.accountName('ab-'), false);
    assert.strictEqual(validate.accountName('Alice'), false);
    assert.strictEqual(validate.accountName('abcdefghijklmnopq'), false);
    assert.strictEqual(validate.accountName(42), false);
});

it('integer honours zero, sign and bounds', () => {
    assert.strictEqual(validate.integer(0), false);
    assert.strictEqual(validate.integer(0, true), true);
    assert.strictEqual(validate.integer(-1, true), false);
    assert.strictEqual(validate.integer(-1, true, true), true);
    assert.strictEqual(validate.integer(1.5, true), false);
    assert.strictEqual(validate.integer(5, false, false, 4), false);
    assert.strictEqual(validate.integer(3, false, false, 10, 4), false);
    assert.strictEqual(validate.integer('3', true), false);
});

it('string checks length and characters', () => {
    assert.strictEqual(validate.string('ABC', 10, 3, 'ABC'), true);
    assert.strictEqual(validate.string('AB', 10, 3), false);
    assert.strictEqual(validate.string('ABCD', 3), false);
    assert.strictEqual(validate.string('ABz', 10, 1, 'ABC'), false);
    assert.strictEqual(validate.string(null), false);
});

it('bigint accepts decimal strings within range', () => {
    assert.strictEqual(validate.bigint('123'), true);
    assert.strictEqual(validate.bigint('0'), false);
    assert.strictEqual(validate.bigint('0', true), true);
    assert.strictEqual(validate.bigint('-1', true), false);
    assert.strictEqual(validate.bigint('abc', true), false);
    assert.strictEqual(validate.bigint('1'.repeat(31)), false);
    assert.strictEqual(validate.bigint(5n, false, false, 10n), false);
});

it('tokenId accepts positive integers only', () => {
    assert.strictEqual(validate.tokenId(1), true);
    assert.strictEqual(validate.tokenId(0), false);
    assert.strictEqual(validate.tokenId(2.5), false);
});

it('parseAmount reads numbers, strings and bigints', () => {
    assert.strictEqual(parseAmount('0012'), 12n);
    assert.strictEqual(parseAmount(7), 7n);
    assert.strictEqual(parseAmount(7n), 7n);
    assert.strictEqual(parseAmount(1.5), undefined);
    assert.strictEqual(parseAmount('1e3'), undefined);
    assert.strictEqual(parseAmount(null), undefined);
});

it('toDbString pads and round-trips through toBigInt', () => {
    assert.strictEqual(toDbString(5n, 4), '0005');
    assert.strictEqual(toDbString(-5n, 4), '-0005');
    assert.strictEqual(toBigInt(toDbString(123n)), 123n);
    assert.throws(() => toDbString(123456n, 4));
});

it('readPositiveInt falls back on missing or malformed values', () => {
    assert.strictEqual(readPositiveInt('15', 10), 15);
    assert.strictEqual(readPositiveInt(undefined, 10), 10);
    assert.strictEqual(readPositiveInt('', 10), 10);
    assert.strictEqual(readPositiveInt('soon', 10), 10);
    assert.strictEqual(readPositiveInt('0', 10), 10);
    assert.strictEqual(readPositiveInt('-3', 10), 10);
    assert.strictEqual(readPositiveInt('2.5', 10), 10);
});

run().catch(error => {
    console.error(error);
    process.exitCode = 1;
});
