import assert from 'assert';
import { once } from 'events';
import { AddressInfo } from 'net';
import { ManualClock } from '../src/clock.js';
import { createApp } from '../src/modules/http/index.js';
import { Runtime, setRuntime } from '../src/runtime.js';
import { serializeCollectionConfig } from '../src/staking/config-store.js';
import { TransactionType } from '../src/transactions/types.js';
import { ADMIN, evolvingConfig } from './fixtures.js';
import { it, run } from './harness.js';

const runtime = setRuntime(new Runtime({ admin: ADMIN, collection: evolvingConfig(), clock: new ManualClock() }));

const server = createApp().listen(0);
await once(server, 'listening');
const address: AddressInfo | string | null = server.address();
const baseUrl = address && typeof address !== 'string' ? `http://127.0.0.1:${address.port}` : '';

async function request(method: 'GET' | 'POST', path: string, body?: unknown): Promise<{ status: number; body: unknown }> {
    const res = await fetch(baseUrl + path, {
        method,
        headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
    });
    return { status: res.status, body: await res.json() };
}

it('POST /transactions applies a mint and a stake', async () => {
    const mint = await request('POST', '/transactions', { id: 'mint-1', type: TransactionType.NFT_MINT, sender: 'alice', data: { payment: '10' }, ts: 0 });
    assert.deepStrictEqual(mint, { status: 200, body: { id: 'mint-1', success: true } });
    const stake = await request('POST', '/transactions', { id: 'stake-1', type: TransactionType.NFT_STAKE, sender: 'alice', data: { tokenId: 1 }, ts: 0 });
    assert.deepStrictEqual(stake, { status: 200, body: { id: 'stake-1', success: true } });
});

it('POST /transactions reports rejected transactions', async () => {
    const again = await request('POST', '/transactions', { id: 'stake-2', type: TransactionType.NFT_STAKE, sender: 'alice', data: { tokenId: 1 }, ts: 1 });
    assert.deepStrictEqual(again, { status: 400, body: { id: 'stake-2', success: false, error: 'invalid nft_stake transaction data' } });
});

it('POST /transactions rejects a malformed body', async () => {
    const res = await request('POST', '/transactions', { type: 'mint', sender: 'alice' });
    assert.deepStrictEqual(res, { status: 400, body: { success: false, error: 'type (number) and sender (string) are required' } });
    const badTs = await request('POST', '/transactions', { type: TransactionType.NFT_STAKE, sender: 'alice', data: { tokenId: 1 }, ts: 'soon' });
    assert.deepStrictEqual(badTs, { status: 400, body: { success: false, error: 'ts must be a number of seconds' } });
});

it('GET /tokens/:tokenId evaluates the staking view at the requested time', async () => {
    const res = await request('GET', '/tokens/1?at=25');
    assert.deepStrictEqual(res, {
        status: 200,
        body: {
            tokenId: 1,
            owner: 'alice',
            createdAt: 0,
            lastTransferAt: null,
            at: 25,
            staked: true,
            autoStaked: false,
            canUnstake: true,
            record: { isStaked: true, firstStakedAt: 0, lastStakedAt: 0, accumulatedDuration: 0 },
            durations: { current: 25, alive: 25, cumulative: 25 },
            evolution: 2,
            uri: 'ipfs://test/2/1',
        },
    });
});

it('GET /tokens/:tokenId/uri returns the evolving URI', async () => {
    assert.deepStrictEqual(await request('GET', '/tokens/1/uri?at=25'), { status: 200, body: { tokenId: 1, uri: 'ipfs://test/2/1' } });
    assert.deepStrictEqual(await request('GET', '/tokens/1/uri?at=5'), { status: 200, body: { tokenId: 1, uri: 'ipfs://test/0/1' } });
});

it('GET /tokens maps errors to status codes', async () => {
    assert.deepStrictEqual(await request('GET', '/tokens/99'), {
        status: 404,
        body: { error: 'TokenDoesNotExist', message: '[TokenDoesNotExist] Token 99 does not exist' },
    });
    assert.deepStrictEqual(await request('GET', '/tokens/abc'), {
        status: 400,
        body: { error: 'BadRequest', message: 'tokenId and at must be non-negative integers' },
    });
    assert.deepStrictEqual(await request('GET', '/tokens/1?at=-4'), {
        status: 400,
        body: { error: 'BadRequest', message: 'tokenId and at must be non-negative integers' },
    });
});

it('GET /tokens/owner/:account lists owned tokens', async () => {
    assert.deepStrictEqual(await request('GET', '/tokens/owner/alice'), { status: 200, body: { account: 'alice', tokens: [1], total: 1 } });
});

it('GET /config describes the collection', async () => {
    assert.deepStrictEqual(await request('GET', '/config'), {
        status: 200,
        body: {
            initialized: true,
            admin: ADMIN,
            config: serializeCollectionConfig(evolvingConfig()),
            totalSupply: 1,
            treasuryBalance: '10',
            lastSeenTime: 0,
        },
    });
});

it('GET /events filters by type', async () => {
    const expected = runtime.events.filter(event => event.type === 'nft_stake');
    assert.strictEqual(expected.length, 1);
    assert.deepStrictEqual(await request('GET', '/events?type=nft_stake'), {
        status: 200,
        body: { data: expected, total: 1, limit: 10, skip: 0 },
    });
});

it('unknown routes answer with a JSON 404', async () => {
    assert.deepStrictEqual(await request('GET', '/nope'), { status: 404, body: { error: 'NotFound', message: 'No route for GET /nope' } });
});

try {
    await run();
} finally {
    server.closeAllConnections();
    server.close();
}
