import express from 'express';

import { isTransactionType, processTransaction } from '../../transactions/index.js';
import { deterministicIdFrom } from '../../utils/deterministic-id.js';
import { sendError } from './utils.js';

const router = express.Router();

let submitted = 0;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

router.post('/', async (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body)) {
        res.status(400).json({ success: false, error: 'request body must be a JSON object' });
        return;
    }
    const { type, sender } = body;
    const ts = typeof body.ts === 'number' ? body.ts : undefined;
    const data = body.data ?? {};
    if (!isTransactionType(type) || typeof sender !== 'string') {
        res.status(400).json({ success: false, error: 'type (number) and sender (string) are required' });
        return;
    }
    if (!isRecord(data)) {
        res.status(400).json({ success: false, error: 'data must be an object' });
        return;
    }
    if (body.ts !== undefined && ts === undefined) {
        res.status(400).json({ success: false, error: 'ts must be a number of seconds' });
        return;
    }
    const id = typeof body.id === 'string' && body.id ? body.id : deterministicIdFrom([sender, type, Date.now(), submitted++]);

    try {
        const result = await processTransaction({ id, type, sender, data, ts });
        res.status(result.success ? 200 : 400).json({ id, ...result });
    } catch (error) {
        sendError(res, error, `Error processing transaction ${id}`);
    }
});

export default router;
