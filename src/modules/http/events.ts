import express from 'express';

import { getRuntime } from '../../runtime.js';
import { getPagination } from './utils.js';

const router = express.Router();

/** Most recent events first. Supports `?actor=`, `?type=` and pagination. */
router.get('/', (req, res) => {
    const { limit, skip } = getPagination(req);
    const actor = typeof req.query.actor === 'string' ? req.query.actor : undefined;
    const type = typeof req.query.type === 'string' ? req.query.type : undefined;

    const matching = getRuntime().events
        .filter(event => (!actor || event.actor === actor) && (!type || event.type === type))
        .reverse();
    res.json({ data: matching.slice(skip, skip + limit), total: matching.length, limit, skip });
});

export default router;
